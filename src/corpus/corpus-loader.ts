/**
 * Loads the knowledge base from disk and re-reads it periodically so edits
 * to the documents file are picked up without a restart.
 */

import { existsSync, readFileSync } from 'node:fs';
import { createHash } from 'node:crypto';
import { EMPTY_CORPUS, parseCorpus } from './corpus-parser.js';
import type { Corpus } from './types.js';
import { TtlCache } from '../session/ttl-cache.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('corpus-loader');

/**
 * Read and parse a documents file. A missing file yields an empty corpus.
 */
export function loadCorpus(path: string): Corpus {
  if (!existsSync(path)) {
    log.warn('Documents file not found', { path });
    return EMPTY_CORPUS;
  }
  const corpus = parseCorpus(readFileSync(path, 'utf-8').trim());
  log.info('Corpus loaded', { path, sections: corpus.sections.length, chars: corpus.raw.length });
  return corpus;
}

/**
 * Stable fingerprint of corpus content, used in cache keys.
 */
export function corpusFingerprint(corpus: Corpus): string {
  return createHash('sha256').update(corpus.raw).digest('hex').slice(0, 16);
}

export interface CorpusProvider {
  get(): Corpus;
}

/**
 * A corpus provider that caches the parsed file for `reloadMs`.
 */
export class FileCorpusProvider implements CorpusProvider {
  private readonly cache: TtlCache<Corpus>;

  constructor(
    private readonly path: string,
    reloadMs: number,
    now?: () => number,
  ) {
    this.cache = new TtlCache<Corpus>({ ttlMs: reloadMs, now });
  }

  get(): Corpus {
    const cached = this.cache.get(this.path);
    if (cached) return cached;

    const corpus = loadCorpus(this.path);
    this.cache.set(this.path, corpus);
    return corpus;
  }
}

/**
 * A fixed corpus, for tests and embedding.
 */
export class StaticCorpusProvider implements CorpusProvider {
  constructor(private readonly corpus: Corpus) {}

  get(): Corpus {
    return this.corpus;
  }
}
