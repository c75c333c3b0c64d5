/**
 * Builds a typed Corpus from raw knowledge-base text.
 *
 * Parsing happens once per load; lookups afterwards go through the
 * label index instead of re-scanning the text for every query.
 */

import type { Corpus, Section } from './types.js';

/** Token that opens a section header line. */
export const SECTION_MARKER = 'SECTION ';

/**
 * Whether a line opens a new section.
 */
export function isSectionHeader(line: string): boolean {
  return line.startsWith(SECTION_MARKER);
}

/**
 * Derive the lookup label from a header line.
 *
 * `SECTION 4: Stages` → `SECTION 4`; without a colon the first two words
 * are used (`SECTION 4 Stages` → `SECTION 4`).
 */
export function sectionLabel(header: string): string {
  const colon = header.indexOf(':');
  if (colon !== -1) {
    return header.slice(0, colon).trim();
  }
  const words = header.trim().split(/\s+/);
  return words.slice(0, 2).join(' ');
}

/**
 * Parse raw text into sections.
 *
 * A repeated label replaces the earlier section's content but keeps its
 * position, so iteration order is order of first appearance.
 */
export function parseCorpus(raw: string): Corpus {
  const byLabel = new Map<string, Section>();
  const preamble: string[] = [];
  let current: { label: string; header: string; lines: string[] } | null = null;

  const flush = () => {
    if (!current) return;
    byLabel.set(current.label, {
      label: current.label,
      header: current.header,
      lines: current.lines,
      text: [current.header, ...current.lines].join('\n'),
    });
  };

  for (const line of raw.split(/\r?\n/)) {
    if (isSectionHeader(line)) {
      flush();
      current = { label: sectionLabel(line), header: line, lines: [] };
    } else if (current) {
      current.lines.push(line);
    } else {
      preamble.push(line);
    }
  }
  flush();

  return Object.freeze({
    raw,
    sections: Object.freeze([...byLabel.values()]),
    preamble: Object.freeze(preamble),
  });
}

/** A corpus with no content. */
export const EMPTY_CORPUS: Corpus = parseCorpus('');

export function isEmptyCorpus(corpus: Corpus): boolean {
  return corpus.raw.trim().length === 0;
}

/**
 * Exact lookup by label.
 */
export function getSection(corpus: Corpus, label: string): Section | undefined {
  return corpus.sections.find((section) => section.label === label);
}
