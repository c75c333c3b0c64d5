/**
 * Whole-file JSON array persistence for the history logs.
 *
 * Reads never throw: a missing, unreadable or corrupt file is treated as an
 * empty list so startup cannot fail on bad history. Writes throw
 * PersistenceError for the caller to downgrade to a warning.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { PersistenceError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('json-file');

export function readJsonArray(path: string): unknown[] {
  if (!existsSync(path)) {
    return [];
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    if (Array.isArray(parsed)) {
      return parsed;
    }
    log.warn('History file does not hold a list, starting empty', { path });
    return [];
  } catch (error) {
    log.warn('History file unreadable, starting empty', { path, error: errorMessage(error) });
    return [];
  }
}

/**
 * Write the array pretty-printed, via a temp file and rename so a crash
 * mid-write leaves the previous file intact.
 */
export function writeJsonArray(path: string, items: readonly unknown[]): void {
  try {
    mkdirSync(dirname(path), { recursive: true });
    const tmpPath = `${path}.tmp`;
    writeFileSync(tmpPath, JSON.stringify(items, null, 2), 'utf-8');
    renameSync(tmpPath, path);
  } catch (error) {
    throw new PersistenceError(`Could not write ${path}`, 'HISTORY_WRITE_FAILED', error);
  }
}
