/**
 * Generated email drafts, persisted as a JSON array next to the chat log.
 */

import { z } from 'zod';
import { readJsonArray, writeJsonArray } from './json-file.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('email-store');

export interface EmailRecord {
  readonly timestamp: string;
  /** Free-text email kind the user asked for */
  readonly type: string;
  readonly content: string;
}

const EmailRecordSchema = z.object({
  timestamp: z.string(),
  type: z.string(),
  content: z.string(),
});

export interface EmailStoreOptions {
  path: string;
  now?: () => Date;
}

export class EmailStore {
  private readonly path: string;
  private readonly now: () => Date;
  private records: EmailRecord[] = [];

  constructor(options: EmailStoreOptions) {
    this.path = options.path;
    this.now = options.now ?? (() => new Date());
  }

  load(): readonly EmailRecord[] {
    const records: EmailRecord[] = [];
    for (const item of readJsonArray(this.path)) {
      const parsed = EmailRecordSchema.safeParse(item);
      if (parsed.success) {
        records.push(Object.freeze(parsed.data));
      }
    }
    this.records = records;
    return this.records;
  }

  list(): readonly EmailRecord[] {
    return this.records;
  }

  get(index: number): EmailRecord | undefined {
    return Number.isInteger(index) ? this.records[index] : undefined;
  }

  append(type: string, content: string): { record: EmailRecord; persisted: boolean } {
    const record: EmailRecord = Object.freeze({
      timestamp: this.now().toISOString(),
      type,
      content,
    });
    this.records.push(record);
    return { record, persisted: this.save() };
  }

  /**
   * Remove the record at `index`. Out-of-range indexes change nothing.
   */
  deleteAt(index: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this.records.length) {
      return false;
    }
    this.records.splice(index, 1);
    this.save();
    return true;
  }

  clear(): boolean {
    this.records = [];
    return this.save();
  }

  private save(): boolean {
    try {
      writeJsonArray(this.path, this.records);
      return true;
    } catch (error) {
      log.warn('Could not save email history', { error: errorMessage(error) });
      return false;
    }
  }
}
