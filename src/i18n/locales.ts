/**
 * Localized user-facing strings, read from data/locales.json.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { Language } from '../config/app-config.js';

const LOCALES_PATH = fileURLToPath(new URL('../../data/locales.json', import.meta.url));

const text = z.string().min(1);

const StringTableSchema = z.object({
  title: text,
  subtitle: text,
  email_opt_cert: text,
  email_opt_intern: text,
  email_opt_absence: text,
  email_opt_complaint: text,
  history_chat: text,
  history_email: text,
  no_history: text,
  deleted_conversation: text,
  deleted_email: text,
  cleared_history: text,
  error_api: text,
  error_docs: text,
  error_no_question: text,
  error_question_too_short: text,
  error_question_too_long: text,
  error_spam: text,
  error_backend: text,
  not_found: text,
  rate_limit: text,
  timestamp: text,
  feedback_thanks: text,
});

export type StringTable = z.infer<typeof StringTableSchema>;

export type TextKey = keyof StringTable;

const LocalesSchema = z.object({
  FR: StringTableSchema,
  EN: StringTableSchema,
  TN: StringTableSchema,
});

let cached: Record<Language, StringTable> | null = null;

/**
 * All string tables (loaded once).
 */
export function getLocales(): Record<Language, StringTable> {
  if (!cached) {
    cached = LocalesSchema.parse(JSON.parse(readFileSync(LOCALES_PATH, 'utf-8')));
  }
  return cached;
}

/**
 * Localized text for a key.
 */
export function getText(language: Language, key: TextKey): string {
  return getLocales()[language][key];
}

/**
 * Email kinds offered to the user, in display order.
 */
export function emailTypeOptions(language: Language): string[] {
  const table = getLocales()[language];
  return [table.email_opt_cert, table.email_opt_intern, table.email_opt_absence, table.email_opt_complaint];
}
