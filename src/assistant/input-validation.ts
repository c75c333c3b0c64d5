/**
 * Checks applied to user text before it reaches the pipeline.
 */

import { ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('input-validation');

export const MIN_QUESTION_LENGTH = 3;

/** The same character 11 or more times in a row. */
const REPEATED_CHARS = /(.)\1{10,}/;

/** Characters stripped from free-text fields such as feedback comments. */
const UNSAFE_CHARS = /[<>{}()[\]\\]/g;

export type QuestionCheck =
  | { ok: true; question: string }
  | { ok: false; code: 'QUESTION_TOO_SHORT' | 'QUESTION_TOO_LONG' | 'SPAM_PATTERN' };

/**
 * Validate a question. On success the trimmed question is returned.
 */
export function checkQuestion(question: string, maxLength: number): QuestionCheck {
  const trimmed = question.trim();
  if (trimmed.length < MIN_QUESTION_LENGTH) {
    return { ok: false, code: 'QUESTION_TOO_SHORT' };
  }
  if (question.length > maxLength) {
    return { ok: false, code: 'QUESTION_TOO_LONG' };
  }
  if (REPEATED_CHARS.test(question)) {
    return { ok: false, code: 'SPAM_PATTERN' };
  }
  return { ok: true, question: trimmed };
}

/**
 * Throwing form of checkQuestion for callers without a result channel.
 */
export function validateQuestion(question: string, maxLength: number): string {
  const check = checkQuestion(question, maxLength);
  if (!check.ok) {
    throw new ValidationError(`Question rejected: ${check.code}`, check.code);
  }
  return check.question;
}

/**
 * Strip markup-like characters and cap the length of a free-text field.
 */
export function sanitizeText(text: string, maxLength?: number): string {
  let cleaned = text.replace(UNSAFE_CHARS, '');
  if (maxLength !== undefined && cleaned.length > maxLength) {
    cleaned = cleaned.slice(0, maxLength);
    log.info(`Input truncated to ${maxLength} chars`);
  }
  return cleaned.trim();
}
