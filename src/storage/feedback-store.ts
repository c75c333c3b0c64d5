/**
 * User ratings of answers.
 */

import { z } from 'zod';
import { getDb } from './db.js';
import { ValidationError } from '../utils/errors.js';

export interface FeedbackEntry {
  timestamp: string;
  sessionId: string;
  /** 1..5 */
  rating: number;
  comment: string;
  /** The question the rating refers to, when known */
  question: string | null;
}

export interface FeedbackStats {
  count: number;
  /** Null when there is no feedback yet */
  averageRating: number | null;
}

const FeedbackRowSchema = z.object({
  timestamp: z.string(),
  session_id: z.string(),
  rating: z.number(),
  comment: z.string(),
  question: z.string().nullable(),
});

const StatsRowSchema = z.object({ count: z.number(), average: z.number().nullable() });

export function saveFeedback(
  entry: Omit<FeedbackEntry, 'timestamp' | 'question'> & { question?: string | null },
  now: Date = new Date(),
): FeedbackEntry {
  if (!Number.isInteger(entry.rating) || entry.rating < 1 || entry.rating > 5) {
    throw new ValidationError('Rating must be an integer from 1 to 5', 'INVALID_INPUT');
  }

  const saved: FeedbackEntry = {
    timestamp: now.toISOString(),
    sessionId: entry.sessionId,
    rating: entry.rating,
    comment: entry.comment,
    question: entry.question ?? null,
  };

  getDb()
    .prepare(
      `INSERT INTO feedback (timestamp, session_id, rating, comment, question) VALUES (?, ?, ?, ?, ?)`,
    )
    .run(saved.timestamp, saved.sessionId, saved.rating, saved.comment, saved.question);

  return saved;
}

/**
 * Feedback entries, newest first.
 */
export function listFeedback(limit = 100): FeedbackEntry[] {
  const rows = getDb()
    .prepare(
      `SELECT timestamp, session_id, rating, comment, question FROM feedback ORDER BY id DESC LIMIT ?`,
    )
    .all(limit);

  return z
    .array(FeedbackRowSchema)
    .parse(rows)
    .map((row) => ({
      timestamp: row.timestamp,
      sessionId: row.session_id,
      rating: row.rating,
      comment: row.comment,
      question: row.question,
    }));
}

export function getFeedbackStats(): FeedbackStats {
  const row = StatsRowSchema.parse(
    getDb().prepare('SELECT COUNT(*) AS count, AVG(rating) AS average FROM feedback').get(),
  );
  return { count: row.count, averageRating: row.average };
}
