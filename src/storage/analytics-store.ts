/**
 * Usage events. Only the most recent MAX_EVENTS are kept.
 */

import { z } from 'zod';
import { getDb } from './db.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('analytics');

export const MAX_EVENTS = 1000;

export type AnalyticsEventName =
  | 'question_answered'
  | 'quick_reply'
  | 'invalid_question'
  | 'rate_limited'
  | 'answer_failed'
  | 'email_generated'
  | 'email_failed'
  | 'conversation_started'
  | 'feedback_submitted';

export interface AnalyticsEvent {
  timestamp: string;
  event: string;
  data: Record<string, unknown>;
  sessionId: string;
}

export interface AnalyticsSummary {
  totalEvents: number;
  byEvent: Record<string, number>;
  sessions: number;
  firstEventAt: string | null;
  lastEventAt: string | null;
}

const EventRowSchema = z.object({
  timestamp: z.string(),
  event: z.string(),
  data: z.string(),
  session_id: z.string(),
});

const CountRowSchema = z.object({ event: z.string(), count: z.number() });

const TotalsRowSchema = z.object({
  total: z.number(),
  sessions: z.number(),
  first: z.string().nullable(),
  last: z.string().nullable(),
});

function parseData(json: string): Record<string, unknown> {
  const parsed = z.record(z.unknown()).safeParse(JSON.parse(json));
  return parsed.success ? parsed.data : {};
}

/**
 * Record an event. Failures are logged and never reach the caller.
 */
export function trackEvent(
  event: AnalyticsEventName,
  sessionId: string,
  data: Record<string, unknown> = {},
  now: Date = new Date(),
): void {
  try {
    const db = getDb();
    db.prepare(
      `INSERT INTO analytics_events (timestamp, event, data, session_id) VALUES (?, ?, ?, ?)`,
    ).run(now.toISOString(), event, JSON.stringify(data), sessionId);

    // Keep the newest MAX_EVENTS rows
    db.prepare(
      `DELETE FROM analytics_events WHERE id NOT IN (
         SELECT id FROM analytics_events ORDER BY id DESC LIMIT ?
       )`,
    ).run(MAX_EVENTS);

    log.debug(`Analytics tracked: ${event}`);
  } catch (error) {
    log.error('Analytics tracking failed', { event, error: errorMessage(error) });
  }
}

/**
 * Most recent events, newest first.
 */
export function getRecentEvents(limit = 50): AnalyticsEvent[] {
  const rows = getDb()
    .prepare(
      `SELECT timestamp, event, data, session_id FROM analytics_events ORDER BY id DESC LIMIT ?`,
    )
    .all(limit);

  return z
    .array(EventRowSchema)
    .parse(rows)
    .map((row) => ({
      timestamp: row.timestamp,
      event: row.event,
      data: parseData(row.data),
      sessionId: row.session_id,
    }));
}

export function getAnalyticsSummary(): AnalyticsSummary {
  const db = getDb();

  const totals = TotalsRowSchema.parse(
    db
      .prepare(
        `SELECT COUNT(*) AS total, COUNT(DISTINCT session_id) AS sessions,
                MIN(timestamp) AS first, MAX(timestamp) AS last
         FROM analytics_events`,
      )
      .get(),
  );

  const counts = z
    .array(CountRowSchema)
    .parse(
      db
        .prepare(
          `SELECT event, COUNT(*) AS count FROM analytics_events GROUP BY event ORDER BY event`,
        )
        .all(),
    );

  return {
    totalEvents: totals.total,
    byEvent: Object.fromEntries(counts.map((row) => [row.event, row.count])),
    sessions: totals.sessions,
    firstEventAt: totals.first,
    lastEventAt: totals.last,
  };
}

export function clearAnalytics(): void {
  getDb().prepare('DELETE FROM analytics_events').run();
}
