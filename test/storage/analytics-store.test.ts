/**
 * Tests for usage analytics.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3-multiple-ciphers';
import { createTestDb, setupTestDb, teardownTestDb } from './test-utils.js';
import {
  MAX_EVENTS,
  clearAnalytics,
  getAnalyticsSummary,
  getRecentEvents,
  trackEvent,
} from '../../src/storage/analytics-store.js';

describe('analytics-store', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
    setupTestDb(db);
  });

  afterEach(() => {
    teardownTestDb(db);
  });

  it('records events with their data', () => {
    trackEvent('question_answered', 's1', { cached: false, language: 'EN' }, new Date('2024-06-01T10:00:00Z'));

    expect(getRecentEvents()).toEqual([
      {
        timestamp: '2024-06-01T10:00:00.000Z',
        event: 'question_answered',
        data: { cached: false, language: 'EN' },
        sessionId: 's1',
      },
    ]);
  });

  it('lists newest first with a limit', () => {
    trackEvent('quick_reply', 's1');
    trackEvent('rate_limited', 's1');
    trackEvent('email_generated', 's2');

    expect(getRecentEvents(2).map((e) => e.event)).toEqual(['email_generated', 'rate_limited']);
  });

  it('keeps only the newest events', () => {
    const insert = db.prepare(
      `INSERT INTO analytics_events (timestamp, event, data, session_id) VALUES ('t', 'quick_reply', '{}', 'old')`,
    );
    db.transaction(() => {
      for (let i = 0; i < MAX_EVENTS; i++) insert.run();
    })();

    trackEvent('answer_failed', 'new');

    expect(db.prepare('SELECT COUNT(*) FROM analytics_events').pluck().get()).toBe(MAX_EVENTS);
    expect(getRecentEvents(1)[0]?.event).toBe('answer_failed');
  });

  it('summarizes by event and session', () => {
    trackEvent('question_answered', 's1', {}, new Date('2024-06-01T10:00:00Z'));
    trackEvent('question_answered', 's2', {}, new Date('2024-06-02T10:00:00Z'));
    trackEvent('quick_reply', 's1', {}, new Date('2024-06-03T10:00:00Z'));

    expect(getAnalyticsSummary()).toEqual({
      totalEvents: 3,
      byEvent: { question_answered: 2, quick_reply: 1 },
      sessions: 2,
      firstEventAt: '2024-06-01T10:00:00.000Z',
      lastEventAt: '2024-06-03T10:00:00.000Z',
    });
  });

  it('summarizes an empty table', () => {
    expect(getAnalyticsSummary()).toEqual({
      totalEvents: 0,
      byEvent: {},
      sessions: 0,
      firstEventAt: null,
      lastEventAt: null,
    });
  });

  it('does not throw when the database fails', () => {
    db.exec('DROP TABLE analytics_events');

    expect(() => trackEvent('quick_reply', 's1')).not.toThrow();
  });

  it('clears all events', () => {
    trackEvent('quick_reply', 's1');
    clearAnalytics();

    expect(getRecentEvents()).toEqual([]);
  });
});
