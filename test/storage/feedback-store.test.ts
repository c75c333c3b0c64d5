import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3-multiple-ciphers';
import { createTestDb, setupTestDb, teardownTestDb } from './test-utils.js';
import { getFeedbackStats, listFeedback, saveFeedback } from '../../src/storage/feedback-store.js';
import { ValidationError } from '../../src/utils/errors.js';

describe('feedback-store', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = createTestDb();
    setupTestDb(db);
  });

  afterEach(() => {
    teardownTestDb(db);
  });

  it('saves and lists feedback newest first', () => {
    saveFeedback({ sessionId: 's1', rating: 4, comment: 'useful' }, new Date('2024-06-01T10:00:00Z'));
    saveFeedback(
      { sessionId: 's2', rating: 2, comment: '', question: 'internship?' },
      new Date('2024-06-02T10:00:00Z'),
    );

    expect(listFeedback()).toEqual([
      { timestamp: '2024-06-02T10:00:00.000Z', sessionId: 's2', rating: 2, comment: '', question: 'internship?' },
      { timestamp: '2024-06-01T10:00:00.000Z', sessionId: 's1', rating: 4, comment: 'useful', question: null },
    ]);
  });

  it('rejects ratings outside 1..5', () => {
    expect(() => saveFeedback({ sessionId: 's', rating: 0, comment: '' })).toThrow(ValidationError);
    expect(() => saveFeedback({ sessionId: 's', rating: 3.5, comment: '' })).toThrow(
      'Rating must be an integer from 1 to 5',
    );
  });

  it('reports count and average', () => {
    expect(getFeedbackStats()).toEqual({ count: 0, averageRating: null });

    saveFeedback({ sessionId: 's', rating: 5, comment: '' });
    saveFeedback({ sessionId: 's', rating: 2, comment: '' });

    expect(getFeedbackStats()).toEqual({ count: 2, averageRating: 3.5 });
  });
});
