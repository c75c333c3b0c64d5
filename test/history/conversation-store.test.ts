/**
 * Tests for the threaded chat history.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  ConversationStore,
  formatConversationId,
  legacyConversationId,
} from '../../src/history/conversation-store.js';

describe('conversation ids', () => {
  it('formats local time as YYYYMMDD_HHMMSS', () => {
    expect(formatConversationId(new Date(2024, 2, 5, 14, 7, 9))).toBe('20240305_140709');
  });

  it('derives legacy ids from the timestamp prefix', () => {
    expect(legacyConversationId('2024-03-05T14:07:33.120Z')).toBe('20240305T1407');
  });
});

describe('ConversationStore', () => {
  let dir: string;
  let path: string;
  let now: Date;
  const clock = () => now;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'unihelp-history-'));
    path = join(dir, 'chat.json');
    now = new Date(2024, 2, 5, 14, 7, 9);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('starts empty when the file is missing', () => {
    const store = new ConversationStore({ path, now: clock });

    expect(store.load()).toEqual([]);
    expect(store.activeConversationId).toBe('20240305_140709');
  });

  it('starts empty when the file is corrupt', () => {
    writeFileSync(path, '[{"question": ');
    const store = new ConversationStore({ path, now: clock });

    expect(store.load()).toEqual([]);
  });

  it('appends to both the log and the active view and persists', () => {
    const store = new ConversationStore({ path, now: clock });
    store.load();

    const { turn, persisted } = store.append('Q1', 'A1');

    expect(persisted).toBe(true);
    expect(turn.conversationId).toBe('20240305_140709');
    expect(store.turns).toHaveLength(1);
    expect(store.activeTurns).toHaveLength(1);

    const written: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    expect(written).toEqual([
      { timestamp: now.toISOString(), conversation_id: '20240305_140709', question: 'Q1', answer: 'A1' },
    ]);
  });

  it('keeps the turn in memory when the write fails', () => {
    const blocker = join(dir, 'not-a-dir');
    writeFileSync(blocker, 'x');
    const store = new ConversationStore({ path: join(blocker, 'chat.json'), now: clock });

    const { persisted } = store.append('Q', 'A');

    expect(persisted).toBe(false);
    expect(store.turns).toHaveLength(1);
  });

  it('assigns legacy ids and skips malformed records on load', () => {
    writeFileSync(
      path,
      JSON.stringify([
        { timestamp: '2024-01-10T09:30:00.000Z', question: 'old', answer: 'a' },
        { question: 42 },
        { timestamp: '2024-01-11T10:00:00.000Z', conversation_id: 'c1', question: 'q', answer: 'a' },
      ]),
    );
    const store = new ConversationStore({ path, now: clock });

    const turns = store.load();

    expect(turns.map((t) => t.conversationId)).toEqual(['20240110T0930', 'c1']);
    expect(store.activeTurns).toEqual([]);
  });

  it('reloads turns of the active conversation into the view', () => {
    const first = new ConversationStore({ path, now: clock });
    first.append('Q1', 'A1');

    const second = new ConversationStore({ path, now: clock });
    second.load();

    expect(second.activeTurns.map((t) => t.question)).toEqual(['Q1']);
  });

  it('starts a new conversation without touching the log', () => {
    const store = new ConversationStore({ path, now: clock });
    store.append('Q1', 'A1');

    now = new Date(2024, 2, 5, 15, 0, 0);
    const id = store.startNewConversation();

    expect(id).toBe('20240305_150000');
    expect(store.activeTurns).toEqual([]);
    expect(store.turns).toHaveLength(1);
  });

  it('suffixes ids that are already taken', () => {
    const store = new ConversationStore({ path, now: clock });
    store.append('Q1', 'A1');

    expect(store.startNewConversation()).toBe('20240305_140709_2');
    expect(store.startNewConversation()).toBe('20240305_140709_3');
  });

  it('deletes one conversation and reports the count', () => {
    const store = new ConversationStore({ path, now: clock });
    store.append('Q1', 'A1');
    store.append('Q2', 'A2');
    now = new Date(2024, 2, 5, 16, 0, 0);
    store.startNewConversation();
    store.append('Q3', 'A3');

    expect(store.deleteConversation('20240305_140709')).toBe(2);
    expect(store.deleteConversation('missing')).toBe(0);
    expect(store.turns.map((t) => t.question)).toEqual(['Q3']);
    expect(store.activeTurns.map((t) => t.question)).toEqual(['Q3']);
  });

  it('clears the active view when the active conversation is deleted', () => {
    const store = new ConversationStore({ path, now: clock });
    store.append('Q1', 'A1');

    store.deleteConversation(store.activeConversationId);

    expect(store.activeTurns).toEqual([]);
  });

  it('clears everything', () => {
    const store = new ConversationStore({ path, now: clock });
    store.append('Q1', 'A1');

    expect(store.clearAll()).toBe(true);
    expect(store.turns).toEqual([]);
    expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual([]);
  });

  it('groups by conversation with the most recent first', () => {
    const store = new ConversationStore({ path, now: clock });
    store.append('Q1', 'A1');
    now = new Date(2024, 2, 5, 15, 0, 0);
    store.startNewConversation();
    store.append('Q2', 'A2');

    const groups = store.groupByConversation();

    expect(groups.map((g) => g.conversationId)).toEqual(['20240305_150000', '20240305_140709']);
    expect(groups[0]?.lastActivity).toBe(now.toISOString());
    expect(store.conversationCount()).toBe(2);
  });

  it('breaks timestamp ties by log position', () => {
    const store = new ConversationStore({ path, now: clock });
    store.append('Q1', 'A1');
    store.startNewConversation();
    store.append('Q2', 'A2');

    expect(store.groupByConversation().map((g) => g.conversationId)).toEqual([
      '20240305_140709_2',
      '20240305_140709',
    ]);
  });

  it('returns the most recent turns as chat messages', () => {
    const store = new ConversationStore({ path, now: clock });
    for (let i = 1; i <= 4; i++) {
      store.append(`Q${i}`, `A${i}`);
    }

    expect(store.recentMessages(2)).toEqual([
      { role: 'user', content: 'Q3' },
      { role: 'assistant', content: 'A3' },
      { role: 'user', content: 'Q4' },
      { role: 'assistant', content: 'A4' },
    ]);
    expect(store.recentMessages(0)).toEqual([]);
    expect(store.recentMessages()).toHaveLength(6);
  });
});
