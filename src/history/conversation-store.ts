/**
 * Threaded chat history.
 *
 * The full log is append-only apart from explicit deletion (one conversation
 * or everything). Starting a new conversation only switches the active id
 * and empties the active view; earlier turns stay in the log.
 */

import { z } from 'zod';
import { readJsonArray, writeJsonArray } from './json-file.js';
import type { ChatMessage } from '../llm/types.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('conversation-store');

export interface ConversationTurn {
  readonly timestamp: string;
  readonly conversationId: string;
  readonly question: string;
  readonly answer: string;
}

/** Turns sharing one conversation id, for display. */
export interface ConversationGroup {
  conversationId: string;
  /** Timestamp of the group's latest turn */
  lastActivity: string;
  turns: ConversationTurn[];
}

export interface AppendResult {
  turn: ConversationTurn;
  /** False when the turn is only in memory */
  persisted: boolean;
}

/** On-disk record. Older files have no conversation_id. */
const StoredTurnSchema = z.object({
  timestamp: z.string().optional(),
  conversation_id: z.string().optional(),
  question: z.string(),
  answer: z.string(),
});

type StoredTurn = Required<z.infer<typeof StoredTurnSchema>>;

/**
 * Conversation id for a record written before ids existed: the first 16
 * characters of its timestamp without '-' and ':' (2024-03-05T14:07 →
 * 20240305T1407). Deterministic, so repeated loads group identically.
 */
export function legacyConversationId(timestamp: string): string {
  return timestamp.slice(0, 16).replace(/[-:]/g, '');
}

const pad = (n: number) => String(n).padStart(2, '0');

/**
 * Human-legible id from local time: YYYYMMDD_HHMMSS.
 */
export function formatConversationId(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

function toStored(turn: ConversationTurn): StoredTurn {
  return {
    timestamp: turn.timestamp,
    conversation_id: turn.conversationId,
    question: turn.question,
    answer: turn.answer,
  };
}

export interface ConversationStoreOptions {
  /** JSON file holding the log */
  path: string;
  /** Clock, injectable for tests */
  now?: () => Date;
}

export class ConversationStore {
  private readonly path: string;
  private readonly now: () => Date;
  private log: ConversationTurn[] = [];
  private active: ConversationTurn[] = [];
  private activeId: string;

  constructor(options: ConversationStoreOptions) {
    this.path = options.path;
    this.now = options.now ?? (() => new Date());
    this.activeId = formatConversationId(this.now());
  }

  get activeConversationId(): string {
    return this.activeId;
  }

  /** Every turn, in creation order. */
  get turns(): readonly ConversationTurn[] {
    return this.log;
  }

  /** Turns of the active conversation shown in the current view. */
  get activeTurns(): readonly ConversationTurn[] {
    return this.active;
  }

  /**
   * Replace the in-memory log with the file contents.
   */
  load(): readonly ConversationTurn[] {
    const raw = readJsonArray(this.path);
    const turns: ConversationTurn[] = [];
    let dropped = 0;

    for (const item of raw) {
      const parsed = StoredTurnSchema.safeParse(item);
      if (!parsed.success) {
        dropped++;
        continue;
      }
      const timestamp = parsed.data.timestamp ?? this.now().toISOString();
      turns.push(
        Object.freeze({
          timestamp,
          conversationId: parsed.data.conversation_id ?? legacyConversationId(timestamp),
          question: parsed.data.question,
          answer: parsed.data.answer,
        }),
      );
    }

    if (dropped > 0) {
      log.warn('Skipped malformed history records', { path: this.path, dropped });
    }

    this.log = turns;
    this.active = turns.filter((t) => t.conversationId === this.activeId);
    return this.log;
  }

  /**
   * Write the full log. Returns false (after logging) when the write fails.
   */
  save(): boolean {
    try {
      writeJsonArray(this.path, this.log.map(toStored));
      return true;
    } catch (error) {
      log.warn('Could not save chat history', { error: errorMessage(error) });
      return false;
    }
  }

  append(question: string, answer: string): AppendResult {
    const turn: ConversationTurn = Object.freeze({
      timestamp: this.now().toISOString(),
      conversationId: this.activeId,
      question,
      answer,
    });

    this.active.push(turn);
    this.log.push(turn);
    return { turn, persisted: this.save() };
  }

  /**
   * Switch to a fresh conversation id. The log is untouched.
   */
  startNewConversation(): string {
    const base = formatConversationId(this.now());
    const taken = new Set(this.log.map((t) => t.conversationId));
    taken.add(this.activeId);

    let id = base;
    for (let n = 2; taken.has(id); n++) {
      id = `${base}_${n}`;
    }

    this.activeId = id;
    this.active = [];
    log.debug('Started conversation', { conversationId: id });
    return id;
  }

  /**
   * Remove every turn of one conversation. Returns the number removed.
   */
  deleteConversation(conversationId: string): number {
    const before = this.log.length;
    this.log = this.log.filter((t) => t.conversationId !== conversationId);
    if (conversationId === this.activeId) {
      this.active = [];
    }
    this.save();
    return before - this.log.length;
  }

  /**
   * Remove every turn of every conversation.
   */
  clearAll(): boolean {
    this.log = [];
    this.active = [];
    return this.save();
  }

  /**
   * Groups ordered most recent first; turns keep their original order.
   */
  groupByConversation(): ConversationGroup[] {
    const groups = new Map<string, ConversationGroup>();
    const lastIndex = new Map<string, number>();

    this.log.forEach((turn, index) => {
      let group = groups.get(turn.conversationId);
      if (!group) {
        group = { conversationId: turn.conversationId, lastActivity: turn.timestamp, turns: [] };
        groups.set(turn.conversationId, group);
      }
      group.turns.push(turn);
      if (turn.timestamp >= group.lastActivity) {
        group.lastActivity = turn.timestamp;
      }
      lastIndex.set(turn.conversationId, index);
    });

    // Ties on timestamp fall back to log position
    return [...groups.values()].sort(
      (a, b) =>
        b.lastActivity.localeCompare(a.lastActivity) ||
        (lastIndex.get(b.conversationId) ?? 0) - (lastIndex.get(a.conversationId) ?? 0),
    );
  }

  /**
   * The last `maxTurns` exchanges of the active conversation as chat messages.
   */
  recentMessages(maxTurns = 3): ChatMessage[] {
    if (maxTurns <= 0) return [];
    return this.active.slice(-maxTurns).flatMap((turn): ChatMessage[] => [
      { role: 'user', content: turn.question },
      { role: 'assistant', content: turn.answer },
    ]);
  }

  /** Distinct conversation ids in the log. */
  conversationCount(): number {
    return new Set(this.log.map((t) => t.conversationId)).size;
  }
}
