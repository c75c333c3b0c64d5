/**
 * Fast path for greetings and thanks.
 *
 * Runs before rate limiting, caching or any backend call so that
 * non-informational turns cost nothing. Pure: no I/O, no state.
 */

import type { Language } from '../config/app-config.js';

export type QuickIntent = 'greeting' | 'thanks';

export interface QuickReply {
  intent: QuickIntent;
  reply: string;
}

const GREETINGS: ReadonlySet<string> = new Set([
  'salut',
  'bonjour',
  'bonsoir',
  'hello',
  'hi',
  'hey',
  'salam',
  'slm',
  'aslema',
  'asslema',
  'ahla',
  'marhba',
  'mar7ba',
]);

// Multi-word entries can only match the whole message
const THANKS: ReadonlySet<string> = new Set([
  'merci',
  'thanks',
  'thank you',
  'chokran',
  'choukrane',
  'bravo',
]);

const REPLIES: Record<QuickIntent, Record<Language, string>> = {
  greeting: {
    FR:
      'Salut 👋 Je peux t’aider avec les infos universitaires. ' +
      "Exemples: `je veux connaître mes notes`, `comment faire l'inscription`, " +
      '`documents pour la bourse` 🙂',
    EN:
      'Hi 👋 Welcome! I can help with university info. ' +
      'Try: `I want to check my grades`, `how to enroll`, ' +
      '`scholarship documents` 🙂',
    TN:
      'Asslema 👋 Ahlan bik! Najjem n3awnek fi les infos mta3 l-jam3a. ' +
      'Exemples: `nheb na3ref noteti`, `kifech na3mel inscription`, ' +
      '`chnowa documents mta3 bourse` 🙂',
  },
  thanks: {
    FR: 'Avec plaisir 😊 Si tu veux, je peux aussi t’aider pour inscription, notes, bourse ou stage.',
    EN: "You're welcome 😊 If you want, I can also help with enrollment, grades, scholarships, or internships.",
    TN: '3la rassi 😊 Ken theb, najjem n3awnek zeda b inscription, notes, bourse, stage...',
  },
};

/**
 * Lowercase, collapse whitespace, trim.
 */
export function normalizeQuestion(question: string): string {
  return question.trim().toLowerCase().replace(/\s+/g, ' ');
}

function matches(text: string, tokens: Set<string>, vocabulary: ReadonlySet<string>): boolean {
  if (vocabulary.has(text)) return true;
  for (const token of tokens) {
    if (vocabulary.has(token)) return true;
  }
  return false;
}

/**
 * Classify a question as a greeting or thanks. Greeting wins when both apply.
 */
export function classifyQuickIntent(question: string): QuickIntent | null {
  const text = normalizeQuestion(question);
  if (!text) return null;

  const tokens = new Set(text.match(/[a-z0-9']+/g) ?? []);
  if (matches(text, tokens, GREETINGS)) return 'greeting';
  if (matches(text, tokens, THANKS)) return 'thanks';
  return null;
}

/**
 * Canned reply for a trivial turn, or null when the question needs a real answer.
 */
export function matchQuickReply(question: string, language: Language): QuickReply | null {
  const intent = classifyQuickIntent(question);
  if (!intent) return null;
  return { intent, reply: REPLIES[intent][language] };
}
