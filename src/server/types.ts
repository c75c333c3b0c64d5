import type { AnswerOrchestrator } from '../assistant/answer-orchestrator.js';
import type { Language } from '../config/app-config.js';
import type { ConversationStore } from '../history/conversation-store.js';
import type { EmailStore } from '../history/email-store.js';

/** What the HTTP layer needs from the running assistant. */
export interface ServerDeps {
  assistant: AnswerOrchestrator;
  conversations: ConversationStore;
  emails: EmailStore;
  /** Used when a request names no language */
  defaultLanguage: Language;
}
