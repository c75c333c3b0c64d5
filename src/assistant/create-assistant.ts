/**
 * Wires a runnable assistant from runtime configuration.
 */

import { AnswerOrchestrator, type AnalyticsTracker } from './answer-orchestrator.js';
import type { AppConfig } from '../config/app-config.js';
import { FileCorpusProvider, type CorpusProvider } from '../corpus/corpus-loader.js';
import { ConversationStore } from '../history/conversation-store.js';
import { EmailStore } from '../history/email-store.js';
import { AnthropicBackend } from '../llm/anthropic-backend.js';
import { ModelInvoker } from '../llm/model-invoker.js';
import type { ChatBackend } from '../llm/types.js';
import { SessionContext } from '../session/session-context.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('assistant');

export interface Assistant {
  config: AppConfig;
  session: SessionContext;
  conversations: ConversationStore;
  emails: EmailStore;
  orchestrator: AnswerOrchestrator;
}

export interface CreateAssistantOptions {
  /** Defaults to the Anthropic backend */
  backend?: ChatBackend;
  /** Defaults to the configured documents file */
  corpus?: CorpusProvider;
  track?: AnalyticsTracker;
}

export function createAssistant(config: AppConfig, options: CreateAssistantOptions = {}): Assistant {
  let backend = options.backend;
  if (!backend) {
    const anthropic = new AnthropicBackend({ maxTokens: config.maxTokens });
    if (!anthropic.hasCredentials()) {
      log.warn('ANTHROPIC_API_KEY is not set; questions needing the model will fail');
    }
    backend = anthropic;
  }

  const session = new SessionContext(config);
  const conversations = new ConversationStore({ path: config.chatHistoryPath });
  const emails = new EmailStore({ path: config.emailHistoryPath });
  conversations.load();
  emails.load();

  const orchestrator = new AnswerOrchestrator({
    config,
    session,
    corpus: options.corpus ?? new FileCorpusProvider(config.documentsPath, config.corpusReloadMs),
    invoker: new ModelInvoker(backend),
    conversations,
    emails,
    track: options.track,
  });

  log.debug('Assistant ready', { sessionId: session.sessionId, models: config.models });
  return { config, session, conversations, emails, orchestrator };
}
