/**
 * Answer pipeline.
 *
 * Composes the pieces for one user interaction:
 *
 *   validate → corpus check → quick reply → rate limit → cache
 *     → context selection → prompt → retry(model fallback) → record
 *
 * Everything the pipeline touches (session, corpus, backend, stores,
 * analytics) is injected, so one instance serves one session.
 */

import { createHash } from 'node:crypto';
import { checkQuestion, type QuestionCheck } from './input-validation.js';
import { buildEmailMessages, buildQuestionMessages } from './prompts.js';
import type { AppConfig, Language } from '../config/app-config.js';
import { corpusFingerprint, type CorpusProvider } from '../corpus/corpus-loader.js';
import { isEmptyCorpus } from '../corpus/corpus-parser.js';
import type { Corpus } from '../corpus/types.js';
import type { ConversationStore } from '../history/conversation-store.js';
import type { EmailRecord, EmailStore } from '../history/email-store.js';
import { getText, type TextKey } from '../i18n/locales.js';
import type { InvokeResult, ModelInvoker } from '../llm/model-invoker.js';
import { withRetry, type RetryOptions } from '../llm/retry.js';
import type { ChatMessage } from '../llm/types.js';
import { matchQuickReply, type QuickIntent } from '../retrieval/quick-reply.js';
import { selectContext, type SelectionTier } from '../retrieval/context-selector.js';
import type { SessionContext } from '../session/session-context.js';
import { trackEvent, type AnalyticsEventName } from '../storage/analytics-store.js';
import {
  EmptyDocumentsError,
  errorMessage,
  isBackendExhausted,
  isPreconditionError,
  type AttemptRecord,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('assistant');

/** Context budget for question answering, in characters. */
export const QA_CONTEXT_CHARS = 4000;

/** Context budget for email drafting, in characters. */
export const EMAIL_CONTEXT_CHARS = 3000;

/** Prior exchanges sent with each question. */
export const HISTORY_TURNS = 3;

export type AnalyticsTracker = (
  event: AnalyticsEventName,
  sessionId: string,
  data: Record<string, unknown>,
) => void;

export interface AnswerOrchestratorDeps {
  config: Pick<
    AppConfig,
    'models' | 'qaTemperature' | 'emailTemperature' | 'maxQuestionLength' | 'maxRetries' | 'retryBaseDelayMs'
  >;
  session: SessionContext;
  corpus: CorpusProvider;
  invoker: ModelInvoker;
  conversations: ConversationStore;
  emails: EmailStore;
  /** Defaults to the SQLite analytics store */
  track?: AnalyticsTracker;
  /** Replaceable wait between retries */
  sleep?: RetryOptions['sleep'];
}

export interface AskRequest {
  question: string;
  language: Language;
}

export type AnswerResult =
  | { kind: 'invalid'; code: Exclude<QuestionCheck, { ok: true }>['code']; message: string }
  | { kind: 'quick-reply'; intent: QuickIntent; answer: string; persisted: boolean }
  | { kind: 'rate-limited'; message: string }
  | {
      kind: 'answer';
      answer: string;
      /** Null for answers served from the cache */
      model: string | null;
      cached: boolean;
      persisted: boolean;
      tier: SelectionTier | null;
    }
  | { kind: 'failed'; message: string; attempts: AttemptRecord[] };

export interface EmailRequest {
  emailType: string;
  language: Language;
}

export type EmailResult =
  | { kind: 'email'; record: EmailRecord; model: string; persisted: boolean }
  | { kind: 'rate-limited'; message: string }
  | { kind: 'failed'; message: string; attempts: AttemptRecord[] };

const INVALID_TEXT: Record<Exclude<QuestionCheck, { ok: true }>['code'], TextKey> = {
  QUESTION_TOO_SHORT: 'error_question_too_short',
  QUESTION_TOO_LONG: 'error_question_too_long',
  SPAM_PATTERN: 'error_spam',
};

/**
 * Cache key for an answer: identical question, language and corpus content.
 */
export function answerCacheKey(language: Language, question: string, corpus: Corpus): string {
  return createHash('sha256')
    .update(`${language}\n${question}\n${corpusFingerprint(corpus)}`)
    .digest('hex');
}

export class AnswerOrchestrator {
  private readonly track: AnalyticsTracker;

  constructor(private readonly deps: AnswerOrchestratorDeps) {
    this.track = deps.track ?? trackEvent;
  }

  get sessionId(): string {
    return this.deps.session.sessionId;
  }

  async answerQuestion(request: AskRequest): Promise<AnswerResult> {
    const { session, conversations, config } = this.deps;
    const { language } = request;

    const corpus = this.deps.corpus.get();
    if (isEmptyCorpus(corpus)) {
      throw new EmptyDocumentsError();
    }

    // Greetings such as "hi" are shorter than the minimum question length
    const quick = matchQuickReply(request.question, language);
    if (quick) {
      this.touchSession();
      const { persisted } = conversations.append(request.question.trim(), quick.reply);
      this.track('quick_reply', session.sessionId, { intent: quick.intent, language });
      return { kind: 'quick-reply', intent: quick.intent, answer: quick.reply, persisted };
    }

    const check = checkQuestion(request.question, config.maxQuestionLength);
    if (!check.ok) {
      this.track('invalid_question', session.sessionId, { code: check.code });
      return { kind: 'invalid', code: check.code, message: getText(language, INVALID_TEXT[check.code]) };
    }
    const question = check.question;

    this.touchSession();

    if (!session.rateLimiter.allow(session.sessionId)) {
      this.track('rate_limited', session.sessionId, { operation: 'question' });
      return { kind: 'rate-limited', message: getText(language, 'rate_limit') };
    }

    // Prior turns change the prompt, so only a fresh conversation can reuse an answer
    const cacheable = conversations.activeTurns.length === 0;
    const cacheKey = answerCacheKey(language, question, corpus);
    if (cacheable) {
      const hit = session.answerCache.get(cacheKey);
      if (hit !== undefined) {
        const { persisted } = conversations.append(question, hit);
        this.track('question_answered', session.sessionId, { cached: true, language });
        return { kind: 'answer', answer: hit, model: null, cached: true, persisted, tier: null };
      }
    }

    const selection = selectContext(corpus, question, QA_CONTEXT_CHARS);
    log.debug('Context selected', {
      tier: selection.tier,
      labels: selection.includedLabels,
      chars: selection.text.length,
    });

    const notFound = getText(language, 'not_found');
    const messages = buildQuestionMessages({
      language,
      notFound,
      history: conversations.recentMessages(HISTORY_TURNS),
      context: selection.text,
      question,
    });

    const outcome = await this.invoke('answer question', messages, config.qaTemperature);
    if (!outcome.ok) {
      this.track('answer_failed', session.sessionId, { attempts: outcome.attempts.length });
      return { kind: 'failed', message: getText(language, 'error_backend'), attempts: outcome.attempts };
    }

    const answer = outcome.result.text || notFound;
    const { persisted } = conversations.append(question, answer);
    session.answerCache.set(cacheKey, answer);
    this.track('question_answered', session.sessionId, {
      cached: false,
      language,
      model: outcome.result.model,
      tier: selection.tier,
    });

    return {
      kind: 'answer',
      answer,
      model: outcome.result.model,
      cached: false,
      persisted,
      tier: selection.tier,
    };
  }

  async generateEmail(request: EmailRequest): Promise<EmailResult> {
    const { session, config, emails } = this.deps;
    const { language, emailType } = request;

    this.touchSession();

    if (!session.rateLimiter.allow(session.sessionId)) {
      this.track('rate_limited', session.sessionId, { operation: 'email' });
      return { kind: 'rate-limited', message: getText(language, 'rate_limit') };
    }

    const corpus = this.deps.corpus.get();
    const context = isEmptyCorpus(corpus)
      ? null
      : selectContext(corpus, emailType, EMAIL_CONTEXT_CHARS).text;
    if (context === null) {
      log.warn('Drafting email without document context');
    }

    const outcome = await this.invoke(
      'generate email',
      buildEmailMessages(language, emailType, context),
      config.emailTemperature,
    );
    if (!outcome.ok) {
      this.track('email_failed', session.sessionId, { attempts: outcome.attempts.length });
      return { kind: 'failed', message: getText(language, 'error_backend'), attempts: outcome.attempts };
    }

    const { record, persisted } = emails.append(emailType, outcome.result.text);
    this.track('email_generated', session.sessionId, { emailType, model: outcome.result.model });
    return { kind: 'email', record, model: outcome.result.model, persisted };
  }

  /**
   * Switch the conversation store to a fresh conversation.
   */
  startNewConversation(): string {
    const id = this.deps.conversations.startNewConversation();
    this.track('conversation_started', this.deps.session.sessionId, { conversationId: id });
    return id;
  }

  private touchSession(): void {
    if (this.deps.session.touch()) {
      this.deps.conversations.startNewConversation();
    }
  }

  /**
   * Model fallback wrapped in retry. Exhaustion becomes a result; missing
   * prerequisites propagate without retry.
   */
  private async invoke(
    operation: string,
    messages: ChatMessage[],
    temperature: number,
  ): Promise<{ ok: true; result: InvokeResult } | { ok: false; attempts: AttemptRecord[] }> {
    const { config, invoker } = this.deps;
    const attempts: AttemptRecord[] = [];

    try {
      const result = await withRetry(
        operation,
        async () => {
          try {
            const invoked = await invoker.invoke({ models: config.models, temperature, messages });
            attempts.push(...invoked.attempts);
            return invoked;
          } catch (error) {
            if (isBackendExhausted(error)) {
              attempts.push(...error.attempts);
            }
            throw error;
          }
        },
        {
          maxAttempts: config.maxRetries,
          baseDelayMs: config.retryBaseDelayMs,
          retryOn: (error) => !isPreconditionError(error),
          sleep: this.deps.sleep,
        },
      );
      return { ok: true, result };
    } catch (error) {
      if (isBackendExhausted(error)) {
        log.error(`Could not ${operation}`, { error: errorMessage(error), attempts: attempts.length });
        return { ok: false, attempts };
      }
      throw error;
    }
  }
}
