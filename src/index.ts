/**
 * UniHelp
 *
 * Document-grounded university assistant: rule-based context selection over
 * a sectioned knowledge base, multi-model invocation with retry, and
 * threaded conversation history.
 *
 * @packageDocumentation
 */

// Configuration
export * from './config/app-config.js';
export {
  loadConfig,
  toRuntimeConfig,
  validateExternalConfig,
  type ExternalConfig,
  type LoadConfigOptions,
} from './config/loader.js';

// Corpus
export type { Corpus, Section, TopicMap, TopicRule } from './corpus/types.js';
export { parseCorpus, getSection, isEmptyCorpus, EMPTY_CORPUS } from './corpus/corpus-parser.js';
export {
  loadCorpus,
  corpusFingerprint,
  FileCorpusProvider,
  StaticCorpusProvider,
  type CorpusProvider,
} from './corpus/corpus-loader.js';
export { getTopicMap, parseTopicMap } from './corpus/topic-map.js';

// Retrieval
export * from './retrieval/context-selector.js';
export * from './retrieval/quick-reply.js';

// LLM
export type { ChatBackend, ChatMessage, ChatRole, CompletionRequest } from './llm/types.js';
export { AnthropicBackend, type AnthropicBackendOptions } from './llm/anthropic-backend.js';
export { ModelInvoker, type InvokeRequest, type InvokeResult } from './llm/model-invoker.js';
export { withRetry, calculateBackoff, totalBackoffMs, type RetryOptions } from './llm/retry.js';

// Session
export { RateLimiter } from './session/rate-limiter.js';
export { TtlCache } from './session/ttl-cache.js';
export { SessionContext, generateSessionId } from './session/session-context.js';

// History
export * from './history/conversation-store.js';
export * from './history/email-store.js';

// Assistant
export * from './assistant/answer-orchestrator.js';
export { createAssistant, type Assistant, type CreateAssistantOptions } from './assistant/create-assistant.js';
export { checkQuestion, validateQuestion, sanitizeText } from './assistant/input-validation.js';

// Export
export * from './export/email-export.js';

// i18n
export { getText, emailTypeOptions, type TextKey } from './i18n/locales.js';

// Server
export { createApp, startServer } from './server/server.js';
export type { ServerDeps } from './server/types.js';

// Utils
export * from './utils/errors.js';
export { createLogger, setLogLevel, getLogLevel, setJsonMode, setLogFile, type Logger, type LogLevel } from './utils/logger.js';
