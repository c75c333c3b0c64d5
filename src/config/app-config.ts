/**
 * Runtime configuration for the assistant.
 *
 * Durations are held in milliseconds and paths are fully resolved; the
 * user-facing file/env format lives in loader.ts.
 */

/** Languages with a persona, canned replies and a string table. */
export type Language = 'FR' | 'EN' | 'TN';

export const LANGUAGES: readonly Language[] = ['FR', 'EN', 'TN'];

export const DEFAULT_LANGUAGE: Language = 'FR';

/**
 * Narrow an arbitrary string (query param, CLI flag) to a Language.
 */
export function parseLanguage(value: string | undefined): Language | undefined {
  if (value === undefined) return undefined;
  const upper = value.toUpperCase();
  return LANGUAGES.find((lang) => lang === upper);
}

/**
 * Complete runtime configuration.
 */
export interface AppConfig {
  // Backend
  /** Candidate models, tried in order */
  models: string[];
  /** Sampling temperature for question answering */
  qaTemperature: number;
  /** Sampling temperature for email drafting */
  emailTemperature: number;
  /** Upper bound on generated tokens per request */
  maxTokens: number;

  // Corpus
  /** Knowledge base file */
  documentsPath: string;
  /** How long a loaded corpus is reused before the file is read again */
  corpusReloadMs: number;

  // Storage
  chatHistoryPath: string;
  emailHistoryPath: string;
  /** SQLite database for analytics and feedback */
  dbPath: string;

  // Limits
  maxQuestionLength: number;

  // Session
  rateLimitRequests: number;
  rateLimitWindowMs: number;
  cacheTtlMs: number;
  sessionTimeoutMs: number;

  // Retry
  maxRetries: number;
  retryBaseDelayMs: number;

  // Server
  port: number;
}

export const DEFAULT_CONFIG: AppConfig = {
  models: ['claude-3-haiku-20240307', 'claude-3-5-sonnet-20241022'],
  qaTemperature: 0.2,
  emailTemperature: 0.3,
  maxTokens: 1024,

  documentsPath: 'documents.txt',
  corpusReloadMs: 5 * 60 * 1000,

  chatHistoryPath: '.unihelp_chat_history.json',
  emailHistoryPath: '.unihelp_email_history.json',
  dbPath: '~/.unihelp/unihelp.db',

  maxQuestionLength: 500,

  rateLimitRequests: 10,
  rateLimitWindowMs: 60 * 1000,
  cacheTtlMs: 3600 * 1000,
  sessionTimeoutMs: 30 * 60 * 1000,

  maxRetries: 3,
  retryBaseDelayMs: 2000,

  port: 8787,
};

/**
 * Get configuration with overrides applied.
 */
export function getConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

/**
 * Resolve ~ to home directory in paths.
 */
export function resolvePath(path: string): string {
  if (path.startsWith('~')) {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
    return path.replace('~', home);
  }
  return path;
}
