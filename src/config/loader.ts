/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (passed directly)
 * 2. Environment variables (UNIHELP_*)
 * 3. Project config file (./unihelp.config.json)
 * 4. User config file (~/.unihelp/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { resolvePath, DEFAULT_CONFIG, type AppConfig } from './app-config.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const log = createLogger('config-loader');

const section = <T extends z.ZodRawShape>(shape: T) => z.object(shape).partial().optional();

/**
 * External config file structure. Unknown keys are dropped on parse.
 */
export const ExternalConfigSchema = z.object({
  llm: section({
    models: z.array(z.string().min(1)),
    qaTemperature: z.number(),
    emailTemperature: z.number(),
    maxTokens: z.number().int(),
  }),
  corpus: section({
    path: z.string(),
    reloadSeconds: z.number(),
  }),
  storage: section({
    chatHistoryPath: z.string(),
    emailHistoryPath: z.string(),
    dbPath: z.string(),
  }),
  limits: section({
    maxQuestionLength: z.number().int(),
  }),
  rateLimit: section({
    maxRequests: z.number().int(),
    windowSeconds: z.number(),
  }),
  cache: section({
    ttlSeconds: z.number(),
  }),
  retry: section({
    maxAttempts: z.number().int(),
    /** Delay before the second attempt; doubles afterwards. */
    baseDelaySeconds: z.number(),
  }),
  session: section({
    timeoutMinutes: z.number(),
  }),
  server: section({
    port: z.number().int(),
  }),
});

export type ExternalConfig = z.infer<typeof ExternalConfigSchema>;

/** Default external config values */
export const EXTERNAL_DEFAULTS: Required<ExternalConfig> = {
  llm: {
    models: DEFAULT_CONFIG.models,
    qaTemperature: DEFAULT_CONFIG.qaTemperature,
    emailTemperature: DEFAULT_CONFIG.emailTemperature,
    maxTokens: DEFAULT_CONFIG.maxTokens,
  },
  corpus: {
    path: DEFAULT_CONFIG.documentsPath,
    reloadSeconds: 300,
  },
  storage: {
    chatHistoryPath: DEFAULT_CONFIG.chatHistoryPath,
    emailHistoryPath: DEFAULT_CONFIG.emailHistoryPath,
    dbPath: DEFAULT_CONFIG.dbPath,
  },
  limits: {
    maxQuestionLength: 500,
  },
  rateLimit: {
    maxRequests: 10,
    windowSeconds: 60,
  },
  cache: {
    ttlSeconds: 3600,
  },
  retry: {
    maxAttempts: 3,
    baseDelaySeconds: 2,
  },
  session: {
    timeoutMinutes: 30,
  },
  server: {
    port: 8787,
  },
};

/**
 * Load config from a JSON file.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  try {
    const parsed = ExternalConfigSchema.safeParse(JSON.parse(readFileSync(resolvedPath, 'utf-8')));
    if (!parsed.success) {
      log.warn(`Ignoring malformed config file ${path}`, {
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
      return null;
    }
    return parsed.data;
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, { error: errorMessage(error) });
    return null;
  }
}

function envNumber(name: string, parse: (raw: string) => number): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const value = parse(raw);
  if (Number.isNaN(value)) {
    log.warn(`Ignoring non-numeric ${name}`, { value: raw });
    return undefined;
  }
  return value;
}

const int = (raw: string) => parseInt(raw, 10);

/**
 * Load config from environment variables.
 * Variables are prefixed with UNIHELP_ and use underscores for nesting.
 * Examples:
 *   UNIHELP_LLM_MODELS=claude-3-haiku-20240307,claude-3-5-sonnet-20241022
 *   UNIHELP_RATE_LIMIT_MAX_REQUESTS=20
 *   UNIHELP_CORPUS_PATH=./documents.txt
 */
function loadEnvConfig(): ExternalConfig {
  const config: ExternalConfig = {};

  // LLM
  if (process.env.UNIHELP_LLM_MODELS) {
    config.llm = config.llm ?? {};
    config.llm.models = process.env.UNIHELP_LLM_MODELS.split(',')
      .map((m) => m.trim())
      .filter(Boolean);
  }
  const qaTemperature = envNumber('UNIHELP_LLM_QA_TEMPERATURE', parseFloat);
  if (qaTemperature !== undefined) {
    config.llm = config.llm ?? {};
    config.llm.qaTemperature = qaTemperature;
  }
  const emailTemperature = envNumber('UNIHELP_LLM_EMAIL_TEMPERATURE', parseFloat);
  if (emailTemperature !== undefined) {
    config.llm = config.llm ?? {};
    config.llm.emailTemperature = emailTemperature;
  }
  const maxTokens = envNumber('UNIHELP_LLM_MAX_TOKENS', int);
  if (maxTokens !== undefined) {
    config.llm = config.llm ?? {};
    config.llm.maxTokens = maxTokens;
  }

  // Corpus
  if (process.env.UNIHELP_CORPUS_PATH) {
    config.corpus = config.corpus ?? {};
    config.corpus.path = process.env.UNIHELP_CORPUS_PATH;
  }
  const reloadSeconds = envNumber('UNIHELP_CORPUS_RELOAD_SECONDS', int);
  if (reloadSeconds !== undefined) {
    config.corpus = config.corpus ?? {};
    config.corpus.reloadSeconds = reloadSeconds;
  }

  // Storage
  if (process.env.UNIHELP_STORAGE_CHAT_HISTORY_PATH) {
    config.storage = config.storage ?? {};
    config.storage.chatHistoryPath = process.env.UNIHELP_STORAGE_CHAT_HISTORY_PATH;
  }
  if (process.env.UNIHELP_STORAGE_EMAIL_HISTORY_PATH) {
    config.storage = config.storage ?? {};
    config.storage.emailHistoryPath = process.env.UNIHELP_STORAGE_EMAIL_HISTORY_PATH;
  }
  if (process.env.UNIHELP_STORAGE_DB_PATH) {
    config.storage = config.storage ?? {};
    config.storage.dbPath = process.env.UNIHELP_STORAGE_DB_PATH;
  }

  // Limits
  const maxQuestionLength = envNumber('UNIHELP_LIMITS_MAX_QUESTION_LENGTH', int);
  if (maxQuestionLength !== undefined) {
    config.limits = config.limits ?? {};
    config.limits.maxQuestionLength = maxQuestionLength;
  }

  // Rate limit
  const maxRequests = envNumber('UNIHELP_RATE_LIMIT_MAX_REQUESTS', int);
  if (maxRequests !== undefined) {
    config.rateLimit = config.rateLimit ?? {};
    config.rateLimit.maxRequests = maxRequests;
  }
  const windowSeconds = envNumber('UNIHELP_RATE_LIMIT_WINDOW_SECONDS', int);
  if (windowSeconds !== undefined) {
    config.rateLimit = config.rateLimit ?? {};
    config.rateLimit.windowSeconds = windowSeconds;
  }

  // Cache
  const ttlSeconds = envNumber('UNIHELP_CACHE_TTL_SECONDS', int);
  if (ttlSeconds !== undefined) {
    config.cache = { ttlSeconds };
  }

  // Retry
  const maxAttempts = envNumber('UNIHELP_RETRY_MAX_ATTEMPTS', int);
  if (maxAttempts !== undefined) {
    config.retry = config.retry ?? {};
    config.retry.maxAttempts = maxAttempts;
  }
  const baseDelaySeconds = envNumber('UNIHELP_RETRY_BASE_DELAY_SECONDS', parseFloat);
  if (baseDelaySeconds !== undefined) {
    config.retry = config.retry ?? {};
    config.retry.baseDelaySeconds = baseDelaySeconds;
  }

  // Session
  const timeoutMinutes = envNumber('UNIHELP_SESSION_TIMEOUT_MINUTES', int);
  if (timeoutMinutes !== undefined) {
    config.session = { timeoutMinutes };
  }

  // Server
  const port = envNumber('UNIHELP_SERVER_PORT', int);
  if (port !== undefined) {
    config.server = { port };
  }

  return config;
}

/**
 * Deep merge two config objects, with source overriding target.
 * Arrays (the model list) are replaced, not concatenated.
 */
function deepMerge(target: ExternalConfig, source: ExternalConfig): ExternalConfig {
  return {
    llm: { ...target.llm, ...source.llm },
    corpus: { ...target.corpus, ...source.corpus },
    storage: { ...target.storage, ...source.storage },
    limits: { ...target.limits, ...source.limits },
    rateLimit: { ...target.rateLimit, ...source.rateLimit },
    cache: { ...target.cache, ...source.cache },
    retry: { ...target.retry, ...source.retry },
    session: { ...target.session, ...source.session },
    server: { ...target.server, ...source.server },
  };
}

/**
 * Validate the external config structure.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  const errors: string[] = [];

  if (config.llm?.models !== undefined) {
    if (!Array.isArray(config.llm.models) || config.llm.models.length === 0) {
      errors.push('llm.models must list at least one model');
    }
  }
  for (const key of ['qaTemperature', 'emailTemperature'] as const) {
    const value = config.llm?.[key];
    if (value !== undefined && (value < 0 || value > 1)) {
      errors.push(`llm.${key} must be between 0 and 1 (inclusive)`);
    }
  }
  if (config.llm?.maxTokens !== undefined && config.llm.maxTokens < 1) {
    errors.push('llm.maxTokens must be at least 1');
  }

  if (config.corpus?.reloadSeconds !== undefined && config.corpus.reloadSeconds < 0) {
    errors.push('corpus.reloadSeconds must be >= 0');
  }

  if (config.limits?.maxQuestionLength !== undefined && config.limits.maxQuestionLength < 3) {
    errors.push('limits.maxQuestionLength must be at least 3');
  }

  if (config.rateLimit?.maxRequests !== undefined && config.rateLimit.maxRequests < 1) {
    errors.push('rateLimit.maxRequests must be at least 1');
  }
  if (config.rateLimit?.windowSeconds !== undefined && config.rateLimit.windowSeconds <= 0) {
    errors.push('rateLimit.windowSeconds must be positive');
  }

  if (config.cache?.ttlSeconds !== undefined && config.cache.ttlSeconds < 0) {
    errors.push('cache.ttlSeconds must be >= 0');
  }

  if (config.retry?.maxAttempts !== undefined && config.retry.maxAttempts < 1) {
    errors.push('retry.maxAttempts must be at least 1');
  }
  if (config.retry?.baseDelaySeconds !== undefined && config.retry.baseDelaySeconds < 0) {
    errors.push('retry.baseDelaySeconds must be >= 0');
  }

  if (config.server?.port !== undefined) {
    if (!Number.isInteger(config.server.port) || config.server.port < 0 || config.server.port > 65535) {
      errors.push('server.port must be an integer between 0 and 65535');
    }
  }

  return errors;
}

export interface LoadConfigOptions {
  /** CLI overrides (highest priority) */
  cliOverrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
}

/**
 * Load configuration with priority-based resolution.
 */
export function loadConfig(options: LoadConfigOptions = {}): Required<ExternalConfig> {
  let config: ExternalConfig = deepMerge({}, EXTERNAL_DEFAULTS);

  if (!options.skipUserConfig) {
    const userConfig = loadConfigFile(options.userConfigPath ?? '~/.unihelp/config.json');
    if (userConfig) {
      config = deepMerge(config, userConfig);
    }
  }

  if (!options.skipProjectConfig) {
    const projectConfig = loadConfigFile(
      options.projectConfigPath ?? join(process.cwd(), 'unihelp.config.json'),
    );
    if (projectConfig) {
      config = deepMerge(config, projectConfig);
    }
  }

  if (!options.skipEnv) {
    config = deepMerge(config, loadEnvConfig());
  }

  if (options.cliOverrides) {
    config = deepMerge(config, options.cliOverrides);
  }

  return {
    llm: config.llm ?? EXTERNAL_DEFAULTS.llm,
    corpus: config.corpus ?? EXTERNAL_DEFAULTS.corpus,
    storage: config.storage ?? EXTERNAL_DEFAULTS.storage,
    limits: config.limits ?? EXTERNAL_DEFAULTS.limits,
    rateLimit: config.rateLimit ?? EXTERNAL_DEFAULTS.rateLimit,
    cache: config.cache ?? EXTERNAL_DEFAULTS.cache,
    retry: config.retry ?? EXTERNAL_DEFAULTS.retry,
    session: config.session ?? EXTERNAL_DEFAULTS.session,
    server: config.server ?? EXTERNAL_DEFAULTS.server,
  };
}

/**
 * Convert ExternalConfig to AppConfig (the runtime format).
 *
 * Seconds become milliseconds and storage paths are resolved.
 */
export function toRuntimeConfig(external: Required<ExternalConfig>): AppConfig {
  const seconds = (value: number | undefined, fallbackMs: number) =>
    value === undefined ? fallbackMs : value * 1000;

  return {
    ...DEFAULT_CONFIG,

    models: external.llm.models ?? DEFAULT_CONFIG.models,
    qaTemperature: external.llm.qaTemperature ?? DEFAULT_CONFIG.qaTemperature,
    emailTemperature: external.llm.emailTemperature ?? DEFAULT_CONFIG.emailTemperature,
    maxTokens: external.llm.maxTokens ?? DEFAULT_CONFIG.maxTokens,

    documentsPath: resolvePath(external.corpus.path ?? DEFAULT_CONFIG.documentsPath),
    corpusReloadMs: seconds(external.corpus.reloadSeconds, DEFAULT_CONFIG.corpusReloadMs),

    chatHistoryPath: resolvePath(external.storage.chatHistoryPath ?? DEFAULT_CONFIG.chatHistoryPath),
    emailHistoryPath: resolvePath(
      external.storage.emailHistoryPath ?? DEFAULT_CONFIG.emailHistoryPath,
    ),
    dbPath: resolvePath(external.storage.dbPath ?? DEFAULT_CONFIG.dbPath),

    maxQuestionLength: external.limits.maxQuestionLength ?? DEFAULT_CONFIG.maxQuestionLength,

    rateLimitRequests: external.rateLimit.maxRequests ?? DEFAULT_CONFIG.rateLimitRequests,
    rateLimitWindowMs: seconds(external.rateLimit.windowSeconds, DEFAULT_CONFIG.rateLimitWindowMs),
    cacheTtlMs: seconds(external.cache.ttlSeconds, DEFAULT_CONFIG.cacheTtlMs),
    sessionTimeoutMs:
      external.session.timeoutMinutes === undefined
        ? DEFAULT_CONFIG.sessionTimeoutMs
        : external.session.timeoutMinutes * 60 * 1000,

    maxRetries: external.retry.maxAttempts ?? DEFAULT_CONFIG.maxRetries,
    retryBaseDelayMs: seconds(external.retry.baseDelaySeconds, DEFAULT_CONFIG.retryBaseDelayMs),

    port: external.server.port ?? DEFAULT_CONFIG.port,
  };
}
