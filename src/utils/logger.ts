/**
 * Centralized logging for UniHelp.
 *
 * Structured logging with levels, metadata, and output formatting.
 * Writes to stderr so CLI output on stdout stays clean.
 *
 * Log level is controlled via:
 * 1. UNIHELP_LOG_LEVEL environment variable
 * 2. setLogLevel() function
 *
 * Lines are also appended to UNIHELP_LOG_FILE (or the path given to
 * setLogFile()) when one is configured.
 *
 * Levels (in order of severity): debug < info < warn < error
 */

import { appendFileSync } from 'node:fs';

/** Log level type */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Log entry structure */
export interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  meta?: Record<string, unknown>;
}

/** Logger interface */
export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

// Level priority (higher = more severe)
const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

// Current log level
let currentLevel: LogLevel = parseLevel(process.env.UNIHELP_LOG_LEVEL) ?? 'info';

// JSON output mode (for machine parsing)
let jsonMode = process.env.UNIHELP_LOG_JSON === 'true';

// Optional file sink
let logFile: string | null = process.env.UNIHELP_LOG_FILE || null;

/**
 * Parse a level name, returning undefined for anything unrecognized.
 */
export function parseLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const normalized = value.toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

/**
 * Set the log level.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * Get the current log level.
 */
export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Enable or disable JSON output mode.
 */
export function setJsonMode(enabled: boolean): void {
  jsonMode = enabled;
}

/**
 * Mirror log lines to a file. Pass null to stop.
 */
export function setLogFile(path: string | null): void {
  logFile = path;
}

/**
 * Check if a level should be logged.
 */
function shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

/**
 * Format a log entry for output.
 */
function format(entry: LogEntry): string {
  if (jsonMode) {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, meta } = entry;
  const time = timestamp.slice(11, 19); // HH:MM:SS
  const levelTag = level.toUpperCase().padEnd(5);

  let output = `[${time}] ${levelTag} ${message}`;

  if (meta && Object.keys(meta).length > 0) {
    const metaStr = Object.entries(meta)
      .map(([k, v]) => `${k}=${typeof v === 'object' ? JSON.stringify(v) : v}`)
      .join(' ');
    output += ` (${metaStr})`;
  }

  return output;
}

/**
 * Write a log entry.
 */
function log(level: Exclude<LogLevel, 'silent'>, msg: string, meta?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message: msg,
    meta,
  };

  const line = format(entry) + '\n';
  process.stderr.write(line);

  if (logFile) {
    try {
      appendFileSync(logFile, line, 'utf-8');
    } catch (error) {
      // Stop mirroring after the first failure; stderr keeps working
      const reason = error instanceof Error ? error.message : String(error);
      process.stderr.write(`Log file ${logFile} disabled: ${reason}\n`);
      logFile = null;
    }
  }
}

/**
 * Main logger instance.
 */
export const logger: Logger = {
  debug: (msg, meta) => log('debug', msg, meta),
  info: (msg, meta) => log('info', msg, meta),
  warn: (msg, meta) => log('warn', msg, meta),
  error: (msg, meta) => log('error', msg, meta),
};

/**
 * Create a child logger with a fixed prefix.
 */
export function createLogger(prefix: string): Logger {
  return {
    debug: (msg, meta) => log('debug', `[${prefix}] ${msg}`, meta),
    info: (msg, meta) => log('info', `[${prefix}] ${msg}`, meta),
    warn: (msg, meta) => log('warn', `[${prefix}] ${msg}`, meta),
    error: (msg, meta) => log('error', `[${prefix}] ${msg}`, meta),
  };
}

// Export default logger
export default logger;
