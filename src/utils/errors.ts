/**
 * Standardized error types for UniHelp.
 *
 * All errors extend from UniHelpError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 * - Consistent error messages
 *
 * ## Usage
 *
 * ```typescript
 * import { PersistenceError, BackendError } from './errors.js';
 *
 * throw new PersistenceError('Could not save chat history', 'HISTORY_WRITE_FAILED', err);
 * ```
 *
 * Rate-limit denial is deliberately absent: it is a normal outcome returned
 * to the caller, not an error.
 *
 * @module utils/errors
 */

/**
 * Base error class for all UniHelp errors.
 *
 * - `code`: Programmatic error identifier (e.g., 'BACKEND_EXHAUSTED')
 * - `cause`: Original error that caused this one (for chaining)
 * - `name`: Error class name (e.g., 'BackendError')
 */
export class UniHelpError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof UniHelpError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Precondition Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A prerequisite of the operation is missing. Reported once, never retried.
 *
 * Common codes:
 * - `MISSING_API_KEY`: No backend credentials configured
 * - `EMPTY_DOCUMENTS`: The knowledge base file is missing or empty
 */
export class PreconditionError extends UniHelpError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

/**
 * Question answering was attempted without a knowledge base.
 */
export class EmptyDocumentsError extends PreconditionError {
  constructor(message = 'The documents corpus is empty or missing') {
    super(message, 'EMPTY_DOCUMENTS');
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Backend Errors
// ─────────────────────────────────────────────────────────────────────────────

/** One request to one model, as seen by the invoker. */
export interface AttemptRecord {
  model: string;
  ok: boolean;
  error?: string;
}

/**
 * A single backend request failed.
 *
 * Common codes:
 * - `BACKEND_REQUEST_FAILED`: Transport or API failure
 * - `EMPTY_RESPONSE`: Response carried no text block
 */
export class BackendError extends UniHelpError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

/**
 * Every candidate model failed.
 *
 * Common codes:
 * - `BACKEND_EXHAUSTED`: All candidates were tried and failed
 * - `NO_MODELS`: The candidate list was empty
 */
export class BackendExhaustedError extends BackendError {
  readonly attempts: AttemptRecord[];

  constructor(message: string, code: string, attempts: AttemptRecord[], cause?: unknown) {
    super(message, code, cause);
    this.attempts = attempts;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Persistence Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Reading or writing a durable record failed. Never blocks the in-memory
 * operation that triggered it.
 *
 * Common codes:
 * - `HISTORY_READ_FAILED`
 * - `HISTORY_WRITE_FAILED`
 * - `ANALYTICS_WRITE_FAILED`
 */
export class PersistenceError extends UniHelpError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Validation Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * User input rejected before any backend call.
 *
 * Common codes:
 * - `QUESTION_TOO_SHORT`
 * - `QUESTION_TOO_LONG`
 * - `SPAM_PATTERN`
 * - `INVALID_INPUT`
 */
export class ValidationError extends UniHelpError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_PARSE_FAILED`: Failed to parse configuration
 * - `CONFIG_INVALID`: Configuration validation failed
 */
export class ConfigError extends UniHelpError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a UniHelp error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof UniHelpError && error.code === code;
}

export function isPreconditionError(error: unknown): error is PreconditionError {
  return error instanceof PreconditionError;
}

export function isBackendExhausted(error: unknown): error is BackendExhaustedError {
  return error instanceof BackendExhaustedError;
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error in a UniHelpError.
 *
 * If the error is already a UniHelpError, returns it unchanged.
 * Otherwise wraps it in a new UniHelpError with UNKNOWN code.
 */
export function wrapError(error: unknown, message?: string): UniHelpError {
  if (error instanceof UniHelpError) {
    return error;
  }

  return new UniHelpError(message ?? errorMessage(error), 'UNKNOWN', error);
}
