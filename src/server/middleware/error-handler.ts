/**
 * Express error middleware for the API.
 *
 * Maps error classes to status codes and returns a JSON error body instead
 * of crashing the server.
 */

import type { Request, Response, NextFunction } from 'express';
import {
  BackendError,
  ConfigError,
  PreconditionError,
  UniHelpError,
  ValidationError,
  errorMessage,
} from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('server');

function hasStatus(err: unknown): err is { status: number } {
  return (
    typeof err === 'object' &&
    err !== null &&
    'status' in err &&
    typeof err.status === 'number'
  );
}

export function statusForError(err: unknown): number {
  if (err instanceof ValidationError) return 400;
  if (err instanceof PreconditionError) return 503;
  if (err instanceof BackendError) return 502;
  if (err instanceof ConfigError) return 500;
  // Body-parser and other http-errors carry their own status
  if (hasStatus(err)) return err.status;
  return 500;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const status = statusForError(err);
  const message = errorMessage(err);

  if (status >= 500) {
    log.error(message, err instanceof UniHelpError ? { code: err.code } : undefined);
  } else {
    log.debug(message);
  }

  res.status(status).json({
    error: message,
    ...(err instanceof UniHelpError ? { code: err.code } : {}),
  });
}
