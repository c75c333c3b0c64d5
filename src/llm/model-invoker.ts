/**
 * Ordered model fallback.
 *
 * Each candidate gets exactly one request, in the caller's order; the first
 * success wins. This is resilience against one model being unavailable, and
 * is separate from retry-with-backoff (see retry.ts), which the caller wraps
 * around a whole invocation.
 */

import type { ChatBackend, ChatMessage } from './types.js';
import {
  BackendExhaustedError,
  PreconditionError,
  errorMessage,
  type AttemptRecord,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('model-invoker');

export interface InvokeRequest {
  /** Candidate models, tried in this order and never reordered */
  models: readonly string[];
  temperature: number;
  messages: ChatMessage[];
}

export interface InvokeResult {
  text: string;
  /** The model that answered */
  model: string;
  /** Every request made, in order */
  attempts: AttemptRecord[];
}

export class ModelInvoker {
  constructor(
    private readonly backend: ChatBackend,
    private readonly onAttempt?: (attempt: AttemptRecord) => void,
  ) {}

  async invoke(request: InvokeRequest): Promise<InvokeResult> {
    const attempts: AttemptRecord[] = [];

    if (request.models.length === 0) {
      throw new BackendExhaustedError('No candidate models configured', 'NO_MODELS', attempts);
    }

    let lastError: unknown;

    for (const model of request.models) {
      try {
        const text = await this.backend.complete({
          model,
          temperature: request.temperature,
          messages: request.messages,
        });
        this.record(attempts, { model, ok: true });
        return { text: text.trim(), model, attempts };
      } catch (error) {
        // A missing prerequisite fails every candidate the same way
        if (error instanceof PreconditionError) {
          throw error;
        }
        lastError = error;
        this.record(attempts, { model, ok: false, error: errorMessage(error) });
        log.warn(`Model ${model} failed, trying next candidate`, { error: errorMessage(error) });
      }
    }

    throw new BackendExhaustedError(
      `All ${request.models.length} candidate models failed: ${errorMessage(lastError)}`,
      'BACKEND_EXHAUSTED',
      attempts,
      lastError,
    );
  }

  private record(attempts: AttemptRecord[], attempt: AttemptRecord): void {
    attempts.push(attempt);
    this.onAttempt?.(attempt);
  }
}
