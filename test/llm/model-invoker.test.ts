/**
 * Tests for ordered model fallback.
 */

import { describe, it, expect, vi } from 'vitest';
import { ModelInvoker } from '../../src/llm/model-invoker.js';
import type { ChatBackend, CompletionRequest } from '../../src/llm/types.js';
import {
  BackendExhaustedError,
  EmptyDocumentsError,
  type AttemptRecord,
} from '../../src/utils/errors.js';

function scriptedBackend(outcomes: Record<string, string | Error>) {
  const calls: CompletionRequest[] = [];
  const backend: ChatBackend = {
    async complete(request) {
      calls.push(request);
      const outcome = outcomes[request.model];
      if (outcome === undefined || outcome instanceof Error) {
        throw outcome ?? new Error(`unknown model ${request.model}`);
      }
      return outcome;
    },
  };
  return { backend, calls };
}

const messages = [{ role: 'user' as const, content: 'hi' }];

describe('ModelInvoker', () => {
  it('falls back to the next model in order', async () => {
    const { backend, calls } = scriptedBackend({ a: new Error('overloaded'), b: '  answer from b \n' });
    const invoker = new ModelInvoker(backend);

    const result = await invoker.invoke({ models: ['a', 'b'], temperature: 0.2, messages });

    expect(result.text).toBe('answer from b');
    expect(result.model).toBe('b');
    expect(result.attempts).toEqual([
      { model: 'a', ok: false, error: 'overloaded' },
      { model: 'b', ok: true },
    ]);
    expect(calls.map((c) => c.model)).toEqual(['a', 'b']);
    expect(calls[0]?.temperature).toBe(0.2);
  });

  it('does not try later models after a success', async () => {
    const { backend, calls } = scriptedBackend({ a: 'first', b: 'second' });

    const result = await new ModelInvoker(backend).invoke({ models: ['a', 'b'], temperature: 0, messages });

    expect(result.model).toBe('a');
    expect(calls).toHaveLength(1);
  });

  it('throws BackendExhaustedError with one attempt per model', async () => {
    const { backend } = scriptedBackend({ a: new Error('down a'), b: new Error('down b') });
    const invoker = new ModelInvoker(backend);

    const error = await invoker.invoke({ models: ['a', 'b'], temperature: 0, messages }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendExhaustedError);
    if (error instanceof BackendExhaustedError) {
      expect(error.code).toBe('BACKEND_EXHAUSTED');
      expect(error.message).toBe('All 2 candidate models failed: down b');
      expect(error.attempts).toHaveLength(2);
      expect(error.attempts.every((a) => !a.ok)).toBe(true);
    }
  });

  it('fails without calling the backend when no models are configured', async () => {
    const { backend, calls } = scriptedBackend({});

    const error = await new ModelInvoker(backend)
      .invoke({ models: [], temperature: 0, messages })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendExhaustedError);
    if (error instanceof BackendExhaustedError) {
      expect(error.code).toBe('NO_MODELS');
    }
    expect(calls).toHaveLength(0);
  });

  it('rethrows precondition errors without trying other models', async () => {
    const { backend, calls } = scriptedBackend({ a: new EmptyDocumentsError(), b: 'never' });

    await expect(
      new ModelInvoker(backend).invoke({ models: ['a', 'b'], temperature: 0, messages }),
    ).rejects.toBeInstanceOf(EmptyDocumentsError);
    expect(calls).toHaveLength(1);
  });

  it('reports each attempt to the hook', async () => {
    const { backend } = scriptedBackend({ a: new Error('x'), b: 'ok' });
    const onAttempt = vi.fn<(attempt: AttemptRecord) => void>();

    await new ModelInvoker(backend, onAttempt).invoke({ models: ['a', 'b'], temperature: 0, messages });

    expect(onAttempt).toHaveBeenCalledTimes(2);
    expect(onAttempt).toHaveBeenLastCalledWith({ model: 'b', ok: true });
  });
});
