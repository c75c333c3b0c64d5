/**
 * Tests for the Anthropic transport, with the SDK client mocked.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create };
  },
}));

import { AnthropicBackend } from '../../src/llm/anthropic-backend.js';
import { BackendError, PreconditionError } from '../../src/utils/errors.js';

beforeEach(() => {
  create.mockReset();
});

describe('AnthropicBackend', () => {
  it('reports missing credentials', () => {
    expect(new AnthropicBackend({ apiKey: '' }).hasCredentials()).toBe(false);
    expect(new AnthropicBackend({ apiKey: 'test-secret' }).hasCredentials()).toBe(true);
  });

  it('fails with a precondition error before any request without a key', async () => {
    const backend = new AnthropicBackend({ apiKey: '' });

    const error = await backend
      .complete({ model: 'm', temperature: 0, messages: [{ role: 'user', content: 'q' }] })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PreconditionError);
    if (error instanceof PreconditionError) {
      expect(error.code).toBe('MISSING_API_KEY');
    }
    expect(create).not.toHaveBeenCalled();
  });

  it('sends system turns in the system parameter', async () => {
    create.mockResolvedValue({ content: [{ type: 'text', text: ' Hello ' }] });
    const backend = new AnthropicBackend({ apiKey: 'test-secret', maxTokens: 256 });

    const text = await backend.complete({
      model: 'model-a',
      temperature: 0.2,
      messages: [
        { role: 'system', content: 'persona' },
        { role: 'user', content: 'earlier' },
        { role: 'assistant', content: 'reply' },
        { role: 'user', content: 'now' },
      ],
    });

    expect(text).toBe('Hello');
    expect(create).toHaveBeenCalledWith({
      model: 'model-a',
      max_tokens: 256,
      temperature: 0.2,
      system: 'persona',
      messages: [
        { role: 'user', content: 'earlier' },
        { role: 'assistant', content: 'reply' },
        { role: 'user', content: 'now' },
      ],
    });
  });

  it('omits an empty system parameter and keeps only text blocks', async () => {
    create.mockResolvedValue({
      content: [
        { type: 'text', text: 'a' },
        { type: 'tool_use', id: 't', name: 'x', input: {} },
        { type: 'text', text: 'b' },
      ],
    });
    const backend = new AnthropicBackend({ apiKey: 'test-secret' });

    const text = await backend.complete({ model: 'm', temperature: 0, messages: [{ role: 'user', content: 'q' }] });

    expect(text).toBe('ab');
    expect(create).toHaveBeenCalledWith({
      model: 'm',
      max_tokens: 1024,
      temperature: 0,
      messages: [{ role: 'user', content: 'q' }],
    });
  });

  it('wraps request failures in BackendError', async () => {
    create.mockRejectedValue(new Error('overloaded'));
    const backend = new AnthropicBackend({ apiKey: 'test-secret' });

    const error = await backend
      .complete({ model: 'm', temperature: 0, messages: [{ role: 'user', content: 'q' }] })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendError);
    if (error instanceof BackendError) {
      expect(error.message).toBe('Request to m failed: overloaded');
      expect(error.code).toBe('BACKEND_REQUEST_FAILED');
    }
  });
});
