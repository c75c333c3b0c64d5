/**
 * ChatBackend over the Anthropic Messages API.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { ChatBackend, ChatMessage, CompletionRequest } from './types.js';
import { BackendError, PreconditionError, errorMessage } from '../utils/errors.js';

export interface AnthropicBackendOptions {
  /** Default: ANTHROPIC_API_KEY */
  apiKey?: string;
  /** Default: 1024 */
  maxTokens?: number;
}

type ConversationMessage = ChatMessage & { role: 'user' | 'assistant' };

function isConversationMessage(message: ChatMessage): message is ConversationMessage {
  return message.role !== 'system';
}

export class AnthropicBackend implements ChatBackend {
  private client: Anthropic | null = null;
  private readonly apiKey: string | undefined;
  private readonly maxTokens: number;

  constructor(options: AnthropicBackendOptions = {}) {
    this.apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY?.trim();
    this.maxTokens = options.maxTokens ?? 1024;
  }

  /**
   * Whether credentials are available. Callers report a missing key once,
   * up front, instead of letting every request fail.
   */
  hasCredentials(): boolean {
    return Boolean(this.apiKey);
  }

  /**
   * Create the client on first use.
   */
  private getClient(): Anthropic {
    if (!this.client) {
      if (!this.apiKey) {
        throw new PreconditionError(
          'No Anthropic API key found. Set the ANTHROPIC_API_KEY environment variable.',
          'MISSING_API_KEY',
        );
      }
      this.client = new Anthropic({ apiKey: this.apiKey });
    }
    return this.client;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const client = this.getClient();

    // System turns go in the dedicated parameter; the rest keep their order
    const system = request.messages
      .filter((m) => m.role === 'system')
      .map((m) => m.content)
      .join('\n\n');
    const messages = request.messages.filter(isConversationMessage).map((m) => ({
      role: m.role,
      content: m.content,
    }));

    try {
      const response = await client.messages.create({
        model: request.model,
        max_tokens: this.maxTokens,
        temperature: request.temperature,
        ...(system ? { system } : {}),
        messages,
      });

      return response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();
    } catch (error) {
      throw new BackendError(
        `Request to ${request.model} failed: ${errorMessage(error)}`,
        'BACKEND_REQUEST_FAILED',
        error,
      );
    }
  }
}
