/**
 * Backend-facing types shared by the invoker and its transports.
 */

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/** One completion request to one model. */
export interface CompletionRequest {
  model: string;
  /** 0..1 */
  temperature: number;
  messages: ChatMessage[];
}

/**
 * Transport to an LLM completion service. Resolves with generated text or
 * rejects; the invoker treats any rejection as a failure of that model.
 */
export interface ChatBackend {
  complete(request: CompletionRequest): Promise<string>;
}
