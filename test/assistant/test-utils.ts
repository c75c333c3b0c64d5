/**
 * Shared fakes for assistant and server tests.
 */

import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi, type Mock } from 'vitest';
import { AnswerOrchestrator, type AnalyticsTracker } from '../../src/assistant/answer-orchestrator.js';
import { getConfig, type AppConfig } from '../../src/config/app-config.js';
import { StaticCorpusProvider } from '../../src/corpus/corpus-loader.js';
import { parseCorpus } from '../../src/corpus/corpus-parser.js';
import { ConversationStore } from '../../src/history/conversation-store.js';
import { EmailStore } from '../../src/history/email-store.js';
import { ModelInvoker } from '../../src/llm/model-invoker.js';
import type { ChatBackend, CompletionRequest } from '../../src/llm/types.js';
import { SessionContext } from '../../src/session/session-context.js';

export const INTERNSHIP_CORPUS = 'SECTION 4: Internship rules require a signed convention.';

/**
 * Backend that answers with the last user message and records every request.
 */
export function createEchoBackend(): ChatBackend & { requests: CompletionRequest[] } {
  const requests: CompletionRequest[] = [];
  return {
    requests,
    async complete(request) {
      requests.push(request);
      const last = request.messages[request.messages.length - 1];
      return last?.content ?? '';
    },
  };
}

/**
 * Backend whose every request fails.
 */
export function createFailingBackend(error: Error = new Error('service down')): ChatBackend & {
  requests: CompletionRequest[];
} {
  const requests: CompletionRequest[] = [];
  return {
    requests,
    async complete(request) {
      requests.push(request);
      throw error;
    },
  };
}

export interface TestAssistant {
  orchestrator: AnswerOrchestrator;
  session: SessionContext;
  conversations: ConversationStore;
  emails: EmailStore;
  track: Mock<AnalyticsTracker>;
  config: AppConfig;
  /** Move the fake clock forward */
  advance(ms: number): void;
  dir: string;
}

export function createTestAssistant(
  options: { backend?: ChatBackend; corpus?: string; config?: Partial<AppConfig> } = {},
): TestAssistant {
  let now = new Date(2024, 8, 16, 10, 0, 0).getTime();
  const clock = () => now;

  const dir = mkdtempSync(join(tmpdir(), 'unihelp-assistant-'));
  const config = getConfig({
    models: ['model-a', 'model-b'],
    maxRetries: 2,
    ...options.config,
  });

  const session = new SessionContext(config, { sessionId: 'test-session', now: clock });
  const conversations = new ConversationStore({ path: join(dir, 'chat.json'), now: () => new Date(now) });
  const emails = new EmailStore({ path: join(dir, 'emails.json'), now: () => new Date(now) });
  const track = vi.fn<AnalyticsTracker>();

  const orchestrator = new AnswerOrchestrator({
    config,
    session,
    corpus: new StaticCorpusProvider(parseCorpus(options.corpus ?? INTERNSHIP_CORPUS)),
    invoker: new ModelInvoker(options.backend ?? createEchoBackend()),
    conversations,
    emails,
    track,
    sleep: async () => {},
  });

  return {
    orchestrator,
    session,
    conversations,
    emails,
    track,
    config,
    advance: (ms) => {
      now += ms;
    },
    dir,
  };
}
