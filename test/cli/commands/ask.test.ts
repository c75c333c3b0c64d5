/**
 * Tests for the ask and email CLI command handlers.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { rmSync } from 'node:fs';

vi.mock('../../../src/assistant/create-assistant.js', () => ({
  createAssistant: vi.fn(),
}));

vi.mock('../../../src/cli/utils.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../src/cli/utils.js')>();
  return { ...actual, loadRuntimeConfig: vi.fn() };
});

import { askCommand } from '../../../src/cli/commands/ask.js';
import { emailCommand } from '../../../src/cli/commands/email.js';
import { createAssistant } from '../../../src/assistant/create-assistant.js';
import { loadRuntimeConfig } from '../../../src/cli/utils.js';
import { createFailingBackend, createTestAssistant, type TestAssistant } from '../../assistant/test-utils.js';
import type { ChatBackend } from '../../../src/llm/types.js';

const mockCreateAssistant = vi.mocked(createAssistant);
const mockLoadRuntimeConfig = vi.mocked(loadRuntimeConfig);

let ctx: TestAssistant | undefined;

function useAssistant(backend?: ChatBackend): TestAssistant {
  const assistant = createTestAssistant({ backend });
  ctx = assistant;
  mockLoadRuntimeConfig.mockReturnValue(assistant.config);
  mockCreateAssistant.mockReturnValue({
    config: assistant.config,
    session: assistant.session,
    conversations: assistant.conversations,
    emails: assistant.emails,
    orchestrator: assistant.orchestrator,
  });
  return assistant;
}

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(process, 'exit').mockImplementation((code) => {
    throw new Error(`exit ${code}`);
  });
});

afterEach(() => {
  if (ctx) rmSync(ctx.dir, { recursive: true, force: true });
  ctx = undefined;
});

describe('askCommand', () => {
  it('prints the answer', async () => {
    const assistant = useAssistant();

    await askCommand.handler(['internship', 'rules?', '--lang', 'EN']);

    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('convention'));
    expect(assistant.conversations.turns.map((t) => t.question)).toEqual(['internship rules?']);
  });

  it('exits with code 2 without a question', async () => {
    useAssistant();

    await expect(askCommand.handler([])).rejects.toThrow('exit 2');
    expect(console.error).toHaveBeenCalledWith('Error: Question required');
  });

  it('exits with code 2 for a rejected question', async () => {
    useAssistant();

    await expect(askCommand.handler(['ab', '--lang', 'EN'])).rejects.toThrow('exit 2');
    expect(console.error).toHaveBeenCalledWith('The question is too short.');
  });

  it('exits with code 1 when every model fails', async () => {
    useAssistant(createFailingBackend());

    await expect(askCommand.handler(['internship', 'rules?', '--lang', 'EN'])).rejects.toThrow('exit 1');
    expect(console.error).toHaveBeenCalledWith('The service is temporarily unavailable. Please try again later.');
  });
});

describe('emailCommand', () => {
  it('prints the drafted email', async () => {
    const assistant = useAssistant();

    await emailCommand.handler(['Internship', 'request', '--lang', 'EN']);

    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Generate a professional email for: Internship request'));
    expect(assistant.emails.list()).toHaveLength(1);
  });

  it('lists example types when none is given', async () => {
    useAssistant();

    await expect(emailCommand.handler(['--lang', 'EN'])).rejects.toThrow('exit 2');
    expect(console.log).toHaveBeenCalledWith('  Internship request');
  });
});
