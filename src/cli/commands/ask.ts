import type { Command } from '../types.js';
import { languageOption, loadRuntimeConfig, parseArgs } from '../utils.js';
import { createAssistant } from '../../assistant/create-assistant.js';

export const askCommand: Command = {
  name: 'ask',
  description: 'Answer a question from the official documents',
  usage: 'unihelp ask <question> [--lang FR|EN|TN]',
  handler: async (args) => {
    const { positional, options } = parseArgs(args);
    const question = positional.join(' ');
    if (!question) {
      console.error('Error: Question required');
      console.log(`Usage: ${askCommand.usage}`);
      process.exit(2);
    }

    const language = languageOption(options);
    const { orchestrator } = createAssistant(loadRuntimeConfig());
    const result = await orchestrator.answerQuestion({ question, language });

    switch (result.kind) {
      case 'answer':
      case 'quick-reply':
        console.log(result.answer);
        break;
      case 'invalid':
        console.error(result.message);
        process.exit(2);
        break;
      case 'rate-limited':
        console.error(result.message);
        process.exit(4);
        break;
      case 'failed':
        console.error(result.message);
        process.exit(1);
        break;
    }
  },
};
