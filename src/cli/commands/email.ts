import type { Command } from '../types.js';
import { languageOption, loadRuntimeConfig, parseArgs } from '../utils.js';
import { createAssistant } from '../../assistant/create-assistant.js';
import { emailTypeOptions } from '../../i18n/locales.js';

export const emailCommand: Command = {
  name: 'email',
  description: 'Draft an administrative email',
  usage: 'unihelp email <type> [--lang FR|EN|TN]',
  handler: async (args) => {
    const { positional, options } = parseArgs(args);
    const language = languageOption(options);
    const emailType = positional.join(' ');
    if (!emailType) {
      console.error('Error: Email type required');
      console.log(`Usage: ${emailCommand.usage}`);
      console.log('');
      console.log('Examples:');
      for (const option of emailTypeOptions(language)) {
        console.log(`  ${option}`);
      }
      process.exit(2);
    }

    const { orchestrator } = createAssistant(loadRuntimeConfig());
    const result = await orchestrator.generateEmail({ emailType, language });

    switch (result.kind) {
      case 'email':
        console.log(result.record.content);
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
