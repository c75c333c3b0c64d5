import type { Command } from '../types.js';
import { loadRuntimeConfig, parseArgs } from '../utils.js';
import { createAssistant } from '../../assistant/create-assistant.js';
import { DEFAULT_LANGUAGE, parseLanguage } from '../../config/app-config.js';
import { getDb } from '../../storage/db.js';

export const serveCommand: Command = {
  name: 'serve',
  description: 'Start the HTTP API',
  usage: 'unihelp serve [--port <port>] [--lang FR|EN|TN]',
  handler: async (args) => {
    const { options } = parseArgs(args);
    const rawPort = options.get('port');
    const port = rawPort === undefined ? undefined : parseInt(rawPort, 10);
    if (port !== undefined && (!Number.isInteger(port) || port < 0 || port > 65535)) {
      console.error(`Error: Invalid port "${rawPort}"`);
      process.exit(2);
    }

    const config = loadRuntimeConfig(port === undefined ? undefined : { server: { port } });

    // Open the database before accepting requests
    getDb(config.dbPath);

    const assistant = createAssistant(config);
    const { startServer } = await import('../../server/server.js');
    await startServer(
      {
        assistant: assistant.orchestrator,
        conversations: assistant.conversations,
        emails: assistant.emails,
        defaultLanguage: parseLanguage(options.get('lang')) ?? DEFAULT_LANGUAGE,
      },
      config.port,
    );
  },
};
