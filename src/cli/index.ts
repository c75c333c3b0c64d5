#!/usr/bin/env node
/**
 * UniHelp Command-Line Interface
 *
 * Usage: unihelp <command> [options]
 */

import type { Command } from './types.js';
import { askCommand } from './commands/ask.js';
import { emailCommand } from './commands/email.js';
import { historyCommand } from './commands/history.js';
import { serveCommand } from './commands/serve.js';
import { configCommand } from './commands/config.js';
import { errorMessage } from '../utils/errors.js';

const VERSION = '0.1.0';

const commands: Command[] = [askCommand, emailCommand, historyCommand, serveCommand, configCommand];

function showHelp(): void {
  console.log('UniHelp - University Assistant');
  console.log('');
  console.log('Usage: unihelp <command> [options]');
  console.log('');
  console.log('Commands:');
  for (const cmd of commands) {
    console.log(`  ${cmd.name.padEnd(16)} ${cmd.description}`);
  }
  console.log(`  ${'help'.padEnd(16)} Show this help`);
  console.log('');
  console.log('Options:');
  console.log('  --version        Show version');
  console.log('  --help           Show help');
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Handle global flags
  if (args.includes('--version') || args.includes('-v')) {
    console.log(`unihelp ${VERSION}`);
    return;
  }

  if (args.length === 0 || args[0] === 'help' || args.includes('--help') || args.includes('-h')) {
    showHelp();
    return;
  }

  const commandName = args[0];
  const command = commands.find((c) => c.name === commandName);

  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.log('Run "unihelp --help" for available commands.');
    process.exit(2);
  }

  try {
    await command.handler(args.slice(1));
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
