import type { Command } from '../types.js';
import { loadRuntimeConfig, parseArgs } from '../utils.js';
import { ConversationStore } from '../../history/conversation-store.js';
import { EmailStore } from '../../history/email-store.js';

const PREVIEW_CHARS = 80;

function preview(text: string): string {
  const line = text.replace(/\s+/g, ' ').trim();
  return line.length > PREVIEW_CHARS ? `${line.slice(0, PREVIEW_CHARS - 3)}...` : line;
}

export const historyCommand: Command = {
  name: 'history',
  description: 'Show or clear saved conversations and emails',
  usage: 'unihelp history [--clear] [--delete <conversationId>] [--emails]',
  handler: async (args) => {
    const { options } = parseArgs(args);
    const config = loadRuntimeConfig();
    const conversations = new ConversationStore({ path: config.chatHistoryPath });
    conversations.load();

    if (options.has('clear')) {
      conversations.clearAll();
      if (options.has('emails')) {
        const emails = new EmailStore({ path: config.emailHistoryPath });
        emails.clear();
      }
      console.log('History cleared.');
      return;
    }

    const target = options.get('delete');
    if (target !== undefined) {
      const removed = conversations.deleteConversation(target);
      if (removed === 0) {
        console.error(`No conversation ${target}`);
        process.exit(1);
      }
      console.log(`Deleted ${removed} turn(s) from ${target}.`);
      return;
    }

    if (options.has('emails')) {
      const emails = new EmailStore({ path: config.emailHistoryPath });
      const records = emails.load();
      if (records.length === 0) {
        console.log('No emails yet.');
        return;
      }
      records.forEach((record, index) => {
        console.log(`[${index}] ${record.timestamp.slice(0, 16)}  ${record.type}`);
      });
      return;
    }

    const groups = conversations.groupByConversation();
    if (groups.length === 0) {
      console.log('No history yet.');
      return;
    }

    for (const group of groups) {
      console.log(`${group.conversationId}  (${group.turns.length} turn(s), last ${group.lastActivity.slice(0, 16)})`);
      for (const turn of group.turns) {
        console.log(`  Q: ${preview(turn.question)}`);
        console.log(`  A: ${preview(turn.answer)}`);
      }
      console.log('');
    }
  },
};
