import type { Bot } from 'grammy';
import type { QuillBotContext } from '../types.js';
import { contextTag } from '../format.js';

export const HELP_TEXT = [
  'Available commands:',
  '/new [brd|sow|frd] <requirements> - generate a business requirements document (default),',
  '    a statement of work or a functional requirements document',
  '/status <file id> - show generation progress',
  '/download <file id> [pdf|docx|html|json] - download a finished document',
  '/help - show this message',
  '',
  'You can also upload a .txt or .md file with your requirements. A caption is used as the project name and may start with a document type.',
].join('\n');

export function registerHelpCommand(bot: Bot<QuillBotContext>): void {
  bot.command(['help', 'start'], async (ctx) => {
    console.log(`[help] /help received ${contextTag(ctx)}`);
    await ctx.reply(HELP_TEXT);
  });
}
