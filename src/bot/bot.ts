import { Bot } from 'grammy';
import { registerDownloadCommand } from './commands/download.js';
import { registerHelpCommand } from './commands/help.js';
import { registerNewCommand } from './commands/new.js';
import { registerStatusCommand } from './commands/status.js';
import { contextTag, truncate } from './format.js';
import type { BotDependencies, QuillBotContext } from './types.js';

function formatIncomingText(ctx: QuillBotContext): string | null {
  const text = ctx.message?.text ?? ctx.channelPost?.text;
  if (!text) return null;
  return truncate(text.replace(/\s+/g, ' ').trim(), 120);
}

export function createBot(deps: BotDependencies): Bot<QuillBotContext> {
  const bot = new Bot<QuillBotContext>(deps.token);

  bot.use(async (ctx, next) => {
    const incomingText = formatIncomingText(ctx);
    if (incomingText) {
      console.log(`[bot] incoming ${contextTag(ctx)} text="${incomingText}"`);
    } else {
      console.log(`[bot] incoming ${contextTag(ctx)} update=${Object.keys(ctx.update).join(',')}`);
    }
    await next();
  });

  registerHelpCommand(bot);
  registerNewCommand(bot, deps);
  registerStatusCommand(bot, deps);
  registerDownloadCommand(bot, deps);

  bot.catch((err) => {
    console.error(`[bot] error handling update ${err.ctx.update.update_id}:`, err.error);
  });

  return bot;
}
