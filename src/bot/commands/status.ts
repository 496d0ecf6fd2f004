import type { Bot } from 'grammy';
import { DOCUMENT_TYPE_NAMES } from '../../agents/sections.js';
import type { StatusBody } from '../../service/documentService.js';
import { commandArgument, contextTag, formatRelativeTime } from '../format.js';
import type { BotDependencies, QuillBotContext } from '../types.js';

export function formatStatus(body: StatusBody, now: Date = new Date()): string {
  const lines = [
    `File ID: ${body.fileId}`,
    `Document: ${DOCUMENT_TYPE_NAMES[body.docType]}`,
    `Status: ${body.status}`,
    `Submitted: ${formatRelativeTime(body.createdAt, now)}`,
  ];

  if (body.processedAt) {
    lines.push(`Finished: ${formatRelativeTime(body.processedAt, now)}`);
  }
  if (body.failureReason) {
    lines.push(`Reason: ${body.failureReason}`);
  }
  if (body.sections) {
    const succeeded = body.sections.filter((section) => section.status === 'success').length;
    lines.push(`Sections: ${succeeded}/${body.sections.length} generated`);
  }
  if (body.fallbackSections && body.fallbackSections.length > 0) {
    lines.push(`Placeholders: ${body.fallbackSections.join(', ')}`);
  }

  return lines.join('\n');
}

export function registerStatusCommand(bot: Bot<QuillBotContext>, deps: BotDependencies): void {
  bot.command('status', async (ctx) => {
    const fileId = commandArgument(ctx.message?.text ?? '', 'status');
    console.log(`[status] /status received ${contextTag(ctx)} fileId=${fileId || '-'}`);

    if (!fileId) {
      await ctx.reply('Usage: /status <file id>');
      return;
    }

    const response = await deps.service.status(fileId);
    if (response.statusCode === 404) {
      await ctx.reply(`No document found for ${fileId}.`);
      return;
    }

    await ctx.reply(formatStatus(response.body));
  });
}
