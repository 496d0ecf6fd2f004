import { InputFile, type Bot } from 'grammy';
import type { ErrorBody } from '../../service/documentService.js';
import { commandArgument, contextTag } from '../format.js';
import type { BotDependencies, QuillBotContext } from '../types.js';

const DEFAULT_FORMAT = 'pdf';

function formatDownloadError(statusCode: number, body: ErrorBody): string {
  switch (statusCode) {
    case 400:
      return `${body.error}. Choose one of pdf, docx, html or json.`;
    case 404:
      return 'No document found for that file id.';
    case 409:
      return 'The document is still being generated. Try again shortly.';
    default:
      return body.reason ? `${body.error}: ${body.reason}` : body.error;
  }
}

export function registerDownloadCommand(bot: Bot<QuillBotContext>, deps: BotDependencies): void {
  bot.command('download', async (ctx) => {
    const [fileId, format = DEFAULT_FORMAT] = commandArgument(ctx.message?.text ?? '', 'download')
      .split(/\s+/)
      .filter(Boolean);
    console.log(`[download] /download received ${contextTag(ctx)} fileId=${fileId ?? '-'} format=${format}`);

    if (!fileId) {
      await ctx.reply('Usage: /download <file id> [pdf|docx|html|json]');
      return;
    }

    const response = await deps.service.download(fileId, format);
    if (response.statusCode !== 200) {
      await ctx.reply(formatDownloadError(response.statusCode, response.body));
      return;
    }

    const { artifact } = response;
    await ctx.replyWithDocument(new InputFile(artifact.data, artifact.filename));
  });
}
