import type { Bot } from 'grammy';
import { ValidationError } from '../../errors.js';
import { sendDocumentSettledNotification } from '../notifications.js';
import type { DocumentType } from '../../types.js';
import { commandArgument, contextTag, splitDocumentType, truncate } from '../format.js';
import type { BotDependencies, QuillBotContext } from '../types.js';

const ACCEPTED_EXTENSIONS = /\.(txt|md|markdown)$/i;
const MAX_UPLOAD_BYTES = 512 * 1024;

interface ChatSubmission {
  requirements: string;
  projectName?: string;
  originalFilename?: string;
  docType?: DocumentType;
}

function formatAccepted(fileId: string): string {
  return [
    'Requirements received. Generating your document now.',
    `File ID: ${fileId}`,
    '',
    `Check progress with /status ${fileId}. I will message you when it is done.`,
  ].join('\n');
}

function formatValidationError(error: ValidationError): string {
  return [
    'I could not accept those requirements:',
    ...error.issues.map((issue) => `- ${issue.message}`),
  ].join('\n');
}

async function submitFromChat(
  ctx: QuillBotContext,
  deps: BotDependencies,
  submission: ChatSubmission,
): Promise<void> {
  const chatId = ctx.chat?.id;
  if (chatId === undefined) return;

  try {
    const result = await deps.service.submit(submission, {
      onSettled: (session) =>
        sendDocumentSettledNotification({ api: ctx.api, chatId, session }),
    });
    console.log(`[new] accepted ${contextTag(ctx)} fileId=${result.fileId}`);
    await ctx.reply(formatAccepted(result.fileId));
  } catch (error) {
    if (error instanceof ValidationError) {
      console.log(`[new] rejected ${contextTag(ctx)} ${error.message}`);
      await ctx.reply(formatValidationError(error));
      return;
    }
    throw error;
  }
}

async function downloadTelegramFile(token: string, filePath: string): Promise<string> {
  const response = await fetch(`https://api.telegram.org/file/bot${token}/${filePath}`);
  if (!response.ok) {
    throw new Error(`Telegram file download failed with HTTP ${response.status}`);
  }
  return response.text();
}

export function registerNewCommand(bot: Bot<QuillBotContext>, deps: BotDependencies): void {
  bot.command('new', async (ctx) => {
    const { docType, rest: requirements } = splitDocumentType(commandArgument(ctx.message?.text ?? '', 'new'));
    if (!requirements) {
      console.log(`[new] missing requirements ${contextTag(ctx)}`);
      await ctx.reply('Usage: /new [brd|sow|frd] <project requirements>\nOr upload a .txt or .md file.');
      return;
    }

    console.log(
      `[new] /new received ${contextTag(ctx)} type=${docType ?? 'default'} text="${truncate(requirements.replace(/\s+/g, ' '), 80)}"`,
    );
    await submitFromChat(ctx, deps, { requirements, docType });
  });

  bot.on('message:document', async (ctx) => {
    const upload = ctx.message.document;
    const filename = upload.file_name ?? 'requirements.txt';

    if (!ACCEPTED_EXTENSIONS.test(filename)) {
      await ctx.reply('Please upload requirements as a .txt or .md file.');
      return;
    }
    if ((upload.file_size ?? 0) > MAX_UPLOAD_BYTES) {
      await ctx.reply(`That file is too large. The limit is ${MAX_UPLOAD_BYTES / 1024} KB.`);
      return;
    }

    console.log(`[new] upload received ${contextTag(ctx)} file="${filename}"`);
    const file = await ctx.getFile();
    if (!file.file_path) {
      await ctx.reply('Telegram did not return a download path for that file. Please try again.');
      return;
    }

    const requirements = await downloadTelegramFile(deps.token, file.file_path);
    const caption = splitDocumentType(ctx.message.caption?.trim() ?? '');
    await submitFromChat(ctx, deps, {
      requirements,
      originalFilename: filename,
      projectName: caption.rest || undefined,
      docType: caption.docType,
    });
  });
}
