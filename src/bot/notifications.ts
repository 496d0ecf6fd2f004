import type { Api } from 'grammy';
import { buildDocumentTitle } from '../pipeline/assembler.js';
import type { Session } from '../types.js';
import { truncate } from './format.js';

export interface DocumentNotificationInput {
  api: Api;
  chatId: number | string;
  session: Session;
}

export function formatReadyMessage(session: Session): string {
  const fallbacks = session.sectionStatuses.filter((section) => section.status === 'failed_fallback');
  const lines = [
    `✅ Document ready: ${buildDocumentTitle(session.metadata)}`,
    `File ID: ${session.fileId}`,
  ];

  if (fallbacks.length > 0) {
    lines.push('');
    lines.push(`⚠️ ${fallbacks.length} section(s) could not be generated and contain a placeholder:`);
    for (const section of fallbacks) {
      lines.push(`- ${section.title}`);
    }
  }

  lines.push('');
  lines.push(`Use /download ${session.fileId} <pdf|docx|html|json> to get a copy.`);
  return lines.join('\n');
}

export function formatFailedMessage(session: Session): string {
  return [
    `❌ Document generation failed: ${buildDocumentTitle(session.metadata)}`,
    `File ID: ${session.fileId}`,
    `Reason: ${truncate(session.failureReason ?? 'unknown', 300)}`,
  ].join('\n');
}

export async function sendDocumentSettledNotification(input: DocumentNotificationInput): Promise<void> {
  const message =
    input.session.status === 'ready'
      ? formatReadyMessage(input.session)
      : formatFailedMessage(input.session);
  await input.api.sendMessage(input.chatId, message);
}
