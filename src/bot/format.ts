import { DOCUMENT_TYPES, type DocumentType } from '../types.js';
import type { QuillBotContext } from './types.js';

export function contextTag(ctx: QuillBotContext): string {
  const chatId = ctx.chat?.id ?? 'unknown';
  const userId = ctx.from?.id ?? 'unknown';
  return `chat=${chatId} user=${userId}`;
}

export function formatRelativeTime(isoDate: string, now: Date = new Date()): string {
  const diff = now.getTime() - new Date(isoDate).getTime();
  const minutes = Math.floor(diff / 60_000);
  if (minutes < 1) return 'just now';
  if (minutes < 60) return `${minutes}m ago`;
  const hours = Math.floor(minutes / 60);
  if (hours < 24) return `${hours}h ago`;
  const days = Math.floor(hours / 24);
  return `${days}d ago`;
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

/** Strips the command (and an optional @botname suffix) from a message. */
export function commandArgument(text: string, command: string): string {
  return text.replace(new RegExp(`^/${command}(@\\w+)?`, 'i'), '').trim();
}

function isDocumentType(value: string): value is DocumentType {
  return DOCUMENT_TYPES.some((docType) => docType === value);
}

/** Splits an optional leading document type ("sow", "frd", "brd") off a message. */
export function splitDocumentType(text: string): { docType?: DocumentType; rest: string } {
  const match = text.match(/^(\w+)(?:\s+([\s\S]*))?$/);
  const candidate = match?.[1].toLowerCase() ?? '';
  if (!isDocumentType(candidate)) return { rest: text };
  return { docType: candidate, rest: (match?.[2] ?? '').trim() };
}
