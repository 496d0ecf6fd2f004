import type { Context } from 'grammy';
import type { DocumentService } from '../service/documentService.js';

export type QuillBotContext = Context;

export interface BotDependencies {
  token: string;
  service: DocumentService;
}
