import { documentModelSchema } from '../registry/schemas.js';
import type { DocumentModel } from '../types.js';

export function renderJson(document: DocumentModel): Buffer {
  return Buffer.from(`${JSON.stringify(document, null, 2)}\n`, 'utf-8');
}

/** Reads a JSON export back into a validated document model. */
export function parseDocumentJson(input: string | Buffer): DocumentModel {
  const text = typeof input === 'string' ? input : input.toString('utf-8');
  return documentModelSchema.parse(JSON.parse(text));
}
