import type { PdfPageSize } from '../config.js';
import { ExportError } from '../errors.js';
import type { DocumentModel, ExportArtifact, ExportFormat } from '../types.js';
import { renderDocx } from './docx.js';
import { renderHtml } from './html.js';
import { renderJson } from './json.js';
import { renderPdf } from './pdf.js';

export interface ExportSettings {
  pdfPageSize: PdfPageSize;
}

export type Renderer = (document: DocumentModel, settings: ExportSettings) => Buffer | Promise<Buffer>;

interface FormatDescriptor {
  contentType: string;
  extension: string;
}

export const FORMAT_DESCRIPTORS: Record<ExportFormat, FormatDescriptor> = {
  pdf: { contentType: 'application/pdf', extension: 'pdf' },
  docx: {
    contentType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
    extension: 'docx',
  },
  html: { contentType: 'text/html; charset=utf-8', extension: 'html' },
  json: { contentType: 'application/json', extension: 'json' },
};

export const DEFAULT_RENDERERS: Record<ExportFormat, Renderer> = {
  json: (document) => renderJson(document),
  html: (document) => renderHtml(document),
  pdf: (document, settings) => renderPdf(document, { pageSize: settings.pdfPageSize }),
  docx: (document) => renderDocx(document),
};

export function isExportFormat(value: string): value is ExportFormat {
  return Object.prototype.hasOwnProperty.call(FORMAT_DESCRIPTORS, value);
}

export function exportFilename(fileId: string, format: ExportFormat): string {
  return `documentation_${fileId}.${FORMAT_DESCRIPTORS[format].extension}`;
}

/**
 * Renders stored documents on demand. Each renderer gets its own copy of the
 * model, and a failing renderer only fails its own format.
 */
export class ExportEngine {
  private readonly renderers: Record<ExportFormat, Renderer>;

  constructor(
    private readonly settings: ExportSettings,
    renderers: Partial<Record<ExportFormat, Renderer>> = {},
  ) {
    this.renderers = { ...DEFAULT_RENDERERS, ...renderers };
  }

  async render(document: DocumentModel, format: ExportFormat): Promise<ExportArtifact> {
    const descriptor = FORMAT_DESCRIPTORS[format];

    try {
      const data = await this.renderers[format](structuredClone(document), this.settings);
      return {
        format,
        contentType: descriptor.contentType,
        filename: exportFilename(document.fileId, format),
        data,
      };
    } catch (error) {
      const exportError = new ExportError(format, error);
      console.error(`[export] ${document.fileId}: ${exportError.message}`);
      throw exportError;
    }
  }
}
