import PDFDocument from 'pdfkit';
import type { PdfPageSize } from '../config.js';
import type { DocumentModel } from '../types.js';
import { buildOutline, type OutlineSection } from './outline.js';

export interface PdfRenderOptions {
  pageSize: PdfPageSize;
}

const FONTS = {
  regular: 'Helvetica',
  bold: 'Helvetica-Bold',
  italic: 'Helvetica-Oblique',
};

// Code points outside Latin-1 that the standard fonts' WinAnsi encoding still covers.
const WIN_ANSI_EXTRAS = new Set(
  '€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ'.split('').map((char) => char.codePointAt(0)),
);

const SUBSTITUTES: Record<string, string> = {
  '→': '->',
  '←': '<-',
  '↔': '<->',
  '⇒': '=>',
  '≥': '>=',
  '≤': '<=',
  '≠': '!=',
  '≈': '~',
  '−': '-',
  '✓': '[x]',
  '✔': '[x]',
  '✗': '[ ]',
  '✘': '[ ]',
  '★': '*',
  '\u2009': ' ',
  '\u202f': ' ',
};

const INVISIBLE = /[\u200b-\u200d\ufe0e\ufe0f]/g;

function isWinAnsi(codePoint: number): boolean {
  return (
    codePoint === 0x09 ||
    codePoint === 0x0a ||
    (codePoint >= 0x20 && codePoint <= 0x7e) ||
    (codePoint >= 0xa0 && codePoint <= 0xff) ||
    WIN_ANSI_EXTRAS.has(codePoint)
  );
}

/**
 * The standard PDF fonts only encode WinAnsi. Common symbols get an ASCII
 * spelling; anything else is written as its code point, e.g. `[U+6771]`.
 */
export function toPdfText(text: string): string {
  let out = '';
  for (const char of text.replace(INVISIBLE, '')) {
    const codePoint = char.codePointAt(0) ?? 0;
    if (isWinAnsi(codePoint)) {
      out += char;
    } else {
      out += SUBSTITUTES[char] ?? `[U+${codePoint.toString(16).toUpperCase().padStart(4, '0')}]`;
    }
  }
  return out;
}

const COLORS = {
  text: '#222222',
  muted: '#666666',
  placeholder: '#888888',
};

/** Tables are drawn one row per line with the cells separated by bars. */
function drawTable(
  doc: PDFKit.PDFDocument,
  header: string[],
  rows: string[][],
  bodyFont: string,
  bodyColor: string,
): void {
  const line = (cells: string[]) => toPdfText(cells.join('  |  '));
  if (header.length > 0) {
    doc.font(FONTS.bold).fontSize(10.5).fillColor(bodyColor).text(line(header), { indent: 12, paragraphGap: 2 });
  }
  doc.font(bodyFont).fontSize(10.5).fillColor(bodyColor);
  for (const row of rows) {
    doc.text(line(row), { indent: 12, paragraphGap: 2 });
  }
  doc.moveDown(0.3);
}

function drawSection(doc: PDFKit.PDFDocument, section: OutlineSection): void {
  doc.outline.addItem(section.title);
  doc.moveDown(0.8);
  doc.font(FONTS.bold).fontSize(14).fillColor(COLORS.text).text(toPdfText(section.title));
  doc.moveDown(0.3);

  const bodyFont = section.placeholder ? FONTS.italic : FONTS.regular;
  const bodyColor = section.placeholder ? COLORS.placeholder : COLORS.text;

  for (const block of section.blocks) {
    if (block.kind === 'subheading') {
      doc.moveDown(0.3);
      doc.font(FONTS.bold).fontSize(11.5).fillColor(bodyColor).text(toPdfText(block.text));
      continue;
    }

    if (block.kind === 'table') {
      drawTable(doc, block.header, block.rows, bodyFont, bodyColor);
      continue;
    }

    doc.font(bodyFont).fontSize(10.5).fillColor(bodyColor);
    if (block.kind === 'bullet') {
      doc.text(toPdfText(`${block.marker ?? '•'} ${block.text}`), { indent: 12, paragraphGap: 2 });
    } else {
      doc.text(toPdfText(block.text), { paragraphGap: 6 });
    }
  }
}

/**
 * Long sections simply flow onto new pages. The creation date is pinned to the
 * document's generation time so renders of one model are identical.
 */
export function renderPdf(document: DocumentModel, options: PdfRenderOptions): Promise<Buffer> {
  const outline = buildOutline(document);

  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({
      size: options.pageSize,
      margin: 64,
      info: {
        Title: outline.title,
        Author: 'Quill',
        Creator: 'Quill',
        Producer: 'Quill',
        CreationDate: new Date(document.generatedAt),
      },
    });

    const chunks: Buffer[] = [];
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);

    try {
      doc.font(FONTS.bold).fontSize(20).fillColor(COLORS.text).text(toPdfText(outline.title));
      doc.moveDown(0.2);
      doc.font(FONTS.regular).fontSize(10).fillColor(COLORS.muted).text(toPdfText(outline.subtitle));

      for (const section of outline.sections) {
        drawSection(doc, section);
      }

      doc.end();
    } catch (error) {
      reject(error);
    }
  });
}
