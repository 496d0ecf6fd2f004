import type { DocumentModel } from '../types.js';
import { buildOutline, type ContentBlock, type OutlineSection } from './outline.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

const STYLES = [
  'body { font-family: Georgia, serif; max-width: 48rem; margin: 2rem auto; line-height: 1.5; color: #222; }',
  'h1 { font-size: 1.8rem; margin-bottom: 0.25rem; }',
  '.subtitle { color: #666; margin-top: 0; }',
  'table { border-collapse: collapse; margin: 0.5rem 0; }',
  'th, td { border: 1px solid #ccc; padding: 0.25rem 0.5rem; text-align: left; }',
  '.section--placeholder { color: #777; font-style: italic; border-left: 3px solid #ccc; padding-left: 1rem; }',
].join('\n');

function markerNumber(marker: string): number | null {
  const value = Number.parseInt(marker, 10);
  return Number.isNaN(value) ? null : value;
}

function renderTable(header: string[], rows: string[][]): string[] {
  const cells = (tag: 'th' | 'td', row: string[]) =>
    row.map((cell) => `<${tag}>${escapeHtml(cell)}</${tag}>`).join('');
  const lines = ['    <table>'];
  if (header.length > 0) {
    lines.push(`      <thead><tr>${cells('th', header)}</tr></thead>`);
  }
  lines.push('      <tbody>');
  for (const row of rows) {
    lines.push(`        <tr>${cells('td', row)}</tr>`);
  }
  lines.push('      </tbody>', '    </table>');
  return lines;
}

function renderBlocks(blocks: ContentBlock[]): string[] {
  const lines: string[] = [];
  let openList: 'ul' | 'ol' | null = null;
  // Number the browser would give the next <li> of the open <ol>.
  let nextNumber = 1;

  const closeList = () => {
    if (openList) {
      lines.push(`    </${openList}>`);
      openList = null;
    }
  };

  for (const block of blocks) {
    if (block.kind === 'bullet') {
      const number = block.marker ? markerNumber(block.marker) : null;
      const listTag = block.marker ? 'ol' : 'ul';
      if (openList !== listTag) {
        closeList();
        const start = number !== null && number !== 1 ? ` start="${number}"` : '';
        lines.push(`    <${listTag}${start}>`);
        openList = listTag;
        nextNumber = number ?? 1;
      }

      const value = listTag === 'ol' && number !== null && number !== nextNumber ? ` value="${number}"` : '';
      lines.push(`      <li${value}>${escapeHtml(block.text)}</li>`);
      nextNumber = (number ?? nextNumber) + 1;
      continue;
    }

    closeList();
    if (block.kind === 'subheading') {
      lines.push(`    <h3>${escapeHtml(block.text)}</h3>`);
    } else if (block.kind === 'table') {
      lines.push(...renderTable(block.header, block.rows));
    } else {
      lines.push(`    <p>${escapeHtml(block.text)}</p>`);
    }
  }

  closeList();
  return lines;
}

function renderSection(section: OutlineSection): string[] {
  const classes = ['section', `section--${section.status.replace(/_/g, '-')}`];
  if (section.placeholder) classes.push('section--placeholder');

  return [
    `  <section id="section-${section.id}" class="${classes.join(' ')}" data-status="${section.status}">`,
    `    <h2>${escapeHtml(section.title)}</h2>`,
    ...renderBlocks(section.blocks),
    '  </section>',
  ];
}

export function renderHtml(document: DocumentModel): Buffer {
  const outline = buildOutline(document);
  const lines = [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '  <meta charset="utf-8">',
    `  <title>${escapeHtml(outline.title)}</title>`,
    `  <style>\n${STYLES}\n  </style>`,
    '</head>',
    '<body>',
    `  <h1>${escapeHtml(outline.title)}</h1>`,
    `  <p class="subtitle">${escapeHtml(outline.subtitle)}</p>`,
    ...outline.sections.flatMap(renderSection),
    '</body>',
    '</html>',
    '',
  ];
  return Buffer.from(lines.join('\n'), 'utf-8');
}
