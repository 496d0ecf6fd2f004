import type { DocumentModel, SectionId, SectionStatus } from '../types.js';

export type ContentBlock =
  | { kind: 'subheading'; text: string }
  | { kind: 'paragraph'; text: string }
  | { kind: 'bullet'; text: string; marker: string | null }
  | { kind: 'table'; header: string[]; rows: string[][] };

export interface OutlineSection {
  id: SectionId;
  title: string;
  status: SectionStatus;
  placeholder: boolean;
  blocks: ContentBlock[];
}

export interface DocumentOutline {
  title: string;
  subtitle: string;
  sections: OutlineSection[];
}

const LEVEL_LABELS: Record<DocumentModel['level'], string> = {
  simple: 'Simple',
  intermediate: 'Intermediate',
  advanced: 'Advanced',
};

/** Drops markdown emphasis and code markers, and turns links into "text (url)". */
export function stripInlineMarkup(text: string): string {
  return text
    .replace(/\[([^\]]+)\]\(([^)\s]+)\)/g, '$1 ($2)')
    .replace(/(\*\*|__)(.+?)\1/g, '$2')
    .replace(/(^|[^\w*])\*(?!\s)([^*]+?)\*(?!\w)/g, '$1$2')
    .replace(/`([^`]+)`/g, '$1')
    .trim();
}

const TABLE_SEPARATOR = /^\|?\s*:?-{2,}:?\s*(\|\s*:?-{2,}:?\s*)*\|?$/;

function splitTableRow(line: string): string[] {
  return line
    .replace(/^\|/, '')
    .replace(/\|$/, '')
    .split('|')
    .map((cell) => stripInlineMarkup(cell));
}

/** A header row is only recognised when a `|---|` separator follows it. */
function toTableBlock(lines: string[]): ContentBlock {
  const hasHeader = lines.length > 1 && TABLE_SEPARATOR.test(lines[1]);
  const header = hasHeader ? splitTableRow(lines[0]) : [];
  const rows = lines
    .slice(hasHeader ? 2 : 0)
    .filter((line) => !TABLE_SEPARATOR.test(line))
    .map(splitTableRow);
  return { kind: 'table', header, rows };
}

export function parseContentBlocks(content: string): ContentBlock[] {
  const blocks: ContentBlock[] = [];
  let paragraph: string[] = [];
  let table: string[] = [];

  const flushParagraph = () => {
    if (paragraph.length === 0) return;
    const text = stripInlineMarkup(paragraph.join(' '));
    if (text) blocks.push({ kind: 'paragraph', text });
    paragraph = [];
  };

  const flushTable = () => {
    if (table.length === 0) return;
    blocks.push(toTableBlock(table));
    table = [];
  };

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.startsWith('|')) {
      flushParagraph();
      table.push(line);
      continue;
    }
    flushTable();

    if (!line) {
      flushParagraph();
      continue;
    }

    const heading = line.match(/^#{1,6}\s+(.+)$/);
    if (heading) {
      flushParagraph();
      blocks.push({ kind: 'subheading', text: stripInlineMarkup(heading[1]) });
      continue;
    }

    const ordered = line.match(/^(\d+)[.)]\s+(.+)$/);
    if (ordered) {
      flushParagraph();
      blocks.push({ kind: 'bullet', marker: `${ordered[1]}.`, text: stripInlineMarkup(ordered[2]) });
      continue;
    }

    const bullet = line.match(/^[-*+•]\s+(.+)$/);
    if (bullet) {
      flushParagraph();
      blocks.push({ kind: 'bullet', marker: null, text: stripInlineMarkup(bullet[1]) });
      continue;
    }

    paragraph.push(line);
  }

  flushTable();
  flushParagraph();
  return blocks;
}

/** The structure every non-JSON renderer draws, so all formats share one section list. */
export function buildOutline(document: DocumentModel): DocumentOutline {
  const sections = [...document.sections]
    .sort((a, b) => a.ordinal - b.ordinal)
    .map((section) => ({
      id: section.id,
      title: section.title,
      status: section.status,
      placeholder: section.status !== 'success',
      blocks: parseContentBlocks(section.content),
    }));

  return {
    title: document.title,
    subtitle: `Generated on ${document.generatedAt.slice(0, 10)} · ${LEVEL_LABELS[document.level]} level`,
    sections,
  };
}
