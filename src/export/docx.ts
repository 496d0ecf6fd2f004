import {
  Document,
  HeadingLevel,
  Packer,
  Paragraph,
  Table,
  TableCell,
  TableRow,
  TextRun,
  WidthType,
} from 'docx';
import type { DocumentModel } from '../types.js';
import { buildOutline, type OutlineSection } from './outline.js';

const PLACEHOLDER_COLOR = '888888';
const MUTED_COLOR = '666666';

function bodyRun(text: string, placeholder: boolean): TextRun {
  return new TextRun({
    text,
    italics: placeholder,
    color: placeholder ? PLACEHOLDER_COLOR : undefined,
  });
}

function tableRow(cells: string[], columns: number, placeholder: boolean, header: boolean): TableRow {
  const padded = [...cells, ...Array<string>(Math.max(0, columns - cells.length)).fill('')];
  return new TableRow({
    tableHeader: header,
    children: padded.map(
      (cell) =>
        new TableCell({
          children: [
            new Paragraph({
              children: [new TextRun({ text: cell, bold: header, italics: placeholder })],
            }),
          ],
        }),
    ),
  });
}

function sectionTable(header: string[], rows: string[][], placeholder: boolean): Table {
  const columns = Math.max(header.length, ...rows.map((row) => row.length));
  return new Table({
    width: { size: 100, type: WidthType.PERCENTAGE },
    rows: [
      ...(header.length > 0 ? [tableRow(header, columns, placeholder, true)] : []),
      ...rows.map((row) => tableRow(row, columns, placeholder, false)),
    ],
  });
}

function sectionParagraphs(section: OutlineSection): Array<Paragraph | Table> {
  const paragraphs: Array<Paragraph | Table> = [
    new Paragraph({ text: section.title, heading: HeadingLevel.HEADING_1 }),
  ];

  for (const block of section.blocks) {
    if (block.kind === 'subheading') {
      paragraphs.push(new Paragraph({ text: block.text, heading: HeadingLevel.HEADING_2 }));
    } else if (block.kind === 'table') {
      paragraphs.push(sectionTable(block.header, block.rows, section.placeholder));
    } else if (block.kind === 'bullet' && block.marker === null) {
      paragraphs.push(
        new Paragraph({ children: [bodyRun(block.text, section.placeholder)], bullet: { level: 0 } }),
      );
    } else if (block.kind === 'bullet') {
      paragraphs.push(
        new Paragraph({
          children: [bodyRun(`${block.marker} ${block.text}`, section.placeholder)],
          indent: { left: 360 },
        }),
      );
    } else {
      paragraphs.push(new Paragraph({ children: [bodyRun(block.text, section.placeholder)] }));
    }
  }

  return paragraphs;
}

/** Word handles pagination, so long sections need no special treatment here. */
export async function renderDocx(document: DocumentModel): Promise<Buffer> {
  const outline = buildOutline(document);

  const doc = new Document({
    creator: 'Quill',
    title: outline.title,
    description: outline.subtitle,
    sections: [
      {
        children: [
          new Paragraph({ text: outline.title, heading: HeadingLevel.TITLE }),
          new Paragraph({ children: [new TextRun({ text: outline.subtitle, color: MUTED_COLOR })] }),
          ...outline.sections.flatMap(sectionParagraphs),
        ],
      },
    ],
  });

  return Packer.toBuffer(doc);
}
