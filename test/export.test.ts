import JSZip from 'jszip';
import { describe, expect, it } from 'vitest';
import { buildPlaceholder, SECTION_SPECS } from '../src/agents/sections.js';
import { ExportError } from '../src/errors.js';
import { renderDocx } from '../src/export/docx.js';
import { ExportEngine, exportFilename } from '../src/export/engine.js';
import { escapeHtml, renderHtml } from '../src/export/html.js';
import { parseDocumentJson, renderJson } from '../src/export/json.js';
import { buildOutline, parseContentBlocks, stripInlineMarkup } from '../src/export/outline.js';
import { renderPdf, toPdfText } from '../src/export/pdf.js';
import type { DocumentModel, SectionResult } from '../src/types.js';
import { validSectionText } from './helpers.js';

const FILE_ID = '3f1c2d9e-8b7a-4c6d-9e0f-1a2b3c4d5e6f';
const SECTION_TITLES = SECTION_SPECS.map((spec) => spec.title);

function sampleDocument(overrides: Partial<DocumentModel> = {}): DocumentModel {
  const sections: SectionResult[] = SECTION_SPECS.map((spec) => ({
    id: spec.id,
    title: spec.title,
    ordinal: spec.ordinal,
    required: spec.required,
    status: 'success',
    content: validSectionText(spec.title),
    latencyMs: 10,
    retryCount: 0,
  }));
  sections[5] = {
    ...sections[5],
    status: 'failed_fallback',
    content: buildPlaceholder(SECTION_SPECS[5]),
    retryCount: 1,
    failureReason: 'Generation timed out after 90000ms',
  };

  return {
    fileId: FILE_ID,
    title: 'Business Requirements Document - Ledgerly',
    docType: 'brd',
    level: 'intermediate',
    generatedAt: '2026-03-02T09:30:00.000Z',
    complete: true,
    sections,
    stats: { wordCount: 480, successCount: 8, fallbackCount: 1, durationMs: 5_300 },
    ...overrides,
  };
}

function htmlHeadings(html: string): string[] {
  return [...html.matchAll(/<h2>([^<]*)<\/h2>/g)].map((match) => match[1]);
}

function pdfBookmarks(pdf: Buffer, documentTitle: string): string[] {
  return [...pdf.toString('latin1').matchAll(/\/Title \(([^)]*)\)/g)]
    .map((match) => match[1])
    .filter((title) => title !== documentTitle);
}

const BUDGET_TABLE = [
  '| Item | Cost |',
  '|---|---|',
  '| Hosting | **$1,200** |',
  '| Support | $800 |',
  'Total is indicative.',
].join('\n');

async function docxXml(docx: Buffer): Promise<string> {
  const zip = await JSZip.loadAsync(docx);
  const entry = zip.file('word/document.xml');
  if (!entry) throw new Error('word/document.xml missing');
  return entry.async('string');
}

async function docxHeadings(docx: Buffer): Promise<string[]> {
  const xml = await docxXml(docx);

  return [...xml.matchAll(/<w:p(?:\s[^>]*)?>([\s\S]*?)<\/w:p>/g)]
    .map((match) => match[1])
    .filter((paragraph) => paragraph.includes('w:val="Heading1"'))
    .map((paragraph) =>
      [...paragraph.matchAll(/<w:t(?:\s[^>]*)?>([^<]*)<\/w:t>/g)].map((text) => text[1]).join(''),
    );
}

describe('outline', () => {
  it('splits markdown content into blocks without inline markup', () => {
    const content = [
      '### Functional',
      '- **Secure** login with `2FA`',
      '1. Phase one',
      'Plain text line',
      'continues here.',
      '',
      'Second [docs](https://example.com) para.',
    ].join('\n');

    expect(parseContentBlocks(content)).toEqual([
      { kind: 'subheading', text: 'Functional' },
      { kind: 'bullet', marker: null, text: 'Secure login with 2FA' },
      { kind: 'bullet', marker: '1.', text: 'Phase one' },
      { kind: 'paragraph', text: 'Plain text line continues here.' },
      { kind: 'paragraph', text: 'Second docs (https://example.com) para.' },
    ]);
  });

  it('keeps table rows as cells instead of one line of pipes', () => {
    expect(parseContentBlocks(BUDGET_TABLE)).toEqual([
      {
        kind: 'table',
        header: ['Item', 'Cost'],
        rows: [
          ['Hosting', '$1,200'],
          ['Support', '$800'],
        ],
      },
      { kind: 'paragraph', text: 'Total is indicative.' },
    ]);
  });

  it('treats a table without a separator row as body rows only', () => {
    expect(parseContentBlocks('| Q1 | Discovery |\n| Q2 | Build |')).toEqual([
      { kind: 'table', header: [], rows: [['Q1', 'Discovery'], ['Q2', 'Build']] },
    ]);
  });

  it('strips single emphasis markers', () => {
    expect(stripInlineMarkup('An *important* note and __bold__ text')).toBe('An important note and bold text');
  });

  it('marks fallback sections as placeholders', () => {
    const outline = buildOutline(sampleDocument());

    expect(outline.subtitle).toBe('Generated on 2026-03-02 · Intermediate level');
    expect(outline.sections.map((section) => section.placeholder)).toEqual([
      false, false, false, false, false, true, false, false, false,
    ]);
  });
});

describe('json export', () => {
  it('round-trips the document model', () => {
    const document = sampleDocument();

    expect(parseDocumentJson(renderJson(document))).toEqual(document);
  });

  it('rejects JSON that is not a document model', () => {
    expect(() => parseDocumentJson('{"fileId": "x"}')).toThrow();
  });
});

describe('html export', () => {
  it('escapes markup in titles and content', () => {
    const document = sampleDocument({ title: 'Business Requirements Document - <Acme> & Co' });
    document.sections[0] = { ...document.sections[0], content: 'Costs < 5k & "fast" delivery' };

    const html = renderHtml(document).toString('utf-8');

    expect(html).toContain('<title>Business Requirements Document - &lt;Acme&gt; &amp; Co</title>');
    expect(html).toContain('<h1>Business Requirements Document - &lt;Acme&gt; &amp; Co</h1>');
    expect(html).toContain('<p>Costs &lt; 5k &amp; &quot;fast&quot; delivery</p>');
  });

  it('gives fallback sections a placeholder class', () => {
    const html = renderHtml(sampleDocument()).toString('utf-8');

    expect(html).toContain(
      '<section id="section-budget" class="section section--failed-fallback section--placeholder" data-status="failed_fallback">',
    );
    expect(html).toContain('<section id="section-timeline" class="section section--success" data-status="success">');
  });

  it('renders ordered items as an ordered list', () => {
    const html = renderHtml(sampleDocument()).toString('utf-8');

    expect(html).toContain('      <li>Phase 1 discovery workshop with finance stakeholders and compliance reviewers</li>');
    expect(html).toContain('    <ol>');
  });

  it('continues numbering when a list is split by a sub-heading', () => {
    const document = sampleDocument();
    document.sections[4] = {
      ...document.sections[4],
      content: '### Phase A\n1. Discovery\n2. Design\n### Phase B\n3. Build\n4. Launch',
    };

    const html = renderHtml(document).toString('utf-8');

    expect(html).toContain(
      [
        '    <h3>Phase A</h3>',
        '    <ol>',
        '      <li>Discovery</li>',
        '      <li>Design</li>',
        '    </ol>',
        '    <h3>Phase B</h3>',
        '    <ol start="3">',
        '      <li>Build</li>',
        '      <li>Launch</li>',
        '    </ol>',
      ].join('\n'),
    );
  });

  it('keeps skipped numbers inside one list', () => {
    const document = sampleDocument();
    document.sections[4] = { ...document.sections[4], content: '1. Kickoff\n3. Review' };

    const html = renderHtml(document).toString('utf-8');

    expect(html).toContain('    <ol>\n      <li>Kickoff</li>\n      <li value="3">Review</li>\n    </ol>');
  });

  it('renders markdown tables as tables', () => {
    const document = sampleDocument();
    document.sections[5] = { ...document.sections[5], status: 'success', content: BUDGET_TABLE };

    const html = renderHtml(document).toString('utf-8');

    expect(html).toContain('      <thead><tr><th>Item</th><th>Cost</th></tr></thead>');
    expect(html).toContain('        <tr><td>Hosting</td><td>$1,200</td></tr>');
    expect(html).toContain('    </table>\n    <p>Total is indicative.</p>');
  });

  it('escapes quotes and ampersands', () => {
    expect(escapeHtml(`Tom & "Jerry" <'cat'>`)).toBe('Tom &amp; &quot;Jerry&quot; &lt;&#39;cat&#39;&gt;');
  });
});

describe('cross-format structure', () => {
  it('exposes the same ordered section headings in every format', async () => {
    const document = sampleDocument();

    const [pdf, docx] = await Promise.all([renderPdf(document, { pageSize: 'LETTER' }), renderDocx(document)]);

    expect(htmlHeadings(renderHtml(document).toString('utf-8'))).toEqual(SECTION_TITLES);
    expect(parseDocumentJson(renderJson(document)).sections.map((section) => section.title)).toEqual(
      SECTION_TITLES,
    );
    expect(pdfBookmarks(pdf, document.title)).toEqual(SECTION_TITLES);
    expect(await docxHeadings(docx)).toEqual(SECTION_TITLES);
  });

  it('flows long sections over several PDF pages', async () => {
    const longContent = Array.from(
      { length: 120 },
      (_, index) => `Paragraph ${index + 1} describes another reconciliation rule for invoices and payouts.\n`,
    ).join('\n');
    const document = sampleDocument();
    document.sections[3] = { ...document.sections[3], content: longContent };

    const pdf = await renderPdf(document, { pageSize: 'A4' });
    const pages = pdf.toString('latin1').match(/\/Type \/Page[^s]/g) ?? [];

    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(pages.length).toBeGreaterThan(1);
    expect(pdfBookmarks(pdf, document.title)).toEqual(SECTION_TITLES);
  });

  it('renders text formats byte-for-byte the same on repeated calls', () => {
    const document = sampleDocument();

    expect(renderJson(document).equals(renderJson(document))).toBe(true);
    expect(renderHtml(document).equals(renderHtml(document))).toBe(true);
  });
});

describe('pdf text', () => {
  it('spells out characters the standard fonts cannot encode', () => {
    expect(toPdfText('AB東京→C')).toBe('AB[U+6771][U+4EAC]->C');
    expect(toPdfText('🚀 Launch ✓ ≥ 99%')).toBe('[U+1F680] Launch [x] >= 99%');
  });

  it('keeps Latin-1 and Windows-1252 punctuation as written', () => {
    expect(toPdfText('Café – “ok” €5 · 10×')).toBe('Café – “ok” €5 · 10×');
  });

  it('drops invisible joiners and variation selectors', () => {
    expect(toPdfText('Ready\u200d\ufe0f now')).toBe('Ready now');
  });

  it('renders non-Latin content and tables without failing', async () => {
    const document = sampleDocument();
    document.sections[0] = { ...document.sections[0], content: '東京 office → launch ✓' };
    document.sections[5] = { ...document.sections[5], content: BUDGET_TABLE };

    const pdf = await renderPdf(document, { pageSize: 'A4' });

    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    expect(pdfBookmarks(pdf, document.title)).toEqual(SECTION_TITLES);
  });
});

describe('docx tables', () => {
  it('writes markdown tables as Word tables', async () => {
    const document = sampleDocument();
    document.sections[5] = { ...document.sections[5], status: 'success', content: BUDGET_TABLE };

    const xml = await docxXml(await renderDocx(document));

    expect(xml).toMatch(/<w:tbl[\s>]/);
    expect(xml).toContain('>Hosting</w:t>');
    expect(xml).toContain('>$1,200</w:t>');
  });
});

describe('ExportEngine', () => {
  it('labels artifacts with their content type and file name', async () => {
    const engine = new ExportEngine({ pdfPageSize: 'LETTER' });
    const document = sampleDocument();

    const html = await engine.render(document, 'html');
    const json = await engine.render(document, 'json');
    const docx = await engine.render(document, 'docx');

    expect(html).toMatchObject({ format: 'html', contentType: 'text/html; charset=utf-8', filename: `documentation_${FILE_ID}.html` });
    expect(json.contentType).toBe('application/json');
    expect(docx.contentType).toBe('application/vnd.openxmlformats-officedocument.wordprocessingml.document');
    expect(exportFilename(FILE_ID, 'pdf')).toBe(`documentation_${FILE_ID}.pdf`);
  });

  it('confines a renderer failure to its own format', async () => {
    const engine = new ExportEngine(
      { pdfPageSize: 'LETTER' },
      {
        pdf: () => {
          throw new Error('font missing');
        },
      },
    );
    const document = sampleDocument();
    const before = structuredClone(document);

    const failure = await engine.render(document, 'pdf').catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ExportError);
    expect(failure).toMatchObject({ format: 'pdf', message: 'Failed to render pdf export: font missing' });
    await expect(engine.render(document, 'html')).resolves.toMatchObject({ format: 'html' });
    expect(document).toEqual(before);
  });

  it('hands renderers a copy of the model', async () => {
    const engine = new ExportEngine(
      { pdfPageSize: 'LETTER' },
      {
        json: (copy) => {
          copy.sections.length = 0;
          return Buffer.from('{}');
        },
      },
    );
    const document = sampleDocument();

    await engine.render(document, 'json');

    expect(document.sections).toHaveLength(9);
  });
});
