import type { DocumentType, DocumentationLevel } from '../types.js';
import { DOCUMENT_TYPE_NAMES } from './sections.js';

const LEVEL_PERSONAS: Record<DocumentationLevel, string> = {
  simple:
    'You are Quill, a senior business analyst who writes clear, concise project documents that any stakeholder can act on.',
  intermediate:
    'You are Quill, a senior business analyst and strategy consultant who writes enterprise-grade project documents with business justification and implementation guidance.',
  advanced:
    'You are Quill, a principal business analyst who writes investment-grade project documents with strategic context, quantified risks and detailed implementation roadmaps.',
};

const LEVEL_LENGTH_TARGETS: Record<DocumentationLevel, string> = {
  simple: '120-250 words',
  intermediate: '250-500 words',
  advanced: '400-800 words',
};

export function buildSectionSystemPrompt(level: DocumentationLevel, docType: DocumentType): string {
  return [
    LEVEL_PERSONAS[level],
    `You write exactly one section of a ${DOCUMENT_TYPE_NAMES[docType]} at a time.`,
    'Stay faithful to the requirements you are given; mark anything you infer as an assumption.',
    'Write in English, in markdown, using short paragraphs, bullet lists and sub-headings (###) where useful.',
    'Never repeat the section title as a heading and never wrap the answer in code fences.',
  ].join('\n');
}

export interface SectionContext {
  requirements: string;
  projectName?: string;
  domain?: string;
  level: DocumentationLevel;
  docType: DocumentType;
}

export function buildSectionPrompt(input: {
  context: SectionContext;
  sectionTitle: string;
  rolePrompt: string;
}): string {
  const { context } = input;
  return [
    `Project: ${context.projectName ?? 'Not specified'}`,
    `Domain: ${context.domain ?? 'Not specified'}`,
    '',
    'Project requirements:',
    context.requirements,
    '',
    `Section to write: ${input.sectionTitle}`,
    'Section instructions:',
    input.rolePrompt,
    '',
    'Output requirements:',
    `- Length: ${LEVEL_LENGTH_TARGETS[context.level]}.`,
    '- Return the section body only, without its title.',
  ].join('\n');
}
