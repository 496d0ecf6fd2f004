import { GenerationError } from '../errors.js';
import type { GenerationBackend } from '../llm/backend.js';
import type { SectionId, SectionSpec } from '../types.js';
import { buildSectionPrompt, buildSectionSystemPrompt, type SectionContext } from './prompts.js';
import { checkDegenerate } from './validators.js';

export interface ProduceOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface SectionAgent {
  readonly sectionId: SectionId;
  produce(context: SectionContext, options: ProduceOptions): Promise<string>;
}

function escapeRegExp(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Strips wrapping code fences and a leading heading that only repeats the section title. */
export function normalizeSectionText(raw: string, sectionTitle: string): string {
  let text = raw.replace(/\r\n/g, '\n').trim();

  const fenced = text.match(/^```[a-z]*\n([\s\S]*?)\n```$/i);
  if (fenced) {
    text = fenced[1].trim();
  }

  const titleHeading = new RegExp(`^#{1,6}\\s*${escapeRegExp(sectionTitle)}\\s*:?\\s*(?:\\n|$)`, 'i');
  text = text.replace(titleHeading, '').trim();

  return text;
}

class BackendSectionAgent implements SectionAgent {
  readonly sectionId: SectionId;

  constructor(
    private readonly backend: GenerationBackend,
    private readonly spec: SectionSpec,
  ) {
    this.sectionId = spec.id;
  }

  async produce(context: SectionContext, options: ProduceOptions): Promise<string> {
    const raw = await this.backend.generateText({
      system: buildSectionSystemPrompt(context.level, context.docType),
      prompt: buildSectionPrompt({
        context,
        sectionTitle: this.spec.title,
        rolePrompt: this.spec.rolePrompt,
      }),
      timeoutMs: options.timeoutMs,
      signal: options.signal,
    });

    const text = normalizeSectionText(raw, this.spec.title);
    const issue = checkDegenerate(text) ?? this.spec.validate(text);
    if (issue) {
      throw new GenerationError('invalid_output', `${this.spec.title}: ${issue}`);
    }
    return text;
  }
}

export function createSectionAgent(backend: GenerationBackend, spec: SectionSpec): SectionAgent {
  return new BackendSectionAgent(backend, spec);
}

/** Resolves the fixed section-to-agent mapping once, at startup. */
export function createSectionAgents(
  backend: GenerationBackend,
  specs: readonly SectionSpec[],
): Map<SectionId, SectionAgent> {
  return new Map(specs.map((spec) => [spec.id, createSectionAgent(backend, spec)]));
}
