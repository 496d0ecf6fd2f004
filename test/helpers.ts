import type { SectionContext } from '../src/agents/prompts.js';
import type { ProduceOptions, SectionAgent } from '../src/agents/sectionAgent.js';
import { ALL_SECTION_SPECS, SECTION_SETS, SECTION_SPECS } from '../src/agents/sections.js';
import type { QuillConfig } from '../src/config.js';
import { ExportEngine, type Renderer } from '../src/export/engine.js';
import type { GenerateTextInput, GenerationBackend } from '../src/llm/backend.js';
import { DocumentAssembler } from '../src/pipeline/assembler.js';
import { Orchestrator, type OrchestratorSettings } from '../src/pipeline/orchestrator.js';
import { SessionRegistry } from '../src/registry/sessionRegistry.js';
import { DocumentService } from '../src/service/documentService.js';
import { createMemoryStore, type DataStore } from '../src/storage/dataStore.js';
import type { ExportFormat, SectionId, SectionSpec } from '../src/types.js';

export const FIXED_NOW = new Date('2026-03-02T09:30:00.000Z');

/** Body text that passes every section validator. */
export function validSectionText(title: string): string {
  return [
    `The ${title} covers goals, users, constraints and measurable outcomes for the small business banking platform.`,
    '',
    '1. Phase 1 discovery workshop with finance stakeholders and compliance reviewers',
    '2. Phase 2 build of the account dashboard and invoicing features',
    '3. Phase 3 pilot launch with twenty small business customers',
    '4. Phase 4 general availability and support handover to operations',
  ].join('\n');
}

export function makeConfig(overrides: Partial<QuillConfig> = {}): QuillConfig {
  return {
    googleGenerativeAiApiKey: 'test-secret',
    defaultModel: 'gemini-2.5-flash',
    dataDir: '/tmp/quill-test',
    defaultLevel: 'intermediate',
    agentConcurrency: 4,
    agentTimeoutMs: 1_000,
    agentMaxAttempts: 2,
    retryDelayMs: 0,
    sessionTtlMs: 24 * 3_600_000,
    cleanupIntervalMs: 60 * 60_000,
    maxRequirementsChars: 50_000,
    pdfPageSize: 'LETTER',
    ...overrides,
  };
}

export type AgentBehaviour = (
  context: SectionContext,
  options: ProduceOptions,
  attempt: number,
) => Promise<string>;

export class FakeAgent implements SectionAgent {
  calls = 0;

  constructor(
    readonly sectionId: SectionId,
    private readonly behaviour: AgentBehaviour,
  ) {}

  produce(context: SectionContext, options: ProduceOptions): Promise<string> {
    this.calls += 1;
    return this.behaviour(context, options, this.calls);
  }
}

export function createFakeAgents(
  behaviours: Partial<Record<SectionId, AgentBehaviour>> = {},
): Map<SectionId, FakeAgent> {
  return new Map(
    ALL_SECTION_SPECS.map((spec) => [
      spec.id,
      new FakeAgent(spec.id, behaviours[spec.id] ?? (async () => validSectionText(spec.title))),
    ]),
  );
}

/** Never settles on its own; rejects once the attempt is aborted. */
export function hangUntilAborted(options: ProduceOptions): Promise<string> {
  return new Promise((_, reject) => {
    options.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class ScriptedBackend implements GenerationBackend {
  readonly inputs: GenerateTextInput[] = [];

  constructor(private readonly respond: (input: GenerateTextInput) => Promise<string>) {}

  generateText(input: GenerateTextInput): Promise<string> {
    this.inputs.push(input);
    return this.respond(input);
  }
}

export interface TestPipelineOptions {
  behaviours?: Partial<Record<SectionId, AgentBehaviour>>;
  settings?: Partial<OrchestratorSettings>;
  renderers?: Partial<Record<ExportFormat, Renderer>>;
  store?: DataStore;
  clock?: () => Date;
}

export function createTestPipeline(options: TestPipelineOptions = {}) {
  const store = options.store ?? createMemoryStore();
  const clock = options.clock ?? (() => new Date());
  const registry = new SessionRegistry(store, clock);
  const assembler = new DocumentAssembler(registry, SECTION_SETS, clock);
  const agents = createFakeAgents(options.behaviours);
  const orchestrator = new Orchestrator({
    registry,
    assembler,
    agents,
    settings: {
      concurrency: 4,
      agentTimeoutMs: 1_000,
      maxAttempts: 2,
      retryDelayMs: 0,
      ...options.settings,
    },
  });
  const exportEngine = new ExportEngine({ pdfPageSize: 'LETTER' }, options.renderers);
  const service = new DocumentService({
    registry,
    orchestrator,
    exportEngine,
    limits: { maxRequirementsChars: 50_000, defaultLevel: 'intermediate' },
  });

  return { store, registry, assembler, agents, orchestrator, exportEngine, service };
}

export function forEverySection(
  make: (spec: SectionSpec) => AgentBehaviour,
  specs: readonly SectionSpec[] = SECTION_SPECS,
): Partial<Record<SectionId, AgentBehaviour>> {
  const behaviours: Partial<Record<SectionId, AgentBehaviour>> = {};
  for (const spec of specs) {
    behaviours[spec.id] = make(spec);
  }
  return behaviours;
}
