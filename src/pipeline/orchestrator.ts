import type { SectionContext } from '../agents/prompts.js';
import type { SectionAgent } from '../agents/sectionAgent.js';
import {
  buildPlaceholder,
  SECTION_SETS,
  sectionSpecsFor,
  type SectionSets,
} from '../agents/sections.js';
import type { QuillConfig } from '../config.js';
import {
  BackendTimeoutError,
  DeadlineExceededError,
  isTransientGenerationError,
  toErrorMessage,
} from '../errors.js';
import type { SessionRegistry } from '../registry/sessionRegistry.js';
import type {
  DocumentModel,
  DocumentType,
  GenerationRequest,
  SectionId,
  SectionResult,
  SectionSpec,
} from '../types.js';
import { summarizeSections, type DocumentAssembler } from './assembler.js';
import { backoffDelay, runWithConcurrency, sleep } from './workerPool.js';

export interface OrchestratorSettings {
  concurrency: number;
  agentTimeoutMs: number;
  maxAttempts: number;
  retryDelayMs: number;
  requestDeadlineMs?: number;
}

export function orchestratorSettingsFromConfig(config: QuillConfig): OrchestratorSettings {
  return {
    concurrency: config.agentConcurrency,
    agentTimeoutMs: config.agentTimeoutMs,
    maxAttempts: config.agentMaxAttempts,
    retryDelayMs: config.retryDelayMs,
    requestDeadlineMs: config.requestDeadlineMs,
  };
}

export interface OrchestratorDependencies {
  registry: SessionRegistry;
  assembler: DocumentAssembler;
  agents: ReadonlyMap<SectionId, SectionAgent>;
  settings: OrchestratorSettings;
  sectionSets?: SectionSets;
}

export interface GenerateOptions {
  /** Overrides the configured request deadline for this call. */
  deadlineMs?: number;
  signal?: AbortSignal;
}

function pendingResult(spec: SectionSpec): SectionResult {
  return {
    id: spec.id,
    title: spec.title,
    ordinal: spec.ordinal,
    required: spec.required,
    status: 'pending',
    content: '',
    latencyMs: 0,
    retryCount: 0,
  };
}

function toSectionContext(request: GenerationRequest, docType: DocumentType): SectionContext {
  return {
    requirements: request.requirements,
    projectName: request.projectName,
    domain: request.domain,
    level: request.level,
    docType,
  };
}

export class Orchestrator {
  private readonly sectionSets: SectionSets;

  constructor(private readonly deps: OrchestratorDependencies) {
    this.sectionSets = deps.sectionSets ?? SECTION_SETS;
  }

  /**
   * Generates every section of the session's document type and hands the
   * results to the assembler. Backend failures end up as fallback sections; only assembly
   * failures, an exceeded deadline and session conflicts reject.
   */
  async generate(
    fileId: string,
    request: GenerationRequest,
    options: GenerateOptions = {},
  ): Promise<DocumentModel> {
    const { registry, assembler, settings } = this.deps;
    const claimed = await registry.beginGeneration(fileId);
    // The stored session decides the section set, so assembly checks the same one.
    const { docType } = claimed.metadata;

    const startedAt = Date.now();
    const controller = new AbortController();
    const onCallerAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });

    const specs = sectionSpecsFor(docType, this.sectionSets);
    const slots = specs.map(pendingResult);

    try {
      const session = await registry.update(fileId, (current) => {
        current.status = 'processing';
        delete current.failureReason;
      });

      console.log(
        `[orchestrator] ${fileId}: dispatching ${specs.length} ${docType} section agents (concurrency ${settings.concurrency})`,
      );
      await this.runSections(
        specs,
        slots,
        toSectionContext(request, docType),
        controller.signal,
        options.deadlineMs ?? settings.requestDeadlineMs,
      );

      return await assembler.assemble(session, slots, { durationMs: Date.now() - startedAt });
    } catch (error) {
      if (error instanceof DeadlineExceededError) {
        controller.abort();
        console.error(`[orchestrator] ${fileId}: ${error.message}; abandoning in-flight agents`);
        await registry.update(fileId, (current) => {
          current.status = 'failed';
          current.failureReason = error.message;
          current.metadata.processedAt = new Date().toISOString();
          current.sectionStatuses = summarizeSections(slots);
        });
      }
      throw error;
    } finally {
      options.signal?.removeEventListener('abort', onCallerAbort);
      registry.endGeneration(fileId);
    }
  }

  /**
   * Runs one agent per spec and writes each result into the slot at the spec's
   * index. Slots of agents still running when the deadline passes stay pending.
   */
  async runSections(
    specs: readonly SectionSpec[],
    slots: SectionResult[],
    context: SectionContext,
    signal: AbortSignal,
    deadlineMs?: number,
  ): Promise<void> {
    const pool = runWithConcurrency(specs, this.deps.settings.concurrency, async (spec, index) => {
      const result = await this.runSection(spec, context, signal);
      if (!signal.aborted) slots[index] = result;
    });

    if (deadlineMs === undefined) {
      await pool;
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new DeadlineExceededError(deadlineMs)), deadlineMs);
    });
    try {
      await Promise.race([pool, expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async runSection(
    spec: SectionSpec,
    context: SectionContext,
    signal: AbortSignal,
  ): Promise<SectionResult> {
    const { maxAttempts, retryDelayMs } = this.deps.settings;
    const startedAt = Date.now();
    const agent = this.deps.agents.get(spec.id);
    if (!agent) {
      return this.fallbackResult(spec, 'No agent is configured for this section', 0, startedAt);
    }

    let attempt = 0;
    let lastError: unknown = null;

    while (attempt < maxAttempts && !signal.aborted) {
      attempt += 1;
      try {
        const content = await this.produceWithTimeout(agent, context, signal);
        return {
          ...pendingResult(spec),
          status: 'success',
          content,
          latencyMs: Date.now() - startedAt,
          retryCount: attempt - 1,
        };
      } catch (error) {
        lastError = error;
        const transient = isTransientGenerationError(error);
        console.warn(
          `[orchestrator] ${spec.id} attempt ${attempt}/${maxAttempts} failed (${transient ? 'transient' : 'permanent'}): ${toErrorMessage(error)}`,
        );
        if (!transient || attempt >= maxAttempts) break;
        await sleep(backoffDelay(retryDelayMs, attempt), signal);
      }
    }

    if (signal.aborted) {
      return pendingResult(spec);
    }
    return this.fallbackResult(spec, toErrorMessage(lastError), Math.max(0, attempt - 1), startedAt);
  }

  private async produceWithTimeout(
    agent: SectionAgent,
    context: SectionContext,
    signal: AbortSignal,
  ): Promise<string> {
    const { agentTimeoutMs } = this.deps.settings;
    const attempt = new AbortController();
    const onAbort = () => attempt.abort();
    signal.addEventListener('abort', onAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<never>((_, reject) => {
      // The timeout has to settle the race before the agent sees the abort.
      timer = setTimeout(() => {
        reject(new BackendTimeoutError(agentTimeoutMs));
        attempt.abort();
      }, agentTimeoutMs);
    });

    try {
      return await Promise.race([
        agent.produce(context, { timeoutMs: agentTimeoutMs, signal: attempt.signal }),
        timedOut,
      ]);
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
    }
  }

  private fallbackResult(
    spec: SectionSpec,
    reason: string,
    retryCount: number,
    startedAt: number,
  ): SectionResult {
    console.warn(`[orchestrator] ${spec.id} using placeholder content: ${reason}`);
    return {
      ...pendingResult(spec),
      status: 'failed_fallback',
      content: buildPlaceholder(spec),
      latencyMs: Date.now() - startedAt,
      retryCount,
      failureReason: reason,
    };
  }
}
