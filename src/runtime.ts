import { ALL_SECTION_SPECS, SECTION_SETS } from './agents/sections.js';
import { createSectionAgents } from './agents/sectionAgent.js';
import type { QuillConfig } from './config.js';
import { ExportEngine } from './export/engine.js';
import { createAiBackend, type GenerationBackend } from './llm/backend.js';
import { DocumentAssembler } from './pipeline/assembler.js';
import { Orchestrator, orchestratorSettingsFromConfig } from './pipeline/orchestrator.js';
import { SessionRegistry } from './registry/sessionRegistry.js';
import { DocumentService } from './service/documentService.js';
import type { DataStore } from './storage/dataStore.js';

export interface QuillRuntime {
  registry: SessionRegistry;
  orchestrator: Orchestrator;
  exportEngine: ExportEngine;
  service: DocumentService;
}

/** Wires the generation pipeline over a store and a text-generation backend. */
export function createRuntime(
  config: QuillConfig,
  store: DataStore,
  backend: GenerationBackend = createAiBackend(config),
): QuillRuntime {
  const registry = new SessionRegistry(store);
  const assembler = new DocumentAssembler(registry, SECTION_SETS);
  const orchestrator = new Orchestrator({
    registry,
    assembler,
    agents: createSectionAgents(backend, ALL_SECTION_SPECS),
    settings: orchestratorSettingsFromConfig(config),
    sectionSets: SECTION_SETS,
  });
  const exportEngine = new ExportEngine({ pdfPageSize: config.pdfPageSize });
  const service = new DocumentService({
    registry,
    orchestrator,
    exportEngine,
    limits: {
      maxRequirementsChars: config.maxRequirementsChars,
      defaultLevel: config.defaultLevel,
    },
  });

  return { registry, orchestrator, exportEngine, service };
}
