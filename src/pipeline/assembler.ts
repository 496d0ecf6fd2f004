import {
  buildPlaceholder,
  DOCUMENT_TYPE_NAMES,
  SECTION_SETS,
  sectionSpecsFor,
  type SectionSets,
} from '../agents/sections.js';
import { AssemblyError, toErrorMessage } from '../errors.js';
import type { SessionRegistry } from '../registry/sessionRegistry.js';
import type {
  DocumentModel,
  DocumentType,
  SectionResult,
  SectionStatusSummary,
  Session,
  SessionMetadata,
} from '../types.js';

export interface AssemblyTiming {
  durationMs: number;
}

export function buildDocumentTitle(
  metadata: Pick<SessionMetadata, 'projectName' | 'originalFilename'> & { docType?: DocumentType },
): string {
  const subject =
    metadata.projectName?.trim() ||
    metadata.originalFilename?.replace(/\.[^./\\]+$/, '').trim() ||
    'Untitled';
  return `${DOCUMENT_TYPE_NAMES[metadata.docType ?? 'brd']} - ${subject}`;
}

function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function summarizeSections(sections: readonly SectionResult[]): SectionStatusSummary[] {
  return sections.map((section) => ({
    id: section.id,
    title: section.title,
    status: section.status,
    retryCount: section.retryCount,
  }));
}

export class DocumentAssembler {
  constructor(
    private readonly registry: SessionRegistry,
    private readonly sectionSets: SectionSets = SECTION_SETS,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  /** Merges per-section results into the canonical model without touching the registry. */
  buildDocument(
    session: Session,
    results: readonly SectionResult[],
    timing: AssemblyTiming = { durationMs: 0 },
  ): DocumentModel {
    const { fileId } = session;
    const specs = sectionSpecsFor(session.metadata.docType, this.sectionSets);
    const byId = new Map<string, SectionResult>();

    for (const result of results) {
      if (!specs.some((spec) => spec.id === result.id)) {
        throw new AssemblyError(fileId, `Result for unknown section: ${result.id}`);
      }
      if (byId.has(result.id)) {
        throw new AssemblyError(fileId, `Duplicate result for section: ${result.id}`);
      }
      byId.set(result.id, result);
    }

    const sections = specs.map((spec): SectionResult => {
      const result = byId.get(spec.id);
      if (!result) {
        if (spec.required) {
          throw new AssemblyError(fileId, `Missing result for required section: ${spec.id}`);
        }
        return {
          id: spec.id,
          title: spec.title,
          ordinal: spec.ordinal,
          required: false,
          status: 'failed_fallback',
          content: buildPlaceholder(spec),
          latencyMs: 0,
          retryCount: 0,
          failureReason: 'Section was not generated',
        };
      }
      return { ...result, title: spec.title, ordinal: spec.ordinal, required: spec.required };
    });

    const complete =
      sections.length === specs.length &&
      sections.every((section) => !section.required || section.status !== 'pending');

    return {
      fileId,
      title: buildDocumentTitle(session.metadata),
      docType: session.metadata.docType,
      level: session.metadata.level,
      generatedAt: this.clock().toISOString(),
      complete,
      sections,
      stats: {
        wordCount: sections.reduce((sum, section) => sum + countWords(section.content), 0),
        successCount: sections.filter((section) => section.status === 'success').length,
        fallbackCount: sections.filter((section) => section.status === 'failed_fallback').length,
        durationMs: timing.durationMs,
      },
    };
  }

  /**
   * Builds the document, stores it on the session and moves the session to its
   * terminal status. Partial documents with fallback sections are still ready.
   */
  async assemble(
    session: Session,
    results: readonly SectionResult[],
    timing?: AssemblyTiming,
  ): Promise<DocumentModel> {
    const { fileId } = session;

    try {
      const document = this.buildDocument(session, results, timing);
      if (!document.complete) {
        const pending = document.sections.filter((section) => section.status === 'pending');
        throw new AssemblyError(
          fileId,
          `Document is incomplete: ${pending.map((section) => section.id).join(', ')} still pending`,
        );
      }
      if (document.stats.successCount === 0) {
        throw new AssemblyError(fileId, 'No section was generated successfully');
      }

      await this.registry.saveDocument(document);
      await this.registry.update(fileId, (current) => {
        current.status = 'ready';
        current.metadata.processedAt = document.generatedAt;
        current.sectionStatuses = summarizeSections(document.sections);
        delete current.failureReason;
      });

      console.log(
        `[assembler] ${fileId} ready: ${document.stats.successCount} generated, ${document.stats.fallbackCount} fallback`,
      );
      return document;
    } catch (error) {
      const reason = toErrorMessage(error);
      console.error(`[assembler] ${fileId} failed: ${reason}`);

      await this.registry.update(fileId, (current) => {
        current.status = 'failed';
        current.failureReason = reason;
        current.metadata.processedAt = this.clock().toISOString();
        current.sectionStatuses = summarizeSections(results);
      });

      if (error instanceof AssemblyError) throw error;
      throw new AssemblyError(fileId, reason);
    }
  }
}
