import { ExportError, toErrorMessage } from '../errors.js';
import { isExportFormat, type ExportEngine } from '../export/engine.js';
import type { Orchestrator } from '../pipeline/orchestrator.js';
import type { SessionRegistry } from '../registry/sessionRegistry.js';
import type {
  DocumentType,
  ExportArtifact,
  ExportFormat,
  SectionStatusSummary,
  Session,
  SessionStatus,
} from '../types.js';
import { validateGenerationRequest, type RequestLimits } from './request.js';

export interface DocumentServiceDependencies {
  registry: SessionRegistry;
  orchestrator: Orchestrator;
  exportEngine: ExportEngine;
  limits: RequestLimits;
}

export interface SubmitOptions {
  /** Resolve only once the session reached ready or failed. */
  wait?: boolean;
  deadlineMs?: number;
  onSettled?: (session: Session) => Promise<void> | void;
}

export interface SubmitResult {
  fileId: string;
  status: SessionStatus;
  failureReason?: string;
}

export interface StatusBody {
  fileId: string;
  status: SessionStatus;
  docType: DocumentType;
  createdAt: string;
  processedAt?: string;
  failureReason?: string;
  sections?: SectionStatusSummary[];
  fallbackSections?: string[];
  degraded?: boolean;
}

export type StatusResponse =
  | { statusCode: 200; body: StatusBody }
  | { statusCode: 404; body: { error: string } };

export interface ErrorBody {
  error: string;
  status?: SessionStatus;
  reason?: string;
  format?: ExportFormat;
}

export type DownloadResponse =
  | { statusCode: 200; artifact: ExportArtifact }
  | { statusCode: 400 | 404 | 409 | 500; body: ErrorBody };

/**
 * Transport-independent submission, status and download boundaries. The bot
 * and the CLI both go through this class.
 */
export class DocumentService {
  constructor(private readonly deps: DocumentServiceDependencies) {}

  async submit(input: unknown, options: SubmitOptions = {}): Promise<SubmitResult> {
    const request = validateGenerationRequest(input, this.deps.limits);
    const fileId = await this.deps.registry.create({
      level: request.level,
      docType: request.docType,
      projectName: request.projectName,
      domain: request.domain,
      originalFilename: request.originalFilename,
    });

    const job = this.run(fileId, request, options);
    if (!options.wait) {
      void job;
      return { fileId, status: 'processing' };
    }

    const session = await job;
    return {
      fileId,
      status: session?.status ?? 'failed',
      failureReason: session?.failureReason,
    };
  }

  private async run(
    fileId: string,
    request: Parameters<Orchestrator['generate']>[1],
    options: SubmitOptions,
  ): Promise<Session | null> {
    try {
      await this.deps.orchestrator.generate(fileId, request, { deadlineMs: options.deadlineMs });
    } catch (error) {
      console.error(`[service] generation for ${fileId} failed: ${toErrorMessage(error)}`);
    }

    let session: Session;
    try {
      session = await this.deps.registry.require(fileId);
    } catch (error) {
      console.error(`[service] could not read session ${fileId} after generation:`, error);
      return null;
    }

    try {
      await options.onSettled?.(session);
    } catch (error) {
      console.error(`[service] settle callback for ${fileId} failed:`, error);
    }
    return session;
  }

  async status(fileId: string): Promise<StatusResponse> {
    const session = await this.deps.registry.get(fileId);
    if (!session) {
      return { statusCode: 404, body: { error: `Unknown file id: ${fileId}` } };
    }

    const body: StatusBody = {
      fileId: session.fileId,
      status: session.status,
      docType: session.metadata.docType,
      createdAt: session.metadata.createdAt,
      processedAt: session.metadata.processedAt,
      failureReason: session.failureReason,
    };

    if (session.status === 'failed' && session.sectionStatuses.length > 0) {
      body.sections = session.sectionStatuses;
    }

    if (session.status === 'ready') {
      const fallbackSections = session.sectionStatuses
        .filter((section) => section.status === 'failed_fallback')
        .map((section) => section.title);
      body.sections = session.sectionStatuses;
      body.fallbackSections = fallbackSections;
      body.degraded = fallbackSections.length > 0;
    }

    return { statusCode: 200, body };
  }

  async download(fileId: string, requestedFormat: string): Promise<DownloadResponse> {
    const format = requestedFormat.trim().toLowerCase();
    if (!isExportFormat(format)) {
      return { statusCode: 400, body: { error: `Unsupported format: ${requestedFormat}` } };
    }

    const session = await this.deps.registry.get(fileId);
    if (!session) {
      return { statusCode: 404, body: { error: `Unknown file id: ${fileId}` } };
    }
    if (session.status === 'processing') {
      return {
        statusCode: 409,
        body: { error: 'Document is still being generated', status: session.status },
      };
    }
    if (session.status === 'failed') {
      return {
        statusCode: 500,
        body: {
          error: 'Document generation failed',
          status: session.status,
          reason: session.failureReason ?? 'Unknown failure',
        },
      };
    }

    const document = await this.deps.registry.getDocument(fileId);
    if (!document) {
      return {
        statusCode: 500,
        body: { error: 'Document is missing for a ready session', status: session.status },
      };
    }

    try {
      return { statusCode: 200, artifact: await this.deps.exportEngine.render(document, format) };
    } catch (error) {
      if (error instanceof ExportError) {
        return { statusCode: 500, body: { error: error.message, format } };
      }
      throw error;
    }
  }
}
