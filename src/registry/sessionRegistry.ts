import { v4 as uuidv4, validate as isUuid } from 'uuid';
import {
  SessionBusyError,
  SessionConflictError,
  SessionNotFoundError,
} from '../errors.js';
import type { DataStore } from '../storage/dataStore.js';
import type { DocumentModel, DocumentType, DocumentationLevel, Session } from '../types.js';
import { documentModelSchema, sessionSchema } from './schemas.js';

const SESSIONS_DIR = 'sessions';
const DOCUMENTS_DIR = 'documents';

export interface CreateSessionInput {
  level: DocumentationLevel;
  docType?: DocumentType;
  originalFilename?: string;
  projectName?: string;
  domain?: string;
}

export type SessionMutator = (session: Session) => void;

function sessionPath(fileId: string): string {
  return `${SESSIONS_DIR}/${fileId}.json`;
}

function documentPath(fileId: string): string {
  return `${DOCUMENTS_DIR}/${fileId}.json`;
}

/**
 * Maps opaque file ids to session records and their canonical document.
 * Updates to one file id are applied one at a time, in call order.
 */
export class SessionRegistry {
  private readonly chains = new Map<string, Promise<void>>();
  private readonly generating = new Set<string>();

  constructor(
    private readonly store: DataStore,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  private enqueue<T>(fileId: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(fileId) ?? Promise.resolve();
    const task = previous.then(fn);
    const settled = task.then(
      () => {},
      () => {},
    );
    this.chains.set(fileId, settled);
    void settled.then(() => {
      if (this.chains.get(fileId) === settled) {
        this.chains.delete(fileId);
      }
    });
    return task;
  }

  private async read(fileId: string): Promise<Session | null> {
    const raw = await this.store.readJSON(sessionPath(fileId));
    if (raw === null) return null;
    return sessionSchema.parse(raw);
  }

  async create(input: CreateSessionInput): Promise<string> {
    let fileId = uuidv4();
    while ((await this.store.readJSON(sessionPath(fileId))) !== null) {
      fileId = uuidv4();
    }

    const session: Session = {
      fileId,
      status: 'processing',
      metadata: {
        originalFilename: input.originalFilename,
        projectName: input.projectName,
        domain: input.domain,
        docType: input.docType ?? 'brd',
        level: input.level,
        createdAt: this.clock().toISOString(),
      },
      sectionStatuses: [],
    };

    await this.enqueue(fileId, () => this.store.writeJSON(sessionPath(fileId), session));
    console.log(`[registry] created session ${fileId}`);
    return fileId;
  }

  async get(fileId: string): Promise<Session | null> {
    if (!isUuid(fileId)) return null;
    return this.enqueue(fileId, () => this.read(fileId));
  }

  async require(fileId: string): Promise<Session> {
    const session = await this.get(fileId);
    if (!session) throw new SessionNotFoundError(fileId);
    return session;
  }

  async update(fileId: string, mutator: SessionMutator): Promise<Session> {
    if (!isUuid(fileId)) throw new SessionNotFoundError(fileId);

    return this.enqueue(fileId, async () => {
      const session = await this.read(fileId);
      if (!session) throw new SessionNotFoundError(fileId);
      mutator(session);
      const next = sessionSchema.parse(session);
      await this.store.writeJSON(sessionPath(fileId), next);
      return next;
    });
  }

  async saveDocument(document: DocumentModel): Promise<void> {
    const validated = documentModelSchema.parse(document);
    await this.enqueue(document.fileId, () =>
      this.store.writeJSON(documentPath(document.fileId), validated),
    );
  }

  async getDocument(fileId: string): Promise<DocumentModel | null> {
    if (!isUuid(fileId)) return null;
    const raw = await this.enqueue(fileId, () => this.store.readJSON(documentPath(fileId)));
    if (raw === null) return null;
    return documentModelSchema.parse(raw);
  }

  /**
   * Claims the session for one generation job. Sessions that already reached a
   * terminal status are not regenerated.
   */
  async beginGeneration(fileId: string): Promise<Session> {
    if (this.generating.has(fileId)) throw new SessionBusyError(fileId);
    this.generating.add(fileId);

    try {
      const session = await this.require(fileId);
      if (session.status !== 'processing') {
        throw new SessionConflictError(fileId);
      }
      return session;
    } catch (error) {
      this.generating.delete(fileId);
      throw error;
    }
  }

  endGeneration(fileId: string): void {
    this.generating.delete(fileId);
  }

  isGenerating(fileId: string): boolean {
    return this.generating.has(fileId);
  }

  /** Removes sessions (and their documents) created more than `ttlMs` ago. */
  async deleteExpired(ttlMs: number, now: Date = this.clock()): Promise<number> {
    const entries = await this.store.list(SESSIONS_DIR);
    let removed = 0;

    for (const entry of entries) {
      if (!entry.endsWith('.json')) continue;
      const fileId = entry.slice(0, -'.json'.length);
      if (this.generating.has(fileId)) continue;

      const expired = await this.enqueue(fileId, async () => {
        const session = await this.read(fileId);
        if (!session) return false;
        const age = now.getTime() - new Date(session.metadata.createdAt).getTime();
        if (age <= ttlMs) return false;
        await this.store.remove(documentPath(fileId));
        await this.store.remove(sessionPath(fileId));
        return true;
      });

      if (expired) removed += 1;
    }

    if (removed > 0) {
      console.log(`[registry] removed ${removed} expired session(s)`);
    }
    return removed;
  }

  /**
   * Fails sessions left in processing by a previous run. Only call this before
   * any generation job has started in this process.
   */
  async failInterrupted(reason: string): Promise<number> {
    const entries = await this.store.list(SESSIONS_DIR);
    let failed = 0;

    for (const entry of entries) {
      if (!entry.endsWith('.json')) continue;
      const fileId = entry.slice(0, -'.json'.length);
      if (this.generating.has(fileId)) continue;

      const marked = await this.enqueue(fileId, async () => {
        const session = await this.read(fileId);
        if (!session || session.status !== 'processing') return false;
        session.status = 'failed';
        session.failureReason = reason;
        session.metadata.processedAt = this.clock().toISOString();
        await this.store.writeJSON(sessionPath(fileId), sessionSchema.parse(session));
        return true;
      });

      if (marked) failed += 1;
    }

    return failed;
  }
}
