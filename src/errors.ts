import type { ExportFormat } from './types.js';

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/** Malformed or empty generation request. Raised before any session exists. */
export class ValidationError extends Error {
  issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export type GenerationFailureKind = 'timeout' | 'unavailable' | 'rejected' | 'invalid_output';

export interface GenerationErrorInfo {
  statusCode?: number;
  model?: string;
  cause?: unknown;
}

export class GenerationError extends Error {
  kind: GenerationFailureKind;
  info: GenerationErrorInfo;

  constructor(kind: GenerationFailureKind, message: string, info: GenerationErrorInfo = {}) {
    super(message);
    this.name = 'GenerationError';
    this.kind = kind;
    this.info = info;
  }

  get transient(): boolean {
    return this.kind === 'timeout' || this.kind === 'unavailable';
  }
}

export class BackendTimeoutError extends GenerationError {
  constructor(timeoutMs: number, info: GenerationErrorInfo = {}) {
    super('timeout', `Generation timed out after ${timeoutMs}ms`, info);
    this.name = 'BackendTimeoutError';
  }
}

export class BackendUnavailableError extends GenerationError {
  constructor(message: string, info: GenerationErrorInfo = {}) {
    super('unavailable', message, info);
    this.name = 'BackendUnavailableError';
  }
}

export function isTransientGenerationError(error: unknown): boolean {
  return error instanceof GenerationError && error.transient;
}

/** Structural invariant of the document model was violated. */
export class AssemblyError extends Error {
  fileId: string;

  constructor(fileId: string, message: string) {
    super(message);
    this.name = 'AssemblyError';
    this.fileId = fileId;
  }
}

export class ExportError extends Error {
  format: ExportFormat;

  constructor(format: ExportFormat, cause: unknown) {
    super(`Failed to render ${format} export: ${toErrorMessage(cause)}`, { cause });
    this.name = 'ExportError';
    this.format = format;
  }
}

export class SessionNotFoundError extends Error {
  constructor(fileId: string) {
    super(`Session not found: ${fileId}`);
    this.name = 'SessionNotFoundError';
  }
}

export class SessionBusyError extends Error {
  constructor(fileId: string) {
    super(`A generation is already running for ${fileId}`);
    this.name = 'SessionBusyError';
  }
}

export class SessionConflictError extends Error {
  constructor(fileId: string) {
    super(`Session ${fileId} already finished; submit a new request to generate again`);
    this.name = 'SessionConflictError';
  }
}

export class DeadlineExceededError extends Error {
  constructor(deadlineMs: number) {
    super(`Request deadline of ${deadlineMs}ms exceeded`);
    this.name = 'DeadlineExceededError';
  }
}
