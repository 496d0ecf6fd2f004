export type DocumentationLevel = 'simple' | 'intermediate' | 'advanced';

/** Business requirements, statement of work, functional requirements. */
export type DocumentType = 'brd' | 'sow' | 'frd';

export const DOCUMENT_TYPES: readonly DocumentType[] = ['brd', 'sow', 'frd'];

export interface GenerationRequest {
  readonly requirements: string;
  readonly projectName?: string;
  readonly domain?: string;
  readonly originalFilename?: string;
  readonly level: DocumentationLevel;
  readonly docType: DocumentType;
}

export type SectionId =
  | 'executive_summary'
  | 'project_scope'
  | 'stakeholder_analysis'
  | 'requirements'
  | 'timeline'
  | 'budget'
  | 'risk_assessment'
  | 'assumptions'
  | 'next_steps'
  | 'sow_overview'
  | 'sow_deliverables'
  | 'sow_schedule'
  | 'sow_resources'
  | 'sow_management'
  | 'sow_terms'
  | 'sow_next_steps'
  | 'frd_system_overview'
  | 'frd_functional'
  | 'frd_features'
  | 'frd_technical'
  | 'frd_user_interface'
  | 'frd_data'
  | 'frd_testing';

/** Returns a description of what is wrong with the text, or null when it is acceptable. */
export type SectionValidator = (text: string) => string | null;

export interface SectionSpec {
  id: SectionId;
  title: string;
  ordinal: number;
  required: boolean;
  rolePrompt: string;
  validate: SectionValidator;
}

export type SectionStatus = 'success' | 'failed_fallback' | 'pending';

export interface SectionResult {
  id: SectionId;
  title: string;
  ordinal: number;
  required: boolean;
  status: SectionStatus;
  content: string;
  latencyMs: number;
  retryCount: number;
  failureReason?: string;
}

export interface DocumentStats {
  wordCount: number;
  successCount: number;
  fallbackCount: number;
  durationMs: number;
}

export interface DocumentModel {
  fileId: string;
  title: string;
  docType: DocumentType;
  level: DocumentationLevel;
  generatedAt: string;
  complete: boolean;
  sections: SectionResult[];
  stats: DocumentStats;
}

export type SessionStatus = 'processing' | 'ready' | 'failed';

export interface SessionMetadata {
  originalFilename?: string;
  projectName?: string;
  domain?: string;
  docType: DocumentType;
  level: DocumentationLevel;
  createdAt: string;
  processedAt?: string;
}

export interface SectionStatusSummary {
  id: SectionId;
  title: string;
  status: SectionStatus;
  retryCount: number;
}

export interface Session {
  fileId: string;
  status: SessionStatus;
  metadata: SessionMetadata;
  sectionStatuses: SectionStatusSummary[];
  failureReason?: string;
}

export type ExportFormat = 'pdf' | 'docx' | 'html' | 'json';

export const EXPORT_FORMATS: readonly ExportFormat[] = ['pdf', 'docx', 'html', 'json'];

export interface ExportArtifact {
  format: ExportFormat;
  contentType: string;
  filename: string;
  data: Buffer;
}
