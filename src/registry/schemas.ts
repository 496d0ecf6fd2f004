import { z } from 'zod';

export const sectionIdSchema = z.enum([
  'executive_summary',
  'project_scope',
  'stakeholder_analysis',
  'requirements',
  'timeline',
  'budget',
  'risk_assessment',
  'assumptions',
  'next_steps',
  'sow_overview',
  'sow_deliverables',
  'sow_schedule',
  'sow_resources',
  'sow_management',
  'sow_terms',
  'sow_next_steps',
  'frd_system_overview',
  'frd_functional',
  'frd_features',
  'frd_technical',
  'frd_user_interface',
  'frd_data',
  'frd_testing',
]);

// Records written before document types existed are business requirements documents.
export const documentTypeSchema = z.enum(['brd', 'sow', 'frd']).default('brd');

export const documentationLevelSchema = z.enum(['simple', 'intermediate', 'advanced']);

export const sectionStatusSchema = z.enum(['success', 'failed_fallback', 'pending']);

export const sectionResultSchema = z.object({
  id: sectionIdSchema,
  title: z.string(),
  ordinal: z.number().int().nonnegative(),
  required: z.boolean(),
  status: sectionStatusSchema,
  content: z.string(),
  latencyMs: z.number().nonnegative(),
  retryCount: z.number().int().nonnegative(),
  failureReason: z.string().optional(),
});

export const documentModelSchema = z.object({
  fileId: z.string().min(1),
  title: z.string(),
  docType: documentTypeSchema,
  level: documentationLevelSchema,
  generatedAt: z.string().datetime(),
  complete: z.boolean(),
  sections: z.array(sectionResultSchema),
  stats: z.object({
    wordCount: z.number().int().nonnegative(),
    successCount: z.number().int().nonnegative(),
    fallbackCount: z.number().int().nonnegative(),
    durationMs: z.number().nonnegative(),
  }),
});

export const sessionSchema = z.object({
  fileId: z.string().min(1),
  status: z.enum(['processing', 'ready', 'failed']),
  metadata: z.object({
    originalFilename: z.string().optional(),
    projectName: z.string().optional(),
    domain: z.string().optional(),
    docType: documentTypeSchema,
    level: documentationLevelSchema,
    createdAt: z.string().datetime(),
    processedAt: z.string().datetime().optional(),
  }),
  sectionStatuses: z.array(
    z.object({
      id: sectionIdSchema,
      title: z.string(),
      status: sectionStatusSchema,
      retryCount: z.number().int().nonnegative(),
    }),
  ),
  failureReason: z.string().optional(),
});
