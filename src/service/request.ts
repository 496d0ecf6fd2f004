import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { DocumentationLevel, GenerationRequest } from '../types.js';

export interface RequestLimits {
  maxRequirementsChars: number;
  defaultLevel: DocumentationLevel;
}

const MIN_REQUIREMENTS_CHARS = 10;

function blankToUndefined(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
}

function optionalText(max: number) {
  return z.preprocess(blankToUndefined, z.string().trim().max(max).optional());
}

function createRequestSchema(limits: RequestLimits) {
  return z.object({
    requirements: z
      .string({ required_error: 'requirements text is required' })
      .trim()
      .min(MIN_REQUIREMENTS_CHARS, `requirements must be at least ${MIN_REQUIREMENTS_CHARS} characters`)
      .max(
        limits.maxRequirementsChars,
        `requirements must be at most ${limits.maxRequirementsChars} characters`,
      ),
    projectName: optionalText(120),
    domain: optionalText(120),
    originalFilename: optionalText(255),
    level: z.preprocess(
      (value) => (typeof value === 'string' ? blankToUndefined(value.trim().toLowerCase()) : value),
      z.enum(['simple', 'intermediate', 'advanced']).optional(),
    ),
    docType: z.preprocess(
      (value) => (typeof value === 'string' ? blankToUndefined(value.trim().toLowerCase()) : value),
      z.enum(['brd', 'sow', 'frd']).optional(),
    ),
  });
}

/** Validates raw submission input. Rejected requests never create a session. */
export function validateGenerationRequest(input: unknown, limits: RequestLimits): GenerationRequest {
  const parsed = createRequestSchema(limits).safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.') || '(root)',
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid generation request: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ')}`,
      issues,
    );
  }

  const { data } = parsed;
  return Object.freeze({
    requirements: data.requirements,
    projectName: data.projectName,
    domain: data.domain,
    originalFilename: data.originalFilename,
    level: data.level ?? limits.defaultLevel,
    docType: data.docType ?? 'brd',
  });
}
