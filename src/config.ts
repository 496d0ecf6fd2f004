import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import type { DocumentationLevel } from './types.js';

export type PdfPageSize = 'LETTER' | 'A4';

export interface QuillConfig {
  telegramBotToken?: string;
  anthropicApiKey?: string;
  googleGenerativeAiApiKey?: string;
  defaultModel: string;
  fallbackModel?: string;
  dataDir: string;
  defaultLevel: DocumentationLevel;
  agentConcurrency: number;
  agentTimeoutMs: number;
  agentMaxAttempts: number;
  retryDelayMs: number;
  requestDeadlineMs?: number;
  sessionTtlMs: number;
  cleanupIntervalMs: number;
  maxRequirementsChars: number;
  pdfPageSize: PdfPageSize;
}

function blankToUndefined(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
}

const optionalString = z.preprocess(blankToUndefined, z.string().min(1).optional());
const optionalPositiveNumber = z.preprocess(
  blankToUndefined,
  z.coerce.number().positive().optional(),
);

function requiresAnthropicKey(model: string | undefined): boolean {
  return Boolean(model?.trim().toLowerCase().startsWith('claude-'));
}

function requiresGoogleKey(model: string | undefined): boolean {
  const normalized = model?.trim().toLowerCase() ?? '';
  return normalized.startsWith('gemini-') || normalized.startsWith('gemma-');
}

const configSchema = z
  .object({
    TELEGRAM_BOT_TOKEN: optionalString,
    ANTHROPIC_API_KEY: optionalString,
    GOOGLE_GENERATIVE_AI_API_KEY: optionalString,
    DEFAULT_MODEL: z.preprocess(blankToUndefined, z.string().default('gemini-2.5-flash')),
    FALLBACK_MODEL: optionalString,
    DATA_DIR: optionalString,
    DOC_LEVEL: z.preprocess(
      blankToUndefined,
      z.enum(['simple', 'intermediate', 'advanced']).default('intermediate'),
    ),
    AGENT_CONCURRENCY: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(4)),
    AGENT_TIMEOUT_SECONDS: z.preprocess(blankToUndefined, z.coerce.number().positive().default(90)),
    AGENT_MAX_ATTEMPTS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(2)),
    AGENT_RETRY_DELAY_MS: z.preprocess(
      blankToUndefined,
      z.coerce.number().int().nonnegative().default(1000),
    ),
    REQUEST_DEADLINE_MINUTES: optionalPositiveNumber,
    SESSION_TTL_HOURS: z.preprocess(blankToUndefined, z.coerce.number().positive().default(24)),
    CLEANUP_INTERVAL_MINUTES: z.preprocess(
      blankToUndefined,
      z.coerce.number().positive().default(60),
    ),
    MAX_REQUIREMENTS_CHARS: z.preprocess(
      blankToUndefined,
      z.coerce.number().int().positive().default(50_000),
    ),
    PDF_PAGE_SIZE: z.preprocess(blankToUndefined, z.enum(['LETTER', 'A4']).default('LETTER')),
  })
  .superRefine((value, ctx) => {
    for (const [key, model] of [
      ['DEFAULT_MODEL', value.DEFAULT_MODEL],
      ['FALLBACK_MODEL', value.FALLBACK_MODEL],
    ] as const) {
      if (requiresAnthropicKey(model) && !value.ANTHROPIC_API_KEY) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['ANTHROPIC_API_KEY'],
          message: `ANTHROPIC_API_KEY is required when ${key} is a Claude model.`,
        });
      }

      if (requiresGoogleKey(model) && !value.GOOGLE_GENERATIVE_AI_API_KEY) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['GOOGLE_GENERATIVE_AI_API_KEY'],
          message: `GOOGLE_GENERATIVE_AI_API_KEY is required when ${key} is a Gemini/Gemma model.`,
        });
      }
    }
  });

export function parseConfig(env: Record<string, string | undefined>): QuillConfig {
  const parsed = configSchema.parse(env);

  return {
    telegramBotToken: parsed.TELEGRAM_BOT_TOKEN,
    anthropicApiKey: parsed.ANTHROPIC_API_KEY,
    googleGenerativeAiApiKey: parsed.GOOGLE_GENERATIVE_AI_API_KEY,
    defaultModel: parsed.DEFAULT_MODEL,
    fallbackModel: parsed.FALLBACK_MODEL,
    dataDir: parsed.DATA_DIR ?? join(homedir(), '.quill', 'data'),
    defaultLevel: parsed.DOC_LEVEL,
    agentConcurrency: parsed.AGENT_CONCURRENCY,
    agentTimeoutMs: Math.round(parsed.AGENT_TIMEOUT_SECONDS * 1000),
    agentMaxAttempts: parsed.AGENT_MAX_ATTEMPTS,
    retryDelayMs: parsed.AGENT_RETRY_DELAY_MS,
    requestDeadlineMs:
      parsed.REQUEST_DEADLINE_MINUTES === undefined
        ? undefined
        : Math.round(parsed.REQUEST_DEADLINE_MINUTES * 60_000),
    sessionTtlMs: Math.round(parsed.SESSION_TTL_HOURS * 3_600_000),
    cleanupIntervalMs: Math.round(parsed.CLEANUP_INTERVAL_MINUTES * 60_000),
    maxRequirementsChars: parsed.MAX_REQUIREMENTS_CHARS,
    pdfPageSize: parsed.PDF_PAGE_SIZE,
  };
}

let _config: QuillConfig | null = null;

export function loadConfig(): QuillConfig {
  if (_config) return _config;
  _config = parseConfig(process.env);
  return _config;
}
