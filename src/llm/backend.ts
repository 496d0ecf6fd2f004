import { createAnthropic } from '@ai-sdk/anthropic';
import { createGoogleGenerativeAI } from '@ai-sdk/google';
import {
  APICallError,
  EmptyResponseBodyError,
  InvalidResponseDataError,
  JSONParseError,
  NoContentGeneratedError,
  TypeValidationError,
  generateText,
  type LanguageModel,
} from 'ai';
import type { QuillConfig } from '../config.js';
import {
  BackendTimeoutError,
  BackendUnavailableError,
  GenerationError,
  toErrorMessage,
} from '../errors.js';

export interface GenerateTextInput {
  system: string;
  prompt: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

/** The only capability section agents need from a text-generation service. */
export interface GenerationBackend {
  generateText(input: GenerateTextInput): Promise<string>;
}

function resolveProviderKind(modelId: string): 'anthropic' | 'google' | 'unknown' {
  const normalized = modelId.trim().toLowerCase();
  if (normalized.startsWith('claude-')) return 'anthropic';
  if (normalized.startsWith('gemini-') || normalized.startsWith('gemma-')) return 'google';
  return 'unknown';
}

export function resolveLanguageModel(config: QuillConfig, modelId: string): LanguageModel {
  const kind = resolveProviderKind(modelId);

  if (kind === 'anthropic') {
    if (!config.anthropicApiKey) {
      throw new Error('ANTHROPIC_API_KEY is required for Claude models.');
    }
    return createAnthropic({ apiKey: config.anthropicApiKey })(modelId);
  }

  if (kind === 'google') {
    if (!config.googleGenerativeAiApiKey) {
      throw new Error('GOOGLE_GENERATIVE_AI_API_KEY is required for Gemini/Gemma models.');
    }
    return createGoogleGenerativeAI({ apiKey: config.googleGenerativeAiApiKey })(modelId);
  }

  throw new Error(
    `Unsupported model "${modelId}". Use a Claude model (claude-*) or Gemini/Gemma model (gemini-*/gemma-*).`,
  );
}

const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

/** A request that never got a response: fetch failures and socket errors. */
function isNetworkFailure(error: unknown): boolean {
  if (error instanceof TypeError && /fetch failed|network/i.test(error.message)) return true;
  const code = errorCode(error) ?? (error instanceof Error ? errorCode(error.cause) : undefined);
  return code !== undefined && NETWORK_ERROR_CODES.has(code);
}

function isMalformedResponse(error: unknown): boolean {
  return (
    NoContentGeneratedError.isInstance(error) ||
    InvalidResponseDataError.isInstance(error) ||
    TypeValidationError.isInstance(error) ||
    JSONParseError.isInstance(error) ||
    EmptyResponseBodyError.isInstance(error)
  );
}

/**
 * Maps a provider failure onto a generation error. Only retryable API errors
 * and network failures are transient; malformed responses, configuration
 * errors and anything unrecognised are not retried.
 */
export function classifyBackendError(error: unknown, modelId: string): GenerationError {
  if (error instanceof GenerationError) return error;

  if (APICallError.isInstance(error)) {
    const info = { statusCode: error.statusCode, model: modelId, cause: error };
    if (error.isRetryable) {
      return new BackendUnavailableError(`Model ${modelId} unavailable: ${error.message}`, info);
    }
    return new GenerationError('rejected', `Model ${modelId} rejected the request: ${error.message}`, info);
  }

  const info = { model: modelId, cause: error };
  if (isMalformedResponse(error)) {
    return new GenerationError(
      'invalid_output',
      `Model ${modelId} returned an unusable response: ${toErrorMessage(error)}`,
      info,
    );
  }
  if (isNetworkFailure(error)) {
    return new BackendUnavailableError(`Model ${modelId} unreachable: ${toErrorMessage(error)}`, info);
  }
  return new GenerationError('rejected', `Model ${modelId} call failed: ${toErrorMessage(error)}`, info);
}

async function callModel(
  model: LanguageModel,
  modelId: string,
  input: GenerateTextInput,
): Promise<string> {
  if (input.signal?.aborted) {
    throw new GenerationError('rejected', 'Generation cancelled before it started', { model: modelId });
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, input.timeoutMs);
  const onCallerAbort = () => controller.abort();
  input.signal?.addEventListener('abort', onCallerAbort, { once: true });

  try {
    const result = await generateText({
      model,
      system: input.system,
      prompt: input.prompt,
      abortSignal: controller.signal,
      maxRetries: 0,
    });
    return result.text;
  } catch (error) {
    if (timedOut) {
      throw new BackendTimeoutError(input.timeoutMs, { model: modelId, cause: error });
    }
    if (input.signal?.aborted) {
      throw new GenerationError('rejected', 'Generation cancelled', { model: modelId, cause: error });
    }
    throw classifyBackendError(error, modelId);
  } finally {
    clearTimeout(timer);
    input.signal?.removeEventListener('abort', onCallerAbort);
  }
}

/**
 * Backend over the AI SDK. When a fallback model is configured it is tried once
 * whenever the primary model is unavailable.
 */
export function createAiBackend(config: QuillConfig): GenerationBackend {
  const primary = resolveLanguageModel(config, config.defaultModel);
  const fallback = config.fallbackModel
    ? { id: config.fallbackModel, model: resolveLanguageModel(config, config.fallbackModel) }
    : null;

  return {
    async generateText(input) {
      try {
        return await callModel(primary, config.defaultModel, input);
      } catch (error) {
        if (!fallback || !(error instanceof BackendUnavailableError)) {
          throw error;
        }
        console.warn(
          `[backend] ${config.defaultModel} unavailable (${error.message}); trying ${fallback.id}`,
        );
        return callModel(fallback.model, fallback.id, input);
      }
    },
  };
}
