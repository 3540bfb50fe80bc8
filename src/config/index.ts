/**
 * @fileoverview lexlocator configuration
 *
 * All process configuration comes from environment variables (the CLI loads
 * `.env` first). Values are parsed once with zod into a frozen
 * `LexLocatorConfig`; nothing reads `process.env` after startup except the
 * logger threshold.
 */

import { z } from 'zod';
import { MissingCredentialError, ValidationError } from '../core/errors.js';

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_DB_PATH = './data/storage/lexlocator.sqlite';
export const DEFAULT_TOP_K = 5;
export const DEFAULT_RRF_K = 60;
export const DEFAULT_MAX_ITERATIONS = 5;
export const DEFAULT_LLM_TIMEOUT_MS = 60_000;
export const DEFAULT_SEARCH_TIMEOUT_MS = 10_000;
export const DEFAULT_MIN_PARAGRAPH_LENGTH = 30;
export const DEFAULT_PORT = 8000;
export const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_REASONING_MODEL = 'gpt-4-turbo';
export const DEFAULT_BEDROCK_EMBEDDING_MODEL = 'cohere.embed-multilingual-v3';
export const DEFAULT_OPENAI_EMBEDDING_MODEL = 'text-embedding-3-small';
export const DEFAULT_AWS_REGION = 'us-east-1';

// ============================================================================
// SCHEMA
// ============================================================================

const providerSchema = z.enum(['openai', 'bedrock']);

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined));

const envSchema = z.object({
  LEXLOCATOR_DB_PATH: z.string().trim().min(1).default(DEFAULT_DB_PATH),
  LEXLOCATOR_TOP_K: positiveInt(DEFAULT_TOP_K),
  LEXLOCATOR_RRF_K: z.coerce.number().nonnegative().default(DEFAULT_RRF_K),
  LEXLOCATOR_MAX_ITERATIONS: positiveInt(DEFAULT_MAX_ITERATIONS),
  LEXLOCATOR_LLM_TIMEOUT_MS: positiveInt(DEFAULT_LLM_TIMEOUT_MS),
  LEXLOCATOR_SEARCH_TIMEOUT_MS: positiveInt(DEFAULT_SEARCH_TIMEOUT_MS),
  LEXLOCATOR_MIN_PARAGRAPH_LENGTH: z.coerce.number().int().nonnegative().default(DEFAULT_MIN_PARAGRAPH_LENGTH),
  LEXLOCATOR_EMBEDDING_PROVIDER: providerSchema.default('bedrock'),
  LEXLOCATOR_EMBEDDING_MODEL: optionalString,
  LEXLOCATOR_REASONING_PROVIDER: providerSchema.default('openai'),
  LEXLOCATOR_REASONING_MODEL: optionalString,
  LEXLOCATOR_LLM_BASE_URL: z.string().trim().url().default(DEFAULT_OPENAI_BASE_URL),
  OPENAI_API_KEY: optionalString,
  AWS_REGION: z.string().trim().min(1).default(DEFAULT_AWS_REGION),
  PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
});

// ============================================================================
// TYPES
// ============================================================================

export type ProviderName = z.infer<typeof providerSchema>;

export interface EmbeddingConfig {
  provider: ProviderName;
  model: string;
}

export interface ReasoningConfig {
  provider: ProviderName;
  /** Undefined only for bedrock without an explicit model. */
  model: string | undefined;
  baseUrl: string;
  apiKey: string | undefined;
}

export interface LexLocatorConfig {
  dbPath: string;
  topK: number;
  rrfK: number;
  maxIterations: number;
  llmTimeoutMs: number;
  searchTimeoutMs: number;
  minParagraphLength: number;
  embedding: EmbeddingConfig;
  reasoning: ReasoningConfig;
  awsRegion: string;
  port: number;
}

// ============================================================================
// LOADING
// ============================================================================

type Env = Record<string, string | undefined>;

/** Empty strings count as unset so `.env` placeholders fall back to defaults. */
function dropBlank(env: Env): Env {
  const result: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim().length > 0) {
      result[key] = value;
    }
  }
  return result;
}

export function loadConfig(env: Env = process.env): LexLocatorConfig {
  const parsed = envSchema.safeParse(dropBlank(env));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join('.') : 'environment';
    const received = issue && issue.path.length > 0 ? String(env[String(issue.path[0])] ?? 'undefined') : 'invalid';
    throw new ValidationError(field, issue?.message ?? 'valid configuration', received);
  }
  const values = parsed.data;

  const embeddingProvider = values.LEXLOCATOR_EMBEDDING_PROVIDER;
  const reasoningProvider = values.LEXLOCATOR_REASONING_PROVIDER;

  return Object.freeze({
    dbPath: values.LEXLOCATOR_DB_PATH,
    topK: values.LEXLOCATOR_TOP_K,
    rrfK: values.LEXLOCATOR_RRF_K,
    maxIterations: values.LEXLOCATOR_MAX_ITERATIONS,
    llmTimeoutMs: values.LEXLOCATOR_LLM_TIMEOUT_MS,
    searchTimeoutMs: values.LEXLOCATOR_SEARCH_TIMEOUT_MS,
    minParagraphLength: values.LEXLOCATOR_MIN_PARAGRAPH_LENGTH,
    embedding: {
      provider: embeddingProvider,
      model:
        values.LEXLOCATOR_EMBEDDING_MODEL ??
        (embeddingProvider === 'bedrock' ? DEFAULT_BEDROCK_EMBEDDING_MODEL : DEFAULT_OPENAI_EMBEDDING_MODEL),
    },
    reasoning: {
      provider: reasoningProvider,
      model:
        values.LEXLOCATOR_REASONING_MODEL ??
        (reasoningProvider === 'openai' ? DEFAULT_REASONING_MODEL : undefined),
      baseUrl: values.LEXLOCATOR_LLM_BASE_URL,
      apiKey: values.OPENAI_API_KEY,
    },
    awsRegion: values.AWS_REGION,
    port: values.PORT,
  });
}

export type ReasoningCredential =
  | { provider: 'openai'; model: string; apiKey: string }
  | { provider: 'bedrock'; model: string };

/**
 * Fails fast when the selected reasoning provider cannot be used. Called once
 * at startup, before any request is accepted.
 */
export function requireReasoningCredential(config: LexLocatorConfig): ReasoningCredential {
  const { provider, model, apiKey } = config.reasoning;
  if (provider === 'openai') {
    if (!apiKey) {
      throw new MissingCredentialError('openai', 'OPENAI_API_KEY');
    }
    return { provider, model: model ?? DEFAULT_REASONING_MODEL, apiKey };
  }
  if (!model) {
    throw new MissingCredentialError('bedrock', 'LEXLOCATOR_REASONING_MODEL');
  }
  return { provider, model };
}
