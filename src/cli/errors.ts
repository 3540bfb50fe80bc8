/**
 * @fileoverview CLI error handling with structured envelopes
 *
 * Every failure leaves the CLI as an ErrorEnvelope: a machine-readable code,
 * a retryability hint and recovery hints. `--json` prints the envelope; the
 * exit code groups errors by family.
 */

import {
  DimensionMismatchError,
  EmbeddingError,
  IterationLimitExceededError,
  LoopCancelledError,
  MalformedTerminalPayloadError,
  MissingCredentialError,
  NotFoundError,
  ProviderError,
  StorageError,
  ValidationError,
} from '../core/errors.js';
import { TimeoutError } from '../utils/async.js';

export const ErrorCodes = {
  ENOINDEX: 'The index is empty; nothing has been ingested yet',
  ESTORAGE: 'The index database could not be read or written',
  ESTORAGE_LOCKED: 'Another process is writing to the index',
  EDIMENSION_MISMATCH: 'Embedding dimension does not match the stored collection',
  ENOT_FOUND: 'No paragraph justifies the given answer',
  EITERATION_LIMIT: 'The search budget ran out before a paragraph was found',
  EMALFORMED_ANSWER: 'The reasoning engine returned an unusable final answer',
  ETIMEOUT: 'An operation did not finish in time',
  ECANCELLED: 'The operation was cancelled',
  EPROVIDER_UNAVAILABLE: 'A model provider could not be reached',
  EPROVIDER_AUTH: 'A model provider rejected the credentials',
  EPROVIDER_RATE_LIMIT: 'A model provider is rate limiting requests',
  EMISSING_CREDENTIAL: 'A required credential is not configured',
  EEMBEDDING_FAILED: 'Embedding a text failed',
  EINVALID_ARGUMENT: 'A command-line argument is missing or invalid',
  EFILE_NOT_FOUND: 'A file or directory does not exist',
  EUNKNOWN: 'An unexpected error occurred',
} as const;

export type ErrorCode = keyof typeof ErrorCodes;

export const ErrorMetadata: Record<ErrorCode, { retryable: boolean; recoveryHints: string[] }> = {
  ENOINDEX: { retryable: false, recoveryHints: ['Run `lexlocator ingest <dir>` to build the index.'] },
  ESTORAGE: { retryable: false, recoveryHints: ['Check LEXLOCATOR_DB_PATH, or rebuild with `lexlocator ingest <dir> --recreate`.'] },
  ESTORAGE_LOCKED: { retryable: true, recoveryHints: ['Wait for the running ingest to finish, then retry.'] },
  EDIMENSION_MISMATCH: {
    retryable: false,
    recoveryHints: ['Use the embedding model the index was built with, or re-ingest with --recreate.'],
  },
  ENOT_FOUND: { retryable: false, recoveryHints: ['Check that the source documents cover this question.'] },
  EITERATION_LIMIT: { retryable: true, recoveryHints: ['Retry, or raise LEXLOCATOR_MAX_ITERATIONS.'] },
  EMALFORMED_ANSWER: { retryable: true, recoveryHints: ['Retry; try a stronger model via LEXLOCATOR_REASONING_MODEL.'] },
  ETIMEOUT: { retryable: true, recoveryHints: ['Retry, or raise LEXLOCATOR_LLM_TIMEOUT_MS / LEXLOCATOR_SEARCH_TIMEOUT_MS.'] },
  ECANCELLED: { retryable: true, recoveryHints: ['Run the command again.'] },
  EPROVIDER_UNAVAILABLE: { retryable: true, recoveryHints: ['Check network access to the provider, then retry.'] },
  EPROVIDER_AUTH: { retryable: false, recoveryHints: ['Check OPENAI_API_KEY or the AWS credentials in use.'] },
  EPROVIDER_RATE_LIMIT: { retryable: true, recoveryHints: ['Wait a moment and retry.'] },
  EMISSING_CREDENTIAL: { retryable: false, recoveryHints: ['Set the variable named in the message (see `lexlocator help`).'] },
  EEMBEDDING_FAILED: { retryable: true, recoveryHints: ['Check the embedding provider configuration, then retry.'] },
  EINVALID_ARGUMENT: { retryable: false, recoveryHints: ['Run `lexlocator help <command>` for usage information.'] },
  EFILE_NOT_FOUND: { retryable: false, recoveryHints: ['Check the path and try again.'] },
  EUNKNOWN: { retryable: true, recoveryHints: ['Re-run with LEXLOCATOR_LOG_LEVEL=debug for details.'] },
};

/** Exit codes by family: 10s storage, 20s lookup, 30s providers, 50s arguments. */
export const ExitCodes: Record<ErrorCode, number> = {
  ENOINDEX: 10,
  ESTORAGE: 11,
  ESTORAGE_LOCKED: 12,
  EDIMENSION_MISMATCH: 13,
  ENOT_FOUND: 20,
  EITERATION_LIMIT: 21,
  EMALFORMED_ANSWER: 22,
  ETIMEOUT: 23,
  ECANCELLED: 24,
  EPROVIDER_UNAVAILABLE: 30,
  EPROVIDER_AUTH: 31,
  EPROVIDER_RATE_LIMIT: 32,
  EMISSING_CREDENTIAL: 33,
  EEMBEDDING_FAILED: 34,
  EINVALID_ARGUMENT: 50,
  EFILE_NOT_FOUND: 51,
  EUNKNOWN: 1,
};

export interface ErrorEnvelope {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  recoveryHints: string[];
  context?: Record<string, unknown>;
}

export interface EnvelopeOverrides {
  retryable?: boolean;
  recoveryHints?: string[];
  context?: Record<string, unknown>;
}

export function createErrorEnvelope(code: ErrorCode, message: string, overrides: EnvelopeOverrides = {}): ErrorEnvelope {
  const metadata = ErrorMetadata[code];
  return {
    code,
    message,
    retryable: overrides.retryable ?? metadata.retryable,
    recoveryHints: overrides.recoveryHints ?? metadata.recoveryHints,
    context: { ...overrides.context, timestamp: Date.now() },
  };
}

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }

  toEnvelope(): ErrorEnvelope {
    return createErrorEnvelope(this.code, this.message, { context: this.details });
  }
}

export function isErrorEnvelope(value: unknown): value is ErrorEnvelope {
  if (!value || typeof value !== 'object') return false;
  return (
    'code' in value &&
    typeof value.code === 'string' &&
    value.code in ErrorCodes &&
    'message' in value &&
    typeof value.message === 'string' &&
    'retryable' in value &&
    typeof value.retryable === 'boolean' &&
    'recoveryHints' in value &&
    Array.isArray(value.recoveryHints)
  );
}

function providerCode(error: ProviderError): ErrorCode {
  switch (error.reason) {
    case 'auth_failed':
      return 'EPROVIDER_AUTH';
    case 'rate_limit':
      return 'EPROVIDER_RATE_LIMIT';
    default:
      return 'EPROVIDER_UNAVAILABLE';
  }
}

/** Turn anything thrown by a command into an envelope. */
export function classifyError(error: unknown): ErrorEnvelope {
  if (isErrorEnvelope(error)) {
    return error;
  }
  if (error instanceof CliError) {
    return error.toEnvelope();
  }
  if (error instanceof NotFoundError) {
    return createErrorEnvelope('ENOT_FOUND', error.message);
  }
  if (error instanceof IterationLimitExceededError) {
    return createErrorEnvelope('EITERATION_LIMIT', error.message, { context: { maxIterations: error.maxIterations } });
  }
  if (error instanceof MalformedTerminalPayloadError) {
    return createErrorEnvelope('EMALFORMED_ANSWER', error.message, { context: { reason: error.reason } });
  }
  if (error instanceof ValidationError) {
    return createErrorEnvelope('EINVALID_ARGUMENT', error.message, { context: { issues: error.issues } });
  }
  if (error instanceof MissingCredentialError) {
    return createErrorEnvelope('EMISSING_CREDENTIAL', error.message, { context: { variable: error.variable } });
  }
  if (error instanceof ProviderError) {
    return createErrorEnvelope(providerCode(error), error.message, {
      retryable: error.retryable,
      context: { provider: error.provider, reason: error.reason },
    });
  }
  if (error instanceof EmbeddingError) {
    return createErrorEnvelope('EEMBEDDING_FAILED', error.message, { retryable: error.retryable, context: { model: error.model } });
  }
  if (error instanceof DimensionMismatchError) {
    return createErrorEnvelope('EDIMENSION_MISMATCH', error.message, {
      context: { expected: error.expected, received: error.received },
    });
  }
  if (error instanceof StorageError) {
    const code: ErrorCode = error.operation === 'lock' ? 'ESTORAGE_LOCKED' : 'ESTORAGE';
    return createErrorEnvelope(code, error.message, { retryable: error.retryable, context: { operation: error.operation } });
  }
  if (error instanceof TimeoutError) {
    return createErrorEnvelope('ETIMEOUT', error.message, { context: { timeoutMs: error.timeoutMs } });
  }
  if (error instanceof LoopCancelledError) {
    return createErrorEnvelope('ECANCELLED', error.message);
  }
  if (error instanceof Error) {
    if ('code' in error && error.code === 'ENOENT') {
      return createErrorEnvelope('EFILE_NOT_FOUND', error.message);
    }
    return createErrorEnvelope('EUNKNOWN', error.message);
  }
  return createErrorEnvelope('EUNKNOWN', String(error));
}

export function isRetryableError(envelope: ErrorEnvelope): boolean {
  return envelope.retryable;
}

export function getExitCode(envelope: ErrorEnvelope): number {
  return ExitCodes[envelope.code];
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope }, null, 2);
}

export function formatErrorWithHints(envelope: ErrorEnvelope): string {
  const lines = [`Error [${envelope.code}]: ${envelope.message}`];
  if (envelope.recoveryHints.length > 0) {
    lines.push('', 'Suggestions:');
    for (const hint of envelope.recoveryHints) {
      lines.push(`  - ${hint}`);
    }
  }
  return lines.join('\n');
}

export function formatError(error: unknown): string {
  const envelope = classifyError(error);
  return `Error [${envelope.code}]: ${envelope.message}`;
}
