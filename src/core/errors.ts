/**
 * @fileoverview lexlocator error hierarchy
 *
 * Every failure that crosses a module boundary is a typed error with a stable
 * `code`, so the HTTP and CLI layers can tell "the justification does not
 * exist" apart from "the system malfunctioned".
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class LexLocatorError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// STORAGE ERRORS
// ============================================================================

export type StorageOperation = 'open' | 'read' | 'write' | 'lock' | 'migrate' | 'query';

export class StorageError extends LexLocatorError {
  readonly code = 'STORAGE_ERROR';

  constructor(
    readonly operation: StorageOperation,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Storage ${operation} failed: ${message}`);
    this.name = 'StorageError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// RETRIEVAL ERRORS
// ============================================================================

export type RetrievalSource = 'keyword' | 'vector';

/**
 * One retrieval backend failed. The hybrid retriever absorbs this and
 * continues with the other source.
 */
export class SourceUnavailableError extends LexLocatorError {
  readonly code = 'SOURCE_UNAVAILABLE';
  readonly retryable = true;

  constructor(
    readonly source: RetrievalSource,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Retrieval source ${source} unavailable: ${message}`);
    this.name = 'SourceUnavailableError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        source: this.source,
        cause: this.cause?.message,
      },
    };
  }
}

export class DimensionMismatchError extends LexLocatorError {
  readonly code = 'DIMENSION_MISMATCH';
  readonly retryable = false;

  constructor(
    readonly expected: number,
    readonly received: number,
    readonly context: string,
  ) {
    super(`Vector dimension mismatch in ${context}: expected ${expected}, got ${received}`);
    this.name = 'DimensionMismatchError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        expected: this.expected,
        received: this.received,
        context: this.context,
      },
    };
  }
}

// ============================================================================
// LOOP OUTCOME ERRORS
// ============================================================================

export class NotFoundError extends LexLocatorError {
  readonly code = 'NOT_FOUND';
  readonly retryable = false;

  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class IterationLimitExceededError extends LexLocatorError {
  readonly code = 'ITERATION_LIMIT_EXCEEDED';
  readonly retryable = false;

  constructor(readonly maxIterations: number) {
    super(`iteration limit exceeded (${maxIterations} iterations)`);
    this.name = 'IterationLimitExceededError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { maxIterations: this.maxIterations },
    };
  }
}

export class MalformedTerminalPayloadError extends LexLocatorError {
  readonly code = 'MALFORMED_TERMINAL_PAYLOAD';
  readonly retryable = false;

  constructor(
    readonly reason: string,
    readonly rawPayload: string,
  ) {
    super(`Reasoning engine produced a malformed final answer: ${reason}`);
    this.name = 'MalformedTerminalPayloadError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        reason: this.reason,
        rawPayload: this.rawPayload,
      },
    };
  }
}

export class LoopCancelledError extends LexLocatorError {
  readonly code = 'LOOP_CANCELLED';
  readonly retryable = true;

  constructor(readonly iteration: number) {
    super(`Query refinement cancelled before iteration ${iteration + 1}`);
    this.name = 'LoopCancelledError';
  }
}

// ============================================================================
// PROVIDER ERRORS
// ============================================================================

export type ProviderKind = 'openai' | 'bedrock';
export type ProviderErrorReason =
  | 'timeout'
  | 'rate_limit'
  | 'auth_failed'
  | 'network_error'
  | 'invalid_response'
  | 'unavailable';

export class ProviderError extends LexLocatorError {
  readonly code = 'PROVIDER_ERROR';

  constructor(
    readonly provider: ProviderKind,
    readonly reason: ProviderErrorReason,
    readonly retryable: boolean,
    message: string,
  ) {
    super(`Provider ${provider} ${reason}: ${message}`);
    this.name = 'ProviderError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        provider: this.provider,
        reason: this.reason,
      },
    };
  }
}

/**
 * Reasoning-engine access is not configured. Raised once at startup, never
 * per request.
 */
export class MissingCredentialError extends LexLocatorError {
  readonly code = 'MISSING_CREDENTIAL';
  readonly retryable = false;

  constructor(
    readonly provider: ProviderKind,
    readonly variable: string,
  ) {
    super(`${variable} is not set; the ${provider} reasoning engine cannot be used`);
    this.name = 'MissingCredentialError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { provider: this.provider, variable: this.variable },
    };
  }
}

export class EmbeddingError extends LexLocatorError {
  readonly code = 'EMBEDDING_ERROR';

  constructor(
    readonly model: string,
    readonly retryable: boolean,
    message: string,
    readonly inputLength?: number,
  ) {
    super(`Embedding with ${model} failed: ${message}`);
    this.name = 'EmbeddingError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        model: this.model,
        inputLength: this.inputLength,
      },
    };
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export interface FieldIssue {
  path: string;
  message: string;
}

export class ValidationError extends LexLocatorError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
    /** Every problem found, when more than one field was checked. */
    readonly issues: FieldIssue[] = [],
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
        issues: this.issues,
      },
    };
  }
}

// ============================================================================
// GUARDS
// ============================================================================

export function isLexLocatorError(error: unknown): error is LexLocatorError {
  return error instanceof LexLocatorError;
}

export function isRetryableError(error: unknown): boolean {
  return isLexLocatorError(error) && error.retryable;
}
