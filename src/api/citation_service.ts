/**
 * @fileoverview Request-level entry point: question in, paragraph location out
 */

import { z } from 'zod';
import {
  IterationLimitExceededError,
  MalformedTerminalPayloadError,
  NotFoundError,
  ValidationError,
  isLexLocatorError,
} from '../core/errors.js';
import type { ParagraphLocation } from '../core/types.js';
import type { LoopOutcome, RunOptions } from '../agent/refinement_loop.js';
import type { CitationTask } from '../agent/prompt.js';
import { logInfo } from '../telemetry/logger.js';
import { formatZodIssues } from '../utils/output_validator.js';

export const findParagraphRequestSchema = z.object({
  question: z.object({
    text: z.string().trim().min(1, 'question text must not be empty'),
    // Accepted for compatibility; images are not used for retrieval.
    imageBase64: z.string().nullish(),
  }),
  answers: z.array(z.string()),
  correctAnswers: z.array(z.string().trim().min(1)).min(1, 'at least one correct answer is required'),
});

export type FindParagraphRequest = z.infer<typeof findParagraphRequestSchema>;

/** The part of the loop the service needs. */
export interface CitationLoop {
  run(task: CitationTask, options?: RunOptions): Promise<LoopOutcome>;
}

export function parseFindParagraphRequest(payload: unknown): FindParagraphRequest {
  const parsed = findParagraphRequestSchema.safeParse(payload);
  if (parsed.success) {
    return parsed.data;
  }
  const issues = parsed.error.issues.map((issue) => ({
    path: issue.path.length > 0 ? `$.${issue.path.join('.')}` : '$',
    message: issue.message,
  }));
  const first = issues[0] ?? { path: '$', message: 'invalid request' };
  throw new ValidationError(first.path, first.message, formatZodIssues(parsed.error).join('; '), issues);
}

export class CitationService {
  constructor(private readonly loop: CitationLoop) {}

  /**
   * @throws ValidationError for a payload that does not match the request contract
   * @throws NotFoundError when the engine reports that no paragraph justifies the answer
   * @throws IterationLimitExceededError when the loop spends its budget
   * @throws MalformedTerminalPayloadError when the engine's final answer cannot be parsed
   */
  async findParagraph(payload: unknown, options: RunOptions = {}): Promise<ParagraphLocation> {
    const request = parseFindParagraphRequest(payload);
    const outcome = await this.loop.run(
      { question: request.question.text, correctAnswers: request.correctAnswers },
      options
    );

    if (outcome.status === 'success') {
      return outcome.location;
    }
    logInfo('No justifying paragraph', { code: outcome.code, reason: outcome.reason, iterations: outcome.iterations });
    if (outcome.code === 'ITERATION_LIMIT_EXCEEDED') {
      throw new IterationLimitExceededError(outcome.iterations);
    }
    throw new NotFoundError(outcome.reason);
  }
}

export interface ErrorClassification {
  status: number;
  code: string;
  detail: string;
  /** Unexpected faults: log them, never echo internals to the client. */
  internal: boolean;
}

/**
 * Map a failure to its HTTP class. "No justification exists" (404) stays
 * distinct from "the system malfunctioned" (500).
 */
export function classifyError(error: unknown): ErrorClassification {
  if (error instanceof NotFoundError) {
    return { status: 404, code: 'NOT_FOUND', detail: error.message, internal: false };
  }
  if (error instanceof IterationLimitExceededError) {
    return { status: 404, code: 'ITERATION_LIMIT_EXCEEDED', detail: error.message, internal: false };
  }
  if (error instanceof ValidationError) {
    return { status: 422, code: 'UNPROCESSABLE_ENTITY', detail: error.message, internal: false };
  }
  if (error instanceof MalformedTerminalPayloadError) {
    return { status: 500, code: 'MALFORMED_TERMINAL_PAYLOAD', detail: error.message, internal: true };
  }
  return {
    status: 500,
    code: 'INTERNAL',
    detail: isLexLocatorError(error) ? `internal error (${error.code})` : 'internal error',
    internal: true,
  };
}
