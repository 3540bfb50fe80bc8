/**
 * @fileoverview Bounded query-refinement loop
 *
 * Drives the reasoning engine through search turns until it commits to a
 * paragraph, reports failure, or spends the iteration budget:
 *
 *   Thinking -> (ToolCall -> Thinking) x <= maxIterations -> Terminal
 *
 * Every non-terminal turn costs one iteration, unparseable ones included.
 * Budget exhaustion is decided here and cannot be overridden by the engine.
 * State lives only for the duration of `run`.
 */

import { LoopCancelledError } from '../core/errors.js';
import type { ParagraphLocation } from '../core/types.js';
import type { ChatMessage, ReasoningEngine } from '../reasoning/types.js';
import { formatObservation, type Retriever } from '../retrieval/hybrid_retriever.js';
import { logDebug, logInfo } from '../telemetry/logger.js';
import { withTimeout } from '../utils/async.js';
import {
  OBSERVATION_STOP,
  SYSTEM_PROMPT,
  buildTaskText,
  correctiveObservation,
  formatObservationMessage,
  type CitationTask,
} from './prompt.js';
import { parseTerminalPayload } from './terminal_payload.js';
import { parseTurn } from './turn_parser.js';

export const ITERATION_LIMIT_REASON = 'iteration limit exceeded';

export interface RefinementLoopConfig {
  maxIterations: number;
  topK: number;
  llmTimeoutMs?: number;
  searchTimeoutMs?: number;
}

export interface RefinementLoopDeps {
  engine: ReasoningEngine;
  retriever: Retriever;
  config: RefinementLoopConfig;
}

export interface LoopStep {
  /** Search query, or null when the turn could not be parsed. */
  query: string | null;
  observation: string;
}

export type FailureCode = 'NOT_FOUND' | 'ITERATION_LIMIT_EXCEEDED';

export type LoopOutcome =
  | { status: 'success'; location: ParagraphLocation; iterations: number; history: LoopStep[] }
  | { status: 'failure'; code: FailureCode; reason: string; iterations: number; history: LoopStep[] };

export interface RunOptions {
  signal?: AbortSignal;
}

export class QueryRefinementLoop {
  private readonly engine: ReasoningEngine;
  private readonly retriever: Retriever;
  private readonly config: RefinementLoopConfig;

  constructor(deps: RefinementLoopDeps) {
    if (!Number.isInteger(deps.config.maxIterations) || deps.config.maxIterations < 1) {
      throw new RangeError(`maxIterations must be a positive integer, got ${deps.config.maxIterations}`);
    }
    this.engine = deps.engine;
    this.retriever = deps.retriever;
    this.config = deps.config;
  }

  /**
   * Run one request to completion.
   *
   * @throws MalformedTerminalPayloadError when the engine's final answer cannot be parsed
   * @throws LoopCancelledError when `signal` aborts between iterations
   */
  async run(task: CitationTask | string, options: RunOptions = {}): Promise<LoopOutcome> {
    const taskText = typeof task === 'string' ? task : buildTaskText(task);
    const messages: ChatMessage[] = [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: taskText },
    ];
    const history: LoopStep[] = [];
    let iteration = 0;

    for (;;) {
      if (options.signal?.aborted) {
        throw new LoopCancelledError(iteration);
      }
      if (iteration >= this.config.maxIterations) {
        logInfo('Refinement loop spent its iteration budget', { iterations: iteration });
        return {
          status: 'failure',
          code: 'ITERATION_LIMIT_EXCEEDED',
          reason: ITERATION_LIMIT_REASON,
          iterations: iteration,
          history,
        };
      }

      const text = await withTimeout(
        this.engine.complete(messages, { stop: [OBSERVATION_STOP] }),
        this.config.llmTimeoutMs,
        `reasoning turn ${iteration + 1}`
      );
      const turn = parseTurn(text);
      logDebug('Reasoning turn', { iteration, kind: turn.kind, engine: this.engine.id });

      if (turn.kind === 'final_answer') {
        const parsed = parseTerminalPayload(turn.payload);
        if (!parsed.ok) {
          throw parsed.error;
        }
        if (parsed.value.kind === 'error') {
          logInfo('Reasoning engine reported no justification', { iterations: iteration });
          return { status: 'failure', code: 'NOT_FOUND', reason: parsed.value.reason, iterations: iteration, history };
        }
        logInfo('Justifying paragraph located', { iterations: iteration, ...parsed.value.location });
        return { status: 'success', location: parsed.value.location, iterations: iteration, history };
      }

      iteration += 1;
      let step: LoopStep;
      if (turn.kind === 'tool_call') {
        const records = await this.retriever.retrieve(turn.query, this.config.topK, {
          timeoutMs: this.config.searchTimeoutMs,
        });
        step = { query: turn.query, observation: formatObservation(records) };
      } else {
        step = { query: null, observation: correctiveObservation(turn.reason) };
      }
      history.push(step);
      messages.push(
        { role: 'assistant', content: text.trimEnd() },
        { role: 'user', content: formatObservationMessage(step.observation) }
      );
    }
  }
}
