import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LoopCancelledError, MalformedTerminalPayloadError } from '../../core/errors.js';
import type { ParagraphRecord } from '../../core/types.js';
import type { ChatMessage, CompletionOptions, ReasoningEngine } from '../../reasoning/types.js';
import type { Retriever } from '../../retrieval/hybrid_retriever.js';
import { setLogLevel } from '../../telemetry/logger.js';
import { TimeoutError } from '../../utils/async.js';
import { OBSERVATION_STOP, SYSTEM_PROMPT } from '../prompt.js';
import { ITERATION_LIMIT_REASON, QueryRefinementLoop } from '../refinement_loop.js';

class ScriptedEngine implements ReasoningEngine {
  readonly id = 'scripted';
  readonly calls: ChatMessage[][] = [];
  readonly options: CompletionOptions[] = [];

  constructor(private readonly reply: (callIndex: number) => string | Promise<string>) {}

  static of(...replies: string[]): ScriptedEngine {
    return new ScriptedEngine((index) => replies[Math.min(index, replies.length - 1)] ?? '');
  }

  async complete(messages: readonly ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    this.calls.push(messages.map((message) => ({ ...message })));
    this.options.push(options);
    return this.reply(this.calls.length - 1);
  }
}

const GROUP_III: ParagraphRecord = {
  id: 1,
  docId: 1,
  chapterId: 1,
  paragraphId: 10,
  text: 'Inspection alone may be carried out by operating personnel with group III.',
};

function fakeRetriever(records: ParagraphRecord[] = [GROUP_III]) {
  const retrieve = vi.fn(async (_query: string, _k: number, _options?: { timeoutMs?: number }) => records);
  const retriever: Retriever = { retrieve };
  return { retriever, retrieve };
}

const SEARCH_TURN = 'Thought: search for the rule\nAction: hybrid_search\nAction Input: inspection group III';
const LOCATION_ANSWER = 'Thought: paragraph 10 states it\nFinal Answer: {"doc_id": 1, "chapter_id": 1, "paragraph_id": 10}';

const config = { maxIterations: 5, topK: 5, searchTimeoutMs: 1000 };

describe('QueryRefinementLoop', () => {
  beforeEach(() => {
    setLogLevel('silent');
  });

  afterEach(() => {
    setLogLevel(undefined);
  });

  it('searches, then returns the located paragraph', async () => {
    const engine = ScriptedEngine.of(SEARCH_TURN, LOCATION_ANSWER);
    const { retriever, retrieve } = fakeRetriever();
    const loop = new QueryRefinementLoop({ engine, retriever, config });

    const outcome = await loop.run({ question: 'Who may inspect alone?', correctAnswers: ['Group III staff'] });

    expect(outcome).toEqual({
      status: 'success',
      location: { doc_id: 1, chapter_id: 1, paragraph_id: 10 },
      iterations: 1,
      history: [
        {
          query: 'inspection group III',
          observation: `[doc_id=1, chapter_id=1, paragraph_id=10]\n${GROUP_III.text}`,
        },
      ],
    });
    expect(retrieve).toHaveBeenCalledWith('inspection group III', 5, { timeoutMs: 1000 });
  });

  it('sends the system prompt, the task and every observation', async () => {
    const engine = ScriptedEngine.of(SEARCH_TURN, LOCATION_ANSWER);
    const { retriever } = fakeRetriever();
    const loop = new QueryRefinementLoop({ engine, retriever, config });

    await loop.run({ question: 'Who may inspect alone?', correctAnswers: ['a', 'b'] });

    expect(engine.calls[0]).toEqual([
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: 'Question: Who may inspect alone?\nCorrect Answer: a, b' },
    ]);
    expect(engine.calls[1]?.slice(2)).toEqual([
      { role: 'assistant', content: SEARCH_TURN },
      { role: 'user', content: `Observation: [doc_id=1, chapter_id=1, paragraph_id=10]\n${GROUP_III.text}` },
    ]);
    expect(engine.options[0]).toEqual({ stop: [OBSERVATION_STOP] });
  });

  it('fails with the iteration limit after exactly maxIterations tool calls', async () => {
    const engine = ScriptedEngine.of(SEARCH_TURN);
    const { retriever, retrieve } = fakeRetriever();
    const loop = new QueryRefinementLoop({ engine, retriever, config: { ...config, maxIterations: 2 } });

    const outcome = await loop.run('Question: q\nCorrect Answer: a');

    expect(outcome).toMatchObject({
      status: 'failure',
      code: 'ITERATION_LIMIT_EXCEEDED',
      reason: 'iteration limit exceeded',
      iterations: 2,
    });
    expect(ITERATION_LIMIT_REASON).toBe('iteration limit exceeded');
    expect(retrieve).toHaveBeenCalledTimes(2);
    expect(engine.calls).toHaveLength(2);
  });

  it('reports an explicit error payload as not found', async () => {
    const engine = ScriptedEngine.of(
      SEARCH_TURN,
      'Final Answer: {"error": "Justification paragraph not found after multiple attempts."}'
    );
    const { retriever } = fakeRetriever([]);
    const loop = new QueryRefinementLoop({ engine, retriever, config });

    const outcome = await loop.run('task');

    expect(outcome).toMatchObject({
      status: 'failure',
      code: 'NOT_FOUND',
      reason: 'Justification paragraph not found after multiple attempts.',
      iterations: 1,
    });
  });

  it('does not let the engine claim the iteration limit', async () => {
    const engine = ScriptedEngine.of('Final Answer: {"error": "iteration limit exceeded"}');
    const { retriever } = fakeRetriever();
    const loop = new QueryRefinementLoop({ engine, retriever, config });

    expect(await loop.run('task')).toMatchObject({ status: 'failure', code: 'NOT_FOUND', iterations: 0 });
  });

  it('throws on a malformed final answer', async () => {
    const engine = ScriptedEngine.of(
      'Final Answer: {"doc_id": 1, "chapter_id": 1, "paragraph_id": 10} {"doc_id": 2, "chapter_id": 1, "paragraph_id": 3}'
    );
    const { retriever } = fakeRetriever();
    const loop = new QueryRefinementLoop({ engine, retriever, config });

    await expect(loop.run('task')).rejects.toBeInstanceOf(MalformedTerminalPayloadError);
  });

  it('accepts a fenced final answer', async () => {
    const engine = ScriptedEngine.of('Final Answer: ```json\n{"doc_id": 1, "chapter_id": 1, "paragraph_id": 10}\n```');
    const { retriever } = fakeRetriever();
    const loop = new QueryRefinementLoop({ engine, retriever, config });

    expect(await loop.run('task')).toMatchObject({
      status: 'success',
      location: { doc_id: 1, chapter_id: 1, paragraph_id: 10 },
    });
  });

  it('charges an unparseable turn and answers it with a correction', async () => {
    const engine = ScriptedEngine.of('Let me think about it.', LOCATION_ANSWER);
    const { retriever, retrieve } = fakeRetriever();
    const loop = new QueryRefinementLoop({ engine, retriever, config });

    const outcome = await loop.run('task');

    expect(outcome).toMatchObject({ status: 'success', iterations: 1 });
    expect(retrieve).not.toHaveBeenCalled();
    const correction = engine.calls[1]?.[3]?.content ?? '';
    expect(correction.startsWith('Observation: Your reply could not be used (turn has neither an action nor a final answer).')).toBe(true);
  });

  it('ends in the iteration limit when every turn is unparseable', async () => {
    const engine = ScriptedEngine.of('hmm');
    const { retriever } = fakeRetriever();
    const loop = new QueryRefinementLoop({ engine, retriever, config: { ...config, maxIterations: 1 } });

    expect(await loop.run('task')).toMatchObject({ status: 'failure', code: 'ITERATION_LIMIT_EXCEEDED', iterations: 1 });
  });

  it('stops before the first turn when already cancelled', async () => {
    const engine = ScriptedEngine.of(SEARCH_TURN);
    const { retriever } = fakeRetriever();
    const loop = new QueryRefinementLoop({ engine, retriever, config });
    const controller = new AbortController();
    controller.abort();

    await expect(loop.run('task', { signal: controller.signal })).rejects.toBeInstanceOf(LoopCancelledError);
    expect(engine.calls).toHaveLength(0);
  });

  it('stops at the next iteration boundary after cancellation', async () => {
    const controller = new AbortController();
    const engine = new ScriptedEngine(() => {
      controller.abort();
      return SEARCH_TURN;
    });
    const { retriever, retrieve } = fakeRetriever();
    const loop = new QueryRefinementLoop({ engine, retriever, config });

    const error = await loop.run('task', { signal: controller.signal }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LoopCancelledError);
    expect(error).toMatchObject({ iteration: 1 });
    expect(retrieve).toHaveBeenCalledTimes(1);
  });

  it('bounds each reasoning call by the configured timeout', async () => {
    vi.useFakeTimers();
    try {
      const engine = new ScriptedEngine(() => new Promise<string>(() => {}));
      const { retriever } = fakeRetriever();
      const loop = new QueryRefinementLoop({ engine, retriever, config: { ...config, llmTimeoutMs: 50 } });

      const assertion = expect(loop.run('task')).rejects.toBeInstanceOf(TimeoutError);
      await vi.advanceTimersByTimeAsync(60);
      await assertion;
    } finally {
      vi.useRealTimers();
    }
  });

  it('rejects a non-positive iteration budget', () => {
    const { retriever } = fakeRetriever();
    expect(
      () => new QueryRefinementLoop({ engine: ScriptedEngine.of(''), retriever, config: { ...config, maxIterations: 0 } })
    ).toThrow(RangeError);
  });
});
