import { describe, expect, it, vi } from 'vitest';
import {
  IterationLimitExceededError,
  LoopCancelledError,
  MalformedTerminalPayloadError,
  NotFoundError,
  ValidationError,
} from '../../core/errors.js';
import type { LoopOutcome } from '../../agent/refinement_loop.js';
import { CitationService, classifyError, parseFindParagraphRequest, type CitationLoop } from '../citation_service.js';

const REQUEST = {
  question: { text: '  Who may carry out inspections alone?  ', imageBase64: null },
  answers: ['Group II staff', 'Group III staff'],
  correctAnswers: ['Group III staff'],
};

function loopReturning(outcome: LoopOutcome) {
  const run = vi.fn(async () => outcome);
  const loop: CitationLoop = { run };
  return { loop, run };
}

describe('parseFindParagraphRequest', () => {
  it('trims the question text', () => {
    expect(parseFindParagraphRequest(REQUEST).question.text).toBe('Who may carry out inspections alone?');
  });

  it('accepts a request without an image', () => {
    const { question, ...rest } = REQUEST;
    expect(parseFindParagraphRequest({ ...rest, question: { text: question.text } }).correctAnswers).toEqual([
      'Group III staff',
    ]);
  });

  it('reports every invalid field with its path', () => {
    const error = (() => {
      try {
        parseFindParagraphRequest({ question: { text: '   ' }, answers: [], correctAnswers: [] });
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      field: '$.question.text',
      issues: [
        { path: '$.question.text', message: 'question text must not be empty' },
        { path: '$.correctAnswers', message: 'at least one correct answer is required' },
      ],
    });
  });

  it('rejects a payload that is not an object', () => {
    expect(() => parseFindParagraphRequest('question')).toThrow(ValidationError);
  });
});

describe('CitationService', () => {
  it('returns the located paragraph', async () => {
    const { loop, run } = loopReturning({
      status: 'success',
      location: { doc_id: 9, chapter_id: 5, paragraph_id: 434408 },
      iterations: 1,
      history: [],
    });
    const service = new CitationService(loop);

    await expect(service.findParagraph(REQUEST)).resolves.toEqual({ doc_id: 9, chapter_id: 5, paragraph_id: 434408 });
    expect(run).toHaveBeenCalledWith(
      { question: 'Who may carry out inspections alone?', correctAnswers: ['Group III staff'] },
      {}
    );
  });

  it('raises NotFoundError for an explicit not-found answer', async () => {
    const { loop } = loopReturning({
      status: 'failure',
      code: 'NOT_FOUND',
      reason: 'Justification paragraph not found.',
      iterations: 2,
      history: [],
    });

    const error = await new CitationService(loop).findParagraph(REQUEST).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ message: 'Justification paragraph not found.' });
  });

  it('raises IterationLimitExceededError when the budget is spent', async () => {
    const { loop } = loopReturning({
      status: 'failure',
      code: 'ITERATION_LIMIT_EXCEEDED',
      reason: 'iteration limit exceeded',
      iterations: 5,
      history: [],
    });

    await expect(new CitationService(loop).findParagraph(REQUEST)).rejects.toBeInstanceOf(IterationLimitExceededError);
  });

  it('does not run the loop for an invalid request', async () => {
    const { loop, run } = loopReturning({ status: 'failure', code: 'NOT_FOUND', reason: 'x', iterations: 0, history: [] });

    await expect(new CitationService(loop).findParagraph({ answers: [] })).rejects.toBeInstanceOf(ValidationError);
    expect(run).not.toHaveBeenCalled();
  });
});

describe('classifyError', () => {
  it('keeps "not justified" apart from malfunctions', () => {
    expect(classifyError(new NotFoundError('none'))).toEqual({
      status: 404,
      code: 'NOT_FOUND',
      detail: 'none',
      internal: false,
    });
    expect(classifyError(new IterationLimitExceededError(5))).toMatchObject({
      status: 404,
      code: 'ITERATION_LIMIT_EXCEEDED',
      internal: false,
    });
    expect(classifyError(new MalformedTerminalPayloadError('no structured object found', 'hm'))).toMatchObject({
      status: 500,
      code: 'MALFORMED_TERMINAL_PAYLOAD',
      internal: true,
    });
  });

  it('maps validation failures to 422', () => {
    expect(classifyError(new ValidationError('$.answers', 'array', 'string'))).toMatchObject({
      status: 422,
      code: 'UNPROCESSABLE_ENTITY',
    });
  });

  it('hides the message of unexpected errors', () => {
    expect(classifyError(new Error('disk on fire'))).toEqual({
      status: 500,
      code: 'INTERNAL',
      detail: 'internal error',
      internal: true,
    });
    expect(classifyError(new LoopCancelledError(2))).toMatchObject({
      status: 500,
      detail: 'internal error (LOOP_CANCELLED)',
    });
  });
});
