import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createLexLocator, type LexLocator } from '../src/api/lexlocator.js';
import { createRequestHandler } from '../src/api/http_server.js';
import { loadConfig } from '../src/config/index.js';
import { setLogLevel } from '../src/telemetry/logger.js';
import { HashingEmbedder } from './helpers/hashing_embedder.js';
import { ScriptedEngine } from './helpers/scripted_engine.js';

const SAFETY_RULES = {
  id: 1,
  chapters: [
    {
      id: 1,
      paragraphs: [
        { id: 10, content: '<p>Inspection alone may be carried out by operating personnel with group III.</p>' },
        { id: 11, content: '<p>Switching operations require a written order and two persons present.</p>' },
        { id: 12, content: '<h2>Chapter 1</h2>' },
      ],
    },
    {
      id: 2,
      paragraphs: [
        { id: 1, content: 'Portable earthing is applied only after checking that no voltage is present.' },
      ],
    },
  ],
};

const BODY = JSON.stringify({
  question: { text: 'Who may carry out inspections alone?', imageBase64: null },
  answers: ['Any staff member', 'Operating personnel with group III'],
  correctAnswers: ['Operating personnel with group III'],
});

const SEARCH = 'Thought: look up the inspection rule\nAction: hybrid_search\nAction Input: inspection group III';

describe('find_paragraph pipeline', () => {
  let dir: string;
  let locator: LexLocator | null = null;

  beforeEach(async () => {
    setLogLevel('silent');
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lexlocator-pipeline-'));
    await fs.writeFile(path.join(dir, 'doc_1.json'), JSON.stringify(SAFETY_RULES));
  });

  afterEach(async () => {
    await locator?.shutdown();
    locator = null;
    setLogLevel(undefined);
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function setup(engine: ScriptedEngine, env: Record<string, string> = {}) {
    locator = await createLexLocator({
      config: loadConfig({ LEXLOCATOR_DB_PATH: ':memory:', OPENAI_API_KEY: 'test-secret', ...env }),
      embedder: new HashingEmbedder(),
      engine,
    });
    const summary = await locator.ingestDirectory(dir);
    const handle = createRequestHandler({ service: locator.getCitationService(), generateRequestId: () => 'req-1' });
    return { handle, summary, locator };
  }

  it('indexes paragraphs and skips headings', async () => {
    const { summary, locator: ready } = await setup(new ScriptedEngine(['']));

    expect(summary).toMatchObject({ indexed: 3, files: ['doc_1.json'] });
    expect(await ready.getStatus()).toMatchObject({ paragraphs: 3, documents: 1, vectors: 3 });
  });

  it('searches, then answers with the paragraph location', async () => {
    const engine = new ScriptedEngine([
      SEARCH,
      'Thought: paragraph 10 states it\nFinal Answer: ```json\n{"doc_id": 1, "chapter_id": 1, "paragraph_id": 10}\n```',
    ]);
    const { handle } = await setup(engine);

    const response = await handle({ method: 'POST', path: '/find_paragraph', contentType: 'application/json', body: BODY });

    expect(response.status).toBe(200);
    expect(JSON.parse(response.body)).toEqual({ doc_id: 1, chapter_id: 1, paragraph_id: 10 });
    const observation = engine.transcripts[1]?.at(-1)?.content ?? '';
    expect(
      observation.startsWith(
        'Observation: [doc_id=1, chapter_id=1, paragraph_id=10]\nInspection alone may be carried out by operating personnel with group III.'
      )
    ).toBe(true);
  });

  it('puts the correct answer into the task', async () => {
    const engine = new ScriptedEngine(['Final Answer: {"doc_id": 1, "chapter_id": 1, "paragraph_id": 10}']);
    const { handle } = await setup(engine);

    await handle({ method: 'POST', path: '/find_paragraph', contentType: 'application/json', body: BODY });

    expect(engine.transcripts[0]?.[1]).toEqual({
      role: 'user',
      content: 'Question: Who may carry out inspections alone?\nCorrect Answer: Operating personnel with group III',
    });
  });

  it('answers 404 once the search budget is spent', async () => {
    const engine = new ScriptedEngine([SEARCH]);
    const { handle } = await setup(engine, { LEXLOCATOR_MAX_ITERATIONS: '2' });

    const response = await handle({ method: 'POST', path: '/find_paragraph', contentType: 'application/json', body: BODY });

    expect(response.status).toBe(404);
    expect(JSON.parse(response.body)).toMatchObject({
      code: 'ITERATION_LIMIT_EXCEEDED',
      detail: 'iteration limit exceeded (2 iterations)',
    });
    expect(engine.transcripts).toHaveLength(2);
  });

  it('answers 500 when the engine names two paragraphs', async () => {
    const engine = new ScriptedEngine([
      'Final Answer: {"doc_id": 1, "chapter_id": 1, "paragraph_id": 10} or {"doc_id": 1, "chapter_id": 2, "paragraph_id": 1}',
    ]);
    const { handle } = await setup(engine);

    const response = await handle({ method: 'POST', path: '/find_paragraph', contentType: 'application/json', body: BODY });

    expect(response.status).toBe(500);
    expect(JSON.parse(response.body)).toMatchObject({ code: 'MALFORMED_TERMINAL_PAYLOAD' });
  });

  it('answers 422 without calling the engine for a request with no correct answer', async () => {
    const engine = new ScriptedEngine(['']);
    const { handle } = await setup(engine);

    const response = await handle({
      method: 'POST',
      path: '/find_paragraph',
      contentType: 'application/json',
      body: JSON.stringify({ question: { text: 'q' }, answers: [], correctAnswers: [] }),
    });

    expect(response.status).toBe(422);
    expect(engine.transcripts).toHaveLength(0);
  });

  it('searches the index directly', async () => {
    const { locator: ready } = await setup(new ScriptedEngine(['']));

    const results = await ready.search('earthing voltage', { limit: 1 });

    expect(results.map((record) => [record.docId, record.chapterId, record.paragraphId])).toEqual([[1, 2, 1]]);
  });
});
