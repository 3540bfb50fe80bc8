import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLexLocator } from '../../api/lexlocator.js';
import { loadConfig } from '../../config/index.js';
import type { ReasoningEngine } from '../../reasoning/types.js';
import { setLogLevel } from '../../telemetry/logger.js';
import { LEXLOCATOR_VERSION } from '../../version.js';
import { HashingEmbedder } from '../../../test/helpers/hashing_embedder.js';
import { ScriptedEngine } from '../../../test/helpers/scripted_engine.js';
import { runCli } from '../run.js';

const DOCUMENT = {
  id: 1,
  chapters: [
    {
      id: 1,
      paragraphs: [
        { id: 10, content: '<p>Inspection alone may be carried out by operating personnel with group III.</p>' },
        { id: 11, content: '<p>Switching operations require a written order and two persons present.</p>' },
      ],
    },
  ],
};

describe('runCli', () => {
  let dir: string;
  let dbPath: string;
  let stdout: string[];
  let stderr: string[];

  beforeEach(async () => {
    setLogLevel('silent');
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lexlocator-cli-'));
    dbPath = path.join(dir, 'index.sqlite');
    await fs.mkdir(path.join(dir, 'docs'));
    await fs.writeFile(path.join(dir, 'docs', 'doc_1.json'), JSON.stringify(DOCUMENT));
    stdout = [];
    stderr = [];
    vi.spyOn(console, 'log').mockImplementation((...parts: unknown[]) => {
      stdout.push(parts.map(String).join(' '));
    });
    vi.spyOn(console, 'error').mockImplementation((...parts: unknown[]) => {
      stderr.push(parts.map(String).join(' '));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    setLogLevel(undefined);
    await fs.rm(dir, { recursive: true, force: true });
  });

  function run(args: string[], engine?: ReasoningEngine): Promise<number> {
    return runCli(args, {
      createLocator: () =>
        createLexLocator({
          config: loadConfig({ LEXLOCATOR_DB_PATH: dbPath, OPENAI_API_KEY: 'test-secret' }),
          embedder: new HashingEmbedder(),
          engine,
        }),
    });
  }

  it('prints the version', async () => {
    expect(await run(['--version'])).toBe(0);
    expect(stdout).toEqual([`lexlocator ${LEXLOCATOR_VERSION}`]);
  });

  it('reports an unknown command with the argument exit code', async () => {
    expect(await run(['frobnicate'])).toBe(50);
    expect(stderr[0]).toMatch(/^Error \[EINVALID_ARGUMENT\]: Unknown command: frobnicate/);
  });

  it('ingests a directory and searches it', async () => {
    expect(await run(['ingest', path.join(dir, 'docs'), '--json'])).toBe(0);
    const summary: unknown = JSON.parse(stdout.join('\n'));
    expect(summary).toMatchObject({ indexed: 2, files: ['doc_1.json'], skipped: [] });

    stdout = [];
    expect(await run(['search', 'group', 'III', '--keyword-only', '--limit', '1'])).toBe(0);
    expect(stdout).toEqual([
      '[doc_id=1, chapter_id=1, paragraph_id=10]\nInspection alone may be carried out by operating personnel with group III.',
    ]);
  });

  it('prints status as JSON', async () => {
    await run(['ingest', path.join(dir, 'docs')]);
    stdout = [];

    expect(await run(['status', '--json'])).toBe(0);
    expect(JSON.parse(stdout.join('\n'))).toMatchObject({
      dbPath,
      paragraphs: 2,
      documents: 1,
      vectors: 2,
      collection: { dimension: 64, model: 'hashing-test' },
    });
  });

  it('finds the justifying paragraph', async () => {
    await run(['ingest', path.join(dir, 'docs')]);
    stdout = [];
    const engine = new ScriptedEngine([
      'Action: hybrid_search\nAction Input: inspection group III',
      'Final Answer: {"doc_id": 1, "chapter_id": 1, "paragraph_id": 10}',
    ]);

    const code = await run(['find', '--question', 'Who may inspect alone?', '--answer', 'Group III staff', '--json'], engine);

    expect(code).toBe(0);
    expect(stdout).toEqual(['{"doc_id":1,"chapter_id":1,"paragraph_id":10}']);
  });

  it('prints the located paragraph with its text', async () => {
    await run(['ingest', path.join(dir, 'docs')]);
    stdout = [];
    const engine = new ScriptedEngine(['Final Answer: {"doc_id": 1, "chapter_id": 1, "paragraph_id": 11}']);

    expect(await run(['find', '--question', 'Who orders switching?', '--answer', 'A written order'], engine)).toBe(0);
    expect(stdout).toEqual([
      'doc_id=1 chapter_id=1 paragraph_id=11',
      'Switching operations require a written order and two persons present.',
    ]);
  });

  it('exits with the not-found code when no paragraph justifies the answer', async () => {
    const engine = new ScriptedEngine(['Final Answer: {"error": "Justification paragraph not found."}']);

    const code = await run(['find', '--question', 'q', '--answer', 'a', '--json'], engine);

    expect(code).toBe(20);
    expect(JSON.parse(stderr.join('\n'))).toMatchObject({
      error: { code: 'ENOT_FOUND', message: 'Justification paragraph not found.', context: { command: 'find' } },
    });
  });

  it('requires an answer for find', async () => {
    expect(await run(['find', '--question', 'q'])).toBe(50);
    expect(stderr[0]?.split('\n')[0]).toBe('Error [EINVALID_ARGUMENT]: At least one --answer is required');
  });

  it('rejects a non-numeric limit', async () => {
    expect(await run(['search', 'q', '--limit', 'ten'])).toBe(50);
    expect(stderr[0]?.split('\n')[0]).toBe('Error [EINVALID_ARGUMENT]: --limit must be a positive integer, got "ten"');
  });

  it('rejects unknown flags', async () => {
    expect(await run(['status', '--verbose'])).toBe(50);
  });

  it('reports a missing source directory', async () => {
    expect(await run(['ingest', path.join(dir, 'missing')])).toBe(51);
  });
});
