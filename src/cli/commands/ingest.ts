import * as fs from 'node:fs/promises';
import { parseCommandArgs, parsePositiveInt } from '../args.js';
import { CliError } from '../errors.js';
import { createIngestProgress, formatDuration, printKeyValue } from '../progress.js';
import type { CommandContext } from './context.js';

export async function ingestCommand({ locator, args }: CommandContext): Promise<void> {
  const { values, positionals } = parseCommandArgs({
    args,
    options: {
      recreate: { type: 'boolean', default: false },
      'batch-size': { type: 'string' },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
  });

  const directory = positionals[0];
  if (!directory) {
    throw new CliError('Source directory is required. Usage: lexlocator ingest <dir>', 'EINVALID_ARGUMENT');
  }
  const stats = await fs.stat(directory);
  if (!stats.isDirectory()) {
    throw new CliError(`Not a directory: ${directory}`, 'EINVALID_ARGUMENT', { directory });
  }

  const json = values.json === true;
  const progress = json ? null : createIngestProgress();
  const summary = await locator
    .ingestDirectory(directory, {
      recreate: values.recreate === true,
      batchSize: parsePositiveInt(values['batch-size'], '--batch-size'),
      onProgress: (indexed, total) => progress?.update(indexed, total),
    })
    .finally(() => progress?.stop());

  if (json) {
    console.log(JSON.stringify(summary, null, 2));
    return;
  }

  console.log('Ingestion complete');
  printKeyValue([
    { key: 'Files', value: summary.files.length },
    { key: 'Skipped files', value: summary.skipped.length },
    { key: 'Paragraphs', value: summary.indexed },
    { key: 'Embedding model', value: `${summary.model} (${summary.dimension} dims)` },
    { key: 'Duration', value: formatDuration(summary.durationMs) },
  ]);
  for (const skipped of summary.skipped) {
    console.log(`  skipped ${skipped.file}: ${skipped.reason}`);
  }
}
