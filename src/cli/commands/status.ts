import { parseCommandArgs } from '../args.js';
import { printKeyValue } from '../progress.js';
import type { CommandContext } from './context.js';

export async function statusCommand({ locator, args }: CommandContext): Promise<void> {
  const { values } = parseCommandArgs({
    args,
    options: { json: { type: 'boolean', default: false } },
    allowPositionals: false,
  });

  const status = await locator.getStatus();
  if (values.json === true) {
    console.log(JSON.stringify(status, null, 2));
    return;
  }

  console.log('LexLocator Status');
  console.log('=================\n');

  console.log('Index:');
  printKeyValue([
    { key: 'Database', value: status.dbPath },
    { key: 'Documents', value: status.documents },
    { key: 'Paragraphs', value: status.paragraphs },
    { key: 'Vectors', value: status.vectors },
    {
      key: 'Vector collection',
      value: status.collection ? `${status.collection.model} (${status.collection.dimension} dims)` : null,
    },
  ]);
  console.log();

  console.log('Providers:');
  printKeyValue([
    { key: 'Embedding', value: `${status.embedding.provider} / ${status.embedding.model}` },
    { key: 'Reasoning', value: `${status.reasoning.provider} / ${status.reasoning.model ?? 'not set'}` },
  ]);

  if (status.paragraphs === 0) {
    console.log('\nThe index is empty. Run `lexlocator ingest <dir>` to build it.');
  } else if (status.vectors !== status.paragraphs) {
    console.log('\nVector and paragraph counts differ. Re-run `lexlocator ingest <dir> --recreate`.');
  }
}
