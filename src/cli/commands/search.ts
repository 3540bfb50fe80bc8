import { toLocation } from '../../core/types.js';
import { formatObservation } from '../../retrieval/hybrid_retriever.js';
import { parseCommandArgs, parsePositiveInt } from '../args.js';
import { CliError } from '../errors.js';
import type { CommandContext } from './context.js';

export async function searchCommand({ locator, args }: CommandContext): Promise<void> {
  const { values, positionals } = parseCommandArgs({
    args,
    options: {
      limit: { type: 'string' },
      'keyword-only': { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
  });

  const query = positionals.join(' ').trim();
  if (!query) {
    throw new CliError('A query is required. Usage: lexlocator search "<query>"', 'EINVALID_ARGUMENT');
  }

  const records = await locator.search(query, {
    limit: parsePositiveInt(values.limit, '--limit'),
    keywordOnly: values['keyword-only'] === true,
  });

  if (values.json === true) {
    console.log(JSON.stringify(records.map((record) => ({ id: record.id, ...toLocation(record), text: record.text })), null, 2));
    return;
  }
  console.log(formatObservation(records));
}
