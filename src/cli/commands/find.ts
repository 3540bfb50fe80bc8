import { parseCommandArgs } from '../args.js';
import { CliError } from '../errors.js';
import { createSpinner } from '../progress.js';
import type { CommandContext } from './context.js';

export async function findCommand({ locator, args }: CommandContext): Promise<void> {
  const { values } = parseCommandArgs({
    args,
    options: {
      question: { type: 'string' },
      answer: { type: 'string', multiple: true },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: false,
  });

  const question = values.question?.trim();
  if (!question) {
    throw new CliError('--question is required. Usage: lexlocator find --question "<text>" --answer "<text>"', 'EINVALID_ARGUMENT');
  }
  const answers = values.answer ?? [];
  if (answers.length === 0) {
    throw new CliError('At least one --answer is required', 'EINVALID_ARGUMENT');
  }

  // Ctrl-C stops the loop at its next iteration boundary.
  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  const json = values.json === true;
  const spinner = json ? null : createSpinner('Searching for the justifying paragraph...');
  try {
    const location = await locator.findParagraph(
      { question: { text: question }, answers, correctAnswers: answers },
      { signal: controller.signal }
    );
    spinner?.succeed('Paragraph found');
    if (json) {
      console.log(JSON.stringify(location));
      return;
    }
    console.log(`doc_id=${location.doc_id} chapter_id=${location.chapter_id} paragraph_id=${location.paragraph_id}`);
    const paragraph = await locator.getParagraph(location);
    if (paragraph) {
      console.log(paragraph.text);
    }
  } catch (error) {
    spinner?.fail('No paragraph located');
    throw error;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
