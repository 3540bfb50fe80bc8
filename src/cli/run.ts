/**
 * @fileoverview Command dispatch for the lexlocator CLI
 *
 * Commands:
 *   lexlocator ingest <dir>        - Index a directory of documents
 *   lexlocator search "<query>"    - Run one hybrid search
 *   lexlocator find                - Locate the justifying paragraph
 *   lexlocator serve               - Start the HTTP API
 *   lexlocator status              - Show index statistics
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { createLexLocator, type LexLocator } from '../api/lexlocator.js';
import { loadConfig } from '../config/index.js';
import { LEXLOCATOR_VERSION } from '../version.js';
import { findCommand } from './commands/find.js';
import { ingestCommand } from './commands/ingest.js';
import { searchCommand } from './commands/search.js';
import { serveCommand } from './commands/serve.js';
import { statusCommand } from './commands/status.js';
import {
  classifyError,
  createErrorEnvelope,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
  type ErrorEnvelope,
} from './errors.js';
import { showHelp } from './help.js';

const COMMANDS = ['ingest', 'search', 'find', 'serve', 'status', 'help'] as const;

type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

/**
 * Output a structured error for agent consumption
 */
function outputStructuredError(envelope: ErrorEnvelope, useJson: boolean): void {
  console.error(useJson ? formatErrorJson(envelope) : formatErrorWithHints(envelope));
}

export interface RunCliOptions {
  /** Builds the locator; defaults to configuration from the environment. */
  createLocator?: () => Promise<LexLocator>;
}

/** Run one CLI invocation and return its exit code. */
export async function runCli(args: string[], options: RunCliOptions = {}): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
    },
    allowPositionals: true,
    strict: false,
  });

  if (values.version === true) {
    console.log(`lexlocator ${LEXLOCATOR_VERSION}`);
    return 0;
  }

  const command = positionals[0];
  if (values.help === true || command === undefined || command === 'help') {
    showHelp(command === 'help' ? positionals[1] : command);
    return 0;
  }

  const jsonMode = args.includes('--json');
  if (!isCommand(command)) {
    const envelope = createErrorEnvelope('EINVALID_ARGUMENT', `Unknown command: ${command}`, {
      recoveryHints: [`Run 'lexlocator help' for usage information`, `Available commands: ${COMMANDS.join(', ')}`],
      context: { command },
    });
    outputStructuredError(envelope, jsonMode);
    return getExitCode(envelope);
  }

  const commandArgs = args.slice(args.indexOf(command) + 1);
  let locator: LexLocator | null = null;
  try {
    locator = await (options.createLocator ?? (() => createLexLocator({ config: loadConfig() })))();
    const context = { locator, args: commandArgs };
    switch (command) {
      case 'ingest':
        await ingestCommand(context);
        break;
      case 'search':
        await searchCommand(context);
        break;
      case 'find':
        await findCommand(context);
        break;
      case 'serve': {
        const { closed } = await serveCommand(context);
        await closed;
        break;
      }
      case 'status':
        await statusCommand(context);
        break;
    }
    return 0;
  } catch (error) {
    const envelope = classifyError(error);
    if (envelope.context) {
      envelope.context.command = command;
    }
    outputStructuredError(envelope, jsonMode);
    return getExitCode(envelope);
  } finally {
    await locator?.shutdown();
  }
}
