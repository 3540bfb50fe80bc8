#!/usr/bin/env node
/**
 * @fileoverview lexlocator CLI entry point
 */

import dotenv from 'dotenv';
import { classifyError, formatErrorJson, formatErrorWithHints, getExitCode } from './errors.js';
import { runCli } from './run.js';

dotenv.config();

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    // Fatal errors also get structured output if possible
    const envelope = classifyError(error);
    console.error(process.argv.includes('--json') ? formatErrorJson(envelope) : formatErrorWithHints(envelope));
    process.exitCode = getExitCode(envelope);
  });
