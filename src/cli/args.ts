import { parseArgs, type ParseArgsConfig } from 'node:util';
import { getErrorMessage } from '../utils/errors.js';
import { CliError } from './errors.js';

/** `parseArgs` with unknown flags and missing values reported as CLI errors. */
export function parseCommandArgs<T extends ParseArgsConfig>(config: T): ReturnType<typeof parseArgs<T>> {
  try {
    return parseArgs(config);
  } catch (error) {
    throw new CliError(getErrorMessage(error), 'EINVALID_ARGUMENT');
  }
}

export function parsePositiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new CliError(`${flag} must be a positive integer, got "${value}"`, 'EINVALID_ARGUMENT', { flag, value });
  }
  return parsed;
}

export function parsePort(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
    throw new CliError(`--port must be between 0 and 65535, got "${value}"`, 'EINVALID_ARGUMENT', { flag: '--port', value });
  }
  return parsed;
}
