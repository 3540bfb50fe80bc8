/**
 * @fileoverview Single-writer lock for ingestion
 *
 * Readers (the HTTP server, `search`, `find`) never take the lock; SQLite WAL
 * lets them read while one ingest process writes.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import lockfile from 'proper-lockfile';
import { StorageError } from '../core/errors.js';
import { logWarning } from '../telemetry/logger.js';
import { getErrorMessage, toError } from '../utils/errors.js';

const LOCK_STALE_TIMEOUT_MS = 120_000;
const LOCK_UPDATE_INTERVAL_MS = 10_000;
const LOCK_MAX_RETRIES = 5;

export interface WriteLock {
  /** Set when proper-lockfile reports the lock as compromised. */
  readonly compromised: Error | null;
  release(): Promise<void>;
}

/**
 * Acquire the ingest lock for `dbPath`. The database file is created empty
 * if missing, since proper-lockfile resolves the target path.
 */
export async function acquireWriteLock(dbPath: string): Promise<WriteLock> {
  const target = path.resolve(dbPath);
  const lockPath = `${target}.lock`;
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, '', { flag: 'a' });

  let compromised: Error | null = null;
  let release: (() => Promise<void>) | null = null;

  try {
    // proper-lockfile throws an uncaught exception on compromise unless a handler is given.
    release = await lockfile.lock(target, {
      lockfilePath: lockPath,
      stale: LOCK_STALE_TIMEOUT_MS,
      update: LOCK_UPDATE_INTERVAL_MS,
      onCompromised: (err) => {
        compromised = toError(err);
        logWarning('Ingest lock compromised; aborting writes', {
          path: lockPath,
          error: compromised.message,
        });
      },
      retries: {
        retries: LOCK_MAX_RETRIES,
        factor: 1.5,
        minTimeout: 200,
        maxTimeout: 10_000,
      },
    });
  } catch (error) {
    throw new StorageError('lock', true, `database is being written by another process: ${getErrorMessage(error)}`, toError(error));
  }

  const releaseFn = release;
  return {
    get compromised() {
      return compromised;
    },
    async release() {
      await releaseFn().catch((lockError: unknown) => {
        logWarning('Failed to release ingest lock', { path: lockPath, error: getErrorMessage(lockError) });
      });
    },
  };
}
