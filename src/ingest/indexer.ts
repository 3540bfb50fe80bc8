/**
 * @fileoverview Ingestion into the record store and both indexes
 *
 * One writer at a time (file lock on the database). Every paragraph lands in
 * the record store, the keyword index and the vector index inside one SQLite
 * transaction per batch, so a reader never sees an id that exists in one
 * place and not the others.
 */

import { StorageError } from '../core/errors.js';
import type { ParagraphId, ParagraphInput } from '../core/types.js';
import type { EmbeddingProvider } from '../embeddings/types.js';
import { IN_MEMORY_PATH, type SqliteDatabase } from '../storage/database.js';
import type { KeywordIndex } from '../storage/keyword_index.js';
import type { ParagraphStore } from '../storage/paragraph_store.js';
import type { VectorIndex } from '../storage/vector_index.js';
import { acquireWriteLock, type WriteLock } from '../storage/write_lock.js';
import { logInfo } from '../telemetry/logger.js';

export const DEFAULT_BATCH_SIZE = 32;

export interface IngestDeps {
  db: SqliteDatabase;
  store: ParagraphStore;
  keyword: KeywordIndex;
  vector: VectorIndex;
  embedder: EmbeddingProvider;
  /** Database file guarded by the write lock; `:memory:` is not locked. */
  dbPath: string;
}

export interface IngestOptions {
  /** Drop every record, keyword entry and vector point first. */
  recreate?: boolean;
  batchSize?: number;
  onProgress?: (indexed: number, total: number) => void;
}

export interface IngestSummary {
  indexed: number;
  batches: number;
  dimension: number;
  model: string;
  durationMs: number;
}

interface EmbeddedParagraph {
  input: ParagraphInput;
  vector: Float32Array;
}

export async function ingestParagraphs(
  inputs: readonly ParagraphInput[],
  deps: IngestDeps,
  options: IngestOptions = {}
): Promise<IngestSummary> {
  const started = Date.now();
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }
  const { db, store, keyword, vector, embedder } = deps;

  const lock: WriteLock | null = deps.dbPath === IN_MEMORY_PATH ? null : await acquireWriteLock(deps.dbPath);
  try {
    if (options.recreate) {
      db.transaction(() => {
        store.clear();
        keyword.clear();
        vector.recreateCollection(embedder.dimension, embedder.modelId);
      })();
      logInfo('Cleared existing index', { model: embedder.modelId, dimension: embedder.dimension });
    } else {
      vector.createCollection(embedder.dimension, embedder.modelId);
    }

    const writeBatch = db.transaction((batch: EmbeddedParagraph[]): ParagraphId[] =>
      batch.map(({ input, vector: embedding }) => {
        const id = store.put(input);
        keyword.index(id, input.text.trim());
        vector.upsert(id, embedding, input.metadata);
        return id;
      })
    );

    let indexed = 0;
    let batches = 0;
    for (let offset = 0; offset < inputs.length; offset += batchSize) {
      const batch = inputs.slice(offset, offset + batchSize);
      // Embed before the transaction opens; no SQLite write is held across a network call.
      const embedded: EmbeddedParagraph[] = [];
      for (const input of batch) {
        embedded.push({ input, vector: await embedder.embed(input.text, 'document') });
      }

      if (lock?.compromised) {
        throw new StorageError('lock', false, `ingest lock lost after ${indexed} paragraphs`, lock.compromised);
      }
      writeBatch(embedded);

      indexed += batch.length;
      batches += 1;
      options.onProgress?.(indexed, inputs.length);
    }

    const summary: IngestSummary = {
      indexed,
      batches,
      dimension: embedder.dimension,
      model: embedder.modelId,
      durationMs: Date.now() - started,
    };
    logInfo('Ingestion complete', { ...summary });
    return summary;
  } finally {
    await lock?.release();
  }
}
