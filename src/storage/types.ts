/**
 * @fileoverview Read-side seams the retriever depends on
 *
 * The SQLite classes implement these; tests substitute in-memory fakes or
 * failing stubs to exercise per-source fail-open.
 */

import type { ParagraphId, ParagraphRecord, SearchHit } from '../core/types.js';

export interface KeywordSearcher {
  search(query: string, k: number): Promise<SearchHit[]>;
}

export interface VectorSearcher {
  /** Fixed for the collection's lifetime; null before the collection exists. */
  readonly dimension: number | null;
  search(vector: Float32Array, k: number): Promise<SearchHit[]>;
}

export interface RecordLookup {
  getMany(ids: readonly ParagraphId[]): Promise<Map<ParagraphId, ParagraphRecord>>;
}
