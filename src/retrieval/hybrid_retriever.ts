/**
 * @fileoverview Hybrid retriever: keyword + vector search fused with RRF
 *
 * The two sources run concurrently and fail independently: an error or
 * timeout in one is logged and that source contributes nothing. A dimension
 * mismatch is a configuration fault and is not absorbed.
 *
 * Holds no per-request state; one instance serves concurrent requests.
 */

import { DimensionMismatchError, SourceUnavailableError, type RetrievalSource } from '../core/errors.js';
import type { ParagraphRecord, SearchHit } from '../core/types.js';
import type { EmbeddingProvider } from '../embeddings/types.js';
import type { KeywordSearcher, RecordLookup, VectorSearcher } from '../storage/types.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { withTimeout } from '../utils/async.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { DEFAULT_RRF_K, reciprocalRankFusion } from './fusion.js';

export interface HybridRetrieverDeps {
  records: RecordLookup;
  keyword: KeywordSearcher;
  vector: VectorSearcher;
  embedder: EmbeddingProvider;
  rrfK?: number;
}

export interface RetrieveOptions {
  /** Applied to each source separately. */
  timeoutMs?: number;
}

/** Anything the loop can search with; the loop depends on this, not the class. */
export interface Retriever {
  retrieve(query: string, k: number, options?: RetrieveOptions): Promise<ParagraphRecord[]>;
}

export class HybridRetriever implements Retriever {
  private readonly records: RecordLookup;
  private readonly keyword: KeywordSearcher;
  private readonly vector: VectorSearcher;
  private readonly embedder: EmbeddingProvider;
  readonly rrfK: number;

  constructor(deps: HybridRetrieverDeps) {
    this.records = deps.records;
    this.keyword = deps.keyword;
    this.vector = deps.vector;
    this.embedder = deps.embedder;
    this.rrfK = deps.rrfK ?? DEFAULT_RRF_K;
  }

  async retrieve(query: string, k: number, options: RetrieveOptions = {}): Promise<ParagraphRecord[]> {
    if (k <= 0) {
      return [];
    }

    const [keywordHits, vectorHits] = await Promise.all([
      this.searchSource('keyword', () => this.keyword.search(query, k), options.timeoutMs),
      this.searchSource('vector', () => this.searchVector(query, k), options.timeoutMs),
    ]);

    const fused = reciprocalRankFusion([keywordHits, vectorHits], this.rrfK).slice(0, k);
    if (fused.length === 0) {
      return [];
    }

    const byId = await this.records.getMany(fused.map((hit) => hit.id));
    const results: ParagraphRecord[] = [];
    for (const hit of fused) {
      const record = byId.get(hit.id);
      if (!record) {
        logDebug('Dropping fused hit without a record', { id: hit.id });
        continue;
      }
      results.push(record);
    }
    return results;
  }

  private async searchVector(query: string, k: number): Promise<SearchHit[]> {
    const embedding = await this.embedder.embed(query, 'query');
    const expected = this.vector.dimension;
    if (expected !== null && embedding.length !== expected) {
      throw new DimensionMismatchError(expected, embedding.length, 'query embedding');
    }
    return this.vector.search(embedding, k);
  }

  private async searchSource(
    source: RetrievalSource,
    run: () => Promise<SearchHit[]>,
    timeoutMs: number | undefined
  ): Promise<SearchHit[]> {
    try {
      return await withTimeout(run(), timeoutMs, `${source} search`);
    } catch (error) {
      if (error instanceof DimensionMismatchError) {
        throw error;
      }
      const unavailable = new SourceUnavailableError(source, getErrorMessage(error), toError(error));
      logWarning('Retrieval source unavailable; continuing without it', unavailable.toJSON().details ?? {});
      return [];
    }
  }
}

/** Keyword hits only, for debugging the lexical side. Needs no embedder. */
export async function retrieveKeywordOnly(
  deps: Pick<HybridRetrieverDeps, 'records' | 'keyword'>,
  query: string,
  k: number
): Promise<ParagraphRecord[]> {
  const hits = await deps.keyword.search(query, k);
  const byId = await deps.records.getMany(hits.map((hit) => hit.id));
  return hits.flatMap((hit) => {
    const record = byId.get(hit.id);
    return record ? [record] : [];
  });
}

/** Render retrieved paragraphs as the observation handed back to the reasoning engine. */
export function formatObservation(records: readonly ParagraphRecord[]): string {
  if (records.length === 0) {
    return 'No paragraphs matched this query. Try different or broader keywords.';
  }
  return records
    .map(
      (record) =>
        `[doc_id=${record.docId}, chapter_id=${record.chapterId}, paragraph_id=${record.paragraphId}]\n${record.text}`
    )
    .join('\n\n');
}
