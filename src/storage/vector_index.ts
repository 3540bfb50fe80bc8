/**
 * @fileoverview Vector index for paragraph embeddings
 *
 * Embeddings live in SQLite next to the paragraph records, keyed by the same
 * id. Search is an exhaustive cosine scan over an in-memory copy.
 *
 * @packageDocumentation
 */

import { DimensionMismatchError, StorageError } from '../core/errors.js';
import type { ParagraphId, ParagraphLocation, SearchHit } from '../core/types.js';
import type { SqliteDatabase } from './database.js';
import type { VectorSearcher } from './types.js';

export interface VectorIndexItem {
  id: ParagraphId;
  embedding: Float32Array;
}

export interface VectorCollectionInfo {
  dimension: number;
  model: string;
}

const COLLECTION_NAME = 'paragraphs';

interface CollectionRow {
  dimension: number;
  model: string;
}

interface VectorRow {
  id: number;
  embedding: Buffer;
}

// ============================================================================
// In-memory brute-force index
// ============================================================================

/**
 * Exhaustive cosine search. Ties on similarity fall back to ascending id so
 * results are deterministic.
 */
export class InMemoryVectorIndex {
  private items: VectorIndexItem[] = [];

  load(items: VectorIndexItem[]): void {
    this.items = items;
  }

  clear(): void {
    this.items = [];
  }

  size(): number { return this.items.length; }

  search(query: Float32Array, limit: number): Array<{ id: ParagraphId; similarity: number }> {
    const results: Array<{ id: ParagraphId; similarity: number }> = [];
    for (const item of this.items) {
      if (item.embedding.length !== query.length) continue;
      results.push({ id: item.id, similarity: cosineSimilarity(query, item.embedding) });
    }
    results.sort((a, b) => b.similarity - a.similarity || a.id - b.id);
    return results.slice(0, limit);
  }
}

export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    normA += av * av;
    normB += bv * bv;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function encodeEmbedding(vector: Float32Array): Buffer {
  return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
}

export function decodeEmbedding(blob: Buffer): Float32Array {
  // Copy into a fresh buffer: SQLite blobs are not guaranteed 4-byte aligned.
  return new Float32Array(new Uint8Array(blob).buffer);
}

// ============================================================================
// Persistent vector index
// ============================================================================

/**
 * Embedding table with a fixed-dimension collection. Points are written to
 * SQLite (inside the caller's transaction) and searched from an in-memory
 * copy. The copy is reloaded after a write through this instance, and after
 * a commit by any other connection (`PRAGMA data_version` moves), so a
 * server sees what a separate ingest process writes.
 */
export class VectorIndex implements VectorSearcher {
  private readonly memory = new InMemoryVectorIndex();
  private dirty = true;
  private loadedVersion: number | null = null;

  constructor(private readonly db: SqliteDatabase) {}

  get collection(): VectorCollectionInfo | null {
    const row = this.db
      .prepare<[string], CollectionRow>('SELECT dimension, model FROM vector_collection WHERE name = ?')
      .get(COLLECTION_NAME);
    return row ? { dimension: row.dimension, model: row.model } : null;
  }

  get dimension(): number | null {
    return this.collection?.dimension ?? null;
  }

  /**
   * Create the collection, or confirm an existing one has the same
   * dimension. A different dimension needs `recreateCollection`.
   */
  createCollection(dimension: number, model: string): void {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new StorageError('write', false, `invalid vector dimension ${dimension}`);
    }
    const existing = this.collection;
    if (existing) {
      if (existing.dimension !== dimension) {
        throw new DimensionMismatchError(existing.dimension, dimension, 'createCollection');
      }
      return;
    }
    this.db
      .prepare<[string, number, string, string]>(
        'INSERT INTO vector_collection (name, dimension, model, created_at) VALUES (?, ?, ?, ?)'
      )
      .run(COLLECTION_NAME, dimension, model, new Date().toISOString());
  }

  /** Drop every point and the collection definition, then create it anew. */
  recreateCollection(dimension: number, model: string): void {
    this.db.prepare('DELETE FROM paragraph_vectors').run();
    this.db.prepare<[string]>('DELETE FROM vector_collection WHERE name = ?').run(COLLECTION_NAME);
    this.dirty = true;
    this.createCollection(dimension, model);
  }

  upsert(id: ParagraphId, vector: Float32Array, payload: ParagraphLocation): void {
    const collection = this.collection;
    if (!collection) {
      throw new StorageError('write', false, 'vector collection does not exist; create it before upserting');
    }
    if (vector.length !== collection.dimension) {
      throw new DimensionMismatchError(collection.dimension, vector.length, `upsert of paragraph ${id}`);
    }
    this.db
      .prepare<[number, number, number, number, Buffer]>(
        'INSERT OR REPLACE INTO paragraph_vectors (id, doc_id, chapter_id, paragraph_id, embedding) VALUES (?, ?, ?, ?, ?)'
      )
      .run(id, payload.doc_id, payload.chapter_id, payload.paragraph_id, encodeEmbedding(vector));
    this.dirty = true;
  }

  async count(): Promise<number> {
    const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM paragraph_vectors').get();
    return row?.total ?? 0;
  }

  async search(vector: Float32Array, k: number): Promise<SearchHit[]> {
    const collection = this.collection;
    if (!collection || k <= 0) {
      return [];
    }
    if (vector.length !== collection.dimension) {
      throw new DimensionMismatchError(collection.dimension, vector.length, 'vector search');
    }
    const version = this.dataVersion();
    if (this.dirty || version !== this.loadedVersion) {
      this.reload(version);
    }
    return this.memory
      .search(vector, k)
      .map((hit, rank) => ({ id: hit.id, rank, rawScore: hit.similarity }));
  }

  // Changes only when another connection commits; own writes set `dirty`.
  private dataVersion(): number | null {
    const version: unknown = this.db.pragma('data_version', { simple: true });
    return typeof version === 'number' ? version : null;
  }

  private reload(version: number | null): void {
    const rows = this.db.prepare<[], VectorRow>('SELECT id, embedding FROM paragraph_vectors').all();
    this.memory.load(rows.map((row) => ({ id: row.id, embedding: decodeEmbedding(row.embedding) })));
    this.dirty = false;
    this.loadedVersion = version;
  }
}
