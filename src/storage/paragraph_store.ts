/**
 * @fileoverview Record store: the authoritative paragraph table
 *
 * Assigns the id that the keyword and vector indexes reuse. AUTOINCREMENT
 * keeps ids monotonic and never reissued, even after deletions.
 */

import { ValidationError } from '../core/errors.js';
import type { ParagraphId, ParagraphInput, ParagraphLocation, ParagraphRecord } from '../core/types.js';
import type { SqliteDatabase } from './database.js';
import type { RecordLookup } from './types.js';

interface ParagraphRow {
  id: number;
  doc_id: number;
  chapter_id: number;
  paragraph_id: number;
  text: string;
}

function rowToRecord(row: ParagraphRow): ParagraphRecord {
  return {
    id: row.id,
    docId: row.doc_id,
    chapterId: row.chapter_id,
    paragraphId: row.paragraph_id,
    text: row.text,
  };
}

// better-sqlite3 caps bound parameters per statement.
const MAX_IDS_PER_QUERY = 500;

export class ParagraphStore implements RecordLookup {
  constructor(private readonly db: SqliteDatabase) {}

  /**
   * Insert a paragraph and return its id. A location that already exists
   * keeps its id and takes the new text.
   */
  put(input: ParagraphInput): ParagraphId {
    const text = input.text.trim();
    if (text.length === 0) {
      throw new ValidationError('text', 'non-empty paragraph text', 'empty string');
    }
    const { doc_id, chapter_id, paragraph_id } = input.metadata;

    const existing = this.db
      .prepare<[number, number, number], { id: number }>(
        'SELECT id FROM paragraphs WHERE doc_id = ? AND chapter_id = ? AND paragraph_id = ?'
      )
      .get(doc_id, chapter_id, paragraph_id);
    if (existing) {
      this.db.prepare<[string, number]>('UPDATE paragraphs SET text = ? WHERE id = ?').run(text, existing.id);
      return existing.id;
    }

    const info = this.db
      .prepare<[number, number, number, string]>(
        'INSERT INTO paragraphs (doc_id, chapter_id, paragraph_id, text) VALUES (?, ?, ?, ?)'
      )
      .run(doc_id, chapter_id, paragraph_id, text);
    return Number(info.lastInsertRowid);
  }

  async get(id: ParagraphId): Promise<ParagraphRecord | null> {
    const row = this.db
      .prepare<[number], ParagraphRow>('SELECT id, doc_id, chapter_id, paragraph_id, text FROM paragraphs WHERE id = ?')
      .get(id);
    return row ? rowToRecord(row) : null;
  }

  /** Ids without a record are omitted from the map. */
  async getMany(ids: readonly ParagraphId[]): Promise<Map<ParagraphId, ParagraphRecord>> {
    const result = new Map<ParagraphId, ParagraphRecord>();
    const unique = [...new Set(ids)];
    for (let offset = 0; offset < unique.length; offset += MAX_IDS_PER_QUERY) {
      const chunk = unique.slice(offset, offset + MAX_IDS_PER_QUERY);
      const placeholders = chunk.map(() => '?').join(', ');
      const rows = this.db
        .prepare<number[], ParagraphRow>(
          `SELECT id, doc_id, chapter_id, paragraph_id, text FROM paragraphs WHERE id IN (${placeholders})`
        )
        .all(...chunk);
      for (const row of rows) {
        result.set(row.id, rowToRecord(row));
      }
    }
    return result;
  }

  async getByLocation(location: ParagraphLocation): Promise<ParagraphRecord | null> {
    const row = this.db
      .prepare<[number, number, number], ParagraphRow>(
        'SELECT id, doc_id, chapter_id, paragraph_id, text FROM paragraphs WHERE doc_id = ? AND chapter_id = ? AND paragraph_id = ?'
      )
      .get(location.doc_id, location.chapter_id, location.paragraph_id);
    return row ? rowToRecord(row) : null;
  }

  async count(): Promise<number> {
    const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM paragraphs').get();
    return row?.total ?? 0;
  }

  async countDocuments(): Promise<number> {
    const row = this.db
      .prepare<[], { total: number }>('SELECT COUNT(DISTINCT doc_id) AS total FROM paragraphs')
      .get();
    return row?.total ?? 0;
  }

  /** Drop every record. Used by a full re-ingest. */
  clear(): void {
    this.db.prepare('DELETE FROM paragraphs').run();
  }
}
