/**
 * @fileoverview Keyword index over SQLite FTS5
 *
 * `paragraphs_fts.rowid` is the paragraph id, so hits join back to the record
 * store without a mapping table. Ranking is FTS5's built-in BM25 `rank`.
 */

import type { ParagraphId, SearchHit } from '../core/types.js';
import type { SqliteDatabase } from './database.js';
import type { KeywordSearcher } from './types.js';

/**
 * Turn free text into an FTS5 MATCH expression: punctuation becomes
 * whitespace and each remaining token is quoted, so words such as `AND` or
 * `NEAR` match literally. Tokens combine with FTS5's implicit AND.
 * Returns the empty string when nothing searchable remains.
 */
export function sanitizeKeywordQuery(query: string): string {
  const cleaned = query.replace(/[^\p{L}\p{N}\s]/gu, ' ');
  const tokens = cleaned.split(/\s+/).filter((token) => token.length > 0);
  return tokens.map((token) => `"${token}"`).join(' ');
}

interface FtsRow {
  id: number;
  score: number;
}

export class KeywordIndex implements KeywordSearcher {
  constructor(private readonly db: SqliteDatabase) {}

  /** Replaces any earlier entry for `id`. */
  index(id: ParagraphId, text: string): void {
    this.db.prepare<[number]>('DELETE FROM paragraphs_fts WHERE rowid = ?').run(id);
    this.db.prepare<[number, string]>('INSERT INTO paragraphs_fts (rowid, text) VALUES (?, ?)').run(id, text);
  }

  clear(): void {
    this.db.prepare('DELETE FROM paragraphs_fts').run();
  }

  async search(query: string, k: number): Promise<SearchHit[]> {
    const match = sanitizeKeywordQuery(query);
    if (match.length === 0 || k <= 0) {
      return [];
    }
    const rows = this.db
      .prepare<[string, number], FtsRow>(
        'SELECT rowid AS id, rank AS score FROM paragraphs_fts WHERE paragraphs_fts MATCH ? ORDER BY rank, rowid LIMIT ?'
      )
      .all(match, k);
    return rows.map((row, rank) => ({ id: row.id, rank, rawScore: row.score }));
  }
}
