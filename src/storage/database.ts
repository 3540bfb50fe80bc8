/**
 * @fileoverview SQLite connection and schema for lexlocator
 *
 * One better-sqlite3 connection holds all three stores: the paragraph records,
 * the FTS5 keyword index and the embedding table. They share the
 * `paragraphs.id` key, so a single transaction can write all three.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs/promises';
import * as path from 'path';
import { StorageError } from '../core/errors.js';
import { getErrorMessage, toError } from '../utils/errors.js';

export type SqliteDatabase = Database.Database;

export const IN_MEMORY_PATH = ':memory:';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS paragraphs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  doc_id INTEGER NOT NULL,
  chapter_id INTEGER NOT NULL,
  paragraph_id INTEGER NOT NULL,
  text TEXT NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS idx_paragraphs_location
  ON paragraphs (doc_id, chapter_id, paragraph_id);

CREATE VIRTUAL TABLE IF NOT EXISTS paragraphs_fts USING fts5(text);

CREATE TABLE IF NOT EXISTS vector_collection (
  name TEXT PRIMARY KEY,
  dimension INTEGER NOT NULL,
  model TEXT NOT NULL,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS paragraph_vectors (
  id INTEGER PRIMARY KEY,
  doc_id INTEGER NOT NULL,
  chapter_id INTEGER NOT NULL,
  paragraph_id INTEGER NOT NULL,
  embedding BLOB NOT NULL
);
`;

/**
 * Open (creating if needed) the database at `dbPath` and apply the schema.
 * `:memory:` opens a private in-process database.
 */
export async function openDatabase(dbPath: string): Promise<SqliteDatabase> {
  const inMemory = dbPath === IN_MEMORY_PATH;
  if (!inMemory) {
    await fs.mkdir(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  let db: SqliteDatabase;
  try {
    db = new Database(dbPath);
  } catch (error) {
    throw new StorageError('open', false, `${dbPath}: ${getErrorMessage(error)}`, toError(error));
  }

  try {
    if (!inMemory) {
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
    }
    db.pragma('busy_timeout = 5000');
    db.exec(SCHEMA);
    return db;
  } catch (error) {
    db.close();
    throw new StorageError('migrate', false, getErrorMessage(error), toError(error));
  }
}
