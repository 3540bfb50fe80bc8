/** Shared domain types for the record store, indexes, retriever and loop. */

/** Store-assigned identifier shared by the record store and both indexes. */
export type ParagraphId = number;

/** Addressable coordinate of a paragraph. Wire names stay snake_case. */
export interface ParagraphLocation {
  doc_id: number;
  chapter_id: number;
  paragraph_id: number;
}

/** A paragraph as delivered by ingestion, before the store assigns an id. */
export interface ParagraphInput {
  text: string;
  metadata: ParagraphLocation;
}

export interface ParagraphRecord {
  id: ParagraphId;
  docId: number;
  chapterId: number;
  paragraphId: number;
  /** HTML-stripped, whitespace-normalized, non-empty. */
  text: string;
}

/** One entry of a single index's ranked result list. */
export interface SearchHit {
  id: ParagraphId;
  /** 0-based position within its source list. */
  rank: number;
  /** Source-specific; never compared across sources. */
  rawScore: number;
}

export interface FusedHit {
  id: ParagraphId;
  fusedScore: number;
}

export function toLocation(record: ParagraphRecord): ParagraphLocation {
  return {
    doc_id: record.docId,
    chapter_id: record.chapterId,
    paragraph_id: record.paragraphId,
  };
}
