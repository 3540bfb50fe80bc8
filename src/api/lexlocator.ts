/**
 * @fileoverview LexLocator facade
 *
 * Owns the SQLite connection and wires the record store, both indexes, the
 * retriever, the refinement loop and the citation service together. Providers
 * are created lazily so `status` and keyword-only search work without
 * credentials.
 */

import { loadConfig, type LexLocatorConfig } from '../config/index.js';
import type { ParagraphLocation, ParagraphRecord } from '../core/types.js';
import { createEmbeddingProvider } from '../embeddings/index.js';
import type { EmbeddingProvider } from '../embeddings/types.js';
import { loadDocumentsFromDirectory, type SkippedFile } from '../ingest/document_loader.js';
import { ingestParagraphs, type IngestOptions, type IngestSummary } from '../ingest/indexer.js';
import { createReasoningEngine } from '../reasoning/index.js';
import type { ReasoningEngine } from '../reasoning/types.js';
import { HybridRetriever, retrieveKeywordOnly } from '../retrieval/hybrid_retriever.js';
import { QueryRefinementLoop, type RunOptions } from '../agent/refinement_loop.js';
import { openDatabase, type SqliteDatabase } from '../storage/database.js';
import { KeywordIndex } from '../storage/keyword_index.js';
import { ParagraphStore } from '../storage/paragraph_store.js';
import { VectorIndex } from '../storage/vector_index.js';
import { logInfo } from '../telemetry/logger.js';
import { CitationService } from './citation_service.js';

export interface LexLocatorOptions {
  config?: LexLocatorConfig;
  /** Replaces the provider chosen by configuration. */
  embedder?: EmbeddingProvider;
  /** Replaces the engine chosen by configuration. */
  engine?: ReasoningEngine;
}

export interface LexLocatorStatus {
  dbPath: string;
  paragraphs: number;
  documents: number;
  vectors: number;
  collection: { dimension: number; model: string } | null;
  embedding: { provider: string; model: string };
  reasoning: { provider: string; model: string | null };
}

export interface DirectoryIngestSummary extends IngestSummary {
  files: string[];
  skipped: SkippedFile[];
}

export interface SearchOptions {
  limit?: number;
  keywordOnly?: boolean;
}

interface Components {
  db: SqliteDatabase;
  store: ParagraphStore;
  keyword: KeywordIndex;
  vector: VectorIndex;
}

export class LexLocator {
  readonly config: LexLocatorConfig;
  private components: Components | null = null;
  private embedder: EmbeddingProvider | null;
  private engine: ReasoningEngine | null;
  private service: CitationService | null = null;

  constructor(options: LexLocatorOptions = {}) {
    this.config = options.config ?? loadConfig();
    this.embedder = options.embedder ?? null;
    this.engine = options.engine ?? null;
  }

  async initialize(): Promise<void> {
    if (this.components) return;
    const db = await openDatabase(this.config.dbPath);
    this.components = {
      db,
      store: new ParagraphStore(db),
      keyword: new KeywordIndex(db),
      vector: new VectorIndex(db),
    };
    logInfo('Index opened', { dbPath: this.config.dbPath });
  }

  async getStatus(): Promise<LexLocatorStatus> {
    const { store, vector } = this.requireComponents();
    return {
      dbPath: this.config.dbPath,
      paragraphs: await store.count(),
      documents: await store.countDocuments(),
      vectors: await vector.count(),
      collection: vector.collection,
      embedding: { ...this.config.embedding },
      reasoning: { provider: this.config.reasoning.provider, model: this.config.reasoning.model ?? null },
    };
  }

  async ingestDirectory(directory: string, options: IngestOptions = {}): Promise<DirectoryIngestSummary> {
    const loaded = await loadDocumentsFromDirectory(directory, { minLength: this.config.minParagraphLength });
    const { db, store, keyword, vector } = this.requireComponents();
    const summary = await ingestParagraphs(
      loaded.paragraphs,
      { db, store, keyword, vector, embedder: this.requireEmbedder(), dbPath: this.config.dbPath },
      options
    );
    return { ...summary, files: loaded.files, skipped: loaded.skipped };
  }

  async search(query: string, options: SearchOptions = {}): Promise<ParagraphRecord[]> {
    const limit = options.limit ?? this.config.topK;
    if (options.keywordOnly) {
      const { store, keyword } = this.requireComponents();
      return retrieveKeywordOnly({ records: store, keyword }, query, limit);
    }
    return this.createRetriever().retrieve(query, limit, { timeoutMs: this.config.searchTimeoutMs });
  }

  /** @throws the errors of {@link CitationService.findParagraph} */
  async findParagraph(payload: unknown, options: RunOptions = {}): Promise<ParagraphLocation> {
    return this.getCitationService().findParagraph(payload, options);
  }

  /** The stored paragraph at `location`, or null when it is not indexed. */
  async getParagraph(location: ParagraphLocation): Promise<ParagraphRecord | null> {
    return this.requireComponents().store.getByLocation(location);
  }

  getCitationService(): CitationService {
    if (!this.service) {
      const loop = new QueryRefinementLoop({
        engine: this.requireEngine(),
        retriever: this.createRetriever(),
        config: {
          maxIterations: this.config.maxIterations,
          topK: this.config.topK,
          llmTimeoutMs: this.config.llmTimeoutMs,
          searchTimeoutMs: this.config.searchTimeoutMs,
        },
      });
      this.service = new CitationService(loop);
    }
    return this.service;
  }

  async shutdown(): Promise<void> {
    this.service = null;
    if (this.components) {
      this.components.db.close();
      this.components = null;
    }
  }

  private createRetriever(): HybridRetriever {
    const { store, keyword, vector } = this.requireComponents();
    return new HybridRetriever({
      records: store,
      keyword,
      vector,
      embedder: this.requireEmbedder(),
      rrfK: this.config.rrfK,
    });
  }

  private requireComponents(): Components {
    if (!this.components) {
      throw new Error('LexLocator is not initialized; call initialize() first');
    }
    return this.components;
  }

  private requireEmbedder(): EmbeddingProvider {
    if (!this.embedder) {
      this.embedder = createEmbeddingProvider(this.config);
    }
    return this.embedder;
  }

  private requireEngine(): ReasoningEngine {
    if (!this.engine) {
      this.engine = createReasoningEngine(this.config);
    }
    return this.engine;
  }
}

export async function createLexLocator(options: LexLocatorOptions = {}): Promise<LexLocator> {
  const locator = new LexLocator(options);
  await locator.initialize();
  return locator;
}
