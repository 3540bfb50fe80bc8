/**
 * @fileoverview lexlocator - Justifying-paragraph locator for regulatory QA
 *
 * Given a question and its correct answer, lexlocator finds the single
 * paragraph in a corpus of regulatory documents that justifies the answer.
 * Paragraphs are indexed twice (FTS5 keywords and dense vectors) under one
 * shared id, retrieved with reciprocal rank fusion, and a reasoning engine
 * refines its search queries until it can name the paragraph.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createLexLocator, loadConfig } from 'lexlocator';
 *
 * const locator = await createLexLocator({ config: loadConfig() });
 * await locator.ingestDirectory('./documents');
 *
 * const location = await locator.findParagraph({
 *   question: { text: 'Who may carry out inspections alone?' },
 *   answers: ['Any staff member', 'Operating personnel with group III'],
 *   correctAnswers: ['Operating personnel with group III'],
 * });
 * // { doc_id: 1, chapter_id: 1, paragraph_id: 10 }
 * ```
 *
 * @packageDocumentation
 */

// Main API
export {
  LexLocator,
  createLexLocator,
  type LexLocatorOptions,
  type LexLocatorStatus,
  type DirectoryIngestSummary,
  type SearchOptions,
} from './api/lexlocator.js';
export {
  CitationService,
  classifyError,
  findParagraphRequestSchema,
  parseFindParagraphRequest,
  type CitationLoop,
  type ErrorClassification,
  type FindParagraphRequest,
} from './api/citation_service.js';
export {
  DEFAULT_MAX_BODY_BYTES,
  createHttpServer,
  createRequestHandler,
  requestPath,
  startHttpServer,
  stopHttpServer,
  type HttpRequest,
  type HttpResponse,
  type HttpServerOptions,
  type ParagraphFinder,
  type RequestHandler,
  type RequestHandlerOptions,
} from './api/http_server.js';
export { PROBLEM_CONTENT_TYPE, problem, type Problem } from './api/problem.js';

// Configuration
export {
  DEFAULT_DB_PATH,
  DEFAULT_TOP_K,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_LLM_TIMEOUT_MS,
  DEFAULT_SEARCH_TIMEOUT_MS,
  DEFAULT_MIN_PARAGRAPH_LENGTH,
  DEFAULT_PORT,
  loadConfig,
  requireReasoningCredential,
  type EmbeddingConfig,
  type LexLocatorConfig,
  type ProviderName,
  type ReasoningConfig,
  type ReasoningCredential,
} from './config/index.js';

// Core types and errors
export * from './core/types.js';
export * from './core/errors.js';

// Storage
export { openDatabase, IN_MEMORY_PATH, type SqliteDatabase } from './storage/database.js';
export { ParagraphStore } from './storage/paragraph_store.js';
export { KeywordIndex, sanitizeKeywordQuery } from './storage/keyword_index.js';
export { VectorIndex, cosineSimilarity, type VectorCollectionInfo, type VectorIndexItem } from './storage/vector_index.js';
export type { KeywordSearcher, RecordLookup, VectorSearcher } from './storage/types.js';

// Providers
export * from './embeddings/index.js';
export * from './reasoning/index.js';
export type { ChatMessage, CompletionOptions, ReasoningEngine } from './reasoning/types.js';

// Retrieval and refinement
export { DEFAULT_RRF_K, reciprocalRankFusion } from './retrieval/fusion.js';
export {
  HybridRetriever,
  formatObservation,
  retrieveKeywordOnly,
  type HybridRetrieverDeps,
  type RetrieveOptions,
  type Retriever,
} from './retrieval/hybrid_retriever.js';
export {
  ITERATION_LIMIT_REASON,
  QueryRefinementLoop,
  type LoopOutcome,
  type LoopStep,
  type RefinementLoopConfig,
} from './agent/refinement_loop.js';
export { parseTerminalPayload, type TerminalPayload } from './agent/terminal_payload.js';
export { SEARCH_TOOL_NAME, parseTurn, type Turn } from './agent/turn_parser.js';

// Ingestion
export { cleanHtml } from './ingest/html_cleaner.js';
export {
  extractParagraphs,
  loadDocumentsFromDirectory,
  sourceDocumentSchema,
  type LoadResult,
  type SourceDocument,
} from './ingest/document_loader.js';
export {
  DEFAULT_BATCH_SIZE,
  ingestParagraphs,
  type IngestDeps,
  type IngestOptions,
  type IngestSummary,
} from './ingest/indexer.js';

export { setLogLevel } from './telemetry/logger.js';
export { LEXLOCATOR_VERSION } from './version.js';
