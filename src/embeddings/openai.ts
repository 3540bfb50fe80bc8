/**
 * @fileoverview Embeddings from an OpenAI-compatible `/embeddings` endpoint
 */

import { z } from 'zod';
import { EmbeddingError } from '../core/errors.js';
import { OpenAiHttpClient, type FetchLike } from '../providers/openai_http.js';
import { withRetry } from '../utils/async.js';
import { toVector, type EmbeddingKind, type EmbeddingProvider } from './types.js';

const MODEL_DIMENSIONS: Partial<Record<string, number>> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

const embeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })).min(1),
});

export interface OpenAiEmbeddingOptions {
  modelId: string;
  apiKey: string;
  baseUrl: string;
  /** Required for models outside the built-in table. */
  dimension?: number;
  fetchImpl?: FetchLike;
  maxRetries?: number;
  retryDelayMs?: number;
}

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  readonly modelId: string;
  readonly dimension: number;
  private readonly http: OpenAiHttpClient;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: OpenAiEmbeddingOptions) {
    const dimension = options.dimension ?? MODEL_DIMENSIONS[options.modelId];
    if (dimension === undefined) {
      throw new EmbeddingError(options.modelId, false, 'unknown embedding dimension; configure it explicitly');
    }
    this.modelId = options.modelId;
    this.dimension = dimension;
    this.http = new OpenAiHttpClient({ baseUrl: options.baseUrl, apiKey: options.apiKey, fetchImpl: options.fetchImpl });
    this.maxRetries = options.maxRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 500;
  }

  // Symmetric model: the kind does not change the request.
  async embed(text: string, _kind: EmbeddingKind): Promise<Float32Array> {
    const response = await withRetry(() => this.http.postJson('/embeddings', { model: this.modelId, input: text }), {
      label: `${this.modelId} embedding`,
      maxRetries: this.maxRetries,
      delayMs: this.retryDelayMs,
    });

    const parsed = embeddingResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new EmbeddingError(this.modelId, false, 'response has no embedding data', text.length);
    }
    return toVector(parsed.data.data[0]?.embedding ?? [], this);
  }
}
