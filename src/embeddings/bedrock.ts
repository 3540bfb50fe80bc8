/**
 * @fileoverview Cohere multilingual embeddings through Amazon Bedrock
 */

import { z } from 'zod';
import { EmbeddingError } from '../core/errors.js';
import { BedrockModelInvoker, type ModelInvoker } from '../providers/bedrock_runtime.js';
import { withRetry } from '../utils/async.js';
import { toVector, type EmbeddingKind, type EmbeddingProvider } from './types.js';

export const COHERE_EMBEDDING_DIMENSION = 1024;
// Cohere rejects longer inputs rather than truncating them.
const MAX_INPUT_CHARS = 2048;

const cohereResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())).min(1),
});

export interface BedrockEmbeddingOptions {
  modelId: string;
  region: string;
  dimension?: number;
  invoker?: ModelInvoker;
  maxRetries?: number;
  retryDelayMs?: number;
}

export class BedrockEmbeddingProvider implements EmbeddingProvider {
  readonly modelId: string;
  readonly dimension: number;
  private readonly invoker: ModelInvoker;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: BedrockEmbeddingOptions) {
    this.modelId = options.modelId;
    this.dimension = options.dimension ?? COHERE_EMBEDDING_DIMENSION;
    this.invoker = options.invoker ?? new BedrockModelInvoker(options.region);
    this.maxRetries = options.maxRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 500;
  }

  async embed(text: string, kind: EmbeddingKind): Promise<Float32Array> {
    const input = text.slice(0, MAX_INPUT_CHARS);
    const body = {
      texts: [input],
      input_type: kind === 'query' ? 'search_query' : 'search_document',
      truncate: 'END',
    };

    const response = await withRetry(() => this.invoker.invoke(this.modelId, body), {
      label: `${this.modelId} embedding`,
      maxRetries: this.maxRetries,
      delayMs: this.retryDelayMs,
    });

    const parsed = cohereResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new EmbeddingError(this.modelId, false, 'response has no embeddings array', input.length);
    }
    return toVector(parsed.data.embeddings[0] ?? [], this);
  }
}
