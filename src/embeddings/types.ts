import { DimensionMismatchError } from '../core/errors.js';

/** Asymmetric models embed stored passages and search queries differently. */
export type EmbeddingKind = 'document' | 'query';

export interface EmbeddingProvider {
  readonly modelId: string;
  readonly dimension: number;
  embed(text: string, kind: EmbeddingKind): Promise<Float32Array>;
}

export function toVector(values: readonly number[], provider: Pick<EmbeddingProvider, 'modelId' | 'dimension'>): Float32Array {
  if (values.length !== provider.dimension) {
    throw new DimensionMismatchError(provider.dimension, values.length, `embedding from ${provider.modelId}`);
  }
  return Float32Array.from(values);
}
