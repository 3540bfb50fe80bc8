import type { LexLocatorConfig } from '../config/index.js';
import { MissingCredentialError } from '../core/errors.js';
import { BedrockEmbeddingProvider } from './bedrock.js';
import { OpenAiEmbeddingProvider } from './openai.js';
import type { EmbeddingProvider } from './types.js';

export { BedrockEmbeddingProvider, COHERE_EMBEDDING_DIMENSION } from './bedrock.js';
export { OpenAiEmbeddingProvider } from './openai.js';
export { toVector, type EmbeddingKind, type EmbeddingProvider } from './types.js';

export function createEmbeddingProvider(config: LexLocatorConfig): EmbeddingProvider {
  const { provider, model } = config.embedding;
  if (provider === 'bedrock') {
    return new BedrockEmbeddingProvider({ modelId: model, region: config.awsRegion });
  }
  const apiKey = config.reasoning.apiKey;
  if (!apiKey) {
    throw new MissingCredentialError('openai', 'OPENAI_API_KEY');
  }
  return new OpenAiEmbeddingProvider({ modelId: model, apiKey, baseUrl: config.reasoning.baseUrl });
}
