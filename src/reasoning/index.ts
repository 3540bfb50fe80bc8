import { requireReasoningCredential, type LexLocatorConfig } from '../config/index.js';
import { BedrockReasoningEngine } from './bedrock_engine.js';
import { OpenAiReasoningEngine } from './openai_engine.js';
import type { ReasoningEngine } from './types.js';

export { BedrockReasoningEngine, toAnthropicMessages } from './bedrock_engine.js';
export { OpenAiReasoningEngine } from './openai_engine.js';
export type { ChatMessage, CompletionOptions, ReasoningEngine } from './types.js';

/**
 * Build the configured engine. Throws `MissingCredentialError` when the
 * provider cannot be used, so startup fails before any request.
 */
export function createReasoningEngine(config: LexLocatorConfig): ReasoningEngine {
  const credential = requireReasoningCredential(config);
  if (credential.provider === 'openai') {
    return new OpenAiReasoningEngine({
      model: credential.model,
      apiKey: credential.apiKey,
      baseUrl: config.reasoning.baseUrl,
    });
  }
  return new BedrockReasoningEngine({ modelId: credential.model, region: config.awsRegion });
}
