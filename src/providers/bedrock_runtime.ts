/**
 * @fileoverview JSON model invocation through Amazon Bedrock
 */

import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { ProviderError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

/** Seam for tests: sends a JSON body to a model and returns the decoded JSON reply. */
export interface ModelInvoker {
  invoke(modelId: string, body: unknown): Promise<unknown>;
}

const RETRYABLE_AWS_ERRORS = new Set([
  'ThrottlingException',
  'ServiceUnavailableException',
  'InternalServerException',
  'ModelNotReadyException',
  'ModelTimeoutException',
]);

export class BedrockModelInvoker implements ModelInvoker {
  private readonly client: BedrockRuntimeClient;

  constructor(region: string, client?: BedrockRuntimeClient) {
    this.client = client ?? new BedrockRuntimeClient({ region });
  }

  async invoke(modelId: string, body: unknown): Promise<unknown> {
    let raw: Uint8Array;
    try {
      const response = await this.client.send(
        new InvokeModelCommand({
          modelId,
          contentType: 'application/json',
          accept: 'application/json',
          body: JSON.stringify(body),
        })
      );
      raw = response.body;
    } catch (error) {
      const name = error instanceof Error ? error.name : '';
      if (name === 'AccessDeniedException' || name === 'UnrecognizedClientException') {
        throw new ProviderError('bedrock', 'auth_failed', false, getErrorMessage(error));
      }
      if (name === 'ThrottlingException') {
        throw new ProviderError('bedrock', 'rate_limit', true, getErrorMessage(error));
      }
      const retryable = RETRYABLE_AWS_ERRORS.has(name);
      throw new ProviderError('bedrock', retryable ? 'unavailable' : 'network_error', retryable, getErrorMessage(error));
    }

    try {
      const parsed: unknown = JSON.parse(Buffer.from(raw).toString('utf-8'));
      return parsed;
    } catch (error) {
      throw new ProviderError('bedrock', 'invalid_response', false, `${modelId} returned invalid JSON: ${getErrorMessage(error)}`);
    }
  }
}
