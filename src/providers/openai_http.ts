/**
 * @fileoverview Minimal client for OpenAI-compatible HTTP endpoints
 *
 * Shared by the chat-completions reasoning engine and the embeddings
 * provider. HTTP and transport failures become `ProviderError` with a
 * retryability hint.
 */

import { ProviderError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface OpenAiHttpOptions {
  baseUrl: string;
  apiKey: string;
  fetchImpl?: FetchLike;
}

function classifyStatus(status: number): { reason: ProviderError['reason']; retryable: boolean } {
  if (status === 401 || status === 403) return { reason: 'auth_failed', retryable: false };
  if (status === 429) return { reason: 'rate_limit', retryable: true };
  if (status >= 500) return { reason: 'unavailable', retryable: true };
  return { reason: 'invalid_response', retryable: false };
}

export class OpenAiHttpClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: OpenAiHttpOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async postJson(path: string, body: unknown): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify(body),
      });
    } catch (error) {
      throw new ProviderError('openai', 'network_error', true, getErrorMessage(error));
    }

    if (!response.ok) {
      const { reason, retryable } = classifyStatus(response.status);
      const detail = await response.text().catch(() => '');
      throw new ProviderError('openai', reason, retryable, `${path} returned ${response.status}${detail ? `: ${detail.slice(0, 200)}` : ''}`);
    }

    try {
      const parsed: unknown = await response.json();
      return parsed;
    } catch (error) {
      throw new ProviderError('openai', 'invalid_response', false, `${path} returned invalid JSON: ${getErrorMessage(error)}`);
    }
  }
}
