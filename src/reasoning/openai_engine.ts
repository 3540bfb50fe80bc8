/**
 * @fileoverview Reasoning engine over an OpenAI-compatible chat completions API
 */

import { z } from 'zod';
import { ProviderError } from '../core/errors.js';
import { OpenAiHttpClient, type FetchLike } from '../providers/openai_http.js';
import { withRetry } from '../utils/async.js';
import type { ChatMessage, CompletionOptions, ReasoningEngine } from './types.js';

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
});

export interface OpenAiReasoningOptions {
  model: string;
  apiKey: string;
  baseUrl: string;
  temperature?: number;
  maxTokens?: number;
  fetchImpl?: FetchLike;
  maxRetries?: number;
  retryDelayMs?: number;
}

export class OpenAiReasoningEngine implements ReasoningEngine {
  readonly id: string;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number | undefined;
  private readonly http: OpenAiHttpClient;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: OpenAiReasoningOptions) {
    this.model = options.model;
    this.id = `openai:${options.model}`;
    this.temperature = options.temperature ?? 0;
    this.maxTokens = options.maxTokens;
    this.http = new OpenAiHttpClient({ baseUrl: options.baseUrl, apiKey: options.apiKey, fetchImpl: options.fetchImpl });
    this.maxRetries = options.maxRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  async complete(messages: readonly ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const body = {
      model: this.model,
      temperature: this.temperature,
      messages,
      ...(options.stop && options.stop.length > 0 ? { stop: options.stop } : {}),
      ...(this.maxTokens !== undefined ? { max_tokens: this.maxTokens } : {}),
    };

    const response = await withRetry(() => this.http.postJson('/chat/completions', body), {
      label: `${this.model} completion`,
      maxRetries: this.maxRetries,
      delayMs: this.retryDelayMs,
    });

    const parsed = chatCompletionSchema.safeParse(response);
    if (!parsed.success) {
      throw new ProviderError('openai', 'invalid_response', false, 'chat completion has no choices');
    }
    return parsed.data.choices[0]?.message.content ?? '';
  }
}
