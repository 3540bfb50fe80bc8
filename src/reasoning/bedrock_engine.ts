/**
 * @fileoverview Reasoning engine over Anthropic models hosted on Amazon Bedrock
 */

import { z } from 'zod';
import { ProviderError } from '../core/errors.js';
import { BedrockModelInvoker, type ModelInvoker } from '../providers/bedrock_runtime.js';
import { withRetry } from '../utils/async.js';
import type { ChatMessage, CompletionOptions, ReasoningEngine } from './types.js';

const ANTHROPIC_VERSION = 'bedrock-2023-05-31';

const messagesResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
});

export interface BedrockReasoningOptions {
  modelId: string;
  region: string;
  maxTokens?: number;
  invoker?: ModelInvoker;
  maxRetries?: number;
  retryDelayMs?: number;
}

interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * System messages move to the top-level `system` field; consecutive turns of
 * the same role are merged because the messages API requires alternation.
 */
export function toAnthropicMessages(messages: readonly ChatMessage[]): { system: string; messages: AnthropicMessage[] } {
  const system: string[] = [];
  const turns: AnthropicMessage[] = [];
  for (const message of messages) {
    if (message.role === 'system') {
      system.push(message.content);
      continue;
    }
    const last = turns[turns.length - 1];
    if (last && last.role === message.role) {
      last.content = `${last.content}\n\n${message.content}`;
    } else {
      turns.push({ role: message.role, content: message.content });
    }
  }
  return { system: system.join('\n\n'), messages: turns };
}

export class BedrockReasoningEngine implements ReasoningEngine {
  readonly id: string;
  private readonly modelId: string;
  private readonly maxTokens: number;
  private readonly invoker: ModelInvoker;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: BedrockReasoningOptions) {
    this.modelId = options.modelId;
    this.id = `bedrock:${options.modelId}`;
    this.maxTokens = options.maxTokens ?? 1024;
    this.invoker = options.invoker ?? new BedrockModelInvoker(options.region);
    this.maxRetries = options.maxRetries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  async complete(messages: readonly ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const { system, messages: turns } = toAnthropicMessages(messages);
    const body = {
      anthropic_version: ANTHROPIC_VERSION,
      max_tokens: this.maxTokens,
      temperature: 0,
      ...(system ? { system } : {}),
      messages: turns,
      ...(options.stop && options.stop.length > 0 ? { stop_sequences: options.stop } : {}),
    };

    const response = await withRetry(() => this.invoker.invoke(this.modelId, body), {
      label: `${this.modelId} completion`,
      maxRetries: this.maxRetries,
      delayMs: this.retryDelayMs,
    });

    const parsed = messagesResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new ProviderError('bedrock', 'invalid_response', false, `${this.modelId} response has no content`);
    }
    return parsed.data.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('');
  }
}
