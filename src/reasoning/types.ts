export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionOptions {
  /** Generation halts before any of these strings. */
  stop?: string[];
}

/**
 * A chat model that produces one turn of text per call. Engines keep no
 * conversation state: the caller passes the whole transcript every time.
 */
export interface ReasoningEngine {
  readonly id: string;
  complete(messages: readonly ChatMessage[], options?: CompletionOptions): Promise<string>;
}
