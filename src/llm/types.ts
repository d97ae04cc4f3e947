import type { ModelTool } from '../tools/registry.js';

export interface WireToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string | null; tool_calls?: WireToolCall[] }
  | { role: 'tool'; tool_call_id: string; content: string };

/** A tool call as the provider sent it; `arguments` is not yet normalized. */
export interface ModelToolCall {
  id: string;
  name: string;
  arguments: unknown;
}

export interface ModelReply {
  content: string | null;
  toolCalls: ModelToolCall[];
}

export interface CompletionRequest {
  messages: readonly ChatMessage[];
  tools: readonly ModelTool[];
}

export interface LanguageModel {
  complete(request: CompletionRequest): Promise<ModelReply>;
}

export type ModelProviderErrorKind = 'insufficient_credits' | 'model_not_found' | 'rate_limited' | 'timeout' | 'upstream';

export class ModelProviderError extends Error {
  constructor(
    readonly kind: ModelProviderErrorKind,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ModelProviderError';
  }
}
