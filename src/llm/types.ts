export type LlmProvider = 'openai' | 'openai-compatible' | 'anthropic' | 'google';

export interface ChatOptions {
  /** Aborts the underlying HTTP request. */
  signal?: AbortSignal;
  temperature?: number;
  /** Ask the provider for a JSON object reply where it supports that. */
  json?: boolean;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmResponse {
  content: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
  };
}

export interface LlmAdapter {
  readonly model: string;
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<LlmResponse>;
}

export interface LlmConfig {
  provider: LlmProvider;
  apiKey: string;
  model: string;
  baseUrl?: string;
}
