import type { LlmAdapter, ChatMessage, LlmResponse, LlmConfig, ChatOptions } from '../types.js';

interface AnthropicContentBlock {
  type: string;
  text?: string;
}

export class AnthropicAdapter implements LlmAdapter {
  readonly model: string;
  private apiKey: string;
  private baseUrl: string;

  constructor(config: LlmConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.baseUrl = config.baseUrl || 'https://api.anthropic.com/v1';
  }

  async chat(messages: ChatMessage[], options?: ChatOptions): Promise<LlmResponse> {
    const systemPrompt = messages
      .filter(m => m.role === 'system')
      .map(m => m.content)
      .join('\n\n');

    const body: Record<string, unknown> = {
      model: this.model,
      max_tokens: 2048,
      temperature: options?.temperature ?? 0.7,
      system: systemPrompt || undefined,
      messages: messages
        .filter(m => m.role !== 'system')
        .map(m => ({ role: m.role, content: m.content })),
    };

    const response = await fetch(`${this.baseUrl}/messages`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.apiKey,
        'anthropic-version': '2023-06-01',
      },
      body: JSON.stringify(body),
      signal: options?.signal,
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Anthropic API error ${response.status}: ${text}`);
    }

    const data = await response.json() as {
      content: AnthropicContentBlock[];
      usage?: { input_tokens: number; output_tokens: number };
    };

    const textContent = data.content
      .filter(block => block.type === 'text')
      .map(block => block.text || '')
      .join('');

    return {
      content: textContent,
      usage: data.usage ? {
        promptTokens: data.usage.input_tokens,
        completionTokens: data.usage.output_tokens,
      } : undefined,
    };
  }
}
