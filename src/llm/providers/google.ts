import type { LlmAdapter, ChatMessage, LlmResponse, LlmConfig, ChatOptions } from '../types.js';

export class GoogleAdapter implements LlmAdapter {
  readonly model: string;
  private apiKey: string;

  constructor(config: LlmConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
  }

  async chat(messages: ChatMessage[], options?: ChatOptions): Promise<LlmResponse> {
    const systemMessages = messages.filter(m => m.role === 'system');
    const nonSystemMessages = messages.filter(m => m.role !== 'system');

    const systemInstruction = systemMessages.length > 0
      ? { parts: [{ text: systemMessages.map(m => m.content).join('\n\n') }] }
      : undefined;

    const generationConfig: Record<string, unknown> = {
      temperature: options?.temperature ?? 0.7,
    };
    if (options?.json) {
      generationConfig.responseMimeType = 'application/json';
    }

    const body = {
      systemInstruction,
      contents: nonSystemMessages.map(m => ({
        role: m.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: m.content }],
      })),
      generationConfig,
    };

    const url = `https://generativelanguage.googleapis.com/v1beta/models/${this.model}:generateContent?key=${this.apiKey}`;

    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: options?.signal,
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Google Gemini API error ${response.status}: ${text}`);
    }

    const data = await response.json() as {
      candidates?: Array<{
        content: { parts: Array<{ text?: string }> };
      }>;
      usageMetadata?: { promptTokenCount: number; candidatesTokenCount: number };
    };

    const parts = data.candidates?.[0]?.content.parts ?? [];
    const textContent = parts.map(p => p.text ?? '').join('');

    return {
      content: textContent,
      usage: data.usageMetadata ? {
        promptTokens: data.usageMetadata.promptTokenCount,
        completionTokens: data.usageMetadata.candidatesTokenCount,
      } : undefined,
    };
  }
}
