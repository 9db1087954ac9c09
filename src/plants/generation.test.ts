import { describe, expect, it } from 'vitest';
import { GenerationTimeoutError } from '../errors.js';
import type { ChatMessage, ChatOptions, LlmAdapter, LlmResponse } from '../llm/types.js';
import { hang, makeRecord, SPRINGFIELD } from '../testing/fixtures.js';
import { LlmGenerationClient, withTimeout } from './generation.js';

class ScriptedLlm implements LlmAdapter {
  readonly model = 'scripted';
  readonly calls: Array<{ messages: ChatMessage[]; options?: ChatOptions }> = [];

  constructor(private readonly reply: string) {}

  async chat(messages: ChatMessage[], options?: ChatOptions): Promise<LlmResponse> {
    this.calls.push({ messages, options });
    return { content: this.reply };
  }
}

describe('withTimeout', () => {
  it('resolves with the task result', async () => {
    await expect(withTimeout(async () => 'ok', 1000)).resolves.toBe('ok');
  });

  it('rejects and aborts the task at expiry', async () => {
    let seen: AbortSignal | undefined;
    const pending = withTimeout(signal => {
      seen = signal;
      return hang<string>();
    }, 10);

    await expect(pending).rejects.toBeInstanceOf(GenerationTimeoutError);
    expect(seen?.aborted).toBe(true);
  });

  it('passes task errors through', async () => {
    await expect(withTimeout(async () => {
      throw new Error('upstream 500');
    }, 1000)).rejects.toThrow('upstream 500');
  });
});

describe('LlmGenerationClient', () => {
  it('asks for JSON and parses the reply', async () => {
    const llm = new ScriptedLlm('```json\n{"name": "okra", "days_to_harvest": 55}\n```');
    const client = new LlmGenerationClient(llm);
    const controller = new AbortController();

    const raw = await client.describePlant('okra', { hint: 'vegetable', signal: controller.signal });

    expect(raw).toEqual({ name: 'okra', days_to_harvest: 55 });
    expect(client.model).toBe('scripted');
    const [call] = llm.calls;
    expect(call.options).toEqual({ signal: controller.signal, temperature: 0.3, json: true });
    expect(call.messages[1].content).toContain('Provide growing information for the plant: "okra" (vegetable).');
  });

  it('describes the plant and location when writing instructions', async () => {
    const llm = new ScriptedLlm('{"preparation": []}');
    const client = new LlmGenerationClient(llm);
    const record = makeRecord({ name: 'ground cherry', category: 'fruit' });

    await client.writeInstructions(record, SPRINGFIELD, {
      gardenSize: 'small',
      experienceLevel: 'beginner',
      signal: new AbortController().signal,
    });

    const prompt = llm.calls[0].messages[1].content;
    expect(prompt).toContain('Write growing instructions for Ground Cherry in Springfield, IL.');
    expect(prompt).toContain('Gardener: beginner, small garden');
  });
});
