/**
 * Language-model access for the reviewer.
 */

import { z } from 'zod';

export interface ReviewLLM {
  readonly model: string;
  complete(systemPrompt: string, userPrompt: string): Promise<string>;
}

export interface AnthropicClientOptions {
  model: string;
  apiKey: string | undefined;
  baseUrl?: string;
  maxTokens?: number;
  fetchFn?: typeof fetch;
}

const MessagesResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

/** Messages API client over plain fetch. */
export class AnthropicClient implements ReviewLLM {
  readonly model: string;
  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;
  private readonly maxTokens: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: AnthropicClientOptions) {
    this.model = options.model;
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? 'https://api.anthropic.com').replace(/\/+$/, '');
    this.maxTokens = options.maxTokens ?? 8192;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    if (!this.apiKey) {
      throw new Error('Anthropic API key is not set');
    }

    const response = await this.fetchFn(`${this.baseUrl}/v1/messages`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.apiKey,
        'anthropic-version': '2023-06-01',
      },
      body: JSON.stringify({
        model: this.model,
        max_tokens: this.maxTokens,
        system: systemPrompt,
        messages: [{ role: 'user', content: userPrompt }],
      }),
    });

    if (!response.ok) {
      const body = await response.text().catch((err: unknown) => `<unreadable body: ${String(err)}>`);
      throw new Error(`Anthropic API error ${response.status}: ${body.slice(0, 500)}`);
    }

    const data = MessagesResponseSchema.parse(await response.json());
    const textBlock = data.content.find((b) => b.type === 'text');
    return textBlock?.text ?? '';
  }
}
