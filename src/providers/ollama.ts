// Ollama Provider
// Talks to a local Ollama daemon through its native /api/chat endpoint

import { z } from 'zod';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse } from './types.js';
import { env } from '../env.js';

const OllamaChatResponseSchema = z.object({
  message: z.object({
    role: z.string(),
    content: z.string(),
  }).optional(),
});

export class OllamaProvider implements Provider {
  name = 'ollama';
  private baseUrl: string;

  constructor(baseUrl: string = env.OLLAMA_BASE_URL) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const response = await fetch(`${this.baseUrl}/api/chat`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: options.model,
        messages,
        stream: false,
        options: {
          temperature: options.temperature ?? 0,
          ...(options.maxTokens ? { num_predict: options.maxTokens } : {}),
        },
      }),
      signal: options.signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Ollama API error (${response.status}): ${error}`);
    }

    const parsed = OllamaChatResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Ollama API returned an unexpected payload: ${parsed.error.message}`);
    }

    return {
      content: parsed.data.message?.content ?? '',
    };
  }
}
