// OpenAI Provider
// Uses the official SDK; OPENAI_BASE_URL points it at any OpenAI-compatible endpoint

import OpenAI from 'openai';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse } from './types.js';
import { env } from '../env.js';

export class OpenAIProvider implements Provider {
  name = 'openai';
  private client: OpenAI;

  constructor(client?: OpenAI) {
    if (client) {
      this.client = client;
      return;
    }

    if (!env.OPENAI_API_KEY) {
      throw new Error('OPENAI_API_KEY is not configured');
    }

    this.client = new OpenAI({
      apiKey: env.OPENAI_API_KEY,
      ...(env.OPENAI_BASE_URL ? { baseURL: env.OPENAI_BASE_URL } : {}),
      // Retries belong to the SDK; the agent loop never retries a model call
      maxRetries: 2,
    });
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const completion = await this.client.chat.completions.create(
      {
        model: options.model,
        messages,
        max_tokens: options.maxTokens ?? 1024,
        temperature: options.temperature ?? 0,
      },
      { signal: options.signal },
    );

    return {
      content: completion.choices[0]?.message?.content ?? '',
    };
  }
}
