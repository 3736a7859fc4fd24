// Provider Registry
// Central registry for all LLM providers

import type { Provider } from './types.js';
import { OllamaProvider } from './ollama.js';
import { OpenAIProvider } from './openai.js';
import { isProviderConfigured } from '../env.js';

// Provider instances (lazy initialization)
const providers: Map<string, Provider> = new Map();

function getOrCreateProvider(name: string): Provider | null {
  const cached = providers.get(name);
  if (cached) {
    return cached;
  }

  if (!isProviderConfigured(name)) {
    return null;
  }

  let provider: Provider | null = null;

  switch (name) {
    case 'ollama':
      provider = new OllamaProvider();
      break;
    case 'openai':
      provider = new OpenAIProvider();
      break;
    default:
      return null;
  }

  providers.set(name, provider);
  return provider;
}

export function getProvider(name: string): Provider {
  const provider = getOrCreateProvider(name);

  if (!provider) {
    throw new Error(`Provider "${name}" is not available or not configured`);
  }

  return provider;
}

export { createModelClient, parseModelId } from './model-client.js';
export type { ModelClient, GenerateOptions } from './model-client.js';
export type { Provider, ProviderMessage, ProviderOptions, ProviderResponse } from './types.js';
