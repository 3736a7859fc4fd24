// Model client
// Narrows a provider down to the single generate(prompt) -> text call the agents need

import type { Provider } from './types.js';
import { AppError, errorMessage } from '../utils/errors.js';

export interface GenerateOptions {
  signal?: AbortSignal;
}

export interface ModelClient {
  /** Human-readable configuration label, reported on every agent result. */
  readonly label: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export interface ModelClientOptions {
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Splits "provider:model" ids. A bare id is treated as an Ollama model name,
 * matching the default local setup.
 */
export function parseModelId(modelId: string): { provider: string; model: string } {
  const trimmed = modelId.trim();
  const separator = trimmed.indexOf(':');
  if (separator <= 0) {
    return { provider: 'ollama', model: trimmed };
  }

  return {
    provider: trimmed.slice(0, separator).toLowerCase(),
    model: trimmed.slice(separator + 1),
  };
}

export function createModelClient(
  provider: Provider,
  model: string,
  options: ModelClientOptions = {},
): ModelClient {
  const label = `${provider.name}:${model}`;

  return {
    label,
    async generate(prompt: string, generateOptions: GenerateOptions = {}): Promise<string> {
      const signals: AbortSignal[] = [];
      if (generateOptions.signal) signals.push(generateOptions.signal);
      if (options.timeoutMs) signals.push(AbortSignal.timeout(options.timeoutMs));

      try {
        const response = await provider.sendChat([{ role: 'user', content: prompt }], {
          model,
          temperature: options.temperature ?? 0,
          maxTokens: options.maxTokens,
          signal: signals.length > 0 ? AbortSignal.any(signals) : undefined,
        });
        return response.content;
      } catch (error) {
        throw AppError.modelUnavailable(`Model ${label} failed: ${errorMessage(error)}`, { model: label });
      }
    },
  };
}
