import { chatCompletionsAdapter } from './chatCompletions';
import { generativeContentAdapter } from './generativeContent';
import type { ProviderAdapter } from './types';

/**
 * providerId -> adapter. Unknown ids fall back to the default adapter, so any
 * OpenAI-compatible provider works without registration.
 */
export class ProviderRegistry {
  private readonly adapters = new Map<string, ProviderAdapter>();

  constructor(private readonly fallback: ProviderAdapter) {}

  register(providerIds: string | string[], adapter: ProviderAdapter): this {
    for (const id of Array.isArray(providerIds) ? providerIds : [providerIds]) {
      this.adapters.set(id.trim().toLowerCase(), adapter);
    }
    return this;
  }

  resolve(providerId: string): ProviderAdapter {
    return this.adapters.get(providerId.trim().toLowerCase()) ?? this.fallback;
  }
}

export function createDefaultRegistry(): ProviderRegistry {
  return new ProviderRegistry(chatCompletionsAdapter)
    .register(['openai', 'ollama', 'deepseek', 'openrouter'], chatCompletionsAdapter)
    .register(['google', 'gemini'], generativeContentAdapter);
}
