/**
 * Model Gateway
 * Uniform chat/classify/summarize over the configured provider. Provider
 * settings are read from the store on every call, so a settings change
 * applies to the next call without a restart.
 */

import { CONFIG_KEYS, type ConfigKey, type ConfigMap } from '../types/models';
import type { ConfigReader } from '../store/types';
import { Logger, logger as rootLogger } from '../utils/logger';
import { ModelConfigError } from './errors';
import { createDefaultRegistry, type ProviderRegistry } from './providers/registry';
import type { AdapterContext, ProviderConfig, ProviderField } from './providers/types';

const FIELD_SETTINGS: Record<ProviderField, { key: ConfigKey; label: string }> = {
  apiUrl: { key: CONFIG_KEYS.apiUrl, label: 'API base URL' },
  apiKey: { key: CONFIG_KEYS.apiKey, label: 'API key' },
  model: { key: CONFIG_KEYS.model, label: 'model' }
};

const CONNECTION_FIELDS: readonly ProviderField[] = ['apiUrl', 'apiKey', 'model'];

const CONNECTION_GREETING = 'Hi';

export interface GatewayOptions {
  timeoutMs?: number;
  fetch?: typeof fetch;
  registry?: ProviderRegistry;
  logger?: Logger;
}

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * What the processing pipeline needs from a model backend
 */
export interface ModelClient {
  classify(content: string, options?: CallOptions): Promise<string>;
  summarize(content: string, options?: CallOptions): Promise<string>;
  getSetting(key: ConfigKey): Promise<string>;
}

export function toProviderConfig(values: ConfigMap): ProviderConfig {
  return {
    provider: (values[CONFIG_KEYS.provider] ?? '').trim(),
    apiUrl: (values[CONFIG_KEYS.apiUrl] ?? '').trim().replace(/\/+$/, ''),
    apiKey: (values[CONFIG_KEYS.apiKey] ?? '').trim(),
    model: (values[CONFIG_KEYS.model] ?? '').trim()
  };
}

export function assertConfigured(config: ProviderConfig, fields: readonly ProviderField[]): void {
  for (const field of fields) {
    if (!config[field]) {
      const { key, label } = FIELD_SETTINGS[field];
      throw new ModelConfigError(key, `LLM ${label} is not configured (${key})`);
    }
  }
}

export class ModelGateway implements ModelClient {
  private readonly registry: ProviderRegistry;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly log: Logger;

  constructor(private readonly store: ConfigReader, options: GatewayOptions = {}) {
    this.registry = options.registry ?? createDefaultRegistry();
    this.timeoutMs = options.timeoutMs ?? 120000;
    this.fetchImpl = options.fetch ?? ((input: string | URL | Request, init?: RequestInit) => fetch(input, init));
    this.log = (options.logger ?? rootLogger).child('gateway');
  }

  async getProviderConfig(): Promise<ProviderConfig> {
    return toProviderConfig(await this.store.getConfigMap());
  }

  async getSetting(key: ConfigKey): Promise<string> {
    const values = await this.store.getConfigMap();
    return values[key] ?? '';
  }

  async chat(systemPrompt: string, userContent: string, options: CallOptions = {}): Promise<string> {
    const config = await this.getProviderConfig();
    const adapter = this.registry.resolve(config.provider);
    assertConfigured(config, adapter.requiredFields);

    const startedAt = Date.now();
    const reply = await adapter.chat(config, { systemPrompt, userContent }, this.context(options));
    this.log.debug(`${adapter.name} call completed`, {
      provider: config.provider,
      model: config.model,
      durationMs: Date.now() - startedAt
    });
    return reply;
  }

  async classify(content: string, options: CallOptions = {}): Promise<string> {
    const prompt = await this.getSetting(CONFIG_KEYS.promptFilter);
    return this.chat(prompt, content, options);
  }

  async summarize(content: string, options: CallOptions = {}): Promise<string> {
    const prompt = await this.getSetting(CONFIG_KEYS.promptSummary);
    return this.chat(prompt, content, options);
  }

  async listModels(options: CallOptions = {}): Promise<string[]> {
    const config = await this.getProviderConfig();
    const adapter = this.registry.resolve(config.provider);
    assertConfigured(config, adapter.requiredFields.filter(field => field !== 'model'));
    return adapter.listModels(config, this.context(options));
  }

  /**
   * Validates every connection field before any network I/O, then sends one greeting message
   */
  async testConnection(options: CallOptions = {}): Promise<string> {
    const config = await this.getProviderConfig();
    assertConfigured(config, CONNECTION_FIELDS);
    return this.chat('', CONNECTION_GREETING, options);
  }

  private context(options: CallOptions): AdapterContext {
    return { signal: options.signal, timeoutMs: this.timeoutMs, fetch: this.fetchImpl };
  }
}
