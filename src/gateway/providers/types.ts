export interface ProviderConfig {
  provider: string;
  apiUrl: string;
  apiKey: string;
  model: string;
}

export type ProviderField = Exclude<keyof ProviderConfig, 'provider'>;

export interface AdapterContext {
  signal?: AbortSignal;
  timeoutMs: number;
  fetch: typeof fetch;
}

export interface ChatRequest {
  systemPrompt: string;
  userContent: string;
}

/**
 * One provider wire protocol. Adapters are stateless: configuration and
 * transport arrive with every call.
 */
export interface ProviderAdapter {
  readonly name: string;
  /** Fields that must be non-empty before chat() touches the network */
  readonly requiredFields: readonly ProviderField[];
  chat(config: ProviderConfig, request: ChatRequest, context: AdapterContext): Promise<string>;
  listModels(config: ProviderConfig, context: AdapterContext): Promise<string[]>;
}
