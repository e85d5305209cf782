/**
 * Chat-completions wire format (OpenAI, Ollama, DeepSeek and other compatible APIs)
 * POST <base>/chat/completions with bearer auth, { model, messages } body
 */

import OpenAI, { APIError } from 'openai';
import { z } from 'zod';
import { ModelHttpError, ModelResponseError, NO_RESPONSE_MESSAGE } from '../errors';
import type { AdapterContext, ChatRequest, ProviderAdapter, ProviderConfig } from './types';

const completionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable().optional()
      })
    })
  )
});

interface CallClient {
  client: OpenAI;
  // Text of the last non-2xx response, read before the SDK consumes it
  failedBody: () => string | undefined;
}

/**
 * A client per call: base URL, key and model may change between calls.
 * Retries are off so a failing call surfaces to the pipeline's per-item bookkeeping.
 */
function createClient(config: ProviderConfig, context: AdapterContext): CallClient {
  let failedBody: string | undefined;

  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.apiUrl,
    maxRetries: 0,
    timeout: context.timeoutMs,
    fetch: async (input: string | URL | Request, init?: RequestInit) => {
      const response = await context.fetch(input, init);
      if (!response.ok) {
        failedBody = await response.clone().text();
      }
      return response;
    }
  });

  return { client, failedBody: () => failedBody };
}

function translateError(error: unknown, rawBody: string | undefined): unknown {
  if (error instanceof APIError && typeof error.status === 'number') {
    const body = rawBody
      ?? (error.error !== undefined ? JSON.stringify(error.error) : error.message.replace(/^\d{3}\s*/, ''));
    return new ModelHttpError(error.status, body);
  }
  if (error instanceof SyntaxError) {
    return new ModelResponseError(`failed to parse response: ${error.message}`, rawBody);
  }
  return error;
}

function describeBody(body: unknown): string {
  return typeof body === 'string' ? body : JSON.stringify(body) ?? '';
}

export const chatCompletionsAdapter: ProviderAdapter = {
  name: 'chat-completions',
  requiredFields: ['apiUrl', 'model'],

  async chat(config: ProviderConfig, { systemPrompt, userContent }: ChatRequest, context: AdapterContext) {
    const { client, failedBody } = createClient(config, context);

    let completion: unknown;
    try {
      completion = await client.chat.completions.create(
        {
          model: config.model,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userContent }
          ]
        },
        { signal: context.signal }
      );
    } catch (error) {
      throw translateError(error, failedBody());
    }

    const parsed = completionSchema.safeParse(completion);
    if (!parsed.success) {
      throw new ModelResponseError(`failed to parse response: ${parsed.error.message}`, describeBody(completion));
    }

    const [choice] = parsed.data.choices;
    if (!choice) {
      throw new ModelResponseError(NO_RESPONSE_MESSAGE);
    }
    return choice.message.content ?? '';
  },

  async listModels(config: ProviderConfig, context: AdapterContext) {
    const { client, failedBody } = createClient(config, context);
    try {
      const page = await client.models.list({ signal: context.signal });
      return page.data.map(model => model.id);
    } catch (error) {
      throw translateError(error, failedBody());
    }
  }
};
