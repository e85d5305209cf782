/**
 * Generative-content wire format (Google AI Studio / Gemini)
 * POST <base>/v1beta/models/<model>:generateContent?key=<key>
 */

import { z } from 'zod';
import { errorMessage } from '../../utils/logger';
import { withDeadline } from '../../utils/deadline';
import { ModelHttpError, ModelResponseError, NO_RESPONSE_MESSAGE } from '../errors';
import type { AdapterContext, ChatRequest, ProviderAdapter, ProviderConfig } from './types';

interface TextPart {
  text: string;
}

interface GenerateContentRequest {
  systemInstruction?: { parts: TextPart[] };
  contents: Array<{ role: 'user'; parts: TextPart[] }>;
}

const generateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().default('') })).default([])
          })
          .default({})
      })
    )
    .default([])
});

const listModelsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([])
});

async function requestJson(url: string, init: RequestInit, context: AdapterContext): Promise<unknown> {
  const deadline = withDeadline(context.signal, context.timeoutMs);
  try {
    const response = await context.fetch(url, { ...init, signal: deadline.signal });
    const text = await response.text();

    if (!response.ok) {
      throw new ModelHttpError(response.status, text);
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ModelResponseError(`failed to parse response: ${errorMessage(error)}`, text);
    }
  } finally {
    deadline.clear();
  }
}

export function buildGenerateContentBody({ systemPrompt, userContent }: ChatRequest): GenerateContentRequest {
  const contents: GenerateContentRequest['contents'] = [{ role: 'user', parts: [{ text: userContent }] }];
  if (!systemPrompt) {
    return { contents };
  }
  return { systemInstruction: { parts: [{ text: systemPrompt }] }, contents };
}

export const generativeContentAdapter: ProviderAdapter = {
  name: 'generative-content',
  requiredFields: ['apiUrl', 'apiKey', 'model'],

  async chat(config: ProviderConfig, request: ChatRequest, context: AdapterContext) {
    const url = `${config.apiUrl}/v1beta/models/${config.model}:generateContent?key=${encodeURIComponent(config.apiKey)}`;

    const payload = await requestJson(
      url,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(buildGenerateContentBody(request))
      },
      context
    );

    const parsed = generateContentResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ModelResponseError(`failed to parse response: ${parsed.error.message}`, JSON.stringify(payload));
    }

    const [candidate] = parsed.data.candidates;
    const [part] = candidate?.content.parts ?? [];
    if (!part) {
      throw new ModelResponseError(NO_RESPONSE_MESSAGE);
    }
    return part.text;
  },

  async listModels(config: ProviderConfig, context: AdapterContext) {
    const payload = await requestJson(
      `${config.apiUrl}/v1beta/models?key=${encodeURIComponent(config.apiKey)}`,
      { method: 'GET' },
      context
    );

    const parsed = listModelsResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ModelResponseError(`failed to parse response: ${parsed.error.message}`, JSON.stringify(payload));
    }
    return parsed.data.models.map(model => model.name.replace(/^models\//, ''));
  }
};
