/**
 * Generative-model transports.
 *
 * Two providers are supported: Gemini on Vertex AI (the default) and a
 * local Ollama server speaking `/api/chat`.
 */

import { z } from 'zod';
import { ModelTransport } from '../types';
import { AccessTokenProvider } from './google-cloud';
import { FetchFn, fetchJson, malformedResponse, parseResponse } from './http';

export interface GenerationOptions {
  temperature: number;
  maxOutputTokens: number;
}

export interface VertexGeminiOptions extends GenerationOptions {
  projectId: string;
  location: string;
  model: string;
  tokens: AccessTokenProvider;
  fetch?: FetchFn;
}

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() }).passthrough()).default([]),
          })
          .passthrough()
          .optional(),
        finishReason: z.string().optional(),
      }).passthrough(),
    )
    .default([]),
}).passthrough();

export function vertexGenerateContentUrl(options: Pick<VertexGeminiOptions, 'projectId' | 'location' | 'model'>): string {
  const { projectId, location, model } = options;
  return (
    `https://${location}-aiplatform.googleapis.com/v1/projects/${encodeURIComponent(projectId)}` +
    `/locations/${location}/publishers/google/models/${encodeURIComponent(model)}:generateContent`
  );
}

export function createVertexGeminiTransport(options: VertexGeminiOptions): ModelTransport {
  const fetchFn = options.fetch ?? fetch;
  const url = vertexGenerateContentUrl(options);
  const target = `vertex-ai:${options.model}`;

  return async function vertexGeminiTransport(request, signal) {
    const token = await options.tokens.getAccessToken();
    const body = await fetchJson(fetchFn, {
      target,
      url,
      method: 'POST',
      headers: { Authorization: `Bearer ${token}` },
      body: {
        systemInstruction: { parts: [{ text: request.systemPrompt }] },
        contents: [{ role: 'user', parts: [{ text: request.prompt }] }],
        generationConfig: {
          temperature: options.temperature,
          maxOutputTokens: options.maxOutputTokens,
          responseMimeType: 'application/json',
        },
      },
      signal,
      secrets: [token],
    });

    const parsed = parseResponse(GeminiResponseSchema, body, target);
    const candidate = parsed.candidates[0];
    const text = (candidate?.content?.parts ?? []).map((part) => part.text ?? '').join('');
    if (!text) {
      throw malformedResponse(target, `empty completion (finishReason: ${candidate?.finishReason ?? 'none'})`);
    }
    return { kind: 'model', text };
  };
}

/** Default base URL for a local Ollama instance. */
export const OLLAMA_DEFAULT_ENDPOINT = 'http://localhost:11434';

export interface OllamaOptions extends GenerationOptions {
  endpoint: string;
  model: string;
  fetch?: FetchFn;
}

const OllamaChatResponseSchema = z.object({
  message: z.object({ role: z.string(), content: z.string() }),
  done: z.boolean().optional(),
}).passthrough();

export function createOllamaTransport(options: OllamaOptions): ModelTransport {
  const fetchFn = options.fetch ?? fetch;
  const url = `${options.endpoint.replace(/\/+$/, '')}/api/chat`;
  const target = `ollama:${options.model}`;

  return async function ollamaTransport(request, signal) {
    const body = await fetchJson(fetchFn, {
      target,
      url,
      method: 'POST',
      body: {
        model: options.model,
        messages: [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.prompt },
        ],
        stream: false,
        format: 'json',
        options: {
          temperature: options.temperature,
          num_predict: options.maxOutputTokens,
        },
      },
      signal,
    });

    const parsed = parseResponse(OllamaChatResponseSchema, body, target);
    if (!parsed.message.content) {
      throw malformedResponse(target, 'empty completion');
    }
    return { kind: 'model', text: parsed.message.content };
  };
}
