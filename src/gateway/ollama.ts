/**
 * Ollama gateway
 *
 * Talks to a local Ollama server over its HTTP API. Each chunk is one
 * non-streaming `/api/generate` call; `/api/tags` lists installed models.
 */

import fetch, { FetchError, RequestInit, Response } from 'node-fetch';
import { z } from 'zod';
import { GatewayError } from '../core/errors';
import { splitTranslation } from '../core/chunker';
import { log } from '../util/log';
import { buildChunkPrompt, stripCodeFence } from './prompts';
import { ModelInfo, TranslationGateway, TranslationRequest } from './types';

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';

export type HttpClient = (url: string, init: RequestInit) => Promise<Response>;

const GenerateResponseSchema = z.object({
  response: z.string(),
  done: z.boolean().optional(),
});

const TagsResponseSchema = z.object({
  models: z.array(
    z.object({
      name: z.string(),
      size: z.number().optional(),
    })
  ),
});

export interface OllamaGatewayOptions {
  model: string;
  baseUrl?: string;
  temperature?: number;
  /** Socket-level timeout handed to node-fetch */
  timeoutMs?: number;
  /** Replaces node-fetch, e.g. in tests */
  http?: HttpClient;
}

/**
 * Normalize OLLAMA_HOST style values ("127.0.0.1:11434", "http://host/")
 */
export function normalizeBaseUrl(url: string): string {
  const withScheme = /^https?:\/\//i.test(url) ? url : `http://${url}`;
  return withScheme.replace(/\/+$/, '');
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

function toFetchFailure(error: unknown, url: string): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  if (isAbortError(error)) {
    // The caller gave up; retrying would only be aborted again
    return new GatewayError('GatewayUnavailable', `Ollama request to ${url} was aborted`, { cause: error, retryable: false });
  }
  if (error instanceof FetchError) {
    if (error.type === 'request-timeout' || error.type === 'body-timeout') {
      return new GatewayError('GatewayTimeout', `Ollama request to ${url} timed out`, { cause: error });
    }
    if (error.code === 'ECONNREFUSED') {
      return new GatewayError('GatewayUnavailable', `Ollama is not running at ${url} (connection refused)`, { cause: error });
    }
    return new GatewayError('GatewayUnavailable', `Ollama request failed: ${error.message}`, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new GatewayError('GatewayUnavailable', `Ollama request failed: ${message}`, { cause: error });
}

export class OllamaGateway implements TranslationGateway {
  readonly name = 'ollama';
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly temperature: number;
  private readonly timeoutMs?: number;
  private readonly http: HttpClient;

  constructor(options: OllamaGatewayOptions) {
    this.model = options.model;
    this.baseUrl = normalizeBaseUrl(options.baseUrl ?? DEFAULT_OLLAMA_URL);
    this.temperature = options.temperature ?? 0.3;
    this.timeoutMs = options.timeoutMs;
    this.http = options.http ?? fetch;
  }

  async translate(request: TranslationRequest, signal?: AbortSignal): Promise<string[]> {
    const prompt = buildChunkPrompt(request);
    const sourceLength = request.texts.reduce((total, text) => total + text.length, 0);
    const body = {
      model: request.model ?? this.model,
      prompt,
      stream: false,
      options: {
        temperature: this.temperature,
        // Rough upper bound on output tokens
        num_predict: Math.max(256, sourceLength * 2),
      },
    };

    const payload = await this.requestJson('/api/generate', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal,
    });

    const parsed = GenerateResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new GatewayError('GatewayProtocolError', 'Ollama reply has no "response" text');
    }

    return splitTranslation(stripCodeFence(parsed.data.response), request.texts.length);
  }

  async listModels(): Promise<ModelInfo[]> {
    const payload = await this.requestJson('/api/tags', { method: 'GET' });
    const parsed = TagsResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new GatewayError('GatewayProtocolError', 'Ollama reply has no model list');
    }
    return parsed.data.models.map(model => ({ name: model.name, size: model.size }));
  }

  private async requestJson(endpoint: string, init: RequestInit): Promise<unknown> {
    const url = `${this.baseUrl}${endpoint}`;

    let response: Response;
    try {
      response = await this.http(url, { ...init, timeout: this.timeoutMs ?? 0 });
    } catch (error) {
      const failure = toFetchFailure(error, this.baseUrl);
      log(`[Ollama] ${failure.code}: ${failure.message}`);
      throw failure;
    }

    if (!response.ok) {
      const errorText = await response.text();
      const message = `Ollama error ${response.status}: ${errorText}`;
      log(`[Ollama] ${message}`);
      // 5xx and 429 are transient
      const retryable = response.status >= 500 || response.status === 429;
      throw new GatewayError('GatewayUnavailable', message, { retryable });
    }

    try {
      const data: unknown = await response.json();
      return data;
    } catch (error) {
      if (isAbortError(error)) {
        throw toFetchFailure(error, this.baseUrl);
      }
      throw new GatewayError('GatewayProtocolError', `Ollama returned invalid JSON from ${endpoint}`, { cause: error });
    }
  }
}
