/**
 * Embedding Service — text embeddings from an OpenAI-compatible endpoint.
 *
 * Uses text-embedding-3-small by default. One instance serves one model;
 * conversations pin the model id of the first turn they were embedded with.
 */

import { env } from '../config/env';
import { Embedder } from '../engine/types';
import { logger } from '../observability/logger';

export interface EmbeddingProviderConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
}

interface EmbeddingResponse {
  data: Array<{ embedding: number[]; index: number }>;
}

function isEmbeddingResponse(body: unknown): body is EmbeddingResponse {
  return (
    typeof body === 'object' &&
    body !== null &&
    'data' in body &&
    Array.isArray(body.data)
  );
}

export class OpenAIEmbeddingProvider implements Embedder {
  readonly model: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(config?: Partial<EmbeddingProviderConfig>) {
    this.apiKey = config?.apiKey ?? env.embedding.apiKey;
    this.model = config?.model ?? env.embedding.model;
    this.baseUrl = (config?.baseUrl ?? env.embedding.baseUrl).replace(/\/+$/, '');
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    if (!this.apiKey) {
      throw new Error('API key not configured for embeddings');
    }

    const response = await fetch(`${this.baseUrl}/embeddings`, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ model: this.model, input: [text] }),
      signal,
    });

    if (!response.ok) {
      const errorBody = await response.text();
      logger.error({ status: response.status, body: errorBody }, 'Embedding API error');
      throw new Error(`Embedding API error: ${response.status}`);
    }

    const body: unknown = await response.json();
    if (!isEmbeddingResponse(body) || body.data.length === 0) {
      throw new Error('Embedding API returned no vectors');
    }

    const first = [...body.data].sort((a, b) => a.index - b.index)[0];
    return first.embedding;
  }
}
