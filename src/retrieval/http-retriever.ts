/**
 * HTTP Retriever — fetches ranked evidence from an external search service.
 *
 * POST {url} with { query, topK, include, exclude } and expects
 * { documents: [{ content, sourceMetadata?, freshnessTimestamp? }] }.
 */

import Ajv from 'ajv';
import { env } from '../config/env';
import { RetrievedDocument, RetrieveOptions, Retriever } from '../engine/types';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'http-retriever' });

export interface HttpRetrieverConfig {
  url: string;
  apiKey: string;
  topK: number;
}

interface RetrieverResponse {
  documents: Array<{
    content: string;
    sourceMetadata?: Record<string, unknown>;
    freshnessTimestamp?: string | null;
  }>;
}

const ajv = new Ajv({ allErrors: true });
const responseSchema = {
  type: 'object',
  properties: {
    documents: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          content: { type: 'string' },
          sourceMetadata: { type: 'object' },
          freshnessTimestamp: { type: ['string', 'null'] },
        },
        required: ['content'],
      },
    },
  },
  required: ['documents'],
};
const validateResponse = ajv.compile<RetrieverResponse>(responseSchema);

export class HttpRetriever implements Retriever {
  private readonly config: HttpRetrieverConfig;

  constructor(config?: Partial<HttpRetrieverConfig>) {
    this.config = {
      url: config?.url ?? env.retriever.url,
      apiKey: config?.apiKey ?? env.retriever.apiKey,
      topK: config?.topK ?? env.retriever.topK,
    };
  }

  async retrieve(query: string, options?: RetrieveOptions): Promise<RetrievedDocument[]> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.apiKey) headers['Authorization'] = `Bearer ${this.config.apiKey}`;

    const response = await fetch(this.config.url, {
      method: 'POST',
      headers,
      body: JSON.stringify({
        query,
        topK: this.config.topK,
        include: options?.hints?.include ?? [],
        exclude: options?.hints?.exclude ?? [],
      }),
      signal: options?.signal,
    });

    if (!response.ok) {
      const errorBody = await response.text();
      log.error({ status: response.status, body: errorBody }, 'Retriever API error');
      throw new Error(`Retriever API error: ${response.status}`);
    }

    const body: unknown = await response.json();
    if (!validateResponse(body)) {
      throw new Error(`Malformed retriever response: ${ajv.errorsText(validateResponse.errors)}`);
    }

    return body.documents.map((doc) => ({
      content: doc.content,
      sourceMetadata: doc.sourceMetadata ?? {},
      freshnessTimestamp: doc.freshnessTimestamp ?? null,
    }));
  }
}

/** Used when no retriever is configured: answers rely on the model alone. */
export class EmptyRetriever implements Retriever {
  async retrieve(): Promise<RetrievedDocument[]> {
    return [];
  }
}

export function createRetriever(): Retriever {
  if (env.retriever.url) return new HttpRetriever();
  log.warn('RETRIEVER_URL not set, answering without retrieved evidence');
  return new EmptyRetriever();
}
