import OpenAI from 'openai';

import { exponentialBackoff } from '../util/retry';
import { chunkArray } from '../util/concurrency';
import type { EmbeddingCapability } from './schema';

type EmbeddingOptions = {
  model: string;
  dimension: number;
  batchSize?: number;
  maxAttempts?: number;
};

type OllamaEmbeddingOptions = EmbeddingOptions & {
  baseUrl: string;
};

type OpenAiEmbeddingOptions = EmbeddingOptions & {
  apiKey?: string;
  baseUrl?: string;
  client?: OpenAI;
};

type RequestError = Error & { status?: number; detail?: string };

const getStatus = (error: unknown): number | undefined => {
  if (error && typeof error === 'object' && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number') {
      return status;
    }
  }
  return undefined;
};

const getDetail = (error: unknown): string | undefined => {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  if (error && typeof error === 'object' && 'detail' in error) {
    const { detail } = error;
    if (typeof detail === 'string') {
      return detail;
    }
  }

  return undefined;
};

const buildOllamaEndpoint = (baseUrl: string): string => {
  try {
    const url = new URL(baseUrl);
    url.pathname = '/api/embeddings';
    url.search = '';
    return url.toString();
  } catch (error) {
    throw new Error(`Invalid embedding service URL "${baseUrl}": ${getDetail(error) ?? 'unparseable'}`);
  }
};

/**
 * Batching, retry and vector validation shared by the embedding providers.
 * Subclasses only implement a single provider round trip.
 */
abstract class EmbeddingGenerator implements EmbeddingCapability {
  readonly dimension: number;

  protected readonly model: string;

  private readonly batchSize: number;

  private readonly maxAttempts: number;

  protected constructor({ model, dimension, batchSize = 64, maxAttempts = 5 }: EmbeddingOptions) {
    this.model = model;
    this.dimension = dimension;
    this.batchSize = Math.max(1, batchSize);
    this.maxAttempts = Math.max(1, maxAttempts);
  }

  protected abstract requestBatch(batch: string[]): Promise<unknown[]>;

  private shouldRetry(error: unknown): boolean {
    const status = getStatus(error);

    if (typeof status === 'number' && status >= 400 && status < 500 && status !== 429) {
      return false;
    }

    return true;
  }

  private logRetry(error: unknown, attempt: number, delay: number): void {
    const status = getStatus(error);
    const detail = getDetail(error) ?? 'Unknown error';
    const prefix = typeof status === 'number' ? `status ${status}, ` : '';

    console.warn(`[EMBED] Embedding request attempt ${attempt} failed (${prefix}${detail}). Retrying in ${delay}ms.`);
  }

  private buildEmbeddingError(error: unknown): Error {
    const status = getStatus(error);
    const detail = getDetail(error) ?? 'Unknown error';
    const message = typeof status === 'number'
      ? `Embedding request failed (status ${status}): ${detail}`
      : `Embedding request failed: ${detail}`;

    return new Error(message, { cause: error });
  }

  protected normalizeEmbeddingVector(values: unknown): number[] {
    if (!Array.isArray(values)) {
      throw new Error('Embedding response did not include an array of numbers.');
    }

    const vector = values.map((value, index) => {
      const numeric = typeof value === 'number' ? value : Number(value);
      if (Number.isNaN(numeric)) {
        throw new Error(`Embedding value at index ${index} is not a valid number.`);
      }
      return numeric;
    });

    if (vector.length !== this.dimension) {
      throw new Error(
        `Embedding dimension mismatch: expected ${this.dimension}, got ${vector.length} from model "${this.model}".`,
      );
    }

    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (!texts.length) {
      return [];
    }

    const embeddings: number[][] = [];

    for (const batch of chunkArray(texts, this.batchSize)) {
      let raw: unknown[];

      try {
        raw = await exponentialBackoff(
          () => this.requestBatch(batch),
          {
            maxAttempts: this.maxAttempts,
            onRetry: (error, attempt, delay) => this.logRetry(error, attempt, delay),
            shouldRetry: (error) => this.shouldRetry(error),
          },
        );
      } catch (error) {
        throw this.buildEmbeddingError(error);
      }

      if (raw.length !== batch.length) {
        throw new Error(`Embedding provider returned ${raw.length} vector(s) for ${batch.length} input(s).`);
      }

      embeddings.push(...raw.map((values) => this.normalizeEmbeddingVector(values)));
    }

    return embeddings;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }
}

export class OllamaEmbeddings extends EmbeddingGenerator {
  private readonly endpoint: string;

  constructor({ baseUrl, ...options }: OllamaEmbeddingOptions) {
    super(options);
    this.endpoint = buildOllamaEndpoint(baseUrl);
  }

  // The endpoint takes one prompt per request.
  protected async requestBatch(batch: string[]): Promise<unknown[]> {
    const embeddings: unknown[] = [];

    for (const text of batch) {
      const response = await fetch(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.model,
          prompt: text,
        }),
      });

      if (!response.ok) {
        const detailText = await response.text();
        const error: RequestError = new Error(detailText || response.statusText);
        error.status = response.status;
        error.detail = detailText || response.statusText;
        throw error;
      }

      let data: unknown;

      try {
        data = await response.json();
      } catch (error) {
        throw new Error(`Failed to parse embedding response JSON: ${getDetail(error) ?? 'invalid body'}`);
      }

      embeddings.push(data && typeof data === 'object' && 'embedding' in data ? data.embedding : undefined);
    }

    return embeddings;
  }
}

export class OpenAiEmbeddings extends EmbeddingGenerator {
  private readonly client: OpenAI;

  constructor({ apiKey, baseUrl, client, ...options }: OpenAiEmbeddingOptions) {
    super(options);

    if (client) {
      this.client = client;
    } else {
      if (!apiKey) {
        throw new Error('Embedding API key not configured. Set OPENAI_API_KEY.');
      }
      // Retries are handled by exponentialBackoff.
      this.client = new OpenAI({ apiKey, baseURL: baseUrl, maxRetries: 0 });
    }
  }

  protected async requestBatch(batch: string[]): Promise<unknown[]> {
    const response = await this.client.embeddings.create({
      model: this.model,
      input: batch,
    });

    return [...response.data]
      .sort((left, right) => left.index - right.index)
      .map((item) => item.embedding);
  }
}

export type { EmbeddingOptions, OllamaEmbeddingOptions, OpenAiEmbeddingOptions };
