import { z } from 'zod';

import { TransportError, errorMessage } from '../errors.js';
import type { FetchLike } from '../tools/types.js';

export interface Embedder {
  readonly dimensions: number;
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

function hashToken(token: string): number {
  let hash = 2166136261;

  for (let index = 0; index < token.length; index += 1) {
    hash ^= token.charCodeAt(index);
    hash = Math.imul(hash, 16777619);
  }

  return hash >>> 0;
}

function tokenizeTextForEmbedding(text: string): string[] {
  const matches = text.toLowerCase().match(/[\p{L}\p{N}_]+/gu);
  return matches ?? [];
}

export function buildHashedEmbedding(text: string, dimensions: number): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  const tokens = tokenizeTextForEmbedding(text);

  if (tokens.length === 0) {
    return vector;
  }

  for (const token of tokens) {
    const hash = hashToken(token);
    const index = hash % dimensions;
    const sign = (hash & 1) === 0 ? 1 : -1;
    vector[index] = (vector[index] ?? 0) + sign;
  }

  const magnitude = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
  if (magnitude === 0) {
    return vector;
  }

  return vector.map((value) => Number((value / magnitude).toFixed(6)));
}

/** Feature-hashing embedder. Deterministic and offline; texts sharing words land near each other. */
export class HashedEmbedder implements Embedder {
  constructor(public readonly dimensions: number) {}

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => buildHashedEmbedding(text, this.dimensions));
  }
}

const EmbeddingsResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()),
    }),
  ),
});

export interface OpenAiEmbedderOptions {
  endpoint: string;
  model: string;
  apiKey: string;
  dimensions: number;
  fetch?: FetchLike;
}

export class OpenAiEmbedder implements Embedder {
  public readonly dimensions: number;

  private readonly endpoint: string;
  private readonly model: string;
  private readonly apiKey: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: OpenAiEmbedderOptions) {
    this.endpoint = options.endpoint;
    this.model = options.model;
    this.apiKey = options.apiKey;
    this.dimensions = options.dimensions;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({ model: this.model, input: texts, dimensions: this.dimensions }),
        signal,
      });
    } catch (error) {
      throw new TransportError('embeddings', `request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new TransportError('embeddings', `HTTP ${response.status}`, { statusCode: response.status });
    }

    const parsed = EmbeddingsResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new TransportError('embeddings', 'malformed response body');
    }

    const vectors = [...parsed.data.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
    if (vectors.length !== texts.length || vectors.some((vector) => vector.length !== this.dimensions)) {
      throw new TransportError('embeddings', `expected ${texts.length} vectors of ${this.dimensions} dimensions`);
    }

    return vectors;
  }
}
