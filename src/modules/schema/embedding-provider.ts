import { z } from 'zod';
import { EmbeddingError, getErrorMessage } from '../../core/errors.js';
import { UpstreamResponseError, postJson } from '../../core/fetch-with-timeout.js';

/**
 * Produces fixed-dimension vectors for schema text and questions.
 */
export interface EmbeddingProvider {
  readonly model: string;
  readonly dimensions: number;
  embed(texts: string[]): Promise<number[][]>;
}

export type EmbeddingProviderName = 'none' | 'openai' | 'ollama';

export interface EmbeddingConfig {
  provider: EmbeddingProviderName;
  model: string;
  dimensions: number;
  baseUrl?: string;
  apiKey?: string;
  timeoutMs: number;
}

const MAX_BATCH_SIZE = 64;

const openAIEmbeddingResponse = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()), index: z.number() }))
});

const ollamaEmbeddingResponse = z.object({
  embeddings: z.array(z.array(z.number()))
});

abstract class HttpEmbeddingProvider implements EmbeddingProvider {
  constructor(
    readonly model: string,
    readonly dimensions: number,
    protected readonly baseUrl: string,
    protected readonly timeoutMs: number
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += MAX_BATCH_SIZE) {
      const batch = texts.slice(i, i + MAX_BATCH_SIZE);
      let batchVectors: number[][];
      try {
        batchVectors = await this.embedBatch(batch);
      } catch (error) {
        throw new EmbeddingError(
          `Embedding request failed: ${getErrorMessage(error, 'unknown error')}`,
          error instanceof UpstreamResponseError ? error.status : undefined
        );
      }

      if (batchVectors.length !== batch.length) {
        throw new EmbeddingError(`Expected ${batch.length} embeddings, received ${batchVectors.length}`);
      }
      for (const vector of batchVectors) {
        if (vector.length !== this.dimensions) {
          throw new EmbeddingError(`Embedding dimension ${vector.length} does not match configured ${this.dimensions}`);
        }
      }
      vectors.push(...batchVectors);
    }

    return vectors;
  }

  protected abstract embedBatch(texts: string[]): Promise<number[][]>;
}

/**
 * OpenAI-compatible `/embeddings` endpoint.
 */
export class OpenAIEmbeddingProvider extends HttpEmbeddingProvider {
  constructor(
    model: string,
    dimensions: number,
    private readonly apiKey: string,
    baseUrl = 'https://api.openai.com/v1',
    timeoutMs = 30_000
  ) {
    super(model, dimensions, baseUrl, timeoutMs);
  }

  protected async embedBatch(texts: string[]): Promise<number[][]> {
    const raw = await postJson(
      `${this.baseUrl}/embeddings`,
      { model: this.model, input: texts },
      { Authorization: `Bearer ${this.apiKey}` },
      this.timeoutMs
    );
    const parsed = openAIEmbeddingResponse.parse(raw);
    return [...parsed.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }
}

/**
 * Ollama `/api/embed` endpoint.
 */
export class OllamaEmbeddingProvider extends HttpEmbeddingProvider {
  constructor(model: string, dimensions: number, baseUrl = 'http://localhost:11434', timeoutMs = 30_000) {
    super(model, dimensions, baseUrl, timeoutMs);
  }

  protected async embedBatch(texts: string[]): Promise<number[][]> {
    const raw = await postJson(`${this.baseUrl}/api/embed`, { model: this.model, input: texts }, {}, this.timeoutMs);
    return ollamaEmbeddingResponse.parse(raw).embeddings;
  }
}

/**
 * Returns null when embeddings are disabled; the index then runs in text mode.
 */
export function createEmbeddingProvider(config: EmbeddingConfig): EmbeddingProvider | null {
  switch (config.provider) {
    case 'none':
      return null;
    case 'openai':
      if (!config.apiKey) {
        throw new EmbeddingError('EMBEDDING_API_KEY is required for the openai embedding provider');
      }
      return new OpenAIEmbeddingProvider(config.model, config.dimensions, config.apiKey, config.baseUrl, config.timeoutMs);
    case 'ollama':
      return new OllamaEmbeddingProvider(config.model, config.dimensions, config.baseUrl, config.timeoutMs);
    default: {
      const _exhaustive: never = config.provider;
      return _exhaustive;
    }
  }
}
