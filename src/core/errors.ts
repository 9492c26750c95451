export class GenerationError extends Error {
  constructor(
    message: string,
    readonly code: 'GENERATION_REQUEST_FAILED' | 'GENERATION_RESPONSE_INVALID' | 'GENERATION_CONFIGURATION_ERROR',
    readonly details?: string
  ) {
    super(message);
    this.name = 'GenerationError';
  }
}

/**
 * Embedding transport or shape failure. `statusCode` is the upstream HTTP status when there was one.
 */
export class EmbeddingError extends Error {
  constructor(
    message: string,
    readonly statusCode?: number
  ) {
    super(message);
    this.name = 'EmbeddingError';
  }
}

/**
 * Persisted index and metadata disagree. Raised on load; the index refuses to serve.
 */
export class IndexCorruptionError extends Error {
  constructor(
    message: string,
    readonly storePath: string
  ) {
    super(message);
    this.name = 'IndexCorruptionError';
  }
}

export class SchemaProviderError extends Error {
  constructor(
    message: string,
    readonly code: 'SCHEMA_LOOKUP_FAILED' | 'QUERY_EXECUTION_FAILED' | 'TABLE_NOT_FOUND',
    readonly sql?: string
  ) {
    super(message);
    this.name = 'SchemaProviderError';
  }
}

export class HttpError extends Error {
  constructor(
    readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export function getErrorMessage(error: unknown, fallback: string): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string' && error) return error;
  return fallback;
}
