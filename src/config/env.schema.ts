import { z } from 'zod';
import type { EmbeddingConfig } from '../modules/schema/embedding-provider.js';
import type { GenerationConfig, PromptMode } from '../modules/ai/types/ai.types.js';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

export const envSchema = z.object({
  PORT: z.string().default('5000'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  LLM_PROVIDER: z.enum(['openai', 'groq', 'anthropic', 'ollama']).default('openai'),
  GENERATION_MODE: z.enum(['json', 'text', 'tool']).optional(),
  LLM_API_KEY: optionalString,
  LLM_MODEL: z.string().default('gpt-4o-mini'),
  LLM_BASE_URL: optionalString,
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  EMBEDDING_PROVIDER: z.enum(['none', 'openai', 'ollama']).default('none'),
  EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),
  EMBEDDING_BASE_URL: optionalString,
  EMBEDDING_API_KEY: optionalString,
  SCHEMA_INDEX_DIR: z.string().default('./data/schema_index'),
  PROMPT_MODE: z.enum(['all', 'relevant']).default('relevant'),
  PROMPT_TOP_K: z.coerce.number().int().positive().default(10),
  AI_CACHE_TTL: z.coerce.number().default(3600),
  AI_MAX_CACHE_SIZE: z.coerce.number().default(500),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().default(900000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(100),
  SAMPLE_ROW_LIMIT: z.coerce.number().int().positive().default(5)
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv) {
  return envSchema.safeParse(source);
}

export function toGenerationConfig(env: Env): GenerationConfig {
  return {
    provider: env.LLM_PROVIDER,
    mode: env.GENERATION_MODE,
    apiKey: env.LLM_API_KEY,
    model: env.LLM_MODEL,
    baseUrl: env.LLM_BASE_URL,
    timeoutMs: env.GENERATION_TIMEOUT_MS
  };
}

export function toEmbeddingConfig(env: Env): EmbeddingConfig {
  return {
    provider: env.EMBEDDING_PROVIDER,
    model: env.EMBEDDING_MODEL,
    dimensions: env.EMBEDDING_DIMENSIONS,
    baseUrl: env.EMBEDDING_BASE_URL,
    // OpenAI embeddings usually share the chat key.
    apiKey: env.EMBEDDING_API_KEY ?? env.LLM_API_KEY,
    timeoutMs: env.GENERATION_TIMEOUT_MS
  };
}

export function toPromptMode(env: Env): PromptMode {
  return env.PROMPT_MODE === 'all' ? { kind: 'all' } : { kind: 'relevant', topK: env.PROMPT_TOP_K };
}
