import test from 'node:test';
import assert from 'node:assert/strict';
import { parseEnv, toEmbeddingConfig, toGenerationConfig, toPromptMode, type Env } from './env.schema.js';

function parsed(source: NodeJS.ProcessEnv): Env {
  const result = parseEnv(source);
  if (!result.success) {
    assert.fail(result.error.issues.map((issue) => issue.message).join(', '));
  }
  return result.data;
}

test('DATABASE_URL is required', () => {
  const result = parseEnv({});
  assert.equal(result.success, false);
});

test('defaults apply when only DATABASE_URL is set', () => {
  const env = parsed({ DATABASE_URL: 'postgres://localhost/shop' });

  assert.equal(env.PORT, '5000');
  assert.equal(env.LLM_PROVIDER, 'openai');
  assert.equal(env.EMBEDDING_PROVIDER, 'none');
  assert.equal(env.PROMPT_MODE, 'relevant');
  assert.equal(env.PROMPT_TOP_K, 10);
  assert.equal(env.GENERATION_TIMEOUT_MS, 30000);
  assert.equal(env.SCHEMA_INDEX_DIR, './data/schema_index');
});

test('numeric settings are coerced and blank strings are dropped', () => {
  const env = parsed({
    DATABASE_URL: 'mysql://localhost/shop',
    PROMPT_TOP_K: '4',
    EMBEDDING_DIMENSIONS: '768',
    LLM_API_KEY: '   ',
    LLM_BASE_URL: ' http://llm.test/v1 '
  });

  assert.equal(env.PROMPT_TOP_K, 4);
  assert.equal(env.EMBEDDING_DIMENSIONS, 768);
  assert.equal(env.LLM_API_KEY, undefined);
  assert.equal(env.LLM_BASE_URL, 'http://llm.test/v1');
});

test('unknown providers are rejected', () => {
  assert.equal(parseEnv({ DATABASE_URL: 'postgres://localhost/shop', LLM_PROVIDER: 'mystery' }).success, false);
  assert.equal(parseEnv({ DATABASE_URL: 'postgres://localhost/shop', GENERATION_MODE: 'xml' }).success, false);
});

test('toGenerationConfig carries provider, mode and credentials', () => {
  const env = parsed({
    DATABASE_URL: 'postgres://localhost/shop',
    LLM_PROVIDER: 'anthropic',
    GENERATION_MODE: 'tool',
    LLM_API_KEY: 'test-secret',
    LLM_MODEL: 'test-model'
  });

  assert.deepEqual(toGenerationConfig(env), {
    provider: 'anthropic',
    mode: 'tool',
    apiKey: 'test-secret',
    model: 'test-model',
    baseUrl: undefined,
    timeoutMs: 30000
  });
});

test('toEmbeddingConfig falls back to the chat API key', () => {
  const env = parsed({ DATABASE_URL: 'postgres://localhost/shop', EMBEDDING_PROVIDER: 'openai', LLM_API_KEY: 'test-secret' });
  assert.equal(toEmbeddingConfig(env).apiKey, 'test-secret');

  const own = parsed({ DATABASE_URL: 'postgres://localhost/shop', LLM_API_KEY: 'test-secret', EMBEDDING_API_KEY: 'embed-secret' });
  assert.equal(toEmbeddingConfig(own).apiKey, 'embed-secret');
});

test('toPromptMode maps the prompt settings', () => {
  assert.deepEqual(toPromptMode(parsed({ DATABASE_URL: 'x', PROMPT_MODE: 'all' })), { kind: 'all' });
  assert.deepEqual(toPromptMode(parsed({ DATABASE_URL: 'x', PROMPT_TOP_K: '3' })), { kind: 'relevant', topK: 3 });
});
