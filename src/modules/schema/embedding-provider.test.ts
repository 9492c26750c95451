import test, { mock, type TestContext } from 'node:test';
import assert from 'node:assert/strict';
import { EmbeddingError } from '../../core/errors.js';
import {
  OllamaEmbeddingProvider,
  OpenAIEmbeddingProvider,
  createEmbeddingProvider
} from './embedding-provider.js';

interface CapturedRequest {
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function stubFetch(t: TestContext, respond: (request: CapturedRequest) => Response): CapturedRequest[] {
  const requests: CapturedRequest[] = [];
  const fetchMock = mock.method(globalThis, 'fetch', async (input: string | URL | Request, init?: RequestInit) => {
    const request: CapturedRequest = {
      url: String(input),
      headers: Object.fromEntries(new Headers(init?.headers).entries()),
      body: init?.body ? JSON.parse(String(init.body)) : undefined
    };
    requests.push(request);
    return respond(request);
  });
  t.after(() => fetchMock.mock.restore());
  return requests;
}

function inputCount(body: unknown): number {
  return typeof body === 'object' && body !== null && 'input' in body && Array.isArray(body.input) ? body.input.length : 0;
}

test('OpenAI provider sends the batch and orders vectors by index', async (t) => {
  const requests = stubFetch(t, () =>
    jsonResponse({
      data: [
        { index: 1, embedding: [0, 1] },
        { index: 0, embedding: [1, 0] }
      ]
    })
  );

  const provider = new OpenAIEmbeddingProvider('embed-small', 2, 'test-secret', 'https://embeddings.test/v1', 1000);
  const vectors = await provider.embed(['first', 'second']);

  assert.deepEqual(vectors, [
    [1, 0],
    [0, 1]
  ]);
  assert.equal(requests.length, 1);
  assert.equal(requests[0]?.url, 'https://embeddings.test/v1/embeddings');
  assert.equal(requests[0]?.headers.authorization, 'Bearer test-secret');
  assert.deepEqual(requests[0]?.body, { model: 'embed-small', input: ['first', 'second'] });
});

test('Ollama provider reads the embeddings array', async (t) => {
  const requests = stubFetch(t, () => jsonResponse({ embeddings: [[0.5, 0.5, 0.5]] }));

  const provider = new OllamaEmbeddingProvider('nomic', 3, 'http://ollama.test', 1000);

  assert.deepEqual(await provider.embed(['schema']), [[0.5, 0.5, 0.5]]);
  assert.equal(requests[0]?.url, 'http://ollama.test/api/embed');
});

test('empty input makes no request', async (t) => {
  const requests = stubFetch(t, () => jsonResponse({ embeddings: [] }));

  assert.deepEqual(await new OllamaEmbeddingProvider('nomic', 3).embed([]), []);
  assert.equal(requests.length, 0);
});

test('large inputs are split into batches of 64', async (t) => {
  const requests = stubFetch(t, (request) =>
    jsonResponse({ embeddings: Array.from({ length: inputCount(request.body) }, () => [1]) })
  );

  const texts = Array.from({ length: 70 }, (_, i) => `table_${i}`);
  const vectors = await new OllamaEmbeddingProvider('nomic', 1).embed(texts);

  assert.equal(vectors.length, 70);
  assert.deepEqual(
    requests.map((request) => inputCount(request.body)),
    [64, 6]
  );
});

test('a vector of the wrong dimension is rejected', async (t) => {
  stubFetch(t, () => jsonResponse({ embeddings: [[1, 2]] }));

  await assert.rejects(new OllamaEmbeddingProvider('nomic', 3).embed(['x']), {
    name: 'EmbeddingError',
    message: 'Embedding dimension 2 does not match configured 3'
  });
});

test('a reply with too few vectors is rejected', async (t) => {
  stubFetch(t, () => jsonResponse({ embeddings: [[1]] }));

  await assert.rejects(new OllamaEmbeddingProvider('nomic', 1).embed(['a', 'b']), {
    name: 'EmbeddingError',
    message: 'Expected 2 embeddings, received 1'
  });
});

test('HTTP failures become EmbeddingError', async (t) => {
  stubFetch(t, () => new Response('overloaded', { status: 503 }));

  await assert.rejects(new OllamaEmbeddingProvider('nomic', 3, 'http://ollama.test').embed(['x']), (error: unknown) => {
    assert.ok(error instanceof EmbeddingError);
    assert.equal(error.message, 'Embedding request failed: ollama.test responded 503: overloaded');
    assert.equal(error.statusCode, 503);
    return true;
  });
});

test('a malformed reply carries no status code', async (t) => {
  stubFetch(t, () => jsonResponse({ vectors: [] }));

  await assert.rejects(new OllamaEmbeddingProvider('nomic', 3).embed(['x']), (error: unknown) => {
    assert.ok(error instanceof EmbeddingError);
    assert.equal(error.statusCode, undefined);
    return true;
  });
});

test('createEmbeddingProvider returns null when embeddings are disabled', () => {
  assert.equal(createEmbeddingProvider({ provider: 'none', model: 'unused', dimensions: 1, timeoutMs: 1000 }), null);
});

test('createEmbeddingProvider requires an API key for openai', () => {
  assert.throws(
    () => createEmbeddingProvider({ provider: 'openai', model: 'embed-small', dimensions: 2, timeoutMs: 1000 }),
    EmbeddingError
  );
  const provider = createEmbeddingProvider({
    provider: 'openai',
    model: 'embed-small',
    dimensions: 2,
    apiKey: 'test-secret',
    timeoutMs: 1000
  });
  assert.equal(provider?.model, 'embed-small');
  assert.equal(provider?.dimensions, 2);
});
