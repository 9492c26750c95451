import test from 'node:test';
import assert from 'node:assert/strict';
import { createApp } from '../src/app.js';
import type { SqlClient, SqlQueryResult } from '../src/core/pool-manager.js';
import type { JsonChatModel } from '../src/modules/ai/chat-models.js';
import { JsonModeGenerationClient } from '../src/modules/ai/generation-client.js';
import { NlQueryService } from '../src/modules/query/nl-query.service.js';
import { SchemaIndex } from '../src/modules/schema/schema-index.js';
import { InformationSchemaProvider } from '../src/modules/schema/schema-provider.js';

/**
 * In-process stand-in for a PostgreSQL pool holding `customers` and `invoices`.
 */
const database: SqlClient = {
  databaseType: 'postgres',
  async query(sql: string, params?: unknown[]): Promise<SqlQueryResult> {
    if (sql.includes('information_schema.tables')) {
      return { columns: ['table_name'], rows: [{ table_name: 'customers' }, { table_name: 'invoices' }] };
    }
    if (sql.includes('information_schema.columns')) {
      const rows =
        params?.[0] === 'customers'
          ? [
              { column_name: 'id', data_type: 'integer', is_nullable: 'NO', column_default: null },
              { column_name: 'email', data_type: 'text', is_nullable: 'YES', column_default: null }
            ]
          : [
              { column_name: 'id', data_type: 'integer', is_nullable: 'NO', column_default: null },
              { column_name: 'amount', data_type: 'numeric', is_nullable: 'NO', column_default: null }
            ];
      return { columns: ['column_name', 'data_type', 'is_nullable', 'column_default'], rows };
    }
    if (sql.includes('key_column_usage')) {
      return { columns: ['column_name'], rows: [{ column_name: 'id' }] };
    }
    if (sql.includes('missing_column')) {
      throw new Error('column "missing_column" does not exist');
    }
    if (sql.startsWith('SELECT * FROM "invoices"')) {
      return { columns: ['id', 'amount'], rows: [{ id: 1, amount: '9.50' }] };
    }
    return { columns: ['total'], rows: [{ total: '42.00' }] };
  },
  async end(): Promise<void> {}
};

/**
 * Answers by keyword in the question, the way a model would for these fixtures.
 */
const model: JsonChatModel = {
  async completeJson({ user }) {
    if (user.includes('wipe')) {
      return JSON.stringify({ sql: 'DROP TABLE invoices', explanation: 'Drops invoices', confidence: 0.2, tables_used: ['invoices'] });
    }
    if (user.includes('broken')) {
      return JSON.stringify({ sql: 'SELECT missing_column FROM invoices LIMIT 1', explanation: 'Bad column', confidence: 0.3, tables_used: ['invoices'] });
    }
    return JSON.stringify({
      sql: 'SELECT SUM(amount) AS total FROM invoices',
      explanation: 'Adds up every invoice amount',
      confidence: 0.92,
      tables_used: ['invoices']
    });
  }
};

async function startServer() {
  const service = new NlQueryService({
    schemaProvider: new InformationSchemaProvider(database),
    index: new SchemaIndex(),
    generationClient: new JsonModeGenerationClient(model)
  });
  await service.initialize();

  const app = createApp({
    service,
    corsOrigin: [],
    rateLimitWindowMs: 60_000,
    rateLimitMaxRequests: 100,
    defaultTopK: 5,
    sampleRowLimit: 5
  });
  const server = app.listen(0);
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address = server.address();
  const port = typeof address === 'object' && address ? address.port : 0;

  return {
    baseUrl: `http://127.0.0.1:${port}/api/nl-query`,
    stop: async () => {
      await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
      await service.close();
    }
  };
}

function post(url: string, body: unknown): Promise<Response> {
  return fetch(url, { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(body) });
}

test('nl-query HTTP flow', async (t) => {
  const { baseUrl, stop } = await startServer();
  t.after(stop);

  await t.test('ask returns generated SQL with its rows', async () => {
    const response = await post(`${baseUrl}/ask`, { question: 'total invoice amount' });
    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), {
      success: true,
      data: {
        success: true,
        sql: 'SELECT SUM(amount) AS total FROM invoices',
        explanation: 'Adds up every invoice amount',
        confidence: 0.92,
        tablesUsed: ['invoices'],
        warnings: [],
        columns: ['total'],
        rows: [{ total: '42.00' }],
        rowCount: 1
      }
    });
  });

  await t.test('ask refuses unsafe SQL with 422', async () => {
    const response = await post(`${baseUrl}/ask`, { question: 'wipe the invoices', mode: 'all' });
    assert.equal(response.status, 422);
    assert.deepEqual(await response.json(), {
      success: false,
      data: { success: false, error: 'Query contains unsafe operations', sql: 'DROP TABLE invoices', stage: 'validate' }
    });
  });

  await t.test('ask reports database errors with 502', async () => {
    const response = await post(`${baseUrl}/ask`, { question: 'broken report' });
    assert.equal(response.status, 502);
    assert.deepEqual(await response.json(), {
      success: false,
      data: {
        success: false,
        error: 'SQL execution error: column "missing_column" does not exist',
        sql: 'SELECT missing_column FROM invoices LIMIT 1',
        stage: 'execute'
      }
    });
  });

  await t.test('ask validates the request body', async () => {
    const response = await post(`${baseUrl}/ask`, { question: '' });
    assert.equal(response.status, 400);
    assert.deepEqual(await response.json(), {
      success: false,
      error: 'Invalid request',
      details: 'Question cannot be empty'
    });
  });

  await t.test('malformed JSON reaches the error middleware', async () => {
    const response = await fetch(`${baseUrl}/ask`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"question":'
    });
    assert.equal(response.status, 400);
    const body: unknown = await response.json();
    assert.ok(typeof body === 'object' && body !== null && 'success' in body);
    assert.equal(body.success, false);
  });

  await t.test('search ranks schemas', async () => {
    const response = await post(`${baseUrl}/search`, { query: 'amount' });
    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), {
      success: true,
      data: [
        {
          tableName: 'invoices',
          score: 1,
          schemaText: 'Table: invoices\nColumns:\n  id (integer, not null)\n  amount (numeric, not null)\nPrimary Key: id'
        }
      ]
    });
  });

  await t.test('schemas lists every table with its text', async () => {
    const response = await fetch(`${baseUrl}/schemas`);
    const body: unknown = await response.json();
    assert.equal(response.status, 200);
    assert.ok(typeof body === 'object' && body !== null && 'data' in body && Array.isArray(body.data));
    assert.deepEqual(
      body.data.map((item: { tableName: string }) => item.tableName),
      ['customers', 'invoices']
    );
  });

  await t.test('sample rows come from a known table only', async () => {
    const found = await fetch(`${baseUrl}/tables/invoices/sample?limit=2`);
    assert.equal(found.status, 200);
    assert.deepEqual(await found.json(), {
      success: true,
      data: { columns: ['id', 'amount'], rows: [{ id: 1, amount: '9.50' }], rowCount: 1 }
    });

    const missing = await fetch(`${baseUrl}/tables/nope/sample`);
    assert.equal(missing.status, 404);
  });

  await t.test('refresh re-reads the schemas', async () => {
    const response = await post(`${baseUrl}/refresh`, {});
    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), { success: true, data: { tables: 2 } });
  });

  await t.test('stats reflect the requests served', async () => {
    const response = await fetch(`${baseUrl}/stats`);
    const body: unknown = await response.json();
    assert.ok(typeof body === 'object' && body !== null && 'data' in body);
    assert.deepEqual(body.data, {
      requests: 3,
      hits: 0,
      misses: 3,
      cachedItems: 0,
      hitRate: 0,
      tables: 2,
      indexSize: 2,
      indexMode: 'text',
      generationMode: 'json'
    });
  });

  await t.test('unknown routes answer 404 through the error middleware', async () => {
    const response = await fetch(`${baseUrl}/unknown`);
    const body: unknown = await response.json();
    assert.equal(response.status, 404);
    assert.ok(typeof body === 'object' && body !== null && 'message' in body);
    assert.equal(body.message, 'Route GET /api/nl-query/unknown not found');
  });
});
