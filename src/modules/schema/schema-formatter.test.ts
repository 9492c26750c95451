import test from 'node:test';
import assert from 'node:assert/strict';
import { formatSchemaText, formatSchemas } from './schema-formatter.js';
import type { TableSchema } from './types/schema.types.js';

const orders: TableSchema = {
  tableName: 'orders',
  columns: [
    { name: 'id', type: 'integer', nullable: false },
    { name: 'customer_id', type: 'integer', nullable: false },
    { name: 'note', type: 'text', nullable: true, default: null }
  ],
  primaryKey: ['id']
};

test('formatSchemaText lists columns in order with nullability and the primary key', () => {
  assert.equal(
    formatSchemaText(orders),
    [
      'Table: orders',
      'Columns:',
      '  id (integer, not null)',
      '  customer_id (integer, not null)',
      '  note (text, nullable)',
      'Primary Key: id'
    ].join('\n')
  );
});

test('formatSchemaText omits the primary key line when there is none', () => {
  const text = formatSchemaText({
    tableName: 'events',
    columns: [{ name: 'payload', type: 'jsonb', nullable: true }],
    primaryKey: []
  });

  assert.equal(text, 'Table: events\nColumns:\n  payload (jsonb, nullable)');
});

test('formatSchemaText joins composite keys with commas', () => {
  const text = formatSchemaText({
    tableName: 'order_items',
    columns: [
      { name: 'order_id', type: 'integer', nullable: false },
      { name: 'line_no', type: 'integer', nullable: false }
    ],
    primaryKey: ['order_id', 'line_no']
  });

  assert.equal(text.split('\n').at(-1), 'Primary Key: order_id, line_no');
});

test('formatSchemaText is deterministic', () => {
  assert.equal(formatSchemaText(orders), formatSchemaText({ ...orders }));
});

test('formatSchemas separates tables with a blank line', () => {
  const empty: TableSchema = { tableName: 'empty', columns: [], primaryKey: [] };
  assert.equal(formatSchemas([empty, empty]), 'Table: empty\nColumns:\n\nTable: empty\nColumns:');
});
