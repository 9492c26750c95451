import type { TableSchema } from './types/schema.types.js';

/**
 * Render a table schema as the canonical text block used for both embedding and prompting.
 */
export function formatSchemaText(schema: TableSchema): string {
  const lines = [`Table: ${schema.tableName}`, 'Columns:'];

  for (const column of schema.columns) {
    const nullability = column.nullable ? 'nullable' : 'not null';
    lines.push(`  ${column.name} (${column.type}, ${nullability})`);
  }

  if (schema.primaryKey.length) {
    lines.push(`Primary Key: ${schema.primaryKey.join(', ')}`);
  }

  return lines.join('\n');
}

export function formatSchemas(schemas: Iterable<TableSchema>): string {
  return Array.from(schemas, formatSchemaText).join('\n\n');
}
