/**
 * Column metadata as reported by the schema provider.
 */
export interface ColumnSchema {
  name: string;
  type: string;
  nullable: boolean;
  default?: string | null;
}

/**
 * Structural snapshot of one table. Never mutated after it is produced.
 */
export interface TableSchema {
  tableName: string;
  columns: ColumnSchema[];
  primaryKey: string[];
}

/**
 * Table name -> schema, in provider listing order.
 */
export type SchemaMap = Map<string, TableSchema>;

/**
 * One index entry. The embedding vector lives in the index at the same position.
 */
export interface SchemaRecord {
  tableName: string;
  schema: TableSchema;
  schemaText: string;
}

/**
 * Ranked search hit.
 */
export interface SchemaSearchResult {
  record: SchemaRecord;
  score: number;
}

/**
 * 'vector' searches by embedding distance, 'text' by substring containment.
 */
export type IndexMode = 'vector' | 'text';

/**
 * Tabular result of an executed statement.
 */
export interface QueryResultSet {
  columns: string[];
  rows: Array<Record<string, unknown>>;
  rowCount: number;
}

/**
 * Supported database engines.
 */
export type DatabaseType = 'postgres' | 'mysql';
