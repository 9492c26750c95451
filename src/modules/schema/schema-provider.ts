import { z } from 'zod';
import { SchemaProviderError, getErrorMessage } from '../../core/errors.js';
import type { SqlClient } from '../../core/pool-manager.js';
import type { DatabaseType, QueryResultSet, SchemaMap, TableSchema } from './types/schema.types.js';

/**
 * Source of table metadata and the only place statements are executed.
 */
export interface SchemaProvider {
  readonly databaseType: DatabaseType;
  listTables(): Promise<string[]>;
  getTableSchema(tableName: string): Promise<TableSchema>;
  getAllSchemas(): Promise<SchemaMap>;
  /** Runs a statement that has already passed the safety gate. */
  executeQuery(sql: string): Promise<QueryResultSet>;
  getSampleRows(tableName: string, limit: number): Promise<QueryResultSet>;
  close(): Promise<void>;
}

/**
 * Vendor differences the provider delegates to.
 */
export interface SqlDialect {
  /** Positional parameter placeholder, 1-based. */
  placeholder(position: number): string;
  quoteIdentifier(name: string): string;
  currentSchemaExpression: string;
  limitRows(selectSql: string, limit: number): string;
}

export const DIALECTS: Record<DatabaseType, SqlDialect> = {
  postgres: {
    placeholder: (position) => `$${position}`,
    quoteIdentifier: (name) => `"${name.replace(/"/g, '""')}"`,
    currentSchemaExpression: 'current_schema()',
    limitRows: (selectSql, limit) => `${selectSql} LIMIT ${limit}`
  },
  mysql: {
    placeholder: () => '?',
    quoteIdentifier: (name) => `\`${name.replace(/`/g, '``')}\``,
    currentSchemaExpression: 'DATABASE()',
    limitRows: (selectSql, limit) => `${selectSql} LIMIT ${limit}`
  }
};

const MAX_SAMPLE_ROWS = 1000;

const tableRowSchema = z.object({ table_name: z.string() });

const columnRowSchema = z.object({
  column_name: z.string(),
  data_type: z.string(),
  is_nullable: z.union([z.string(), z.boolean()]),
  column_default: z.unknown().optional()
});

const keyRowSchema = z.object({ column_name: z.string() });

/**
 * Reads structure from information_schema. Works for PostgreSQL and MySQL.
 */
export class InformationSchemaProvider implements SchemaProvider {
  private readonly dialect: SqlDialect;

  constructor(private readonly client: SqlClient) {
    this.dialect = DIALECTS[client.databaseType];
  }

  get databaseType(): DatabaseType {
    return this.client.databaseType;
  }

  async listTables(): Promise<string[]> {
    const result = await this.lookup(
      `SELECT table_name AS table_name
       FROM information_schema.tables
       WHERE table_schema = ${this.dialect.currentSchemaExpression} AND table_type = 'BASE TABLE'
       ORDER BY table_name`,
      []
    );
    return result.rows.map((row) => tableRowSchema.parse(row).table_name);
  }

  async getTableSchema(tableName: string): Promise<TableSchema> {
    const p1 = this.dialect.placeholder(1);
    const columnResult = await this.lookup(
      `SELECT column_name AS column_name, data_type AS data_type, is_nullable AS is_nullable, column_default AS column_default
       FROM information_schema.columns
       WHERE table_schema = ${this.dialect.currentSchemaExpression} AND table_name = ${p1}
       ORDER BY ordinal_position`,
      [tableName]
    );
    const keyResult = await this.lookup(
      `SELECT kcu.column_name AS column_name
       FROM information_schema.table_constraints tc
       JOIN information_schema.key_column_usage kcu
         ON tc.constraint_name = kcu.constraint_name
        AND tc.table_schema = kcu.table_schema
        AND tc.table_name = kcu.table_name
       WHERE tc.constraint_type = 'PRIMARY KEY'
         AND tc.table_schema = ${this.dialect.currentSchemaExpression}
         AND tc.table_name = ${p1}
       ORDER BY kcu.ordinal_position`,
      [tableName]
    );

    const columns = columnResult.rows.map((raw) => {
      const row = columnRowSchema.parse(raw);
      return {
        name: row.column_name,
        type: row.data_type,
        nullable: row.is_nullable === true || row.is_nullable === 'YES',
        default: row.column_default === null || row.column_default === undefined ? null : String(row.column_default)
      };
    });
    const columnNames = new Set(columns.map((column) => column.name));
    const primaryKey = keyResult.rows
      .map((row) => keyRowSchema.parse(row).column_name)
      .filter((name) => columnNames.has(name));

    return { tableName, columns, primaryKey };
  }

  async getAllSchemas(): Promise<SchemaMap> {
    const schemas: SchemaMap = new Map();
    for (const tableName of await this.listTables()) {
      schemas.set(tableName, await this.getTableSchema(tableName));
    }
    return schemas;
  }

  async executeQuery(sql: string): Promise<QueryResultSet> {
    try {
      const result = await this.client.query(sql);
      return { columns: result.columns, rows: result.rows, rowCount: result.rows.length };
    } catch (error) {
      throw new SchemaProviderError(
        `SQL execution error: ${getErrorMessage(error, 'unknown driver error')}`,
        'QUERY_EXECUTION_FAILED',
        sql
      );
    }
  }

  async getSampleRows(tableName: string, limit: number): Promise<QueryResultSet> {
    const tables = await this.listTables();
    if (!tables.includes(tableName)) {
      throw new SchemaProviderError(`Table '${tableName}' does not exist`, 'TABLE_NOT_FOUND');
    }

    const boundedLimit = Math.min(Math.max(Math.floor(limit), 1), MAX_SAMPLE_ROWS);
    const sql = this.dialect.limitRows(`SELECT * FROM ${this.dialect.quoteIdentifier(tableName)}`, boundedLimit);
    return this.executeQuery(sql);
  }

  close(): Promise<void> {
    return this.client.end();
  }

  private async lookup(sql: string, params: unknown[]) {
    try {
      return await this.client.query(sql, params);
    } catch (error) {
      throw new SchemaProviderError(
        `Schema lookup failed: ${getErrorMessage(error, 'unknown driver error')}`,
        'SCHEMA_LOOKUP_FAILED'
      );
    }
  }
}
