import pg from 'pg';
import mysql, { type RowDataPacket } from 'mysql2/promise';
import type { DatabaseType } from '../modules/schema/types/schema.types.js';

const { Pool: PoolClass } = pg;

export interface SqlQueryResult {
  rows: Array<Record<string, unknown>>;
  columns: string[];
}

/**
 * Minimal driver surface shared by the pg and mysql2 pools.
 */
export interface SqlClient {
  readonly databaseType: DatabaseType;
  query(sql: string, params?: unknown[]): Promise<SqlQueryResult>;
  end(): Promise<void>;
}

export function detectDatabaseType(connectionString: string): DatabaseType {
  return connectionString.toLowerCase().startsWith('mysql') ? 'mysql' : 'postgres';
}

function createMysqlClient(connectionString: string): SqlClient {
  const mysqlPool = mysql.createPool(connectionString);

  return {
    databaseType: 'mysql',
    query: async (sql: string, params: unknown[] = []) => {
      const [result, fields] = await mysqlPool.query<RowDataPacket[]>(sql, params);
      return {
        rows: result.map((row) => ({ ...row })),
        columns: fields?.map((field) => field.name) ?? []
      };
    },
    end: () => mysqlPool.end()
  };
}

function createPostgresClient(connectionString: string): SqlClient {
  const pgPool = new PoolClass({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000
  });

  pgPool.on('error', (err) => {
    console.error(`[${new Date().toISOString()}] [POOL] PG pool error: ${err.message}`);
  });

  return {
    databaseType: 'postgres',
    query: async (sql: string, params: unknown[] = []) => {
      const result = await pgPool.query<Record<string, unknown>>(sql, params);
      return {
        rows: result.rows,
        columns: result.fields.map((field) => field.name)
      };
    },
    end: () => pgPool.end()
  };
}

/**
 * Open a pooled client for `connectionString`; `mysql://` URLs use mysql2, everything else pg.
 */
export function createSqlClient(connectionString: string): SqlClient {
  return detectDatabaseType(connectionString) === 'mysql'
    ? createMysqlClient(connectionString)
    : createPostgresClient(connectionString);
}
