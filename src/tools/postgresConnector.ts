import pg from 'pg';
import type {
  ColumnInfo,
  ForeignKeyInfo,
  NamedColumns,
  ProfileCounts,
  ResultSet,
  TableConstraints,
} from '../types.js';
import { BaseConnector } from './connector.js';
import { ensureLimit } from '../agent/guard.js';
import { createLogger } from '../utils/logger.js';

const { Pool } = pg;
const log = createLogger('postgres');

export interface PostgresConnectorOptions {
  connectionString: string;
  schema?: string;
  statementTimeoutMs?: number;
  maxConnections?: number;
  name?: string;
}

function toIsoOrString(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Connector for the inspected PostgreSQL database.
 *
 * One pool per connector. Every query runs on a pooled client with the
 * configured statement timeout; rows come back in array mode so the
 * column order matches the SELECT list.
 */
export class PostgresConnector extends BaseConnector {
  readonly kind: string = 'postgres';
  protected readonly pool: pg.Pool;
  protected readonly schema: string;
  protected readonly statementTimeoutMs: number;

  constructor(options: PostgresConnectorOptions) {
    super(options.name ?? 'postgres', 'postgres');
    this.schema = options.schema ?? 'public';
    this.statementTimeoutMs = options.statementTimeoutMs ?? 30000;
    this.pool = new Pool({
      connectionString: options.connectionString,
      max: options.maxConnections ?? 5,
      idleTimeoutMillis: 30000,
    });
  }

  // --------------------------------------------------------------------------
  // Query execution
  // --------------------------------------------------------------------------

  /**
   * Runs the statement with the statement timeout applied on a pooled client.
   */
  protected async withClient<T>(fn: (client: pg.PoolClient) => Promise<T>): Promise<T> {
    this.checkClosed();
    const client = await this.pool.connect();
    try {
      if (this.statementTimeoutMs > 0) {
        await client.query(`SET statement_timeout = ${Math.floor(this.statementTimeoutMs)}`);
      }
      return await fn(client);
    } finally {
      client.release();
    }
  }

  protected async queryArray(client: pg.PoolClient, sql: string, params?: unknown[]): Promise<ResultSet> {
    const result = await client.query({ text: sql, values: params, rowMode: 'array' });
    const rows: unknown[][] = result.rows;
    return {
      columns: result.fields.map(f => f.name),
      rows,
    };
  }

  async runSql(sql: string, params?: unknown[], limit?: number): Promise<ResultSet> {
    const statement = limit !== undefined ? ensureLimit(sql, this.dialect, limit) : sql;
    return this.withClient(client => this.queryArray(client, statement, params));
  }

  // --------------------------------------------------------------------------
  // Introspection
  // --------------------------------------------------------------------------

  async listTables(schema?: string): Promise<string[]> {
    return this.withClient(async client => {
      const result = await client.query<{ table_name: string }>(
        `SELECT table_name
         FROM information_schema.tables
         WHERE table_schema = $1
           AND table_type IN ('BASE TABLE', 'VIEW')
         ORDER BY table_name`,
        [schema ?? this.schema]
      );
      return result.rows.map(row => row.table_name);
    });
  }

  async getColumns(table: string): Promise<ColumnInfo[]> {
    return this.withClient(async client => {
      const columns = await client.query<{
        column_name: string;
        data_type: string;
        is_nullable: string;
        column_default: string | null;
        is_identity: string;
      }>(
        `SELECT column_name, data_type, is_nullable, column_default, is_identity
         FROM information_schema.columns
         WHERE table_schema = $1 AND table_name = $2
         ORDER BY ordinal_position`,
        [this.schema, table]
      );

      const primaryKeys = new Set(await this.extractPrimaryKeyColumns(client, table));

      return columns.rows.map(row => ({
        name: row.column_name,
        type: row.data_type,
        nullable: row.is_nullable === 'YES',
        default: row.column_default,
        primaryKey: primaryKeys.has(row.column_name),
        autoincrement:
          row.is_identity === 'YES' ||
          (row.column_default !== null && row.column_default.startsWith('nextval(')),
      }));
    });
  }

  private async extractPrimaryKeyColumns(client: pg.PoolClient, table: string): Promise<string[]> {
    const result = await client.query<{ attname: string }>(
      `SELECT a.attname
       FROM pg_index i
       JOIN pg_class c ON c.oid = i.indrelid
       JOIN pg_namespace n ON n.oid = c.relnamespace
       JOIN pg_attribute a ON a.attrelid = c.oid AND a.attnum = ANY(i.indkey)
       WHERE n.nspname = $1
         AND c.relname = $2
         AND i.indisprimary = true
       ORDER BY array_position(i.indkey, a.attnum)`,
      [this.schema, table]
    );
    return result.rows.map(row => row.attname);
  }

  async getConstraints(table: string): Promise<TableConstraints> {
    return this.withClient(async client => {
      const result = await client.query<{
        conname: string;
        contype: string;
        columns: string[] | null;
        foreign_table: string | null;
        foreign_columns: string[] | null;
        definition: string;
      }>(
        `SELECT
           con.conname,
           con.contype,
           ARRAY(
             SELECT a.attname FROM unnest(con.conkey) WITH ORDINALITY k(attnum, ord)
             JOIN pg_attribute a ON a.attrelid = con.conrelid AND a.attnum = k.attnum
             ORDER BY k.ord
           ) AS columns,
           ref.relname AS foreign_table,
           ARRAY(
             SELECT a.attname FROM unnest(con.confkey) WITH ORDINALITY k(attnum, ord)
             JOIN pg_attribute a ON a.attrelid = con.confrelid AND a.attnum = k.attnum
             ORDER BY k.ord
           ) AS foreign_columns,
           pg_get_constraintdef(con.oid) AS definition
         FROM pg_constraint con
         JOIN pg_class c ON c.oid = con.conrelid
         JOIN pg_namespace n ON n.oid = c.relnamespace
         LEFT JOIN pg_class ref ON ref.oid = con.confrelid
         WHERE n.nspname = $1 AND c.relname = $2
         ORDER BY con.conname`,
        [this.schema, table]
      );

      let primaryKey: NamedColumns | null = null;
      const foreignKeys: ForeignKeyInfo[] = [];
      const uniqueConstraints: NamedColumns[] = [];
      const checkConstraints: TableConstraints['checkConstraints'] = [];

      for (const row of result.rows) {
        const columns = row.columns ?? [];
        switch (row.contype) {
          case 'p':
            primaryKey = { name: row.conname, columns };
            break;
          case 'f':
            foreignKeys.push({
              name: row.conname,
              columns,
              referredTable: row.foreign_table ?? '',
              referredColumns: row.foreign_columns ?? [],
            });
            break;
          case 'u':
            uniqueConstraints.push({ name: row.conname, columns });
            break;
          case 'c':
            checkConstraints.push({ name: row.conname, expression: row.definition });
            break;
        }
      }

      return { primaryKey, foreignKeys, uniqueConstraints, checkConstraints };
    });
  }

  async profileCounts(table: string, tsColumn?: string): Promise<ProfileCounts> {
    return this.withClient(async client => {
      const qualified = `${this.quoteIdent(this.schema)}.${this.quoteIdent(table)}`;
      const count = await client.query<{ total_rows: string }>(
        `SELECT COUNT(*) AS total_rows FROM ${qualified}`
      );
      const totalRows = Number(count.rows[0]?.total_rows ?? 0);

      const profile: ProfileCounts = {
        totalRows,
        minDate: null,
        maxDate: null,
        dateColumn: null,
      };

      if (tsColumn && totalRows > 0) {
        const column = this.quoteIdent(tsColumn);
        const range = await client.query<{ min_date: unknown; max_date: unknown }>(
          `SELECT MIN(${column}) AS min_date, MAX(${column}) AS max_date
           FROM ${qualified}
           WHERE ${column} IS NOT NULL`
        );
        const row = range.rows[0];
        if (row && row.min_date !== null) {
          profile.minDate = toIsoOrString(row.min_date);
          profile.maxDate = toIsoOrString(row.max_date);
          profile.dateColumn = tsColumn;
        }
      }

      log.debug('Profiled table', { table, totalRows, dateColumn: profile.dateColumn });
      return profile;
    });
  }

  async close(): Promise<void> {
    if (this.isClosed) return;
    await super.close();
    await this.pool.end();
  }
}
