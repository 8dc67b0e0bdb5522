import type {
  ColumnInfo,
  Dialect,
  ProfileCounts,
  ResultSet,
  RlsContext,
  TableConstraints,
} from '../types.js';

/**
 * Data-source port consumed by the analysis core. One instance per
 * connection; `dialect` tags which SQL variant it speaks.
 */
export interface Connector {
  readonly name: string;
  readonly kind: string;
  readonly dialect: Dialect;

  listTables(schema?: string): Promise<string[]>;
  getColumns(table: string): Promise<ColumnInfo[]>;
  getConstraints(table: string): Promise<TableConstraints>;
  profileCounts(table: string, tsColumn?: string): Promise<ProfileCounts>;
  runSql(sql: string, params?: unknown[], limit?: number): Promise<ResultSet>;
  /** Optional. Executes with the caller's identity applied for row-level security. */
  runSqlWithRls?(sql: string, limit: number | undefined, rls: RlsContext): Promise<ResultSet>;
  quoteIdent(name: string): string;
  limitClause(n: number): string;
  close(): Promise<void>;
}

export function emptyConstraints(): TableConstraints {
  return {
    primaryKey: null,
    foreignKeys: [],
    uniqueConstraints: [],
    checkConstraints: [],
  };
}

/**
 * Shared dialect behavior for connectors. Subclasses supply the I/O.
 */
export abstract class BaseConnector implements Connector {
  abstract readonly kind: string;
  private closed = false;

  constructor(
    public readonly name: string,
    public readonly dialect: Dialect
  ) {}

  abstract listTables(schema?: string): Promise<string[]>;
  abstract getColumns(table: string): Promise<ColumnInfo[]>;
  abstract profileCounts(table: string, tsColumn?: string): Promise<ProfileCounts>;
  abstract runSql(sql: string, params?: unknown[], limit?: number): Promise<ResultSet>;

  async getConstraints(_table: string): Promise<TableConstraints> {
    this.checkClosed();
    return emptyConstraints();
  }

  quoteIdent(name: string): string {
    switch (this.dialect) {
      case 'mysql':
      case 'bigquery':
        return `\`${name.replace(/`/g, '``')}\``;
      case 'mssql':
        return `[${name.replace(/]/g, ']]')}]`;
      default:
        return `"${name.replace(/"/g, '""')}"`;
    }
  }

  limitClause(n: number): string {
    return this.dialect === 'mssql' ? `TOP ${n}` : `LIMIT ${n}`;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  protected checkClosed(): void {
    if (this.closed) {
      throw new Error(`Connector ${this.name} is closed`);
    }
  }
}
