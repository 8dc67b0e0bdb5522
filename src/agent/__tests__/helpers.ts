import type { ColumnInfo, Dialect, ProfileCounts, QuerySpec, ResultSet, RlsContext } from '../../types.js';
import { BaseConnector } from '../../tools/connector.js';
import type { Synthesizer } from '../synthesizer.js';
import type { Clock } from '../state.js';

export type SqlHandler = (sql: string) => ResultSet;

export interface FakeTable {
  columns: ColumnInfo[];
  totalRows: number;
}

export function column(name: string, type: string, extra: Partial<ColumnInfo> = {}): ColumnInfo {
  return {
    name,
    type,
    nullable: true,
    default: null,
    primaryKey: false,
    autoincrement: false,
    ...extra,
  };
}

/**
 * In-memory connector. Introspection comes from `tables`; every statement
 * goes through `handler`, which may throw to simulate a database error.
 */
export class FakeConnector extends BaseConnector {
  readonly kind = 'fake';
  readonly executed: Array<{ sql: string; limit?: number }> = [];
  readonly rlsExecuted: Array<{ sql: string; rls: RlsContext }> = [];

  constructor(
    private readonly tables: Record<string, FakeTable>,
    public handler: SqlHandler = () => ({ columns: ['value'], rows: [[1]] }),
    dialect: Dialect = 'postgres'
  ) {
    super('fake', dialect);
  }

  async listTables(): Promise<string[]> {
    this.checkClosed();
    return Object.keys(this.tables);
  }

  async getColumns(table: string): Promise<ColumnInfo[]> {
    const entry = this.tables[table];
    if (!entry) throw new Error(`relation "${table}" does not exist`);
    return entry.columns;
  }

  async profileCounts(table: string, tsColumn?: string): Promise<ProfileCounts> {
    const entry = this.tables[table];
    if (!entry) throw new Error(`relation "${table}" does not exist`);
    return {
      totalRows: entry.totalRows,
      minDate: tsColumn ? '2024-01-01T00:00:00.000Z' : null,
      maxDate: tsColumn ? '2024-12-31T00:00:00.000Z' : null,
      dateColumn: tsColumn ?? null,
    };
  }

  async runSql(sql: string, _params?: unknown[], limit?: number): Promise<ResultSet> {
    this.checkClosed();
    this.executed.push({ sql, limit });
    return this.handler(sql);
  }
}

/** Fake connector that also supports the RLS execution path. */
export class FakeRlsConnector extends FakeConnector {
  async runSqlWithRls(sql: string, _limit: number | undefined, rls: RlsContext): Promise<ResultSet> {
    this.rlsExecuted.push({ sql, rls });
    return this.handler(sql);
  }
}

export type Responder = (prompt: string) => string;

/**
 * Synthesizer driven by a function of the prompt. Throws when the responder
 * throws, like a failing model call.
 */
export class ScriptedSynthesizer implements Synthesizer {
  readonly prompts: string[] = [];

  constructor(private readonly responder: Responder) {}

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.responder(prompt);
  }
}

export type PromptKind = 'sql' | 'diagnose' | 'refine' | 'tables' | 'unknown';

export function promptKind(prompt: string): PromptKind {
  if (prompt.startsWith('You are a data analyst who writes only')) return 'sql';
  if (prompt.startsWith('You are a data analyst debugging')) return 'diagnose';
  if (prompt.startsWith('You are a data analyst fixing')) return 'refine';
  if (prompt.startsWith('You are selecting database tables')) return 'tables';
  return 'unknown';
}

export const START_MS = Date.parse('2024-06-01T00:00:00.000Z');

/** Clock that advances `stepMs` on every reading. */
export function steppingClock(stepMs = 10, startMs = START_MS): Clock {
  let now = startMs;
  return () => {
    const date = new Date(now);
    now += stepMs;
    return date;
  };
}

export function makeSpec(overrides: Partial<QuerySpec> = {}): QuerySpec {
  return {
    question: 'How many orders were placed?',
    dialect: 'postgres',
    timeWindow: null,
    grain: null,
    filters: {},
    budget: { queries: 10, seconds: 60 },
    validationProfile: 'balanced',
    ...overrides,
  };
}

export const ORDERS: Record<string, FakeTable> = {
  orders: {
    columns: [
      column('id', 'integer', { nullable: false, primaryKey: true, autoincrement: true }),
      column('status', 'text'),
      column('created_at', 'timestamp without time zone'),
    ],
    totalRows: 5000,
  },
};
