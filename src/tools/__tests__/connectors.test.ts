import { describe, it, expect, vi, beforeEach } from 'vitest';
import { UnsecuredJWT } from 'jose';
import { PostgresConnector } from '../postgresConnector.js';
import { SupabaseConnector } from '../supabaseConnector.js';
import { listAvailableConnectors, makeConnector, registerConnector } from '../registry.js';
import { FakeConnector, ORDERS } from '../../agent/__tests__/helpers.js';

const pgMock = vi.hoisted(() => {
  interface Reply {
    rows: unknown[];
    fields: Array<{ name: string }>;
  }
  interface Issued {
    text: string;
    values: unknown[] | undefined;
    rowMode: string | undefined;
  }

  interface MockState {
    issued: Issued[];
    reply: (text: string) => Reply;
    poolOptions: unknown[];
    ended: number;
    released: number;
  }

  const state: MockState = {
    issued: [],
    reply: () => ({ rows: [], fields: [] }),
    poolOptions: [],
    ended: 0,
    released: 0,
  };

  function readText(query: unknown): Issued {
    if (typeof query === 'string') return { text: query, values: undefined, rowMode: undefined };
    if (typeof query === 'object' && query !== null) {
      const text = Reflect.get(query, 'text');
      const values = Reflect.get(query, 'values');
      const rowMode = Reflect.get(query, 'rowMode');
      return {
        text: typeof text === 'string' ? text : '',
        values: Array.isArray(values) ? values : undefined,
        rowMode: typeof rowMode === 'string' ? rowMode : undefined,
      };
    }
    return { text: '', values: undefined, rowMode: undefined };
  }

  class FakeClient {
    async query(query: unknown, values?: unknown[]): Promise<Reply> {
      const issued = readText(query);
      if (values) issued.values = values;
      state.issued.push(issued);
      return state.reply(issued.text);
    }

    release(): void {
      state.released += 1;
    }
  }

  class FakePool {
    constructor(options: unknown) {
      state.poolOptions.push(options);
    }

    async connect(): Promise<FakeClient> {
      return new FakeClient();
    }

    async end(): Promise<void> {
      state.ended += 1;
    }
  }

  return { state, FakePool };
});

vi.mock('pg', () => ({ default: { Pool: pgMock.FakePool } }));

const { state } = pgMock;

function texts(): string[] {
  return state.issued.map(q => q.text.replace(/\s+/g, ' ').trim());
}

beforeEach(() => {
  state.issued = [];
  state.poolOptions = [];
  state.ended = 0;
  state.released = 0;
  state.reply = () => ({ rows: [], fields: [] });
});

describe('BaseConnector', () => {
  it('quotes identifiers per dialect', () => {
    expect(new FakeConnector(ORDERS, undefined, 'postgres').quoteIdent('my"table')).toBe('"my""table"');
    expect(new FakeConnector(ORDERS, undefined, 'mysql').quoteIdent('my`table')).toBe('`my``table`');
    expect(new FakeConnector(ORDERS, undefined, 'bigquery').quoteIdent('events')).toBe('`events`');
    expect(new FakeConnector(ORDERS, undefined, 'mssql').quoteIdent('my]table')).toBe('[my]]table]');
  });

  it('renders the limit clause per dialect', () => {
    expect(new FakeConnector(ORDERS, undefined, 'duckdb').limitClause(5)).toBe('LIMIT 5');
    expect(new FakeConnector(ORDERS, undefined, 'mssql').limitClause(5)).toBe('TOP 5');
  });
});

describe('PostgresConnector', () => {
  it('applies the statement timeout and returns array rows', async () => {
    state.reply = text =>
      text.startsWith('SELECT id')
        ? { rows: [[1], [2]], fields: [{ name: 'id' }] }
        : { rows: [], fields: [] };
    const connector = new PostgresConnector({ connectionString: 'postgres://localhost/test', statementTimeoutMs: 5000 });

    const result = await connector.runSql('SELECT id FROM orders', undefined, 25);

    expect(result).toEqual({ columns: ['id'], rows: [[1], [2]] });
    expect(texts()).toEqual(['SET statement_timeout = 5000', 'SELECT id FROM orders LIMIT 25']);
    expect(state.issued[1].rowMode).toBe('array');
    expect(state.released).toBe(1);
    expect(state.poolOptions).toEqual([
      { connectionString: 'postgres://localhost/test', max: 5, idleTimeoutMillis: 30000 },
    ]);
  });

  it('reads columns with primary keys and identity', async () => {
    state.reply = text => {
      if (text.includes('information_schema.columns')) {
        return {
          rows: [
            { column_name: 'id', data_type: 'integer', is_nullable: 'NO', column_default: "nextval('orders_id_seq'::regclass)", is_identity: 'NO' },
            { column_name: 'total', data_type: 'numeric', is_nullable: 'YES', column_default: null, is_identity: 'NO' },
          ],
          fields: [],
        };
      }
      if (text.includes('pg_index')) return { rows: [{ attname: 'id' }], fields: [] };
      return { rows: [], fields: [] };
    };
    const connector = new PostgresConnector({ connectionString: 'postgres://localhost/test', schema: 'sales' });

    const columns = await connector.getColumns('orders');

    expect(columns).toEqual([
      {
        name: 'id',
        type: 'integer',
        nullable: false,
        default: "nextval('orders_id_seq'::regclass)",
        primaryKey: true,
        autoincrement: true,
      },
      { name: 'total', type: 'numeric', nullable: true, default: null, primaryKey: false, autoincrement: false },
    ]);
    expect(state.issued[1].values).toEqual(['sales', 'orders']);
  });

  it('groups constraints by type', async () => {
    state.reply = text =>
      text.includes('pg_constraint')
        ? {
            rows: [
              { conname: 'orders_pkey', contype: 'p', columns: ['id'], foreign_table: null, foreign_columns: [], definition: 'PRIMARY KEY (id)' },
              { conname: 'orders_customer_fk', contype: 'f', columns: ['customer_id'], foreign_table: 'customers', foreign_columns: ['id'], definition: 'FOREIGN KEY' },
              { conname: 'orders_ref_key', contype: 'u', columns: ['ref'], foreign_table: null, foreign_columns: [], definition: 'UNIQUE (ref)' },
              { conname: 'orders_total_check', contype: 'c', columns: ['total'], foreign_table: null, foreign_columns: [], definition: 'CHECK ((total >= 0))' },
            ],
            fields: [],
          }
        : { rows: [], fields: [] };
    const connector = new PostgresConnector({ connectionString: 'postgres://localhost/test' });

    expect(await connector.getConstraints('orders')).toEqual({
      primaryKey: { name: 'orders_pkey', columns: ['id'] },
      foreignKeys: [
        { name: 'orders_customer_fk', columns: ['customer_id'], referredTable: 'customers', referredColumns: ['id'] },
      ],
      uniqueConstraints: [{ name: 'orders_ref_key', columns: ['ref'] }],
      checkConstraints: [{ name: 'orders_total_check', expression: 'CHECK ((total >= 0))' }],
    });
  });

  it('profiles row counts and the date range', async () => {
    state.reply = text => {
      if (text.startsWith('SELECT COUNT(*)')) return { rows: [{ total_rows: '12' }], fields: [] };
      if (text.startsWith('SELECT MIN(')) {
        return {
          rows: [{ min_date: new Date('2024-01-01T00:00:00.000Z'), max_date: new Date('2024-03-01T00:00:00.000Z') }],
          fields: [],
        };
      }
      return { rows: [], fields: [] };
    };
    const connector = new PostgresConnector({ connectionString: 'postgres://localhost/test' });

    const profile = await connector.profileCounts('orders', 'created_at');

    expect(profile).toEqual({
      totalRows: 12,
      minDate: '2024-01-01T00:00:00.000Z',
      maxDate: '2024-03-01T00:00:00.000Z',
      dateColumn: 'created_at',
    });
    expect(texts()[1]).toBe('SELECT COUNT(*) AS total_rows FROM "public"."orders"');
  });

  it('refuses work after close', async () => {
    const connector = new PostgresConnector({ connectionString: 'postgres://localhost/test' });
    await connector.close();
    await connector.close();

    expect(state.ended).toBe(1);
    await expect(connector.runSql('SELECT 1')).rejects.toThrow('Connector postgres is closed');
  });
});

describe('SupabaseConnector', () => {
  const accessToken = new UnsecuredJWT({ sub: 'user-1', role: 'authenticated' }).encode();
  const rls = { accessToken, refreshToken: null, autoRefresh: false };

  it('runs the statement inside an RLS transaction', async () => {
    state.reply = text =>
      text.startsWith('SELECT id') ? { rows: [[7]], fields: [{ name: 'id' }] } : { rows: [], fields: [] };
    const connector = new SupabaseConnector({ connectionString: 'postgres://localhost/test' });

    const result = await connector.runSqlWithRls('SELECT id FROM orders', 10, rls);

    expect(result).toEqual({ columns: ['id'], rows: [[7]] });
    expect(texts()).toEqual([
      'SET statement_timeout = 30000',
      'BEGIN',
      'SET LOCAL ROLE authenticated',
      "SELECT set_config('request.jwt.claims', $1, true)",
      "SELECT set_config('request.jwt.claim.sub', $1, true)",
      "SELECT set_config('request.jwt.claim.role', $1, true)",
      'SELECT id FROM orders LIMIT 10',
      'COMMIT',
    ]);
    expect(state.issued[3].values).toEqual([JSON.stringify({ sub: 'user-1', role: 'authenticated' })]);
    expect(state.issued[4].values).toEqual(['user-1']);
    expect(state.issued[5].values).toEqual(['authenticated']);
  });

  it('rolls back when the statement fails', async () => {
    state.reply = text => {
      if (text.startsWith('SELECT id')) throw new Error('permission denied for table orders');
      return { rows: [], fields: [] };
    };
    const connector = new SupabaseConnector({ connectionString: 'postgres://localhost/test' });

    await expect(connector.runSqlWithRls('SELECT id FROM orders', 10, rls)).rejects.toThrow(
      'permission denied for table orders'
    );
    expect(texts().slice(-1)).toEqual(['ROLLBACK']);
    expect(state.released).toBe(1);
  });

  it('keeps the statement error when the rollback also fails', async () => {
    state.reply = text => {
      if (text.startsWith('SELECT id')) throw new Error('permission denied for table orders');
      if (text === 'ROLLBACK') throw new Error('connection terminated');
      return { rows: [], fields: [] };
    };
    const connector = new SupabaseConnector({ connectionString: 'postgres://localhost/test' });

    await expect(connector.runSqlWithRls('SELECT id FROM orders', 10, rls)).rejects.toThrow(
      'permission denied for table orders'
    );
    expect(texts().slice(-1)).toEqual(['ROLLBACK']);
    expect(state.released).toBe(1);
  });

  it('uses empty claims for an undecodable token', async () => {
    const connector = new SupabaseConnector({ connectionString: 'postgres://localhost/test' });

    await connector.runSqlWithRls('SELECT 1', undefined, { ...rls, accessToken: 'garbage' });

    expect(state.issued[3].values).toEqual(['{}']);
    expect(state.issued[4].values).toEqual(['']);
  });
});

describe('registry', () => {
  it('lists the built-in kinds', () => {
    expect(listAvailableConnectors()).toEqual(expect.arrayContaining(['postgres', 'postgresql', 'supabase']));
  });

  it('builds connectors by kind, case-insensitively', () => {
    const connector = makeConnector('Supabase', { connectionString: 'postgres://localhost/test' });
    expect(connector).toBeInstanceOf(SupabaseConnector);
    expect(connector.kind).toBe('supabase');
    expect(connector.dialect).toBe('postgres');
  });

  it('accepts new kinds', () => {
    registerConnector('memory', () => new FakeConnector(ORDERS));
    expect(makeConnector('memory', { connectionString: '' }).kind).toBe('fake');
  });

  it('rejects unknown kinds', () => {
    expect(() => makeConnector('oracle', { connectionString: '' })).toThrow(/^Unknown connector kind: oracle\. Available: /);
  });
});
