import { describe, it, expect } from 'vitest';
import type { ColumnInfo } from '../../types.js';
import { buildSchemaCard, detectTimestampColumn } from '../schemaProfiler.js';
import { formatSchemaCard } from '../prompts.js';
import { ProfilingError } from '../../errors.js';
import { FakeConnector, ORDERS, column } from './helpers.js';

const TABLES = {
  ...ORDERS,
  regions: {
    columns: [column('code', 'text', { primaryKey: true, nullable: false }), column('name', 'text')],
    totalRows: 4,
  },
};

function regionRows() {
  return {
    columns: ['code', 'name'],
    rows: [
      ['EU', 'Europe'],
      ['NA', 'North America'],
      ['SA', 'South America'],
      ['AP', 'Asia Pacific'],
    ],
  };
}

describe('detectTimestampColumn', () => {
  it('prefers well-known names', () => {
    const columns = [column('paid_at', 'date'), column('created_at', 'timestamp with time zone')];
    expect(detectTimestampColumn(columns)).toBe('created_at');
  });

  it('falls back to the first temporal column', () => {
    const columns = [column('id', 'integer'), column('paid_at', 'date'), column('shipped', 'timestamptz')];
    expect(detectTimestampColumn(columns)).toBe('paid_at');
  });

  it('returns null without temporal columns', () => {
    expect(detectTimestampColumn([column('id', 'integer')])).toBeNull();
  });
});

describe('buildSchemaCard', () => {
  it('profiles every table and samples the small ones', async () => {
    const connector = new FakeConnector(TABLES, regionRows);
    const { card, selection } = await buildSchemaCard(connector, 'Orders by region', null);

    expect(selection.tables).toEqual(['orders', 'regions']);
    expect(card.totalTables).toBe(2);
    expect(card.tables.map(t => t.name)).toEqual(['orders', 'regions']);

    const [orders, regions] = card.tables;
    expect(orders.profile).toEqual({
      totalRows: 5000,
      minDate: '2024-01-01T00:00:00.000Z',
      maxDate: '2024-12-31T00:00:00.000Z',
      dateColumn: 'created_at',
    });
    expect(orders.sampleRows).toEqual([]);
    expect(orders.constraints).toBeNull();

    expect(connector.executed).toEqual([{ sql: 'SELECT * FROM "regions" LIMIT 5', limit: undefined }]);
    expect(regions.sampleRows).toEqual([
      { code: 'EU', name: 'Europe' },
      { code: 'NA', name: 'North America' },
      { code: 'SA', name: 'South America' },
    ]);
  });

  it('skips sampling on the fast profile', async () => {
    const connector = new FakeConnector(TABLES, regionRows);
    const { card } = await buildSchemaCard(connector, 'Orders by region', null, { validationProfile: 'fast' });

    expect(connector.executed).toEqual([]);
    expect(card.tables[1].sampleRows).toEqual([]);
  });

  it('loads constraints on the strict profile', async () => {
    const connector = new FakeConnector(TABLES, regionRows);
    const { card } = await buildSchemaCard(connector, 'Orders by region', null, { validationProfile: 'strict' });

    expect(card.tables[0].constraints).toEqual({
      primaryKey: null,
      foreignKeys: [],
      uniqueConstraints: [],
      checkConstraints: [],
    });
  });

  it('keeps a table that fails to profile with its error', async () => {
    class BrokenColumns extends FakeConnector {
      async getColumns(table: string): Promise<ColumnInfo[]> {
        if (table === 'regions') throw new Error('permission denied for table regions');
        return super.getColumns(table);
      }
    }
    const { card } = await buildSchemaCard(new BrokenColumns(TABLES, regionRows), 'Orders by region', null);

    expect(card.tables[0].error).toBeNull();
    expect(card.tables[1]).toMatchObject({ name: 'regions', columns: [], error: 'permission denied for table regions' });
  });

  it('raises a profiling error when tables cannot be listed', async () => {
    const connector = new FakeConnector(TABLES);
    await connector.close();

    const attempt = buildSchemaCard(connector, 'Orders by region', null);
    await expect(attempt).rejects.toBeInstanceOf(ProfilingError);
    await expect(attempt).rejects.toThrow('Could not list tables: Connector fake is closed');
  });

  it('renders for prompts', async () => {
    const connector = new FakeConnector(TABLES, regionRows);
    const { card } = await buildSchemaCard(connector, 'Orders by region', null, { maxCandidates: 1 });
    const text = formatSchemaCard(card);

    expect(text).toBe(
      [
        'Table: orders (5000 rows)',
        '  id integer NOT NULL PRIMARY KEY',
        '  status text NULL',
        '  created_at timestamp without time zone NULL',
        '  Date range (created_at): 2024-01-01T00:00:00.000Z to 2024-12-31T00:00:00.000Z',
        '',
        '(1 of 2 tables shown)',
      ].join('\n')
    );
  });

  it('renders a placeholder for an empty card', () => {
    expect(formatSchemaCard(null)).toBe('Schema information not available.');
  });
});
