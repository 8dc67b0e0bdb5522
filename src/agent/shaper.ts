import type { ResultSet, ResultSummary, ShapedResult } from '../types.js';

export const PREVIEW_ROWS = 10;

function describeValue(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return 'timestamp';
  if (Buffer.isBuffer(value)) return 'binary';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'number':
      return Number.isInteger(value) ? 'integer' : 'float';
    case 'bigint':
      return 'integer';
    case 'boolean':
      return 'boolean';
    case 'string':
      return 'string';
    default:
      return 'object';
  }
}

/**
 * Infers one type descriptor per column from its non-null values. Mixed
 * integer/float columns widen to float; other mixes become `mixed`.
 */
export function inferColumnTypes(result: ResultSet): Record<string, string> {
  const types: Record<string, string> = {};

  result.columns.forEach((column, index) => {
    const seen = new Set<string>();
    for (const row of result.rows) {
      const kind = describeValue(row[index]);
      if (kind) seen.add(kind);
    }

    if (seen.size === 0) {
      types[column] = 'null';
    } else if (seen.size === 1) {
      types[column] = [...seen][0];
    } else if (seen.size === 2 && seen.has('integer') && seen.has('float')) {
      types[column] = 'float';
    } else {
      types[column] = 'mixed';
    }
  });

  return types;
}

export function toRecords(result: ResultSet, limit?: number): Array<Record<string, unknown>> {
  const rows = limit === undefined ? result.rows : result.rows.slice(0, limit);
  return rows.map(row => {
    const record: Record<string, unknown> = {};
    result.columns.forEach((column, index) => {
      record[column] = row[index] ?? null;
    });
    return record;
  });
}

export function summarize(result: ResultSet): ResultSummary {
  return {
    rows: result.rows.length,
    columns: result.columns.length,
    columnNames: [...result.columns],
    columnTypes: inferColumnTypes(result),
  };
}

/**
 * Reduces a result set to its summary and a bounded preview.
 */
export function shapeResult(result: ResultSet, previewRows: number = PREVIEW_ROWS): ShapedResult {
  return {
    summary: summarize(result),
    preview: toRecords(result, previewRows),
  };
}

/**
 * Renders up to `limit` rows as an aligned text table for prompts.
 */
export function renderRows(result: ResultSet, limit: number): string {
  const rows = result.rows.slice(0, limit).map(row =>
    result.columns.map((_, index) => formatCell(row[index]))
  );
  const widths = result.columns.map((column, index) =>
    Math.max(column.length, ...rows.map(r => r[index].length))
  );
  const header = result.columns.map((c, i) => c.padEnd(widths[i])).join(' | ');
  const body = rows.map(r => r.map((cell, i) => cell.padEnd(widths[i])).join(' | '));
  return [header, ...body].join('\n');
}

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return 'NULL';
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}
