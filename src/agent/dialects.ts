import type { Dialect } from '../types.js';

/**
 * Per-dialect idioms handed to the model and used when post-processing
 * generated SQL. `timezone` carries a `{tz}` placeholder that is filled with
 * the business timezone when a prompt is built.
 */
export interface DialectCapabilities {
  limit: string;
  limitPosition: 'suffix' | 'prefix';
  dateTrunc: string;
  timezone: string | null;
  stringAgg: string;
  ilike: boolean;
  identifierQuote: '"' | '`' | '[';
  qualify: boolean;
  hasInformationSchema: boolean;
  examples: string[];
}

export const DIALECT_CAPABILITIES: Record<Dialect, DialectCapabilities> = {
  postgres: {
    limit: 'LIMIT n',
    limitPosition: 'suffix',
    dateTrunc: "DATE_TRUNC('month', ts_column)",
    timezone: "ts_column AT TIME ZONE '{tz}'",
    stringAgg: "STRING_AGG(column, ',')",
    ilike: true,
    identifierQuote: '"',
    qualify: false,
    hasInformationSchema: true,
    examples: [
      "SELECT DATE_TRUNC('month', created_at) AS month, COUNT(*) FROM orders GROUP BY 1",
      "SELECT id, email FROM users WHERE email ILIKE '%@example.com'",
      'WITH monthly_sales AS (SELECT ...) SELECT month, total FROM monthly_sales',
    ],
  },
  mysql: {
    limit: 'LIMIT n',
    limitPosition: 'suffix',
    dateTrunc: "DATE_FORMAT(ts_column, '%Y-%m-01')",
    timezone: "CONVERT_TZ(ts_column, '+00:00', '{tz}')",
    stringAgg: 'GROUP_CONCAT(column)',
    ilike: false,
    identifierQuote: '`',
    qualify: false,
    hasInformationSchema: true,
    examples: [
      "SELECT DATE_FORMAT(created_at, '%Y-%m-01') AS month, COUNT(*) FROM orders GROUP BY 1",
      "SELECT id, email FROM users WHERE LOWER(email) LIKE LOWER('%@example.com%')",
      'SELECT GROUP_CONCAT(name) FROM users',
    ],
  },
  sqlite: {
    limit: 'LIMIT n',
    limitPosition: 'suffix',
    dateTrunc: "strftime('%Y-%m-01', ts_column)",
    timezone: null,
    stringAgg: 'GROUP_CONCAT(column)',
    ilike: false,
    identifierQuote: '"',
    qualify: false,
    hasInformationSchema: false,
    examples: [
      "SELECT strftime('%Y-%m-01', created_at) AS month, COUNT(*) FROM orders GROUP BY 1",
      "SELECT id, email FROM users WHERE LOWER(email) LIKE LOWER('%@example.com%')",
      'SELECT GROUP_CONCAT(name) FROM users',
    ],
  },
  snowflake: {
    limit: 'LIMIT n',
    limitPosition: 'suffix',
    dateTrunc: "DATE_TRUNC('month', ts_column)",
    timezone: "CONVERT_TIMEZONE('{tz}', ts_column)",
    stringAgg: "LISTAGG(column, ',')",
    ilike: true,
    identifierQuote: '"',
    qualify: true,
    hasInformationSchema: true,
    examples: [
      "SELECT DATE_TRUNC('month', created_at) AS month, COUNT(*) FROM orders GROUP BY 1",
      "SELECT id, email FROM users WHERE email ILIKE '%@example.com'",
      'SELECT name, sales FROM products QUALIFY ROW_NUMBER() OVER (ORDER BY sales DESC) <= 10',
    ],
  },
  bigquery: {
    limit: 'LIMIT n',
    limitPosition: 'suffix',
    dateTrunc: 'TIMESTAMP_TRUNC(ts_column, MONTH)',
    timezone: "DATETIME(ts_column, '{tz}')",
    stringAgg: "STRING_AGG(column, ',')",
    ilike: false,
    identifierQuote: '`',
    qualify: true,
    hasInformationSchema: true,
    examples: [
      'SELECT TIMESTAMP_TRUNC(created_at, MONTH) AS month, COUNT(*) FROM `project.dataset.orders` GROUP BY 1',
      "SELECT id, email FROM `project.dataset.users` WHERE LOWER(email) LIKE LOWER('%@example.com%')",
      "SELECT STRING_AGG(name, ',') FROM `project.dataset.users`",
    ],
  },
  mssql: {
    limit: 'TOP n',
    limitPosition: 'prefix',
    dateTrunc: 'DATETRUNC(month, ts_column)',
    timezone: "ts_column AT TIME ZONE '{tz}'",
    stringAgg: "STRING_AGG(column, ',')",
    ilike: false,
    identifierQuote: '[',
    qualify: false,
    hasInformationSchema: true,
    examples: [
      'SELECT TOP 100 DATETRUNC(month, created_at) AS month, COUNT(*) FROM [orders] GROUP BY DATETRUNC(month, created_at)',
      "SELECT id, email FROM [users] WHERE LOWER(email) LIKE LOWER('%@example.com%')",
      "SELECT STRING_AGG(name, ',') FROM [users]",
    ],
  },
  duckdb: {
    limit: 'LIMIT n',
    limitPosition: 'suffix',
    dateTrunc: "DATE_TRUNC('month', ts_column)",
    timezone: "timezone('{tz}', ts_column)",
    stringAgg: "STRING_AGG(column, ',')",
    ilike: true,
    identifierQuote: '"',
    qualify: true,
    hasInformationSchema: true,
    examples: [
      "SELECT DATE_TRUNC('month', created_at) AS month, COUNT(*) FROM orders GROUP BY 1",
      "SELECT id, email FROM users WHERE email ILIKE '%@example.com'",
      "SELECT STRING_AGG(name, ',') FROM users",
    ],
  },
};

export const SUPPORTED_DIALECTS: Dialect[] = [
  'postgres',
  'mysql',
  'sqlite',
  'snowflake',
  'bigquery',
  'mssql',
  'duckdb',
];

export function isDialect(value: string): value is Dialect {
  return SUPPORTED_DIALECTS.some(d => d === value);
}

/**
 * Capabilities for a dialect name; anything unknown resolves to postgres.
 */
export function getDialectCapabilities(dialect: string): DialectCapabilities {
  return isDialect(dialect) ? DIALECT_CAPABILITIES[dialect] : DIALECT_CAPABILITIES.postgres;
}

/**
 * Bullet list of dialect hints for prompts.
 */
export function formatCapabilityHints(caps: DialectCapabilities, timezone: string): string {
  const hints: string[] = [];

  hints.push(`- Use \`${caps.limit}\` for limiting results`);
  hints.push(`- Use \`${caps.dateTrunc}\` for date grouping`);
  if (caps.timezone) {
    hints.push(`- Use \`${caps.timezone.replace('{tz}', timezone)}\` for timezone conversion`);
  }
  hints.push(`- Use \`${caps.stringAgg}\` for string aggregation`);
  if (caps.ilike) {
    hints.push('- Use `ILIKE` for case-insensitive text search');
  } else {
    hints.push('- Use `LOWER(col) LIKE LOWER(pattern)` for case-insensitive search');
  }
  if (caps.qualify) {
    hints.push('- Use the `QUALIFY` clause for window function filtering');
  }
  const quote = caps.identifierQuote === '[' ? '[name]' : `${caps.identifierQuote}name${caps.identifierQuote}`;
  hints.push(`- Quote table/column identifiers as ${quote} when needed`);

  return hints.join('\n');
}
