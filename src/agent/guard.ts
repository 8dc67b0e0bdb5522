import type { Dialect } from '../types.js';
import { getDialectCapabilities } from './dialects.js';

/**
 * Result of SQL validation. When valid, `sql` is the statement with
 * surrounding whitespace and trailing semicolons removed.
 */
export type ValidationResult =
  | { valid: true; sql: string }
  | { valid: false; reason: string };

const DANGEROUS_KEYWORDS = [
  'INSERT', 'UPDATE', 'DELETE', 'MERGE', 'DROP', 'CREATE', 'ALTER',
  'TRUNCATE', 'GRANT', 'REVOKE', 'EXEC', 'EXECUTE', 'CALL', 'COPY',
];

function stripTrailingSemicolons(sql: string): string {
  return sql.trim().replace(/(\s*;)+$/, '').trimEnd();
}

/**
 * Validates that a statement is a single read-only query.
 *
 * Safety checks performed:
 * - Rejects data-changing and DDL keywords (DROP, DELETE, INSERT, UPDATE, etc.)
 * - Only allows statements starting with SELECT or WITH
 * - Blocks queries with "undefined" table names (common model error)
 * - Prevents multiple statement execution
 *
 * @example
 * ```typescript
 * const result = validateSQL('SELECT id FROM users;');
 * if (result.valid) {
 *   console.log(result.sql); // "SELECT id FROM users"
 * }
 * ```
 */
export function validateSQL(sql: string): ValidationResult {
  const trimmed = sql.trim();

  if (!trimmed) {
    return { valid: false, reason: 'Empty SQL statement' };
  }

  for (const keyword of DANGEROUS_KEYWORDS) {
    const regex = new RegExp(`\\b${keyword}\\b`, 'i');
    if (regex.test(trimmed)) {
      return { valid: false, reason: `Dangerous keyword detected: ${keyword}` };
    }
  }

  if (!/^(\(\s*)*(SELECT|WITH)\b/i.test(trimmed)) {
    return { valid: false, reason: 'Only SELECT or WITH ... SELECT statements are allowed' };
  }

  if (/\b(FROM|JOIN)\s+["'`]?undefined["'`]?/i.test(trimmed)) {
    return { valid: false, reason: 'SQL contains "undefined" as a table name' };
  }

  const statements = trimmed.split(';').filter(s => s.trim().length > 0);
  if (statements.length > 1) {
    return { valid: false, reason: 'Multiple statements are not allowed' };
  }

  return { valid: true, sql: stripTrailingSemicolons(trimmed) };
}

/**
 * Ensures a row cap is present in the statement.
 *
 * Statements already containing LIMIT or TOP are returned unchanged. For
 * prefix-limit dialects (mssql) `TOP n` goes right after the leading SELECT
 * (after DISTINCT when present); statements that do not start with SELECT
 * are left alone. Everything else gets ` LIMIT n` appended after trailing
 * semicolons are dropped.
 */
export function ensureLimit(sql: string, dialect: Dialect | string, rowCap: number): string {
  if (/\b(LIMIT|TOP)\b/i.test(sql)) {
    return sql;
  }

  const caps = getDialectCapabilities(dialect);
  const trimmed = sql.trim();

  if (caps.limitPosition === 'prefix') {
    const match = /^SELECT(\s+DISTINCT)?\b/i.exec(trimmed);
    if (!match) {
      return sql;
    }
    return `${match[0]} TOP ${rowCap}${trimmed.slice(match[0].length)}`;
  }

  const body = stripTrailingSemicolons(trimmed);
  const lines = body.split('\n');
  const lastLine = lines[lines.length - 1] ?? '';
  // a trailing line comment would swallow the clause
  const separator = lastLine.includes('--') ? '\n' : ' ';
  return `${body}${separator}LIMIT ${rowCap}`;
}
