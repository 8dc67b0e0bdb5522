import type { DiagnosticResult, QuerySpec, SchemaCard } from '../types.js';
import { formatCapabilityHints, getDialectCapabilities } from './dialects.js';
import { renderRows } from './shaper.js';

const SAMPLE_ROWS_IN_PROMPT = 3;
const MAX_DIAGNOSTICS_IN_PROMPT = 5;

/**
 * Renders the schema card as plain text for prompts.
 */
export function formatSchemaCard(card: SchemaCard | null): string {
  if (!card || card.tables.length === 0) {
    return 'Schema information not available.';
  }

  const lines: string[] = [];
  for (const table of card.tables) {
    const rowCount = table.profile.totalRows !== null ? ` (${table.profile.totalRows} rows)` : '';
    lines.push(`Table: ${table.name}${rowCount}`);

    for (const col of table.columns) {
      const nullable = col.nullable ? ' NULL' : ' NOT NULL';
      const pk = col.primaryKey ? ' PRIMARY KEY' : '';
      lines.push(`  ${col.name} ${col.type}${nullable}${pk}`);
    }

    if (table.profile.dateColumn && table.profile.minDate) {
      lines.push(`  Date range (${table.profile.dateColumn}): ${table.profile.minDate} to ${table.profile.maxDate ?? '?'}`);
    }

    if (table.constraints) {
      for (const fk of table.constraints.foreignKeys) {
        lines.push(`  FK (${fk.columns.join(', ')}) -> ${fk.referredTable}(${fk.referredColumns.join(', ')})`);
      }
    }

    if (table.sampleRows.length > 0) {
      lines.push('  Sample data:');
      for (const row of table.sampleRows.slice(0, SAMPLE_ROWS_IN_PROMPT)) {
        lines.push(`    ${JSON.stringify(row)}`);
      }
    }

    lines.push('');
  }

  if (card.totalTables > card.tables.length) {
    lines.push(`(${card.tables.length} of ${card.totalTables} tables shown)`);
  }

  return lines.join('\n').trimEnd();
}

function formatExamples(examples: string[]): string {
  if (examples.length === 0) return 'No examples available.';
  return examples.map((example, i) => `${i + 1}. ${example}`).join('\n');
}

function formatSpecHints(spec: Readonly<QuerySpec>): string {
  const hints: string[] = [];
  if (spec.timeWindow) hints.push(`- Time window: ${spec.timeWindow}`);
  if (spec.grain) hints.push(`- Aggregation grain: ${spec.grain}`);
  const filters = Object.entries(spec.filters);
  if (filters.length > 0) {
    hints.push(`- Filters: ${filters.map(([k, v]) => `${k} = ${JSON.stringify(v)}`).join(', ')}`);
  }
  return hints.length > 0 ? `\nCONSTRAINTS:\n${hints.join('\n')}\n` : '';
}

export function buildSqlPrompt(spec: Readonly<QuerySpec>, card: SchemaCard | null, timezone: string): string {
  const caps = getDialectCapabilities(spec.dialect);
  const name = spec.dialect.toUpperCase();

  return `You are a data analyst who writes only ${name} SQL. Do not use functions from other dialects.

QUESTION: ${spec.question}
${formatSpecHints(spec)}
DATABASE SCHEMA:
${formatSchemaCard(card)}

${name} CAPABILITIES:
${formatCapabilityHints(caps, timezone)}

EXAMPLES OF VALID ${name} SYNTAX:
${formatExamples(caps.examples)}

REQUIREMENTS:
- Write a single read-only ${name} query (SELECT or WITH ... SELECT)
- Use only tables and columns from the schema above
- Use appropriate functions for date/time operations
- Business timezone: ${timezone}
- Return results that directly answer the question

OUTPUT FORMAT:
Return a JSON object with exactly this structure:
{
  "sql": "<your SQL query here>",
  "notes": "<brief explanation of approach>"
}

Do not include any prose before or after the JSON.`;
}

export function buildDiagnosticPrompt(
  spec: Readonly<QuerySpec>,
  lastSql: string,
  error: string,
  card: SchemaCard | null
): string {
  const name = spec.dialect.toUpperCase();

  return `You are a data analyst debugging a ${name} SQL query that failed or returned no data.

ORIGINAL QUESTION: ${spec.question}

FAILED SQL:
${lastSql}

DATABASE ERROR:
${error}

DATABASE SCHEMA:
${formatSchemaCard(card)}

Generate 3-5 diagnostic ${name} queries to understand why the query failed:
- Check table existence and row counts
- Verify column names and data types
- Check for data availability in date ranges
- Examine distinct values in key columns
- Validate join conditions if applicable

OUTPUT FORMAT:
Return a JSON object:
{
  "diagnostic_sqls": [
    "SELECT COUNT(*) FROM table1",
    "SELECT DISTINCT status FROM orders",
    "SELECT MIN(created_at), MAX(created_at) FROM orders"
  ],
  "purpose": "Brief explanation of what these queries will reveal"
}

Write only valid read-only ${name} SQL in the diagnostic queries.`;
}

/**
 * Diagnostic results as text: row counts, up to three sample rows for each
 * successful query, and the error for each failed one.
 */
export function formatDiagnostics(results: DiagnosticResult[]): string {
  if (results.length === 0) {
    return 'No diagnostic results available.';
  }

  const blocks: string[] = [];
  results.slice(0, MAX_DIAGNOSTICS_IN_PROMPT).forEach((diag, i) => {
    if (diag.ok) {
      let block = `Diagnostic ${i + 1}: ${diag.sql}\n${diag.rowCount} rows found`;
      if (diag.sampleRows.length > 0) {
        const table = {
          columns: diag.columns,
          rows: diag.sampleRows.map(row => diag.columns.map(c => row[c])),
        };
        block += `\nSample data:\n${renderRows(table, SAMPLE_ROWS_IN_PROMPT)}`;
      }
      blocks.push(block);
    } else {
      blocks.push(`Diagnostic ${i + 1}: ${diag.sql}\nFAILED - ${diag.error ?? 'Unknown error'}`);
    }
  });
  return blocks.join('\n\n');
}

export function buildRefinementPrompt(
  spec: Readonly<QuerySpec>,
  failedSql: string,
  error: string,
  diagnostics: DiagnosticResult[],
  card: SchemaCard | null
): string {
  const name = spec.dialect.toUpperCase();

  return `You are a data analyst fixing a ${name} SQL query that failed or returned no data.

ORIGINAL QUESTION: ${spec.question}

FAILED SQL:
${failedSql}

DATABASE ERROR:
${error}

DIAGNOSTIC RESULTS:
${formatDiagnostics(diagnostics)}

DATABASE SCHEMA:
${formatSchemaCard(card)}

Based on the diagnostic information, produce a corrected ${name} SQL query that:
- Fixes the specific error that occurred
- Uses correct table/column names as revealed by diagnostics
- Handles the data types and formats found
- Answers the original question

OUTPUT FORMAT:
Return a JSON object:
{
  "sql": "<corrected SQL query>",
  "what_changed": "<brief explanation of what was fixed>"
}

Write only valid read-only ${name} SQL.`;
}

export function buildTableSelectionPrompt(question: string, catalog: string[], maxCandidates: number): string {
  return `You are selecting database tables relevant to an analytics question.

QUESTION: ${question}

AVAILABLE TABLES:
${catalog.join('\n')}

Pick at most ${maxCandidates} tables needed to answer the question, most relevant first.
Use table names exactly as listed above.

OUTPUT FORMAT:
Return a JSON object:
{
  "tables": ["table_a", "table_b"]
}`;
}
