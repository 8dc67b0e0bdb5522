import { z } from 'zod';
import type { Dialect } from '../types.js';
import { getDialectCapabilities } from './dialects.js';
import { parseJsonResponse, stripCodeFences, type Synthesizer } from './synthesizer.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('sql-writer');

export const HEALTH_CHECK_SQL = 'SELECT 1 AS health_check';
export const TABLE_COUNT_SQL = 'SELECT COUNT(*) AS table_count FROM information_schema.tables';
export const MAX_DIAGNOSTICS = 5;

const SqlResponseSchema = z.object({
  sql: z.string().trim().min(1),
  notes: z.string().optional(),
  what_changed: z.string().optional(),
});

const DiagnosticResponseSchema = z.object({
  diagnostic_sqls: z.array(z.string()),
  purpose: z.string().optional(),
});

/**
 * Where a statement came from: the model's JSON, lines scraped from an
 * unparsable response, or the health-check placeholder.
 */
export type SqlSource = 'model' | 'extracted' | 'placeholder';

export interface GeneratedSql {
  sql: string;
  notes: string;
  source: SqlSource;
}

export interface GeneratedDiagnostics {
  sqls: string[];
  purpose: string;
  source: SqlSource;
}

/**
 * Pulls a SELECT statement out of free text: from the first line mentioning
 * SELECT up to the first line ending in a semicolon.
 */
export function extractSelectStatement(text: string): string | null {
  const lines = stripCodeFences(text).split('\n');
  const collected: string[] = [];
  let inSql = false;

  for (const line of lines) {
    if (!inSql && /\bSELECT\b/i.test(line)) {
      inSql = true;
    }
    if (inSql) {
      collected.push(line);
      if (line.trim().endsWith(';')) break;
    }
  }

  const sql = collected.join('\n').trim();
  return sql.length > 0 ? sql : null;
}

function extractStatementLines(text: string): string[] {
  return stripCodeFences(text)
    .split('\n')
    .map(line => line.trim().replace(/^[-*\d.)\s]+(?=SELECT|WITH)/i, ''))
    .filter(line => /^(SELECT|WITH)\b/i.test(line));
}

export function fallbackDiagnostics(dialect: Dialect): string[] {
  const caps = getDialectCapabilities(dialect);
  return caps.hasInformationSchema ? [TABLE_COUNT_SQL, HEALTH_CHECK_SQL] : [HEALTH_CHECK_SQL];
}

/**
 * Turns prompts into SQL through the synthesis port. Never throws: bad or
 * missing output degrades to heuristic extraction, then to a placeholder.
 */
export class SQLWriter {
  constructor(private synthesizer: Synthesizer) {}

  async generateSql(prompt: string): Promise<GeneratedSql> {
    let text: string;
    try {
      text = await this.synthesizer.complete(prompt);
    } catch (error) {
      log.warn('SQL generation failed, using health check', { error: errorMessage(error) });
      return { sql: HEALTH_CHECK_SQL, notes: `Error generating SQL: ${errorMessage(error)}`, source: 'placeholder' };
    }

    const parsed = parseJsonResponse(text, SqlResponseSchema);
    if (parsed) {
      return {
        sql: parsed.sql,
        notes: parsed.notes ?? parsed.what_changed ?? '',
        source: 'model',
      };
    }

    const extracted = extractSelectStatement(text);
    if (extracted) {
      log.warn('Model response was not valid JSON, extracted SQL from text');
      return { sql: extracted, notes: 'Extracted from unstructured response', source: 'extracted' };
    }

    log.warn('No SQL found in model response, using health check');
    return { sql: HEALTH_CHECK_SQL, notes: 'Fallback query due to unparsable response', source: 'placeholder' };
  }

  async generateDiagnostics(prompt: string, dialect: Dialect): Promise<GeneratedDiagnostics> {
    let text: string;
    try {
      text = await this.synthesizer.complete(prompt);
    } catch (error) {
      log.warn('Diagnostic generation failed, using fallback queries', { error: errorMessage(error) });
      return { sqls: fallbackDiagnostics(dialect), purpose: 'Fallback diagnostics', source: 'placeholder' };
    }

    const parsed = parseJsonResponse(text, DiagnosticResponseSchema);
    if (parsed) {
      const sqls = parsed.diagnostic_sqls.map(s => s.trim()).filter(s => s.length > 0).slice(0, MAX_DIAGNOSTICS);
      if (sqls.length > 0) {
        return { sqls, purpose: parsed.purpose ?? '', source: 'model' };
      }
    } else {
      const lines = extractStatementLines(text).slice(0, MAX_DIAGNOSTICS);
      if (lines.length > 0) {
        return { sqls: lines, purpose: 'Extracted from unstructured response', source: 'extracted' };
      }
    }

    return { sqls: fallbackDiagnostics(dialect), purpose: 'Fallback diagnostics', source: 'placeholder' };
  }
}
