import type { AnalysisState, ExecutionResult, ResultSet, RlsContext } from '../types.js';
import { ensureLimit, validateSQL } from './guard.js';
import { isTokenExpiring, type RlsTokenManager } from './rls.js';
import { addExecutionStep, consumeBudget, systemClock, type Clock } from './state.js';
import { ExecutionError, RlsRefreshError, errorCode, errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('executor');

export const MAX_ERROR_LENGTH = 2000;
export const DEFAULT_ROW_CAP = 100000;

export type ExecutionListener = (state: AnalysisState, result: ExecutionResult) => void;

export interface GatewayOptions {
  rowCap?: number;
  /** Reject anything but a single SELECT/WITH statement before it reaches the database. */
  readOnly?: boolean;
  tokenManager?: RlsTokenManager | null;
  clock?: Clock;
  onExecution?: ExecutionListener;
  /** Step label on the audit trail entry, e.g. "mvq" or "diagnose". */
  purpose?: string;
}

export function truncateError(message: string, max: number = MAX_ERROR_LENGTH): string {
  return message.length > max ? message.slice(0, max) : message;
}

/**
 * Refreshes the job's RLS token in place when it is close to expiring.
 */
async function ensureFreshToken(
  state: AnalysisState,
  rls: RlsContext,
  tokenManager: RlsTokenManager | null
): Promise<RlsContext> {
  if (!rls.autoRefresh) {
    return rls;
  }
  if (!tokenManager) {
    if (isTokenExpiring(rls.accessToken)) {
      throw new RlsRefreshError('Access token is expiring and no refresh endpoint is configured');
    }
    return rls;
  }

  const pair = await tokenManager.refreshTokenIfNeeded(rls.accessToken, rls.refreshToken);
  if (pair.accessToken === rls.accessToken) {
    return rls;
  }
  const refreshed: RlsContext = { ...rls, accessToken: pair.accessToken, refreshToken: pair.refreshToken };
  state.context.rls = refreshed;
  return refreshed;
}

async function run(
  state: AnalysisState,
  statement: string,
  rowCap: number,
  tokenManager: RlsTokenManager | null
): Promise<ResultSet> {
  const connector = state.context.connector;
  const rls = state.context.rls;

  if (rls && rls.accessToken) {
    const current = await ensureFreshToken(state, rls, tokenManager);
    if (connector.runSqlWithRls) {
      return connector.runSqlWithRls(statement, rowCap, current);
    }
  }
  return connector.runSql(statement, undefined, rowCap);
}

/**
 * Executes one statement on behalf of a step.
 *
 * Applies the row cap and read-only guard, keeps the RLS token fresh, runs
 * the statement, then charges one query plus the elapsed seconds to the
 * budget and records the attempt on the audit trail. Never throws: every
 * failure comes back as `{ ok: false }` and is appended to `state.errors`.
 */
export async function executeSql(
  state: AnalysisState,
  sql: string,
  options: GatewayOptions = {}
): Promise<ExecutionResult> {
  const clock = options.clock ?? systemClock;
  const rowCap = options.rowCap ?? DEFAULT_ROW_CAP;
  const startedAt = clock();

  const statement = ensureLimit(sql, state.context.connector.dialect, rowCap);

  let table: ResultSet | null = null;
  let failure: unknown = null;
  try {
    if (options.readOnly ?? true) {
      const verdict = validateSQL(statement);
      if (!verdict.valid) {
        throw new ExecutionError(statement, `Rejected by read-only guard: ${verdict.reason}`);
      }
    }
    table = await run(state, statement, rowCap, options.tokenManager ?? null);
  } catch (error) {
    failure = error;
  }

  const completedAt = clock();
  const durationMs = Math.max(0, completedAt.getTime() - startedAt.getTime());
  consumeBudget(state, 1, durationMs / 1000);

  let result: ExecutionResult;
  if (table) {
    result = {
      ok: true,
      table,
      rowCount: table.rows.length,
      columnCount: table.columns.length,
      durationMs,
      sql: statement,
    };
    log.debug('SQL executed', { rows: result.rowCount, durationMs });
  } else {
    const message = truncateError(errorMessage(failure));
    result = { ok: false, error: message, rowCount: 0, columnCount: 0, durationMs, sql: statement };
    state.errors.push({
      sql: statement,
      error: message,
      timestamp: completedAt.toISOString(),
      durationMs,
    });
    log.warn('SQL execution failed', { error: message.slice(0, 200) });
  }

  addExecutionStep(state, {
    step: 'sql_execution',
    status: result.ok ? 'completed' : 'failed',
    startedAt,
    completedAt,
    details: {
      purpose: options.purpose ?? null,
      sql: statement,
      rowCount: result.rowCount,
      durationMs,
    },
    error: result.ok ? null : result.error,
    errorCode: result.ok ? null : errorCode(failure) ?? 'EXECUTION',
  });

  if (options.onExecution) {
    try {
      options.onExecution(state, result);
    } catch (error) {
      log.warn('Execution listener failed', { error: errorMessage(error) });
    }
  }

  return result;
}
