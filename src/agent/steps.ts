import type {
  AnalysisState,
  DiagnosticResult,
  ExecutionResult,
  ResultSet,
  StepName,
  StepStatus,
} from '../types.js';
import type { Synthesizer } from './synthesizer.js';
import { executeSql, type GatewayOptions } from './executor.js';
import { buildSchemaCard, emptySchemaCard } from './schemaProfiler.js';
import { buildDiagnosticPrompt, buildRefinementPrompt, buildSqlPrompt } from './prompts.js';
import { assessQuality } from './quality.js';
import { shapeResult, toRecords } from './shaper.js';
import { HEALTH_CHECK_SQL, type SQLWriter, type GeneratedSql } from './sqlWriter.js';
import {
  addArtifact,
  appendHistory,
  getLastError,
  getLastSql,
  getLastSuccessfulEntry,
  hasBudget,
  type Clock,
} from './state.js';
import { BudgetExhaustedError, PlanningError, ProfilingError, errorMessage } from '../errors.js';

export const MAX_DIAGNOSTIC_QUERIES = 5;
export const DIAGNOSTIC_ROW_CAP = 100;
const DIAGNOSTIC_SAMPLE_ROWS = 3;

/**
 * Optional hook that inspects a successful result and flags it as
 * suspicious, sending the run through diagnose.
 */
export type AnomalyCheck = (result: ResultSet, state: AnalysisState) => boolean;

export interface StepDeps {
  writer: SQLWriter;
  /** Used for table selection; null means catalog order. */
  synthesizer: Synthesizer | null;
  gateway: GatewayOptions;
  schema?: string;
  maxCandidates?: number;
  timezone: string;
  clock: Clock;
  anomalyCheck?: AnomalyCheck;
}

export interface StepOutcome {
  status: StepStatus;
  details: Record<string, unknown>;
  error?: string;
}

export type StepHandler = (state: AnalysisState, deps: StepDeps) => Promise<StepOutcome>;

function describeProblem(state: AnalysisState): string {
  const rs = state.lastResult;
  if (rs && !rs.ok) return rs.error;
  if (rs && rs.ok && rs.rowCount === 0) return 'No data returned';
  if (rs && rs.ok) return 'Result was flagged as suspicious';
  return getLastError(state) ?? 'No data returned';
}

export function failedResult(sql: string, error: string): ExecutionResult {
  return { ok: false, error, rowCount: 0, columnCount: 0, durationMs: 0, sql };
}

/**
 * Runs generated SQL as a query attempt (mvq or refine) and records it. The
 * caller has already counted the attempt.
 */
async function attemptQuery(
  state: AnalysisState,
  deps: StepDeps,
  stage: 'mvq' | 'refine',
  generated: GeneratedSql
): Promise<StepOutcome> {
  const result = await executeSql(state, generated.sql, { ...deps.gateway, purpose: stage });
  state.lastResult = result;

  let flagWeird = generated.source === 'placeholder';
  if (result.ok && !flagWeird && deps.anomalyCheck) {
    flagWeird = deps.anomalyCheck(result.table, state);
  }

  appendHistory(state, {
    stage,
    sql: result.sql,
    notes: generated.notes,
    ok: result.ok,
    rowCount: result.rowCount,
    error: result.ok ? null : result.error,
    timestamp: deps.clock().toISOString(),
    flagWeird,
    score: null,
  });

  const details = {
    attempt: state.attempt,
    sql: result.sql,
    source: generated.source,
    ok: result.ok,
    rowCount: result.rowCount,
    flagWeird,
  };
  return result.ok
    ? { status: 'completed', details }
    : { status: 'failed', details, error: result.error };
}

function requireBudget(state: AnalysisState, stage: 'mvq' | 'refine'): void {
  if (!hasBudget(state)) {
    throw new BudgetExhaustedError(stage, state.budgetRemaining.queries, state.budgetRemaining.seconds);
  }
}

// ============================================================================
// Steps
// ============================================================================

const plan: StepHandler = async state => {
  const spec = state.spec;
  const issues = [...state.context.planningIssues];
  const connectorDialect = state.context.connector.dialect;
  if (connectorDialect !== spec.dialect) {
    issues.push(`Requested dialect ${spec.dialect} but the data source speaks ${connectorDialect}`);
  }

  const hints: string[] = [];
  if (spec.timeWindow) hints.push(`time window: ${spec.timeWindow}`);
  if (spec.grain) hints.push(`grain: ${spec.grain}`);
  for (const key of Object.keys(spec.filters)) hints.push(`filter: ${key}`);

  state.context.plan = {
    question: spec.question,
    dialect: spec.dialect,
    approach: 'direct_sql_generation',
    hints,
  };
  state.context.planningIssues = issues;

  if (issues.length > 0) {
    throw new PlanningError(issues);
  }
  return { status: 'completed', details: { approach: 'direct_sql_generation', hints } };
};

const profile: StepHandler = async (state, deps) => {
  const connector = state.context.connector;
  try {
    const { card, selection } = await buildSchemaCard(connector, state.spec.question || null, deps.synthesizer, {
      schema: deps.schema,
      maxCandidates: deps.maxCandidates,
      validationProfile: state.spec.validationProfile,
    });
    state.context.schemaCard = card;
    state.context.selectedTables = selection.tables;
    return {
      status: 'completed',
      details: {
        tables: selection.tables,
        totalTables: card.totalTables,
        selectionFallback: selection.usedFallback,
        selectionReason: selection.reason,
      },
    };
  } catch (error) {
    const message = errorMessage(error);
    state.context.schemaCard = emptySchemaCard(connector, message);
    state.context.selectedTables = [];
    throw error instanceof ProfilingError ? error : new ProfilingError(message, { cause: error });
  }
};

const mvq: StepHandler = async (state, deps) => {
  state.attempt += 1;
  requireBudget(state, 'mvq');
  const prompt = buildSqlPrompt(state.spec, state.context.schemaCard, deps.timezone);
  const generated = await deps.writer.generateSql(prompt);
  return attemptQuery(state, deps, 'mvq', generated);
};

const diagnose: StepHandler = async (state, deps) => {
  if (!hasBudget(state)) {
    return { status: 'skipped', details: { reason: 'budget exhausted' } };
  }

  const prompt = buildDiagnosticPrompt(
    state.spec,
    getLastSql(state) ?? '',
    describeProblem(state),
    state.context.schemaCard
  );
  const generated = await deps.writer.generateDiagnostics(prompt, state.spec.dialect);

  const results: DiagnosticResult[] = [];
  for (const sql of generated.sqls.slice(0, MAX_DIAGNOSTIC_QUERIES)) {
    if (!hasBudget(state)) break;
    const rs = await executeSql(state, sql, {
      ...deps.gateway,
      rowCap: Math.min(deps.gateway.rowCap ?? DIAGNOSTIC_ROW_CAP, DIAGNOSTIC_ROW_CAP),
      purpose: 'diagnose',
    });
    results.push(
      rs.ok
        ? {
            sql: rs.sql,
            ok: true,
            rowCount: rs.rowCount,
            columns: rs.table.columns,
            sampleRows: toRecords(rs.table, DIAGNOSTIC_SAMPLE_ROWS),
            error: null,
          }
        : { sql: rs.sql, ok: false, rowCount: 0, columns: [], sampleRows: [], error: rs.error }
    );
  }

  state.diagnostics = { purpose: generated.purpose, results };
  return {
    status: 'completed',
    details: {
      planned: generated.sqls.length,
      executed: results.length,
      succeeded: results.filter(r => r.ok).length,
      source: generated.source,
    },
  };
};

const refine: StepHandler = async (state, deps) => {
  state.attempt += 1;
  requireBudget(state, 'refine');
  const prompt = buildRefinementPrompt(
    state.spec,
    getLastSql(state) ?? '',
    describeProblem(state),
    state.diagnostics?.results ?? [],
    state.context.schemaCard
  );
  const generated = await deps.writer.generateSql(prompt);
  return attemptQuery(state, deps, 'refine', generated);
};

const transform: StepHandler = async state => {
  const rs = state.lastResult;
  if (!rs || !rs.ok || rs.rowCount === 0) {
    state.shaped = null;
    return { status: 'skipped', details: { reason: 'no successful result to shape' } };
  }
  state.shaped = shapeResult(rs.table);
  return {
    status: 'completed',
    details: { rows: state.shaped.summary.rows, columns: state.shaped.summary.columns },
  };
};

const produce: StepHandler = async (state, deps) => {
  const rs = state.lastResult;
  const shaped = state.shaped;
  if (!shaped || !rs || !rs.ok) {
    return { status: 'skipped', details: { reason: 'nothing to produce' } };
  }

  const ids: string[] = [];
  const table = addArtifact(
    state,
    {
      kind: 'table',
      title: 'Analysis Results',
      content: { columns: [...rs.table.columns], data: toRecords(rs.table), summary: shaped.summary },
    },
    deps.clock
  );
  ids.push(table.id);

  const entry = getLastSuccessfulEntry(state);
  if (entry) {
    const sql = addArtifact(
      state,
      {
        kind: 'sql',
        title: 'Final SQL Query',
        content: { sql: entry.sql, notes: entry.notes, rowCount: entry.rowCount },
      },
      deps.clock
    );
    ids.push(sql.id);
  }

  return { status: 'completed', details: { artifacts: ids } };
};

const validate: StepHandler = async state => {
  const report = assessQuality(state);
  return {
    status: 'completed',
    details: { score: report.score, passed: report.passed, plateau: report.plateau, notes: report.notes },
  };
};

/**
 * Answer text for the terminal step.
 */
export function composeAnswer(state: AnalysisState): string {
  const question = state.spec.question;
  const rs = state.lastResult;
  let answer: string;

  if (rs && rs.ok && rs.rowCount > 0) {
    answer =
      `Analysis completed successfully. Found ${rs.rowCount} rows of data with ${rs.columnCount} columns. ` +
      `The query returned relevant data for: ${question}`;
  } else if (rs && rs.ok) {
    answer = `Analysis could not be completed: the query returned no data. Question was: ${question}`;
  } else {
    const error = rs && !rs.ok ? rs.error : getLastError(state) ?? 'no query was executed';
    answer = `Analysis could not be completed: query failed: ${error}. Question was: ${question}`;
  }

  const latest = state.history[state.history.length - 1];
  if (latest && latest.ok && latest.flagWeird && latest.sql.startsWith(HEALTH_CHECK_SQL)) {
    answer += ' The data came from a placeholder health check because SQL generation failed.';
  }

  if (state.termination === 'cancelled') {
    answer += ' The run was cancelled before it finished.';
  } else if (state.termination === 'step_limit') {
    answer += ' The run stopped after reaching the step limit.';
  }
  return answer;
}

const present: StepHandler = async (state, deps) => {
  state.answer = composeAnswer(state);
  state.completedAt = deps.clock().toISOString();
  return {
    status: 'completed',
    details: { passed: state.quality?.passed ?? false, termination: state.termination },
  };
};

export const STEP_HANDLERS: Record<StepName, StepHandler> = {
  plan,
  profile,
  mvq,
  diagnose,
  refine,
  transform,
  produce,
  validate,
  present,
};
