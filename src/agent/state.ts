import { v4 as uuidv4 } from 'uuid';
import type {
  AnalysisContext,
  AnalysisState,
  Artifact,
  Budget,
  ExecutionStep,
  HistoryEntry,
  QuerySpec,
  StepName,
  StepStatus,
} from '../types.js';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

function freezeSpec(spec: QuerySpec): Readonly<QuerySpec> {
  return Object.freeze({
    ...spec,
    filters: Object.freeze({ ...spec.filters }),
    budget: Object.freeze({ ...spec.budget }),
  });
}

/**
 * Creates the state for one job. The query spec is copied and frozen; the budget
 * counters start from the query spec's budget.
 */
export function createInitialState(
  spec: QuerySpec,
  context: Omit<AnalysisContext, 'schemaCard' | 'selectedTables' | 'plan' | 'planningIssues'> &
    Partial<Pick<AnalysisContext, 'planningIssues'>>,
  options: { jobId?: string; clock?: Clock } = {}
): AnalysisState {
  const now = (options.clock ?? systemClock)().toISOString();
  return {
    jobId: options.jobId ?? uuidv4(),
    spec: freezeSpec(spec),
    context: {
      connector: context.connector,
      rls: context.rls,
      schemaCard: null,
      selectedTables: [],
      plan: null,
      planningIssues: context.planningIssues ?? [],
    },
    lastResult: null,
    history: [],
    diagnostics: null,
    errors: [],
    shaped: null,
    artifacts: [],
    quality: null,
    budgetRemaining: { queries: spec.budget.queries, seconds: spec.budget.seconds },
    attempt: 0,
    executionSteps: [],
    answer: null,
    termination: null,
    createdAt: now,
    updatedAt: now,
    completedAt: null,
  };
}

// ============================================================================
// Budget
// ============================================================================

/**
 * The one place budget is drawn down. Counters never go below zero.
 */
export function consumeBudget(state: AnalysisState, queries: number, seconds: number): void {
  state.budgetRemaining = {
    queries: Math.max(0, state.budgetRemaining.queries - queries),
    seconds: Math.max(0, state.budgetRemaining.seconds - seconds),
  };
}

export function hasBudget(state: AnalysisState): boolean {
  return state.budgetRemaining.queries > 0 && state.budgetRemaining.seconds > 0;
}

/** Iteration cap: one fifth of the query budget. */
export function maxAttempts(state: AnalysisState): number {
  return Math.floor(state.spec.budget.queries / 5);
}

function snapshot(budget: Budget): Budget {
  return { queries: budget.queries, seconds: budget.seconds };
}

// ============================================================================
// Trail
// ============================================================================

export interface StepRecord {
  step: StepName | 'sql_execution';
  status: StepStatus;
  startedAt: Date;
  completedAt: Date;
  details?: Record<string, unknown>;
  error?: string | null;
  errorCode?: string | null;
}

export function addExecutionStep(state: AnalysisState, record: StepRecord): ExecutionStep {
  const step: ExecutionStep = {
    step: record.step,
    status: record.status,
    startedAt: record.startedAt.toISOString(),
    completedAt: record.completedAt.toISOString(),
    durationMs: Math.max(0, record.completedAt.getTime() - record.startedAt.getTime()),
    details: record.details ?? {},
    error: record.error ?? null,
    errorCode: record.errorCode ?? null,
    budgetRemaining: snapshot(state.budgetRemaining),
  };
  state.executionSteps.push(step);
  state.updatedAt = step.completedAt;
  return step;
}

export function appendHistory(state: AnalysisState, entry: HistoryEntry): void {
  state.history.push(entry);
}

export function getLastSql(state: AnalysisState): string | null {
  for (let i = state.history.length - 1; i >= 0; i--) {
    const sql = state.history[i].sql;
    if (sql) return sql;
  }
  return null;
}

export function getLastSuccessfulEntry(state: AnalysisState): HistoryEntry | null {
  for (let i = state.history.length - 1; i >= 0; i--) {
    const entry = state.history[i];
    if (entry.ok && entry.sql) return entry;
  }
  return null;
}

export function getLastError(state: AnalysisState): string | null {
  const last = state.errors[state.errors.length - 1];
  return last ? last.error : null;
}

// ============================================================================
// Artifacts
// ============================================================================

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type ArtifactInput = DistributiveOmit<Artifact, 'id' | 'createdAt' | 'filePath' | 'meta'> & {
  filePath?: string | null;
  meta?: Record<string, unknown>;
};

export function addArtifact(state: AnalysisState, input: ArtifactInput, clock: Clock = systemClock): Artifact {
  const base = {
    id: `${input.kind}_${uuidv4().replace(/-/g, '').slice(0, 8)}`,
    createdAt: clock().toISOString(),
    filePath: input.filePath ?? null,
    meta: input.meta ?? {},
    title: input.title,
  };

  let artifact: Artifact;
  switch (input.kind) {
    case 'table':
      artifact = { ...base, kind: 'table', content: input.content };
      break;
    case 'sql':
      artifact = { ...base, kind: 'sql', content: input.content };
      break;
    default:
      artifact = { ...base, kind: input.kind, content: input.content };
  }

  state.artifacts.push(artifact);
  return artifact;
}
