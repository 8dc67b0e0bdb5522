import type { AnalysisState, RunResult } from '../types.js';
import { getLastSuccessfulEntry } from './state.js';

/**
 * Caller-facing view of a finished run.
 */
export function toRunResult(state: AnalysisState): RunResult {
  const finalEntry = getLastSuccessfulEntry(state);
  return {
    jobId: state.jobId,
    question: state.spec.question,
    answer: state.answer ?? '',
    tables: state.artifacts.filter(a => a.kind === 'table'),
    charts: state.artifacts.filter(a => a.kind === 'chart'),
    sql: finalEntry ? finalEntry.sql : null,
    quality: state.quality,
    lineage: state.history.map(entry => ({
      stage: entry.stage,
      sql: entry.sql,
      ok: entry.ok,
      rowCount: entry.rowCount,
      timestamp: entry.timestamp,
    })),
    executionSteps: [...state.executionSteps],
    budgetRemaining: { ...state.budgetRemaining },
    attempts: state.attempt,
    termination: state.termination,
    createdAt: state.createdAt,
    completedAt: state.completedAt,
  };
}
