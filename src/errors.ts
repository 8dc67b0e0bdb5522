/**
 * Error taxonomy for an analysis run.
 *
 * Every step catches these at its boundary; the orchestrator records the
 * `code` on the execution step and moves on to the next transition.
 */

export type AnalysisErrorCode =
  | 'PLANNING'
  | 'PROFILING'
  | 'EXECUTION'
  | 'SYNTHESIS'
  | 'BUDGET_EXHAUSTED'
  | 'RLS_REFRESH';

export class AnalysisError extends Error {
  constructor(
    public readonly code: AnalysisErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AnalysisError';
  }
}

/** Question or context malformed. The run continues with best-effort defaults. */
export class PlanningError extends AnalysisError {
  constructor(public readonly issues: string[]) {
    super('PLANNING', `Planning issues: ${issues.join('; ')}`);
    this.name = 'PlanningError';
  }
}

export class ProfilingError extends AnalysisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PROFILING', message, options);
    this.name = 'ProfilingError';
  }
}

export class ExecutionError extends AnalysisError {
  constructor(public readonly sql: string, message: string, options?: { cause?: unknown }) {
    super('EXECUTION', message, options);
    this.name = 'ExecutionError';
  }
}

export class SynthesisError extends AnalysisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SYNTHESIS', message, options);
    this.name = 'SynthesisError';
  }
}

export class BudgetExhaustedError extends AnalysisError {
  constructor(
    public readonly stage: string,
    public readonly queriesRemaining: number,
    public readonly secondsRemaining: number
  ) {
    super(
      'BUDGET_EXHAUSTED',
      `Budget exhausted before ${stage}: queries=${queriesRemaining} seconds=${secondsRemaining.toFixed(2)}`
    );
    this.name = 'BudgetExhaustedError';
  }
}

export class RlsRefreshError extends AnalysisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RLS_REFRESH', message, options);
    this.name = 'RlsRefreshError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | null {
  return error instanceof AnalysisError ? error.code : null;
}
