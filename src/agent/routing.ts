import type { AnalysisState, NextStep, StepName } from '../types.js';
import { hasBudget, maxAttempts } from './state.js';

/** Score at or above which validation stops iterating. */
export const TARGET_SCORE = 0.85;

/**
 * After mvq: diagnose when the query failed, came back empty, or the latest
 * attempt was flagged as suspicious.
 */
export function needDiagnostics(state: AnalysisState): 'diagnose' | 'transform' {
  const rs = state.lastResult;
  if (!rs || !rs.ok || rs.rowCount === 0) {
    return 'diagnose';
  }
  const latest = state.history[state.history.length - 1];
  if (latest && latest.flagWeird) {
    return 'diagnose';
  }
  return 'transform';
}

/**
 * After refine: a successful execution moves on. A failure loops back to
 * diagnose while budget and attempts remain; otherwise the run falls through
 * transform (which skips failed results) so it still gets a quality report.
 */
export function nextAfterRefine(state: AnalysisState): 'diagnose' | 'transform' {
  if (state.lastResult && state.lastResult.ok) {
    return 'transform';
  }
  if (hasBudget(state) && state.attempt < maxAttempts(state)) {
    return 'diagnose';
  }
  return 'transform';
}

/**
 * After validate: iterate again only when the score is short of the target,
 * still improving, and resources remain.
 */
export function shouldContinueIteration(state: AnalysisState): 'diagnose' | 'present' {
  const quality = state.quality;
  if (!quality) {
    return 'present';
  }
  if (
    quality.score < TARGET_SCORE &&
    !quality.plateau &&
    hasBudget(state) &&
    state.attempt < maxAttempts(state)
  ) {
    return 'diagnose';
  }
  return 'present';
}

export type Router = (state: AnalysisState) => NextStep;

/**
 * Transition table. Every state has exactly one router.
 */
export const TRANSITIONS: Record<StepName, Router> = {
  plan: () => 'profile',
  profile: () => 'mvq',
  mvq: needDiagnostics,
  diagnose: () => 'refine',
  refine: nextAfterRefine,
  transform: () => 'produce',
  produce: () => 'validate',
  validate: shouldContinueIteration,
  present: () => 'end',
};

export const ENTRY_STEP: StepName = 'plan';
export const TERMINAL_STEP: StepName = 'present';
