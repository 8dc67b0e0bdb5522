import type { AnalysisState, QualityGate, QualityReport } from '../types.js';
import { hasBudget } from './state.js';

export const GATE_WEIGHTS = {
  hasData: 0.6,
  hasArtifacts: 0.3,
  reasonableAttempts: 0.1,
} as const;

export const PASS_THRESHOLD = 0.7;
export const PLATEAU_EPSILON = 0.01;
export const PLATEAU_MIN_ATTEMPT = 3;
const PLATEAU_WINDOW = 2;

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Plateau check over scores ordered oldest to newest, the last one being the
 * current score. Looks back over the two scores before it; if none of them is
 * beaten by more than PLATEAU_EPSILON, iteration has stalled.
 *
 * @example
 * detectPlateau([0.5, 0.51, 0.505], 3) // true
 * detectPlateau([0.5, 0.65, 0.8], 3)   // false
 */
export function detectPlateau(scores: number[], attempt: number): boolean {
  if (attempt < PLATEAU_MIN_ATTEMPT || scores.length < 2) {
    return false;
  }
  const current = scores[scores.length - 1];
  const priors = scores.slice(-1 - PLATEAU_WINDOW, -1);
  return priors.every(prior => current - prior <= PLATEAU_EPSILON);
}

/**
 * Scores the current state against the three gates.
 */
export function computeQuality(state: AnalysisState): Omit<QualityReport, 'plateau'> {
  const rs = state.lastResult;
  const hasData = rs !== null && rs.ok && rs.rowCount > 0;
  const hasArtifacts = state.artifacts.length > 0;
  const reasonableAttempts = state.attempt <= 3;

  const gates: QualityGate[] = [
    {
      name: 'hasData',
      passed: hasData,
      weight: GATE_WEIGHTS.hasData,
      message: hasData ? `Query returned ${rs?.rowCount ?? 0} rows` : 'No data returned from query',
    },
    {
      name: 'hasArtifacts',
      passed: hasArtifacts,
      weight: GATE_WEIGHTS.hasArtifacts,
      message: hasArtifacts ? `${state.artifacts.length} artifacts produced` : 'No artifacts generated',
    },
    {
      name: 'reasonableAttempts',
      passed: reasonableAttempts,
      weight: GATE_WEIGHTS.reasonableAttempts,
      message: `${state.attempt} query attempts`,
    },
  ];

  const score = round(
    Math.min(1, Math.max(0, gates.reduce((sum, gate) => sum + (gate.passed ? gate.weight : 0), 0)))
  );

  const notes: string[] = [];
  if (!hasData) notes.push('No data returned from query');
  if (!hasArtifacts) notes.push('No artifacts generated');
  if (!hasBudget(state)) notes.push('Budget exhausted');

  return { passed: score >= PASS_THRESHOLD, score, gates, notes };
}

/**
 * Builds the quality report and stamps the score onto the latest history
 * entry so later passes can detect a plateau.
 */
export function assessQuality(state: AnalysisState): QualityReport {
  const base = computeQuality(state);

  const priorScores: number[] = [];
  for (const entry of state.history.slice(0, -1)) {
    if (entry.score !== null) priorScores.push(entry.score);
  }
  const plateau = detectPlateau([...priorScores, base.score], state.attempt);

  const latest = state.history[state.history.length - 1];
  if (latest) {
    latest.score = base.score;
  }

  const report: QualityReport = { ...base, plateau };
  if (plateau) {
    report.notes = [...report.notes, 'Quality score has plateaued'];
  }
  state.quality = report;
  return report;
}
