import type { ExecutionStep, JobStatus, StepName } from '../types.js';

/** Percent complete once a step has finished. */
export const STEP_WEIGHTS: Record<StepName, number> = {
  plan: 10,
  profile: 20,
  mvq: 40,
  diagnose: 50,
  refine: 60,
  transform: 70,
  produce: 80,
  validate: 90,
  present: 100,
};

function isStepName(step: ExecutionStep['step']): step is StepName {
  return step !== 'sql_execution';
}

/**
 * Progress percentage for a job. Diagnose/refine loops never move the bar
 * backwards: the furthest finished step wins.
 */
export function calculateProgress(status: JobStatus, steps: ExecutionStep[]): number {
  if (status === 'pending') return 0;
  if (status === 'completed' || status === 'failed' || status === 'cancelled') return 100;

  if (steps.length === 0) return 10;

  let progress = 0;
  let finished = 0;
  for (const step of steps) {
    if (!isStepName(step.step) || step.status !== 'completed') continue;
    finished++;
    progress = Math.max(progress, STEP_WEIGHTS[step.step]);
  }

  return finished === 0 ? 15 : progress;
}
