import type {
  AnalysisState,
  ExecutionResult,
  ExecutionStep,
  NextStep,
  QuerySpec,
  RlsContext,
  RunResult,
  StepName,
} from '../types.js';
import type { Connector } from '../tools/connector.js';
import type { Synthesizer } from './synthesizer.js';
import type { RlsTokenManager } from './rls.js';
import { SQLWriter } from './sqlWriter.js';
import { STEP_HANDLERS, failedResult, type AnomalyCheck, type StepDeps, type StepOutcome } from './steps.js';
import { ENTRY_STEP, TERMINAL_STEP, TRANSITIONS } from './routing.js';
import { addExecutionStep, createInitialState, systemClock, type Clock } from './state.js';
import { normalizeQuerySpec } from './querySpec.js';
import { toRunResult } from './result.js';
import { errorCode, errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('orchestrator');

export const DEFAULT_MAX_STEPS = 128;

/**
 * Receives progress from a run. Both callbacks are optional; a throwing
 * observer is logged and ignored.
 */
export interface AnalysisObserver {
  onStep?(state: AnalysisState, step: ExecutionStep): void;
  onExecution?(state: AnalysisState, result: ExecutionResult): void;
}

export interface OrchestratorOptions {
  synthesizer: Synthesizer;
  /** Hard ceiling on steps per run, independent of budget and attempts. */
  maxSteps?: number;
  maxCandidates?: number;
  schema?: string;
  rowCap?: number;
  readOnly?: boolean;
  timezone?: string;
  tokenManager?: RlsTokenManager | null;
  clock?: Clock;
  anomalyCheck?: AnomalyCheck;
  observers?: AnalysisObserver[];
}

export interface AnalyzeRequest {
  spec: unknown;
  connector: Connector;
  rls?: RlsContext | null;
  jobId?: string;
  signal?: AbortSignal;
}

/**
 * Drives one analysis through plan → profile → mvq → (diagnose → refine)* →
 * transform → produce → validate → present.
 *
 * Routing lives in the transition table; this class only sequences steps,
 * wraps each one so failures are recorded instead of thrown, and enforces
 * the step ceiling and cancellation at step boundaries.
 *
 * @example
 * ```typescript
 * const orchestrator = new AnalysisOrchestrator({ synthesizer });
 * const result = await orchestrator.analyze({
 *   spec: { question: 'Monthly revenue for 2024', dialect: 'postgres' },
 *   connector,
 * });
 * console.log(result.answer);
 * ```
 */
export class AnalysisOrchestrator {
  private readonly deps: StepDeps;
  private readonly maxSteps: number;
  private readonly clock: Clock;
  private readonly observers: AnalysisObserver[];

  constructor(options: OrchestratorOptions) {
    this.clock = options.clock ?? systemClock;
    this.maxSteps = Math.max(2, Math.floor(options.maxSteps ?? DEFAULT_MAX_STEPS));
    this.observers = [...(options.observers ?? [])];
    this.deps = {
      writer: new SQLWriter(options.synthesizer),
      synthesizer: options.synthesizer,
      schema: options.schema,
      maxCandidates: options.maxCandidates,
      timezone: options.timezone ?? 'UTC',
      clock: this.clock,
      anomalyCheck: options.anomalyCheck,
      gateway: {
        rowCap: options.rowCap,
        readOnly: options.readOnly ?? true,
        tokenManager: options.tokenManager ?? null,
        clock: this.clock,
        onExecution: (state, result) => this.notifyExecution(state, result),
      },
    };
  }

  addObserver(observer: AnalysisObserver): void {
    this.observers.push(observer);
  }

  /**
   * Validates the spec, creates the job state, runs it and returns the
   * caller-facing result.
   */
  async analyze(request: AnalyzeRequest): Promise<RunResult> {
    const { spec, issues } = normalizeQuerySpec(request.spec);
    const state = this.createState(spec, request.connector, request.rls ?? null, issues, request.jobId);
    await this.run(state, request.signal);
    return toRunResult(state);
  }

  createState(
    spec: QuerySpec,
    connector: Connector,
    rls: RlsContext | null = null,
    planningIssues: string[] = [],
    jobId?: string
  ): AnalysisState {
    return createInitialState(spec, { connector, rls, planningIssues }, { jobId, clock: this.clock });
  }

  /**
   * Runs the state machine to completion. Always leaves an answer on the
   * state, whatever happened along the way.
   */
  async run(state: AnalysisState, signal?: AbortSignal): Promise<AnalysisState> {
    let current: NextStep = ENTRY_STEP;
    let executed = 0;

    log.info(`🤔 Question: ${state.spec.question}`, { jobId: state.jobId });

    while (current !== 'end') {
      if (current !== TERMINAL_STEP) {
        if (signal?.aborted) {
          log.warn('⚠️  Cancelled, skipping to present', { jobId: state.jobId, at: current });
          state.termination = 'cancelled';
          current = TERMINAL_STEP;
        } else if (executed >= this.maxSteps - 1) {
          log.warn(`⚠️  Step limit (${this.maxSteps}) reached, skipping to present`, { jobId: state.jobId });
          state.termination = 'step_limit';
          current = TERMINAL_STEP;
        }
      }

      await this.runStep(current, state);
      executed++;
      current = TRANSITIONS[current](state);
    }

    if (state.termination === null) {
      state.termination = 'completed';
    }
    if (state.answer === null) {
      state.answer = 'Analysis could not be completed.';
    }
    if (state.completedAt === null) {
      state.completedAt = this.clock().toISOString();
    }

    log.info('✓ Analysis finished', {
      jobId: state.jobId,
      steps: executed,
      attempts: state.attempt,
      score: state.quality?.score ?? null,
    });
    return state;
  }

  /**
   * Runs one step inside the error boundary and records it.
   */
  private async runStep(name: StepName, state: AnalysisState): Promise<void> {
    const startedAt = this.clock();
    let outcome: StepOutcome;
    let code: string | null = null;

    try {
      outcome = await STEP_HANDLERS[name](state, this.deps);
    } catch (error) {
      const message = errorMessage(error);
      code = errorCode(error);
      outcome = { status: 'failed', details: {}, error: message };
      if (name === 'mvq' || name === 'refine') {
        state.lastResult = failedResult('', message);
      }
      if (name === 'present') {
        state.answer = `Analysis could not be completed. Error: ${message}. Question was: ${state.spec.question}`;
      }
      log.warn(`Step ${name} failed`, { jobId: state.jobId, error: message, code });
    }

    const step = addExecutionStep(state, {
      step: name,
      status: outcome.status,
      startedAt,
      completedAt: this.clock(),
      details: outcome.details,
      error: outcome.error ?? null,
      errorCode: code,
    });
    log.debug(`${name}: ${outcome.status}`, { jobId: state.jobId, ...outcome.details });
    this.notifyStep(state, step);
  }

  private notifyStep(state: AnalysisState, step: ExecutionStep): void {
    for (const observer of this.observers) {
      try {
        observer.onStep?.(state, step);
      } catch (error) {
        log.warn('Observer failed on step', { error: errorMessage(error) });
      }
    }
  }

  private notifyExecution(state: AnalysisState, result: ExecutionResult): void {
    for (const observer of this.observers) {
      try {
        observer.onExecution?.(state, result);
      } catch (error) {
        log.warn('Observer failed on execution', { error: errorMessage(error) });
      }
    }
  }
}
