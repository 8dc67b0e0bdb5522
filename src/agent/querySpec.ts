import { z } from 'zod';
import type { Budget, QuerySpec } from '../types.js';

export const MAX_QUESTION_LENGTH = 2000;
export const DEFAULT_BUDGET: Budget = { queries: 30, seconds: 90 };
export const BUDGET_LIMITS = {
  queries: { min: 1, max: 100 },
  seconds: { min: 10, max: 600 },
} as const;

const DialectSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['postgres', 'mysql', 'sqlite', 'snowflake', 'bigquery', 'mssql', 'duckdb']));

const QuerySpecSchema = z.object({
  question: z.string().trim().min(1, 'Question is empty').max(MAX_QUESTION_LENGTH),
  dialect: DialectSchema.default('postgres'),
  timeWindow: z.string().nullable().default(null),
  grain: z.string().nullable().default(null),
  filters: z.record(z.unknown()).default({}),
  budget: z
    .object({
      queries: z.number().finite().optional(),
      seconds: z.number().finite().optional(),
    })
    .default({}),
  validationProfile: z.enum(['fast', 'balanced', 'strict']).default('balanced'),
});

export type QuerySpecInput = z.input<typeof QuerySpecSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function normalizeBudget(
  raw: { queries?: number; seconds?: number },
  defaults: Budget,
  issues: string[]
): Budget {
  const queries = Math.floor(raw.queries ?? defaults.queries);
  const seconds = raw.seconds ?? defaults.seconds;
  const budget = {
    queries: clamp(queries, BUDGET_LIMITS.queries.min, BUDGET_LIMITS.queries.max),
    seconds: clamp(seconds, BUDGET_LIMITS.seconds.min, BUDGET_LIMITS.seconds.max),
  };
  if (budget.queries !== queries) {
    issues.push(`budget.queries ${queries} clamped to ${budget.queries}`);
  }
  if (budget.seconds !== seconds) {
    issues.push(`budget.seconds ${seconds} clamped to ${budget.seconds}`);
  }
  return budget;
}

/**
 * Validates a caller-supplied spec. Never throws: invalid fields are replaced
 * with defaults and reported in `issues` so the plan step can record them.
 */
export function normalizeQuerySpec(
  input: unknown,
  defaults: { budget?: Budget } = {}
): { spec: QuerySpec; issues: string[] } {
  const defaultBudget = defaults.budget ?? DEFAULT_BUDGET;
  const parsed = QuerySpecSchema.safeParse(input);

  if (parsed.success) {
    const issues: string[] = [];
    const data = parsed.data;
    return {
      spec: { ...data, budget: normalizeBudget(data.budget, defaultBudget, issues) },
      issues,
    };
  }

  const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'spec'}: ${issue.message}`);
  const raw = isRecord(input) ? input : {};
  const shape = QuerySpecSchema.shape;

  const question = typeof raw.question === 'string' ? raw.question.trim().slice(0, MAX_QUESTION_LENGTH) : '';
  const dialect = shape.dialect.safeParse(raw.dialect);
  const timeWindow = shape.timeWindow.safeParse(raw.timeWindow);
  const grain = shape.grain.safeParse(raw.grain);
  const filters = shape.filters.safeParse(raw.filters);
  const budget = shape.budget.safeParse(raw.budget);
  const profile = shape.validationProfile.safeParse(raw.validationProfile);

  return {
    spec: {
      question,
      dialect: dialect.success ? dialect.data : 'postgres',
      timeWindow: timeWindow.success ? timeWindow.data : null,
      grain: grain.success ? grain.data : null,
      filters: filters.success ? filters.data : {},
      budget: normalizeBudget(budget.success ? budget.data : {}, defaultBudget, issues),
      validationProfile: profile.success ? profile.data : 'balanced',
    },
    issues,
  };
}
