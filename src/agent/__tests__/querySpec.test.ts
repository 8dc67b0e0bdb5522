import { describe, it, expect } from 'vitest';
import { normalizeQuerySpec } from '../querySpec.js';

describe('normalizeQuerySpec', () => {
  it('fills defaults for a minimal spec', () => {
    const { spec, issues } = normalizeQuerySpec({ question: '  Revenue by month ', dialect: ' Postgres ' });

    expect(issues).toEqual([]);
    expect(spec).toEqual({
      question: 'Revenue by month',
      dialect: 'postgres',
      timeWindow: null,
      grain: null,
      filters: {},
      budget: { queries: 30, seconds: 90 },
      validationProfile: 'balanced',
    });
  });

  it('keeps caller-supplied fields', () => {
    const { spec } = normalizeQuerySpec({
      question: 'Active users',
      dialect: 'snowflake',
      timeWindow: 'last 30 days',
      grain: 'day',
      filters: { country: 'DE' },
      budget: { queries: 12, seconds: 40 },
      validationProfile: 'strict',
    });

    expect(spec.dialect).toBe('snowflake');
    expect(spec.timeWindow).toBe('last 30 days');
    expect(spec.filters).toEqual({ country: 'DE' });
    expect(spec.budget).toEqual({ queries: 12, seconds: 40 });
    expect(spec.validationProfile).toBe('strict');
  });

  it('clamps the budget and reports it', () => {
    const { spec, issues } = normalizeQuerySpec({ question: 'q', budget: { queries: 500, seconds: 5 } });

    expect(spec.budget).toEqual({ queries: 100, seconds: 10 });
    expect(issues).toEqual(['budget.queries 500 clamped to 100', 'budget.seconds 5 clamped to 10']);
  });

  it('floors fractional query budgets', () => {
    const { spec, issues } = normalizeQuerySpec({ question: 'q', budget: { queries: 7.8 } });
    expect(spec.budget).toEqual({ queries: 7, seconds: 90 });
    expect(issues).toEqual([]);
  });

  it('uses the supplied default budget', () => {
    const { spec } = normalizeQuerySpec({ question: 'q' }, { budget: { queries: 12, seconds: 40 } });
    expect(spec.budget).toEqual({ queries: 12, seconds: 40 });
  });

  it('repairs an unknown dialect', () => {
    const { spec, issues } = normalizeQuerySpec({ question: 'q', dialect: 'oracle', grain: 'week' });

    expect(spec.dialect).toBe('postgres');
    expect(spec.question).toBe('q');
    expect(spec.grain).toBe('week');
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('dialect: ')).toBe(true);
  });

  it('reports an empty question', () => {
    const { spec, issues } = normalizeQuerySpec({ question: '   ' });
    expect(spec.question).toBe('');
    expect(issues).toEqual(['question: Question is empty']);
  });

  it('truncates an overlong question', () => {
    const { spec, issues } = normalizeQuerySpec({ question: 'x'.repeat(2500) });
    expect(spec.question).toHaveLength(2000);
    expect(issues[0].startsWith('question: ')).toBe(true);
  });

  it('handles input that is not an object', () => {
    const { spec, issues } = normalizeQuerySpec('revenue please');
    expect(spec.question).toBe('');
    expect(spec.budget).toEqual({ queries: 30, seconds: 90 });
    expect(issues[0].startsWith('spec: ')).toBe(true);
  });
});
