import dotenv from 'dotenv';
import type { Budget } from './types.js';
import { DEFAULT_RETRY_CONFIG, type RetryConfig } from './utils/retry.js';

dotenv.config();

export type DatabaseKind = 'postgres' | 'supabase';

export interface Config {
  geminiApiKey: string | null;
  geminiModel: string;
  llmTemperature: number;
  databaseUrl: string | null;
  databaseKind: DatabaseKind;
  dbSchema: string;
  rowCap: number;
  statementTimeoutMs: number;
  maxTableCandidates: number;
  maxSteps: number;
  readOnly: boolean;
  businessTimezone: string;
  defaultBudget: Budget;
  supabaseUrl: string | null;
  supabaseAnonKey: string | null;
  supabaseAccessToken: string | null;
  supabaseRefreshToken: string | null;
  rlsRefreshThresholdSeconds: number;
  retry: RetryConfig;
}

type Env = Record<string, string | undefined>;

export function getEnvVar(env: Env, name: string, defaultValue?: string): string {
  const value = env[name] || defaultValue;
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function getOptionalEnvVar(env: Env, name: string): string | null {
  const value = env[name];
  return value ? value : null;
}

export function getEnvNumber(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid number for environment variable: ${name}`);
  }
  return parsed;
}

export function getEnvBoolean(env: Env, name: string, defaultValue: boolean): boolean {
  const value = env[name];
  if (!value) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new Error(`Invalid boolean for environment variable: ${name}`);
}

function getDatabaseKind(env: Env): DatabaseKind {
  const value = (env.DATABASE_KIND || 'postgres').toLowerCase();
  if (value === 'postgres' || value === 'supabase') return value;
  throw new Error(`Unsupported DATABASE_KIND: ${value}`);
}

/**
 * Builds the runtime configuration from environment variables.
 * Values needed only by the CLI (API key, database URL) stay nullable here
 * and are checked where they are used.
 */
export function loadConfig(env: Env = process.env): Config {
  const retry: RetryConfig = {
    maxRetries: getEnvNumber(env, 'MAX_RETRIES', DEFAULT_RETRY_CONFIG.maxRetries),
    initialDelayMs: getEnvNumber(env, 'RETRY_INITIAL_DELAY_MS', DEFAULT_RETRY_CONFIG.initialDelayMs),
    maxDelayMs: getEnvNumber(env, 'RETRY_MAX_DELAY_MS', DEFAULT_RETRY_CONFIG.maxDelayMs),
    backoffMultiplier: DEFAULT_RETRY_CONFIG.backoffMultiplier,
  };

  return {
    geminiApiKey: getOptionalEnvVar(env, 'GEMINI_API_KEY'),
    geminiModel: env.GEMINI_MODEL || 'gemini-2.5-flash',
    llmTemperature: getEnvNumber(env, 'LLM_TEMPERATURE', 0),
    databaseUrl: getOptionalEnvVar(env, 'DATABASE_URL'),
    databaseKind: getDatabaseKind(env),
    dbSchema: env.DB_SCHEMA || 'public',
    rowCap: getEnvNumber(env, 'ROW_CAP', 10000),
    statementTimeoutMs: getEnvNumber(env, 'STATEMENT_TIMEOUT_MS', 30000),
    maxTableCandidates: getEnvNumber(env, 'MAX_TABLE_CANDIDATES', 12),
    maxSteps: getEnvNumber(env, 'MAX_ORCHESTRATOR_STEPS', 128),
    readOnly: getEnvBoolean(env, 'SQL_READ_ONLY', true),
    businessTimezone: env.BUSINESS_TZ || 'UTC',
    defaultBudget: {
      queries: getEnvNumber(env, 'BUDGET_QUERIES', 30),
      seconds: getEnvNumber(env, 'BUDGET_SECONDS', 90),
    },
    supabaseUrl: getOptionalEnvVar(env, 'SUPABASE_URL'),
    supabaseAnonKey: getOptionalEnvVar(env, 'SUPABASE_ANON_KEY'),
    supabaseAccessToken: getOptionalEnvVar(env, 'SUPABASE_ACCESS_TOKEN'),
    supabaseRefreshToken: getOptionalEnvVar(env, 'SUPABASE_REFRESH_TOKEN'),
    rlsRefreshThresholdSeconds: getEnvNumber(env, 'RLS_REFRESH_THRESHOLD_SECONDS', 300),
    retry,
  };
}

let cached: Config | null = null;

export function getConfig(): Config {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
