import type { Connector } from './tools/connector.js';

export type Dialect =
  | 'postgres'
  | 'mysql'
  | 'sqlite'
  | 'snowflake'
  | 'bigquery'
  | 'mssql'
  | 'duckdb';

export type ValidationProfile = 'fast' | 'balanced' | 'strict';

export interface Budget {
  queries: number;
  seconds: number;
}

/**
 * What the caller asked for. Frozen once the state is created.
 */
export interface QuerySpec {
  question: string;
  dialect: Dialect;
  timeWindow: string | null;
  grain: string | null;
  filters: Record<string, unknown>;
  budget: Budget;
  validationProfile: ValidationProfile;
}

// ============================================================================
// Capability Port payloads
// ============================================================================

export interface ColumnInfo {
  name: string;
  type: string;
  nullable: boolean;
  default: string | null;
  primaryKey: boolean;
  autoincrement: boolean;
}

export interface ForeignKeyInfo {
  name: string | null;
  columns: string[];
  referredTable: string;
  referredColumns: string[];
}

export interface NamedColumns {
  name: string | null;
  columns: string[];
}

export interface TableConstraints {
  primaryKey: NamedColumns | null;
  foreignKeys: ForeignKeyInfo[];
  uniqueConstraints: NamedColumns[];
  checkConstraints: Array<{ name: string | null; expression: string }>;
}

export interface ProfileCounts {
  totalRows: number | null;
  minDate: string | null;
  maxDate: string | null;
  dateColumn: string | null;
}

export type SqlRow = unknown[];

/** Columnar result set returned by every connector. */
export interface ResultSet {
  columns: string[];
  rows: SqlRow[];
}

export interface RlsContext {
  accessToken: string;
  refreshToken: string | null;
  autoRefresh: boolean;
}

// ============================================================================
// Schema card
// ============================================================================

export interface TableCard {
  name: string;
  columns: ColumnInfo[];
  profile: ProfileCounts;
  constraints: TableConstraints | null;
  sampleRows: Array<Record<string, unknown>>;
  error: string | null;
}

export interface SchemaCard {
  dialect: Dialect;
  schema: string | null;
  tables: TableCard[];
  totalTables: number;
  error: string | null;
}

// ============================================================================
// Analysis state
// ============================================================================

export type StepName =
  | 'plan'
  | 'profile'
  | 'mvq'
  | 'diagnose'
  | 'refine'
  | 'transform'
  | 'produce'
  | 'validate'
  | 'present';

export type NextStep = StepName | 'end';

export type StepStatus = 'completed' | 'failed' | 'skipped';

export interface AnalysisPlan {
  question: string;
  dialect: Dialect;
  approach: 'direct_sql_generation';
  hints: string[];
}

export interface AnalysisContext {
  connector: Connector;
  schemaCard: SchemaCard | null;
  selectedTables: string[];
  rls: RlsContext | null;
  plan: AnalysisPlan | null;
  planningIssues: string[];
}

export type ExecutionResult =
  | {
      ok: true;
      table: ResultSet;
      rowCount: number;
      columnCount: number;
      durationMs: number;
      sql: string;
    }
  | {
      ok: false;
      error: string;
      rowCount: 0;
      columnCount: 0;
      durationMs: number;
      sql: string;
    };

export interface HistoryEntry {
  stage: 'mvq' | 'refine';
  sql: string;
  notes: string;
  ok: boolean;
  rowCount: number;
  error: string | null;
  timestamp: string;
  /** Set when something downstream considers the result suspicious. */
  flagWeird: boolean;
  score: number | null;
}

export interface DiagnosticResult {
  sql: string;
  ok: boolean;
  rowCount: number;
  columns: string[];
  sampleRows: Array<Record<string, unknown>>;
  error: string | null;
}

export interface Diagnostics {
  purpose: string;
  results: DiagnosticResult[];
}

export interface ErrorRecord {
  sql: string;
  error: string;
  timestamp: string;
  durationMs: number;
}

export interface ResultSummary {
  rows: number;
  columns: number;
  columnNames: string[];
  columnTypes: Record<string, string>;
}

export interface ShapedResult {
  summary: ResultSummary;
  preview: Array<Record<string, unknown>>;
}

export interface TableArtifactContent {
  columns: string[];
  data: Array<Record<string, unknown>>;
  summary: ResultSummary;
}

export interface SqlArtifactContent {
  sql: string;
  notes: string;
  rowCount: number;
}

interface ArtifactBase {
  id: string;
  title: string;
  filePath: string | null;
  meta: Record<string, unknown>;
  createdAt: string;
}

export type Artifact =
  | (ArtifactBase & { kind: 'table'; content: TableArtifactContent })
  | (ArtifactBase & { kind: 'sql'; content: SqlArtifactContent })
  | (ArtifactBase & { kind: 'chart' | 'log'; content: Record<string, unknown> });

export type ArtifactKind = Artifact['kind'];

export interface QualityGate {
  name: 'hasData' | 'hasArtifacts' | 'reasonableAttempts';
  passed: boolean;
  weight: number;
  message: string;
}

export interface QualityReport {
  passed: boolean;
  score: number;
  gates: QualityGate[];
  notes: string[];
  plateau: boolean;
}

export interface ExecutionStep {
  step: StepName | 'sql_execution';
  status: StepStatus;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  details: Record<string, unknown>;
  error: string | null;
  errorCode: string | null;
  /** Budget left after the step finished. */
  budgetRemaining: Budget;
}

export type TerminationReason = 'completed' | 'cancelled' | 'step_limit';

export interface AnalysisState {
  readonly jobId: string;
  readonly spec: Readonly<QuerySpec>;
  context: AnalysisContext;
  lastResult: ExecutionResult | null;
  history: HistoryEntry[];
  diagnostics: Diagnostics | null;
  errors: ErrorRecord[];
  shaped: ShapedResult | null;
  artifacts: Artifact[];
  quality: QualityReport | null;
  budgetRemaining: Budget;
  attempt: number;
  executionSteps: ExecutionStep[];
  answer: string | null;
  termination: TerminationReason | null;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
}

// ============================================================================
// Run output
// ============================================================================

export type JobStatus = 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';

export interface LineageEntry {
  stage: HistoryEntry['stage'];
  sql: string;
  ok: boolean;
  rowCount: number;
  timestamp: string;
}

export interface RunResult {
  jobId: string;
  question: string;
  answer: string;
  tables: Artifact[];
  charts: Artifact[];
  sql: string | null;
  quality: QualityReport | null;
  lineage: LineageEntry[];
  executionSteps: ExecutionStep[];
  budgetRemaining: Budget;
  attempts: number;
  termination: TerminationReason | null;
  createdAt: string;
  completedAt: string | null;
}
