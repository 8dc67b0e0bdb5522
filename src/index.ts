#!/usr/bin/env node
import readline from 'readline';
import { getConfig, getEnvVar } from './config.js';
import { AnalysisOrchestrator, type AnalysisObserver } from './agent/orchestrator.js';
import { GeminiSynthesizer } from './agent/synthesizer.js';
import { RlsTokenManager } from './agent/rls.js';
import { calculateProgress } from './agent/progress.js';
import { buildSchemaCard } from './agent/schemaProfiler.js';
import { formatSchemaCard } from './agent/prompts.js';
import { makeConnector } from './tools/registry.js';
import type { Connector } from './tools/connector.js';
import type { Budget, RlsContext, RunResult, ValidationProfile } from './types.js';

const config = getConfig();

const rl = readline.createInterface({
  input: process.stdin,
  output: process.stdout,
});

let budget: Budget = { ...config.defaultBudget };
let validationProfile: ValidationProfile = 'balanced';
let activeRun: AbortController | null = null;

function question(prompt: string): Promise<string> {
  return new Promise((resolve) => {
    rl.question(prompt, resolve);
  });
}

const STEP_ICONS: Record<string, string> = {
  plan: '📋',
  profile: '🔍',
  mvq: '📝',
  diagnose: '🩺',
  refine: '🔧',
  transform: '🔄',
  produce: '📦',
  validate: '✅',
  present: '💡',
};

const consoleObserver: AnalysisObserver = {
  onStep(state, step) {
    const icon = STEP_ICONS[step.step] ?? '•';
    const progress = calculateProgress('running', state.executionSteps);
    const status = step.status === 'completed' ? '✓' : step.status === 'skipped' ? '↷' : '✗';
    const suffix = step.error ? ` - ${step.error.split('\n')[0]}` : '';
    console.log(`   ${icon} [${String(progress).padStart(3)}%] ${step.step} ${status}${suffix}`);
  },
  onExecution(state, result) {
    const left = `${state.budgetRemaining.queries} queries, ${state.budgetRemaining.seconds.toFixed(1)}s left`;
    if (result.ok) {
      console.log(`      ✓ ${result.rowCount} rows in ${result.durationMs}ms (${left})`);
    } else {
      console.log(`      ✗ ${result.error.split('\n')[0]} (${left})`);
    }
  },
};

function printResult(result: RunResult): void {
  console.log(`\n💡 Answer:\n${result.answer}\n`);

  if (result.sql) {
    console.log(`📄 SQL:\n${result.sql}\n`);
  }

  const table = result.tables[0];
  if (table && table.kind === 'table') {
    const preview = table.content.data.slice(0, 10);
    if (preview.length > 0) {
      console.table(preview);
    }
  }

  const quality = result.quality;
  const score = quality ? `${(quality.score * 100).toFixed(0)}%${quality.passed ? ' (passed)' : ''}` : 'n/a';
  console.log(
    `📊 Summary: ${result.attempts} attempts, ${result.executionSteps.length} steps, ` +
    `quality ${score}, ${result.budgetRemaining.queries} queries left\n`
  );
  if (quality && quality.notes.length > 0) {
    console.log(`⚠️  ${quality.notes.join('; ')}\n`);
  }
}

async function handleCommand(cmd: string, args: string[], connector: Connector): Promise<boolean> {
  switch (cmd) {
    case '/tables': {
      const tables = await connector.listTables(config.dbSchema);
      console.log(`\n${tables.length} tables in ${config.dbSchema}:`);
      for (const table of tables) {
        console.log(`  ${table}`);
      }
      console.log();
      return false;
    }

    case '/schema': {
      const { card } = await buildSchemaCard(connector, args.join(' ') || null, null, {
        schema: config.dbSchema,
        maxCandidates: config.maxTableCandidates,
        validationProfile,
      });
      console.log('\n' + formatSchemaCard(card) + '\n');
      return false;
    }

    case '/budget': {
      if (args.length === 0) {
        console.log(`Current budget: ${budget.queries} queries, ${budget.seconds}s\n`);
        return false;
      }
      const queries = Number(args[0]);
      const seconds = args[1] !== undefined ? Number(args[1]) : budget.seconds;
      if (!Number.isFinite(queries) || !Number.isFinite(seconds)) {
        console.log('Usage: /budget <queries> [seconds]\n');
        return false;
      }
      budget = { queries, seconds };
      console.log(`✓ Budget set to ${queries} queries, ${seconds}s\n`);
      return false;
    }

    case '/profile': {
      const value = args[0]?.toLowerCase();
      if (value === 'fast' || value === 'balanced' || value === 'strict') {
        validationProfile = value;
        console.log(`✓ Validation profile: ${value.toUpperCase()}\n`);
      } else {
        console.log(`Current validation profile: ${validationProfile.toUpperCase()}`);
        console.log('Usage: /profile [fast|balanced|strict]\n');
      }
      return false;
    }

    case '/exit':
    case '/quit':
      return true;

    case '/help': {
      console.log(`
Available commands:
  /tables                     - List tables in the configured schema
  /schema [question]          - Show the schema card that would be profiled
  /budget [queries] [seconds] - Show or set the per-question budget
  /profile [fast|balanced|strict]
      fast     - Columns and row counts only
      balanced - Also sample rows from small tables (default)
      strict   - Also load constraints
  /help                       - Show this help message
  /exit, /quit                - Exit the CLI

Press Ctrl+C during an analysis to cancel it.

Ask a question to get started!
`);
      return false;
    }

    default:
      console.log(`Unknown command: ${cmd}. Type /help for available commands.`);
      return false;
  }
}

function buildRlsContext(): RlsContext | null {
  if (config.databaseKind !== 'supabase' || !config.supabaseAccessToken) {
    return null;
  }
  return {
    accessToken: config.supabaseAccessToken,
    refreshToken: config.supabaseRefreshToken,
    autoRefresh: true,
  };
}

function buildTokenManager(): RlsTokenManager | null {
  if (!config.supabaseUrl || !config.supabaseAnonKey) {
    return null;
  }
  return new RlsTokenManager({
    supabaseUrl: config.supabaseUrl,
    anonKey: config.supabaseAnonKey,
    refreshThresholdSeconds: config.rlsRefreshThresholdSeconds,
  });
}

async function main(): Promise<void> {
  const apiKey = getEnvVar(process.env, 'GEMINI_API_KEY');
  const databaseUrl = getEnvVar(process.env, 'DATABASE_URL');

  console.log('🤖 SQL Analyst');
  console.log('==============\n');

  const connector = makeConnector(config.databaseKind, {
    connectionString: databaseUrl,
    schema: config.dbSchema,
    statementTimeoutMs: config.statementTimeoutMs,
  });

  const orchestrator = new AnalysisOrchestrator({
    synthesizer: new GeminiSynthesizer({
      apiKey,
      model: config.geminiModel,
      temperature: config.llmTemperature,
      retry: config.retry,
    }),
    maxSteps: config.maxSteps,
    maxCandidates: config.maxTableCandidates,
    schema: config.dbSchema,
    rowCap: config.rowCap,
    readOnly: config.readOnly,
    timezone: config.businessTimezone,
    tokenManager: buildTokenManager(),
    observers: [consoleObserver],
  });

  let currentRls = buildRlsContext();
  orchestrator.addObserver({
    onStep(state) {
      currentRls = state.context.rls;
    },
  });

  const onInterrupt = (): void => {
    if (activeRun) {
      console.log('\n⚠️  Cancelling after the current step...');
      activeRun.abort();
      return;
    }
    console.log('\n\n👋 Shutting down...');
    rl.close();
    connector.close().then(
      () => process.exit(0),
      () => process.exit(1)
    );
  };
  rl.on('SIGINT', onInterrupt);
  process.on('SIGINT', onInterrupt);

  console.log(`Connected to ${connector.kind} (schema: ${config.dbSchema}, model: ${config.geminiModel})`);
  console.log('Ready! Type a question or /help for commands.\n');

  while (true) {
    const input = await question('> ');
    const trimmed = input.trim();

    if (!trimmed) {
      continue;
    }

    if (trimmed.startsWith('/')) {
      const parts = trimmed.split(/\s+/);
      try {
        const shouldExit = await handleCommand(parts[0], parts.slice(1), connector);
        if (shouldExit) {
          break;
        }
      } catch (error) {
        console.error(`\n✗ Error: ${error instanceof Error ? error.message : String(error)}\n`);
      }
      continue;
    }

    activeRun = new AbortController();
    try {
      console.log(`\n🤔 Question: ${trimmed}\n`);
      const result = await orchestrator.analyze({
        spec: {
          question: trimmed,
          dialect: connector.dialect,
          budget,
          validationProfile,
        },
        connector,
        rls: currentRls,
        signal: activeRun.signal,
      });
      printResult(result);
    } catch (error) {
      console.error(`\n✗ Error: ${error instanceof Error ? error.message : String(error)}\n`);
    } finally {
      activeRun = null;
    }
  }

  await connector.close();
  rl.close();
  console.log('\n👋 Goodbye!');
  process.exit(0);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
