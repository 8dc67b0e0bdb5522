import type { ColumnInfo, ProfileCounts, SchemaCard, TableCard, ValidationProfile } from '../types.js';
import type { Connector } from '../tools/connector.js';
import type { Synthesizer } from './synthesizer.js';
import { selectTables, DEFAULT_MAX_CANDIDATES, type TableSelection } from './tableSelector.js';
import { ensureLimit } from './guard.js';
import { toRecords } from './shaper.js';
import { ProfilingError, errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('schema-profiler');

export interface ProfilerOptions {
  schema?: string;
  maxCandidates?: number;
  validationProfile?: ValidationProfile;
  /** Tables with fewer rows than this get sample rows. */
  sampleRowThreshold?: number;
  sampleRows?: number;
}

const TIMESTAMP_TYPE = /timestamp|datetime|\bdate\b/i;
const PREFERRED_TS_NAMES = ['created_at', 'updated_at', 'timestamp', 'date', 'event_time', 'order_date'];

/**
 * Picks the column most likely to be the table's event time.
 */
export function detectTimestampColumn(columns: ColumnInfo[]): string | null {
  const candidates = columns.filter(c => TIMESTAMP_TYPE.test(c.type));
  if (candidates.length === 0) return null;
  for (const preferred of PREFERRED_TS_NAMES) {
    const hit = candidates.find(c => c.name.toLowerCase() === preferred);
    if (hit) return hit.name;
  }
  return candidates[0].name;
}

function emptyProfile(): ProfileCounts {
  return { totalRows: null, minDate: null, maxDate: null, dateColumn: null };
}

async function profileTable(
  connector: Connector,
  table: string,
  profile: ValidationProfile,
  sampleRowThreshold: number,
  sampleRows: number
): Promise<TableCard> {
  const card: TableCard = {
    name: table,
    columns: [],
    profile: emptyProfile(),
    constraints: null,
    sampleRows: [],
    error: null,
  };

  try {
    card.columns = await connector.getColumns(table);
    const tsColumn = detectTimestampColumn(card.columns);
    card.profile = await connector.profileCounts(table, tsColumn ?? undefined);

    if (profile === 'strict') {
      card.constraints = await connector.getConstraints(table);
    }

    const total = card.profile.totalRows;
    if (profile !== 'fast' && total !== null && total > 0 && total < sampleRowThreshold) {
      const sql = ensureLimit(`SELECT * FROM ${connector.quoteIdent(table)}`, connector.dialect, sampleRows + 2);
      const result = await connector.runSql(sql);
      card.sampleRows = toRecords(result, sampleRows);
    }
  } catch (error) {
    card.error = errorMessage(error);
    log.warn('Failed to profile table', { table, error: card.error });
  }

  return card;
}

/**
 * Builds the schema card: selects the relevant tables, then profiles each
 * one. A failing table is kept with its error; failing to list tables at
 * all raises a ProfilingError.
 */
export async function buildSchemaCard(
  connector: Connector,
  question: string | null,
  synthesizer: Synthesizer | null,
  options: ProfilerOptions = {}
): Promise<{ card: SchemaCard; selection: TableSelection }> {
  const profile = options.validationProfile ?? 'balanced';
  const sampleRowThreshold = options.sampleRowThreshold ?? 1000;
  const sampleRows = options.sampleRows ?? 3;

  let catalog: string[];
  try {
    catalog = await connector.listTables(options.schema);
  } catch (error) {
    throw new ProfilingError(`Could not list tables: ${errorMessage(error)}`, { cause: error });
  }

  const selection = await selectTables(
    catalog,
    question,
    synthesizer,
    options.maxCandidates ?? DEFAULT_MAX_CANDIDATES
  );

  const tables: TableCard[] = [];
  for (const table of selection.tables) {
    tables.push(await profileTable(connector, table, profile, sampleRowThreshold, sampleRows));
  }

  log.info(`Profiled ${tables.length} of ${catalog.length} tables`, { fallback: selection.usedFallback });

  return {
    card: {
      dialect: connector.dialect,
      schema: options.schema ?? null,
      tables,
      totalTables: catalog.length,
      error: null,
    },
    selection,
  };
}

export function emptySchemaCard(connector: Connector, error: string | null): SchemaCard {
  return {
    dialect: connector.dialect,
    schema: null,
    tables: [],
    totalTables: 0,
    error,
  };
}
