import { z } from 'zod';
import type { Synthesizer } from './synthesizer.js';
import { parseJsonResponse } from './synthesizer.js';
import { buildTableSelectionPrompt } from './prompts.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('table-selector');

export const DEFAULT_MAX_CANDIDATES = 12;

const SelectionSchema = z.object({
  tables: z.array(z.string()),
});

export interface TableSelection {
  tables: string[];
  usedFallback: boolean;
  reason: string;
}

/**
 * Narrows the catalog to the tables worth profiling.
 *
 * The model's picks are matched against the real catalog (exactly, then
 * case-insensitively), de-duplicated and capped, keeping the model's order.
 * Any failure falls back to the first `maxCandidates` catalog entries.
 */
export async function selectTables(
  catalog: string[],
  question: string | null,
  synthesizer: Synthesizer | null,
  maxCandidates: number = DEFAULT_MAX_CANDIDATES
): Promise<TableSelection> {
  const limit = Math.max(1, Math.floor(maxCandidates));
  const fallback = (reason: string): TableSelection => ({
    tables: catalog.slice(0, limit),
    usedFallback: true,
    reason,
  });

  if (!question || !question.trim()) {
    return fallback('no question supplied');
  }
  if (catalog.length <= limit) {
    return { tables: [...catalog], usedFallback: false, reason: 'catalog fits within limit' };
  }
  if (!synthesizer) {
    return fallback('no synthesizer available');
  }

  let text: string;
  try {
    text = await synthesizer.complete(buildTableSelectionPrompt(question, catalog, limit));
  } catch (error) {
    log.warn('Table selection call failed, using catalog order', { error: errorMessage(error) });
    return fallback('synthesis call failed');
  }

  const parsed = parseJsonResponse(text, SelectionSchema);
  if (!parsed) {
    return fallback('unparsable selection response');
  }

  const exact = new Set(catalog);
  const byLowerName = new Map<string, string>();
  for (const name of catalog) {
    const key = name.toLowerCase();
    if (!byLowerName.has(key)) byLowerName.set(key, name);
  }

  const selected: string[] = [];
  const seen = new Set<string>();
  for (const candidate of parsed.tables) {
    const trimmed = candidate.trim();
    const resolved = exact.has(trimmed) ? trimmed : byLowerName.get(trimmed.toLowerCase());
    if (resolved === undefined || seen.has(resolved)) continue;
    seen.add(resolved);
    selected.push(resolved);
    if (selected.length >= limit) break;
  }

  if (selected.length === 0) {
    return fallback('no usable table names in response');
  }

  log.debug('Selected tables', { selected });
  return { tables: selected, usedFallback: false, reason: 'selected by model' };
}
