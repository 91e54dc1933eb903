/**
 * Second listing source: Yahoo's symbol autocomplete, swept one query per
 * letter and digit. Only Jakarta listings are kept.
 */

import { normalizeSymbol, toDisplayCode } from '@/core/universe';
import type { RawInstrumentEntry } from '@/types/config';
import { RequestThrottler } from '@/utils/throttler';
import { createChildLogger } from '@/utils/logger';
import { CODE_PATTERN, isRecord, text } from './idx_listing';

const logger = createChildLogger('yahoo_autocomplete');

export const YAHOO_AUTOCOMPLETE_URL = 'https://autoc.finance.yahoo.com/autoc?region=1&lang=en&query=';

export const AUTOCOMPLETE_QUERIES: ReadonlyArray<string> = [
  ...'ABCDEFGHIJKLMNOPQRSTUVWXYZ',
  ...'0123456789',
];

const JAKARTA_EXCHANGE = 'JKT';

function autocompleteItems(payload: unknown): unknown[] {
  if (!isRecord(payload) || !isRecord(payload.ResultSet)) return [];
  const items = payload.ResultSet.Result;
  return Array.isArray(items) ? items : [];
}

/** `{ ResultSet: { Result: [{ symbol, name, exch }] } }` -> Jakarta instruments sorted by symbol. */
export function parseYahooAutocomplete(payload: unknown, exchangeSuffix: string = '.JK'): RawInstrumentEntry[] {
  const suffix = exchangeSuffix.toUpperCase();
  const bySymbol = new Map<string, RawInstrumentEntry>();

  for (const item of autocompleteItems(payload)) {
    if (!isRecord(item)) continue;
    const raw = text(item.symbol).toUpperCase();
    const onJakarta = raw.endsWith(suffix) || text(item.exch).toUpperCase() === JAKARTA_EXCHANGE;
    if (!raw || !onJakarta) continue;

    const symbol = normalizeSymbol(raw, suffix);
    const code = toDisplayCode(symbol);
    if (!symbol.endsWith(suffix) || !CODE_PATTERN.test(code)) continue;
    if (!bySymbol.has(symbol)) {
      bySymbol.set(symbol, { symbol, name: text(item.name) || code });
    }
  }

  return Array.from(bySymbol.values()).sort((a, b) => a.symbol.localeCompare(b.symbol));
}

export interface SweepOptions {
  queries?: ReadonlyArray<string>;
  exchangeSuffix?: string;
  throttler?: RequestThrottler;
}

/**
 * Runs every query in turn. A failed query is logged and skipped; the sweep
 * keeps whatever the other queries returned.
 */
export async function sweepYahooAutocomplete(
  fetchQuery: (query: string) => Promise<unknown>,
  options: SweepOptions = {}
): Promise<RawInstrumentEntry[]> {
  const queries = options.queries ?? AUTOCOMPLETE_QUERIES;
  const throttler = options.throttler ?? new RequestThrottler({ minIntervalMs: 80 });
  const bySymbol = new Map<string, RawInstrumentEntry>();
  let failedQueries = 0;

  for (const query of queries) {
    let payload: unknown;
    try {
      payload = await throttler.schedule(() => fetchQuery(query));
    } catch (error) {
      failedQueries += 1;
      logger.warn({ query, error: error instanceof Error ? error.message : String(error) }, 'Autocomplete query failed');
      continue;
    }
    for (const entry of parseYahooAutocomplete(payload, options.exchangeSuffix)) {
      if (!bySymbol.has(entry.symbol)) bySymbol.set(entry.symbol, entry);
    }
  }

  logger.info({ queries: queries.length, failedQueries, symbols: bySymbol.size }, 'Autocomplete sweep finished');
  return Array.from(bySymbol.values()).sort((a, b) => a.symbol.localeCompare(b.symbol));
}
