/**
 * Builds a registry from the exchange's listed-company endpoint.
 * Used by scripts/universe/fetch_idx_listing.ts; screening runs never call it.
 */

import { normalizeSymbol } from '@/core/universe';
import type { RawInstrumentEntry, RawUniverseFile } from '@/types/config';

export const IDX_LISTING_URL =
  'https://www.idx.co.id/umbraco/Surface/ListedCompany/GetListedCompany?emitenType=s';

export const CODE_PATTERN = /^[A-Z0-9]{2,6}$/;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function text(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function listingRows(payload: unknown): unknown[] {
  if (Array.isArray(payload)) return payload;
  if (isRecord(payload) && Array.isArray(payload.data)) return payload.data;
  return [];
}

/**
 * Accepts the endpoint's array of rows (or `{ data: rows }`) and returns
 * instruments sorted by symbol. Rows without a plausible ticker code are dropped.
 */
export function parseIdxListing(payload: unknown, exchangeSuffix: string = '.JK'): RawInstrumentEntry[] {
  const bySymbol = new Map<string, RawInstrumentEntry>();

  for (const row of listingRows(payload)) {
    if (!isRecord(row)) continue;
    const code = text(row.KodeEmiten).toUpperCase();
    if (!CODE_PATTERN.test(code)) continue;

    const symbol = normalizeSymbol(code, exchangeSuffix);
    const name = text(row.NamaEmiten) || text(row.NamaPerusahaan) || code;
    const sector = text(row.Sektor) || text(row.Sector);
    bySymbol.set(symbol, sector ? { symbol, name, sector } : { symbol, name });
  }

  return Array.from(bySymbol.values()).sort((a, b) => a.symbol.localeCompare(b.symbol));
}

export function buildUniverseFile(
  instruments: RawInstrumentEntry[],
  options: { name: string; description: string; exchangeSuffix?: string; version: string }
): RawUniverseFile {
  return {
    name: options.name,
    description: options.description,
    version: options.version,
    exchange_suffix: options.exchangeSuffix ?? '.JK',
    currency: 'IDR',
    instruments,
  };
}
