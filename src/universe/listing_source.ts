/**
 * Picks the listing source for a registry refresh. `auto` prefers the
 * exchange listing and falls back to the Yahoo sweep when it is short.
 */

import type { RawInstrumentEntry } from '@/types/config';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('listing_source');

export type ListingSource = 'auto' | 'idx' | 'yahoo';

export const LISTING_SOURCES: ReadonlyArray<ListingSource> = ['auto', 'idx', 'yahoo'];

/** Fewer IDX rows than this means the endpoint answered with a partial page. */
export const MIN_IDX_LISTING_ROWS = 200;

export interface ListingFetchers {
  idx: () => Promise<RawInstrumentEntry[]>;
  yahoo: () => Promise<RawInstrumentEntry[]>;
}

export interface ResolvedListing {
  source: Exclude<ListingSource, 'auto'>;
  instruments: RawInstrumentEntry[];
}

export function isListingSource(value: string): value is ListingSource {
  return LISTING_SOURCES.some((source) => source === value);
}

export async function resolveListing(source: ListingSource, fetchers: ListingFetchers): Promise<ResolvedListing> {
  if (source === 'idx') {
    return { source: 'idx', instruments: await fetchers.idx() };
  }
  if (source === 'yahoo') {
    return { source: 'yahoo', instruments: await fetchers.yahoo() };
  }

  let idxRows: RawInstrumentEntry[] = [];
  try {
    idxRows = await fetchers.idx();
  } catch (error) {
    logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'IDX listing unavailable');
  }
  if (idxRows.length >= MIN_IDX_LISTING_ROWS) {
    return { source: 'idx', instruments: idxRows };
  }

  logger.info({ rows: idxRows.length, minimum: MIN_IDX_LISTING_ROWS }, 'Falling back to the Yahoo autocomplete sweep');
  return { source: 'yahoo', instruments: await fetchers.yahoo() };
}
