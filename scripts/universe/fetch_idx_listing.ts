/**
 * Refreshes the full-exchange registry from the IDX listed-company endpoint,
 * or from a Yahoo autocomplete sweep when that listing is short or unavailable.
 *
 * Usage:
 *   npm run universe:refresh
 *   npm run universe:refresh -- --source=yahoo --out=config/universes/idx-all.json
 *
 * --source=auto (default) tries IDX first and sweeps Yahoo when it returns
 * fewer than 200 rows; --source=idx and --source=yahoo use one source only.
 *
 * Writes a universe pack that validates against schemas/universe.v1.schema.json.
 * Screening runs never call this; they only read the pack it leaves behind.
 */

import '../load_env';
import fs from 'fs';
import path from 'path';
import { formatDate } from '@/core/time';
import { buildUniverseFile, IDX_LISTING_URL, parseIdxListing } from '@/universe/idx_listing';
import { isListingSource, resolveListing, type ListingSource } from '@/universe/listing_source';
import { sweepYahooAutocomplete, YAHOO_AUTOCOMPLETE_URL } from '@/universe/yahoo_autocomplete';
import { validateUniverseFile } from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('fetch_idx_listing');

const DEFAULT_OUT = path.join('config', 'universes', 'idx-all.json');
const TIMEOUT_MS = Number(process.env.FETCH_TIMEOUT_MS || 15_000);

const AUTOCOMPLETE_TIMEOUT_MS = 10_000;
const USER_AGENT = 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36';

function flagValue(argv: string[], name: string): string | undefined {
  const flag = argv.find((a) => a.startsWith(`--${name}=`));
  return flag ? flag.slice(`--${name}=`.length) : undefined;
}

function parseSource(argv: string[]): ListingSource {
  const value = flagValue(argv, 'source') ?? 'auto';
  if (!isListingSource(value)) {
    throw new Error(`Unknown --source "${value}" (expected auto, idx or yahoo)`);
  }
  return value;
}

async function fetchListing(): Promise<unknown> {
  const res = await fetch(IDX_LISTING_URL, {
    signal: AbortSignal.timeout(TIMEOUT_MS),
    headers: {
      Accept: 'application/json',
      Referer: 'https://www.idx.co.id/',
      'User-Agent': USER_AGENT,
    },
  });
  if (!res.ok) {
    throw new Error(`IDX listing request failed: ${res.status}`);
  }
  return res.json();
}

async function fetchAutocomplete(query: string): Promise<unknown> {
  const res = await fetch(`${YAHOO_AUTOCOMPLETE_URL}${encodeURIComponent(query)}`, {
    signal: AbortSignal.timeout(AUTOCOMPLETE_TIMEOUT_MS),
    headers: { Accept: 'application/json', 'User-Agent': USER_AGENT },
  });
  if (!res.ok) {
    throw new Error(`Autocomplete request failed: ${res.status}`);
  }
  return res.json();
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const outPath = path.resolve(process.cwd(), flagValue(argv, 'out') ?? DEFAULT_OUT);
  const requested = parseSource(argv);

  const { source, instruments } = await resolveListing(requested, {
    idx: async () => parseIdxListing(await fetchListing()),
    yahoo: () => sweepYahooAutocomplete(fetchAutocomplete),
  });
  if (instruments.length === 0) {
    throw new Error(`The ${source} listing returned no usable rows`);
  }

  const universe = buildUniverseFile(instruments, {
    name: 'IDX All Listed',
    description: `Equities listed on the Indonesia Stock Exchange as of ${formatDate(new Date())} (source: ${source})`,
    version: formatDate(new Date()),
  });

  const validation = validateUniverseFile(universe);
  if (!validation.valid) {
    throw new Error(`Generated universe is invalid: ${validation.errors.join('; ')}`);
  }

  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, `${JSON.stringify(universe, null, 2)}\n`, 'utf-8');
  logger.info({ outPath, source, symbols: instruments.length }, 'Universe pack written');
}

main().catch((error: unknown) => {
  logger.error({ error }, 'Universe refresh failed');
  process.exitCode = 1;
});
