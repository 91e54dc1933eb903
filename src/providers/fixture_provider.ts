/**
 * Serves daily series from a JSON file instead of the network.
 *
 * File shape: { "BBCA.JK": { "name"?: string, "currency"?: string, "bars": RawBar[] } }
 * The lookback window is ignored; the file decides how many bars exist.
 */

import { readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { createChildLogger } from '@/utils/logger';
import { resolveDisplayName } from '@/core/universe';
import { normalizeBars, type RawBar } from './series';
import {
  assertLookbackDays,
  DataUnavailableError,
  type Instrument,
  type PriceSeries,
  type PriceSeriesFetcher,
} from './types';

const logger = createChildLogger('fixture_provider');

export interface FixtureEntry {
  name?: string;
  currency?: string;
  bars: RawBar[];
}

export type FixtureFile = Record<string, FixtureEntry>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const optionalNumber = (v: unknown): number | null => (typeof v === 'number' ? v : null);

function toRawBar(value: unknown): RawBar | null {
  if (!isRecord(value) || typeof value.date !== 'string') return null;
  return {
    date: value.date,
    open: optionalNumber(value.open),
    high: optionalNumber(value.high),
    low: optionalNumber(value.low),
    close: optionalNumber(value.close),
    volume: optionalNumber(value.volume),
  };
}

export function parseFixture(parsed: unknown, source: string = 'fixture'): FixtureFile {
  if (!isRecord(parsed)) {
    throw new Error(`Fixture must contain an object keyed by symbol: ${source}`);
  }
  const data: FixtureFile = {};
  for (const [symbol, value] of Object.entries(parsed)) {
    if (!isRecord(value) || !Array.isArray(value.bars)) {
      logger.warn({ symbol, source }, 'Skipping fixture entry without bars');
      continue;
    }
    data[symbol] = {
      name: typeof value.name === 'string' ? value.name : undefined,
      currency: typeof value.currency === 'string' ? value.currency : undefined,
      bars: value.bars.map(toRawBar).filter((bar): bar is RawBar => bar !== null),
    };
  }
  return data;
}

export class FixtureProvider implements PriceSeriesFetcher {
  private requestCount = 0;
  private readonly entries: Map<string, FixtureEntry>;

  constructor(data: FixtureFile) {
    this.entries = new Map(
      Object.entries(data).map(([symbol, entry]) => [symbol.trim().toUpperCase(), entry])
    );
  }

  static fromFile(filePath: string): FixtureProvider {
    const resolved = isAbsolute(filePath) ? filePath : join(process.cwd(), filePath);
    const data = parseFixture(JSON.parse(readFileSync(resolved, 'utf-8')), resolved);
    logger.info({ file: resolved, symbols: Object.keys(data).length }, 'Loaded series fixture');
    return new FixtureProvider(data);
  }

  async fetch(instrument: Instrument, lookbackDays: number): Promise<PriceSeries> {
    assertLookbackDays(lookbackDays);
    this.requestCount++;

    const entry = this.entries.get(instrument.symbol.toUpperCase());
    if (!entry) {
      throw new DataUnavailableError('Symbol not present in fixture', 'fixture', instrument.symbol, 'fetch');
    }

    const bars = normalizeBars(entry.bars);
    if (bars.length < 2) {
      throw new DataUnavailableError(
        `Only ${bars.length} usable bar(s) in fixture`,
        'fixture',
        instrument.symbol,
        'fetch'
      );
    }

    return {
      instrument: { ...instrument, name: resolveDisplayName(instrument, entry.name) },
      bars,
      currency: entry.currency,
    };
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  close(): void {
    this.entries.clear();
  }
}
