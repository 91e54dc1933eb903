import { createChildLogger } from '@/utils/logger';
import { toTradingDate } from '@/core/time';
import { resolveDisplayName } from '@/core/universe';
import { normalizeBars, type RawBar } from '../series';
import {
  assertLookbackDays,
  DataUnavailableError,
  type Instrument,
  type PriceSeries,
  type PriceSeriesFetcher,
} from '../types';
import { YahooChartClient } from './client';
import type { YahooChartResult } from './types';

const logger = createChildLogger('yahoo_provider');

export class YahooChartProvider implements PriceSeriesFetcher {
  constructor(private readonly client: YahooChartClient) {}

  async fetch(instrument: Instrument, lookbackDays: number): Promise<PriceSeries> {
    assertLookbackDays(lookbackDays);

    const result = await this.client.fetchChart(instrument.symbol, lookbackDays);
    const series = mapChartToSeries(instrument, result);

    if (series.bars.length < 2) {
      throw new DataUnavailableError(
        `Only ${series.bars.length} usable bar(s) returned`,
        'yahoo',
        instrument.symbol,
        'chart'
      );
    }

    logger.debug(
      { symbol: instrument.symbol, bars: series.bars.length, last: series.bars[series.bars.length - 1]?.date },
      'Fetched daily series'
    );
    return series;
  }

  getRequestCount(): number {
    return this.client.getRequestCount();
  }

  close(): void {
    // Stateless HTTP client, nothing to release
  }
}

export function mapChartToSeries(instrument: Instrument, result: YahooChartResult): PriceSeries {
  const timestamps = result.timestamp ?? [];
  const quote = result.indicators?.quote?.[0] ?? {};
  const gmtOffset = result.meta?.gmtoffset ?? 0;

  const raw: RawBar[] = timestamps.map((t, i) => ({
    date: toTradingDate(t, gmtOffset),
    open: quote.open?.[i],
    high: quote.high?.[i],
    low: quote.low?.[i],
    close: quote.close?.[i],
    volume: quote.volume?.[i],
  }));

  const name = resolveDisplayName(instrument, result.meta?.longName, result.meta?.shortName);

  return {
    instrument: { ...instrument, name },
    bars: normalizeBars(raw),
    currency: result.meta?.currency,
  };
}
