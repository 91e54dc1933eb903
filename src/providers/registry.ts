import type { PriceSeriesFetcher } from './types';
import { getEnvConfig, type EnvConfig, type FetcherType } from '@/core/env';
import { FixtureProvider } from './fixture_provider';
import { YahooChartClient } from './yahoo/client';
import { YahooChartProvider } from './yahoo/provider';

/**
 * Create the price series fetcher based on ENV configuration.
 *
 * ENV:
 * - MARKET_DATA_PROVIDER: 'yahoo' | 'fixture'
 * - FIXTURE_FILE: JSON series file, required for 'fixture'
 *
 * Default: 'yahoo'
 */
export function createFetcher(
  fetcherType?: FetcherType,
  env: EnvConfig = getEnvConfig()
): PriceSeriesFetcher {
  const type = fetcherType || env.marketDataProvider;

  switch (type) {
    case 'yahoo':
      return new YahooChartProvider(
        new YahooChartClient({ baseUrl: env.yahooBaseUrl, timeoutMs: env.fetchTimeoutMs })
      );
    case 'fixture':
      if (!env.fixtureFile) {
        throw new Error('FIXTURE_FILE environment variable is required for the fixture provider');
      }
      return FixtureProvider.fromFile(env.fixtureFile);
    default:
      throw new Error(`Unknown provider type: ${String(type)}`);
  }
}
