/**
 * Environment variable handling with validation
 */

export type FetcherType = 'yahoo' | 'fixture';

export interface EnvConfig {
  marketDataProvider: FetcherType;
  yahooBaseUrl: string;
  fetchTimeoutMs: number;
  fixtureFile: string | null;
}

const DEFAULT_YAHOO_BASE_URL = 'https://query1.finance.yahoo.com';
const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

function getEnvVar(name: string, required: boolean = false): string | undefined {
  const value = process.env[name];
  if (required && !value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function parsePositiveInt(raw: string | undefined, fallback: number, name: string): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name}: expected a positive integer, got "${raw}"`);
  }
  return parsed;
}

export function loadEnvConfig(): EnvConfig {
  const providerRaw = getEnvVar('MARKET_DATA_PROVIDER');
  if (providerRaw && providerRaw !== 'yahoo' && providerRaw !== 'fixture') {
    throw new Error(`Unknown MARKET_DATA_PROVIDER: ${providerRaw}`);
  }
  const marketDataProvider: FetcherType = providerRaw === 'fixture' ? 'fixture' : 'yahoo';

  const yahooBaseUrl = (getEnvVar('YAHOO_BASE_URL') || DEFAULT_YAHOO_BASE_URL).replace(/\/+$/, '');

  return {
    marketDataProvider,
    yahooBaseUrl,
    fetchTimeoutMs: parsePositiveInt(getEnvVar('FETCH_TIMEOUT_MS'), DEFAULT_FETCH_TIMEOUT_MS, 'FETCH_TIMEOUT_MS'),
    fixtureFile: getEnvVar('FIXTURE_FILE', marketDataProvider === 'fixture') || null,
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}
