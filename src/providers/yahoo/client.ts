/**
 * Yahoo Finance chart API client
 * One request per call; retrying is left to the screening run.
 */

import { createChildLogger } from '@/utils/logger';
import { lookbackWindow } from '@/core/time';
import { DataUnavailableError, TransientFetchError } from '../types';
import type { YahooChartResponse, YahooChartResult } from './types';

const logger = createChildLogger('yahoo');

const PROVIDER = 'yahoo';
const METHOD = 'chart';

// Statuses Yahoo answers with for unknown or malformed symbols
const NOT_FOUND_STATUSES = new Set([400, 404, 422]);

export interface YahooChartClientOptions {
  baseUrl: string;
  timeoutMs: number;
  now?: () => Date;
}

export class YahooChartClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly now: () => Date;
  private requestCount = 0;

  constructor(options: YahooChartClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? (() => new Date());
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  buildChartUrl(symbol: string, lookbackDays: number): URL {
    const { period1, period2 } = lookbackWindow(lookbackDays, this.now());
    const url = new URL(`${this.baseUrl}/v8/finance/chart/${encodeURIComponent(symbol)}`);
    url.searchParams.set('period1', String(period1));
    url.searchParams.set('period2', String(period2));
    url.searchParams.set('interval', '1d');
    url.searchParams.set('events', 'history');
    url.searchParams.set('includePrePost', 'false');
    return url;
  }

  async fetchChart(symbol: string, lookbackDays: number): Promise<YahooChartResult> {
    const url = this.buildChartUrl(symbol, lookbackDays);

    let response: Response;
    try {
      this.requestCount++;
      response = await fetch(url.toString(), {
        signal: AbortSignal.timeout(this.timeoutMs),
        headers: {
          Accept: 'application/json',
          'User-Agent': 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36',
        },
      });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      if (err.name === 'TimeoutError' || err.name === 'AbortError') {
        throw new TransientFetchError(
          `Request timed out after ${this.timeoutMs}ms`,
          PROVIDER,
          symbol,
          METHOD,
          err
        );
      }
      throw new TransientFetchError(`Network error: ${err.message}`, PROVIDER, symbol, METHOD, err);
    }

    if (!response.ok) {
      const detail = await readErrorDescription(response);
      const message = `Yahoo chart error: ${response.status}${detail ? ` ${detail}` : ''}`;
      if (NOT_FOUND_STATUSES.has(response.status)) {
        throw new DataUnavailableError(message, PROVIDER, symbol, METHOD);
      }
      logger.warn({ symbol, status: response.status }, 'Yahoo chart request failed');
      throw new TransientFetchError(message, PROVIDER, symbol, METHOD, undefined, response.status);
    }

    let body: YahooChartResponse;
    try {
      body = (await response.json()) as YahooChartResponse;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      throw new TransientFetchError('Unparsable chart response', PROVIDER, symbol, METHOD, err);
    }

    const chartError = body.chart?.error;
    if (chartError) {
      throw new DataUnavailableError(
        `Yahoo chart error: ${chartError.description ?? chartError.code ?? 'unknown'}`,
        PROVIDER,
        symbol,
        METHOD
      );
    }

    const result = body.chart?.result?.[0];
    if (!result) {
      throw new DataUnavailableError('No chart data returned', PROVIDER, symbol, METHOD);
    }
    return result;
  }
}

async function readErrorDescription(response: Response): Promise<string | null> {
  try {
    const body = (await response.json()) as YahooChartResponse;
    return body.chart?.error?.description ?? null;
  } catch {
    return null;
  }
}
