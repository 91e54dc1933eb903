/**
 * Shared types and interfaces for market data providers.
 *
 * Providers implement `PriceSeriesFetcher` so the screening run can ask for a
 * daily series without knowing whether it comes from the Yahoo chart API or a
 * local fixture file.
 */

export interface Instrument {
  readonly symbol: string;
  readonly name: string;
  readonly sector?: string;
}

export interface PriceBar {
  readonly date: string;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

export interface PriceSeries {
  readonly instrument: Instrument;
  readonly bars: ReadonlyArray<PriceBar>;
  readonly currency?: string;
}

export interface PriceSeriesFetcher {
  /**
   * Daily bars ordered oldest to newest and unique by date.
   * Rejects with `DataUnavailableError` or `TransientFetchError`.
   */
  fetch(instrument: Instrument, lookbackDays: number): Promise<PriceSeries>;
  getRequestCount(): number;
  close(): void;
}

export const MIN_LOOKBACK_DAYS = 2;

export class ProviderError extends Error {
  constructor(
    message: string,
    public provider: string,
    public symbol: string,
    public method: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

/** The source has no usable series for the symbol (delisted, bad suffix, < 2 bars). */
export class DataUnavailableError extends ProviderError {
  constructor(message: string, provider: string, symbol: string, method: string, cause?: Error) {
    super(message, provider, symbol, method, cause);
    this.name = 'DataUnavailableError';
  }
}

/** Network failure, rate limit, upstream 5xx or timeout. Worth one more try. */
export class TransientFetchError extends ProviderError {
  constructor(
    message: string,
    provider: string,
    symbol: string,
    method: string,
    cause?: Error,
    public status?: number
  ) {
    super(message, provider, symbol, method, cause);
    this.name = 'TransientFetchError';
  }
}

export function assertLookbackDays(lookbackDays: number): void {
  if (!Number.isInteger(lookbackDays) || lookbackDays < MIN_LOOKBACK_DAYS) {
    throw new RangeError(
      `lookbackDays must be an integer >= ${MIN_LOOKBACK_DAYS}, got ${lookbackDays}`
    );
  }
}
