/**
 * On-disk configuration shapes, validated against schemas/*.schema.json
 */

export interface RawInstrumentEntry {
  symbol: string;
  name?: string;
  sector?: string;
}

export interface RawUniverseFile {
  name: string;
  description?: string;
  version?: string;
  exchange_suffix?: string;
  currency?: string;
  instruments?: RawInstrumentEntry[];
  symbols?: string[];
}

export interface RawScreeningFile {
  criteria?: {
    min_daily_gain_pct?: number;
    min_traded_value?: number;
    consecutive_days?: number;
  };
  fetch?: {
    lookback_days?: number;
    indicator_lookback_days?: number;
    max_concurrency?: number;
    max_retries?: number;
    retry_backoff_ms?: number;
    throttle_ms?: number;
    batch_size?: number;
    batch_pause_ms?: number;
  };
  include_indicators?: boolean;
  max_symbols?: number | null;
}
