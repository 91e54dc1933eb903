/**
 * Response shape of the Yahoo Finance v8 chart endpoint (daily interval).
 * Every field is optional: the endpoint omits arrays for symbols without data.
 */

export interface YahooChartMeta {
  symbol?: string;
  currency?: string;
  exchangeName?: string;
  exchangeTimezoneName?: string;
  gmtoffset?: number;
  longName?: string;
  shortName?: string;
  regularMarketPrice?: number;
}

export interface YahooChartQuote {
  open?: Array<number | null>;
  high?: Array<number | null>;
  low?: Array<number | null>;
  close?: Array<number | null>;
  volume?: Array<number | null>;
}

export interface YahooChartResult {
  meta?: YahooChartMeta;
  timestamp?: number[];
  indicators?: {
    quote?: YahooChartQuote[];
  };
}

export interface YahooChartError {
  code?: string;
  description?: string;
}

export interface YahooChartResponse {
  chart?: {
    result?: YahooChartResult[] | null;
    error?: YahooChartError | null;
  };
}
