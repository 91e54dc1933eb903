/**
 * Technical indicators attached to qualifying rows on request.
 * Exponential averages are seeded with the first value (no bias adjustment).
 */

import type { PriceBar } from '@/providers/types';
import type { TechnicalIndicators } from './types';

/** Exponentially weighted mean with smoothing factor `alpha`, seeded with values[0]. */
export function exponentialMean(values: ReadonlyArray<number>, alpha: number): number[] {
  const out: number[] = [];
  let prev: number | null = null;
  for (const value of values) {
    prev = prev === null ? value : alpha * value + (1 - alpha) * prev;
    out.push(prev);
  }
  return out;
}

export function calculateSma(closes: ReadonlyArray<number>, period: number = 20): number | null {
  if (closes.length < period) return null;
  const window = closes.slice(-period);
  return window.reduce((sum, v) => sum + v, 0) / period;
}

export function calculateEma(closes: ReadonlyArray<number>, period: number = 20): number | null {
  if (closes.length < period) return null;
  const ema = exponentialMean(closes, 2 / (period + 1));
  return ema[ema.length - 1] ?? null;
}

/**
 * Wilder RSI over the whole series. Returns 100 when there are only gains,
 * 0 when there are only losses and 50 for a flat series.
 */
export function calculateRsi(closes: ReadonlyArray<number>, period: number = 14): number | null {
  if (closes.length < period + 1) return null;

  const gains: number[] = [0];
  const losses: number[] = [0];
  for (let i = 1; i < closes.length; i++) {
    const delta = closes[i] - closes[i - 1];
    gains.push(delta > 0 ? delta : 0);
    losses.push(delta < 0 ? -delta : 0);
  }

  const alpha = 1 / period;
  const avgGain = exponentialMean(gains, alpha).pop() ?? 0;
  const avgLoss = exponentialMean(losses, alpha).pop() ?? 0;

  if (avgLoss === 0) return avgGain > 0 ? 100 : 50;
  if (avgGain === 0) return 0;

  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

/** Average volume of the last `period` sessions against the `period` before, in percent. */
export function calculateVolumeTrend(volumes: ReadonlyArray<number>, period: number = 5): number | null {
  if (volumes.length < period * 2) return null;
  const recent = volumes.slice(-period);
  const previous = volumes.slice(-period * 2, -period);
  const recentAvg = recent.reduce((sum, v) => sum + v, 0) / period;
  const previousAvg = previous.reduce((sum, v) => sum + v, 0) / period;
  if (previousAvg === 0) return null;
  return ((recentAvg - previousAvg) / previousAvg) * 100;
}

export function calculateIndicators(bars: ReadonlyArray<PriceBar>): TechnicalIndicators {
  const closes = bars.map((b) => b.close);
  const volumes = bars.map((b) => b.volume);
  return {
    rsi14: calculateRsi(closes, 14),
    sma20: calculateSma(closes, 20),
    ema20: calculateEma(closes, 20),
    volumeTrendPct: calculateVolumeTrend(volumes, 5),
  };
}
