/**
 * Consecutive-session momentum filter.
 *
 * An instrument qualifies when each of the last N close-to-close changes is at
 * least `minDailyGainPct` and the last session's close x volume reaches
 * `minTradedValue`. Pure: the same series and criteria always give the same
 * answer.
 */

import { toDisplayCode } from '@/core/universe';
import { formatLocalCurrency, IDR_LOCALE, type CurrencyLocale } from '@/lib/currency';
import type { PriceSeries } from '@/providers/types';
import {
  DEFAULT_CRITERIA,
  MAX_CONSECUTIVE_DAYS,
  MIN_CONSECUTIVE_DAYS,
  type MomentumAssessment,
  type MomentumCriteria,
  type ScreeningResult,
} from './types';

// Changes are compared after rounding so 2.0000000000000062 meets a 2.0 threshold
const CHANGE_PRECISION = 8;

export function roundChange(value: number): number {
  const factor = 10 ** CHANGE_PRECISION;
  return Math.round(value * factor) / factor;
}

/** Percent change from `previous` to `current`; null when `previous` is not a positive number. */
export function percentChange(previous: number, current: number): number | null {
  if (!Number.isFinite(previous) || !Number.isFinite(current) || previous <= 0) {
    return null;
  }
  return roundChange(((current - previous) / previous) * 100);
}

export function resolveCriteria(criteria: Partial<MomentumCriteria> = {}): MomentumCriteria {
  const resolved: MomentumCriteria = {
    minDailyGainPct: criteria.minDailyGainPct ?? DEFAULT_CRITERIA.minDailyGainPct,
    minTradedValue: criteria.minTradedValue ?? DEFAULT_CRITERIA.minTradedValue,
    consecutiveDays: criteria.consecutiveDays ?? DEFAULT_CRITERIA.consecutiveDays,
  };
  if (
    !Number.isInteger(resolved.consecutiveDays) ||
    resolved.consecutiveDays < MIN_CONSECUTIVE_DAYS ||
    resolved.consecutiveDays > MAX_CONSECUTIVE_DAYS
  ) {
    throw new RangeError(
      `consecutiveDays must be an integer between ${MIN_CONSECUTIVE_DAYS} and ${MAX_CONSECUTIVE_DAYS}, got ${resolved.consecutiveDays}`
    );
  }
  if (!Number.isFinite(resolved.minDailyGainPct) || !Number.isFinite(resolved.minTradedValue)) {
    throw new RangeError('minDailyGainPct and minTradedValue must be finite numbers');
  }
  return resolved;
}

export function assessMomentum(
  series: PriceSeries,
  criteria: Partial<MomentumCriteria> = {}
): MomentumAssessment {
  const { minDailyGainPct, minTradedValue, consecutiveDays } = resolveCriteria(criteria);
  const bars = series.bars;
  const last = bars[bars.length - 1];

  const fail = (
    reason: MomentumAssessment['reason'],
    extra: Partial<MomentumAssessment> = {}
  ): MomentumAssessment => ({
    passed: false,
    reason,
    dailyChanges: [],
    tradedValue: null,
    lastClose: last?.close ?? null,
    asOf: last?.date ?? null,
    ...extra,
  });

  if (!last || bars.length < consecutiveDays + 1) {
    return fail('insufficient_bars');
  }

  const window = bars.slice(-(consecutiveDays + 1));
  const dailyChanges: number[] = [];
  for (let i = 1; i < window.length; i++) {
    const change = percentChange(window[i - 1].close, window[i].close);
    if (change === null || window[i].close <= 0) {
      return fail('malformed_series');
    }
    dailyChanges.push(change);
  }

  const tradedValue = last.close * last.volume;
  if (!Number.isFinite(tradedValue) || last.volume < 0) {
    return fail('malformed_series', { dailyChanges });
  }

  if (!dailyChanges.every((change) => change >= minDailyGainPct)) {
    return fail('below_gain_threshold', { dailyChanges, tradedValue });
  }

  if (tradedValue < minTradedValue) {
    return fail('below_traded_value', { dailyChanges, tradedValue });
  }

  return {
    passed: true,
    reason: 'passed',
    dailyChanges,
    tradedValue,
    lastClose: last.close,
    asOf: last.date,
  };
}

export function toScreeningResult(
  series: PriceSeries,
  assessment: MomentumAssessment,
  locale: CurrencyLocale = IDR_LOCALE
): ScreeningResult | null {
  const { dailyChanges, tradedValue, lastClose, asOf } = assessment;
  if (!assessment.passed || tradedValue === null || lastClose === null || asOf === null) {
    return null;
  }
  const n = dailyChanges.length;
  const { instrument } = series;
  return {
    symbol: instrument.symbol,
    code: toDisplayCode(instrument.symbol),
    name: instrument.name,
    sector: instrument.sector ?? null,
    asOf,
    lastClose,
    changeDay1: dailyChanges[n - 1],
    changeDay2: dailyChanges[n - 2],
    dailyChanges,
    tradedValue,
    tradedValueFormatted: formatLocalCurrency(tradedValue, locale),
  };
}

/** The qualifying row for `series`, or null when it does not pass. */
export function evaluateMomentum(
  series: PriceSeries,
  criteria: Partial<MomentumCriteria> = {},
  locale: CurrencyLocale = IDR_LOCALE
): ScreeningResult | null {
  return toScreeningResult(series, assessMomentum(series, criteria), locale);
}
