import { describe, expect, it } from 'vitest';
import {
  assessMomentum,
  evaluateMomentum,
  percentChange,
  resolveCriteria,
  roundChange,
} from '@/screening/momentum';
import { makeSeries, sessionDate } from '../helpers/series';

describe('percentChange', () => {
  it('returns the close-to-close change in percent', () => {
    expect(percentChange(100, 102)).toBe(2);
    expect(percentChange(200, 190)).toBe(-5);
  });

  it('absorbs float noise at the threshold', () => {
    // (104.04 - 102) / 102 * 100 is 2.0000000000000062 before rounding
    expect(percentChange(102, 104.04)).toBe(2);
    expect(roundChange(1.999999999999)).toBe(2);
  });

  it('returns null for a non-positive or non-finite previous close', () => {
    expect(percentChange(0, 10)).toBeNull();
    expect(percentChange(-1, 10)).toBeNull();
    expect(percentChange(Number.NaN, 10)).toBeNull();
    expect(percentChange(10, Number.POSITIVE_INFINITY)).toBeNull();
  });
});

describe('resolveCriteria', () => {
  it('fills defaults', () => {
    expect(resolveCriteria()).toEqual({
      minDailyGainPct: 2,
      minTradedValue: 15_000_000_000,
      consecutiveDays: 2,
    });
  });

  it('rejects a session count outside 2..5', () => {
    expect(() => resolveCriteria({ consecutiveDays: 1 })).toThrow(RangeError);
    expect(() => resolveCriteria({ consecutiveDays: 6 })).toThrow(RangeError);
    expect(() => resolveCriteria({ consecutiveDays: 2.5 })).toThrow(RangeError);
  });

  it('rejects non-finite thresholds', () => {
    expect(() => resolveCriteria({ minTradedValue: Number.NaN })).toThrow(RangeError);
  });
});

describe('assessMomentum', () => {
  it('passes two 2% sessions with enough traded value', () => {
    const series = makeSeries([100, 100, 102, 104.04], 200_000_000);

    const assessment = assessMomentum(series);

    expect(assessment.passed).toBe(true);
    expect(assessment.reason).toBe('passed');
    expect(assessment.dailyChanges).toEqual([2, 2]);
    expect(assessment.tradedValue).toBeCloseTo(20_808_000_000, 0);
    expect(assessment.lastClose).toBe(104.04);
    expect(assessment.asOf).toBe(sessionDate(3));
  });

  it('rejects when one session gains less than the threshold', () => {
    const assessment = assessMomentum(makeSeries([100, 100, 101.5, 103], 1_000_000_000));

    expect(assessment.passed).toBe(false);
    expect(assessment.reason).toBe('below_gain_threshold');
    expect(assessment.dailyChanges[0]).toBe(1.5);
  });

  it('rejects a qualifying price move on thin turnover', () => {
    const assessment = assessMomentum(makeSeries([50, 51, 52.02], 1_000_000));

    expect(assessment.reason).toBe('below_traded_value');
    expect(assessment.dailyChanges).toEqual([2, 2]);
    expect(assessment.tradedValue).toBeCloseTo(52_020_000, 0);
  });

  it('treats both thresholds as inclusive', () => {
    const series = makeSeries([2500, 2550, 2601], 1000);

    const assessment = assessMomentum(series, { minTradedValue: 2_601_000 });

    expect(assessment.dailyChanges).toEqual([2, 2]);
    expect(assessment.tradedValue).toBe(2_601_000);
    expect(assessment.passed).toBe(true);
  });

  it('accepts traded value exactly at the default minimum', () => {
    const assessment = assessMomentum(makeSeries([100, 110, 125], 120_000_000));

    expect(assessment.tradedValue).toBe(15_000_000_000);
    expect(assessment.passed).toBe(true);
  });

  it('rejects 1.99% against a 2% threshold', () => {
    const assessment = assessMomentum(makeSeries([100, 101.99, 110], 1_000_000_000));

    expect(assessment.dailyChanges[0]).toBe(1.99);
    expect(assessment.reason).toBe('below_gain_threshold');
  });

  it('needs one more bar than the session count', () => {
    const assessment = assessMomentum(makeSeries([100, 102]));

    expect(assessment.passed).toBe(false);
    expect(assessment.reason).toBe('insufficient_bars');
    expect(assessment.dailyChanges).toEqual([]);
    expect(assessment.lastClose).toBe(102);
    expect(assessment.asOf).toBe(sessionDate(1));
  });

  it('reports an empty series as insufficient', () => {
    const assessment = assessMomentum({ instrument: { symbol: 'NONE.JK', name: 'None' }, bars: [] });

    expect(assessment.reason).toBe('insufficient_bars');
    expect(assessment.lastClose).toBeNull();
    expect(assessment.asOf).toBeNull();
  });

  it('flags non-positive and non-finite closes as malformed', () => {
    expect(assessMomentum(makeSeries([100, 0, 102])).reason).toBe('malformed_series');
    expect(assessMomentum(makeSeries([100, -5, 102])).reason).toBe('malformed_series');
    expect(assessMomentum(makeSeries([100, Number.NaN, 102])).reason).toBe('malformed_series');
  });

  it('flags a negative last volume as malformed', () => {
    const assessment = assessMomentum(makeSeries([100, 102, 104.04], [1, 1, -1]));

    expect(assessment.reason).toBe('malformed_series');
  });

  it('only looks at the last N sessions', () => {
    // 100 -> 101 is 1%, but it falls outside a two-session window
    const closes = [100, 101, 103.02, 105.0804];

    expect(assessMomentum(makeSeries(closes), { consecutiveDays: 2 }).passed).toBe(true);
    expect(assessMomentum(makeSeries(closes), { consecutiveDays: 3 }).reason).toBe(
      'below_gain_threshold'
    );
  });

  it('checks every session for longer streaks', () => {
    const assessment = assessMomentum(makeSeries([100, 102, 104.04, 106.1208]), {
      consecutiveDays: 3,
    });

    expect(assessment.passed).toBe(true);
    expect(assessment.dailyChanges).toEqual([2, 2, 2]);
  });

  it('gives the same answer for the same input', () => {
    const series = makeSeries([100, 100, 102, 104.04]);

    expect(assessMomentum(series)).toEqual(assessMomentum(series));
  });
});

describe('evaluateMomentum', () => {
  it('builds the display row for a qualifying instrument', () => {
    const series = makeSeries([100, 100, 102, 104.04], 200_000_000, {
      symbol: 'BBCA.JK',
      name: 'Bank Central Asia Tbk.',
      sector: 'Financials',
    });

    const result = evaluateMomentum(series);

    expect(result).not.toBeNull();
    expect(result?.symbol).toBe('BBCA.JK');
    expect(result?.code).toBe('BBCA');
    expect(result?.name).toBe('Bank Central Asia Tbk.');
    expect(result?.sector).toBe('Financials');
    expect(result?.asOf).toBe(sessionDate(3));
    expect(result?.changeDay1).toBe(2);
    expect(result?.changeDay2).toBe(2);
    expect(result?.tradedValueFormatted).toBe('Rp 20.81 M');
  });

  it('returns null when the instrument does not qualify', () => {
    expect(evaluateMomentum(makeSeries([100, 100, 101.5, 103]))).toBeNull();
  });

  it('uses the most recent change as day 1', () => {
    const result = evaluateMomentum(makeSeries([100, 103, 108.15], 1_000_000_000));

    expect(result?.changeDay2).toBe(3);
    expect(result?.changeDay1).toBe(5);
    expect(result?.sector).toBeNull();
  });
});
