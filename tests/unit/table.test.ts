import { describe, expect, it } from 'vitest';
import {
  changeHeaders,
  escapeCsvField,
  formatPrice,
  renderCsv,
  renderTable,
  toDisplayTable,
} from '@/presentation/table';
import type { ScreeningResult } from '@/screening/types';

function makeResult(overrides: Partial<ScreeningResult> = {}): ScreeningResult {
  return {
    symbol: 'BBCA.JK',
    code: 'BBCA',
    name: 'Bank Central Asia Tbk.',
    sector: 'Financials',
    asOf: '2026-10-15',
    lastClose: 10200,
    changeDay1: 2,
    changeDay2: 2.04,
    dailyChanges: [2.04, 2],
    tradedValue: 816_000_000_000,
    tradedValueFormatted: 'Rp 816.00 M',
    ...overrides,
  };
}

describe('toDisplayTable', () => {
  it('lays out code, name, close, session changes and traded value', () => {
    const table = toDisplayTable([makeResult()]);

    expect(table.headers).toEqual(['Code', 'Name', 'Last Close', 'Day -2', 'Day -1', 'Traded Value']);
    expect(table.rows).toEqual([
      ['BBCA', 'Bank Central Asia Tbk.', '10,200', '2.04%', '2.00%', 'Rp 816.00 M'],
    ]);
  });

  it('widens to the longest streak and pads shorter rows', () => {
    const table = toDisplayTable([
      makeResult({ dailyChanges: [3, 2.5, 2] }),
      makeResult({ symbol: 'TLKM.JK', code: 'TLKM' }),
    ]);

    expect(table.headers.slice(3, 6)).toEqual(['Day -3', 'Day -2', 'Day -1']);
    expect(table.rows[1].slice(3, 6)).toEqual(['N/A', '2.04%', '2.00%']);
  });

  it('adds indicator columns when any row carries them', () => {
    const table = toDisplayTable([
      makeResult({ indicators: { rsi14: 71.234, sma20: null, ema20: 100.5, volumeTrendPct: -12.5 } }),
      makeResult({ symbol: 'TLKM.JK', code: 'TLKM' }),
    ]);

    expect(table.headers.slice(-4)).toEqual(['RSI (14)', 'SMA (20)', 'EMA (20)', 'Volume Trend (%)']);
    expect(table.rows[0].slice(-4)).toEqual(['71.23', 'N/A', '100.50', '-12.50']);
    expect(table.rows[1].slice(-4)).toEqual(['N/A', 'N/A', 'N/A', 'N/A']);
  });
});

describe('renderTable', () => {
  it('aligns columns under a dashed rule', () => {
    const text = renderTable({
      headers: ['Code', 'Name'],
      rows: [
        ['A', 'Alpha'],
        ['BBCA', 'B'],
      ],
    });

    expect(text.split('\n')).toEqual(['Code  Name', '----  -----', 'A     Alpha', 'BBCA  B']);
  });
});

describe('formatters', () => {
  it('formatPrice groups thousands and keeps up to two decimals', () => {
    expect(formatPrice(10200)).toBe('10,200');
    expect(formatPrice(104.04)).toBe('104.04');
    expect(formatPrice(Number.NaN)).toBe('N/A');
  });

  it('changeHeaders counts back to the latest session', () => {
    expect(changeHeaders(2)).toEqual(['Day -2', 'Day -1']);
  });
});

describe('renderCsv', () => {
  it('writes raw numbers with a header row', () => {
    expect(renderCsv([makeResult()]).split('\n')).toEqual([
      'symbol,code,name,sector,as_of,last_close,change_day_2_pct,change_day_1_pct,traded_value,traded_value_formatted',
      'BBCA.JK,BBCA,Bank Central Asia Tbk.,Financials,2026-10-15,10200,2.0400,2.0000,816000000000,Rp 816.00 M',
      '',
    ]);
  });

  it('quotes fields with commas and quotes', () => {
    const csv = renderCsv([makeResult({ name: 'Say "Hi", Tbk.', sector: null })]);

    expect(csv.split('\n')[1]).toBe(
      'BBCA.JK,BBCA,"Say ""Hi"", Tbk.",,2026-10-15,10200,2.0400,2.0000,816000000000,Rp 816.00 M'
    );
  });

  it('writes only the header for an empty run', () => {
    expect(renderCsv([])).toBe(
      'symbol,code,name,sector,as_of,last_close,traded_value,traded_value_formatted\n'
    );
  });

  it('escapeCsvField leaves plain values alone', () => {
    expect(escapeCsvField('plain')).toBe('plain');
    expect(escapeCsvField('two\nlines')).toBe('"two\nlines"');
  });
});
