import { describe, expect, it, vi } from 'vitest';
import {
  AUTOCOMPLETE_QUERIES,
  parseYahooAutocomplete,
  sweepYahooAutocomplete,
} from '@/universe/yahoo_autocomplete';
import { RequestThrottler } from '@/utils/throttler';

const payload = (items: unknown[]) => ({ ResultSet: { Query: 'b', Result: items } });

describe('parseYahooAutocomplete', () => {
  it('keeps Jakarta listings only', () => {
    const parsed = parseYahooAutocomplete(
      payload([
        { symbol: 'BBCA.JK', name: 'Bank Central Asia Tbk', exch: 'JKT' },
        { symbol: 'tlkm', name: 'Telkom Indonesia', exch: 'jkt' },
        { symbol: 'AAPL', name: 'Apple Inc.', exch: 'NMS' },
        { symbol: 'D05.SI', name: 'DBS Group', exch: 'SES' },
        { symbol: 'BBCA.JK', name: 'Duplicate', exch: 'JKT' },
        { symbol: 'GOTO.JK', exch: 'JKT' },
        { symbol: '^JKSE', name: 'IDX Composite', exch: 'JKT' },
        'junk',
      ])
    );

    expect(parsed).toEqual([
      { symbol: 'BBCA.JK', name: 'Bank Central Asia Tbk' },
      { symbol: 'GOTO.JK', name: 'GOTO' },
      { symbol: 'TLKM.JK', name: 'Telkom Indonesia' },
    ]);
  });

  it('returns nothing for an unexpected payload', () => {
    expect(parseYahooAutocomplete({ error: 'throttled' })).toEqual([]);
    expect(parseYahooAutocomplete({ ResultSet: { Result: 'none' } })).toEqual([]);
    expect(parseYahooAutocomplete(undefined)).toEqual([]);
  });
});

describe('sweepYahooAutocomplete', () => {
  it('queries every letter and digit by default', () => {
    expect(AUTOCOMPLETE_QUERIES).toHaveLength(36);
    expect(AUTOCOMPLETE_QUERIES[0]).toBe('A');
    expect(AUTOCOMPLETE_QUERIES[35]).toBe('9');
  });

  it('merges the queries in order and skips the ones that fail', async () => {
    const responses: Record<string, unknown> = {
      A: payload([
        { symbol: 'ADRO.JK', name: 'Alamtri Resources Indonesia', exch: 'JKT' },
        { symbol: 'ASII.JK', name: 'Astra International', exch: 'JKT' },
      ]),
      C: payload([
        { symbol: 'CPIN.JK', name: 'Charoen Pokphand Indonesia', exch: 'JKT' },
        { symbol: 'ASII.JK', name: 'Astra (again)', exch: 'JKT' },
      ]),
    };
    const fetchQuery = vi.fn(async (query: string): Promise<unknown> => {
      if (query === 'B') throw new Error('Autocomplete request failed: 503');
      return responses[query];
    });

    const instruments = await sweepYahooAutocomplete(fetchQuery, {
      queries: ['A', 'B', 'C'],
      throttler: new RequestThrottler({ minIntervalMs: 0 }),
    });

    expect(fetchQuery.mock.calls.map(([query]) => query)).toEqual(['A', 'B', 'C']);
    expect(instruments).toEqual([
      { symbol: 'ADRO.JK', name: 'Alamtri Resources Indonesia' },
      { symbol: 'ASII.JK', name: 'Astra International' },
      { symbol: 'CPIN.JK', name: 'Charoen Pokphand Indonesia' },
    ]);
  });
});
