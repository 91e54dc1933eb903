import { describe, expect, it } from 'vitest';
import { formatChangePercent, formatPercent } from '@/lib/percent';

describe('formatPercent', () => {
  it('formats with two decimals by default', () => {
    expect(formatChangePercent(2.04)).toBe('2.04%');
    expect(formatChangePercent(-1.5)).toBe('-1.50%');
  });

  it('prints a sign when asked', () => {
    expect(formatPercent(1.234, { signed: true })).toBe('+1.23%');
    expect(formatPercent(-1.234, { signed: true })).toBe('-1.23%');
    expect(formatPercent(0, { signed: true })).toBe('0.00%');
  });

  it('honours the decimals option', () => {
    expect(formatPercent(2, { decimals: 0 })).toBe('2%');
  });

  it('prints a placeholder for missing values', () => {
    expect(formatChangePercent(null)).toBe('--');
    expect(formatChangePercent(undefined)).toBe('--');
    expect(formatChangePercent(Number.NaN)).toBe('--');
  });
});
