import type { PriceBar } from './types';

export interface RawBar {
  date: string;
  open?: number | null;
  high?: number | null;
  low?: number | null;
  close?: number | null;
  volume?: number | null;
}

const finite = (v: number | null | undefined): v is number =>
  typeof v === 'number' && Number.isFinite(v);

/**
 * Drops bars without a close, fills missing OHLC from the close and missing
 * volume with 0, then sorts ascending. When two bars share a date the later
 * one in input order wins (Yahoo appends the live session bar last).
 */
export function normalizeBars(raw: ReadonlyArray<RawBar>): PriceBar[] {
  const byDate = new Map<string, PriceBar>();

  for (const bar of raw) {
    if (!bar.date || !finite(bar.close)) continue;
    const close = bar.close;
    byDate.set(bar.date, {
      date: bar.date,
      open: finite(bar.open) ? bar.open : close,
      high: finite(bar.high) ? bar.high : close,
      low: finite(bar.low) ? bar.low : close,
      close,
      volume: finite(bar.volume) && bar.volume > 0 ? Math.round(bar.volume) : 0,
    });
  }

  return Array.from(byDate.values()).sort((a, b) => a.date.localeCompare(b.date));
}
