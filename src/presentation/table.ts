/**
 * Turns screening results into display tables: aligned text for the terminal
 * and CSV for export.
 */

import { formatChangePercent } from '@/lib/percent';
import type { ScreeningResult, TechnicalIndicators } from '@/screening/types';

export interface DisplayTable {
  headers: string[];
  rows: string[][];
}

const NOT_AVAILABLE = 'N/A';

const priceFormatter = new Intl.NumberFormat('en-US', { maximumFractionDigits: 2 });

export function formatPrice(value: number): string {
  return Number.isFinite(value) ? priceFormatter.format(value) : NOT_AVAILABLE;
}

function formatIndicator(value: number | null): string {
  return value === null || !Number.isFinite(value) ? NOT_AVAILABLE : value.toFixed(2);
}

/** "Day -2", "Day -1" for two sessions; oldest first like the changes themselves. */
export function changeHeaders(sessions: number): string[] {
  return Array.from({ length: sessions }, (_, i) => `Day -${sessions - i}`);
}

const INDICATOR_COLUMNS: Array<[string, keyof TechnicalIndicators]> = [
  ['RSI (14)', 'rsi14'],
  ['SMA (20)', 'sma20'],
  ['EMA (20)', 'ema20'],
  ['Volume Trend (%)', 'volumeTrendPct'],
];

export function toDisplayTable(results: ReadonlyArray<ScreeningResult>): DisplayTable {
  const sessions = results.reduce((max, r) => Math.max(max, r.dailyChanges.length), 0);
  const withIndicators = results.some((r) => r.indicators !== undefined);

  const headers = ['Code', 'Name', 'Last Close', ...changeHeaders(sessions), 'Traded Value'];
  if (withIndicators) {
    headers.push(...INDICATOR_COLUMNS.map(([label]) => label));
  }

  const rows = results.map((r) => {
    const padding = sessions - r.dailyChanges.length;
    const changes = [
      ...Array.from({ length: padding }, () => NOT_AVAILABLE),
      ...r.dailyChanges.map(formatChangePercent),
    ];
    const row = [r.code, r.name, formatPrice(r.lastClose), ...changes, r.tradedValueFormatted];
    if (withIndicators) {
      const indicators = r.indicators;
      row.push(
        ...INDICATOR_COLUMNS.map(([, key]) => formatIndicator(indicators ? indicators[key] : null))
      );
    }
    return row;
  });

  return { headers, rows };
}

/** Left-aligned text columns separated by two spaces, with a dashed rule under the header. */
export function renderTable(table: DisplayTable): string {
  const widths = table.headers.map((header, col) =>
    Math.max(header.length, ...table.rows.map((row) => (row[col] ?? '').length))
  );
  const line = (cells: string[]) =>
    cells
      .map((cell, col) => cell.padEnd(widths[col]))
      .join('  ')
      .trimEnd();

  return [
    line(table.headers),
    line(widths.map((w) => '-'.repeat(w))),
    ...table.rows.map(line),
  ].join('\n');
}

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * CSV with raw numbers (not the display strings) so spreadsheets can sort
 * by them. Sessions are numbered like the table headers.
 */
export function renderCsv(results: ReadonlyArray<ScreeningResult>): string {
  const sessions = results.reduce((max, r) => Math.max(max, r.dailyChanges.length), 0);
  const withIndicators = results.some((r) => r.indicators !== undefined);

  const headers = [
    'symbol',
    'code',
    'name',
    'sector',
    'as_of',
    'last_close',
    ...Array.from({ length: sessions }, (_, i) => `change_day_${sessions - i}_pct`),
    'traded_value',
    'traded_value_formatted',
  ];
  if (withIndicators) {
    headers.push('rsi14', 'sma20', 'ema20', 'volume_trend_pct');
  }

  const lines = results.map((r) => {
    const padding = sessions - r.dailyChanges.length;
    const fields = [
      r.symbol,
      r.code,
      r.name,
      r.sector ?? '',
      r.asOf,
      String(r.lastClose),
      ...Array.from({ length: padding }, () => ''),
      ...r.dailyChanges.map((c) => c.toFixed(4)),
      String(r.tradedValue),
      r.tradedValueFormatted,
    ];
    if (withIndicators) {
      const ind = r.indicators;
      fields.push(
        ...[ind?.rsi14, ind?.sma20, ind?.ema20, ind?.volumeTrendPct].map((v) =>
          v === null || v === undefined ? '' : String(v)
        )
      );
    }
    return fields.map(escapeCsvField).join(',');
  });

  return [headers.join(','), ...lines].join('\n') + '\n';
}
