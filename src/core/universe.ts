/**
 * Symbol helpers for the instrument registry
 */

import type { Instrument } from '@/providers/types';

/** Upper-cases, trims and appends the exchange suffix when the symbol has none. */
export function normalizeSymbol(symbol: string, exchangeSuffix: string = ''): string {
  const upper = symbol.trim().toUpperCase();
  if (!upper || !exchangeSuffix || upper.includes('.')) return upper;
  return `${upper}${exchangeSuffix.toUpperCase()}`;
}

/** Ticker without its exchange suffix: "BBCA.JK" -> "BBCA". */
export function toDisplayCode(symbol: string): string {
  const dot = symbol.indexOf('.');
  return dot > 0 ? symbol.slice(0, dot) : symbol;
}

/**
 * Registry name when it is a real name, else the first non-empty candidate
 * (provider metadata), else the ticker code.
 */
export function resolveDisplayName(
  instrument: Instrument,
  ...candidates: Array<string | null | undefined>
): string {
  const code = toDisplayCode(instrument.symbol);
  const registryName = instrument.name.trim();
  if (registryName && registryName !== code) return registryName;
  const candidate = candidates.find((c) => typeof c === 'string' && c.trim() !== '');
  return candidate?.trim() ?? code;
}
