/**
 * Time utilities for consistent date handling
 */

import { format, getUnixTime, subDays } from 'date-fns';

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function getRunId(date: Date, hash: string): string {
  return `${formatDate(date)}__${hash.substring(0, 8)}`;
}

/** Unix-second bounds covering the last `days` calendar days up to `now`. */
export function lookbackWindow(days: number, now: Date = new Date()): { period1: number; period2: number } {
  return {
    period1: getUnixTime(subDays(now, days)),
    period2: getUnixTime(now),
  };
}

/**
 * Exchange-local trading date for a bar timestamp. Yahoo stamps daily bars at
 * the session open in UTC and reports the exchange offset separately.
 */
export function toTradingDate(epochSeconds: number, gmtOffsetSeconds: number = 0): string {
  return new Date((epochSeconds + gmtOffsetSeconds) * 1000).toISOString().slice(0, 10);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
