/**
 * Local-currency display with magnitude bands (Rp 20.81 M, Rp 1.25 T).
 */

export interface ScaleBand {
  divisor: number;
  suffix: string;
}

export interface CurrencyLocale {
  /** ISO 4217 code the registry and quotes use. */
  code: string;
  symbol: string;
  /** Largest first. */
  bands: ReadonlyArray<ScaleBand>;
  decimals: number;
  /** BCP 47 tag used to group digits below the smallest band. */
  groupingLocale: string;
}

/** Indonesian rupiah: triliun, miliar, juta. */
export const IDR_LOCALE: CurrencyLocale = {
  code: 'IDR',
  symbol: 'Rp',
  bands: [
    { divisor: 1_000_000_000_000, suffix: 'T' },
    { divisor: 1_000_000_000, suffix: 'M' },
    { divisor: 1_000_000, suffix: 'Jt' },
  ],
  decimals: 2,
  groupingLocale: 'en-US',
};

const SHORT_SCALE_BANDS: ReadonlyArray<ScaleBand> = [
  { divisor: 1_000_000_000_000, suffix: 'T' },
  { divisor: 1_000_000_000, suffix: 'B' },
  { divisor: 1_000_000, suffix: 'M' },
];

/** IDR gets the rupiah bands; any other code prints as "SGD 1.25 B". */
export function localeForCurrency(code: string): CurrencyLocale {
  const upper = code.trim().toUpperCase();
  if (upper === IDR_LOCALE.code) return IDR_LOCALE;
  return {
    code: upper,
    symbol: upper,
    bands: SHORT_SCALE_BANDS,
    decimals: 2,
    groupingLocale: 'en-US',
  };
}

const NON_FINITE = '--';

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Picks the largest band whose scaled value still rounds to at least 1, so a
 * value that would print as "1000.00 Jt" prints as "1.00 M" instead.
 * Values below every band print as a grouped integer.
 */
export function formatLocalCurrency(value: number, locale: CurrencyLocale = IDR_LOCALE): string {
  if (!Number.isFinite(value)) return NON_FINITE;
  const abs = Math.abs(value);
  const whole = Math.round(abs);
  if (whole === 0) return `${locale.symbol} 0`;

  const sign = value < 0 ? '-' : '';

  for (const band of locale.bands) {
    const scaled = roundTo(abs / band.divisor, locale.decimals);
    if (scaled >= 1) {
      return `${sign}${locale.symbol} ${scaled.toFixed(locale.decimals)} ${band.suffix}`;
    }
  }

  const plain = new Intl.NumberFormat(locale.groupingLocale, { maximumFractionDigits: 0 }).format(whole);
  return `${sign}${locale.symbol} ${plain}`;
}
