type FormatOptions = {
  signed?: boolean;
  decimals?: number;
};

export function formatPercent(
  value: number | null | undefined,
  opts: FormatOptions = {}
): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return "--";

  const decimals = opts.decimals ?? 2;
  const pct = `${Math.abs(value).toFixed(decimals)}%`;

  if (opts.signed) {
    const prefix = value > 0 ? "+" : value < 0 ? "-" : "";
    return `${prefix}${pct}`;
  }

  return `${value.toFixed(decimals)}%`;
}

/** Session change as shown in the results table: 2.04 -> "2.04%". */
export function formatChangePercent(value: number | null | undefined): string {
  return formatPercent(value, { decimals: 2 });
}
