type FormatOptions = {
  /** 'fraction' (default) treats 0.452 as 45.2%; 'percent' takes the value as already scaled. */
  scale?: 'fraction' | 'percent';
  signed?: boolean;
  decimals?: number;
};

export function toPercent(value: number | null | undefined, scale: FormatOptions['scale'] = 'fraction'): number | null {
  if (value === null || value === undefined || !Number.isFinite(value)) return null;
  return scale === 'fraction' ? value * 100 : value;
}

export function formatPercent(
  value: number | null | undefined,
  opts: FormatOptions = {}
): string {
  const pct = toPercent(value, opts.scale);
  if (pct === null) return '--';

  const decimals = opts.decimals ?? 1;

  if (opts.signed) {
    const prefix = pct > 0 ? '+' : pct < 0 ? '-' : '';
    return `${prefix}${Math.abs(pct).toFixed(decimals)}%`;
  }

  return `${pct.toFixed(decimals)}%`;
}
