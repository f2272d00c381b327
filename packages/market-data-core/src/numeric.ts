/**
 * Fixed-point price helpers and display formatting.
 *
 * Prices travel as numbers rounded to cents. Comparisons that must be exact
 * (drop classification, highs and lows) go through integer cents.
 */

/**
 * Converts a price to integer cents.
 *
 * @example
 * ```typescript
 * toCents(103.25); // 10325
 * ```
 */
export function toCents(price: number): number {
  return Math.round(price * 100);
}

/**
 * Rounds a price to the nearest cent.
 */
export function roundToCents(price: number): number {
  return toCents(price) / 100;
}

/**
 * Fixed two-decimal rendering used for storage and display.
 */
export function formatPrice(price: number): string {
  return price.toFixed(2);
}

/**
 * Renders a percentage as `"4.00%"` / `"-4.81%"`. No leading plus sign.
 */
export function formatPercent(pct: number): string {
  return `${pct.toFixed(2)}%`;
}

/**
 * Percentage move of `current` against `previous`, or `""` when there is no
 * usable predecessor (`previous` missing or not positive).
 *
 * @example
 * ```typescript
 * percentChange(104, 100); // "4.00%"
 * percentChange(99, 104);  // "-4.81%"
 * percentChange(99, 0);    // ""
 * ```
 */
export function percentChange(current: number, previous: number | null | undefined): string {
  if (previous === null || previous === undefined || previous <= 0) {
    return '';
  }
  return formatPercent(((current - previous) / previous) * 100);
}

const VOLUME_SUFFIXES: ReadonlyArray<[suffix: string, multiplier: number]> = [
  ['B', 1e9],
  ['M', 1e6],
  ['K', 1e3],
];

/**
 * Parses a compact volume string (`"12.34M"`, `"850.00K"`, `"950"`).
 * Empty or unparseable input reads as 0.
 */
export function parseVolume(volume: string): number {
  let text = volume.trim().replace(/,/g, '');
  if (text === '') {
    return 0;
  }

  let multiplier = 1;
  for (const [suffix, factor] of VOLUME_SUFFIXES) {
    if (text.toUpperCase().endsWith(suffix)) {
      multiplier = factor;
      text = text.slice(0, -1);
      break;
    }
  }

  const value = Number.parseFloat(text);
  return Number.isFinite(value) ? value * multiplier : 0;
}

/**
 * Inverse of {@link parseVolume}: two decimals with a B/M/K suffix, or a
 * whole number below one thousand.
 *
 * @example
 * ```typescript
 * formatVolume(7_500_000); // "7.50M"
 * formatVolume(950);       // "950"
 * ```
 */
export function formatVolume(volume: number): string {
  for (const [suffix, factor] of VOLUME_SUFFIXES) {
    if (volume >= factor) {
      return `${(volume / factor).toFixed(2)}${suffix}`;
    }
  }
  return volume.toFixed(0);
}
