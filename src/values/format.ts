/**
 * Number formatting shared by attribute renderers.
 * Values are rounded to three decimals so float noise (1.1 * 100) never reaches the markup.
 */

/** Magnitudes at or above this are refused; the markup has no exponent notation. */
export const MAX_MAGNITUDE = 1e15;

/**
 * True when `value` can be written in plain decimal notation without rounding a
 * nonzero value to 0.
 */
export function isWritable(value: number): boolean {
  if (!Number.isFinite(value)) return false;
  const magnitude = Math.abs(value);
  return magnitude === 0 || (magnitude >= 0.001 && magnitude < MAX_MAGNITUDE);
}

export function formatNumber(value: number): string {
  const rounded = Math.round(value * 1000) / 1000;
  return Object.is(rounded, -0) ? "0" : String(rounded);
}

/** Explicitly signed form used by relative SSML values: +6, -2.5, +0. */
export function formatSigned(value: number): string {
  const text = formatNumber(value);
  return text.startsWith("-") ? text : `+${text}`;
}

/** A multiplier rendered as a percentage: 1.2 -> "120%". */
export function formatPercent(fraction: number): string {
  return `${formatNumber(fraction * 100)}%`;
}
