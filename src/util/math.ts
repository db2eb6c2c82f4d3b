/**
 * Numeric helpers shared by the scoring and aggregation layers.
 */

export function clip(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.max(min, Math.min(max, value));
}

export function clipScore(value: number): number {
  return clip(value, 0, 100);
}

/** A finite number; `null`, `undefined`, `NaN` and infinities are missing. */
export function isPresent(value: number | null | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}
