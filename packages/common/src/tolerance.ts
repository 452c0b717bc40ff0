/**
 * Tolerance-based numeric comparison.
 * Volumes are floats after aggregation; no check compares them exactly.
 */

export const DEFAULT_TOLERANCE = 1e-6;

export function approxEqual(a: number, b: number, tolerance: number = DEFAULT_TOLERANCE): boolean {
  return Math.abs(a - b) <= tolerance;
}

export function isNegligible(value: number, tolerance: number = DEFAULT_TOLERANCE): boolean {
  return Math.abs(value) <= tolerance;
}

/**
 * Floor modulo: result has the sign of the divisor, so -150 mod 100 = 50.
 */
export function floorMod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

/**
 * Distance from the nearest multiple of `lot`.
 * 99.9999999 and 100.0000001 are both within 1e-6 of a lot boundary.
 */
export function lotDeviation(value: number, lot: number): number {
  const remainder = floorMod(value, lot);
  return Math.min(remainder, lot - remainder);
}

export function sum(values: Iterable<number>): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

export function mean(values: number[]): number | null {
  return values.length > 0 ? sum(values) / values.length : null;
}

/**
 * Smallest and largest value in one pass; null for no values.
 */
export function extent(values: Iterable<number>): { min: number; max: number } | null {
  let bounds: { min: number; max: number } | null = null;
  for (const v of values) {
    if (bounds === null) bounds = { min: v, max: v };
    else if (v < bounds.min) bounds.min = v;
    else if (v > bounds.max) bounds.max = v;
  }
  return bounds;
}
