/**
 * Numeric policies for deterministic KPI outputs.
 */

export function safeDivide(numerator: number, denominator: number, fallback = 0): number {
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator === 0) {
    return fallback;
  }
  return numerator / denominator;
}

export function round(value: number, decimals = 2): number {
  if (!Number.isFinite(value)) return 0;
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** Affine map of a [0, 1) fraction onto [min, max). */
export function scaleFraction(fraction: number, min: number, max: number): number {
  return min + (max - min) * fraction;
}
