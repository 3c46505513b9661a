/**
 * Shared rounding helpers.
 *
 * Every rounded quantity in the engine goes through `roundHalfAwayFromZero`
 * so that chart-equivalent values (λ in particular) are reproducible.
 */

/** Decimal places for each rounded quantity, following the chart workflow. */
export const PRECISION = {
  latentHeat: 2,
  heatCapacity: 2,
  fusionParameter: 3,
  thermalRatio: 3,
  lambda: 2,
  frostDepthFt: 1,
  frostDepthM: 2,
  meanAnnualTempF: 1,
} as const;

/**
 * Significant digits kept before rounding.  Scaling by a power of ten drags
 * binary noise along (1.005 × 100 = 100.49999999999999); trimming to 15
 * significant digits restores the decimal value the caller wrote.
 */
const DECIMAL_SIGNIFICANT_DIGITS = 15;

/**
 * Round `value` to `decimals` places, halves going away from zero.
 *
 *   roundHalfAwayFromZero(0.125, 2)  → 0.13
 *   roundHalfAwayFromZero(-0.125, 2) → −0.13
 *   roundHalfAwayFromZero(1.005, 2)  → 1.01
 */
export function roundHalfAwayFromZero(value: number, decimals: number): number {
  if (!Number.isFinite(value)) return value;
  const factor = 10 ** decimals;
  const scaled = Number((Math.abs(value) * factor).toPrecision(DECIMAL_SIGNIFICANT_DIGITS));
  const rounded = Math.round(scaled) / factor;
  return value < 0 && rounded !== 0 ? -rounded : rounded;
}

/** Number of digits after the decimal point in the shortest representation. */
export function countDecimals(value: number): number {
  const [, fraction = ''] = String(value).split('.');
  return fraction.length;
}
