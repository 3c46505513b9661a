/**
 * Hours per day × 2 from the Berggren derivation, with k in BTU/(hr·ft·°F),
 * F in °F·days and L in BTU/ft³, giving X in feet.
 */
export const MODBERG_DEPTH_CONSTANT = 48;

/**
 * FrostDepthModule – modified Berggren depth of 32 °F penetration.
 *
 *   X = λ · √(48 · k · F / L)   (ft, unrounded)
 *
 * Rounding to the declared unit system happens in the normalizer so that a
 * metric caller is not handed a depth rounded twice.
 */
export function computeFrostDepthFt(
  lambda: number,
  thermalConductivity: number,
  surfaceFreezingIndex: number,
  latentHeat: number,
): number {
  return lambda * Math.sqrt((MODBERG_DEPTH_CONSTANT * thermalConductivity * surfaceFreezingIndex) / latentHeat);
}
