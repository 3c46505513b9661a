import type {
  DimensionlessParametersResult,
  ThermalPropertiesResult,
  WorkingFrostInput,
} from '../schema/FrostInputV1';
import { DomainError } from '../errors';
import { PRECISION, roundHalfAwayFromZero } from '../utils/rounding';

/** F = AFI × n   (°F·days) */
export function computeSurfaceFreezingIndex(airFreezingIndex: number, nFactor: number): number {
  return airFreezingIndex * nFactor;
}

/** vs = F / t   (°F) – average surface temperature depression over the season. */
export function computeSeasonalSurfaceTempDepression(
  surfaceFreezingIndex: number,
  freezingSeasonDays: number,
): number {
  return surfaceFreezingIndex / freezingSeasonDays;
}

/** μ = vs · C / L, rounded to 3 dp. */
export function computeFusionParameter(
  surfaceTempDepression: number,
  heatCapacity: number,
  latentHeat: number,
): number {
  return roundHalfAwayFromZero(surfaceTempDepression * (heatCapacity / latentHeat), PRECISION.fusionParameter);
}

/** α = v0 / vs, rounded to 3 dp.  Signed: negative when the ground is below freezing. */
export function computeThermalRatio(meanAnnualTemp: number, surfaceTempDepression: number): number {
  return roundHalfAwayFromZero(meanAnnualTemp / surfaceTempDepression, PRECISION.thermalRatio);
}

/**
 * DimensionlessParameterModule – F, vs, μ and α.
 *
 * A season with zero length or zero freezing index leaves vs at zero (or
 * undefined), so μ and α cannot be formed.  That case is returned as
 * `status: 'degenerate'` and the pipeline reports a zero frost depth.
 *
 * Dry soil (L = 0) on a real freezing season has no closed-form solution
 * and throws `DomainError`.
 */
export function runDimensionlessParameterModule(
  input: WorkingFrostInput,
  thermal: ThermalPropertiesResult,
): DimensionlessParametersResult {
  const surfaceFreezingIndex = computeSurfaceFreezingIndex(input.airFreezingIndex, input.nFactor);

  if (input.freezingSeasonDays === 0) {
    return {
      status: 'degenerate',
      surfaceFreezingIndex,
      surfaceTempDepression: null,
      degeneracy: {
        kind: 'DegenerateInput',
        quantity: 'freezingSeasonDays',
        message: 'Freezing season has zero length; vs is undefined and frost depth is taken as 0.',
      },
    };
  }

  const surfaceTempDepression = computeSeasonalSurfaceTempDepression(
    surfaceFreezingIndex,
    input.freezingSeasonDays,
  );

  if (surfaceTempDepression === 0) {
    return {
      status: 'degenerate',
      surfaceFreezingIndex,
      surfaceTempDepression,
      degeneracy: {
        kind: 'DegenerateInput',
        quantity: 'airFreezingIndex',
        message: 'Freezing index is zero; vs = 0 and frost depth is taken as 0.',
      },
    };
  }

  if (thermal.latentHeat <= 0) {
    throw new DomainError(
      'latentHeat',
      `Volumetric latent heat L = ${thermal.latentHeat} BTU/ft³; ` +
      'the fusion parameter is undefined for soil without pore water.',
      { latentHeat: thermal.latentHeat },
    );
  }

  return {
    status: 'defined',
    surfaceFreezingIndex,
    surfaceTempDepression,
    fusionParameter: computeFusionParameter(surfaceTempDepression, thermal.heatCapacity, thermal.latentHeat),
    thermalRatio: computeThermalRatio(input.meanAnnualTemp, surfaceTempDepression),
  };
}
