import type { UnitSystem } from '../schema/FrostInputV1';

const FREEZING_POINT: Record<UnitSystem, number> = {
  imperial: 32,
  metric: 0,
};

/**
 * v0 from an absolute mean annual ground temperature: |MAGT − freezing|.
 *
 * Unsigned, as in the chart workflow.  Callers who know the ground is below
 * freezing and want the signed ratio should pass `MAGT − freezing` directly
 * as `meanAnnualTemp`.
 */
export function computeGroundTempDifferential(meanAnnualGroundTemp: number, unitSystem: UnitSystem): number {
  return Math.abs(meanAnnualGroundTemp - FREEZING_POINT[unitSystem]);
}

/**
 * Multiyear vs: |MAT − freezing|.
 *
 * Used instead of the seasonal F / t when studying freeze that builds up
 * over several years from a long-term change in the surface heat balance.
 */
export function computeMultiyearSurfaceTempDepression(meanAnnualAirTemp: number, unitSystem: UnitSystem): number {
  return Math.abs(meanAnnualAirTemp - FREEZING_POINT[unitSystem]);
}
