import type { ThermalPropertiesResult, WorkingFrostInput } from '../schema/FrostInputV1';
import { PRECISION, roundHalfAwayFromZero } from '../utils/rounding';

// ─── Thermal constants (imperial) ─────────────────────────────────────────────
//
// Source: UFC 3-130-06 / TM 5-852-6, Chapter 2 – thermal properties of soils.
//
//  Latent heat of fusion of water: 144 BTU/lb.
//  Specific heat of soil solids:   0.17 BTU/(lb·°F) for most soils.
//  Specific heat of ice:           0.5  BTU/(lb·°F).
//  Specific heat of water:         1.0  BTU/(lb·°F).
//
// The average heat capacity takes the mean of the ice and water coefficients
// (0.75) because the soil is partly frozen and partly thawed over the season.

export const LATENT_HEAT_OF_WATER_BTU_PER_LB = 144;
export const SOIL_SOLIDS_SPECIFIC_HEAT = 0.17;
const ICE_SPECIFIC_HEAT = 0.5;
const WATER_SPECIFIC_HEAT = 1.0;
const AVERAGE_WATER_SPECIFIC_HEAT = 0.75;

function volumetricHeatCapacity(
  dryDensity: number,
  waterContentFraction: number,
  waterCoefficient: number,
): number {
  const c = dryDensity * (SOIL_SOLIDS_SPECIFIC_HEAT + waterCoefficient * waterContentFraction);
  return roundHalfAwayFromZero(c, PRECISION.heatCapacity);
}

/**
 * Heat released when all pore water in one cubic foot of soil freezes.
 * L = 144 · γd · w   (BTU/ft³)
 */
export function computeVolumetricLatentHeat(dryDensity: number, waterContentFraction: number): number {
  const latentHeat = LATENT_HEAT_OF_WATER_BTU_PER_LB * dryDensity * waterContentFraction;
  return roundHalfAwayFromZero(latentHeat, PRECISION.latentHeat);
}

/** C_frozen = γd · (0.17 + 0.5 · w)   (BTU/(ft³·°F)) */
export function computeFrozenHeatCapacity(dryDensity: number, waterContentFraction: number): number {
  return volumetricHeatCapacity(dryDensity, waterContentFraction, ICE_SPECIFIC_HEAT);
}

/** C_unfrozen = γd · (0.17 + 1.0 · w)   (BTU/(ft³·°F)) */
export function computeUnfrozenHeatCapacity(dryDensity: number, waterContentFraction: number): number {
  return volumetricHeatCapacity(dryDensity, waterContentFraction, WATER_SPECIFIC_HEAT);
}

/** C_avg = γd · (0.17 + 0.75 · w)   (BTU/(ft³·°F)) */
export function computeAverageHeatCapacity(dryDensity: number, waterContentFraction: number): number {
  return volumetricHeatCapacity(dryDensity, waterContentFraction, AVERAGE_WATER_SPECIFIC_HEAT);
}

/**
 * ThermalPropertiesModule – volumetric latent heat and heat capacity.
 *
 * The pipeline uses the average heat capacity; the frozen and unfrozen
 * variants are exported for callers that model one phase only.
 */
export function runThermalPropertiesModule(input: WorkingFrostInput): ThermalPropertiesResult {
  return {
    latentHeat: computeVolumetricLatentHeat(input.dryDensity, input.waterContentFraction),
    heatCapacity: computeAverageHeatCapacity(input.dryDensity, input.waterContentFraction),
  };
}
