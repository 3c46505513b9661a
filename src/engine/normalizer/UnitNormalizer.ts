import type { FrostInputV1, UnitSystem, WorkingFrostInput } from '../schema/FrostInputV1';
import type { FrostDepthUnit } from '../../contracts/FrostOutputV1';
import { PRECISION, roundHalfAwayFromZero } from '../utils/rounding';

// ─── Conversion factors (metric → imperial working system) ────────────────────
//
// The ModBerg constants (144 BTU/lb, 0.17 BTU/(lb·°F), the 48 in the depth
// equation) are all imperial.  Metric input is converted here, once, and
// nothing downstream ever sees a metric value.

/** 1 W/(m·K) = 0.5777893 BTU/(hr·ft·°F). */
export const W_PER_M_K_TO_BTU_PER_HR_FT_F = 0.5777893;

/** 1 kg/m³ = 0.06242796 lb/ft³. */
export const KG_PER_M3_TO_LB_PER_FT3 = 0.06242796;

/** Temperature differences and degree-days: 1 °C = 1.8 °F. */
export const DEG_C_TO_DEG_F_DELTA = 1.8;

export const FT_TO_M = 0.3048;

const DEPTH_UNIT: Record<UnitSystem, FrostDepthUnit> = {
  imperial: 'ft',
  metric: 'm',
};

const DEPTH_DECIMALS: Record<UnitSystem, number> = {
  imperial: PRECISION.frostDepthFt,
  metric: PRECISION.frostDepthM,
};

/**
 * Convert a validated input into the imperial working system.
 *
 * Water content becomes a fraction regardless of unit system; the percent
 * form divides by 100 here rather than in the thermal formulas.
 */
export function normalizeFrostInput(input: FrostInputV1): WorkingFrostInput {
  const waterContentFraction =
    (input.waterContentFormat ?? 'percent') === 'percent'
      ? input.waterContent / 100
      : input.waterContent;

  const base: Omit<
    WorkingFrostInput,
    'thermalConductivity' | 'dryDensity' | 'meanAnnualTemp' | 'airFreezingIndex'
  > = {
    declaredUnitSystem: input.unitSystem,
    meanAnnualTempSource: input.meanAnnualTempSource ?? 'ground',
    waterContentFraction,
    nFactor: input.nFactor,
    freezingSeasonDays: input.freezingSeasonDays,
  };

  if (input.unitSystem === 'imperial') {
    return {
      ...base,
      thermalConductivity: input.thermalConductivity,
      dryDensity: input.dryDensity,
      meanAnnualTemp: input.meanAnnualTemp,
      airFreezingIndex: input.airFreezingIndex,
    };
  }

  return {
    ...base,
    thermalConductivity: input.thermalConductivity * W_PER_M_K_TO_BTU_PER_HR_FT_F,
    dryDensity: input.dryDensity * KG_PER_M3_TO_LB_PER_FT3,
    meanAnnualTemp: input.meanAnnualTemp * DEG_C_TO_DEG_F_DELTA,
    airFreezingIndex: input.airFreezingIndex * DEG_C_TO_DEG_F_DELTA,
  };
}

/**
 * Express a working-system depth (ft, unrounded) in the declared unit system
 * and round it: feet to 0.1 ft, metres to 0.01 m.
 */
export function denormalizeFrostDepth(
  depthFt: number,
  unitSystem: UnitSystem,
): { frostDepth: number; frostDepthUnit: FrostDepthUnit } {
  const declared = unitSystem === 'metric' ? depthFt * FT_TO_M : depthFt;
  return {
    frostDepth: roundHalfAwayFromZero(declared, DEPTH_DECIMALS[unitSystem]),
    frostDepthUnit: DEPTH_UNIT[unitSystem],
  };
}
