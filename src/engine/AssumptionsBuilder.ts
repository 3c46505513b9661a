import type { AssumptionV1, ConfidenceV1 } from '../contracts/FrostOutputV1';
import { ASSUMPTION_IDS } from '../contracts/assumptions.ids';
import type { DimensionlessParametersResult, WorkingFrostInput } from './schema/FrostInputV1';

/**
 * Builds confidence and assumption metadata for FrostEngineResultV1.meta.
 *
 * Rules:
 *  - Start high
 *  - Each warn-level assumption knocks it down:
 *    - 1 warning → medium
 *    - 2+ warnings → low
 *  - Info-level assumptions describe the method and never count
 */
export function buildFrostAssumptionsV1(
  input: WorkingFrostInput,
  parameters: DimensionlessParametersResult,
): { confidence: ConfidenceV1; assumptions: AssumptionV1[] } {
  const assumptions: AssumptionV1[] = [];
  const reasons: string[] = [];

  // ── Method assumptions (always present) ──────────────────────────────────

  assumptions.push({
    id: ASSUMPTION_IDS.AVERAGE_HEAT_CAPACITY,
    title: 'Average volumetric heat capacity',
    detail: 'C uses the mean of the frozen and unfrozen water coefficients (0.75 BTU/lb·°F), ' +
      'treating the soil as partly frozen over the season.',
    severity: 'info',
  });

  assumptions.push({
    id: ASSUMPTION_IDS.SOLIDS_SPECIFIC_HEAT,
    title: 'Soil solids specific heat 0.17 BTU/lb·°F',
    detail: 'The specific heat of soil solids is taken as 0.17 BTU/lb·°F, typical for most mineral soils.',
    severity: 'info',
  });

  assumptions.push({
    id: ASSUMPTION_IDS.LAMBDA_TWO_DECIMALS,
    title: 'λ rounded to two decimals',
    detail: 'The Aldrich closed form replaces the μ–α chart; λ is rounded (half away from zero) ' +
      'to the chart resolution of 0.01 before the depth is computed.',
    severity: 'info',
  });

  if (input.declaredUnitSystem === 'metric') {
    assumptions.push({
      id: ASSUMPTION_IDS.CONVERTED_FROM_METRIC,
      title: 'Metric input converted to imperial',
      detail: 'Inputs were converted to BTU/(hr·ft·°F), lb/ft³ and °F·days for the calculation; ' +
        'intermediate values are reported in those units and the depth is converted back to metres.',
      severity: 'info',
    });
  }

  // ── Warnings ──────────────────────────────────────────────────────────────

  if (input.meanAnnualTempSource === 'air') {
    assumptions.push({
      id: ASSUMPTION_IDS.GROUND_FROM_AIR_TEMP,
      title: 'Ground temperature assumed equal to air temperature',
      detail: 'The thermal ratio uses the mean annual air temperature in place of the mean annual ' +
        'ground temperature.  Ground temperatures are usually a few degrees warmer under snow cover.',
      severity: 'warn',
      improveBy: 'Provide a measured or modelled mean annual ground temperature.',
    });
    reasons.push('Thermal ratio uses air temperature as a stand-in for ground temperature.');
  }

  if (parameters.status === 'defined' && parameters.thermalRatio < -0.5) {
    assumptions.push({
      id: ASSUMPTION_IDS.PERMAFROST_RATIO,
      title: 'Ground colder than freezing',
      detail: `Thermal ratio α = ${parameters.thermalRatio} is below −0.5, so λ exceeds 1. ` +
        'The chart was not drawn for this region; treat the depth as indicative.',
      severity: 'warn',
      improveBy: 'Check the site against a multi-year freeze (permafrost) analysis.',
    });
    reasons.push('Thermal ratio lies outside the charted range (α < −0.5).');
  }

  if (parameters.status === 'degenerate') {
    assumptions.push({
      id: ASSUMPTION_IDS.DEGENERATE_RESULT,
      title: 'No freezing season',
      detail: parameters.degeneracy.message,
      severity: 'warn',
      improveBy: 'Check the freezing index and season length.',
    });
    reasons.push('Frost depth is zero because the freezing season is degenerate.');
  }

  // ── Confidence level ─────────────────────────────────────────────────────

  const warnCount = assumptions.filter(a => a.severity === 'warn').length;
  let level: ConfidenceV1['level'];

  if (warnCount === 0) {
    level = 'high';
  } else if (warnCount === 1) {
    level = 'medium';
  } else {
    level = 'low';
  }

  return {
    confidence: { level, reasons },
    assumptions,
  };
}
