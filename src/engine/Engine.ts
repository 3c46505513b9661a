import type {
  ComputedFrostResultV1,
  DegenerateFrostResultV1,
  FrostEngineResultV1,
  FrostMetaV1,
} from '../contracts/FrostOutputV1';
import { ENGINE_VERSION, CONTRACT_VERSION } from '../contracts/versions';
import type { WorkingFrostInput } from './schema/FrostInputV1';
import { validateFrostInput } from './modules/InputValidatorModule';
import { normalizeFrostInput, denormalizeFrostDepth } from './normalizer/UnitNormalizer';
import { runThermalPropertiesModule } from './modules/ThermalPropertiesModule';
import { runDimensionlessParameterModule } from './modules/DimensionlessParameterModule';
import { computeLambdaCoefficient } from './modules/LambdaCoefficientModule';
import { computeFrostDepthFt } from './modules/FrostDepthModule';
import { buildFrostAssumptionsV1 } from './AssumptionsBuilder';

function describeInput(input: WorkingFrostInput): string {
  return (
    `🧱 Soil: γd = ${input.dryDensity} lb/ft³, w = ${input.waterContentFraction}, ` +
    `k = ${input.thermalConductivity} BTU/(hr·ft·°F).`
  );
}

/**
 * Run the modified Berggren pipeline once:
 *
 *   validate → normalise units → L, C → F, vs, μ, α → λ → X
 *
 * Pure and synchronous; identical input always yields an identical result.
 * `InvalidInputError` and `DomainError` propagate to the caller.  A season
 * with no freezing (AFI = 0 or t = 0) returns `status: 'degenerate'` with a
 * frost depth of 0.
 */
export function runFrostEngine(raw: unknown): FrostEngineResultV1 {
  const input = normalizeFrostInput(validateFrostInput(raw));
  const thermal = runThermalPropertiesModule(input);
  const parameters = runDimensionlessParameterModule(input, thermal);
  const { confidence, assumptions } = buildFrostAssumptionsV1(input, parameters);
  const meta: FrostMetaV1 = {
    engineVersion: ENGINE_VERSION,
    contractVersion: CONTRACT_VERSION,
    confidence,
    assumptions,
  };

  const notes: string[] = [
    describeInput(input),
    `🔥 Latent heat L = ${thermal.latentHeat} BTU/ft³; heat capacity C = ${thermal.heatCapacity} BTU/(ft³·°F).`,
    `🌡️ Surface freezing index F = ${parameters.surfaceFreezingIndex} °F·days.`,
  ];

  if (parameters.status === 'degenerate') {
    notes.push(`⚠️ ${parameters.degeneracy.message}`);
    const result: DegenerateFrostResultV1 = {
      status: 'degenerate',
      declaredUnitSystem: input.declaredUnitSystem,
      frostDepth: 0,
      frostDepthUnit: denormalizeFrostDepth(0, input.declaredUnitSystem).frostDepthUnit,
      degeneracy: parameters.degeneracy,
      intermediates: {
        workingUnitSystem: 'imperial',
        surfaceFreezingIndex: parameters.surfaceFreezingIndex,
        surfaceTempDepression: parameters.surfaceTempDepression,
        latentHeat: thermal.latentHeat,
        heatCapacity: thermal.heatCapacity,
        fusionParameter: null,
        thermalRatio: null,
        lambda: null,
      },
      notes,
      meta,
    };
    return result;
  }

  const lambda = computeLambdaCoefficient(parameters.fusionParameter, parameters.thermalRatio);
  const depthFt = computeFrostDepthFt(
    lambda,
    input.thermalConductivity,
    parameters.surfaceFreezingIndex,
    thermal.latentHeat,
  );
  const { frostDepth, frostDepthUnit } = denormalizeFrostDepth(depthFt, input.declaredUnitSystem);

  notes.push(
    `📐 vs = ${parameters.surfaceTempDepression} °F, μ = ${parameters.fusionParameter}, ` +
    `α = ${parameters.thermalRatio}, λ = ${lambda}.`,
  );
  notes.push(`🧊 Frost penetration depth X = ${frostDepth} ${frostDepthUnit}.`);

  const result: ComputedFrostResultV1 = {
    status: 'computed',
    declaredUnitSystem: input.declaredUnitSystem,
    frostDepth,
    frostDepthUnit,
    intermediates: {
      workingUnitSystem: 'imperial',
      surfaceFreezingIndex: parameters.surfaceFreezingIndex,
      surfaceTempDepression: parameters.surfaceTempDepression,
      latentHeat: thermal.latentHeat,
      heatCapacity: thermal.heatCapacity,
      fusionParameter: parameters.fusionParameter,
      thermalRatio: parameters.thermalRatio,
      lambda,
    },
    notes,
    meta,
  };
  return result;
}
