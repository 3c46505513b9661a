export { runFrostEngine } from './engine/Engine';
export { validateFrostInput, FrostInputSchema } from './engine/modules/InputValidatorModule';
export {
  computeVolumetricLatentHeat,
  computeAverageHeatCapacity,
  computeFrozenHeatCapacity,
  computeUnfrozenHeatCapacity,
} from './engine/modules/ThermalPropertiesModule';
export {
  computeSurfaceFreezingIndex,
  computeSeasonalSurfaceTempDepression,
  computeFusionParameter,
  computeThermalRatio,
} from './engine/modules/DimensionlessParameterModule';
export { computeLambdaCoefficient } from './engine/modules/LambdaCoefficientModule';
export { computeFrostDepthFt } from './engine/modules/FrostDepthModule';
export {
  computeGroundTempDifferential,
  computeMultiyearSurfaceTempDepression,
} from './engine/modules/ClimateDifferentialModule';
export {
  fetchProjectedMeanAnnualTemp,
  fetchDesignFreezingIndex,
  resolveClimateFrostInput,
} from './engine/modules/SnapClimateAdapter';
export type {
  SnapClimateAdapterOptions,
  ProjectedTemperatureQuery,
  DesignFreezingIndexQuery,
  ClimateFrostQuery,
  SoilAndSeasonInput,
} from './engine/modules/SnapClimateAdapter';
export { buildFreezingIndexSweep } from './engine/modules/FreezingIndexSweep';
export {
  FrostModelError,
  InvalidInputError,
  DomainError,
  ClimateDataUnavailableError,
} from './engine/errors';
export type { FrostErrorKind, InputIssue } from './engine/errors';
export type {
  FrostInputV1,
  UnitSystem,
  WaterContentFormat,
  MeanAnnualTempSource,
  DegeneracyV1,
  FreezingIndexSweepPoint,
  FreezingIndexSweepOptions,
} from './engine/schema/FrostInputV1';
export type {
  FrostEngineResultV1,
  ComputedFrostResultV1,
  DegenerateFrostResultV1,
  FrostIntermediatesV1,
  FrostMetaV1,
  AssumptionV1,
  ConfidenceV1,
} from './contracts/FrostOutputV1';
export { ENGINE_VERSION, CONTRACT_VERSION } from './contracts/versions';
