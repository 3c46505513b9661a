import type { ENGINE_VERSION, CONTRACT_VERSION } from './versions';
import type { AssumptionId } from './assumptions.ids';
import type { DegeneracyV1, UnitSystem } from '../engine/schema/FrostInputV1';

export interface AssumptionV1 {
  id: AssumptionId;
  title: string;
  detail: string;
  severity: 'info' | 'warn';
  improveBy?: string;
}

export interface ConfidenceV1 {
  level: 'high' | 'medium' | 'low';
  reasons: string[];
}

export interface FrostMetaV1 {
  engineVersion: typeof ENGINE_VERSION;
  contractVersion: typeof CONTRACT_VERSION;
  confidence: ConfidenceV1;
  assumptions: AssumptionV1[];
}

export type FrostDepthUnit = 'ft' | 'm';

/**
 * Intermediate values exactly as used in the calculation, always in the
 * imperial working system so they can be checked against the UFC charts.
 */
export interface FrostIntermediatesV1 {
  workingUnitSystem: 'imperial';
  /** Surface freezing index F (°F·days). */
  surfaceFreezingIndex: number;
  /** vs (°F); null when the freezing season has zero length. */
  surfaceTempDepression: number | null;
  /** L (BTU/ft³). */
  latentHeat: number;
  /** C (BTU/(ft³·°F)). */
  heatCapacity: number;
  /** μ; null when degenerate. */
  fusionParameter: number | null;
  /** α; null when degenerate. */
  thermalRatio: number | null;
  /** λ; null when degenerate. */
  lambda: number | null;
}

interface FrostEngineResultBase {
  declaredUnitSystem: UnitSystem;
  frostDepthUnit: FrostDepthUnit;
  intermediates: FrostIntermediatesV1;
  notes: string[];
  meta: FrostMetaV1;
}

export interface ComputedFrostResultV1 extends FrostEngineResultBase {
  status: 'computed';
  /** Frost penetration depth in `frostDepthUnit`. */
  frostDepth: number;
  intermediates: FrostIntermediatesV1 & {
    surfaceTempDepression: number;
    fusionParameter: number;
    thermalRatio: number;
    lambda: number;
  };
}

export interface DegenerateFrostResultV1 extends FrostEngineResultBase {
  status: 'degenerate';
  frostDepth: 0;
  degeneracy: DegeneracyV1;
  intermediates: FrostIntermediatesV1 & {
    fusionParameter: null;
    thermalRatio: null;
    lambda: null;
  };
}

export type FrostEngineResultV1 = ComputedFrostResultV1 | DegenerateFrostResultV1;
