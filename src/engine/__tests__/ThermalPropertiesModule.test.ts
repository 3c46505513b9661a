import { describe, it, expect } from 'vitest';
import {
  computeVolumetricLatentHeat,
  computeAverageHeatCapacity,
  computeFrozenHeatCapacity,
  computeUnfrozenHeatCapacity,
  runThermalPropertiesModule,
} from '../modules/ThermalPropertiesModule';
import type { WorkingFrostInput } from '../schema/FrostInputV1';

const workingInput: WorkingFrostInput = {
  declaredUnitSystem: 'imperial',
  meanAnnualTempSource: 'ground',
  thermalConductivity: 0.78,
  dryDensity: 100,
  waterContentFraction: 0.15,
  meanAnnualTemp: 8,
  airFreezingIndex: 2000,
  nFactor: 0.75,
  freezingSeasonDays: 160,
};

// ─── 1. Latent heat ───────────────────────────────────────────────────────────

describe('ThermalPropertiesModule – latent heat of fusion', () => {
  it('L = 144 · γd · w', () => {
    expect(computeVolumetricLatentHeat(100, 0.15)).toBe(2160);
    expect(computeVolumetricLatentHeat(120, 0.1)).toBe(1728);
  });

  it('is zero for dry soil', () => {
    expect(computeVolumetricLatentHeat(110, 0)).toBe(0);
  });

  it('rounds to two decimals', () => {
    // 144 × 99.884736 × 0.15 = 2157.5102976
    expect(computeVolumetricLatentHeat(99.884736, 0.15)).toBe(2157.51);
  });
});

// ─── 2. Heat capacity ─────────────────────────────────────────────────────────

describe('ThermalPropertiesModule – volumetric heat capacity', () => {
  it('average: γd · (0.17 + 0.75 · w)', () => {
    expect(computeAverageHeatCapacity(100, 0.15)).toBe(28.25);
  });

  it('frozen: γd · (0.17 + 0.5 · w)', () => {
    expect(computeFrozenHeatCapacity(100, 0.15)).toBe(24.5);
  });

  it('unfrozen: γd · (0.17 + 1.0 · w)', () => {
    expect(computeUnfrozenHeatCapacity(100, 0.15)).toBe(32);
  });

  it('average lies between frozen and unfrozen', () => {
    const frozen = computeFrozenHeatCapacity(125, 0.2);
    const average = computeAverageHeatCapacity(125, 0.2);
    const unfrozen = computeUnfrozenHeatCapacity(125, 0.2);
    expect(frozen).toBeLessThan(average);
    expect(average).toBeLessThan(unfrozen);
  });

  it('dry soil keeps the solids contribution', () => {
    expect(computeAverageHeatCapacity(100, 0)).toBe(17);
  });
});

// ─── 3. Module ───────────────────────────────────────────────────────────────

describe('runThermalPropertiesModule', () => {
  it('derives L and the average C from the working input', () => {
    expect(runThermalPropertiesModule(workingInput)).toEqual({ latentHeat: 2160, heatCapacity: 28.25 });
  });
});
