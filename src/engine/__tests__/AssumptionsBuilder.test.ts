import { describe, it, expect } from 'vitest';
import { buildFrostAssumptionsV1 } from '../AssumptionsBuilder';
import { ASSUMPTION_IDS } from '../../contracts/assumptions.ids';
import type { DimensionlessParametersResult, WorkingFrostInput } from '../schema/FrostInputV1';

const groundInput: WorkingFrostInput = {
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

const definedParameters: DimensionlessParametersResult = {
  status: 'defined',
  surfaceFreezingIndex: 1500,
  surfaceTempDepression: 9.375,
  fusionParameter: 0.123,
  thermalRatio: 0.853,
};

const degenerateParameters: DimensionlessParametersResult = {
  status: 'degenerate',
  surfaceFreezingIndex: 0,
  surfaceTempDepression: 0,
  degeneracy: {
    kind: 'DegenerateInput',
    quantity: 'airFreezingIndex',
    message: 'Freezing index is zero; vs = 0 and frost depth is taken as 0.',
  },
};

describe('buildFrostAssumptionsV1', () => {
  describe('fully specified ground-temperature input', () => {
    it('returns confidence high', () => {
      const { confidence } = buildFrostAssumptionsV1(groundInput, definedParameters);
      expect(confidence.level).toBe('high');
      expect(confidence.reasons).toEqual([]);
    });

    it('lists the three method assumptions as info', () => {
      const { assumptions } = buildFrostAssumptionsV1(groundInput, definedParameters);
      expect(assumptions.map(a => a.id)).toEqual([
        ASSUMPTION_IDS.AVERAGE_HEAT_CAPACITY,
        ASSUMPTION_IDS.SOLIDS_SPECIFIC_HEAT,
        ASSUMPTION_IDS.LAMBDA_TWO_DECIMALS,
      ]);
      expect(assumptions.every(a => a.severity === 'info')).toBe(true);
    });
  });

  describe('warnings', () => {
    it('air temperature stand-in is a warning with an improvement hint', () => {
      const { assumptions, confidence } = buildFrostAssumptionsV1(
        { ...groundInput, meanAnnualTempSource: 'air' },
        definedParameters,
      );
      const air = assumptions.find(a => a.id === ASSUMPTION_IDS.GROUND_FROM_AIR_TEMP);
      expect(air?.severity).toBe('warn');
      expect(air?.improveBy).toBeDefined();
      expect(confidence.level).toBe('medium');
    });

    it('α below −0.5 is a warning naming the ratio', () => {
      const { assumptions } = buildFrostAssumptionsV1(groundInput, { ...definedParameters, thermalRatio: -0.64 });
      const permafrost = assumptions.find(a => a.id === ASSUMPTION_IDS.PERMAFROST_RATIO);
      expect(permafrost?.detail).toContain('α = -0.64');
    });

    it('α = −0.5 exactly is not flagged', () => {
      const { assumptions } = buildFrostAssumptionsV1(groundInput, { ...definedParameters, thermalRatio: -0.5 });
      expect(assumptions.some(a => a.id === ASSUMPTION_IDS.PERMAFROST_RATIO)).toBe(false);
    });

    it('degenerate season carries the degeneracy message', () => {
      const { assumptions } = buildFrostAssumptionsV1(groundInput, degenerateParameters);
      const degenerate = assumptions.find(a => a.id === ASSUMPTION_IDS.DEGENERATE_RESULT);
      expect(degenerate?.detail).toBe('Freezing index is zero; vs = 0 and frost depth is taken as 0.');
    });

    it('two warnings give low confidence', () => {
      const { confidence } = buildFrostAssumptionsV1(
        { ...groundInput, meanAnnualTempSource: 'air' },
        degenerateParameters,
      );
      expect(confidence.level).toBe('low');
    });
  });

  describe('metric input', () => {
    it('adds the conversion note without lowering confidence', () => {
      const { assumptions, confidence } = buildFrostAssumptionsV1(
        { ...groundInput, declaredUnitSystem: 'metric' },
        definedParameters,
      );
      expect(assumptions.map(a => a.id)).toContain(ASSUMPTION_IDS.CONVERTED_FROM_METRIC);
      expect(confidence.level).toBe('high');
    });
  });
});
