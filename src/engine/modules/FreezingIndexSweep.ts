import type {
  FreezingIndexSweepOptions,
  FreezingIndexSweepPoint,
  FrostInputV1,
} from '../schema/FrostInputV1';
import { runFrostEngine } from '../Engine';
import { validateFrostInput } from './InputValidatorModule';

/**
 * Frost depth as a function of air freezing index, all other inputs held.
 *
 * Returns `steps + 1` points from AFI = 0 (the degenerate zero-depth point)
 * to `maxAirFreezingIndex`, both in the input's declared unit system.  Each
 * point is an independent engine run, so a `DomainError` anywhere in the
 * range propagates.
 */
export function buildFreezingIndexSweep(
  raw: unknown,
  options: FreezingIndexSweepOptions,
): FreezingIndexSweepPoint[] {
  const base: FrostInputV1 = validateFrostInput(raw);

  if (!Number.isInteger(options.steps) || options.steps < 1) {
    throw new RangeError(`Sweep steps must be a positive integer, got ${options.steps}.`);
  }
  if (!Number.isFinite(options.maxAirFreezingIndex) || options.maxAirFreezingIndex <= 0) {
    throw new RangeError(`Sweep maxAirFreezingIndex must be > 0, got ${options.maxAirFreezingIndex}.`);
  }

  return Array.from({ length: options.steps + 1 }, (_, i) => {
    const airFreezingIndex = (options.maxAirFreezingIndex * i) / options.steps;
    const result = runFrostEngine({ ...base, airFreezingIndex });
    return {
      airFreezingIndex,
      frostDepth: result.frostDepth,
      lambda: result.intermediates.lambda,
    };
  });
}
