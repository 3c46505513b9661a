import { DomainError } from '../errors';
import { PRECISION, roundHalfAwayFromZero } from '../utils/rounding';

/**
 * Correction coefficient λ – closed-form replacement for the μ–α chart.
 *
 *   λ = 1 / √(1 + μ · (α + 0.5))
 *
 * Citation: H. P. Aldrich and H. M. Paynter, "Analytical Studies of Freezing
 * and Thawing of Soils", Arctic Construction and Frost Effects Laboratory,
 * First Interim Technical Report 42, June 1953.
 *
 * The result is rounded to two decimals, the resolution of the printed
 * chart, and that rounded value is what the depth equation consumes.
 *
 * Throws `DomainError` (quantity 'lambda') when μ or α is not finite, when
 * μ is negative, when the radicand 1 + μ(α + 0.5) is not positive, or when
 * λ rounds to 0.00.
 */
export function computeLambdaCoefficient(fusionParameter: number, thermalRatio: number): number {
  const values = { fusionParameter, thermalRatio };

  if (!Number.isFinite(fusionParameter) || !Number.isFinite(thermalRatio)) {
    throw new DomainError(
      'lambda',
      `μ = ${fusionParameter} and α = ${thermalRatio} must both be finite; ` +
      'the freezing season is too weak to resolve λ.',
      values,
    );
  }

  if (fusionParameter < 0) {
    throw new DomainError(
      'lambda',
      `Fusion parameter μ = ${fusionParameter} is negative; λ is undefined.`,
      values,
    );
  }

  const radicand = 1 + fusionParameter * (thermalRatio + 0.5);
  if (!(radicand > 0)) {
    throw new DomainError(
      'lambda',
      `μ·(α + 0.5) = ${fusionParameter * (thermalRatio + 0.5)} ≤ −1 ` +
      `(μ = ${fusionParameter}, α = ${thermalRatio}); no chart-equivalent λ exists.`,
      values,
    );
  }

  const lambda = roundHalfAwayFromZero(1 / Math.sqrt(radicand), PRECISION.lambda);
  if (!Number.isFinite(lambda) || lambda === 0) {
    throw new DomainError(
      'lambda',
      `λ = ${1 / Math.sqrt(radicand)} is below the 0.01 chart resolution ` +
      `(μ = ${fusionParameter}, α = ${thermalRatio}).`,
      values,
    );
  }
  return lambda;
}
