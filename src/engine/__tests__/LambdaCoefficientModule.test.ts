import { describe, it, expect } from 'vitest';
import { computeLambdaCoefficient } from '../modules/LambdaCoefficientModule';
import { DomainError } from '../errors';
import { countDecimals } from '../utils/rounding';

function captureDomainError(mu: number, alpha: number): DomainError {
  try {
    computeLambdaCoefficient(mu, alpha);
  } catch (err) {
    if (err instanceof DomainError) return err;
    throw err;
  }
  throw new Error('expected computeLambdaCoefficient to throw');
}

// ─── 1. Closed form ───────────────────────────────────────────────────────────

describe('LambdaCoefficientModule – closed form', () => {
  it('λ = 1 / √(1 + μ(α + 0.5)) rounded to 0.01', () => {
    // 1 / √(1 + 0.123 × 1.353) = 0.92591…
    expect(computeLambdaCoefficient(0.123, 0.853)).toBe(0.93);
  });

  it('λ = 1 when μ = 0 (no sensible heat)', () => {
    expect(computeLambdaCoefficient(0, 0.853)).toBe(1);
  });

  it('λ = 1 when α = −0.5 exactly', () => {
    expect(computeLambdaCoefficient(1.2, -0.5)).toBe(1);
  });

  it('exceeds 1 when the ground is well below freezing (α < −0.5)', () => {
    // 1 / √(1 + 0.5 × −0.5) = 1.1547…
    expect(computeLambdaCoefficient(0.5, -1)).toBe(1.15);
  });
});

// ─── 2. Chart-range property ──────────────────────────────────────────────────

describe('LambdaCoefficientModule – chart range', () => {
  it('stays in (0, 1] with at most two decimals for μ ∈ [0, 2], α ∈ [−0.5, 5]', () => {
    for (let mu = 0; mu <= 2; mu += 0.05) {
      for (let alpha = -0.5; alpha <= 5; alpha += 0.25) {
        const lambda = computeLambdaCoefficient(mu, alpha);
        expect(lambda).toBeGreaterThan(0);
        expect(lambda).toBeLessThanOrEqual(1);
        expect(countDecimals(lambda)).toBeLessThanOrEqual(2);
      }
    }
  });

  it('decreases as μ grows for a fixed positive α', () => {
    expect(computeLambdaCoefficient(0.1, 1)).toBeGreaterThan(computeLambdaCoefficient(1, 1));
  });
});

// ─── 3. Domain errors ─────────────────────────────────────────────────────────

describe('LambdaCoefficientModule – domain errors', () => {
  it('μ·(α + 0.5) = −1 exactly raises DomainError, not NaN or Infinity', () => {
    const err = captureDomainError(2, -1);
    expect(err.kind).toBe('DomainError');
    expect(err.quantity).toBe('lambda');
    expect(err.values).toEqual({ fusionParameter: 2, thermalRatio: -1 });
  });

  it('μ·(α + 0.5) < −1 raises DomainError', () => {
    expect(captureDomainError(1, -2).quantity).toBe('lambda');
  });

  it('negative μ raises DomainError', () => {
    expect(captureDomainError(-0.1, 0).message).toContain('negative');
  });

  it('μ = 0 with an infinite α raises DomainError instead of returning NaN', () => {
    const err = captureDomainError(0, Infinity);
    expect(err.quantity).toBe('lambda');
    expect(err.values).toEqual({ fusionParameter: 0, thermalRatio: Infinity });
  });

  it('a NaN μ raises DomainError', () => {
    expect(captureDomainError(Number.NaN, 1).quantity).toBe('lambda');
  });

  it('a λ below the chart resolution raises DomainError', () => {
    // 1 / √(1 + 50000 × 1.5) ≈ 0.0037 → 0.00
    expect(captureDomainError(50000, 1).message).toContain('0.01 chart resolution');
  });
});
