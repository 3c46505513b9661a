import { describe, it, expect } from 'vitest';
import { PRECISION, countDecimals, roundHalfAwayFromZero } from '../utils/rounding';

describe('roundHalfAwayFromZero', () => {
  it('rounds exact halves away from zero', () => {
    expect(roundHalfAwayFromZero(0.125, 2)).toBe(0.13);
    expect(roundHalfAwayFromZero(-0.125, 2)).toBe(-0.13);
    expect(roundHalfAwayFromZero(2.5, 0)).toBe(3);
    expect(roundHalfAwayFromZero(-2.5, 0)).toBe(-3);
  });

  it('rounds the decimal value, not its binary neighbour', () => {
    // 1.005 × 100 is 100.49999999999999 in binary floating point
    expect(roundHalfAwayFromZero(1.005, 2)).toBe(1.01);
  });

  it('never returns negative zero', () => {
    expect(Object.is(roundHalfAwayFromZero(-0.001, 2), 0)).toBe(true);
  });

  it('passes non-finite values through', () => {
    expect(roundHalfAwayFromZero(Infinity, 2)).toBe(Infinity);
    expect(roundHalfAwayFromZero(NaN, 2)).toBeNaN();
  });
});

describe('PRECISION', () => {
  it('keeps λ at the two-decimal chart resolution', () => {
    expect(PRECISION.lambda).toBe(2);
  });
});

describe('countDecimals', () => {
  it('counts digits after the decimal point', () => {
    expect(countDecimals(0.93)).toBe(2);
    expect(countDecimals(4.7)).toBe(1);
    expect(countDecimals(1)).toBe(0);
  });
});
