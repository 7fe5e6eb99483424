import { describe, expect, it } from 'vitest';
import { discountFactor, linspace, normCdf, roundTo } from './math';

describe('normCdf', () => {
  it('is exactly one half at zero', () => {
    expect(normCdf(0)).toBe(0.5);
    expect(normCdf(-0)).toBe(0.5);
  });

  it('does not dip across zero', () => {
    expect(normCdf(-1e-12)).toBeLessThanOrEqual(0.5);
    expect(normCdf(1e-12)).toBeGreaterThanOrEqual(0.5);
    expect(normCdf(-1e-3)).toBeLessThan(normCdf(1e-3));
  });

  it('matches the 97.5% quantile', () => {
    expect(normCdf(1.96)).toBeCloseTo(0.975, 4);
  });

  it('is symmetric around zero', () => {
    expect(normCdf(-1.5) + normCdf(1.5)).toBeCloseTo(1, 12);
  });

  it('saturates in the tails without going negative', () => {
    expect(normCdf(10)).toBe(1);
    expect(normCdf(-10)).toBeGreaterThanOrEqual(0);
    expect(normCdf(-10)).toBeLessThan(1e-15);
  });
});

describe('discountFactor', () => {
  it('discounts continuously', () => {
    expect(discountFactor(0.05, 2)).toBe(Math.exp(-0.1));
    expect(discountFactor(0, 3)).toBe(1);
  });
});

describe('linspace', () => {
  it('includes both endpoints with equal steps', () => {
    expect(linspace(0, 1, 5)).toEqual([0, 0.25, 0.5, 0.75, 1]);
  });

  it('lands exactly on the stop value', () => {
    const values = linspace(0.01, 1, 10);
    expect(values).toHaveLength(10);
    expect(values[0]).toBe(0.01);
    expect(values[9]).toBe(1);
  });

  it('repeats the value for a zero-width range', () => {
    expect(linspace(100, 100, 4)).toEqual([100, 100, 100, 100]);
  });

  it('descends when start is above stop', () => {
    expect(linspace(4, 1, 4)).toEqual([4, 3, 2, 1]);
  });

  it('returns the start for a single sample', () => {
    expect(linspace(7, 9, 1)).toEqual([7]);
  });
});

describe('roundTo', () => {
  it('rounds to the requested decimals', () => {
    expect(roundTo(105.55555555555556, 2)).toBe(105.56);
    expect(roundTo(0.25000000000000006, 2)).toBe(0.25);
  });
});
