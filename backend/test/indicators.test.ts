import { describe, it, expect } from 'vitest';
import {
  annualizedVolatility,
  calcCorrelation,
  calcExpWeightedAverage,
  logReturns,
  roundTo,
  sliceMean,
  stddev,
} from '../src/services/indicators.js';

describe('indicators', () => {
  it('averages and rounds', () => {
    expect(sliceMean([])).toBe(0);
    expect(sliceMean([1, 2, 3])).toBe(2);
    expect(roundTo(1.23456, 2)).toBe(1.23);
    expect(roundTo(64_123.4567)).toBe(64_123.46);
    expect(roundTo(2.5, 0)).toBe(3);
  });

  it('weights recent prices more in the exponential average', () => {
    expect(calcExpWeightedAverage([], 20)).toBe(0);
    expect(calcExpWeightedAverage([1, 2, 3], 1)).toBe(3);

    const decay = Math.exp(-1);
    expect(calcExpWeightedAverage([10, 20], 2)).toBeCloseTo((20 + 10 * decay) / (1 + decay), 10);
    expect(calcExpWeightedAverage([7, 7, 7, 7], 20)).toBeCloseTo(7, 10);

    const rising = [1, 2, 3, 4, 5];
    const average = calcExpWeightedAverage(rising, 20);
    expect(average).toBeGreaterThan(sliceMean(rising));
    expect(average).toBeLessThan(5);
  });

  it('only looks at the trailing window', () => {
    const prices = [1_000, 1, 1, 1];
    expect(calcExpWeightedAverage(prices, 3)).toBeCloseTo(1, 10);
  });

  it('computes pearson correlation on the trailing common length', () => {
    expect(calcCorrelation([1, 2, 3, 4], [2, 4, 6, 8])).toBeCloseTo(1, 10);
    expect(calcCorrelation([1, 2, 3, 4], [8, 6, 4, 2])).toBeCloseTo(-1, 10);
    expect(calcCorrelation([100, 1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10);
  });

  it('returns null when correlation is undefined', () => {
    expect(calcCorrelation([1], [1])).toBeNull();
    expect(calcCorrelation([5, 5, 5], [1, 2, 3])).toBeNull();
  });

  it('computes log returns and population standard deviation', () => {
    expect(logReturns([1, Math.E])[0]).toBeCloseTo(1, 12);
    expect(logReturns([0, 5])).toEqual([0]);
    expect(stddev([])).toBe(0);
    expect(stddev([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
  });

  it('annualises volatility with 252 trading days', () => {
    expect(annualizedVolatility([100, 100, 100])).toBe(0);
    // log returns are +1, -1, +1: population variance 8/9
    const expected = Math.sqrt(8 / 9) * Math.sqrt(252);
    expect(annualizedVolatility([1, Math.E, 1, Math.E])).toBeCloseTo(expected, 8);
  });
});
