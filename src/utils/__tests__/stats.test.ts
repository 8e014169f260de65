import { describe, expect, it } from 'vitest';
import { createRng, gaussian, randomInt } from '../random.js';
import { calculateMetrics, countDistinct, median, medianAbsoluteDeviation, std } from '../stats.js';

describe('stats', () => {
  it('takes the median of odd and even lengths', () => {
    expect(median([3, 1, 2])).toBe(2);
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(median([])).toBeNaN();
  });

  it('computes the median absolute deviation', () => {
    expect(medianAbsoluteDeviation([1, 2, 3, 4, 100])).toBe(1);
  });

  it('uses the population standard deviation', () => {
    expect(std([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
  });

  it('counts distinct values', () => {
    expect(countDistinct([1, 1, 2, 3, 3])).toBe(3);
  });

  it('scores predictions', () => {
    const metrics = calculateMetrics([1, 2, 3], [1, 2, 4]);
    expect(metrics.mae).toBeCloseTo(1 / 3, 12);
    expect(metrics.rmse).toBeCloseTo(Math.sqrt(1 / 3), 12);
    expect(metrics.r2).toBeCloseTo(0.5, 12);
  });

  it('gives r2 = 1 for a perfect fit of a constant target', () => {
    expect(calculateMetrics([5, 5], [5, 5]).r2).toBe(1);
    expect(calculateMetrics([5, 5], [5, 6]).r2).toBe(0);
  });
});

describe('random', () => {
  it('repeats a stream for the same seed', () => {
    const a = createRng(42);
    const b = createRng(42);
    const first = Array.from({ length: 5 }, () => a());
    expect(Array.from({ length: 5 }, () => b())).toEqual(first);
    const c = createRng(43);
    expect(Array.from({ length: 5 }, () => c())).not.toEqual(first);
  });

  it('draws uniforms in [0, 1) and integers within inclusive bounds', () => {
    const rng = createRng(7);
    for (let i = 0; i < 1000; i++) {
      const u = rng();
      expect(u).toBeGreaterThanOrEqual(0);
      expect(u).toBeLessThan(1);
      const k = randomInt(rng, 1, 8);
      expect(k).toBeGreaterThanOrEqual(1);
      expect(k).toBeLessThanOrEqual(8);
    }
  });

  it('draws standard normal values', () => {
    const rng = createRng(11);
    const draws = Array.from({ length: 20000 }, () => gaussian(rng));
    const m = draws.reduce((s, v) => s + v, 0) / draws.length;
    expect(Math.abs(m)).toBeLessThan(0.05);
    expect(Math.abs(std(draws) - 1)).toBeLessThan(0.05);
  });
});
