import { describe, expect, it } from 'vitest';
import { clamp, fitLinear, halfSplit, mean, predict, round, sampleStdDev } from '../src/statistics';

describe('statistics', () => {
  it('uses the sample standard deviation', () => {
    expect(sampleStdDev([0.95, 0.94, 0.93, 0.92])).toBeCloseTo(0.0129099, 6);
    expect(sampleStdDev([4])).toBe(0);
    expect(sampleStdDev([])).toBe(0);
  });

  it('treats the mean of nothing as zero', () => {
    expect(mean([])).toBe(0);
    expect(mean([2, 4, 9])).toBe(5);
  });

  it('gives the later half the extra point on an odd split', () => {
    const split = halfSplit([1, 2, 3]);
    expect(split).toEqual({ earlierMean: 1, laterMean: 2.5, change: 1.5 });
  });

  it('reports no change when the earlier half averages zero', () => {
    expect(halfSplit([0, 0, 5, 5])?.change).toBeUndefined();
    expect(halfSplit([7])).toBeUndefined();
  });

  it('fits an exact line through evenly spaced points', () => {
    const fit = fitLinear([3, 5, 7, 9]);
    expect(fit.slope).toBe(2);
    expect(fit.intercept).toBe(3);
    expect(fit.residualVariance).toBe(0);
    expect(predict(fit, 4)).toBe(11);
  });

  it('clamps and rounds', () => {
    expect(clamp(-5, 0, 100)).toBe(0);
    expect(clamp(150, 0, 100)).toBe(100);
    expect(clamp(Number.NaN, 0, 1)).toBe(0);
    expect(round(2 / 7, 2)).toBe(0.29);
  });
});
