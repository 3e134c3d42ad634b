import { describe, it, expect } from 'vitest';
import {
  chronologicalStreaks,
  recentStreak,
  inverseBrierWeights,
  maxOf,
  mean,
  minOf,
  sampleStdev,
  sharpeRatio,
  sortinoRatio,
} from '../stats.js';

describe('summary statistics', () => {
  it('finds the extremes of arrays too long to spread into Math.max', () => {
    const pnls = Array.from({ length: 500_000 }, (_, i) => (i % 1000) - 500);
    pnls[123_456] = 9_999;
    pnls[400_000] = -9_999;

    expect(maxOf(pnls)).toBe(9_999);
    expect(minOf(pnls)).toBe(-9_999);
    expect(maxOf([])).toBe(0);
    expect(minOf([])).toBe(0);
  });

  it('returns 0 for empty and single-value input', () => {
    expect(mean([])).toBe(0);
    expect(sampleStdev([5])).toBe(0);
    expect(sharpeRatio([5])).toBe(0);
    expect(sortinoRatio([-5])).toBe(0);
  });

  it('uses the n − 1 denominator for the standard deviation', () => {
    // mean 5, squared deviations sum to 32, / 7
    expect(sampleStdev([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(Math.sqrt(32 / 7), 10);
  });

  it('annualizes Sharpe with √252', () => {
    const pnls = [10, -5, 20, 5];
    const expected = (mean(pnls) / sampleStdev(pnls)) * Math.sqrt(252);
    expect(sharpeRatio(pnls)).toBeCloseTo(expected, 10);
  });

  it('is 0 Sharpe with zero variance', () => {
    expect(sharpeRatio([3, 3, 3])).toBe(0);
  });

  it('computes Sortino from the RMS of losing trades only', () => {
    // mean = 2.5, downside RMS = sqrt((25 + 25) / 2) = 5
    expect(sortinoRatio([10, -5, 10, -5])).toBeCloseTo((2.5 / 5) * Math.sqrt(252), 10);
  });

  it('is 0 Sortino with no losing trades', () => {
    expect(sortinoRatio([1, 2, 3])).toBe(0);
  });
});

describe('chronologicalStreaks', () => {
  it('tracks current, best and worst streaks oldest to newest', () => {
    expect(chronologicalStreaks([1, 1, 1, -1, -1, 1])).toEqual({ current: 1, best: 3, worst: -2 });
  });

  it('skips zero-PnL trades without resetting', () => {
    expect(chronologicalStreaks([1, 0, 1, 0, 1])).toEqual({ current: 3, best: 3, worst: 0 });
  });

  it('is all zeros for no trades', () => {
    expect(chronologicalStreaks([])).toEqual({ current: 0, best: 0, worst: 0 });
  });
});

describe('recentStreak', () => {
  it('counts from the newest trade and stops at the first sign flip', () => {
    expect(recentStreak([-1, -2, -3, 5, -1, -1])).toBe(-3);
    expect(recentStreak([2, 0, 4, -1, 3])).toBe(2);
  });

  it('differs from the chronological walk over the same trades', () => {
    const newestFirst = [1, 1, -1, -1, -1];
    const oldestFirst = [...newestFirst].reverse();
    expect(recentStreak(newestFirst)).toBe(2);
    expect(chronologicalStreaks(oldestFirst).current).toBe(2);
    expect(chronologicalStreaks(oldestFirst).worst).toBe(-3);
  });
});

describe('inverseBrierWeights', () => {
  it('weights models by 1 / Brier and normalizes', () => {
    const weights = inverseBrierWeights([
      { modelName: 'a', brier: 0.1 },
      { modelName: 'b', brier: 0.2 },
    ]);
    expect(weights.a).toBeCloseTo(2 / 3, 10);
    expect(weights.b).toBeCloseTo(1 / 3, 10);
  });

  it('floors Brier at 0.001', () => {
    const weights = inverseBrierWeights([
      { modelName: 'perfect', brier: 0 },
      { modelName: 'good', brier: 0.001 },
    ]);
    expect(weights.perfect).toBeCloseTo(0.5, 10);
    expect(weights.good).toBeCloseTo(0.5, 10);
  });

  it('is empty for no rows', () => {
    expect(inverseBrierWeights([])).toEqual({});
  });
});
