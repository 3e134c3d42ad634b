/**
 * Small numeric helpers shared by the tracker and the regime detector.
 * All of them return 0 for inputs they cannot summarize.
 */

const ANNUALIZATION = Math.sqrt(252);

export function sum(values: number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}

/** Largest value; 0 when empty. Safe for arrays too long to spread. */
export function maxOf(values: number[]): number {
  if (values.length === 0) return 0;
  let best = values[0];
  for (const v of values) if (v > best) best = v;
  return best;
}

export function minOf(values: number[]): number {
  if (values.length === 0) return 0;
  let worst = values[0];
  for (const v of values) if (v < worst) worst = v;
  return worst;
}

export function mean(values: number[]): number {
  return values.length > 0 ? sum(values) / values.length : 0;
}

/** Sample standard deviation (n − 1). 0 below two values. */
export function sampleStdev(values: number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  let sq = 0;
  for (const v of values) sq += (v - m) * (v - m);
  return Math.sqrt(sq / (values.length - 1));
}

/** mean / sampleStdev · √252. 0 below two values or with zero variance. */
export function sharpeRatio(pnls: number[]): number {
  if (pnls.length < 2) return 0;
  const sd = sampleStdev(pnls);
  return sd > 0 ? (mean(pnls) / sd) * ANNUALIZATION : 0;
}

/**
 * mean / downside deviation · √252, where the downside deviation is the
 * root mean square of the losing trades only. 0 without losers.
 */
export function sortinoRatio(pnls: number[]): number {
  if (pnls.length < 2) return 0;
  const losers = pnls.filter((p) => p < 0);
  if (losers.length === 0) return 0;
  let sq = 0;
  for (const p of losers) sq += p * p;
  const downside = Math.sqrt(sq / losers.length);
  return downside > 0 ? (mean(pnls) / downside) * ANNUALIZATION : 0;
}

export interface StreakSummary {
  /** Positive = consecutive wins, negative = consecutive losses. */
  current: number;
  best: number;
  worst: number;
}

/**
 * Walk trades oldest → newest. A win extends a non-negative streak (or
 * restarts at 1), a loss mirrors that; zero-PnL trades are skipped.
 */
export function chronologicalStreaks(pnls: number[]): StreakSummary {
  let current = 0;
  let best = 0;
  let worst = 0;

  for (const pnl of pnls) {
    if (pnl > 0) {
      current = current >= 0 ? current + 1 : 1;
      best = Math.max(best, current);
    } else if (pnl < 0) {
      current = current <= 0 ? current - 1 : -1;
      worst = Math.min(worst, current);
    }
  }

  return { current, best, worst };
}

/**
 * Streak ending at the newest trade. Input is newest first; counting stops
 * at the first trade whose sign differs. Zero-PnL trades are skipped.
 */
export function recentStreak(pnlsNewestFirst: number[]): number {
  let streak = 0;
  for (const pnl of pnlsNewestFirst) {
    if (pnl > 0) {
      if (streak < 0) break;
      streak++;
    } else if (pnl < 0) {
      if (streak > 0) break;
      streak--;
    }
  }
  return streak;
}

/** Floor applied to Brier scores before inversion. */
export const MIN_BRIER = 0.001;

/**
 * Weights ∝ 1 / max(brier, 0.001), normalized to sum 1.
 * Empty input gives an empty mapping.
 */
export function inverseBrierWeights(
  rows: Array<{ modelName: string; brier: number }>,
): Record<string, number> {
  const raw: Record<string, number> = {};
  let total = 0;
  for (const r of rows) {
    const inv = 1 / Math.max(r.brier, MIN_BRIER);
    raw[r.modelName] = inv;
    total += inv;
  }
  if (total <= 0) return raw;

  const weights: Record<string, number> = {};
  for (const [model, inv] of Object.entries(raw)) {
    weights[model] = inv / total;
  }
  return weights;
}
