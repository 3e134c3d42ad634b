/**
 * Performance Tracker
 *
 * Read-only analytics over the resolution tables. `compute()` re-scans the
 * store on every call and assembles a PerformanceSnapshot from independent
 * sections; a section that throws is logged, listed in `failedSections`, and
 * leaves its fields at their zero values.
 *
 * When nothing has resolved yet the trade metrics, category breakdown, equity
 * curve and rolling windows are derived from unrealised PnL on open
 * positions instead (paper trading).
 */

import { logger as rootLogger } from '../lib/logger.js';
import type { AnalyticsRepository, PositionTradeRow, WindowTradeRow } from '../db/analyticsRepository.js';
import {
  chronologicalStreaks,
  maxOf,
  minOf,
  sharpeRatio,
  sortinoRatio,
  sum,
} from './stats.js';
import type {
  CategoryStats,
  EquityPoint,
  LeaderboardEntry,
  PerformanceSnapshot,
  ProfitFactor,
} from './types.js';

const log = rootLogger.child({ component: 'performance-tracker' });

const MS_PER_DAY = 86_400_000;
const MIN_CALIBRATION_SAMPLES = 5;

export interface PerformanceTrackerConfig {
  /** Starting equity for the equity curve and drawdown. */
  bankroll: number;
}

export const DEFAULT_PERFORMANCE_TRACKER_CONFIG: PerformanceTrackerConfig = {
  bankroll: 5000,
};

/** The per-trade fields the trade metrics need. */
interface TradeSample {
  pnl: number;
  stakeUsd: number;
  edge: number;
  holdingHours: number;
}

export class PerformanceTracker {
  readonly config: PerformanceTrackerConfig;
  private readonly now: () => Date;

  constructor(
    private readonly repo: AnalyticsRepository,
    config: Partial<PerformanceTrackerConfig> = {},
    now: () => Date = () => new Date(),
  ) {
    this.config = { ...DEFAULT_PERFORMANCE_TRACKER_CONFIG, ...config };
    this.now = now;
  }

  async compute(): Promise<PerformanceSnapshot> {
    const snap = emptySnapshot();

    await this.section(snap, 'trades', () => this.computeTradeMetrics(snap));
    await this.section(snap, 'forecasts', async () => {
      snap.totalForecasts = await this.repo.countForecasts();
    });
    await this.section(snap, 'categories', async () => {
      snap.categoryStats = await this.repo.categoryBreakdown();
    });
    await this.section(snap, 'calibration', () => this.computeCalibration(snap));
    await this.section(snap, 'equity', () => this.computeEquityCurve(snap));
    await this.section(snap, 'rolling', () =>
      this.computeRollingWindows(snap, (cutoff) => this.repo.tradesSince(cutoff)),
    );
    await this.section(snap, 'models', async () => {
      snap.modelAccuracy = await this.repo.modelAccuracy();
    });

    if (snap.totalTrades === 0) {
      await this.section(snap, 'open_positions', () => this.computeFromOpenPositions(snap));
    } else {
      snap.source = 'resolved';
    }

    snap.leaderboard = buildLeaderboard(snap.categoryStats);
    return snap;
  }

  // -----------------------------------------------------------------------
  // Sections
  // -----------------------------------------------------------------------

  private async computeTradeMetrics(snap: PerformanceSnapshot): Promise<void> {
    const rows = await this.repo.listTrades();
    if (rows.length === 0) return;

    applyTradeMetrics(
      snap,
      rows.map((r) => ({
        pnl: r.pnl,
        stakeUsd: r.stakeUsd,
        edge: r.edgeAtEntry,
        holdingHours: r.holdingHours,
      })),
    );
  }

  private async computeCalibration(snap: PerformanceSnapshot): Promise<void> {
    const pairs = await this.repo.listCalibrationPairs();
    if (pairs.length < MIN_CALIBRATION_SAMPLES) return;

    let brier = 0;
    for (const p of pairs) brier += (p.forecastProb - p.actualOutcome) ** 2;
    snap.calibrationSamples = pairs.length;
    snap.brierScore = brier / pairs.length;
  }

  private async computeEquityCurve(snap: PerformanceSnapshot): Promise<void> {
    const days = await this.repo.dailyPnl();
    if (days.length === 0) return;

    this.applyEquityCurve(
      snap,
      days.map((d) => ({ timestamp: d.day, pnl: d.pnl, tradeCount: d.tradeCount })),
    );
  }

  private async computeRollingWindows(
    snap: PerformanceSnapshot,
    load: (cutoffIso: string) => Promise<WindowTradeRow[]>,
  ): Promise<void> {
    const nowMs = this.now().getTime();

    const week = summarizeWindow(await load(new Date(nowMs - 7 * MS_PER_DAY).toISOString()));
    snap.pnl7d = week.pnl;
    snap.winRate7d = week.winRate;
    snap.trades7d = week.trades;

    const month = summarizeWindow(await load(new Date(nowMs - 30 * MS_PER_DAY).toISOString()));
    snap.pnl30d = month.pnl;
    snap.winRate30d = month.winRate;
    snap.trades30d = month.trades;
  }

  private async computeFromOpenPositions(snap: PerformanceSnapshot): Promise<void> {
    const positions = await this.repo.openPositions();
    if (positions.length === 0) return;

    snap.source = 'open_positions';
    applyTradeMetrics(
      snap,
      positions.map((p) => ({
        pnl: p.pnl,
        stakeUsd: p.stakeUsd,
        edge: p.edge,
        holdingHours: 0,
      })),
    );
    // Unrealised positions carry no holding time yet
    snap.avgHoldingHours = 0;

    const buckets = new Map<string, typeof positions>();
    for (const p of positions) {
      const bucket = buckets.get(p.category);
      if (bucket) bucket.push(p);
      else buckets.set(p.category, [p]);
    }

    const categories: CategoryStats[] = [];
    for (const [category, items] of buckets) {
      const pnls = items.map((i) => i.pnl);
      const total = items.length;
      const wins = pnls.filter((p) => p > 0).length;
      const totalPnl = sum(pnls);
      const totalStaked = sum(items.map((i) => i.stakeUsd));
      categories.push({
        category,
        totalTrades: total,
        wins,
        losses: pnls.filter((p) => p < 0).length,
        totalPnl,
        totalStaked,
        avgEdge: sum(items.map((i) => i.edge)) / total,
        avgEvidenceQuality: sum(items.map((i) => i.evidenceQuality)) / total,
        winRate: wins / total,
        roiPct: totalStaked > 0 ? (totalPnl / totalStaked) * 100 : 0,
        bestTradePnl: maxOf(pnls),
        worstTradePnl: minOf(pnls),
      });
    }
    categories.sort((a, b) => b.totalPnl - a.totalPnl);
    snap.categoryStats = categories;

    const fills = await this.repo.positionTrades();
    this.applyEquityCurve(
      snap,
      fills.length > 0
        ? spreadPositionPnl(fills)
        : positions.map((p) => ({ timestamp: p.openedAt, pnl: p.pnl, tradeCount: 1 })),
    );

    await this.computeRollingWindows(snap, (cutoff) => this.repo.positionsOpenedSince(cutoff));

    log.info(
      {
        positions: positions.length,
        totalPnl: Math.round(snap.totalPnl * 100) / 100,
        categories: categories.length,
      },
      'Analytics derived from open positions',
    );
  }

  // -----------------------------------------------------------------------
  // Helpers
  // -----------------------------------------------------------------------

  private applyEquityCurve(
    snap: PerformanceSnapshot,
    steps: Array<{ timestamp: string; pnl: number; tradeCount: number }>,
  ): void {
    const bankroll = this.config.bankroll;
    const curve: EquityPoint[] = [];
    let cumPnl = 0;
    let peak = bankroll;
    let maxDd = 0;

    for (const step of steps) {
      cumPnl += step.pnl;
      const equity = bankroll + cumPnl;
      peak = Math.max(peak, equity);
      const dd = peak > 0 ? (peak - equity) / peak : 0;
      maxDd = Math.max(maxDd, dd);

      curve.push({
        timestamp: step.timestamp,
        equity,
        pnlCumulative: cumPnl,
        drawdownPct: dd,
        tradeCount: step.tradeCount,
      });
    }

    snap.equityCurve = curve;
    snap.maxDrawdownPct = maxDd;
    if (maxDd > 0 && snap.totalPnl > 0) {
      snap.calmarRatio = snap.roiPct / 100 / maxDd;
    }
  }

  private async section(
    snap: PerformanceSnapshot,
    name: string,
    fn: () => Promise<void>,
  ): Promise<void> {
    try {
      await fn();
    } catch (err) {
      log.error(
        { section: name, err: err instanceof Error ? err.message : String(err) },
        'Performance section failed',
      );
      snap.failedSections.push(name);
    }
  }
}

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

export function emptySnapshot(): PerformanceSnapshot {
  return {
    source: 'empty',
    totalTrades: 0,
    totalForecasts: 0,
    wins: 0,
    losses: 0,
    breakeven: 0,
    winRate: 0,
    totalPnl: 0,
    totalStaked: 0,
    roiPct: 0,
    profitFactor: { kind: 'ratio', value: 0 },
    avgWin: 0,
    avgLoss: 0,
    largestWin: 0,
    largestLoss: 0,
    avgHoldingHours: 0,
    sharpeRatio: 0,
    sortinoRatio: 0,
    maxDrawdownPct: 0,
    calmarRatio: 0,
    avgEdgeCaptured: 0,
    brierScore: 0,
    calibrationSamples: 0,
    currentStreak: 0,
    bestStreak: 0,
    worstStreak: 0,
    categoryStats: [],
    modelAccuracy: [],
    equityCurve: [],
    pnl7d: 0,
    pnl30d: 0,
    winRate7d: 0,
    winRate30d: 0,
    trades7d: 0,
    trades30d: 0,
    leaderboard: [],
    failedSections: [],
  };
}

export function profitFactor(grossProfit: number, grossLoss: number): ProfitFactor {
  if (grossLoss > 0) return { kind: 'ratio', value: grossProfit / grossLoss };
  if (grossProfit > 0) return { kind: 'no_losses' };
  return { kind: 'ratio', value: 0 };
}

function applyTradeMetrics(snap: PerformanceSnapshot, trades: TradeSample[]): void {
  const n = trades.length;
  if (n === 0) return;

  const pnls = trades.map((t) => t.pnl);
  const winners = pnls.filter((p) => p > 0);
  const losers = pnls.filter((p) => p < 0);
  const grossProfit = sum(winners);
  const grossLoss = -sum(losers);

  snap.totalTrades = n;
  snap.wins = winners.length;
  snap.losses = losers.length;
  snap.breakeven = n - winners.length - losers.length;
  snap.winRate = winners.length / n;
  snap.totalPnl = sum(pnls);
  snap.totalStaked = sum(trades.map((t) => t.stakeUsd));
  snap.roiPct = snap.totalStaked > 0 ? (snap.totalPnl / snap.totalStaked) * 100 : 0;
  snap.profitFactor = profitFactor(grossProfit, grossLoss);

  snap.avgWin = winners.length > 0 ? grossProfit / winners.length : 0;
  snap.avgLoss = losers.length > 0 ? sum(losers) / losers.length : 0;
  snap.largestWin = maxOf(pnls);
  snap.largestLoss = minOf(pnls);
  snap.avgHoldingHours = sum(trades.map((t) => t.holdingHours)) / n;
  snap.avgEdgeCaptured = sum(trades.map((t) => t.edge)) / n;

  const streaks = chronologicalStreaks(pnls);
  snap.currentStreak = streaks.current;
  snap.bestStreak = streaks.best;
  snap.worstStreak = streaks.worst;

  snap.sharpeRatio = sharpeRatio(pnls);
  snap.sortinoRatio = sortinoRatio(pnls);
}

/**
 * One equity step per fill. Each position's PnL is split evenly across its
 * fills; `tradeCount` is the fill's ordinal within its market.
 */
function spreadPositionPnl(
  fills: PositionTradeRow[],
): Array<{ timestamp: string; pnl: number; tradeCount: number }> {
  const perMarket = new Map<string, number>();
  for (const f of fills) perMarket.set(f.marketId, (perMarket.get(f.marketId) ?? 0) + 1);

  const seen = new Map<string, number>();
  return fills.map((f) => {
    const ordinal = (seen.get(f.marketId) ?? 0) + 1;
    seen.set(f.marketId, ordinal);
    return {
      timestamp: f.createdAt,
      pnl: f.positionPnl / (perMarket.get(f.marketId) ?? 1),
      tradeCount: ordinal,
    };
  });
}

function summarizeWindow(rows: WindowTradeRow[]): { pnl: number; winRate: number; trades: number } {
  if (rows.length === 0) return { pnl: 0, winRate: 0, trades: 0 };
  const pnls = rows.map((r) => r.pnl);
  return {
    pnl: sum(pnls),
    winRate: pnls.filter((p) => p > 0).length / rows.length,
    trades: rows.length,
  };
}

/**
 * Rank categories by a blended score of ROI, win rate and trade count.
 * Categories without trades are left out.
 */
export function buildLeaderboard(categories: CategoryStats[]): LeaderboardEntry[] {
  return categories
    .filter((c) => c.totalTrades >= 1)
    .map((c) => ({
      rank: 0,
      category: c.category,
      roiPct: c.roiPct,
      winRate: c.winRate,
      totalPnl: c.totalPnl,
      trades: c.totalTrades,
      avgEdge: c.avgEdge,
      score:
        c.roiPct * 0.4 +
        c.winRate * 100 * 0.3 +
        Math.min(c.totalTrades / 10, 1) * 30 * 0.3,
    }))
    .sort((a, b) => b.score - a.score)
    .map((entry, i) => ({ ...entry, rank: i + 1 }));
}
