import { SqliteStore } from '../../db/sqliteStore.js';
import { AnalyticsRepository } from '../../db/analyticsRepository.js';
import type { ResolutionRecord } from '../types.js';

export const NOW = new Date('2026-03-15T12:00:00.000Z');
export const clock = (): Date => NOW;

/** ISO timestamp `days` before NOW, plus an optional minute offset. */
export function daysAgo(days: number, minutes = 0): string {
  return new Date(NOW.getTime() - days * 86_400_000 + minutes * 60_000).toISOString();
}

export async function createTestStore(): Promise<{ store: SqliteStore; repo: AnalyticsRepository }> {
  const store = new SqliteStore(':memory:');
  await store.ensureSchema();
  return { store, repo: new AnalyticsRepository(store) };
}

export function makeRecord(overrides: Partial<ResolutionRecord> = {}): ResolutionRecord {
  return {
    marketId: 'mkt-1',
    question: 'Will it rain tomorrow?',
    category: 'WEATHER',
    forecastProb: 0.7,
    actualOutcome: 1,
    edgeAtEntry: 0.05,
    confidence: 'MEDIUM',
    evidenceQuality: 0.6,
    stakeUsd: 100,
    entryPrice: 0.6,
    exitPrice: 1,
    pnl: 40,
    holdingHours: 12,
    modelForecasts: { 'gpt-4o': 0.7, 'claude-3-5-sonnet': 0.65 },
    resolvedAt: daysAgo(1),
    ...overrides,
  };
}

export interface TradeSeed {
  pnl: number;
  category?: string | null;
  stakeUsd?: number;
  edge?: number;
  evidenceQuality?: number;
  holdingHours?: number;
  resolvedAt?: string;
}

/** Insert trades straight into performance_log. Defaults resolve i minutes apart, 40 days back. */
export async function seedTrades(store: SqliteStore, trades: TradeSeed[]): Promise<void> {
  for (const [i, t] of trades.entries()) {
    await store.run(
      `INSERT INTO performance_log
        (market_id, category, pnl, stake_usd, edge_at_entry, evidence_quality, holding_hours, resolved_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        `mkt-${i}`,
        t.category === undefined ? 'POLITICS' : t.category,
        t.pnl,
        t.stakeUsd ?? 100,
        t.edge ?? 0.05,
        t.evidenceQuality ?? 0.5,
        t.holdingHours ?? 10,
        t.resolvedAt ?? daysAgo(40, i),
      ],
    );
  }
}

/** `count` forecasts from one model, all with the same probability and outcome. */
export async function seedModelForecasts(
  store: SqliteStore,
  model: string,
  category: string | null,
  count: number,
  forecastProb: number,
  actualOutcome: number,
): Promise<void> {
  for (let i = 0; i < count; i++) {
    await store.run(
      `INSERT INTO model_forecast_log
        (model_name, market_id, category, forecast_prob, actual_outcome, recorded_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [model, `mkt-${i}`, category, forecastProb, actualOutcome, daysAgo(2, i)],
    );
  }
}

export async function seedCandidates(
  store: SqliteStore,
  rows: Array<{ edge: number; impliedProb: number | null }>,
): Promise<void> {
  for (const [i, r] of rows.entries()) {
    await store.run(
      `INSERT INTO candidates (market_id, edge, implied_prob, created_at) VALUES (?, ?, ?, ?)`,
      [`cand-${i}`, r.edge, r.impliedProb, daysAgo(0, -i)],
    );
  }
}

export async function seedCalibrationPairs(
  store: SqliteStore,
  pairs: Array<{ forecastProb: number; actualOutcome: number }>,
): Promise<void> {
  for (const [i, p] of pairs.entries()) {
    await store.run(
      `INSERT INTO calibration_history (forecast_prob, actual_outcome, recorded_at, market_id)
       VALUES (?, ?, ?, ?)`,
      [p.forecastProb, p.actualOutcome, daysAgo(10, i), `cal-${i}`],
    );
  }
}

/**
 * 50 pairs over five probability bins where each bin's hit rate equals its
 * forecast, so the fitted correction is close to the identity.
 */
export function wellCalibratedPairs(): Array<{ forecastProb: number; actualOutcome: number }> {
  const pairs: Array<{ forecastProb: number; actualOutcome: number }> = [];
  for (const p of [0.1, 0.3, 0.5, 0.7, 0.9]) {
    const ones = Math.round(p * 10);
    for (let i = 0; i < 10; i++) {
      pairs.push({ forecastProb: p, actualOutcome: i < ones ? 1 : 0 });
    }
  }
  return pairs;
}
