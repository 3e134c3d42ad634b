/**
 * Analytics Repository
 *
 * Typed persistence layer over the shared store tables. Every numeric column
 * goes through `num()` so NULLs, driver strings and non-finite values arrive
 * as plain finite numbers (0 when unusable).
 *
 * Works with any StoreAdapter. Missing tables are the adapter's concern:
 * reads come back empty, writes report 0 rows.
 */

import type { StoreAdapter } from './store.js';
import { num, str, nullableStr, finiteOrZero } from './store.js';
import type {
  CalibrationPair,
  CategoryStats,
  ModelAccuracy,
  RegimeHistoryEntry,
  ResolutionRecord,
} from '../analytics/types.js';

// ---------------------------------------------------------------------------
// Row types returned by queries
// ---------------------------------------------------------------------------

export interface TradeRow {
  pnl: number;
  stakeUsd: number;
  edgeAtEntry: number;
  holdingHours: number;
  category: string;
  resolvedAt: string;
}

export interface RecentTradeRow {
  pnl: number;
  edgeAtEntry: number;
}

export interface WindowTradeRow {
  pnl: number;
  stakeUsd: number;
}

export interface ModelBrierRow {
  modelName: string;
  brier: number;
  count: number;
}

export interface DailyPnlRow {
  day: string;
  pnl: number;
  tradeCount: number;
}

export interface CandidateSignalRow {
  edge: number;
  impliedProb: number;
}

export interface OpenPositionRow {
  marketId: string;
  pnl: number;
  stakeUsd: number;
  edge: number;
  evidenceQuality: number;
  category: string;
  openedAt: string;
}

export interface PositionTradeRow {
  marketId: string;
  positionPnl: number;
  createdAt: string;
}

export interface ModelForecastEntry {
  modelName: string;
  forecastProb: number;
}

// ---------------------------------------------------------------------------
// Repository
// ---------------------------------------------------------------------------

export class AnalyticsRepository {
  constructor(private readonly store: StoreAdapter) {}

  // -----------------------------------------------------------------------
  // Writes
  // -----------------------------------------------------------------------

  async insertCalibrationPair(
    marketId: string,
    pair: CalibrationPair,
    recordedAt: string,
  ): Promise<number> {
    return this.store.run(
      `INSERT INTO calibration_history
        (forecast_prob, actual_outcome, recorded_at, market_id)
       VALUES (?, ?, ?, ?)`,
      [finiteOrZero(pair.forecastProb), finiteOrZero(pair.actualOutcome), recordedAt, marketId],
    );
  }

  /** One row per model. Returns the number of rows written. */
  async insertModelForecasts(
    record: Pick<ResolutionRecord, 'marketId' | 'category' | 'actualOutcome'>,
    forecasts: ModelForecastEntry[],
    recordedAt: string,
  ): Promise<number> {
    let inserted = 0;
    for (const f of forecasts) {
      inserted += await this.store.run(
        `INSERT INTO model_forecast_log
          (model_name, market_id, category, forecast_prob, actual_outcome, recorded_at)
         VALUES (?, ?, ?, ?, ?, ?)`,
        [
          f.modelName,
          record.marketId,
          record.category,
          finiteOrZero(f.forecastProb),
          finiteOrZero(record.actualOutcome),
          recordedAt,
        ],
      );
    }
    return inserted;
  }

  async insertPerformance(record: ResolutionRecord, resolvedAt: string): Promise<number> {
    return this.store.run(
      `INSERT INTO performance_log
        (market_id, question, category, forecast_prob, actual_outcome,
         edge_at_entry, confidence, evidence_quality, stake_usd,
         entry_price, exit_price, pnl, holding_hours, resolved_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        record.marketId,
        record.question,
        record.category,
        finiteOrZero(record.forecastProb),
        finiteOrZero(record.actualOutcome),
        finiteOrZero(record.edgeAtEntry),
        record.confidence,
        finiteOrZero(record.evidenceQuality),
        finiteOrZero(record.stakeUsd),
        finiteOrZero(record.entryPrice),
        finiteOrZero(record.exitPrice),
        finiteOrZero(record.pnl),
        finiteOrZero(record.holdingHours),
        resolvedAt,
      ],
    );
  }

  /** Upsert a key in the generic checkpoint table. */
  async setEngineState(key: string, value: string, updatedAt: string): Promise<number> {
    return this.store.run(
      `INSERT INTO engine_state (key, value, updated_at)
       VALUES (?, ?, ?)
       ON CONFLICT (key) DO UPDATE SET
        value      = excluded.value,
        updated_at = excluded.updated_at`,
      [key, value, updatedAt],
    );
  }

  /**
   * Add one to an integer counter kept in `engine_state`, in a single
   * statement. Resolves to the new value, or null when the table is missing.
   */
  async incrementEngineCounter(key: string, updatedAt: string): Promise<number | null> {
    const rows = await this.store.all(
      `INSERT INTO engine_state (key, value, updated_at)
       VALUES (?, '1', ?)
       ON CONFLICT (key) DO UPDATE SET
        value      = CAST(CAST(engine_state.value AS INTEGER) + 1 AS TEXT),
        updated_at = excluded.updated_at
       RETURNING value`,
      [key, updatedAt],
    );
    return rows.length > 0 ? num(rows[0], 'value') : null;
  }

  async insertRegime(entry: RegimeHistoryEntry): Promise<number> {
    return this.store.run(
      `INSERT INTO regime_history
        (regime, confidence, kelly_multiplier, size_multiplier, explanation, detected_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [
        entry.regime,
        finiteOrZero(entry.confidence),
        finiteOrZero(entry.kellyMultiplier),
        finiteOrZero(entry.sizeMultiplier),
        entry.explanation,
        entry.detectedAt,
      ],
    );
  }

  // -----------------------------------------------------------------------
  // Checkpoints
  // -----------------------------------------------------------------------

  async getEngineState(key: string): Promise<string | null> {
    const rows = await this.store.all(`SELECT value FROM engine_state WHERE key = ?`, [key]);
    return rows.length > 0 ? nullableStr(rows[0], 'value') : null;
  }

  // -----------------------------------------------------------------------
  // Calibration & model accuracy
  // -----------------------------------------------------------------------

  /** All (forecast, outcome) pairs, oldest first. */
  async listCalibrationPairs(): Promise<CalibrationPair[]> {
    const rows = await this.store.all(
      `SELECT forecast_prob, actual_outcome
       FROM calibration_history
       ORDER BY recorded_at ASC`,
    );
    return rows.map((r) => ({
      forecastProb: num(r, 'forecast_prob'),
      actualOutcome: num(r, 'actual_outcome'),
    }));
  }

  /**
   * Per-model Brier score and sample count, keeping models with at least
   * `minSamples` forecasts. `'ALL'` spans every category.
   */
  async modelBrierStats(category: string, minSamples: number): Promise<ModelBrierRow[]> {
    const brier = `AVG((forecast_prob - actual_outcome) * (forecast_prob - actual_outcome))`;
    const rows =
      category === 'ALL'
        ? await this.store.all(
            `SELECT model_name, ${brier} AS brier, COUNT(*) AS cnt
             FROM model_forecast_log
             GROUP BY model_name
             HAVING COUNT(*) >= ?
             ORDER BY model_name`,
            [minSamples],
          )
        : await this.store.all(
            `SELECT model_name, ${brier} AS brier, COUNT(*) AS cnt
             FROM model_forecast_log
             WHERE category = ?
             GROUP BY model_name
             HAVING COUNT(*) >= ?
             ORDER BY model_name`,
            [category, minSamples],
          );

    return rows.map((r) => ({
      modelName: str(r, 'model_name'),
      brier: num(r, 'brier'),
      count: num(r, 'cnt'),
    }));
  }

  /** Distinct categories in the forecast log; NULL surfaces as null. */
  async forecastCategories(): Promise<Array<string | null>> {
    const rows = await this.store.all(
      `SELECT DISTINCT category FROM model_forecast_log ORDER BY category`,
    );
    return rows.map((r) => nullableStr(r, 'category'));
  }

  async modelAccuracy(): Promise<ModelAccuracy[]> {
    const rows = await this.store.all(
      `SELECT model_name, category,
              COUNT(*) AS total,
              AVG(ABS(forecast_prob - actual_outcome)) AS avg_error,
              AVG((forecast_prob - actual_outcome) * (forecast_prob - actual_outcome)) AS brier
       FROM model_forecast_log
       GROUP BY model_name, category
       ORDER BY model_name, category`,
    );
    return rows.map((r) => ({
      modelName: str(r, 'model_name', 'unknown'),
      category: str(r, 'category', 'ALL'),
      totalForecasts: num(r, 'total'),
      avgError: num(r, 'avg_error'),
      brierScore: num(r, 'brier'),
    }));
  }

  async countForecasts(): Promise<number> {
    const rows = await this.store.all(`SELECT COUNT(*) AS cnt FROM forecasts`);
    return rows.length > 0 ? num(rows[0], 'cnt') : 0;
  }

  // -----------------------------------------------------------------------
  // Resolved trades
  // -----------------------------------------------------------------------

  /** Every resolved trade, oldest first. */
  async listTrades(): Promise<TradeRow[]> {
    const rows = await this.store.all(
      `SELECT pnl, stake_usd, edge_at_entry, holding_hours, category, resolved_at
       FROM performance_log
       ORDER BY resolved_at ASC`,
    );
    return rows.map((r) => ({
      pnl: num(r, 'pnl'),
      stakeUsd: num(r, 'stake_usd'),
      edgeAtEntry: num(r, 'edge_at_entry'),
      holdingHours: num(r, 'holding_hours'),
      category: str(r, 'category', 'UNKNOWN'),
      resolvedAt: str(r, 'resolved_at'),
    }));
  }

  /** The `limit` most recent resolved trades, newest first. */
  async recentTrades(limit: number): Promise<RecentTradeRow[]> {
    const rows = await this.store.all(
      `SELECT pnl, edge_at_entry
       FROM performance_log
       ORDER BY resolved_at DESC
       LIMIT ?`,
      [limit],
    );
    return rows.map((r) => ({
      pnl: num(r, 'pnl'),
      edgeAtEntry: num(r, 'edge_at_entry'),
    }));
  }

  /** Trades resolved at or after an ISO timestamp. */
  async tradesSince(cutoffIso: string): Promise<WindowTradeRow[]> {
    const rows = await this.store.all(
      `SELECT pnl, stake_usd
       FROM performance_log
       WHERE resolved_at >= ?`,
      [cutoffIso],
    );
    return rows.map((r) => ({ pnl: num(r, 'pnl'), stakeUsd: num(r, 'stake_usd') }));
  }

  async categoryBreakdown(): Promise<CategoryStats[]> {
    const rows = await this.store.all(
      `SELECT category,
              COUNT(*) AS total,
              SUM(CASE WHEN pnl > 0 THEN 1 ELSE 0 END) AS wins,
              SUM(CASE WHEN pnl < 0 THEN 1 ELSE 0 END) AS losses,
              SUM(pnl) AS total_pnl,
              SUM(stake_usd) AS total_staked,
              AVG(edge_at_entry) AS avg_edge,
              AVG(evidence_quality) AS avg_eq,
              MAX(pnl) AS best,
              MIN(pnl) AS worst
       FROM performance_log
       GROUP BY category
       ORDER BY SUM(pnl) DESC`,
    );

    return rows.map((r) => {
      const total = num(r, 'total');
      const wins = num(r, 'wins');
      const staked = num(r, 'total_staked');
      const pnl = num(r, 'total_pnl');
      return {
        category: str(r, 'category', 'UNKNOWN'),
        totalTrades: total,
        wins,
        losses: num(r, 'losses'),
        totalPnl: pnl,
        totalStaked: staked,
        avgEdge: num(r, 'avg_edge'),
        avgEvidenceQuality: num(r, 'avg_eq'),
        winRate: total > 0 ? wins / total : 0,
        roiPct: staked > 0 ? (pnl / staked) * 100 : 0,
        bestTradePnl: num(r, 'best'),
        worstTradePnl: num(r, 'worst'),
      };
    });
  }

  /** PnL grouped by the calendar day (first 10 chars of the ISO timestamp). */
  async dailyPnl(): Promise<DailyPnlRow[]> {
    const rows = await this.store.all(
      `SELECT substr(resolved_at, 1, 10) AS day,
              SUM(pnl) AS daily_pnl,
              COUNT(*) AS trade_count
       FROM performance_log
       GROUP BY substr(resolved_at, 1, 10)
       ORDER BY day ASC`,
    );
    return rows.map((r) => ({
      day: str(r, 'day'),
      pnl: num(r, 'daily_pnl'),
      tradeCount: num(r, 'trade_count'),
    }));
  }

  // -----------------------------------------------------------------------
  // Live signals
  // -----------------------------------------------------------------------

  /** Most recent candidates; a NULL implied probability reads as 0.5. */
  async recentCandidates(limit: number): Promise<CandidateSignalRow[]> {
    const rows = await this.store.all(
      `SELECT edge, implied_prob
       FROM candidates
       ORDER BY created_at DESC
       LIMIT ?`,
      [limit],
    );
    return rows.map((r) => ({
      edge: num(r, 'edge'),
      impliedProb: num(r, 'implied_prob', 0.5),
    }));
  }

  /** Open positions joined with the latest forecast for each market, oldest first. */
  async openPositions(): Promise<OpenPositionRow[]> {
    const rows = await this.store.all(
      `SELECT p.market_id, p.pnl, p.stake_usd, p.opened_at,
              f.market_type, f.edge, f.evidence_quality
       FROM positions p
       LEFT JOIN forecasts f ON p.market_id = f.market_id
         AND f.created_at = (
           SELECT MAX(f2.created_at) FROM forecasts f2
           WHERE f2.market_id = p.market_id
         )
       ORDER BY p.opened_at ASC`,
    );
    return rows.map((r) => ({
      marketId: str(r, 'market_id'),
      pnl: num(r, 'pnl'),
      stakeUsd: num(r, 'stake_usd'),
      edge: num(r, 'edge'),
      evidenceQuality: num(r, 'evidence_quality'),
      category: str(r, 'market_type', 'UNKNOWN'),
      openedAt: str(r, 'opened_at'),
    }));
  }

  /** Filled and dry-run trades on open positions, oldest first, with the position's PnL. */
  async positionTrades(): Promise<PositionTradeRow[]> {
    const rows = await this.store.all(
      `SELECT t.market_id, t.created_at, p.pnl
       FROM trades t
       JOIN positions p ON t.market_id = p.market_id
       WHERE t.status IN ('DRY_RUN', 'FILLED')
       ORDER BY t.created_at ASC, t.id ASC`,
    );
    return rows.map((r) => ({
      marketId: str(r, 'market_id'),
      positionPnl: num(r, 'pnl'),
      createdAt: str(r, 'created_at'),
    }));
  }

  async positionsOpenedSince(cutoffIso: string): Promise<WindowTradeRow[]> {
    const rows = await this.store.all(
      `SELECT pnl, stake_usd FROM positions WHERE opened_at >= ?`,
      [cutoffIso],
    );
    return rows.map((r) => ({ pnl: num(r, 'pnl'), stakeUsd: num(r, 'stake_usd') }));
  }

  // -----------------------------------------------------------------------
  // Regime history
  // -----------------------------------------------------------------------

  async regimeHistory(limit: number): Promise<RegimeHistoryEntry[]> {
    const rows = await this.store.all(
      `SELECT regime, confidence, kelly_multiplier, size_multiplier, explanation, detected_at
       FROM regime_history
       ORDER BY detected_at DESC, id DESC
       LIMIT ?`,
      [limit],
    );
    return rows.map((r) => ({
      regime: str(r, 'regime', 'NORMAL'),
      confidence: num(r, 'confidence'),
      kellyMultiplier: num(r, 'kelly_multiplier', 1),
      sizeMultiplier: num(r, 'size_multiplier', 1),
      explanation: str(r, 'explanation'),
      detectedAt: str(r, 'detected_at'),
    }));
  }
}
