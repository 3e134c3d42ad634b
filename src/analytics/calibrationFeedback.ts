/**
 * Calibration Feedback Loop
 *
 * Closes the loop between forecasts and outcomes. Each resolution is written
 * to three tables:
 *   calibration_history: (forecast, outcome) pairs for recalibration
 *   model_forecast_log : one row per ensemble member, for adaptive weighting
 *   performance_log    : the trade itself, for analytics
 *
 * Every `retrainInterval` resolutions the calibrator is refitted on the full
 * history and, on success, checkpointed to `engine_state`.
 */

import { logger as rootLogger } from '../lib/logger.js';
import type { AnalyticsRepository } from '../db/analyticsRepository.js';
import {
  HistoricalCalibrator,
  parseCheckpoint,
  toCheckpoint,
  type Calibrator,
  type CalibratorCheckpoint,
} from '../predictor/calibration.js';
import { inverseBrierWeights } from './stats.js';
import type { ResolutionRecord } from './types.js';

const log = rootLogger.child({ component: 'calibration-feedback' });

export const CALIBRATOR_STATE_KEY = 'calibrator_state';
export const RETRAIN_COUNTER_KEY = 'retrain_counter';

// ---------------------------------------------------------------------------
// Retrain counter
// ---------------------------------------------------------------------------

/** Counts resolutions since the last retrain attempt. */
export interface RetrainCounter {
  /** Add one and resolve to the new count. */
  increment(): Promise<number>;
  reset(): Promise<void>;
}

/** Process-local counter. Each loop instance keeps its own cadence. */
export class InMemoryRetrainCounter implements RetrainCounter {
  private count = 0;

  get value(): number {
    return this.count;
  }

  async increment(): Promise<number> {
    this.count++;
    return this.count;
  }

  async reset(): Promise<void> {
    this.count = 0;
  }
}

/**
 * Counter persisted in `engine_state`, so agent instances sharing a store
 * share one retrain cadence. The increment is a single upsert; a store
 * without the table counts every resolution as the first.
 */
export class StoreRetrainCounter implements RetrainCounter {
  constructor(
    private readonly repo: AnalyticsRepository,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async increment(): Promise<number> {
    const next = await this.repo.incrementEngineCounter(RETRAIN_COUNTER_KEY, this.now().toISOString());
    return next ?? 1;
  }

  async reset(): Promise<void> {
    await this.repo.setEngineState(RETRAIN_COUNTER_KEY, '0', this.now().toISOString());
  }
}

// ---------------------------------------------------------------------------
// Feedback loop
// ---------------------------------------------------------------------------

export interface CalibrationFeedbackConfig {
  /** Retrain the calibrator every N resolutions. */
  retrainInterval: number;
  /** Fewer calibration pairs than this skips the retrain. */
  minRetrainSamples: number;
  /** Models need this many logged forecasts before they get a learned weight. */
  minModelSamples: number;
}

export const DEFAULT_CALIBRATION_FEEDBACK_CONFIG: CalibrationFeedbackConfig = {
  retrainInterval: 10,
  minRetrainSamples: 30,
  minModelSamples: 5,
};

export interface CalibrationFeedbackDeps {
  calibrator?: Calibrator;
  counter?: RetrainCounter;
  now?: () => Date;
}

export class CalibrationFeedbackLoop {
  readonly config: CalibrationFeedbackConfig;
  readonly calibrator: Calibrator;
  private readonly counter: RetrainCounter;
  private readonly now: () => Date;

  constructor(
    private readonly repo: AnalyticsRepository,
    config: Partial<CalibrationFeedbackConfig> = {},
    deps: CalibrationFeedbackDeps = {},
  ) {
    this.config = { ...DEFAULT_CALIBRATION_FEEDBACK_CONFIG, ...config };
    this.calibrator = deps.calibrator ?? new HistoricalCalibrator();
    this.counter = deps.counter ?? new InMemoryRetrainCounter();
    this.now = deps.now ?? (() => new Date());
  }

  /** Persist a resolution to every tracking table, then retrain if due. */
  async recordResolution(record: ResolutionRecord): Promise<void> {
    const ts = this.resolutionTimestamp(record);

    await this.repo.insertCalibrationPair(
      record.marketId,
      { forecastProb: record.forecastProb, actualOutcome: record.actualOutcome },
      ts,
    );

    const forecasts = Object.entries(record.modelForecasts).map(([modelName, forecastProb]) => ({
      modelName,
      forecastProb,
    }));
    if (forecasts.length > 0) {
      await this.repo.insertModelForecasts(record, forecasts, ts);
    }

    await this.repo.insertPerformance(record, ts);

    const count = await this.counter.increment();
    if (count >= this.config.retrainInterval) {
      await this.retrainCalibrator();
      await this.counter.reset();
    }

    log.info(
      {
        marketId: record.marketId,
        forecast: round(record.forecastProb, 3),
        outcome: record.actualOutcome,
        pnl: round(record.pnl, 2),
      },
      'Resolution recorded',
    );
  }

  /**
   * `resolvedAt` as a UTC ISO string, so stored timestamps order and compare
   * as text. Empty or unparseable values fall back to the clock.
   */
  private resolutionTimestamp(record: ResolutionRecord): string {
    if (record.resolvedAt) {
      const parsed = new Date(record.resolvedAt);
      if (!Number.isNaN(parsed.getTime())) return parsed.toISOString();
      log.warn(
        { marketId: record.marketId, resolvedAt: record.resolvedAt },
        'Unparseable resolvedAt, using current time',
      );
    }
    return this.now().toISOString();
  }

  /**
   * Refit the calibrator on the full history. Returns false without touching
   * the calibrator or the checkpoint when history is short or the fit fails.
   */
  async retrainCalibrator(): Promise<boolean> {
    const pairs = await this.repo.listCalibrationPairs();

    if (pairs.length < this.config.minRetrainSamples) {
      log.info(
        { samples: pairs.length, required: this.config.minRetrainSamples },
        'Insufficient calibration data, retrain skipped',
      );
      return false;
    }

    const success = this.calibrator.fit(pairs);
    if (!success) return false;

    const stats = this.calibrator.stats;
    const checkpoint = toCheckpoint(stats, this.now().toISOString());
    await this.repo.setEngineState(CALIBRATOR_STATE_KEY, JSON.stringify(checkpoint), checkpoint.fittedAt);

    log.info(
      { samples: stats.nSamples, brier: stats.brierScore, a: stats.a, b: stats.b },
      'Calibrator retrained',
    );
    return true;
  }

  /**
   * Inverse-Brier model weights for a category (`'ALL'` spans every
   * category). Empty when no model has enough logged forecasts.
   */
  async getModelWeights(category = 'ALL'): Promise<Record<string, number>> {
    const rows = await this.repo.modelBrierStats(category, this.config.minModelSamples);
    if (rows.length === 0) return {};

    const weights = inverseBrierWeights(rows);
    log.debug({ category, weights }, 'Adaptive model weights');
    return weights;
  }

  async getCheckpoint(): Promise<CalibratorCheckpoint | null> {
    const raw = await this.repo.getEngineState(CALIBRATOR_STATE_KEY);
    return raw === null ? null : parseCheckpoint(raw);
  }

  /** Rehydrate the calibrator from the stored checkpoint, if any. */
  async restoreCalibrator(): Promise<boolean> {
    const checkpoint = await this.getCheckpoint();
    if (!checkpoint) return false;

    this.calibrator.restore(checkpoint);
    log.info(
      { samples: checkpoint.nSamples, fittedAt: checkpoint.fittedAt },
      'Calibrator restored from checkpoint',
    );
    return true;
  }
}

function round(v: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(v * f) / f;
}
