/**
 * Market Regime Detector
 *
 * Classifies current conditions from recent trade outcomes and the latest
 * scanned candidates, then scales strategy knobs (Kelly fraction, edge
 * threshold, position size, entry patience) toward the regime's extremes
 * in proportion to the classification confidence.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * SCORING
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * NORMAL starts at 0.3, every other regime at 0. Each trigger that fires adds
 * its score. The highest total wins (ties go to the earlier regime in REGIMES)
 * and confidence = min(1, best + (best − second)).
 *
 * Multipliers: 1 + (extreme − 1) · confidence.
 */

import { logger as rootLogger } from '../lib/logger.js';
import type { AnalyticsRepository } from '../db/analyticsRepository.js';
import { mean, recentStreak, sampleStdev } from './stats.js';
import {
  REGIMES,
  type Regime,
  type RegimeHistoryEntry,
  type RegimeMultipliers,
  type RegimeSignals,
  type RegimeState,
} from './types.js';

const log = rootLogger.child({ component: 'regime-detector' });

export interface RegimeDetectorConfig {
  lookbackTrades: number;
  volHighThreshold: number;
  volLowThreshold: number;
  momentumThreshold: number;
  minTradesForSignal: number;
  candidateLookback: number;
  /** Append every detection to regime_history. */
  persistHistory: boolean;
}

export const DEFAULT_REGIME_DETECTOR_CONFIG: RegimeDetectorConfig = {
  lookbackTrades: 20,
  volHighThreshold: 0.15,
  volLowThreshold: 0.03,
  momentumThreshold: 0.08,
  minTradesForSignal: 5,
  candidateLookback: 50,
  persistHistory: false,
};

const NORMAL_BASE_SCORE = 0.3;
const INSUFFICIENT_DATA_CONFIDENCE = 0.3;
const LOW_ACTIVITY_MARKETS = 5;

// ---------------------------------------------------------------------------
// Frozen tables
// ---------------------------------------------------------------------------

export interface RegimeTrigger {
  regime: Regime;
  score: number;
  fires: (s: RegimeSignals, c: RegimeDetectorConfig) => boolean;
}

export const REGIME_TRIGGERS: readonly RegimeTrigger[] = Object.freeze<RegimeTrigger[]>([
  { regime: 'HIGH_VOLATILITY', score: 0.4, fires: (s, c) => s.priceVolatility > c.volHighThreshold },
  { regime: 'HIGH_VOLATILITY', score: 0.2, fires: (s) => Math.abs(s.currentStreak) >= 3 },
  { regime: 'TRENDING', score: 0.4, fires: (s, c) => Math.abs(s.momentumDirectionBias) > c.momentumThreshold },
  { regime: 'TRENDING', score: 0.2, fires: (s) => s.recentWinRate > 0.65 },
  {
    regime: 'MEAN_REVERTING',
    score: 0.3,
    fires: (s, c) => s.priceVolatility < c.volLowThreshold && s.avgPriceMomentum > 0.02,
  },
  { regime: 'MEAN_REVERTING', score: 0.2, fires: (s) => s.recentWinRate >= 0.4 && s.recentWinRate <= 0.6 },
  { regime: 'LOW_ACTIVITY', score: 0.3, fires: (s) => s.marketsActive < LOW_ACTIVITY_MARKETS },
  { regime: 'LOW_ACTIVITY', score: 0.2, fires: (s, c) => s.recentTradeCount < c.minTradesForSignal },
]);

const NEUTRAL: RegimeMultipliers = Object.freeze({
  kellyMultiplier: 1,
  edgeThresholdMultiplier: 1,
  sizeMultiplier: 1,
  entryPatience: 1,
});

/** Multiplier values at full confidence. */
export const REGIME_EXTREMES: Readonly<Record<Regime, RegimeMultipliers>> = Object.freeze({
  NORMAL: NEUTRAL,
  HIGH_VOLATILITY: Object.freeze({
    kellyMultiplier: 0.6,
    edgeThresholdMultiplier: 1.5,
    sizeMultiplier: 0.7,
    entryPatience: 1.5,
  }),
  TRENDING: Object.freeze({
    kellyMultiplier: 1.15,
    edgeThresholdMultiplier: 0.9,
    sizeMultiplier: 1.1,
    entryPatience: 0.8,
  }),
  MEAN_REVERTING: Object.freeze({
    kellyMultiplier: 1,
    edgeThresholdMultiplier: 1,
    sizeMultiplier: 1,
    entryPatience: 1.3,
  }),
  LOW_ACTIVITY: Object.freeze({
    kellyMultiplier: 0.8,
    edgeThresholdMultiplier: 1.3,
    sizeMultiplier: 0.8,
    entryPatience: 1.4,
  }),
});

// ---------------------------------------------------------------------------
// Detector
// ---------------------------------------------------------------------------

export class RegimeDetector {
  readonly config: RegimeDetectorConfig;
  private readonly now: () => Date;

  constructor(
    private readonly repo: AnalyticsRepository,
    config: Partial<RegimeDetectorConfig> = {},
    now: () => Date = () => new Date(),
  ) {
    this.config = { ...DEFAULT_REGIME_DETECTOR_CONFIG, ...config };
    this.now = now;
  }

  async detect(): Promise<RegimeState> {
    const signals = await this.gatherSignals();
    const { regime, confidence, explanation } = classifyRegime(signals, this.config);
    const state: RegimeState = {
      regime,
      confidence,
      signals,
      explanation,
      ...regimeMultipliers(regime, confidence),
    };

    log.info(
      {
        regime,
        confidence: round3(confidence),
        kellyMult: round3(state.kellyMultiplier),
        sizeMult: round3(state.sizeMultiplier),
      },
      'Regime detected',
    );

    if (this.config.persistHistory) {
      await this.recordRegime(state);
    }
    return state;
  }

  async recordRegime(state: RegimeState): Promise<void> {
    await this.repo.insertRegime({
      regime: state.regime,
      confidence: state.confidence,
      kellyMultiplier: state.kellyMultiplier,
      sizeMultiplier: state.sizeMultiplier,
      explanation: state.explanation,
      detectedAt: this.now().toISOString(),
    });
  }

  /** Newest first. */
  async getRegimeHistory(limit = 50): Promise<RegimeHistoryEntry[]> {
    return this.repo.regimeHistory(Math.max(0, Math.trunc(limit)));
  }

  async gatherSignals(): Promise<RegimeSignals> {
    const signals = defaultSignals();

    const trades = await this.repo.recentTrades(this.config.lookbackTrades);
    if (trades.length > 0) {
      const pnls = trades.map((t) => t.pnl);
      signals.recentTradeCount = pnls.length;
      signals.recentAvgPnl = mean(pnls);
      signals.recentWinRate = pnls.filter((p) => p > 0).length / pnls.length;
      signals.currentStreak = recentStreak(pnls);
      signals.priceVolatility = sampleStdev(pnls);
    }

    const candidates = await this.repo.recentCandidates(this.config.candidateLookback);
    if (candidates.length > 0) {
      const edges = candidates.map((c) => c.edge);
      signals.marketsActive = candidates.length;
      signals.avgPriceMomentum = mean(edges.map(Math.abs));
      signals.momentumDirectionBias = mean(edges);
      signals.avgSpread = sampleStdev(candidates.map((c) => c.impliedProb));
    }

    return signals;
  }
}

// ---------------------------------------------------------------------------
// Pure classification
// ---------------------------------------------------------------------------

export function defaultSignals(): RegimeSignals {
  return {
    avgPriceMomentum: 0,
    momentumDirectionBias: 0,
    priceVolatility: 0,
    recentWinRate: 0.5,
    currentStreak: 0,
    recentAvgPnl: 0,
    recentTradeCount: 0,
    avgSpread: 0,
    marketsActive: 0,
  };
}

export function classifyRegime(
  signals: RegimeSignals,
  config: RegimeDetectorConfig = DEFAULT_REGIME_DETECTOR_CONFIG,
): { regime: Regime; confidence: number; explanation: string } {
  if (signals.recentTradeCount < config.minTradesForSignal) {
    return {
      regime: 'NORMAL',
      confidence: INSUFFICIENT_DATA_CONFIDENCE,
      explanation: 'Insufficient data for regime detection — using defaults',
    };
  }

  const scores: Record<Regime, number> = {
    NORMAL: NORMAL_BASE_SCORE,
    TRENDING: 0,
    MEAN_REVERTING: 0,
    HIGH_VOLATILITY: 0,
    LOW_ACTIVITY: 0,
  };
  for (const trigger of REGIME_TRIGGERS) {
    if (trigger.fires(signals, config)) scores[trigger.regime] += trigger.score;
  }

  let best: Regime = REGIMES[0];
  for (const regime of REGIMES) {
    if (scores[regime] > scores[best]) best = regime;
  }

  const sorted = REGIMES.map((r) => scores[r]).sort((a, b) => b - a);
  const margin = sorted[0] - sorted[1];
  const confidence = Math.min(1, scores[best] + margin);

  return { regime: best, confidence, explanation: explain(best, signals) };
}

export function regimeMultipliers(regime: Regime, confidence: number): RegimeMultipliers {
  const extreme = REGIME_EXTREMES[regime];
  const c = Math.max(0, Math.min(1, confidence));
  return {
    kellyMultiplier: 1 + (extreme.kellyMultiplier - 1) * c,
    edgeThresholdMultiplier: 1 + (extreme.edgeThresholdMultiplier - 1) * c,
    sizeMultiplier: 1 + (extreme.sizeMultiplier - 1) * c,
    entryPatience: 1 + (extreme.entryPatience - 1) * c,
  };
}

function explain(regime: Regime, s: RegimeSignals): string {
  switch (regime) {
    case 'TRENDING':
      return `Directional trend detected (bias: ${signed3(s.momentumDirectionBias)}) — lean into momentum`;
    case 'MEAN_REVERTING':
      return 'Low volatility with price oscillation — contrarian entries favored';
    case 'HIGH_VOLATILITY':
      return `High volatility detected (σ=${s.priceVolatility.toFixed(3)}) — reducing exposure`;
    case 'LOW_ACTIVITY':
      return 'Low market activity — fewer opportunities available';
    case 'NORMAL':
      return 'Markets operating normally — standard strategy applies';
  }
}

function signed3(v: number): string {
  return `${v >= 0 ? '+' : ''}${v.toFixed(3)}`;
}

function round3(v: number): number {
  return Math.round(v * 1000) / 1000;
}
