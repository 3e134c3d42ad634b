import { describe, it, expect, beforeEach } from 'vitest';
import {
  RegimeDetector,
  REGIME_EXTREMES,
  classifyRegime,
  defaultSignals,
  regimeMultipliers,
} from '../regimeDetector.js';
import type { SqliteStore } from '../../db/sqliteStore.js';
import type { AnalyticsRepository } from '../../db/analyticsRepository.js';
import { NOW, clock, createTestStore, seedCandidates, seedTrades } from './fixtures.js';

describe('regimeMultipliers', () => {
  it('is neutral at zero confidence', () => {
    expect(regimeMultipliers('HIGH_VOLATILITY', 0)).toEqual({
      kellyMultiplier: 1,
      edgeThresholdMultiplier: 1,
      sizeMultiplier: 1,
      entryPatience: 1,
    });
  });

  it('reaches the extremes at full confidence', () => {
    expect(regimeMultipliers('HIGH_VOLATILITY', 1)).toEqual(REGIME_EXTREMES.HIGH_VOLATILITY);
    expect(regimeMultipliers('TRENDING', 1)).toEqual(REGIME_EXTREMES.TRENDING);
  });

  it('interpolates linearly in between', () => {
    const m = regimeMultipliers('LOW_ACTIVITY', 0.5);
    expect(m.kellyMultiplier).toBeCloseTo(0.9, 9);
    expect(m.edgeThresholdMultiplier).toBeCloseTo(1.15, 9);
    expect(m.sizeMultiplier).toBeCloseTo(0.9, 9);
    expect(m.entryPatience).toBeCloseTo(1.2, 9);
  });

  it('clamps confidence into [0, 1]', () => {
    expect(regimeMultipliers('HIGH_VOLATILITY', 3)).toEqual(REGIME_EXTREMES.HIGH_VOLATILITY);
    expect(regimeMultipliers('HIGH_VOLATILITY', -1)).toEqual(REGIME_EXTREMES.NORMAL);
  });
});

describe('classifyRegime', () => {
  it('defaults to NORMAL below the minimum trade count', () => {
    const result = classifyRegime({ ...defaultSignals(), recentTradeCount: 4, priceVolatility: 9 });

    expect(result).toEqual({
      regime: 'NORMAL',
      confidence: 0.3,
      explanation: 'Insufficient data for regime detection — using defaults',
    });
  });

  it('breaks ties toward the earlier regime', () => {
    // LOW_ACTIVITY scores 0.3 from the market count, matching NORMAL's base
    const result = classifyRegime({
      ...defaultSignals(),
      recentTradeCount: 10,
      recentWinRate: 0.3,
      priceVolatility: 0.05,
      marketsActive: 2,
    });

    expect(result.regime).toBe('NORMAL');
    expect(result.confidence).toBeCloseTo(0.3, 9);
    expect(result.explanation).toBe('Markets operating normally — standard strategy applies');
  });

  it('adds the winning margin to the top score', () => {
    const result = classifyRegime({
      ...defaultSignals(),
      recentTradeCount: 10,
      recentWinRate: 0.3,
      priceVolatility: 0.4,
      currentStreak: -4,
      marketsActive: 20,
    });

    // HIGH_VOLATILITY 0.6 against NORMAL's 0.3
    expect(result.regime).toBe('HIGH_VOLATILITY');
    expect(result.confidence).toBeCloseTo(0.9, 9);
    expect(result.explanation).toBe('High volatility detected (σ=0.400) — reducing exposure');
  });

  it('explains a mean-reverting market', () => {
    const result = classifyRegime({
      ...defaultSignals(),
      recentTradeCount: 10,
      recentWinRate: 0.5,
      priceVolatility: 0.01,
      avgPriceMomentum: 0.05,
      marketsActive: 20,
    });

    // 0.3 + 0.2 against NORMAL's 0.3
    expect(result.regime).toBe('MEAN_REVERTING');
    expect(result.confidence).toBeCloseTo(0.7, 9);
    expect(result.explanation).toBe('Low volatility with price oscillation — contrarian entries favored');
  });
});

describe('RegimeDetector', () => {
  let store: SqliteStore;
  let repo: AnalyticsRepository;

  beforeEach(async () => {
    ({ store, repo } = await createTestStore());
  });

  it('falls back to NORMAL with neutral multipliers on an empty store', async () => {
    const state = await new RegimeDetector(repo, {}, clock).detect();

    expect(state.regime).toBe('NORMAL');
    expect(state.confidence).toBe(0.3);
    expect(state.kellyMultiplier).toBe(1);
    expect(state.sizeMultiplier).toBe(1);
    expect(state.signals).toEqual(defaultSignals());
  });

  it('detects high volatility from swinging trade PnL', async () => {
    await seedTrades(store, [50, -40, 60, -50, 40, -45].map((pnl) => ({ pnl })));
    await seedCandidates(store, Array.from({ length: 5 }, () => ({ edge: 0.01, impliedProb: 0.5 })));

    const state = await new RegimeDetector(repo, {}, clock).detect();

    // HIGH_VOLATILITY 0.4, NORMAL 0.3, MEAN_REVERTING 0.2 (50% win rate)
    expect(state.regime).toBe('HIGH_VOLATILITY');
    expect(state.confidence).toBeCloseTo(0.5, 9);
    expect(state.kellyMultiplier).toBeCloseTo(0.8, 9);
    expect(state.sizeMultiplier).toBeCloseTo(0.85, 9);
    expect(state.edgeThresholdMultiplier).toBeCloseTo(1.25, 9);
    expect(state.entryPatience).toBeCloseTo(1.25, 9);

    expect(state.signals.recentTradeCount).toBe(6);
    expect(state.signals.recentWinRate).toBe(0.5);
    expect(state.signals.recentAvgPnl).toBeCloseTo(2.5, 9);
    expect(state.signals.currentStreak).toBe(-1);
    expect(state.signals.priceVolatility).toBeCloseTo(Math.sqrt(2757.5), 9);
    expect(state.explanation).toBe(
      `High volatility detected (σ=${state.signals.priceVolatility.toFixed(3)}) — reducing exposure`,
    );
  });

  it('detects a trend from one-sided candidate edges', async () => {
    await seedTrades(store, Array.from({ length: 10 }, () => ({ pnl: 0.01 })));
    await seedCandidates(store, Array.from({ length: 10 }, () => ({ edge: 0.12, impliedProb: 0.4 })));

    const state = await new RegimeDetector(repo, {}, clock).detect();

    // TRENDING 0.6 against NORMAL and MEAN_REVERTING at 0.3
    expect(state.regime).toBe('TRENDING');
    expect(state.confidence).toBeCloseTo(0.9, 9);
    expect(state.kellyMultiplier).toBeCloseTo(1.135, 9);
    expect(state.signals.currentStreak).toBe(10);
    expect(state.signals.marketsActive).toBe(10);
    expect(state.explanation).toBe('Directional trend detected (bias: +0.120) — lean into momentum');
  });

  it('reads only the configured lookback of trades', async () => {
    await seedTrades(store, Array.from({ length: 30 }, (_, i) => ({ pnl: i < 20 ? -10 : 10 })));

    const signals = await new RegimeDetector(repo, { lookbackTrades: 10 }, clock).gatherSignals();

    expect(signals.recentTradeCount).toBe(10);
    expect(signals.recentWinRate).toBe(1);
    expect(signals.currentStreak).toBe(10);
  });

  it('treats a missing implied probability as 0.5', async () => {
    await seedCandidates(store, [
      { edge: 0.1, impliedProb: 0.4 },
      { edge: -0.1, impliedProb: null },
      { edge: 0.3, impliedProb: 0.6 },
    ]);

    const signals = await new RegimeDetector(repo, {}, clock).gatherSignals();

    expect(signals.marketsActive).toBe(3);
    expect(signals.avgSpread).toBeCloseTo(0.1, 9);
    expect(signals.momentumDirectionBias).toBeCloseTo(0.1, 9);
    expect(signals.avgPriceMomentum).toBeCloseTo(0.5 / 3, 9);
  });

  describe('history', () => {
    it('is not written unless enabled', async () => {
      const detector = new RegimeDetector(repo, {}, clock);
      await detector.detect();

      expect(await detector.getRegimeHistory()).toEqual([]);
    });

    it('appends every detection when enabled, newest first', async () => {
      const detector = new RegimeDetector(repo, { persistHistory: true }, clock);
      await detector.detect();
      await seedTrades(store, [50, -40, 60, -50, 40, -45].map((pnl) => ({ pnl })));
      await seedCandidates(store, Array.from({ length: 5 }, () => ({ edge: 0.01, impliedProb: 0.5 })));
      await detector.detect();

      const history = await detector.getRegimeHistory();
      expect(history.map((h) => h.regime)).toEqual(['HIGH_VOLATILITY', 'NORMAL']);
      expect(history[1]).toEqual({
        regime: 'NORMAL',
        confidence: 0.3,
        kellyMultiplier: 1,
        sizeMultiplier: 1,
        explanation: 'Insufficient data for regime detection — using defaults',
        detectedAt: NOW.toISOString(),
      });
      expect(await detector.getRegimeHistory(1)).toHaveLength(1);
    });
  });
});
