/**
 * Smart Entry Calculator
 *
 * Turns a trade decision into an order plan: one or more priced, sized
 * levels plus a recommended price. Large edges and markets close to
 * resolution take the current price. Otherwise VWAP, book depth, momentum
 * and order-flow scores decide between an aggressive limit, a standard
 * limit, or a patient tiered entry.
 */

import { logger as rootLogger } from '../lib/logger.js';
import { finiteOrZero } from '../db/store.js';
import type { EntryLevel, SmartEntryPlan, TradeSide } from './types.js';

const log = rootLogger.child({ component: 'smart-entry' });

export interface SmartEntryConfig {
  /** Largest price improvement a patient plan will target. */
  maxImprovementPct: number;
  /** |edge| above this takes the current price. */
  minEdgeForMarketOrder: number;
  /** > 1 waits longer, < 1 waits less. */
  patienceFactor: number;
}

export const DEFAULT_SMART_ENTRY_CONFIG: SmartEntryConfig = {
  maxImprovementPct: 0.03,
  minEdgeForMarketOrder: 0.1,
  patienceFactor: 1,
};

export interface EntryRequest {
  marketId: string;
  side: TradeSide;
  currentPrice: number;
  fairValue: number;
  edge: number;
  /** Orderbook depth in USD. */
  bidDepth?: number;
  askDepth?: number;
  vwap?: number;
  /** Recent price change rate. */
  priceMomentum?: number;
  /** Order flow imbalance, −1 to +1. */
  flowImbalance?: number;
  spread?: number;
  hoursToResolution?: number;
  /** Patience multiplier from the regime detector. */
  regimePatience?: number;
}

const NEAR_RESOLUTION_HOURS = 24;
const DEFAULT_HOURS_TO_RESOLUTION = 720;
const MARKET_MAX_WAIT_MINUTES = 60;
const PRICE_FLOOR = 0.01;
const PRICE_CEIL = 0.99;

export class SmartEntryCalculator {
  readonly config: SmartEntryConfig;

  constructor(config: Partial<SmartEntryConfig> = {}) {
    this.config = { ...DEFAULT_SMART_ENTRY_CONFIG, ...config };
  }

  calculateEntry(request: EntryRequest): SmartEntryPlan {
    const { marketId, side } = request;
    const currentPrice = finiteOrZero(request.currentPrice);
    const edge = finiteOrZero(request.edge);
    const bidDepth = finiteOrZero(request.bidDepth ?? 0);
    const askDepth = finiteOrZero(request.askDepth ?? 0);
    const vwap = finiteOrZero(request.vwap ?? 0);
    const momentum = finiteOrZero(request.priceMomentum ?? 0);
    const flow = finiteOrZero(request.flowImbalance ?? 0);
    const spread = finiteOrZero(request.spread ?? 0);
    const hours = finiteOrZero(request.hoursToResolution ?? DEFAULT_HOURS_TO_RESOLUTION);
    const regimePatience = finiteOrZero(request.regimePatience ?? 1);

    const plan: SmartEntryPlan = {
      marketId,
      side,
      currentPrice,
      fairValue: finiteOrZero(request.fairValue),
      entryLevels: [],
      recommendedPrice: currentPrice,
      recommendedStrategy: 'market',
      expectedImprovementBps: 0,
      maxWaitMinutes: MARKET_MAX_WAIT_MINUTES,
      vwapSignal: '',
      depthSignal: '',
      momentumSignal: '',
      flowSignal: '',
    };

    if (Math.abs(edge) > this.config.minEdgeForMarketOrder) {
      plan.entryLevels.push(
        level(currentPrice, 0.9, `Large edge (${(edge * 100).toFixed(1)}%) — take current price`, 'immediate'),
      );
      log.info({ marketId, edge: Math.round(edge * 10_000) / 10_000 }, 'Market order: edge above threshold');
      return plan;
    }

    if (hours < NEAR_RESOLUTION_HOURS) {
      plan.entryLevels.push(level(currentPrice, 0.8, 'Near resolution — take current price', 'immediate'));
      return plan;
    }

    const patience = this.config.patienceFactor * regimePatience;

    // -----------------------------------------------------------------------
    // Signal analysis
    // -----------------------------------------------------------------------

    let vwapScore = 0;
    if (vwap > 0) {
      const divergence = signedPct((currentPrice - vwap) / vwap);
      if (side === 'BUY_YES') {
        if (currentPrice < vwap) {
          vwapScore = 0.3;
          plan.vwapSignal = `Price below VWAP (${divergence}) — favorable`;
        } else {
          vwapScore = -0.2;
          plan.vwapSignal = `Price above VWAP (${divergence}) — wait for dip`;
        }
      } else if (currentPrice > vwap) {
        vwapScore = 0.3;
        plan.vwapSignal = 'Price above VWAP — favorable for NO';
      } else {
        vwapScore = -0.2;
        plan.vwapSignal = 'Price below VWAP — wait for bounce';
      }
    }

    let depthScore = 0;
    if (bidDepth > 0 && askDepth > 0) {
      const ratio = bidDepth / askDepth;
      if (side === 'BUY_YES') {
        if (ratio > 1.5) {
          depthScore = 0.2;
          plan.depthSignal = `Strong bid support (${ratio.toFixed(1)}x ratio)`;
        } else if (ratio < 0.7) {
          depthScore = -0.3;
          plan.depthSignal = `Weak bid support (${ratio.toFixed(1)}x ratio) — expect dip`;
        }
      } else if (ratio < 0.7) {
        depthScore = 0.2;
        plan.depthSignal = 'Weak bid side favors NO entry';
      } else if (ratio > 1.5) {
        depthScore = -0.2;
        plan.depthSignal = 'Strong bid side — price may rise against NO';
      }
    }

    let momentumScore = 0;
    if (Math.abs(momentum) > 0.01) {
      if (side === 'BUY_YES') {
        if (momentum < -0.02) {
          momentumScore = -0.3;
          plan.momentumSignal = `Negative momentum (${signedPct(momentum)}) — wait`;
        } else if (momentum > 0.02) {
          momentumScore = 0.2;
          plan.momentumSignal = `Positive momentum (${signedPct(momentum)}) — enter now`;
        }
      } else if (momentum > 0.02) {
        momentumScore = -0.3;
        plan.momentumSignal = 'Positive momentum — unfavorable for NO';
      } else if (momentum < -0.02) {
        momentumScore = 0.2;
        plan.momentumSignal = 'Negative momentum — favorable for NO';
      }
    }

    let flowScore = 0;
    if (Math.abs(flow) > 0.1) {
      const withUs = side === 'BUY_YES' ? flow : -flow;
      if (withUs > 0.2) {
        flowScore = 0.1;
        plan.flowSignal = side === 'BUY_YES'
          ? `Buy flow imbalance (${signed2(flow)}) — smart money buying`
          : `Sell flow imbalance (${signed2(flow)}) — favorable for NO`;
      } else if (withUs < -0.2) {
        flowScore = -0.2;
        plan.flowSignal = side === 'BUY_YES'
          ? `Sell flow imbalance (${signed2(flow)}) — wait`
          : `Buy flow imbalance (${signed2(flow)}) — wait`;
      }
    }

    // -----------------------------------------------------------------------
    // Entry levels
    // -----------------------------------------------------------------------

    // Positive = enter now, negative = wait for a better price
    const signalSum = vwapScore + depthScore + momentumScore + flowScore;

    if (signalSum > 0.3) {
      plan.recommendedStrategy = 'limit';
      plan.maxWaitMinutes = Math.trunc(15 * patience);
      plan.entryLevels.push(
        level(adjustPrice(currentPrice, side, -spread * 0.3), 0.8, 'Favorable signals — aggressive limit order', 'normal'),
        level(currentPrice, 0.9, 'Fallback: take current price', 'immediate', 0.5),
      );
    } else if (signalSum < -0.2) {
      const target = Math.min(this.config.maxImprovementPct, spread + 0.005);
      plan.recommendedStrategy = 'patient';
      plan.maxWaitMinutes = Math.trunc(60 * patience);
      plan.entryLevels.push(
        level(adjustPrice(currentPrice, side, -target), 0.5, 'Patient level — best price target', 'patient', 0.3),
        level(adjustPrice(currentPrice, side, -target * 0.5), 0.7, 'Mid level — moderate improvement', 'normal', 0.4),
        level(currentPrice, 0.9, "Fallback: take current price if levels don't fill", 'immediate', 0.3),
      );
    } else {
      plan.recommendedStrategy = 'limit';
      plan.maxWaitMinutes = Math.trunc(30 * patience);
      plan.entryLevels.push(
        level(adjustPrice(currentPrice, side, -spread * 0.2), 0.75, 'Neutral signals — standard limit order', 'normal'),
      );
    }

    const best = bestLevel(plan.entryLevels);
    if (best) {
      plan.recommendedPrice = best.price;
      plan.expectedImprovementBps = Math.abs(currentPrice - best.price) * 10_000;
    }

    log.info(
      {
        marketId,
        strategy: plan.recommendedStrategy,
        improvementBps: Math.round(plan.expectedImprovementBps * 10) / 10,
        levels: plan.entryLevels.length,
        signalSum: Math.round(signalSum * 1000) / 1000,
      },
      'Entry plan computed',
    );

    return plan;
  }
}

/**
 * Move a YES-token price by `adjustment` in the side's favour: BUY_YES adds
 * it, BUY_NO subtracts it. Clamped to [0.01, 0.99].
 */
export function adjustPrice(price: number, side: TradeSide, adjustment: number): number {
  const moved = side === 'BUY_YES' ? price + adjustment : price - adjustment;
  return Math.max(PRICE_FLOOR, Math.min(PRICE_CEIL, moved));
}

function level(
  price: number,
  confidence: number,
  reason: string,
  urgency: EntryLevel['urgency'],
  sizeFraction = 1,
): EntryLevel {
  return { price, confidence, reason, urgency, sizeFraction };
}

/** Highest confidence × size; the first level wins ties. */
function bestLevel(levels: EntryLevel[]): EntryLevel | undefined {
  let best: EntryLevel | undefined;
  for (const l of levels) {
    if (!best || l.confidence * l.sizeFraction > best.confidence * best.sizeFraction) best = l;
  }
  return best;
}

function signedPct(fraction: number): string {
  const pct = fraction * 100;
  return `${pct >= 0 ? '+' : ''}${pct.toFixed(1)}%`;
}

function signed2(v: number): string {
  return `${v >= 0 ? '+' : ''}${v.toFixed(2)}`;
}
