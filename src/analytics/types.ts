// ---------------------------------------------------------------------------
// Resolutions
// ---------------------------------------------------------------------------

export interface ResolutionRecord {
  marketId: string;
  question: string;
  category: string;
  forecastProb: number;
  /** 1 = resolved YES, 0 = resolved NO. */
  actualOutcome: number;
  edgeAtEntry: number;
  /** Confidence label from the forecaster (e.g. LOW / MEDIUM / HIGH). */
  confidence: string;
  evidenceQuality: number;
  stakeUsd: number;
  entryPrice: number;
  exitPrice: number;
  pnl: number;
  holdingHours: number;
  /** Model name → that model's forecast probability. */
  modelForecasts: Record<string, number>;
  /** ISO-8601; defaults to now when empty. */
  resolvedAt?: string;
}

export interface CalibrationPair {
  forecastProb: number;
  actualOutcome: number;
}

// ---------------------------------------------------------------------------
// Model weighting
// ---------------------------------------------------------------------------

export type WeightSource = 'learned' | 'default' | 'blended';

export interface ModelWeight {
  modelName: string;
  weight: number;
  source: WeightSource;
  brierScore: number;
  sampleCount: number;
  /** 0–1, how much the learned component can be trusted. */
  confidence: number;
}

export interface AdaptiveWeightResult {
  category: string;
  weights: Record<string, number>;
  details: ModelWeight[];
  dataAvailable: boolean;
  /** 0 = priors only, 1 = fully learned. */
  blendFactor: number;
}

export interface EnsembleConfig {
  models: string[];
  weights: Record<string, number>;
}

// ---------------------------------------------------------------------------
// Performance analytics
// ---------------------------------------------------------------------------

/**
 * Gross profit / gross loss. A book with profit and no losses has no finite
 * ratio and is tagged instead of carrying Infinity.
 */
export type ProfitFactor =
  | { kind: 'ratio'; value: number }
  | { kind: 'no_losses' };

export interface CategoryStats {
  category: string;
  totalTrades: number;
  wins: number;
  losses: number;
  totalPnl: number;
  totalStaked: number;
  avgEdge: number;
  avgEvidenceQuality: number;
  winRate: number;
  roiPct: number;
  bestTradePnl: number;
  worstTradePnl: number;
}

export interface ModelAccuracy {
  modelName: string;
  category: string;
  totalForecasts: number;
  /** Mean absolute error vs outcome. */
  avgError: number;
  brierScore: number;
}

export interface EquityPoint {
  timestamp: string;
  equity: number;
  pnlCumulative: number;
  drawdownPct: number;
  tradeCount: number;
}

export interface LeaderboardEntry {
  rank: number;
  category: string;
  roiPct: number;
  winRate: number;
  totalPnl: number;
  trades: number;
  avgEdge: number;
  score: number;
}

export type SnapshotSource = 'resolved' | 'open_positions' | 'empty';

export interface PerformanceSnapshot {
  source: SnapshotSource;

  totalTrades: number;
  totalForecasts: number;
  wins: number;
  losses: number;
  breakeven: number;
  winRate: number;
  totalPnl: number;
  totalStaked: number;
  roiPct: number;
  profitFactor: ProfitFactor;
  avgWin: number;
  avgLoss: number;
  largestWin: number;
  largestLoss: number;
  avgHoldingHours: number;

  sharpeRatio: number;
  sortinoRatio: number;
  maxDrawdownPct: number;
  calmarRatio: number;
  avgEdgeCaptured: number;

  brierScore: number;
  calibrationSamples: number;

  /** Positive = win streak, negative = loss streak. */
  currentStreak: number;
  bestStreak: number;
  worstStreak: number;

  categoryStats: CategoryStats[];
  modelAccuracy: ModelAccuracy[];
  equityCurve: EquityPoint[];

  pnl7d: number;
  pnl30d: number;
  winRate7d: number;
  winRate30d: number;
  trades7d: number;
  trades30d: number;

  leaderboard: LeaderboardEntry[];

  /** Sections that threw and were skipped. */
  failedSections: string[];
}

// ---------------------------------------------------------------------------
// Regime
// ---------------------------------------------------------------------------

export const REGIMES = [
  'NORMAL',
  'TRENDING',
  'MEAN_REVERTING',
  'HIGH_VOLATILITY',
  'LOW_ACTIVITY',
] as const;

export type Regime = (typeof REGIMES)[number];

export interface RegimeSignals {
  /** Mean |edge| across recent candidates. */
  avgPriceMomentum: number;
  /** Mean signed edge across recent candidates. */
  momentumDirectionBias: number;
  /** Sample stdev of recent trade PnL. */
  priceVolatility: number;

  recentWinRate: number;
  currentStreak: number;
  recentAvgPnl: number;
  recentTradeCount: number;

  /** Sample stdev of recent candidates' implied probability. */
  avgSpread: number;
  marketsActive: number;
}

export interface RegimeMultipliers {
  kellyMultiplier: number;
  edgeThresholdMultiplier: number;
  sizeMultiplier: number;
  entryPatience: number;
}

export interface RegimeState extends RegimeMultipliers {
  regime: Regime;
  confidence: number;
  signals: RegimeSignals;
  explanation: string;
}

export interface RegimeHistoryEntry {
  regime: string;
  confidence: number;
  kellyMultiplier: number;
  sizeMultiplier: number;
  explanation: string;
  detectedAt: string;
}

// ---------------------------------------------------------------------------
// Smart entry
// ---------------------------------------------------------------------------

export type TradeSide = 'BUY_YES' | 'BUY_NO';

export type EntryUrgency = 'immediate' | 'normal' | 'patient';

export type EntryStrategy = 'market' | 'limit' | 'patient';

export interface EntryLevel {
  price: number;
  confidence: number;
  reason: string;
  urgency: EntryUrgency;
  /** Fraction of the total order placed at this level. */
  sizeFraction: number;
}

export interface SmartEntryPlan {
  marketId: string;
  side: TradeSide;
  currentPrice: number;
  fairValue: number;

  /** Best to worst. */
  entryLevels: EntryLevel[];

  recommendedPrice: number;
  recommendedStrategy: EntryStrategy;
  expectedImprovementBps: number;
  maxWaitMinutes: number;

  vwapSignal: string;
  depthSignal: string;
  momentumSignal: string;
  flowSignal: string;
}
