/**
 * Probability Recalibration
 *
 * Learns a correction for systematically over- or under-confident forecasts
 * from resolved (forecast, outcome) pairs.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * CALIBRATION MODEL
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Model (Platt scaling on the log-odds of the raw forecast):
 *   x = logit(clamp(p, 0.01, 0.99))
 *   calibrated(p) = σ(a·x + b)
 *   where σ(z) = 1 / (1 + exp(−z))
 *
 * Parameters:
 *   a = slope    : < 1 shrinks over-confident forecasts toward 0.5
 *   b = intercept: shifts the whole curve toward YES or NO
 *
 * An unfitted calibrator returns the raw probability unchanged.
 *
 * Fitting method: IRLS (Iteratively Reweighted Least Squares)
 *   - Newton-Raphson on the log-likelihood
 *   - L2 regularization keeps the solve finite under near-separation
 *   - A fit needs at least `minSamples` pairs with both outcomes present
 */

import { z } from 'zod';
import { logger as rootLogger } from '../lib/logger.js';
import type { CalibrationPair } from '../analytics/types.js';

const log = rootLogger.child({ component: 'calibrator' });

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export interface CalibratorStats {
  nSamples: number;
  /** Brier score of the calibrated forecasts on the fit set. 1 before any fit. */
  brierScore: number;
  a: number;
  b: number;
  isFitted: boolean;
}

/** Persisted fit, stored as JSON under `engine_state.key = 'calibrator_state'`. */
export const calibratorCheckpointSchema = z.object({
  version: z.literal(1),
  nSamples: z.number().int().nonnegative(),
  brierScore: z.number().finite(),
  a: z.number().finite(),
  b: z.number().finite(),
  fittedAt: z.string(),
});

export type CalibratorCheckpoint = z.infer<typeof calibratorCheckpointSchema>;

/** The recalibration collaborator the feedback loop retrains. */
export interface Calibrator {
  fit(pairs: CalibrationPair[]): boolean;
  readonly stats: CalibratorStats;
  calibrate(prob: number): number;
  restore(checkpoint: CalibratorCheckpoint): void;
}

export interface LogisticSample {
  x: number;
  /** 0 or 1. */
  y: number;
}

export interface LogisticFit {
  slope: number;
  intercept: number;
  iterations: number;
  converged: boolean;
  /** Final penalized log-likelihood. */
  logLikelihood: number;
}

export interface CalibratorConfig {
  minSamples: number;
  /** L2 regularization strength. */
  regularization: number;
  maxIterations: number;
}

export const DEFAULT_CALIBRATOR_CONFIG: CalibratorConfig = {
  minSamples: 30,
  regularization: 0.001,
  maxIterations: 25,
};

const PROB_FLOOR = 0.01;
const PROB_CEIL = 0.99;

// ---------------------------------------------------------------------------
// HistoricalCalibrator
// ---------------------------------------------------------------------------

export class HistoricalCalibrator implements Calibrator {
  private readonly config: CalibratorConfig;
  private a = 1;
  private b = 0;
  private fitted = false;
  private nSamples = 0;
  private brierScore = 1;

  constructor(config: Partial<CalibratorConfig> = {}) {
    this.config = { ...DEFAULT_CALIBRATOR_CONFIG, ...config };
  }

  get stats(): CalibratorStats {
    return {
      nSamples: this.nSamples,
      brierScore: this.brierScore,
      a: this.a,
      b: this.b,
      isFitted: this.fitted,
    };
  }

  /**
   * Fit from resolved pairs. Returns false, leaving the previous fit in
   * place, when there is too little history, only one outcome class, or the
   * solve does not produce finite parameters.
   */
  fit(pairs: CalibrationPair[]): boolean {
    if (pairs.length < this.config.minSamples) {
      log.info(
        { samples: pairs.length, required: this.config.minSamples },
        'Insufficient calibration history',
      );
      return false;
    }

    const samples: LogisticSample[] = pairs.map((p) => ({
      x: logit(clampProb(p.forecastProb)),
      y: p.actualOutcome >= 0.5 ? 1 : 0,
    }));

    const positives = samples.reduce((sum, s) => sum + s.y, 0);
    if (positives === 0 || positives === samples.length) {
      log.info({ samples: samples.length, positives }, 'Calibration history has a single outcome class');
      return false;
    }

    const result = fitLogisticRegression(
      samples,
      this.config.regularization,
      this.config.maxIterations,
    );
    if (!Number.isFinite(result.slope) || !Number.isFinite(result.intercept)) {
      log.error({ iterations: result.iterations }, 'Calibration fit diverged');
      return false;
    }

    this.a = result.slope;
    this.b = result.intercept;
    this.fitted = true;
    this.nSamples = samples.length;

    let sq = 0;
    for (const s of samples) {
      const c = logistic(this.a * s.x + this.b);
      sq += (c - s.y) * (c - s.y);
    }
    this.brierScore = sq / samples.length;

    log.info(
      {
        a: round4(this.a),
        b: round4(this.b),
        samples: this.nSamples,
        brier: round4(this.brierScore),
        converged: result.converged,
      },
      'Calibrator fitted',
    );
    return true;
  }

  /** Calibrated probability in [0.01, 0.99] once fitted; identity before. */
  calibrate(prob: number): number {
    if (!this.fitted) return prob;
    const calibrated = logistic(this.a * logit(clampProb(prob)) + this.b);
    return clampProb(calibrated);
  }

  restore(checkpoint: CalibratorCheckpoint): void {
    this.a = checkpoint.a;
    this.b = checkpoint.b;
    this.nSamples = checkpoint.nSamples;
    this.brierScore = checkpoint.brierScore;
    this.fitted = true;
  }
}

// ---------------------------------------------------------------------------
// Checkpoint helpers
// ---------------------------------------------------------------------------

export function toCheckpoint(stats: CalibratorStats, fittedAt: string): CalibratorCheckpoint {
  return {
    version: 1,
    nSamples: stats.nSamples,
    brierScore: stats.brierScore,
    a: stats.a,
    b: stats.b,
    fittedAt,
  };
}

/** Parse a stored checkpoint. Malformed JSON, unknown versions and bad shapes read as null. */
export function parseCheckpoint(raw: string): CalibratorCheckpoint | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    log.warn({ err: err instanceof Error ? err.message : String(err) }, 'Stored calibrator checkpoint is not JSON');
    return null;
  }
  const parsed = calibratorCheckpointSchema.safeParse(value);
  if (!parsed.success) {
    log.warn({ issues: parsed.error.issues.length }, 'Stored calibrator checkpoint rejected');
    return null;
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// IRLS logistic regression solver
// ---------------------------------------------------------------------------

/**
 * Fit P(y=1|x) = σ(slope·x + intercept) by Newton-Raphson / IRLS.
 *
 *   For each sample:
 *     p_i = σ(slope·x_i + intercept)
 *     r_i = y_i − p_i                 : residual
 *     w_i = p_i · (1 − p_i)           : Fisher weight
 *
 *   Gradient:     g = [Σ r_i·x_i,  Σ r_i]
 *   Fisher info:  J = [[Σ w_i·x_i², Σ w_i·x_i], [Σ w_i·x_i, Σ w_i]]
 *   Update:       [slope, intercept] += J⁻¹ · g
 *
 * L2 regularization adds λ·I to J and subtracts λ·θ from g.
 */
export function fitLogisticRegression(
  samples: LogisticSample[],
  regularization: number = 0.001,
  maxIterations: number = 25,
  convergenceThreshold: number = 1e-8,
): LogisticFit {
  const positives = samples.reduce((sum, s) => sum + s.y, 0);
  const baseRate = samples.length > 0 ? positives / samples.length : 0.5;

  // Start from the base-rate intercept with a flat slope
  let slope = 0;
  let intercept =
    baseRate > 0 && baseRate < 1 ? Math.log(baseRate / (1 - baseRate)) : 0;

  let iterations = 0;
  let converged = false;
  let logLik = 0;

  for (let iter = 0; iter < maxIterations; iter++) {
    iterations = iter + 1;

    let g0 = 0, g1 = 0;
    let J00 = 0, J01 = 0, J11 = 0;
    logLik = 0;

    for (const { x, y } of samples) {
      const p = logistic(slope * x + intercept);
      const pSafe = Math.max(1e-15, Math.min(1 - 1e-15, p));

      logLik += y * Math.log(pSafe) + (1 - y) * Math.log(1 - pSafe);

      const r = y - p;
      const w = p * (1 - p);

      g0 += r * x;
      g1 += r;
      J00 += w * x * x;
      J01 += w * x;
      J11 += w;
    }

    logLik -= (regularization / 2) * (slope * slope + intercept * intercept);
    g0 -= regularization * slope;
    g1 -= regularization * intercept;
    J00 += regularization;
    J11 += regularization;

    // Solve 2×2 system J·δ = g
    const det = J00 * J11 - J01 * J01;
    if (Math.abs(det) < 1e-30) break;

    const dSlope = (J11 * g0 - J01 * g1) / det;
    const dIntercept = (-J01 * g0 + J00 * g1) / det;

    slope += dSlope;
    intercept += dIntercept;

    if (Math.abs(dSlope) < convergenceThreshold && Math.abs(dIntercept) < convergenceThreshold) {
      converged = true;
      break;
    }
  }

  return { slope, intercept, iterations, converged, logLikelihood: logLik };
}

// ---------------------------------------------------------------------------
// Internals
// ---------------------------------------------------------------------------

export function logistic(z: number): number {
  if (z > 500) return 1;
  if (z < -500) return 0;
  return 1 / (1 + Math.exp(-z));
}

function logit(p: number): number {
  return Math.log(p / (1 - p));
}

function clampProb(p: number): number {
  if (!Number.isFinite(p)) return 0.5;
  return Math.max(PROB_FLOOR, Math.min(PROB_CEIL, p));
}

function round4(v: number): number {
  return Math.round(v * 10_000) / 10_000;
}
