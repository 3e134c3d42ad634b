/**
 * Adaptive Model Weighter
 *
 * Blends per-category learned ensemble weights (inverse Brier) with the
 * configured priors. The blend leans on the learned side as the thinnest
 * model's sample count approaches BLEND_FULL_CONFIDENCE_SAMPLES.
 */

import { logger as rootLogger } from '../lib/logger.js';
import type { AnalyticsRepository, ModelBrierRow } from '../db/analyticsRepository.js';
import { inverseBrierWeights } from './stats.js';
import type { AdaptiveWeightResult, EnsembleConfig, ModelWeight } from './types.js';

const log = rootLogger.child({ component: 'adaptive-weights' });

export const MIN_SAMPLES_PER_MODEL = 5;
export const BLEND_FULL_CONFIDENCE_SAMPLES = 50;
/** Blend factor at or above which a model's weight counts as fully learned. */
export const LEARNED_BLEND_THRESHOLD = 0.95;

export const DEFAULT_ENSEMBLE_CONFIG: EnsembleConfig = {
  models: ['gpt-4o', 'claude-3-5-sonnet', 'gemini-1.5-pro'],
  weights: {
    'gpt-4o': 0.4,
    'claude-3-5-sonnet': 0.35,
    'gemini-1.5-pro': 0.25,
  },
};

interface LearnedWeight {
  weight: number;
  brierScore: number;
  sampleCount: number;
}

export class AdaptiveModelWeighter {
  private readonly models: string[];
  private readonly defaultWeights: Record<string, number>;

  constructor(
    private readonly repo: AnalyticsRepository,
    ensemble: EnsembleConfig = DEFAULT_ENSEMBLE_CONFIG,
  ) {
    this.models = [...ensemble.models];
    this.defaultWeights = { ...ensemble.weights };
  }

  async getWeights(category: string): Promise<AdaptiveWeightResult> {
    const learned = await this.getLearnedWeights(category);

    if (learned.size === 0) {
      return {
        category,
        weights: { ...this.defaultWeights },
        details: this.models.map((m) => defaultDetail(m, this.priorFor(m))),
        dataAvailable: false,
        blendFactor: 0,
      };
    }

    let minSamples = Infinity;
    for (const lw of learned.values()) minSamples = Math.min(minSamples, lw.sampleCount);
    const blend = blendFactor(minSamples);

    const finalWeights: Record<string, number> = {};
    const details: ModelWeight[] = [];

    for (const model of this.models) {
      const prior = this.priorFor(model);
      const lw = learned.get(model);

      if (lw) {
        const blended = blend * lw.weight + (1 - blend) * prior;
        finalWeights[model] = blended;
        details.push({
          modelName: model,
          weight: blended,
          source: blend >= LEARNED_BLEND_THRESHOLD ? 'learned' : 'blended',
          brierScore: lw.brierScore,
          sampleCount: lw.sampleCount,
          confidence: blend,
        });
      } else {
        finalWeights[model] = prior;
        details.push(defaultDetail(model, prior));
      }
    }

    // Re-normalize to sum to 1
    let total = 0;
    for (const w of Object.values(finalWeights)) total += w;
    if (total > 0) {
      for (const model of Object.keys(finalWeights)) finalWeights[model] /= total;
      for (const d of details) d.weight = finalWeights[d.modelName] ?? d.weight;
    }

    log.info(
      { category, blend: Math.round(blend * 1000) / 1000, weights: finalWeights },
      'Adaptive weights computed',
    );

    return {
      category,
      weights: finalWeights,
      details,
      dataAvailable: true,
      blendFactor: blend,
    };
  }

  /** One result per category seen in the forecast log, plus `'ALL'`. */
  async getAllCategoryWeights(): Promise<Record<string, AdaptiveWeightResult>> {
    const categories = await this.repo.forecastCategories();
    const results: Record<string, AdaptiveWeightResult> = {};
    if (categories.length === 0) return results;

    for (const raw of categories) {
      const category = raw ?? 'UNKNOWN';
      results[category] = await this.getWeights(category);
    }
    results.ALL = await this.getWeights('ALL');
    return results;
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private priorFor(model: string): number {
    const configured = this.defaultWeights[model];
    if (configured !== undefined) return configured;
    return this.models.length > 0 ? 1 / this.models.length : 0;
  }

  private async getLearnedWeights(category: string): Promise<Map<string, LearnedWeight>> {
    const rows: ModelBrierRow[] = await this.repo.modelBrierStats(category, MIN_SAMPLES_PER_MODEL);
    const normalized = inverseBrierWeights(rows);

    const learned = new Map<string, LearnedWeight>();
    for (const r of rows) {
      learned.set(r.modelName, {
        weight: normalized[r.modelName] ?? 0,
        brierScore: r.brier,
        sampleCount: r.count,
      });
    }
    return learned;
  }
}

/** min(1, samples / 50): 0 with no data, saturating at 1. */
export function blendFactor(minSampleCount: number): number {
  if (!Number.isFinite(minSampleCount) || minSampleCount <= 0) return 0;
  return Math.min(1, minSampleCount / BLEND_FULL_CONFIDENCE_SAMPLES);
}

function defaultDetail(modelName: string, weight: number): ModelWeight {
  return {
    modelName,
    weight,
    source: 'default',
    brierScore: 0,
    sampleCount: 0,
    confidence: 0,
  };
}
