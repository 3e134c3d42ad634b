import { describe, it, expect, beforeEach } from 'vitest';
import { AdaptiveModelWeighter, DEFAULT_ENSEMBLE_CONFIG, blendFactor } from '../adaptiveWeights.js';
import type { SqliteStore } from '../../db/sqliteStore.js';
import type { AnalyticsRepository } from '../../db/analyticsRepository.js';
import { createTestStore, seedModelForecasts } from './fixtures.js';

function total(weights: Record<string, number>): number {
  return Object.values(weights).reduce((s, w) => s + w, 0);
}

describe('blendFactor', () => {
  it('is 0 without samples and saturates at 50', () => {
    expect(blendFactor(0)).toBe(0);
    expect(blendFactor(Infinity)).toBe(0);
    expect(blendFactor(10)).toBe(0.2);
    expect(blendFactor(50)).toBe(1);
    expect(blendFactor(500)).toBe(1);
  });

  it('never decreases as samples grow', () => {
    let previous = 0;
    for (let n = 0; n <= 60; n++) {
      const b = blendFactor(n);
      expect(b).toBeGreaterThanOrEqual(previous);
      previous = b;
    }
  });
});

describe('AdaptiveModelWeighter', () => {
  let store: SqliteStore;
  let repo: AnalyticsRepository;

  beforeEach(async () => {
    ({ store, repo } = await createTestStore());
  });

  it('falls back to the configured priors with no history', async () => {
    const weighter = new AdaptiveModelWeighter(repo);
    const result = await weighter.getWeights('SPORTS');

    expect(result.dataAvailable).toBe(false);
    expect(result.blendFactor).toBe(0);
    expect(result.weights).toEqual(DEFAULT_ENSEMBLE_CONFIG.weights);
    expect(result.details.map((d) => d.source)).toEqual(['default', 'default', 'default']);
    expect(result.details[0]).toEqual({
      modelName: 'gpt-4o',
      weight: 0.4,
      source: 'default',
      brierScore: 0,
      sampleCount: 0,
      confidence: 0,
    });
  });

  it('does not hand the caller a live reference to its priors', async () => {
    const weighter = new AdaptiveModelWeighter(repo);
    const first = await weighter.getWeights('SPORTS');
    first.weights['gpt-4o'] = 99;

    const second = await weighter.getWeights('SPORTS');
    expect(second.weights['gpt-4o']).toBe(0.4);
  });

  it('blends learned weights with priors by the thinnest sample count', async () => {
    await seedModelForecasts(store, 'gpt-4o', 'SPORTS', 10, 0.9, 1); // Brier 0.01
    await seedModelForecasts(store, 'claude-3-5-sonnet', 'SPORTS', 12, 0.8, 1); // Brier 0.04
    const weighter = new AdaptiveModelWeighter(repo);

    const result = await weighter.getWeights('SPORTS');

    // learned 0.8 / 0.2, blend 0.2: 0.48, 0.32, prior 0.25, renormalized over 1.05
    expect(result.dataAvailable).toBe(true);
    expect(result.blendFactor).toBe(0.2);
    expect(result.weights['gpt-4o']).toBeCloseTo(0.48 / 1.05, 9);
    expect(result.weights['claude-3-5-sonnet']).toBeCloseTo(0.32 / 1.05, 9);
    expect(result.weights['gemini-1.5-pro']).toBeCloseTo(0.25 / 1.05, 9);
    expect(total(result.weights)).toBeCloseTo(1, 9);

    const [gpt, claude, gemini] = result.details;
    expect(gpt.source).toBe('blended');
    expect(gpt.sampleCount).toBe(10);
    expect(gpt.brierScore).toBeCloseTo(0.01, 9);
    expect(gpt.confidence).toBe(0.2);
    expect(gpt.weight).toBe(result.weights['gpt-4o']);
    expect(claude.sampleCount).toBe(12);
    expect(gemini.source).toBe('default');
    expect(gemini.weight).toBe(result.weights['gemini-1.5-pro']);
  });

  it('marks weights learned once every model has 50 samples', async () => {
    await seedModelForecasts(store, 'gpt-4o', 'SPORTS', 50, 0.9, 1);
    await seedModelForecasts(store, 'claude-3-5-sonnet', 'SPORTS', 50, 0.8, 1);
    const weighter = new AdaptiveModelWeighter(repo);

    const result = await weighter.getWeights('SPORTS');

    expect(result.blendFactor).toBe(1);
    expect(result.details[0].source).toBe('learned');
    expect(result.weights['gpt-4o']).toBeCloseTo(0.64, 9);
    expect(result.weights['claude-3-5-sonnet']).toBeCloseTo(0.16, 9);
    expect(result.weights['gemini-1.5-pro']).toBeCloseTo(0.2, 9);
  });

  it('ignores logged models outside the configured ensemble', async () => {
    await seedModelForecasts(store, 'gpt-4o', 'SPORTS', 10, 0.9, 1);
    await seedModelForecasts(store, 'retired-model', 'SPORTS', 10, 0.6, 1);
    const weighter = new AdaptiveModelWeighter(repo);

    const result = await weighter.getWeights('SPORTS');

    expect(Object.keys(result.weights)).toEqual(['gpt-4o', 'claude-3-5-sonnet', 'gemini-1.5-pro']);
    expect(total(result.weights)).toBeCloseTo(1, 9);
  });

  it('gives unconfigured priors an equal share', async () => {
    const weighter = new AdaptiveModelWeighter(repo, { models: ['a', 'b', 'c', 'd'], weights: { a: 0.5 } });
    const result = await weighter.getWeights('ALL');

    expect(result.weights).toEqual({ a: 0.5 });
    expect(result.details.map((d) => d.weight)).toEqual([0.5, 0.25, 0.25, 0.25]);
  });

  describe('getAllCategoryWeights', () => {
    it('is empty when nothing has been logged', async () => {
      const weighter = new AdaptiveModelWeighter(repo);
      expect(await weighter.getAllCategoryWeights()).toEqual({});
    });

    it('reports every logged category plus ALL, with NULL as UNKNOWN', async () => {
      await seedModelForecasts(store, 'gpt-4o', 'SPORTS', 5, 0.9, 1);
      await seedModelForecasts(store, 'gpt-4o', null, 5, 0.7, 1);
      const weighter = new AdaptiveModelWeighter(repo);

      const results = await weighter.getAllCategoryWeights();

      expect(Object.keys(results).sort()).toEqual(['ALL', 'SPORTS', 'UNKNOWN']);
      expect(results.SPORTS.dataAvailable).toBe(true);
      expect(results.ALL.dataAvailable).toBe(true);
      expect(results.ALL.details[0].sampleCount).toBe(10);
      expect(results.UNKNOWN.category).toBe('UNKNOWN');
      for (const result of Object.values(results)) {
        expect(total(result.weights)).toBeCloseTo(1, 9);
      }
    });
  });
});
