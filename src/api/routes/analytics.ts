import { Router, type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import type { CalibrationFeedbackLoop } from '../../analytics/calibrationFeedback.js';
import type { AdaptiveModelWeighter } from '../../analytics/adaptiveWeights.js';
import type { PerformanceTracker } from '../../analytics/performanceTracker.js';
import type { RegimeDetector } from '../../analytics/regimeDetector.js';
import type { SmartEntryCalculator } from '../../analytics/smartEntry.js';
import type { ResolutionRecord } from '../../analytics/types.js';
import { logger as rootLogger } from '../../lib/logger.js';

const log = rootLogger.child({ component: 'analytics-routes' });

export interface AnalyticsServices {
  feedback: CalibrationFeedbackLoop;
  weighter: AdaptiveModelWeighter;
  tracker: PerformanceTracker;
  regime: RegimeDetector;
  entry: SmartEntryCalculator;
}

/** Status + JSON body, so handlers can be exercised without an HTTP stack. */
export interface HandlerResult {
  status: number;
  body: unknown;
}

// ---------------------------------------------------------------------------
// Request schemas
// ---------------------------------------------------------------------------

const IDENTIFIER = /^[A-Za-z0-9_.:\-]{1,128}$/;

/** Non-finite, null or missing numbers read as 0. */
const finiteNumber = z.number().finite().catch(0);
/** Absent stays absent (callee default); present but unusable reads as 0. */
const optionalNumber = z.number().finite().optional().catch(0);

export const resolutionSchema = z.object({
  marketId: z.string().regex(IDENTIFIER, 'marketId must be 1-128 characters of [A-Za-z0-9_.:-]'),
  question: z.string().default(''),
  category: z.string().regex(IDENTIFIER, 'category must be 1-128 characters of [A-Za-z0-9_.:-]').default('UNKNOWN'),
  forecastProb: finiteNumber,
  actualOutcome: finiteNumber,
  edgeAtEntry: finiteNumber,
  confidence: z.string().default('MEDIUM'),
  evidenceQuality: finiteNumber,
  stakeUsd: finiteNumber,
  entryPrice: finiteNumber,
  exitPrice: finiteNumber,
  pnl: finiteNumber,
  holdingHours: finiteNumber,
  modelForecasts: z.record(z.string().min(1), finiteNumber).default({}),
  resolvedAt: z.string().datetime({ offset: true }).optional(),
});

export const entryRequestSchema = z.object({
  marketId: z.string().regex(IDENTIFIER, 'marketId must be 1-128 characters of [A-Za-z0-9_.:-]'),
  side: z.enum(['BUY_YES', 'BUY_NO']),
  currentPrice: finiteNumber,
  fairValue: finiteNumber,
  edge: finiteNumber,
  bidDepth: optionalNumber,
  askDepth: optionalNumber,
  vwap: optionalNumber,
  priceMomentum: optionalNumber,
  flowImbalance: optionalNumber,
  spread: optionalNumber,
  hoursToResolution: optionalNumber,
  regimePatience: optionalNumber,
});

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

export function createAnalyticsHandlers(services: AnalyticsServices) {
  return {
    performance: () => handle(async () => ok(await services.tracker.compute())),

    allWeights: () => handle(async () => ok(await services.weighter.getAllCategoryWeights())),

    categoryWeights: (category: string) =>
      handle(async () => {
        if (!IDENTIFIER.test(category)) return badRequest('Invalid category');
        return ok(await services.weighter.getWeights(category));
      }),

    regime: () => handle(async () => ok(await services.regime.detect())),

    regimeHistory: (query: unknown) =>
      handle(async () => {
        const parsed = historyQuerySchema.safeParse(query);
        if (!parsed.success) return badRequest('limit must be an integer between 1 and 500');
        return ok(await services.regime.getRegimeHistory(parsed.data.limit));
      }),

    calibration: () =>
      handle(async () => {
        const checkpoint = await services.feedback.getCheckpoint();
        return ok({ checkpoint, calibrator: services.feedback.calibrator.stats });
      }),

    recordResolution: (body: unknown) =>
      handle(async () => {
        const parsed = resolutionSchema.safeParse(body);
        if (!parsed.success) return badRequest(formatIssues(parsed.error));
        const record: ResolutionRecord = parsed.data;
        await services.feedback.recordResolution(record);
        return { status: 201, body: { success: true, marketId: record.marketId } };
      }),

    entryPlan: (body: unknown) =>
      handle(async () => {
        const parsed = entryRequestSchema.safeParse(body);
        if (!parsed.success) return badRequest(formatIssues(parsed.error));
        return ok(services.entry.calculateEntry(parsed.data));
      }),
  };
}

export type AnalyticsHandlers = ReturnType<typeof createAnalyticsHandlers>;

// ---------------------------------------------------------------------------
// Router
// ---------------------------------------------------------------------------

export function createAnalyticsRouter(services: AnalyticsServices): Router {
  const router = Router();
  const h = createAnalyticsHandlers(services);

  const reply =
    (run: (req: Request) => Promise<HandlerResult>) =>
    (req: Request, res: Response, next: NextFunction): void => {
      run(req)
        .then((result) => {
          res.status(result.status).json(result.body);
        })
        .catch(next);
    };

  router.get('/performance', reply(() => h.performance()));
  router.get('/weights', reply(() => h.allWeights()));
  router.get('/weights/:category', reply((req) => h.categoryWeights(req.params.category)));
  router.get('/regime', reply(() => h.regime()));
  router.get('/regime/history', reply((req) => h.regimeHistory(req.query)));
  router.get('/calibration', reply(() => h.calibration()));
  router.post('/resolutions', reply((req) => h.recordResolution(req.body)));
  router.post('/entry-plan', reply((req) => h.entryPlan(req.body)));

  return router;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function handle(fn: () => Promise<HandlerResult>): Promise<HandlerResult> {
  try {
    return await fn();
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    log.error({ err: message }, 'Analytics request failed');
    return { status: 500, body: { success: false, error: message } };
  }
}

function ok(data: unknown): HandlerResult {
  return { status: 200, body: { success: true, data } };
}

function badRequest(error: string): HandlerResult {
  return { status: 400, body: { success: false, error } };
}

function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`).join('; ');
}
