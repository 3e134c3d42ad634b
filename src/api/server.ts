import express, { type Request, type Response, type NextFunction } from 'express';
import { createServer, type Server } from 'node:http';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadConfig, type Config } from '../config.js';
import { logger as rootLogger } from '../lib/logger.js';
import type { StoreAdapter } from '../db/store.js';
import { SqliteStore } from '../db/sqliteStore.js';
import { PgStore } from '../db/pgStore.js';
import { AnalyticsRepository } from '../db/analyticsRepository.js';
import { CalibrationFeedbackLoop } from '../analytics/calibrationFeedback.js';
import { AdaptiveModelWeighter } from '../analytics/adaptiveWeights.js';
import { PerformanceTracker } from '../analytics/performanceTracker.js';
import { RegimeDetector } from '../analytics/regimeDetector.js';
import { SmartEntryCalculator } from '../analytics/smartEntry.js';
import {
  createAnalyticsRouter,
  type AnalyticsServices,
  type HandlerResult,
} from './routes/analytics.js';

const log = rootLogger.child({ component: 'api-server' });

/** Tables the health check reports on. */
const CORE_TABLES = ['performance_log', 'model_forecast_log', 'calibration_history', 'engine_state', 'candidates'];

// ---------------------------------------------------------------------------
// Wiring
// ---------------------------------------------------------------------------

export function createStore(config: Config): StoreAdapter & { ensureSchema(): Promise<void> } {
  if (config.DB_DRIVER === 'postgres') {
    return new PgStore(config.DATABASE_URL);
  }
  if (config.SQLITE_PATH !== ':memory:') {
    mkdirSync(dirname(config.SQLITE_PATH), { recursive: true });
  }
  return new SqliteStore(config.SQLITE_PATH);
}

export function createServices(store: StoreAdapter, config: Config): AnalyticsServices {
  const repo = new AnalyticsRepository(store);
  return {
    feedback: new CalibrationFeedbackLoop(repo, { retrainInterval: config.RETRAIN_INTERVAL }),
    weighter: new AdaptiveModelWeighter(repo, {
      models: config.ENSEMBLE_MODELS,
      weights: config.ENSEMBLE_WEIGHTS,
    }),
    tracker: new PerformanceTracker(repo, { bankroll: config.BANKROLL }),
    regime: new RegimeDetector(repo),
    entry: new SmartEntryCalculator(),
  };
}

export async function healthCheck(store: StoreAdapter): Promise<HandlerResult> {
  try {
    const tables: Record<string, boolean> = {};
    for (const table of CORE_TABLES) {
      tables[table] = await store.hasTable(table);
    }
    return {
      status: 200,
      body: { status: 'ok', dialect: store.dialect, tables, uptimeSec: Math.round(process.uptime()) },
    };
  } catch (error) {
    return {
      status: 503,
      body: { status: 'unavailable', error: error instanceof Error ? error.message : 'Unknown error' },
    };
  }
}

export function createApp(store: StoreAdapter, services: AnalyticsServices): express.Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use((req: Request, _res: Response, next: NextFunction) => {
    log.debug({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  app.get('/health', (_req: Request, res: Response, next: NextFunction) => {
    healthCheck(store)
      .then((result) => {
        res.status(result.status).json(result.body);
      })
      .catch(next);
  });

  app.use('/api/analytics', createAnalyticsRouter(services));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ success: false, error: 'Not found' });
  });

  // Malformed JSON bodies and anything a route passes to next()
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    log.error({ err: err.message, status }, 'Request failed');
    res.status(status).json({ success: false, error: err.message });
  });

  return app;
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

export async function startServer(config: Config = loadConfig()): Promise<Server> {
  const store = createStore(config);
  await store.ensureSchema();

  const services = createServices(store, config);
  await services.feedback.restoreCalibrator();

  const server = createServer(createApp(store, services));
  try {
    await listen(server, config.PORT);
  } catch (err) {
    await store.close();
    throw err;
  }
  server.on('error', (err) => log.error({ err: err.message }, 'Server error'));
  log.info({ port: config.PORT, driver: config.DB_DRIVER }, 'Analytics API started');

  const shutdown = () => {
    log.info('Shutting down analytics API');
    server.close();
    store
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ err: err instanceof Error ? err.message : String(err) }, 'Store close failed');
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  return server;
}

/** Resolve once the server is bound; reject on EADDRINUSE and other bind errors. */
function listen(server: Server, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  startServer().catch((err: unknown) => {
    log.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Analytics API failed to start');
    process.exit(1);
  });
}
