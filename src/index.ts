// Store
export type { StoreAdapter, SqlParam, Row, Dialect } from './db/store.js';
export { StoreError, isMissingSchemaError } from './db/store.js';
export { SqliteStore } from './db/sqliteStore.js';
export { PgStore, toPgPlaceholders, type PgQueryable } from './db/pgStore.js';
export { AnalyticsRepository } from './db/analyticsRepository.js';

// Calibration model
export {
  HistoricalCalibrator,
  fitLogisticRegression,
  parseCheckpoint,
  type Calibrator,
  type CalibratorCheckpoint,
  type CalibratorStats,
} from './predictor/calibration.js';

// Analytics
export * from './analytics/types.js';
export {
  CalibrationFeedbackLoop,
  InMemoryRetrainCounter,
  StoreRetrainCounter,
  type RetrainCounter,
  type CalibrationFeedbackConfig,
} from './analytics/calibrationFeedback.js';
export {
  AdaptiveModelWeighter,
  DEFAULT_ENSEMBLE_CONFIG,
  blendFactor,
} from './analytics/adaptiveWeights.js';
export {
  PerformanceTracker,
  buildLeaderboard,
  type PerformanceTrackerConfig,
} from './analytics/performanceTracker.js';
export {
  RegimeDetector,
  classifyRegime,
  regimeMultipliers,
  type RegimeDetectorConfig,
} from './analytics/regimeDetector.js';
export {
  SmartEntryCalculator,
  adjustPrice,
  type EntryRequest,
  type SmartEntryConfig,
} from './analytics/smartEntry.js';
export { chronologicalStreaks, recentStreak } from './analytics/stats.js';

// HTTP surface
export { createApp, createServices, createStore, startServer } from './api/server.js';
export { loadConfig, type Config } from './config.js';
