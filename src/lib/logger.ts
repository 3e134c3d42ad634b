/**
 * Structured JSON logger.
 *
 * One root pino instance; modules take a child bound to their component:
 *
 *   const log = rootLogger.child({ component: 'regime-detector' });
 *   log.info({ regime, confidence }, 'Regime detected');
 *
 * Level comes from LOG_LEVEL (default `info`). Tests run with `silent`.
 */

import pino from 'pino';

export type Logger = pino.Logger;

const LEVELS = new Set(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

function resolveLevel(level: string | undefined): string {
  const normalized = (level ?? 'info').toLowerCase();
  return LEVELS.has(normalized) ? normalized : 'info';
}

export function createLogger(bindings: Record<string, unknown> = {}): Logger {
  return pino({
    level: resolveLevel(process.env.LOG_LEVEL),
    base: { service: 'forecast-feedback-engine', ...bindings },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** Root application logger */
export const logger: Logger = createLogger();
