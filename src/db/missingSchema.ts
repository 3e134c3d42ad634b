import type { Logger } from '../lib/logger.js';
import { sqlVerb } from './store.js';

/**
 * Logs each distinct missing-table/column error once per adapter instance.
 */
export class MissingSchemaReporter {
  private readonly seen = new Set<string>();

  constructor(private readonly log: Logger) {}

  report(err: Error, sql: string): void {
    if (this.seen.has(err.message)) return;
    this.seen.add(err.message);
    this.log.warn({ err: err.message, verb: sqlVerb(sql) }, 'Store schema missing, returning empty result');
  }

  get reportedCount(): number {
    return this.seen.size;
  }
}
