/**
 * PostgreSQL store adapter (pg).
 *
 * Accepts a connection string or any pool-like object, so a shared pool can
 * be handed in the way dedicated repositories share one. `?` placeholders
 * are rewritten to `$1..$n` before the query is sent.
 */

import pg from 'pg';
import { logger as rootLogger } from '../lib/logger.js';
import {
  StoreError,
  isMissingSchemaError,
  sqlVerb,
  toRow,
  type Row,
  type SqlParam,
  type StoreAdapter,
} from './store.js';
import { MissingSchemaReporter } from './missingSchema.js';
import { readSchema } from './sqliteStore.js';

const log = rootLogger.child({ component: 'pg-store' });

/** The slice of pg.Pool the adapter uses. */
export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
  end(): Promise<void>;
}

export class PgStore implements StoreAdapter {
  readonly dialect = 'postgres' as const;
  private readonly pool: PgQueryable;
  private readonly missing = new MissingSchemaReporter(log);

  constructor(connection: string | PgQueryable) {
    if (typeof connection === 'string') {
      const pool = new pg.Pool({
        connectionString: connection,
        max: 10,
        idleTimeoutMillis: 30_000,
        connectionTimeoutMillis: 5_000,
      });
      pool.on('error', (err) => log.error({ err: err.message }, 'Pool error'));
      this.pool = pool;
    } else {
      this.pool = connection;
    }
  }

  async ensureSchema(): Promise<void> {
    await this.pool.query(readSchema('schema.pg.sql'));
    log.info('PostgreSQL schema ensured');
  }

  async hasTable(table: string): Promise<boolean> {
    const { rows } = await this.pool.query(
      `SELECT to_regclass($1) IS NOT NULL AS present`,
      [table],
    );
    return rows.length > 0 && toRow(rows[0]).present === true;
  }

  async all(sql: string, params: SqlParam[] = []): Promise<Row[]> {
    try {
      const { rows } = await this.pool.query(toPgPlaceholders(sql), params);
      return rows.map(toRow);
    } catch (err) {
      if (isMissingSchemaError(err)) {
        this.missing.report(err, sql);
        return [];
      }
      throw new StoreError(sqlVerb(sql), err);
    }
  }

  async run(sql: string, params: SqlParam[] = []): Promise<number> {
    try {
      const result = await this.pool.query(toPgPlaceholders(sql), params);
      return result.rowCount ?? 0;
    } catch (err) {
      if (isMissingSchemaError(err)) {
        this.missing.report(err, sql);
        return 0;
      }
      throw new StoreError(sqlVerb(sql), err);
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

/**
 * Rewrite `?` placeholders to PostgreSQL's positional `$n` form.
 * Question marks inside single-quoted literals are left alone.
 */
export function toPgPlaceholders(sql: string): string {
  let out = '';
  let index = 0;
  let inString = false;

  for (const ch of sql) {
    if (ch === "'") {
      inString = !inString;
      out += ch;
    } else if (ch === '?' && !inString) {
      index++;
      out += `$${index}`;
    } else {
      out += ch;
    }
  }

  return out;
}
