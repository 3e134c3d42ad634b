/**
 * SQLite store adapter (better-sqlite3).
 *
 * better-sqlite3 is synchronous; the adapter wraps results in promises so it
 * satisfies the same contract as the PostgreSQL adapter. Pass `':memory:'`
 * for a throwaway in-process store.
 */

import Database from 'better-sqlite3';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
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

const log = rootLogger.child({ component: 'sqlite-store' });

const __dirname = dirname(fileURLToPath(import.meta.url));

export class SqliteStore implements StoreAdapter {
  readonly dialect = 'sqlite' as const;
  private readonly db: Database.Database;
  private readonly missing = new MissingSchemaReporter(log);

  constructor(pathOrDb: string | Database.Database = ':memory:') {
    this.db = typeof pathOrDb === 'string' ? new Database(pathOrDb) : pathOrDb;
    if (typeof pathOrDb === 'string' && pathOrDb !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
  }

  // -----------------------------------------------------------------------
  // Schema bootstrap (idempotent)
  // -----------------------------------------------------------------------

  async ensureSchema(): Promise<void> {
    this.db.exec(readSchema('schema.sqlite.sql'));
    log.info('SQLite schema ensured');
  }

  /** Execute raw DDL/DML. Used for bootstrap and fixtures. */
  exec(sql: string): void {
    this.db.exec(sql);
  }

  // -----------------------------------------------------------------------
  // StoreAdapter
  // -----------------------------------------------------------------------

  async hasTable(table: string): Promise<boolean> {
    const row = this.db
      .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`)
      .get(table);
    return row !== undefined;
  }

  async all(sql: string, params: SqlParam[] = []): Promise<Row[]> {
    try {
      return this.db.prepare(sql).all(...params).map(toRow);
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
      return this.db.prepare(sql).run(...params).changes;
    } catch (err) {
      if (isMissingSchemaError(err)) {
        this.missing.report(err, sql);
        return 0;
      }
      throw new StoreError(sqlVerb(sql), err);
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }
}

/** Read a bootstrap DDL file that sits next to this module (or in src/ when running from dist/). */
export function readSchema(file: string): string {
  try {
    return readFileSync(join(__dirname, file), 'utf-8');
  } catch {
    return readFileSync(join(__dirname, '..', '..', 'src', 'db', file), 'utf-8');
  }
}
