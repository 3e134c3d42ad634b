/**
 * Store adapter contract.
 *
 * The analytics modules treat the relational store as shared, externally
 * owned state. Adapters hide the driver and enforce one rule the rest of the
 * code relies on: a statement that touches a table (or column) the store does
 * not have yet resolves to an empty result instead of throwing. Partially
 * migrated stores therefore degrade to zero/default analytics.
 *
 * SQL is written once with `?` placeholders and a dialect-neutral subset
 * (no date functions, upserts via ON CONFLICT). Adapters translate as needed.
 */

export type SqlParam = string | number | null;

export type Row = Record<string, unknown>;

export type Dialect = 'sqlite' | 'postgres';

export interface StoreAdapter {
  readonly dialect: Dialect;
  /** Capability check: does the store have this table? */
  hasTable(table: string): Promise<boolean>;
  /** Run a query. Missing table/column → []. */
  all(sql: string, params?: SqlParam[]): Promise<Row[]>;
  /** Run a write. Missing table/column → 0. Resolves to the affected row count. */
  run(sql: string, params?: SqlParam[]): Promise<number>;
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** Unexpected store failure: anything other than a missing table or column. */
export class StoreError extends Error {
  constructor(
    readonly verb: string,
    cause: unknown,
  ) {
    super(`Store ${verb} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'StoreError';
  }
}

const PG_UNDEFINED_TABLE = '42P01';
const PG_UNDEFINED_COLUMN = '42703';

/**
 * True for the driver errors that mean "schema not there yet":
 * SQLite `no such table` / `no such column`, PostgreSQL 42P01 / 42703.
 */
export function isMissingSchemaError(err: unknown): err is Error {
  if (!(err instanceof Error)) return false;
  if ('code' in err && (err.code === PG_UNDEFINED_TABLE || err.code === PG_UNDEFINED_COLUMN)) {
    return true;
  }
  return /no such (table|column)/i.test(err.message);
}

/** First word of a statement, for log context. */
export function sqlVerb(sql: string): string {
  const match = /^\s*(\w+)/.exec(sql);
  return match ? match[1].toUpperCase() : 'QUERY';
}

// ---------------------------------------------------------------------------
// Row helpers
// ---------------------------------------------------------------------------

export function toRow(value: unknown): Row {
  if (typeof value !== 'object' || value === null) return {};
  return Object.fromEntries(Object.entries(value));
}

/**
 * Coerce a column value to a finite number. NULL, empty, non-numeric and
 * non-finite values become `fallback` (0). PostgreSQL returns NUMERIC and
 * BIGINT aggregates as strings, which are parsed here.
 */
export function num(row: Row, column: string, fallback = 0): number {
  const value = row[column];
  if (typeof value === 'number') return Number.isFinite(value) ? value : fallback;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
}

/** Column value as a string; NULL → fallback. */
export function str(row: Row, column: string, fallback = ''): string {
  const value = row[column];
  if (value === null || value === undefined) return fallback;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/** Column value as a string, or null when the column is NULL. */
export function nullableStr(row: Row, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  return str(row, column);
}

/** Replace a non-finite number with 0. */
export function finiteOrZero(value: number): number {
  return Number.isFinite(value) ? value : 0;
}
