import type { Row, SqlValue } from "./rows.js";

export type BindValue = string | number | bigint | boolean | Date | null;

/** Ordered positional values, or values keyed by marker name. */
export type QueryParams = readonly BindValue[] | Readonly<Record<string, BindValue>>;

export interface FetchOptions {
  /** Stops polling or the in-flight query when the caller goes away. */
  signal?: AbortSignal;
  catalog?: string;
  schema?: string;
  /** Caller's own OAuth token, used when the server runs in per-request mode. */
  userToken?: string;
}

export type BackendKind = "warehouse" | "lakebase";

/** Rows plus the column names, which survive an empty result. */
export interface ResultSet {
  columns: readonly string[];
  rows: Row[];
}

/**
 * The one contract both backends share, so callers can stay agnostic of where
 * the data lives.
 */
export abstract class SqlBackend {
  abstract readonly kind: BackendKind;

  abstract fetchResult(sql: string, params?: QueryParams, options?: FetchOptions): Promise<ResultSet>;

  async fetch(sql: string, params?: QueryParams, options?: FetchOptions): Promise<Row[]> {
    return (await this.fetchResult(sql, params, options)).rows;
  }

  /** Run a statement whose result rows are not needed. */
  abstract execute(sql: string, params?: QueryParams, options?: FetchOptions): Promise<void>;

  abstract close(): Promise<void>;

  async fetchOne(sql: string, params?: QueryParams, options?: FetchOptions): Promise<Row | null> {
    const rows = await this.fetch(sql, params, options);
    return rows[0] ?? null;
  }

  async fetchValue(sql: string, params?: QueryParams, options?: FetchOptions): Promise<SqlValue> {
    const row = await this.fetchOne(sql, params, options);
    return row?.get(0) ?? null;
  }
}

export function isPositional(params: QueryParams): params is readonly BindValue[] {
  return Array.isArray(params);
}
