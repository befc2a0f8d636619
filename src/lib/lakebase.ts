import pg from "pg";
import type { ClientConfig } from "pg";
import {
  SqlBackend,
  isPositional,
  type BindValue,
  type FetchOptions,
  type QueryParams,
  type ResultSet,
} from "./backend.js";
import type { SslMode } from "./config.js";
import {
  AppError,
  ConnectionError,
  QueryError,
  ValidationError,
  errorMessage,
} from "./errors.js";
import { createLogger } from "./log.js";
import { rowConverter, type ColumnInfo } from "./rows.js";
import { normalizeSql } from "./sql.js";
import type { Credential, OAuthTokenManager } from "./token_manager.js";

const log = createLogger("lakebase");

export class PostgresConfig {
  constructor(
    readonly host: string,
    readonly port: number = 5432,
    readonly database: string = "databricks_postgres",
    readonly user: string = "token",
    readonly sslMode: SslMode = "require",
  ) {}

  /** The OAuth token is the password. */
  toClientConfig(password: string): ClientConfig {
    return {
      host: this.host,
      port: this.port,
      database: this.database,
      user: this.user,
      password,
      ssl: sslOption(this.sslMode),
      application_name: "lakehouse-api",
    };
  }

  toString(): string {
    return `PostgresConfig(host=${this.host} port=${this.port} database=${this.database})`;
  }
}

function sslOption(mode: SslMode): ClientConfig["ssl"] {
  switch (mode) {
    case "disable":
    case "allow":
      return false;
    case "prefer":
    case "require":
      return { rejectUnauthorized: false };
    case "verify-ca":
    case "verify-full":
      return { rejectUnauthorized: true };
  }
}

export interface PgQueryResult {
  fields: Array<{ name: string; dataTypeID?: number }>;
  rows: unknown[][];
  rowCount: number | null;
}

/** The slice of a pg client the backend uses; tests provide their own. */
export interface PgConnection {
  query(sql: string, values: readonly unknown[]): Promise<PgQueryResult>;
  end(): Promise<void>;
  /** Registers a callback for errors raised while the connection sits idle. */
  onError(listener: (error: Error) => void): void;
}

export type ConnectionFactory = (config: ClientConfig) => Promise<PgConnection>;

export const connectPg: ConnectionFactory = async (config) => {
  const client = new pg.Client(config);
  await client.connect();
  return {
    async query(sql, values) {
      const res = await client.query({ text: sql, values: [...values], rowMode: "array" });
      return {
        fields: res.fields.map((f) => ({ name: f.name, dataTypeID: f.dataTypeID })),
        rows: res.rows,
        rowCount: res.rowCount,
      };
    },
    end: () => client.end(),
    onError(listener) {
      client.on("error", listener);
    },
  };
};

type FailureKind = "auth" | "connection" | "query";

const CONNECTION_CODES = new Set([
  "57P01",
  "57P02",
  "57P03",
  "ECONNRESET",
  "ECONNREFUSED",
  "EPIPE",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/** Sort a driver failure into what the backend does next. */
export function classifyPgError(error: unknown): FailureKind {
  const code = errorCode(error);
  if (code === "28P01" || code === "28000") return "auth";
  if (code !== undefined && (code.startsWith("08") || CONNECTION_CODES.has(code))) return "connection";
  const message = errorMessage(error);
  if (/password authentication failed/i.test(message)) return "auth";
  if (/connection terminated|not queryable|connection.*(closed|ended)|socket/i.test(message)) {
    return "connection";
  }
  return "query";
}

function toPgValues(params: QueryParams | undefined): unknown[] {
  if (params === undefined) return [];
  if (!isPositional(params)) {
    throw new ValidationError("Lakebase binds positional parameters ($1, $2, ...); named parameters are not supported");
  }
  return params.map((v: BindValue) => (typeof v === "bigint" ? v.toString() : v));
}

interface Handle {
  conn: PgConnection;
  credential: Credential;
  broken: boolean;
  /** Queries running on this connection. */
  active: number;
  /** Replaced by a newer handle; ended once its last query settles. */
  retired: boolean;
  ended: boolean;
}

export interface LakebaseBackendOptions {
  /** Resolved once, on first use. */
  resolveConfig: () => Promise<PostgresConfig>;
  tokens: OAuthTokenManager;
  connect?: ConnectionFactory;
  /** Reconnect-and-retry attempts after a connection-level failure. */
  connectRetries?: number;
}

/**
 * Lakebase (managed Postgres) backend. One connection is reused across
 * queries; it is reopened with a fresh OAuth credential when the credential
 * nears expiry or the connection breaks. Reopening is single-flight.
 */
export class LakebaseBackend extends SqlBackend {
  readonly kind = "lakebase" as const;
  private handle: Handle | null = null;
  private opening: Promise<Handle> | null = null;
  private config: Promise<PostgresConfig> | null = null;
  private connectCount = 0;
  private readonly tokens: OAuthTokenManager;
  private readonly connectFn: ConnectionFactory;
  private readonly connectRetries: number;
  private readonly resolveConfig: () => Promise<PostgresConfig>;

  constructor(opts: LakebaseBackendOptions) {
    super();
    this.tokens = opts.tokens;
    this.connectFn = opts.connect ?? connectPg;
    this.connectRetries = opts.connectRetries ?? 1;
    this.resolveConfig = opts.resolveConfig;
  }

  async fetchResult(sql: string, params?: QueryParams, options: FetchOptions = {}): Promise<ResultSet> {
    const startedAt = Date.now();
    const result = await this.run(sql, toPgValues(params), options);
    const columns: ColumnInfo[] = result.fields.map((f) => ({ name: f.name }));
    const convert = rowConverter(columns, "driver");
    const rows = result.rows.map((raw) => convert(raw));
    log.debug("lakebase_query", {
      sql: normalizeSql(sql),
      duration_ms: Date.now() - startedAt,
      row_count: rows.length,
    });
    return { columns: columns.map((c) => c.name), rows };
  }

  async execute(sql: string, params?: QueryParams, options: FetchOptions = {}): Promise<void> {
    await this.run(sql, toPgValues(params), options);
  }

  async close(): Promise<void> {
    const opening = this.opening;
    if (opening) {
      // A failed reopen already reported to its own caller.
      await opening.catch((error: unknown) => {
        log.debug("lakebase_close_after_failed_open", { error: errorMessage(error) });
      });
    }
    const handle = this.handle;
    this.handle = null;
    if (handle) {
      handle.ended = true;
      await handle.conn.end();
    }
  }

  /** Connections opened so far, reconnects included. */
  get connections(): number {
    return this.connectCount;
  }

  private getConfig(): Promise<PostgresConfig> {
    if (!this.config) {
      this.config = this.resolveConfig().catch((error: unknown) => {
        this.config = null;
        throw error;
      });
    }
    return this.config;
  }

  private isUsable(handle: Handle | null): handle is Handle {
    return handle !== null && !handle.broken && !this.tokens.needsRefresh(handle.credential);
  }

  private async acquire(): Promise<Handle> {
    const current = this.handle;
    if (this.isUsable(current)) return current;
    return this.reopen();
  }

  /** Refresh the credential and replace the connection, or join a reopen already running. */
  private reopen(): Promise<Handle> {
    if (this.opening) return this.opening;

    const run = async (): Promise<Handle> => {
      const stale = this.handle;
      this.handle = null;
      if (stale) {
        stale.retired = true;
        // A healthy connection keeps serving the queries already on it.
        if (stale.broken || stale.active === 0) await this.endHandle(stale);
      }

      const config = await this.getConfig();
      const credential = await this.tokens.getCredential();
      const conn = await this.connectFn(config.toClientConfig(credential.token));
      const handle: Handle = { conn, credential, broken: false, active: 0, retired: false, ended: false };
      conn.onError((error) => {
        handle.broken = true;
        log.warn("lakebase_connection_error", { error: error.message });
      });
      this.connectCount++;
      this.handle = handle;
      log.info("lakebase_connected", { host: config.host, database: config.database, connection: this.connectCount });
      return handle;
    };

    const pending = run().finally(() => {
      this.opening = null;
    });
    this.opening = pending;
    return pending;
  }

  private async endHandle(handle: Handle): Promise<void> {
    if (handle.ended) return;
    handle.ended = true;
    try {
      await handle.conn.end();
    } catch (error) {
      log.debug("lakebase_close_failed", { error: errorMessage(error) });
    }
  }

  private async query(handle: Handle, sql: string, values: unknown[]): Promise<PgQueryResult> {
    handle.active++;
    try {
      return await handle.conn.query(sql, values);
    } finally {
      handle.active--;
      if (handle.retired && handle.active === 0) await this.endHandle(handle);
    }
  }

  private async run(sql: string, values: unknown[], options: FetchOptions): Promise<PgQueryResult> {
    for (let attempt = 0; ; attempt++) {
      options.signal?.throwIfAborted();
      let handle: Handle | undefined;
      try {
        handle = await this.acquire();
        return await this.query(handle, sql, values);
      } catch (error) {
        // Token exchange and configuration failures are final.
        if (error instanceof AppError) throw error;

        const kind = classifyPgError(error);
        if (kind === "query") {
          throw new QueryError(errorMessage(error), {
            details: { sqlstate: errorCode(error) },
            cause: error,
          });
        }

        if (handle) handle.broken = true;
        if (kind === "auth") this.tokens.invalidate();
        if (attempt >= this.connectRetries) {
          throw new ConnectionError(errorMessage(error), {
            details: { sqlstate: errorCode(error), attempts: attempt + 1 },
            cause: error,
          });
        }
        log.warn("lakebase_reconnect", { reason: kind, attempt: attempt + 1, error: errorMessage(error) });
      }
    }
  }
}
