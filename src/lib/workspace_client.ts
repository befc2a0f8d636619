import { randomUUID } from "node:crypto";
import {
  AppError,
  AuthError,
  ConnectionError,
  ExternalServiceError,
  NotFoundError,
  errorMessage,
  isAbortError,
} from "./errors.js";
import type { CredentialSource, FetchLike } from "./credentials.js";
import { createLogger } from "./log.js";
import { TRANSIENT_HTTP, withRetry, type RetryOptions } from "./retry.js";
import { toRecord } from "./validate.js";

const log = createLogger("workspace_client");

export type StatementState = "PENDING" | "RUNNING" | "SUCCEEDED" | "FAILED" | "CANCELED" | "CLOSED";

export interface StatementColumn {
  name: string;
  type_name?: string;
  type_text?: string;
  position?: number;
}

export interface ResultData {
  chunk_index?: number;
  row_offset?: number;
  row_count?: number;
  data_array?: Array<Array<string | null>>;
  next_chunk_index?: number;
}

export interface StatementResponse {
  statement_id: string;
  status: {
    state: StatementState;
    error?: { error_code?: string; message?: string };
  };
  manifest?: {
    format?: string;
    schema?: { column_count?: number; columns?: StatementColumn[] };
    total_chunk_count?: number;
    total_row_count?: number;
    truncated?: boolean;
  };
  result?: ResultData;
}

export interface StatementParameter {
  name: string;
  value: string | null;
  type?: string;
}

export interface ExecuteStatementRequest {
  warehouse_id: string;
  statement: string;
  catalog?: string;
  schema?: string;
  parameters?: StatementParameter[];
  disposition: "INLINE" | "EXTERNAL_LINKS";
  format: "JSON_ARRAY" | "ARROW_STREAM" | "CSV";
  wait_timeout: string;
  on_wait_timeout: "CONTINUE" | "CANCEL";
  byte_limit?: number;
}

export interface CallOptions {
  signal?: AbortSignal;
  userToken?: string;
}

/** Statement Execution API surface used by the warehouse backend. */
export interface StatementApi {
  executeStatement(req: ExecuteStatementRequest, opts?: CallOptions): Promise<StatementResponse>;
  getStatement(statementId: string, opts?: CallOptions): Promise<StatementResponse>;
  getStatementResultChunk(statementId: string, chunkIndex: number, opts?: CallOptions): Promise<ResultData>;
  cancelStatement(statementId: string, opts?: CallOptions): Promise<void>;
}

export interface WarehouseInfo {
  id: string;
  name?: string;
  /** `RUNNING`, `STOPPED`, `STARTING`, ... */
  state?: string;
}

export interface WarehouseApi {
  listWarehouses(opts?: CallOptions): Promise<WarehouseInfo[]>;
}

export interface DatabaseInstance {
  name: string;
  read_write_dns?: string;
  state?: string;
}

export interface DatabaseCredential {
  token: string;
  /** Epoch milliseconds. */
  expiresAt: number;
}

/** Lakebase instance lookup and credential exchange. */
export interface DatabaseApi {
  getDatabaseInstance(name: string, opts?: CallOptions): Promise<DatabaseInstance>;
  generateDatabaseCredential(instanceNames: readonly string[], opts?: CallOptions): Promise<DatabaseCredential>;
}

export interface CurrentUser {
  id?: string;
  userName?: string;
  displayName?: string;
  active?: boolean;
  emails?: Array<{ value?: string; primary?: boolean }>;
}

export interface IdentityApi {
  currentUser(opts?: CallOptions): Promise<CurrentUser>;
}

export class HttpStatusError extends ExternalServiceError {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message, { details: { status } });
    this.name = "HttpStatusError";
    this.status = status;
  }
}

function isTransient(error: unknown): boolean {
  if (error instanceof HttpStatusError) {
    return error.status === 429 || error.status >= 500;
  }
  return error instanceof ConnectionError;
}

function remoteMessage(body: string): string {
  try {
    const parsed = toRecord(JSON.parse(body));
    if (typeof parsed.message === "string") return parsed.message;
  } catch {
    // Plain-text error body.
  }
  return body;
}

export interface WorkspaceClientOptions {
  host: string;
  credentials: CredentialSource;
  fetchImpl?: FetchLike;
  retry?: Partial<Omit<RetryOptions, "isRetryable" | "signal">>;
  userAgent?: string;
}

/**
 * Minimal REST client for the workspace API. Every call resolves its bearer
 * token through the configured credential source.
 */
export class WorkspaceClient implements StatementApi, DatabaseApi, IdentityApi, WarehouseApi {
  readonly host: string;
  readonly credentials: CredentialSource;
  private readonly fetchImpl: FetchLike;
  private readonly retry: Omit<RetryOptions, "isRetryable" | "signal">;
  private readonly userAgent: string;

  constructor(opts: WorkspaceClientOptions) {
    this.host = opts.host.replace(/\/$/, "");
    this.credentials = opts.credentials;
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.retry = { ...TRANSIENT_HTTP, ...opts.retry };
    this.userAgent = opts.userAgent ?? "lakehouse-api/0.1";
  }

  private async request(
    method: "GET" | "POST",
    path: string,
    body: unknown,
    opts: CallOptions = {},
  ): Promise<unknown> {
    const token = await this.credentials.resolve(opts.userToken);
    return withRetry(
      async () => {
        let response: Response;
        try {
          response = await this.fetchImpl(`${this.host}${path}`, {
            method,
            headers: {
              Authorization: `Bearer ${token}`,
              Accept: "application/json",
              "User-Agent": this.userAgent,
              ...(body === undefined ? {} : { "Content-Type": "application/json" }),
            },
            body: body === undefined ? undefined : JSON.stringify(body),
            signal: opts.signal,
          });
        } catch (error) {
          if (isAbortError(error) || error instanceof AppError) throw error;
          throw new ConnectionError(`${method} ${path} failed: ${errorMessage(error)}`, { cause: error });
        }

        if (!response.ok) {
          const text = await response.text();
          const message = remoteMessage(text) || response.statusText;
          if (response.status === 401 || response.status === 403) {
            throw new AuthError(message, { details: { status: response.status, path } });
          }
          if (response.status === 404) {
            throw new NotFoundError(message, { details: { path } });
          }
          throw new HttpStatusError(response.status, `${method} ${path}: ${response.status} ${message}`);
        }

        const text = await response.text();
        const parsed: unknown = text ? JSON.parse(text) : {};
        return parsed;
      },
      { ...this.retry, isRetryable: isTransient, signal: opts.signal, label: `${method} ${path}` },
    );
  }

  async executeStatement(req: ExecuteStatementRequest, opts?: CallOptions): Promise<StatementResponse> {
    log.debug("execute_statement", { warehouse_id: req.warehouse_id });
    return parseStatementResponse(await this.request("POST", "/api/2.0/sql/statements/", req, opts));
  }

  async getStatement(statementId: string, opts?: CallOptions): Promise<StatementResponse> {
    return parseStatementResponse(
      await this.request("GET", `/api/2.0/sql/statements/${encodeURIComponent(statementId)}`, undefined, opts),
    );
  }

  async getStatementResultChunk(statementId: string, chunkIndex: number, opts?: CallOptions): Promise<ResultData> {
    const raw = await this.request(
      "GET",
      `/api/2.0/sql/statements/${encodeURIComponent(statementId)}/result/chunks/${chunkIndex}`,
      undefined,
      opts,
    );
    return parseResultData(raw);
  }

  async cancelStatement(statementId: string, opts?: CallOptions): Promise<void> {
    await this.request("POST", `/api/2.0/sql/statements/${encodeURIComponent(statementId)}/cancel`, {}, opts);
  }

  async currentUser(opts?: CallOptions): Promise<CurrentUser> {
    const raw = toRecord(await this.request("GET", "/api/2.0/preview/scim/v2/Me", undefined, opts));
    const emails = Array.isArray(raw.emails)
      ? raw.emails.map((e: unknown) => {
          const rec = toRecord(e);
          return {
            value: typeof rec.value === "string" ? rec.value : undefined,
            primary: typeof rec.primary === "boolean" ? rec.primary : undefined,
          };
        })
      : undefined;
    return {
      id: typeof raw.id === "string" ? raw.id : undefined,
      userName: typeof raw.userName === "string" ? raw.userName : undefined,
      displayName: typeof raw.displayName === "string" ? raw.displayName : undefined,
      active: typeof raw.active === "boolean" ? raw.active : undefined,
      emails,
    };
  }

  async listWarehouses(opts?: CallOptions): Promise<WarehouseInfo[]> {
    const raw = toRecord(await this.request("GET", "/api/2.0/sql/warehouses", undefined, opts));
    const list = Array.isArray(raw.warehouses) ? raw.warehouses : [];
    const warehouses: WarehouseInfo[] = [];
    for (const item of list) {
      const rec = toRecord(item);
      if (typeof rec.id !== "string") continue;
      warehouses.push({
        id: rec.id,
        name: typeof rec.name === "string" ? rec.name : undefined,
        state: typeof rec.state === "string" ? rec.state : undefined,
      });
    }
    return warehouses;
  }

  async getDatabaseInstance(name: string, opts?: CallOptions): Promise<DatabaseInstance> {
    const raw = toRecord(
      await this.request("GET", `/api/2.0/database/instances/${encodeURIComponent(name)}`, undefined, opts),
    );
    return {
      name: typeof raw.name === "string" ? raw.name : name,
      read_write_dns: typeof raw.read_write_dns === "string" ? raw.read_write_dns : undefined,
      state: typeof raw.state === "string" ? raw.state : undefined,
    };
  }

  async generateDatabaseCredential(
    instanceNames: readonly string[],
    opts?: CallOptions,
  ): Promise<DatabaseCredential> {
    const raw = toRecord(
      await this.request(
        "POST",
        "/api/2.0/database/credentials",
        { instance_names: instanceNames, request_id: randomUUID() },
        opts,
      ),
    );
    if (typeof raw.token !== "string" || !raw.token) {
      throw new AuthError("Database credential response has no token");
    }
    const expiresAt =
      typeof raw.expiration_time === "string" ? Date.parse(raw.expiration_time) : Number.NaN;
    return {
      token: raw.token,
      // Lakebase credentials live for one hour.
      expiresAt: Number.isNaN(expiresAt) ? Date.now() + 3_600_000 : expiresAt,
    };
  }
}

const STATES: readonly StatementState[] = ["PENDING", "RUNNING", "SUCCEEDED", "FAILED", "CANCELED", "CLOSED"];

function parseState(raw: unknown): StatementState {
  const state = STATES.find((s) => s === raw);
  if (!state) {
    throw new ExternalServiceError(`Unknown statement state: ${String(raw)}`);
  }
  return state;
}

function parseDataArray(raw: unknown): Array<Array<string | null>> | undefined {
  if (!Array.isArray(raw)) return undefined;
  return raw.map((row: unknown) =>
    Array.isArray(row) ? row.map((v: unknown) => (v === null || v === undefined ? null : String(v))) : [],
  );
}

export function parseResultData(raw: unknown): ResultData {
  const rec = toRecord(raw);
  return {
    chunk_index: typeof rec.chunk_index === "number" ? rec.chunk_index : undefined,
    row_offset: typeof rec.row_offset === "number" ? rec.row_offset : undefined,
    row_count: typeof rec.row_count === "number" ? rec.row_count : undefined,
    data_array: parseDataArray(rec.data_array),
    next_chunk_index: typeof rec.next_chunk_index === "number" ? rec.next_chunk_index : undefined,
  };
}

export function parseStatementResponse(raw: unknown): StatementResponse {
  const rec = toRecord(raw);
  if (typeof rec.statement_id !== "string") {
    throw new ExternalServiceError("Statement response has no statement_id");
  }
  const status = toRecord(rec.status);
  const error = rec.status === undefined ? undefined : toRecord(status.error);
  const manifest = rec.manifest === undefined ? undefined : toRecord(rec.manifest);
  const schema = manifest === undefined ? undefined : toRecord(manifest.schema);
  const rawColumns = schema?.columns;
  const columns = Array.isArray(rawColumns)
    ? rawColumns.map((c: unknown, i: number): StatementColumn => {
        const col = toRecord(c);
        return {
          name: typeof col.name === "string" ? col.name : `_c${i}`,
          type_name: typeof col.type_name === "string" ? col.type_name : undefined,
          type_text: typeof col.type_text === "string" ? col.type_text : undefined,
          position: typeof col.position === "number" ? col.position : i,
        };
      })
    : undefined;

  return {
    statement_id: rec.statement_id,
    status: {
      state: parseState(status.state),
      error:
        error && (typeof error.message === "string" || typeof error.error_code === "string")
          ? {
              error_code: typeof error.error_code === "string" ? error.error_code : undefined,
              message: typeof error.message === "string" ? error.message : undefined,
            }
          : undefined,
    },
    manifest:
      manifest === undefined
        ? undefined
        : {
            format: typeof manifest.format === "string" ? manifest.format : undefined,
            schema: columns ? { column_count: columns.length, columns } : undefined,
            total_chunk_count:
              typeof manifest.total_chunk_count === "number" ? manifest.total_chunk_count : undefined,
            total_row_count:
              typeof manifest.total_row_count === "number" ? manifest.total_row_count : undefined,
            truncated: typeof manifest.truncated === "boolean" ? manifest.truncated : undefined,
          },
    result: rec.result === undefined ? undefined : parseResultData(rec.result),
  };
}
