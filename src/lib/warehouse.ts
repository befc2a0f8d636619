import { setTimeout as sleep } from "node:timers/promises";
import {
  SqlBackend,
  isPositional,
  type BindValue,
  type FetchOptions,
  type QueryParams,
  type ResultSet,
} from "./backend.js";
import { QueryError, TimeoutError, errorMessage, isAbortError } from "./errors.js";
import { createLogger } from "./log.js";
import { StatementQueue, type QueueStats } from "./query_queue.js";
import { rowConverter, type ColumnInfo, type Row } from "./rows.js";
import { normalizeSql } from "./sql.js";
import type {
  CallOptions,
  ResultData,
  StatementApi,
  StatementParameter,
  StatementResponse,
  StatementState,
  WarehouseInfo,
} from "./workspace_client.js";

const log = createLogger("warehouse");

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

export interface WarehouseBackendOptions {
  /** A fixed id, or a lookup run once on first use. */
  warehouseId: string | (() => Promise<string>);
  catalog?: string;
  schema?: string;
  pollIntervalMs: number;
  /** Longest a statement may stay pending or running before it is canceled. */
  timeoutMs: number;
  /** Server-side wait on submit: 0, or 5 to 50 seconds. */
  waitTimeoutSeconds: number;
  maxConcurrent: number;
  maxQueue: number;
  byteLimit?: number;
  now?: () => number;
}

/**
 * Server-side wait for the submit call. It never outlasts `timeoutMs`; the API
 * takes 0 or 5 to 50 seconds, so a shorter budget polls from the start.
 */
export function submitWaitSeconds(waitTimeoutSeconds: number, timeoutMs: number): number {
  if (waitTimeoutSeconds * 1000 <= timeoutMs) return waitTimeoutSeconds;
  const capped = Math.floor(timeoutMs / 1000);
  return capped >= 5 ? capped : 0;
}

/**
 * Pick a warehouse when none is configured: running shared, then running,
 * then stopped shared, then anything. A name containing "shared" marks a
 * shared warehouse. Ties keep listing order.
 */
export function pickWarehouse(warehouses: readonly WarehouseInfo[]): WarehouseInfo | undefined {
  const rank = (w: WarehouseInfo): number => {
    const running = w.state === "RUNNING";
    const shared = (w.name ?? "").toLowerCase().includes("shared");
    if (running) return shared ? 0 : 1;
    return shared ? 2 : 3;
  };
  let best: WarehouseInfo | undefined;
  for (const w of warehouses) {
    if (best === undefined || rank(w) < rank(best)) best = w;
  }
  return best;
}

function isRunning(state: StatementState): boolean {
  return state === "PENDING" || state === "RUNNING";
}

function toParameter(name: string, value: BindValue): StatementParameter {
  if (value === null) return { name, value: null };
  if (typeof value === "string") return { name, value, type: "STRING" };
  if (typeof value === "boolean") return { name, value: value ? "true" : "false", type: "BOOLEAN" };
  if (typeof value === "bigint") return { name, value: value.toString(), type: "BIGINT" };
  if (value instanceof Date) return { name, value: value.toISOString(), type: "TIMESTAMP" };
  if (Number.isInteger(value)) {
    return { name, value: String(value), type: value >= INT32_MIN && value <= INT32_MAX ? "INT" : "BIGINT" };
  }
  return { name, value: String(value), type: "DOUBLE" };
}

/**
 * Statement parameters for the execution API. Positional values bind to the
 * named markers `:p1`, `:p2`, ... in order.
 */
export function toStatementParameters(params: QueryParams | undefined): StatementParameter[] | undefined {
  if (params === undefined) return undefined;
  if (isPositional(params)) {
    return params.length === 0 ? undefined : params.map((v, i) => toParameter(`p${i + 1}`, v));
  }
  const entries = Object.entries(params);
  return entries.length === 0 ? undefined : entries.map(([name, v]) => toParameter(name, v));
}

/**
 * Runs SQL on a warehouse through the Statement Execution API: submit, poll
 * until terminal, then read every inline result chunk in order.
 */
export class StatementExecutionBackend extends SqlBackend {
  readonly kind = "warehouse" as const;
  private readonly queue: StatementQueue;
  private readonly now: () => number;
  private warehouseId: Promise<string> | null = null;

  constructor(
    private readonly api: StatementApi,
    private readonly opts: WarehouseBackendOptions,
  ) {
    super();
    this.queue = new StatementQueue(opts.maxConcurrent, opts.maxQueue);
    this.now = opts.now ?? Date.now;
  }

  async fetchResult(sql: string, params?: QueryParams, options: FetchOptions = {}): Promise<ResultSet> {
    const startedAt = this.now();
    const { value, queueWaitMs, queueDepthOnEnqueue } = await this.queue.run(() =>
      this.runStatement(sql, params, options),
    );
    log.info("warehouse_statement", {
      status: "ok",
      statement_id: value.statementId,
      duration_ms: this.now() - startedAt,
      queue_wait_ms: queueWaitMs,
      queue_depth_on_enqueue: queueDepthOnEnqueue,
      chunk_count: value.chunkCount,
      row_count: value.rows.length,
    });
    return { columns: value.columns, rows: value.rows };
  }

  async execute(sql: string, params?: QueryParams, options: FetchOptions = {}): Promise<void> {
    await this.queue.run(() => this.runStatement(sql, params, options));
  }

  async close(): Promise<void> {
    // Stateless: every statement is its own remote resource.
  }

  queueStats(): QueueStats {
    return this.queue.stats();
  }

  private getWarehouseId(): Promise<string> {
    if (!this.warehouseId) {
      const source = this.opts.warehouseId;
      this.warehouseId =
        typeof source === "string"
          ? Promise.resolve(source)
          : source().catch((error: unknown) => {
              this.warehouseId = null;
              throw error;
            });
    }
    return this.warehouseId;
  }

  private async runStatement(
    sql: string,
    params: QueryParams | undefined,
    options: FetchOptions,
  ): Promise<{ statementId: string; columns: string[]; rows: Row[]; chunkCount: number }> {
    const call: CallOptions = { signal: options.signal, userToken: options.userToken };
    const warehouseId = await this.getWarehouseId();
    const startedAt = this.now();
    log.debug("warehouse_submit", { sql: normalizeSql(sql), warehouse_id: warehouseId });

    let response = await this.api.executeStatement(
      {
        warehouse_id: warehouseId,
        statement: sql,
        catalog: options.catalog ?? this.opts.catalog,
        schema: options.schema ?? this.opts.schema,
        parameters: toStatementParameters(params),
        disposition: "INLINE",
        format: "JSON_ARRAY",
        wait_timeout: `${submitWaitSeconds(this.opts.waitTimeoutSeconds, this.opts.timeoutMs)}s`,
        on_wait_timeout: "CONTINUE",
        byte_limit: this.opts.byteLimit,
      },
      call,
    );
    const statementId = response.statement_id;

    try {
      response = await this.waitForTerminal(response, startedAt, call);
    } catch (error) {
      if (isAbortError(error)) {
        await this.cancelQuietly(statementId, options.userToken, "aborted");
      }
      throw error;
    }

    const { state, error } = response.status;
    if (state === "FAILED") {
      throw new QueryError(error?.message ?? "Unknown error", {
        details: { statement_id: statementId, error_code: error?.error_code },
      });
    }
    if (state !== "SUCCEEDED") {
      throw new QueryError(`Statement ${statementId} was ${state.toLowerCase()}`, {
        details: { statement_id: statementId, state },
      });
    }

    const collected = await this.collectRows(response, call);
    log.debug("warehouse_complete", {
      statement_id: statementId,
      duration_ms: this.now() - startedAt,
      row_count: collected.rows.length,
    });
    return { statementId, ...collected };
  }

  private async waitForTerminal(
    initial: StatementResponse,
    startedAt: number,
    call: CallOptions,
  ): Promise<StatementResponse> {
    let response = initial;
    while (isRunning(response.status.state)) {
      const remaining = startedAt + this.opts.timeoutMs - this.now();
      if (remaining <= 0) {
        await this.cancelQuietly(response.statement_id, call.userToken, "timeout");
        throw new TimeoutError(`Query timed out after ${this.opts.timeoutMs}ms`, {
          details: { statement_id: response.statement_id },
        });
      }
      await sleep(Math.min(this.opts.pollIntervalMs, remaining), undefined, { signal: call.signal });
      response = await this.api.getStatement(response.statement_id, call);
    }
    return response;
  }

  private async collectRows(
    response: StatementResponse,
    call: CallOptions,
  ): Promise<{ columns: string[]; rows: Row[]; chunkCount: number }> {
    const columns: ColumnInfo[] = (response.manifest?.schema?.columns ?? [])
      .slice()
      .sort((a, b) => (a.position ?? 0) - (b.position ?? 0))
      .map((c) => ({ name: c.name, typeName: c.type_name }));
    const names = columns.map((c) => c.name);
    if (columns.length === 0) return { columns: names, rows: [], chunkCount: 0 };

    const convert = rowConverter(columns, "warehouse");
    const rows: Row[] = [];
    let chunkCount = 0;
    const totalChunks = response.manifest?.total_chunk_count ?? 0;

    let chunk: ResultData | undefined = response.result;
    if (chunk === undefined && totalChunks > 0) {
      chunk = await this.api.getStatementResultChunk(response.statement_id, 0, call);
    }
    while (chunk !== undefined) {
      chunkCount++;
      for (const raw of chunk.data_array ?? []) {
        rows.push(convert(raw));
      }
      const next = chunk.next_chunk_index;
      chunk =
        next === undefined
          ? undefined
          : await this.api.getStatementResultChunk(response.statement_id, next, call);
    }
    return { columns: names, rows, chunkCount };
  }

  /** Best-effort: the remote service reaps abandoned statements on its own. */
  private async cancelQuietly(statementId: string, userToken: string | undefined, reason: string): Promise<void> {
    try {
      await this.api.cancelStatement(statementId, { userToken });
      log.info("warehouse_cancel", { statement_id: statementId, reason });
    } catch (error) {
      log.warn("warehouse_cancel_failed", { statement_id: statementId, reason, error: errorMessage(error) });
    }
  }
}
