import { describe, it, expect } from "vitest";
import { QueryError, QueueSaturatedError, TimeoutError } from "../errors.js";
import {
  StatementExecutionBackend,
  pickWarehouse,
  submitWaitSeconds,
  toStatementParameters,
  type WarehouseBackendOptions,
} from "../warehouse.js";
import type {
  ExecuteStatementRequest,
  ResultData,
  StatementApi,
  StatementResponse,
  StatementState,
} from "../workspace_client.js";

class FakeStatementApi implements StatementApi {
  readonly submitted: ExecuteStatementRequest[] = [];
  readonly chunkRequests: number[] = [];
  readonly canceled: string[] = [];
  readonly chunks = new Map<number, ResultData>();
  /** Poll responses in order; the last one repeats. */
  polls: StatementResponse[] = [];
  polled = 0;
  gate: Promise<void> | undefined;

  constructor(private readonly initial: StatementResponse) {}

  async executeStatement(req: ExecuteStatementRequest): Promise<StatementResponse> {
    this.submitted.push(req);
    if (this.gate) await this.gate;
    return this.initial;
  }

  async getStatement(): Promise<StatementResponse> {
    this.polled++;
    const next = this.polls.length > 1 ? this.polls.shift() : this.polls[0];
    if (!next) throw new Error("no poll response scripted");
    return next;
  }

  async getStatementResultChunk(_statementId: string, chunkIndex: number): Promise<ResultData> {
    this.chunkRequests.push(chunkIndex);
    const chunk = this.chunks.get(chunkIndex);
    if (!chunk) throw new Error(`no chunk ${chunkIndex}`);
    return chunk;
  }

  async cancelStatement(statementId: string): Promise<void> {
    this.canceled.push(statementId);
  }
}

function statement(state: StatementState, extra: Partial<StatementResponse> = {}): StatementResponse {
  return { statement_id: "st-1", status: { state }, ...extra };
}

function manifest(columns: Array<[string, string]>, totalChunks: number): StatementResponse["manifest"] {
  return {
    schema: { columns: columns.map(([name, type_name], position) => ({ name, type_name, position })) },
    total_chunk_count: totalChunks,
  };
}

function backend(api: StatementApi, overrides: Partial<WarehouseBackendOptions> = {}) {
  return new StatementExecutionBackend(api, {
    warehouseId: "wh-1",
    pollIntervalMs: 1,
    timeoutMs: 60_000,
    waitTimeoutSeconds: 10,
    maxConcurrent: 4,
    maxQueue: 10,
    ...overrides,
  });
}

describe("StatementExecutionBackend.fetch", () => {
  it("returns typed rows for an inline result", async () => {
    const api = new FakeStatementApi(
      statement("SUCCEEDED", { manifest: manifest([["x", "INT"]], 1), result: { data_array: [["1"]] } }),
    );
    const rows = await backend(api).fetch("SELECT 1 AS x");

    expect(rows.map((r) => r.asObject())).toEqual([{ x: 1 }]);
    expect(api.submitted[0]).toMatchObject({
      warehouse_id: "wh-1",
      statement: "SELECT 1 AS x",
      disposition: "INLINE",
      format: "JSON_ARRAY",
      wait_timeout: "10s",
      on_wait_timeout: "CONTINUE",
    });
    expect(api.submitted[0]?.parameters).toBeUndefined();
  });

  it("orders columns by position", async () => {
    const api = new FakeStatementApi(
      statement("SUCCEEDED", {
        manifest: {
          schema: {
            columns: [
              { name: "b", type_name: "STRING", position: 1 },
              { name: "a", type_name: "INT", position: 0 },
            ],
          },
        },
        result: { data_array: [["7", "seven"]] },
      }),
    );
    const [row] = await backend(api).fetch("SELECT a, b FROM t");
    expect(row?.columns).toEqual(["a", "b"]);
    expect(row?.values).toEqual([7, "seven"]);
  });

  it("follows result chunks in order", async () => {
    const api = new FakeStatementApi(
      statement("SUCCEEDED", {
        manifest: manifest([["n", "BIGINT"]], 3),
        result: { chunk_index: 0, data_array: [["1"], ["2"]], next_chunk_index: 1 },
      }),
    );
    api.chunks.set(1, { chunk_index: 1, data_array: [["3"]], next_chunk_index: 2 });
    api.chunks.set(2, { chunk_index: 2, data_array: [["4"]] });

    const rows = await backend(api).fetch("SELECT n FROM range(4)");
    expect(rows.map((r) => r.get("n"))).toEqual([1, 2, 3, 4]);
    expect(api.chunkRequests).toEqual([1, 2]);
  });

  it("fetches the first chunk when the response carries none", async () => {
    const api = new FakeStatementApi(statement("SUCCEEDED", { manifest: manifest([["s", "STRING"]], 1) }));
    api.chunks.set(0, { chunk_index: 0, data_array: [["only"]] });

    const rows = await backend(api).fetch("SELECT 'only' AS s");
    expect(rows.map((r) => r.get("s"))).toEqual(["only"]);
    expect(api.chunkRequests).toEqual([0]);
  });

  it("returns no rows for an empty result", async () => {
    const api = new FakeStatementApi(statement("SUCCEEDED", { manifest: manifest([["x", "INT"]], 0) }));
    const wh = backend(api);
    await expect(wh.fetch("SELECT 1 WHERE false")).resolves.toEqual([]);
    await expect(wh.fetchOne("SELECT 1 WHERE false")).resolves.toBeNull();
  });

  it("keeps the column names of an empty result", async () => {
    const api = new FakeStatementApi(
      statement("SUCCEEDED", { manifest: manifest([["id", "INT"], ["name", "STRING"]], 0) }),
    );
    await expect(backend(api).fetchResult("SELECT id, name FROM t WHERE false")).resolves.toEqual({
      columns: ["id", "name"],
      rows: [],
    });
  });

  it("never asks the server to wait longer than the timeout", async () => {
    const api = new FakeStatementApi(statement("SUCCEEDED"));
    await backend(api, { timeoutMs: 2_000, waitTimeoutSeconds: 10 }).execute("SELECT 1");
    await backend(api, { timeoutMs: 7_500, waitTimeoutSeconds: 10 }).execute("SELECT 1");
    expect(api.submitted.map((r) => r.wait_timeout)).toEqual(["0s", "7s"]);
  });

  it("looks the warehouse id up once", async () => {
    const api = new FakeStatementApi(statement("SUCCEEDED"));
    let lookups = 0;
    const wh = backend(api, {
      warehouseId: async () => {
        lookups++;
        if (lookups === 1) throw new Error("listing failed");
        return "wh-auto";
      },
    });

    await expect(wh.execute("SELECT 1")).rejects.toThrow("listing failed");
    await wh.execute("SELECT 1");
    await wh.execute("SELECT 2");
    expect(lookups).toBe(2);
    expect(api.submitted.map((r) => r.warehouse_id)).toEqual(["wh-auto", "wh-auto"]);
  });

  it("polls until the statement finishes", async () => {
    const api = new FakeStatementApi(statement("PENDING"));
    api.polls = [
      statement("RUNNING"),
      statement("SUCCEEDED", { manifest: manifest([["x", "INT"]], 1), result: { data_array: [["5"]] } }),
    ];
    await expect(backend(api).fetchValue("SELECT 5")).resolves.toBe(5);
    expect(api.polled).toBe(2);
  });

  it("raises the remote error message verbatim", async () => {
    const message = "[TABLE_OR_VIEW_NOT_FOUND] The table or view `missing` cannot be found.";
    const api = new FakeStatementApi(
      statement("FAILED", { status: { state: "FAILED", error: { error_code: "BAD_REQUEST", message } } }),
    );
    const error = await backend(api).fetch("SELECT * FROM missing").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(QueryError);
    expect(error).toHaveProperty("message", message);
    expect(error).toHaveProperty("details", { statement_id: "st-1", error_code: "BAD_REQUEST" });
  });

  it("reports a canceled statement", async () => {
    const api = new FakeStatementApi(statement("CANCELED"));
    await expect(backend(api).fetch("SELECT 1")).rejects.toThrow("Statement st-1 was canceled");
  });

  it("cancels and times out a statement that runs too long", async () => {
    const api = new FakeStatementApi(statement("PENDING"));
    api.polls = [statement("RUNNING")];

    const error = await backend(api, { pollIntervalMs: 5, timeoutMs: 20 })
      .fetch("SELECT sleep()")
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toHaveProperty("message", "Query timed out after 20ms");
    expect(api.canceled).toEqual(["st-1"]);
  });

  it("cancels the statement when the caller aborts", async () => {
    const api = new FakeStatementApi(statement("RUNNING"));
    api.polls = [statement("RUNNING")];
    const controller = new AbortController();
    controller.abort();

    const error = await backend(api, { pollIntervalMs: 1_000 })
      .fetch("SELECT 1", undefined, { signal: controller.signal })
      .catch((e: unknown) => e);

    expect(error).toHaveProperty("name", "AbortError");
    expect(api.canceled).toEqual(["st-1"]);
  });

  it("passes per-call catalog and schema over the defaults", async () => {
    const api = new FakeStatementApi(statement("SUCCEEDED"));
    await backend(api, { catalog: "main", schema: "default" }).execute("SELECT 1", [], { schema: "sales" });
    expect(api.submitted[0]).toMatchObject({ catalog: "main", schema: "sales" });
  });

  it("refuses statements once the queue is full", async () => {
    const api = new FakeStatementApi(statement("SUCCEEDED"));
    let open: () => void = () => {};
    api.gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    const wh = backend(api, { maxConcurrent: 1, maxQueue: 0 });

    const first = wh.fetch("SELECT 1");
    await expect(wh.fetch("SELECT 2")).rejects.toBeInstanceOf(QueueSaturatedError);
    open();
    await expect(first).resolves.toEqual([]);
  });
});

describe("pickWarehouse", () => {
  const stoppedShared = { id: "a", name: "Shared Endpoint", state: "STOPPED" };
  const running = { id: "b", name: "etl", state: "RUNNING" };
  const runningShared = { id: "c", name: "team-SHARED", state: "RUNNING" };
  const stopped = { id: "d", name: "old", state: "STOPPED" };

  it("prefers running shared, then running, then stopped shared, then anything", () => {
    expect(pickWarehouse([stopped, stoppedShared, running, runningShared])?.id).toBe("c");
    expect(pickWarehouse([stopped, stoppedShared, running])?.id).toBe("b");
    expect(pickWarehouse([stopped, stoppedShared])?.id).toBe("a");
    expect(pickWarehouse([stopped, { id: "e", state: "STARTING" }])?.id).toBe("d");
  });

  it("returns nothing for an empty list", () => {
    expect(pickWarehouse([])).toBeUndefined();
  });
});

describe("submitWaitSeconds", () => {
  it("keeps the configured wait inside the timeout", () => {
    expect(submitWaitSeconds(10, 60_000)).toBe(10);
    expect(submitWaitSeconds(10, 10_000)).toBe(10);
  });

  it("caps the wait at the timeout, or skips it below five seconds", () => {
    expect(submitWaitSeconds(50, 30_500)).toBe(30);
    expect(submitWaitSeconds(10, 4_999)).toBe(0);
    expect(submitWaitSeconds(0, 100)).toBe(0);
  });
});

describe("toStatementParameters", () => {
  it("binds positional values to :p1..:pn with their types", () => {
    expect(
      toStatementParameters([1, "a", true, null, 3_000_000_000, 1.5, 10n, new Date("2024-01-01T00:00:00Z")]),
    ).toEqual([
      { name: "p1", value: "1", type: "INT" },
      { name: "p2", value: "a", type: "STRING" },
      { name: "p3", value: "true", type: "BOOLEAN" },
      { name: "p4", value: null },
      { name: "p5", value: "3000000000", type: "BIGINT" },
      { name: "p6", value: "1.5", type: "DOUBLE" },
      { name: "p7", value: "10", type: "BIGINT" },
      { name: "p8", value: "2024-01-01T00:00:00.000Z", type: "TIMESTAMP" },
    ]);
  });

  it("binds named values by name", () => {
    expect(toStatementParameters({ region: "emea" })).toEqual([{ name: "region", value: "emea", type: "STRING" }]);
  });

  it("sends nothing for empty params", () => {
    expect(toStatementParameters(undefined)).toBeUndefined();
    expect(toStatementParameters([])).toBeUndefined();
    expect(toStatementParameters({})).toBeUndefined();
  });
});
