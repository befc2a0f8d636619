import type { Server } from "node:http";
import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { createApp } from "../app.js";
import { loadConfig, type Env } from "../lib/config.js";
import { LakehouseService, type WorkspaceApi } from "../lib/service.js";
import type {
  CurrentUser,
  DatabaseCredential,
  DatabaseInstance,
  ExecuteStatementRequest,
  ResultData,
  StatementResponse,
  WarehouseInfo,
} from "../lib/workspace_client.js";

class FakeWorkspace implements WorkspaceApi {
  submitted: ExecuteStatementRequest[] = [];

  async executeStatement(req: ExecuteStatementRequest): Promise<StatementResponse> {
    this.submitted.push(req);
    if (req.statement.startsWith("SELEC ")) {
      return {
        statement_id: "st-2",
        status: { state: "FAILED", error: { error_code: "BAD_REQUEST", message: "[PARSE_SYNTAX_ERROR] near 'SELEC'" } },
      };
    }
    if (req.statement.endsWith("WHERE false")) {
      return {
        statement_id: "st-3",
        status: { state: "SUCCEEDED" },
        manifest: { schema: { columns: [{ name: "id", type_name: "INT", position: 0 }] }, total_chunk_count: 0 },
      };
    }
    return {
      statement_id: "st-1",
      status: { state: "SUCCEEDED" },
      manifest: {
        schema: {
          columns: [
            { name: "answer", type_name: "INT", position: 0 },
            { name: "total", type_name: "BIGINT", position: 1 },
          ],
        },
      },
      result: { data_array: [["42", "9007199254740993"]] },
    };
  }

  async getStatement(): Promise<StatementResponse> {
    throw new Error("not polled in these tests");
  }

  async getStatementResultChunk(): Promise<ResultData> {
    throw new Error("no chunks in these tests");
  }

  async cancelStatement(): Promise<void> {}

  async currentUser(): Promise<CurrentUser> {
    return { id: "42", userName: "someone@example.com" };
  }

  async listWarehouses(): Promise<WarehouseInfo[]> {
    return [];
  }

  async getDatabaseInstance(name: string): Promise<DatabaseInstance> {
    return { name, read_write_dns: "instance.db.test" };
  }

  async generateDatabaseCredential(): Promise<DatabaseCredential> {
    return { token: "db-token", expiresAt: Date.now() + 3_600_000 };
  }
}

async function start(env: Env): Promise<{ base: string; workspace: FakeWorkspace; server: Server }> {
  const workspace = new FakeWorkspace();
  const config = loadConfig({ STATIC_DIR: "/nonexistent/static", NODE_ENV: "test", ...env });
  const app = createApp(new LakehouseService(config, { workspace }));
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server has no port");
  return { base: `http://127.0.0.1:${address.port}`, workspace, server };
}

function stop(server: Server): Promise<void> {
  return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

function postJson(url: string, body: unknown, headers: Record<string, string> = {}): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(body),
  });
}

describe("HTTP API", () => {
  let base = "";
  let workspace: FakeWorkspace;
  let server: Server;

  beforeAll(async () => {
    ({ base, workspace, server } = await start({ DATABRICKS_WAREHOUSE_ID: "wh-1", API_VERSION: "1.2.3" }));
  });

  afterAll(async () => {
    await stop(server);
  });

  it("answers health checks at both paths", async () => {
    for (const path of ["/health", "/api/health"]) {
      const res = await fetch(`${base}${path}`);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: "ok",
        environment: "test",
        version: "1.2.3",
        backends: { warehouse: "configured", lakebase: "unconfigured" },
      });
    }
  });

  it("describes itself at the API root", async () => {
    const res = await fetch(`${base}/api`);
    expect(await res.json()).toEqual({ message: "lakehouse-api is running", docs: "/api/health" });
  });

  it("runs a warehouse query", async () => {
    const res = await postJson(`${base}/api/sql/warehouse`, { sql: "SELECT 42 AS answer", params: [1] });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      columns: ["answer", "total"],
      rows: [{ answer: 42, total: "9007199254740993" }],
      row_count: 1,
    });
    expect(workspace.submitted.at(-1)?.parameters).toEqual([{ name: "p1", value: "1", type: "INT" }]);
  });

  it("returns the columns of an empty result", async () => {
    const res = await postJson(`${base}/api/sql/warehouse`, { sql: "SELECT id FROM t WHERE false" });
    expect(await res.json()).toEqual({ columns: ["id"], rows: [], row_count: 0 });
  });

  it("echoes the caller's request id", async () => {
    const res = await postJson(`${base}/api/sql/warehouse`, { sql: "SELECT 1" }, { "X-Request-Id": "req-123" });
    expect(res.headers.get("x-request-id")).toBe("req-123");
  });

  it("reports a failed statement with the remote message", async () => {
    const res = await postJson(`${base}/api/sql/warehouse`, { sql: "SELEC 1" });

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      code: "QUERY_ERROR",
      message: "[PARSE_SYNTAX_ERROR] near 'SELEC'",
      details: { statement_id: "st-2", error_code: "BAD_REQUEST" },
    });
  });

  it("rejects malformed JSON", async () => {
    const res = await fetch(`${base}/api/sql/warehouse`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ code: "VALIDATION_ERROR", message: "Invalid JSON" });
  });

  it("rejects a body without sql", async () => {
    const res = await postJson(`${base}/api/sql/warehouse`, { params: [] });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ code: "VALIDATION_ERROR", message: "sql must be a non-empty string" });
  });

  it("reports an unconfigured backend as a server error", async () => {
    const res = await postJson(`${base}/api/sql/lakebase`, { sql: "SELECT 1" });
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      code: "CONFIGURATION_ERROR",
      message: "LAKEBASE_INSTANCE_NAME is required unless the app authenticates with DATABRICKS_CLIENT_ID/SECRET",
    });
  });

  it("returns the current user", async () => {
    const res = await fetch(`${base}/api/me`);
    expect(await res.json()).toEqual({ id: "42", userName: "someone@example.com" });
  });

  it("answers unknown API routes with 404", async () => {
    const res = await fetch(`${base}/api/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ code: "NOT_FOUND", message: "No such API route" });
  });
});

describe("CORS", () => {
  let base = "";
  let server: Server;

  beforeAll(async () => {
    ({ base, server } = await start({ CORS_ORIGINS: "http://localhost:5173" }));
  });

  afterAll(async () => {
    await stop(server);
  });

  it("answers preflight requests from an allowed origin", async () => {
    const res = await fetch(`${base}/api/sql/warehouse`, {
      method: "OPTIONS",
      headers: { Origin: "http://localhost:5173", "Access-Control-Request-Method": "POST" },
    });
    expect(res.status).toBe(204);
    expect(res.headers.get("access-control-allow-origin")).toBe("http://localhost:5173");
  });

  it("does not allow other origins", async () => {
    const res = await fetch(`${base}/api/health`, { headers: { Origin: "http://evil.test" } });
    expect(res.status).toBe(200);
    expect(res.headers.get("access-control-allow-origin")).toBeNull();
  });
});
