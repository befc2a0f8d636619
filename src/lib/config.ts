import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigurationError } from "./errors.js";

export type Env = Record<string, string | undefined>;

export type AuthMode = "service" | "per-request";

export type SslMode = "disable" | "allow" | "prefer" | "require" | "verify-ca" | "verify-full";

const SSL_MODES: readonly SslMode[] = ["disable", "allow", "prefer", "require", "verify-ca", "verify-full"];

export interface ServerConfig {
  port: number;
  staticDir: string;
  corsOrigins: readonly string[];
  title: string;
  version: string;
  environment: string;
}

export interface WorkspaceConfig {
  /** `https://<workspace-host>` without a trailing slash, when configured. */
  host?: string;
  token?: string;
  clientId?: string;
  clientSecret?: string;
  authMode: AuthMode;
}

export interface WarehouseConfig {
  warehouseId?: string;
  catalog?: string;
  schema?: string;
  pollIntervalMs: number;
  timeoutMs: number;
  waitTimeoutSeconds: number;
  maxConcurrent: number;
  maxQueue: number;
}

export interface LakebaseConfig {
  instanceName?: string;
  host?: string;
  port: number;
  database: string;
  user?: string;
  sslMode: SslMode;
  refreshMarginMs: number;
  connectRetries: number;
  /** Background credential refresh period; 0 turns it off. */
  backgroundRefreshMs: number;
}

export interface AppConfig {
  server: ServerConfig;
  workspace: WorkspaceConfig;
  warehouse: WarehouseConfig;
  lakebase: LakebaseConfig;
}

function read(env: Env, ...names: string[]): string | undefined {
  for (const name of names) {
    const raw = env[name]?.trim();
    if (raw) return raw;
  }
  return undefined;
}

function parsePositiveIntEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return parsed;
}

function parseNonNegativeIntEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 0) return fallback;
  return parsed;
}

function parseBoolEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") return true;
  if (normalized === "false" || normalized === "0" || normalized === "no") return false;
  return fallback;
}

export function normalizeHost(raw: string): string {
  const withScheme = /^https?:\/\//i.test(raw) ? raw : `https://${raw}`;
  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    throw new ConfigurationError(`DATABRICKS_HOST is not a valid host: ${raw}`);
  }
  if (url.pathname !== "/" && url.pathname !== "") {
    throw new ConfigurationError(`DATABRICKS_HOST must not include a path: ${raw}`);
  }
  return `${url.protocol}//${url.host}`;
}

function parseSslMode(raw: string | undefined): SslMode {
  if (!raw) return "require";
  const mode = SSL_MODES.find((m) => m === raw.toLowerCase());
  if (!mode) {
    throw new ConfigurationError(
      `PGSSLMODE must be one of ${SSL_MODES.join(", ")}; got: ${raw}`,
    );
  }
  return mode;
}

function parseWaitTimeout(env: Env): number {
  const seconds = parseNonNegativeIntEnv(env, "WAREHOUSE_WAIT_TIMEOUT_S", 10);
  if (seconds !== 0 && (seconds < 5 || seconds > 50)) {
    throw new ConfigurationError(
      `WAREHOUSE_WAIT_TIMEOUT_S must be 0 or between 5 and 50; got: ${seconds}`,
    );
  }
  return seconds;
}

function defaultStaticDir(): string {
  // src/lib/config.ts and dist/lib/config.js both sit two levels below the root.
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..", "static");
}

/** Build the immutable configuration from the environment. */
export function loadConfig(env: Env = process.env): AppConfig {
  const hostRaw = read(env, "DATABRICKS_HOST");
  const clientId = read(env, "DATABRICKS_CLIENT_ID");
  const clientSecret = read(env, "DATABRICKS_CLIENT_SECRET");
  if ((clientId === undefined) !== (clientSecret === undefined)) {
    throw new ConfigurationError(
      "DATABRICKS_CLIENT_ID and DATABRICKS_CLIENT_SECRET must be set together",
    );
  }

  const config: AppConfig = {
    server: {
      port: parsePositiveIntEnv(env, "PORT", parsePositiveIntEnv(env, "DATABRICKS_APP_PORT", 8000)),
      staticDir: read(env, "STATIC_DIR") ?? defaultStaticDir(),
      corsOrigins: (read(env, "CORS_ORIGINS") ?? "")
        .split(",")
        .map((o) => o.trim())
        .filter(Boolean),
      title: read(env, "API_TITLE") ?? "lakehouse-api",
      version: read(env, "API_VERSION") ?? "0.1.0",
      environment: read(env, "NODE_ENV") ?? "development",
    },
    workspace: {
      host: hostRaw === undefined ? undefined : normalizeHost(hostRaw),
      token: read(env, "DATABRICKS_TOKEN"),
      clientId,
      clientSecret,
      authMode: parseBoolEnv(env, "DATABRICKS_USE_USER_TOKEN", false) ? "per-request" : "service",
    },
    warehouse: {
      warehouseId: read(env, "DATABRICKS_WAREHOUSE_ID"),
      catalog: read(env, "DATABRICKS_CATALOG"),
      schema: read(env, "DATABRICKS_SCHEMA"),
      pollIntervalMs: parsePositiveIntEnv(env, "WAREHOUSE_POLL_INTERVAL_MS", 500),
      timeoutMs: parsePositiveIntEnv(env, "WAREHOUSE_TIMEOUT_MS", 600_000),
      waitTimeoutSeconds: parseWaitTimeout(env),
      maxConcurrent: parsePositiveIntEnv(env, "WAREHOUSE_MAX_CONCURRENT", 12),
      maxQueue: parsePositiveIntEnv(env, "WAREHOUSE_MAX_QUEUE", 200),
    },
    lakebase: {
      instanceName: read(env, "LAKEBASE_INSTANCE_NAME"),
      host: read(env, "PGHOST"),
      port: parsePositiveIntEnv(env, "PGPORT", 5432),
      database: read(env, "PGDATABASE") ?? "databricks_postgres",
      user: read(env, "PGUSER"),
      sslMode: parseSslMode(read(env, "PGSSLMODE")),
      refreshMarginMs: parseNonNegativeIntEnv(env, "LAKEBASE_REFRESH_MARGIN_MS", 300_000),
      connectRetries: parseNonNegativeIntEnv(env, "LAKEBASE_CONNECT_RETRIES", 1),
      backgroundRefreshMs: parseNonNegativeIntEnv(env, "LAKEBASE_BACKGROUND_REFRESH_MS", 3_000_000),
    },
  };
  return deepFreeze(config);
}

function deepFreeze<T extends object>(obj: T): T {
  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  Object.freeze(obj);
  return obj;
}

export function requireSetting<T>(value: T | undefined, name: string): T {
  if (value === undefined) {
    throw new ConfigurationError(`${name} is not set`);
  }
  return value;
}
