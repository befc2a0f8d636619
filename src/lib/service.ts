import type { BackendKind, SqlBackend } from "./backend.js";
import { requireSetting, type AppConfig } from "./config.js";
import {
  ServiceCredential,
  createCredentialSource,
  createServiceCredential,
  type CredentialSource,
  type FetchLike,
} from "./credentials.js";
import { ConfigurationError } from "./errors.js";
import { LakebaseBackend, PostgresConfig, type ConnectionFactory } from "./lakebase.js";
import { createLogger } from "./log.js";
import type { QueueStats } from "./query_queue.js";
import { OAuthTokenManager, type TokenExchange } from "./token_manager.js";
import { StatementExecutionBackend, pickWarehouse } from "./warehouse.js";
import {
  WorkspaceClient,
  type CallOptions,
  type CurrentUser,
  type DatabaseApi,
  type IdentityApi,
  type StatementApi,
  type WarehouseApi,
} from "./workspace_client.js";

const log = createLogger("service");

export type WorkspaceApi = StatementApi & DatabaseApi & IdentityApi & WarehouseApi;

export interface ServiceDeps {
  fetchImpl?: FetchLike;
  connect?: ConnectionFactory;
  /** Replaces both workspace clients, e.g. with an in-process fake. */
  workspace?: WorkspaceApi;
  now?: () => number;
}

export interface HealthStatus {
  status: "ok";
  environment: string;
  version: string;
  backends: Record<BackendKind, "configured" | "auto-select" | "unconfigured">;
  /** Present once the warehouse backend has run a statement. */
  warehouse_queue?: QueueStats;
}

/**
 * Entry point for everything data-related. Each client and backend is built on
 * first access and then reused for the life of this object. Pass the instance
 * to request handlers instead of reaching for module state.
 */
export class LakehouseService {
  private userWorkspace: WorkspaceApi | null = null;
  private appWorkspace: WorkspaceApi | null = null;
  private serviceCredential: CredentialSource | null = null;
  private warehouseBackend: StatementExecutionBackend | null = null;
  private lakebaseBackend: LakebaseBackend | null = null;
  private lakebaseTokens: OAuthTokenManager | null = null;

  constructor(
    readonly config: AppConfig,
    private readonly deps: ServiceDeps = {},
  ) {}

  private host(): string {
    return requireSetting(this.config.workspace.host, "DATABRICKS_HOST");
  }

  private getServiceCredential(): CredentialSource {
    if (!this.serviceCredential) {
      this.serviceCredential = createServiceCredential(this.config.workspace, {
        fetchImpl: this.deps.fetchImpl,
        now: this.deps.now,
      });
    }
    return this.serviceCredential;
  }

  /**
   * Workspace API as the caller: the forwarded user token in per-request
   * mode, the app's own identity otherwise.
   */
  get workspace(): WorkspaceApi {
    if (!this.userWorkspace) {
      if (this.deps.workspace) {
        this.userWorkspace = this.deps.workspace;
      } else if (this.config.workspace.authMode === "service") {
        this.userWorkspace = this.appIdentity;
      } else {
        this.userWorkspace = new WorkspaceClient({
          host: this.host(),
          credentials: createCredentialSource(this.config.workspace, { fetchImpl: this.deps.fetchImpl }),
          fetchImpl: this.deps.fetchImpl,
        });
      }
    }
    return this.userWorkspace;
  }

  /** Workspace API as the app itself, whatever the auth mode. */
  get appIdentity(): WorkspaceApi {
    if (!this.appWorkspace) {
      this.appWorkspace =
        this.deps.workspace ??
        new WorkspaceClient({
          host: this.host(),
          credentials: this.getServiceCredential(),
          fetchImpl: this.deps.fetchImpl,
        });
    }
    return this.appWorkspace;
  }

  get warehouse(): StatementExecutionBackend {
    if (!this.warehouseBackend) {
      const wh = this.config.warehouse;
      this.warehouseBackend = new StatementExecutionBackend(this.workspace, {
        warehouseId: wh.warehouseId ?? (() => this.findWarehouse()),
        catalog: wh.catalog,
        schema: wh.schema,
        pollIntervalMs: wh.pollIntervalMs,
        timeoutMs: wh.timeoutMs,
        waitTimeoutSeconds: wh.waitTimeoutSeconds,
        maxConcurrent: wh.maxConcurrent,
        maxQueue: wh.maxQueue,
        now: this.deps.now,
      });
      log.info("backend_created", { kind: "warehouse", warehouse_id: wh.warehouseId ?? "auto" });
    }
    return this.warehouseBackend;
  }

  get lakebase(): LakebaseBackend {
    if (!this.lakebaseBackend) {
      const lb = this.config.lakebase;
      this.lakebaseBackend = new LakebaseBackend({
        resolveConfig: () => this.resolvePostgresConfig(),
        tokens: this.getLakebaseTokens(),
        connect: this.deps.connect,
        connectRetries: lb.connectRetries,
      });
      log.info("backend_created", { kind: "lakebase", instance: lb.instanceName });
    }
    return this.lakebaseBackend;
  }

  private getLakebaseTokens(): OAuthTokenManager {
    if (!this.lakebaseTokens) {
      this.lakebaseTokens = new OAuthTokenManager(this.lakebaseExchange(), {
        refreshMarginMs: this.config.lakebase.refreshMarginMs,
        now: this.deps.now,
        label: "lakebase",
      });
    }
    return this.lakebaseTokens;
  }

  /**
   * Keep the Lakebase credential warm when an instance is configured. The
   * first exchange runs before this resolves.
   */
  async startBackgroundRefresh(): Promise<void> {
    const { instanceName, backgroundRefreshMs } = this.config.lakebase;
    if (!instanceName || backgroundRefreshMs === 0) return;
    await this.getLakebaseTokens().startBackgroundRefresh(backgroundRefreshMs);
  }

  backend(kind: BackendKind): SqlBackend {
    return kind === "warehouse" ? this.warehouse : this.lakebase;
  }

  async currentUser(opts?: CallOptions): Promise<CurrentUser> {
    return this.workspace.currentUser(opts);
  }

  health(): HealthStatus {
    const status: HealthStatus = {
      status: "ok",
      environment: this.config.server.environment,
      version: this.config.server.version,
      backends: {
        warehouse: this.config.warehouse.warehouseId ? "configured" : "auto-select",
        lakebase: this.config.lakebase.instanceName || this.config.lakebase.host ? "configured" : "unconfigured",
      },
    };
    if (this.warehouseBackend) status.warehouse_queue = this.warehouseBackend.queueStats();
    return status;
  }

  async close(): Promise<void> {
    this.lakebaseTokens?.stopBackgroundRefresh();
    const backends: SqlBackend[] = [];
    if (this.warehouseBackend) backends.push(this.warehouseBackend);
    if (this.lakebaseBackend) backends.push(this.lakebaseBackend);
    await Promise.all(backends.map((b) => b.close()));
    this.warehouseBackend = null;
    this.lakebaseBackend = null;
  }

  /**
   * Lakebase passwords come from the database credential API when an instance
   * is named, and otherwise from the app's own OAuth token.
   */
  private lakebaseExchange(): TokenExchange {
    const instanceName = this.config.lakebase.instanceName;
    if (instanceName) {
      return () => this.appIdentity.generateDatabaseCredential([instanceName]);
    }
    const { host, clientId, clientSecret } = this.config.workspace;
    if (!host || !clientId || !clientSecret) {
      throw new ConfigurationError(
        "LAKEBASE_INSTANCE_NAME is required unless the app authenticates with DATABRICKS_CLIENT_ID/SECRET",
      );
    }
    const marginMs = this.config.lakebase.refreshMarginMs;
    const now = this.deps.now ?? Date.now;
    return async () => {
      const credential = this.getServiceCredential();
      if (credential instanceof ServiceCredential) {
        // The workspace token refreshes later than Lakebase does; a cached one
        // already inside the Lakebase margin would be rejected on arrival.
        const cached = await credential.tokens.getCredential();
        if (now() < cached.expiresAt - marginMs) return cached;
        return credential.tokens.refresh();
      }
      throw new ConfigurationError(
        "LAKEBASE_INSTANCE_NAME is required unless the app authenticates with DATABRICKS_CLIENT_ID/SECRET",
      );
    };
  }

  private async findWarehouse(): Promise<string> {
    const warehouses = await this.appIdentity.listWarehouses();
    const best = pickWarehouse(warehouses);
    if (!best) {
      throw new ConfigurationError("No SQL warehouse available: set DATABRICKS_WAREHOUSE_ID or create a warehouse");
    }
    log.info("warehouse_selected", { warehouse_id: best.id, name: best.name, state: best.state });
    return best.id;
  }

  private async resolvePostgresConfig(): Promise<PostgresConfig> {
    const lb = this.config.lakebase;
    let host = lb.host;
    if (!host) {
      const instanceName = requireSetting(lb.instanceName, "PGHOST or LAKEBASE_INSTANCE_NAME");
      const instance = await this.appIdentity.getDatabaseInstance(instanceName);
      host = instance.read_write_dns;
      if (!host) {
        throw new ConfigurationError(`Lakebase instance ${instanceName} has no read/write endpoint`);
      }
    }
    let user = lb.user ?? this.config.workspace.clientId;
    if (!user) {
      const me = await this.appIdentity.currentUser();
      user = me.userName;
    }
    const config = new PostgresConfig(host, lb.port, lb.database, user ?? "token", lb.sslMode);
    log.info("lakebase_config_resolved", { config: config.toString() });
    return config;
  }
}
