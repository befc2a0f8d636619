import "./otel.js";
import { createApp } from "./app.js";
import { loadConfig } from "./lib/config.js";
import { errorMessage } from "./lib/errors.js";
import { createLogger } from "./lib/log.js";
import { LakehouseService } from "./lib/service.js";
import { SocketHub } from "./lib/socket_hub.js";

const log = createLogger("server");

async function start() {
  const config = loadConfig();
  const service = new LakehouseService(config);
  const app = createApp(service);

  const server = app.listen(config.server.port, "0.0.0.0", () => {
    log.info("listening", {
      port: config.server.port,
      environment: config.server.environment,
      auth_mode: config.workspace.authMode,
    });
  });
  const hub = new SocketHub();
  hub.attach(server);

  service.startBackgroundRefresh().catch((error: unknown) => {
    log.error("background_refresh_failed", { error: errorMessage(error) });
  });

  // Graceful shutdown: stop accepting requests, then close backends.
  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info("shutting_down", { signal });
    try {
      await hub.close();
      await new Promise<void>((resolve) => server.close(() => resolve()));
      await service.close();
    } catch (error) {
      log.error("shutdown_error", { error: errorMessage(error) });
    }
    process.exit(0);
  };
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

start().catch((err: unknown) => {
  log.error("start_failed", { error: errorMessage(err) });
  process.exit(1);
});
