import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import { healthHandler, meHandler, rootHandler } from "./handlers/meta.js";
import { queryHandler } from "./handlers/query.js";
import { staticSite } from "./handlers/static.js";
import { toErrorResponse } from "./lib/errors.js";
import { createLogger } from "./lib/log.js";
import { requestContextMiddleware } from "./lib/request_context.js";
import type { LakehouseService } from "./lib/service.js";

const log = createLogger("app");

function corsMiddleware(origins: readonly string[]) {
  const allowed = new Set(origins);
  return (req: Request, res: Response, next: NextFunction): void => {
    const origin = req.header("Origin");
    if (origin && (allowed.has("*") || allowed.has(origin))) {
      res.setHeader("Access-Control-Allow-Origin", origin);
      res.setHeader("Access-Control-Allow-Credentials", "true");
      res.setHeader("Vary", "Origin");
      if (req.method === "OPTIONS") {
        res.setHeader("Access-Control-Allow-Methods", "GET,POST,PUT,DELETE,OPTIONS");
        res.setHeader(
          "Access-Control-Allow-Headers",
          req.header("Access-Control-Request-Headers") ?? "Content-Type, Authorization",
        );
        res.status(204).end();
        return;
      }
    }
    next();
  };
}

function hasType(err: unknown): err is { type: unknown } {
  return typeof err === "object" && err !== null && "type" in err;
}

export function createApp(service: LakehouseService): Express {
  const { server } = service.config;
  const app = express();

  app.disable("x-powered-by");
  app.use(requestContextMiddleware);
  if (server.corsOrigins.length > 0) {
    app.use(corsMiddleware(server.corsOrigins));
  }
  app.use(express.json({ limit: "1mb" }));

  // Return a clean 400 if JSON parsing fails.
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (hasType(err) && err.type === "entity.parse.failed") {
      res.status(400).json({ code: "VALIDATION_ERROR", message: "Invalid JSON" });
      return;
    }
    next(err);
  });

  const health = healthHandler(service);
  app.get("/health", health);

  const api = express.Router();
  api.get("/", rootHandler(service));
  api.get("/health", health);
  api.get("/me", meHandler(service));
  api.post("/sql/warehouse", queryHandler(service, "warehouse"));
  api.post("/sql/lakebase", queryHandler(service, "lakebase"));
  api.use((_req: Request, res: Response) => {
    res.status(404).json({ code: "NOT_FOUND", message: "No such API route" });
  });
  app.use("/api", api);

  const site = staticSite(server.staticDir);
  if (site) {
    app.use(site);
  } else {
    log.info("static_disabled", { static_dir: server.staticDir });
  }

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = toErrorResponse(err, { exposeInternal: server.environment !== "production" });
    log.error("unhandled_error", { status, code: body.code, error: err instanceof Error ? err.message : String(err) });
    if (!res.headersSent) res.status(status).json(body);
  });

  return app;
}
