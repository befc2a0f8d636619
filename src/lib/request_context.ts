import { randomUUID } from "node:crypto";
import type { NextFunction, Request, Response } from "express";
import { createLogger, type Logger } from "./log.js";

const log = createLogger("http");

const QUIET_PATHS = new Set(["/health", "/api/health"]);

/** Per-request state handed explicitly to whatever serves the request. */
export class RequestContext {
  readonly startedAt = Date.now();
  private readonly controller = new AbortController();

  constructor(
    readonly requestId: string,
    /** The caller's OAuth token forwarded by the app proxy. */
    readonly userToken: string | undefined,
  ) {}

  /** Aborts when the client goes away before the response is written. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  abort(): void {
    this.controller.abort();
  }

  logger(scope: string): Logger {
    return createLogger(scope, { request_id: this.requestId });
  }
}

function headerValue(req: Request, name: string): string | undefined {
  const value = req.header(name)?.trim();
  return value ? value : undefined;
}

export function requestContextMiddleware(req: Request, res: Response, next: NextFunction): void {
  const ctx = new RequestContext(
    headerValue(req, "X-Request-Id") ?? randomUUID(),
    headerValue(req, "X-Forwarded-Access-Token"),
  );
  res.locals.context = ctx;
  res.setHeader("X-Request-Id", ctx.requestId);

  res.on("close", () => {
    if (!res.writableFinished) ctx.abort();
  });
  res.on("finish", () => {
    if (QUIET_PATHS.has(req.path)) return;
    log.info("http_request", {
      request_id: ctx.requestId,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      duration_ms: Date.now() - ctx.startedAt,
    });
  });
  next();
}

/** The context set by `requestContextMiddleware`, or a fresh one outside it. */
export function getRequestContext(res: Response): RequestContext {
  const ctx: unknown = res.locals.context;
  if (ctx instanceof RequestContext) return ctx;
  const fresh = new RequestContext(randomUUID(), undefined);
  res.locals.context = fresh;
  return fresh;
}
