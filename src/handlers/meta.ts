import type { Request, Response } from "express";
import { toErrorResponse } from "../lib/errors.js";
import { getRequestContext } from "../lib/request_context.js";
import type { LakehouseService } from "../lib/service.js";

export function healthHandler(service: LakehouseService) {
  return function handleHealth(_req: Request, res: Response): void {
    res.json(service.health());
  };
}

export function rootHandler(service: LakehouseService) {
  return function handleRoot(_req: Request, res: Response): void {
    res.json({ message: `${service.config.server.title} is running`, docs: "/api/health" });
  };
}

/** Who the API is acting as: the signed-in user in per-request mode. */
export function meHandler(service: LakehouseService) {
  return async function handleMe(_req: Request, res: Response): Promise<void> {
    const ctx = getRequestContext(res);
    try {
      const user = await service.currentUser({ userToken: ctx.userToken, signal: ctx.signal });
      res.json(user);
    } catch (error) {
      const { status, body } = toErrorResponse(error);
      ctx.logger("me").warn("current_user_failed", { status, code: body.code });
      if (!res.headersSent) res.status(status).json(body);
    }
  };
}
