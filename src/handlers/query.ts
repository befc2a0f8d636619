import type { Request, Response } from "express";
import type { BackendKind } from "../lib/backend.js";
import { errorMessage, toErrorResponse } from "../lib/errors.js";
import { getRequestContext } from "../lib/request_context.js";
import type { LakehouseService } from "../lib/service.js";
import { parseQueryRequest, type QueryRequest } from "../lib/validate.js";

export function queryHandler(service: LakehouseService, kind: BackendKind) {
  return async function handleQuery(req: Request, res: Response): Promise<void> {
    const ctx = getRequestContext(res);
    const log = ctx.logger("query");

    let query: QueryRequest;
    try {
      query = parseQueryRequest(req.body);
    } catch (error) {
      const { status, body } = toErrorResponse(error);
      res.status(status).json(body);
      return;
    }

    try {
      const { columns, rows } = await service.backend(kind).fetchResult(query.sql, query.params, {
        signal: ctx.signal,
        userToken: ctx.userToken,
        catalog: query.catalog,
        schema: query.schema,
      });
      res.json({ columns, rows: rows.map((row) => row.toJSON()), row_count: rows.length });
    } catch (error) {
      const { status, body } = toErrorResponse(error, {
        exposeInternal: service.config.server.environment !== "production",
      });
      log.log(status >= 500 ? "error" : "warn", "query_failed", {
        backend: kind,
        status,
        code: body.code,
        error: errorMessage(error),
      });
      if (!res.headersSent && !ctx.signal.aborted) {
        res.status(status).json(body);
      }
    }
  };
}
