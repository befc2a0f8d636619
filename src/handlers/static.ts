import { existsSync } from "node:fs";
import path from "node:path";
import express from "express";
import type { NextFunction, Request, Response, Router } from "express";

/**
 * Serve the bundled frontend. Unknown non-API GET routes fall back to
 * `index.html` so client-side routing works. Returns null when there is no
 * build to serve.
 */
export function staticSite(staticDir: string): Router | null {
  const indexFile = path.join(staticDir, "index.html");
  if (!existsSync(indexFile)) return null;

  const router = express.Router();
  router.use(express.static(staticDir, { index: "index.html", fallthrough: true }));
  router.get("*", (req: Request, res: Response, next: NextFunction) => {
    if (req.path === "/api" || req.path.startsWith("/api/")) {
      next();
      return;
    }
    res.sendFile(indexFile);
  });
  return router;
}
