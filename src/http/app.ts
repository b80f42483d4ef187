/**
 * Express application: health check, estimate routes and a JSON error handler.
 */

import express, { type NextFunction, type Request, type Response } from "express";
import { createEstimateRouter, type EstimateRouterDeps } from "./estimate-router.js";

export function createApp(deps: EstimateRouterDeps): express.Express {
  const app = express();
  app.disable("x-powered-by");

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.use(createEstimateRouter(deps));

  app.use((_req, res) => {
    res.status(404).json({ error: { code: "NOT_FOUND", message: "Not found" } });
  });

  // Express recognizes error handlers by their four parameters.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    deps.logger.error("Unhandled request error", {
      error: err instanceof Error ? err : String(err),
    });
    if (res.headersSent) return;
    res.status(500).json({ error: { code: "INTERNAL_ERROR", message: "Internal server error" } });
  });

  return app;
}
