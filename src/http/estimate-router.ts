/**
 * Estimate endpoints: GET /api/envios/estimar and GET /api/envios/debug.
 * Read-only; nothing is persisted.
 */

import express, { type NextFunction, type Request, type Response } from "express";
import { randomUUID } from "node:crypto";
import type { ShippingEstimator } from "../service/shipping-estimator.js";
import {
  isShippingEstimateError,
  type ShippingErrorCode,
  type ShippingEstimateError,
} from "../domain/errors.js";
import type { Logger } from "../logger.js";
import type { RequestContextResolver } from "./context.js";
import { toWireError, toWireEstimate, toWireTrace } from "./wire.js";

export interface EstimateRouterDeps {
  estimator: ShippingEstimator;
  context: RequestContextResolver;
  logger: Logger;
}

const STATUS_BY_CODE: Record<ShippingErrorCode, number> = {
  RULE_STORE_UNAVAILABLE: 503,
  RULE_STORE_TIMEOUT: 503,
  MALFORMED_RULES: 503,
  CANCELLED: 499,
  VALIDATION_ERROR: 400,
};

/** Abort signal that fires when the client goes away before the response is sent */
function clientAbortSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

function sendError(res: Response, error: ShippingEstimateError): void {
  if (res.destroyed) return;
  res.status(STATUS_BY_CODE[error.code]).json(toWireError(error));
}

/** Domain errors thrown by a context resolver map to their status; anything else is a 500 */
function handleThrown(err: unknown, res: Response, next: NextFunction): void {
  if (isShippingEstimateError(err)) {
    sendError(res, err);
    return;
  }
  next(err);
}

function requestLogger(req: Request, logger: Logger): Logger {
  return logger.child({ requestId: req.get("x-request-id") ?? randomUUID() });
}

export function createEstimateRouter(deps: EstimateRouterDeps): express.Router {
  const router = express.Router();

  router.get("/api/envios/estimar", async (req, res, next) => {
    const log = requestLogger(req, deps.logger);
    try {
      const { buyer, cart } = await deps.context.resolve(req);
      const result = await deps.estimator.estimate(cart, buyer, {
        signal: clientAbortSignal(res),
        logger: log,
      });
      if (!result.ok) {
        sendError(res, result.error);
        return;
      }
      res.json(toWireEstimate(result.value));
    } catch (err) {
      handleThrown(err, res, next);
    }
  });

  router.get("/api/envios/debug", async (req, res, next) => {
    const log = requestLogger(req, deps.logger);
    const sellerId = typeof req.query.vendedorId === "string" ? req.query.vendedorId : "";
    try {
      const { buyer } = await deps.context.resolve(req);
      const result = await deps.estimator.explain(sellerId, buyer, {
        signal: clientAbortSignal(res),
        logger: log,
      });
      if (!result.ok) {
        sendError(res, result.error);
        return;
      }
      res.json(toWireTrace(sellerId, result.value));
    } catch (err) {
      handleThrown(err, res, next);
    }
  });

  return router;
}
