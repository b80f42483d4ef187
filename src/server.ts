#!/usr/bin/env node
/**
 * HTTP entry point. Settings come from the environment (and `.env`); see config.ts.
 */

import "dotenv/config";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { buildEstimator } from "./bootstrap.js";
import { createApp } from "./http/app.js";
import { headerContextResolver } from "./http/context.js";

const config = loadConfig(process.env);
const logger = createLogger({ level: config.LOG_LEVEL });

const app = createApp({
  estimator: buildEstimator(config, logger),
  context: headerContextResolver,
  logger,
});

app.listen(config.PORT, () => {
  logger.info("Shipping estimator listening", {
    port: config.PORT,
    rulesDir: config.RULES_DIR,
    failurePolicy: config.SELLER_FAILURE_POLICY,
  });
});
