#!/usr/bin/env node
/**
 * Simple CLI demo: estimate shipping for a sample cart.
 * Run: npm run demo
 * With RULES_DIR set: rules come from that directory. Without: built-in sample rules.
 * BUYER_PROVINCE and BUYER_CITY override the sample buyer.
 */

import {
  InMemoryRuleStore,
  ShippingEstimator,
  buildEstimator,
  createLogger,
  loadConfig,
  toWireEstimate,
} from "../index.js";
import type { CartLineItem, ShippingRule } from "../index.js";

const sampleRules: ShippingRule[] = [
  { sellerId: "tienda-ana", province: "Pichincha", city: "Quito", price: 5, active: true },
  { sellerId: "tienda-ana", province: "Pichincha", city: "", price: 3, active: true },
  { sellerId: "bodega-sur", province: "Pichincha", city: "", price: 4.25, active: true },
  { sellerId: "bodega-sur", province: "Guayas", city: "Guayaquil", price: 2.5, active: true },
];

const samplePlatformRules: ShippingRule[] = [
  { sellerId: "", province: "Pichincha", city: "", price: 4, active: true },
  { sellerId: "", province: "Guayas", city: "", price: 4.5, active: true },
];

const sampleCart: CartLineItem[] = [
  { productId: "blusa-01", quantity: 2, unitPrice: 18.9, sellerId: "tienda-ana" },
  { productId: "jean-07", quantity: 1, unitPrice: 32.5, sellerId: "bodega-sur" },
  { productId: "bolso-03", quantity: 1, unitPrice: 24, sellerId: "tienda-ana" },
  { productId: "gorra-11", quantity: 3, unitPrice: 7.75, sellerId: "feria-norte" },
];

async function main() {
  const config = loadConfig(process.env);
  const logger = createLogger({ level: config.LOG_LEVEL === "info" ? "warn" : config.LOG_LEVEL });

  let estimator: ShippingEstimator;
  if (process.env.RULES_DIR) {
    estimator = buildEstimator(config, logger);
    console.log(`Estimating with rules from ${config.RULES_DIR}...\n`);
  } else {
    const store = new InMemoryRuleStore(sampleRules);
    store.setPlatformRules(samplePlatformRules);
    estimator = new ShippingEstimator({
      ruleStore: store,
      platformRules: config.PLATFORM_FALLBACK ? store : undefined,
      failurePolicy: config.SELLER_FAILURE_POLICY,
      concurrency: config.RULE_FETCH_CONCURRENCY,
      foldAccents: config.LOCATION_FOLD_ACCENTS,
      logger,
    });
    console.log("Estimating with sample rules (set RULES_DIR to use a rule directory)...\n");
  }

  const buyer = {
    province: process.env.BUYER_PROVINCE ?? "Pichincha",
    city: process.env.BUYER_CITY ?? "Quito",
  };
  const result = await estimator.estimate(sampleCart, buyer);
  if (result.ok) {
    console.log("Estimate:", JSON.stringify(toWireEstimate(result.value), null, 2));
    for (const notice of result.value.notices) console.log("Notice:", notice);
  } else {
    console.error("Error:", result.error.toJSON());
    process.exitCode = 1;
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
