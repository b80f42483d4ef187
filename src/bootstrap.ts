/**
 * Wires config into a ready estimator: file rule store, lookup timeout, optional cache.
 * Platform defaults, when enabled, go through the same timeout and cache.
 */

import type { Config } from "./config.js";
import type { Logger } from "./logger.js";
import { JsonFileRuleStore } from "./rules/json-file-store.js";
import { CachingPlatformRules, CachingRuleStore } from "./rules/caching-store.js";
import { withLookupTimeout, withPlatformTimeout } from "./rules/timeout.js";
import type { PlatformRuleSource, RuleStore } from "./rules/types.js";
import { ShippingEstimator } from "./service/shipping-estimator.js";

export function buildEstimator(config: Config, logger: Logger): ShippingEstimator {
  const fileStore = new JsonFileRuleStore({
    rootDir: config.RULES_DIR,
    logger: logger.child({ component: "rule-store" }),
  });
  let ruleStore: RuleStore = withLookupTimeout(fileStore, config.RULE_FETCH_TIMEOUT_MS);
  if (config.RULE_CACHE_TTL_MS > 0) {
    ruleStore = new CachingRuleStore(ruleStore, { ttlMs: config.RULE_CACHE_TTL_MS });
  }
  let platformRules: PlatformRuleSource | undefined;
  if (config.PLATFORM_FALLBACK) {
    platformRules = withPlatformTimeout(fileStore, config.RULE_FETCH_TIMEOUT_MS);
    if (config.RULE_CACHE_TTL_MS > 0) {
      platformRules = new CachingPlatformRules(platformRules, { ttlMs: config.RULE_CACHE_TTL_MS });
    }
  }
  return new ShippingEstimator({
    ruleStore,
    platformRules,
    failurePolicy: config.SELLER_FAILURE_POLICY,
    concurrency: config.RULE_FETCH_CONCURRENCY,
    foldAccents: config.LOCATION_FOLD_ACCENTS,
    logger,
  });
}
