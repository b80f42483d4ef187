/**
 * Seller Shipping Estimator
 *
 * Public API: domain types, the estimator, rule stores, HTTP app factory and config.
 * Rule storage is wired through the RuleStore interface.
 */

export * from "./domain/index.js";
export { normalizeLocation, isBlank } from "./location/normalize.js";
export type { NormalizeOptions } from "./location/normalize.js";
export { groupBySeller, totalQuantity } from "./cart/aggregate.js";
export {
  resolveTariff,
  resolveTariffDetailed,
  traceTariffResolution,
  matchRule,
} from "./tariff/resolver.js";
export type { ResolveOptions, TariffResolution, TariffTrace } from "./tariff/resolver.js";
export type { RuleStore, PlatformRuleSource, LookupOptions } from "./rules/types.js";
export { InMemoryRuleStore } from "./rules/memory-store.js";
export { JsonFileRuleStore, sellerFileName } from "./rules/json-file-store.js";
export { CachingRuleStore, CachingPlatformRules } from "./rules/caching-store.js";
export { withLookupTimeout, withPlatformTimeout } from "./rules/timeout.js";
export { ShippingEstimator, MISSING_PROVINCE_WARNING } from "./service/shipping-estimator.js";
export type {
  ShippingEstimatorConfig,
  EstimateOptions,
  SellerFailurePolicy,
} from "./service/shipping-estimator.js";
export { createApp } from "./http/app.js";
export { headerContextResolver } from "./http/context.js";
export type { RequestContext, RequestContextResolver } from "./http/context.js";
export { toWireEstimate } from "./http/wire.js";
export type { WireEstimate, WireSellerEstimate } from "./http/wire.js";
export { buildEstimator } from "./bootstrap.js";
export { loadConfig } from "./config.js";
export type { Config } from "./config.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LogLevel } from "./logger.js";
