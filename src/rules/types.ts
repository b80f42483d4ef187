/**
 * Rule store abstraction: the estimator reads seller rule sets only through this interface.
 * A relational store, a file store, a cache or a batched lookup can be swapped in
 * without touching the resolver.
 */

import type { ShippingRule } from "../domain/types.js";
import type { Result } from "../domain/errors.js";

export interface LookupOptions {
  /** Aborts the lookup when the caller goes away */
  signal?: AbortSignal;
}

export interface RuleStore {
  /**
   * Rule set registered by `sellerId`, in stored order.
   * An unknown seller yields an empty list; only I/O problems yield an error.
   */
  getRulesForSeller(sellerId: string, options?: LookupOptions): Promise<Result<ShippingRule[]>>;
}

/** Platform-wide default rules, consulted when a seller has no match */
export interface PlatformRuleSource {
  getPlatformRules(options?: LookupOptions): Promise<Result<ShippingRule[]>>;
}
