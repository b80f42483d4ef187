/**
 * Shipping estimator: groups the cart by seller, loads each seller's rules through the
 * rule store, resolves one tariff per seller and assembles the breakdown.
 * Holds no request state; one instance serves concurrent requests.
 */

import type {
  BuyerLocation,
  CartLineItem,
  SellerShippingEstimate,
  ShippingEstimateResult,
  ShippingRule,
} from "../domain/types.js";
import {
  cancelledError,
  validationError,
  type Result,
  type ShippingEstimateError,
} from "../domain/errors.js";
import { isBlank } from "../location/normalize.js";
import { groupBySeller } from "../cart/aggregate.js";
import {
  resolveTariffDetailed,
  traceTariffResolution,
  type TariffResolution,
  type TariffTrace,
} from "../tariff/resolver.js";
import type { LookupOptions, PlatformRuleSource, RuleStore } from "../rules/types.js";
import { mapLimit } from "../util/map-limit.js";
import { silentLogger, type Logger } from "../logger.js";

export const MISSING_PROVINCE_WARNING =
  "The buyer has no province configured on their profile.";

/** What to do when one seller's rules cannot be loaded */
export type SellerFailurePolicy = "fail" | "isolate";

export interface ShippingEstimatorConfig {
  ruleStore: RuleStore;
  /** Platform-wide defaults tried when a seller has no matching rule */
  platformRules?: PlatformRuleSource;
  failurePolicy?: SellerFailurePolicy;
  /** Maximum concurrent seller lookups per estimate (default 4) */
  concurrency?: number;
  foldAccents?: boolean;
  logger?: Logger;
}

export interface EstimateOptions {
  signal?: AbortSignal;
  /** Request-scoped logger (e.g. carrying a requestId) */
  logger?: Logger;
}

type SellerLookup = Result<ShippingRule[]>;

const DEFAULT_CONCURRENCY = 4;

export class ShippingEstimator {
  private readonly failurePolicy: SellerFailurePolicy;
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(private readonly config: ShippingEstimatorConfig) {
    this.failurePolicy = config.failurePolicy ?? "fail";
    this.concurrency = config.concurrency ?? DEFAULT_CONCURRENCY;
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * Estimate shipping for a cart snapshot and buyer location.
   * Missing province, empty cart and unmatched sellers are not errors; only rule store
   * failures (under the "fail" policy) and cancellation are.
   */
  async estimate(
    cart: readonly CartLineItem[],
    buyer: BuyerLocation,
    options: EstimateOptions = {}
  ): Promise<Result<ShippingEstimateResult>> {
    const log = options.logger ?? this.logger;
    if (options.signal?.aborted) return { ok: false, error: cancelledError() };

    if (isBlank(buyer.province)) {
      log.info("Buyer has no province; skipping shipping resolution");
      return {
        ok: true,
        value: { total: 0, breakdown: [], warning: MISSING_PROVINCE_WARNING, notices: [] },
      };
    }
    if (cart.length === 0) {
      return { ok: true, value: { total: 0, breakdown: [], notices: [] } };
    }

    const province = buyer.province ?? "";
    const city = buyer.city ?? "";
    const groups = [...groupBySeller(cart).entries()];

    // Internal controller: aborts outstanding lookups on caller cancellation or,
    // under the "fail" policy, on the first seller failure.
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    options.signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      const failure: { first?: ShippingEstimateError } = {};
      const lookupOptions: LookupOptions = { signal: controller.signal };

      const platform = await this.loadPlatformRules(lookupOptions, log);
      if (!platform.ok && this.failurePolicy === "fail") {
        return { ok: false, error: platform.error };
      }
      const fallbackRules = platform.ok ? platform.value : undefined;

      const { results } = await mapLimit(
        groups,
        this.concurrency,
        async ([sellerId]): Promise<SellerLookup> => {
          const result = await this.loadSellerRules(sellerId, lookupOptions, log);
          if (!result.ok && this.failurePolicy === "fail" && failure.first === undefined) {
            failure.first = result.error;
            controller.abort();
          }
          return result;
        },
        controller.signal
      );

      if (options.signal?.aborted) {
        log.info("Shipping estimate cancelled");
        return { ok: false, error: cancelledError() };
      }
      if (failure.first) {
        log.error("Shipping estimate failed", { sellerId: failure.first.sellerId, error: failure.first });
        return { ok: false, error: failure.first };
      }

      const breakdown: SellerShippingEstimate[] = [];
      const notices: string[] = [];
      const failedSellers: string[] = [];
      if (!platform.ok) notices.push("Platform default shipping rates could not be loaded.");

      groups.forEach(([sellerId, itemCount], index) => {
        const lookup = results[index];
        const base = { sellerId, province, city, itemCount };
        if (!lookup || !lookup.ok) {
          failedSellers.push(sellerId);
          breakdown.push({ ...base, price: 0, matchLevel: "none", source: "none", failed: true });
          return;
        }
        const resolution = this.resolve(sellerId, lookup.value, province, city, fallbackRules, log);
        if (resolution.matchLevel === "none") {
          notices.push(noRateNotice(sellerId, province, city));
        }
        breakdown.push({
          ...base,
          price: resolution.price,
          matchLevel: resolution.matchLevel,
          source: resolution.source,
        });
      });

      const total = roundMoney(breakdown.reduce((sum, e) => sum + e.price, 0));
      const value: ShippingEstimateResult = { total, breakdown, notices };
      if (failedSellers.length > 0) {
        value.warning = `Shipping rates could not be loaded for sellers: ${failedSellers.join(", ")}.`;
      }
      log.info("Shipping estimated", { sellers: breakdown.length, total, failed: failedSellers.length });
      return { ok: true, value };
    } finally {
      options.signal?.removeEventListener("abort", forwardAbort);
    }
  }

  /**
   * Resolution path for one seller and buyer, step by step. Used by support tooling.
   */
  async explain(
    sellerId: string,
    buyer: BuyerLocation,
    options: EstimateOptions = {}
  ): Promise<Result<TariffTrace>> {
    const log = options.logger ?? this.logger;
    if (isBlank(sellerId)) {
      return { ok: false, error: validationError("sellerId is required") };
    }
    const lookupOptions: LookupOptions = { signal: options.signal };
    const rules = await this.loadSellerRules(sellerId, lookupOptions, log);
    if (!rules.ok) return rules;
    const platform = await this.loadPlatformRules(lookupOptions, log);
    if (!platform.ok) return platform;
    if (options.signal?.aborted) return { ok: false, error: cancelledError() };
    return {
      ok: true,
      value: traceTariffResolution(rules.value, buyer.province, buyer.city, {
        foldAccents: this.config.foldAccents,
        fallbackRules: platform.value,
        logger: log.child({ sellerId }),
      }),
    };
  }

  private async loadSellerRules(
    sellerId: string,
    options: LookupOptions,
    log: Logger
  ): Promise<SellerLookup> {
    // A blank seller id owns no rules; its lines ship at no charge.
    if (isBlank(sellerId)) return { ok: true, value: [] };
    const result = await this.config.ruleStore.getRulesForSeller(sellerId, options);
    if (result.ok) {
      const active = result.value.filter((r) => r.active).length;
      log.debug("Seller rules loaded", { sellerId, total: result.value.length, active });
      if (result.value.length > 0 && active === 0) {
        log.warn("All shipping rules are inactive", { sellerId, total: result.value.length });
      }
    } else {
      log.warn("Seller rules unavailable", { sellerId, code: result.error.code, message: result.error.message });
    }
    return result;
  }

  /** undefined value when no platform source is configured */
  private async loadPlatformRules(
    options: LookupOptions,
    log: Logger
  ): Promise<Result<ShippingRule[] | undefined>> {
    if (!this.config.platformRules) return { ok: true, value: undefined };
    const result = await this.config.platformRules.getPlatformRules(options);
    if (!result.ok) {
      log.warn("Platform rules unavailable", { code: result.error.code, message: result.error.message });
    }
    return result;
  }

  private resolve(
    sellerId: string,
    rules: ShippingRule[],
    province: string,
    city: string,
    fallbackRules: ShippingRule[] | undefined,
    log: Logger
  ): TariffResolution {
    const sellerLog = log.child({ sellerId });
    const resolution = resolveTariffDetailed(rules, province, city, {
      foldAccents: this.config.foldAccents,
      fallbackRules,
      logger: sellerLog,
    });
    if (resolution.matchLevel === "none") {
      sellerLog.info("No shipping rate for destination", { province, city });
    } else {
      sellerLog.debug("Shipping rate resolved", {
        price: resolution.price,
        level: resolution.matchLevel,
        source: resolution.source,
      });
    }
    return resolution;
  }
}

function noRateNotice(sellerId: string, province: string, city: string): string {
  if (isBlank(sellerId)) return "Cart lines without a seller ship at no charge.";
  const destination = isBlank(city) ? province : `${province} / ${city}`;
  return `Seller ${sellerId} has no shipping rate configured for ${destination}.`;
}

function roundMoney(amount: number): number {
  return Math.round(amount * 100) / 100;
}
