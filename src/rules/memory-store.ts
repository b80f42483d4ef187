/**
 * In-process rule store: stands in for the relational store in tests and the demo.
 * Records lookups and can be told to fail or delay a given seller. A delayed lookup
 * whose signal aborts returns CANCELLED, as the file store does.
 */

import type { ShippingRule } from "../domain/types.js";
import { cancelledError, storeUnavailableError, type Result } from "../domain/errors.js";
import type { LookupOptions, PlatformRuleSource, RuleStore } from "./types.js";

export type SellerBehavior =
  | { kind: "fail"; message?: string }
  | { kind: "delay"; ms: number };

export class InMemoryRuleStore implements RuleStore, PlatformRuleSource {
  private rules = new Map<string, ShippingRule[]>();
  private platformRules: ShippingRule[] = [];
  private behaviors = new Map<string, SellerBehavior>();
  private lookups: string[] = [];
  private cancelledLookups: string[] = [];

  constructor(rules: ShippingRule[] = []) {
    this.addRules(rules);
  }

  /** Append rules, keeping per-seller insertion order */
  addRules(rules: ShippingRule[]): void {
    for (const rule of rules) {
      const list = this.rules.get(rule.sellerId) ?? [];
      list.push({ ...rule });
      this.rules.set(rule.sellerId, list);
    }
  }

  setPlatformRules(rules: ShippingRule[]): void {
    this.platformRules = rules.map((r) => ({ ...r }));
  }

  /** Make lookups for `sellerId` fail or take `ms` milliseconds */
  setBehavior(sellerId: string, behavior: SellerBehavior): void {
    this.behaviors.set(sellerId, behavior);
  }

  /** Seller ids looked up so far, in call order */
  getRecordedLookups(): string[] {
    return [...this.lookups];
  }

  /** Seller ids whose delayed lookup was aborted before it finished */
  getCancelledLookups(): string[] {
    return [...this.cancelledLookups];
  }

  /** Clear rules, behaviors and recorded lookups */
  reset(): void {
    this.rules.clear();
    this.behaviors.clear();
    this.platformRules = [];
    this.lookups = [];
    this.cancelledLookups = [];
  }

  async getRulesForSeller(
    sellerId: string,
    options: LookupOptions = {}
  ): Promise<Result<ShippingRule[]>> {
    this.lookups.push(sellerId);
    const behavior = this.behaviors.get(sellerId);
    if (behavior?.kind === "fail") {
      return {
        ok: false,
        error: storeUnavailableError(
          sellerId,
          behavior.message ?? `Rule store unavailable for seller ${sellerId}`
        ),
      };
    }
    if (behavior?.kind === "delay") {
      await sleep(behavior.ms, options.signal);
      if (options.signal?.aborted) {
        this.cancelledLookups.push(sellerId);
        return { ok: false, error: cancelledError() };
      }
    }
    const list = this.rules.get(sellerId) ?? [];
    return { ok: true, value: list.map((r) => ({ ...r })) };
  }

  async getPlatformRules(): Promise<Result<ShippingRule[]>> {
    return { ok: true, value: this.platformRules.map((r) => ({ ...r })) };
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    }
    signal?.addEventListener("abort", done, { once: true });
  });
}
