/**
 * Integration tests: ShippingEstimator with the in-memory rule store.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { MISSING_PROVINCE_WARNING, ShippingEstimator } from "./shipping-estimator.js";
import { InMemoryRuleStore } from "../rules/memory-store.js";
import { CachingRuleStore } from "../rules/caching-store.js";
import { withLookupTimeout } from "../rules/timeout.js";
import { ShippingEstimateError } from "../domain/errors.js";
import type { BuyerLocation, CartLineItem, ShippingRule } from "../domain/types.js";

function rule(sellerId: string, province: string, city: string, price: number, active = true): ShippingRule {
  return { sellerId, province, city, price, active };
}

function line(sellerId: string, quantity: number, productId = "p1"): CartLineItem {
  return { productId, quantity, unitPrice: 20, sellerId };
}

const quitoBuyer: BuyerLocation = { province: "Pichincha", city: "Quito" };

describe("ShippingEstimator", () => {
  let store: InMemoryRuleStore;
  let estimator: ShippingEstimator;

  beforeEach(() => {
    store = new InMemoryRuleStore([
      rule("A", "Pichincha", "Quito", 5),
      rule("A", "Pichincha", "", 3),
    ]);
    estimator = new ShippingEstimator({ ruleStore: store });
  });

  it("charges the city rate for a buyer in Quito", async () => {
    const result = await estimator.estimate([line("A", 2)], quitoBuyer);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.total).toBe(5);
      expect(result.value.breakdown).toEqual([
        {
          sellerId: "A",
          province: "Pichincha",
          city: "Quito",
          price: 5,
          itemCount: 2,
          matchLevel: "city",
          source: "seller",
        },
      ]);
      expect(result.value.warning).toBeUndefined();
      expect(result.value.notices).toEqual([]);
    }
  });

  it("charges the province rate for another city in the province", async () => {
    const result = await estimator.estimate([line("A", 2)], { province: "Pichincha", city: "Guayaquil" });
    expect(result.ok && result.value.breakdown[0].price).toBe(3);
    expect(result.ok && result.value.total).toBe(3);
  });

  it("charges nothing outside the seller's provinces and adds a notice", async () => {
    const result = await estimator.estimate([line("A", 2)], { province: "Guayas", city: "Guayaquil" });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.total).toBe(0);
      expect(result.value.breakdown[0]).toMatchObject({ price: 0, matchLevel: "none", source: "none" });
      expect(result.value.notices).toEqual([
        "Seller A has no shipping rate configured for Guayas / Guayaquil.",
      ]);
    }
  });

  it("returns a warning and skips lookups when the buyer has no province", async () => {
    const result = await estimator.estimate([line("A", 2)], { province: "  ", city: "Quito" });
    expect(result).toEqual({
      ok: true,
      value: { total: 0, breakdown: [], warning: MISSING_PROVINCE_WARNING, notices: [] },
    });
    expect(store.getRecordedLookups()).toEqual([]);
  });

  it("returns an empty estimate without a warning for an empty cart", async () => {
    const result = await estimator.estimate([], quitoBuyer);
    expect(result).toEqual({ ok: true, value: { total: 0, breakdown: [], notices: [] } });
    expect(store.getRecordedLookups()).toEqual([]);
  });

  it("charges once per seller, sums the total and keeps first-encounter order", async () => {
    store.addRules([rule("B", "pichincha", "", 4.5), rule("C", "PICHINCHA", "quito", 2.25)]);
    const cart = [line("B", 1), line("A", 2), line("B", 3), line("C", 1), line("A", 1)];
    const result = await estimator.estimate(cart, quitoBuyer);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.breakdown.map((e) => [e.sellerId, e.price, e.itemCount])).toEqual([
        ["B", 4.5, 4],
        ["A", 5, 3],
        ["C", 2.25, 1],
      ]);
      expect(result.value.total).toBe(11.75);
      expect(store.getRecordedLookups().sort()).toEqual(["A", "B", "C"]);
    }
  });

  it("conserves the item count across the breakdown", async () => {
    const cart = [line("A", 2), line("Z", 5), line("A", 4)];
    const result = await estimator.estimate(cart, quitoBuyer);
    expect(result.ok).toBe(true);
    if (result.ok) {
      const counted = result.value.breakdown.reduce((s, e) => s + e.itemCount, 0);
      expect(counted).toBe(11);
    }
  });

  it("resolves blank seller ids to zero without a store lookup", async () => {
    const result = await estimator.estimate([line("", 2), line("A", 1)], quitoBuyer);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.breakdown[0]).toMatchObject({ sellerId: "", price: 0, itemCount: 2 });
      expect(result.value.total).toBe(5);
      expect(result.value.notices).toEqual(["Cart lines without a seller ship at no charge."]);
    }
    expect(store.getRecordedLookups()).toEqual(["A"]);
  });

  it("rounds the total to cents", async () => {
    store.addRules([rule("B", "Pichincha", "", 0.1), rule("C", "Pichincha", "", 0.2)]);
    const result = await estimator.estimate([line("B", 1), line("C", 1)], quitoBuyer);
    expect(result.ok && result.value.total).toBe(0.3);
  });

  describe("failure policy", () => {
    it("fails the whole request by default", async () => {
      store.setBehavior("B", { kind: "fail", message: "connection refused" });
      const result = await estimator.estimate([line("A", 1), line("B", 1)], quitoBuyer);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ShippingEstimateError);
        expect(result.error.code).toBe("RULE_STORE_UNAVAILABLE");
        expect(result.error.sellerId).toBe("B");
        expect(result.error.message).toBe("connection refused");
      }
    });

    it("isolates a failing seller when configured to", async () => {
      store.setBehavior("B", { kind: "fail" });
      const isolating = new ShippingEstimator({ ruleStore: store, failurePolicy: "isolate" });
      const result = await isolating.estimate([line("A", 1), line("B", 2)], quitoBuyer);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.total).toBe(5);
        expect(result.value.breakdown[1]).toMatchObject({
          sellerId: "B",
          price: 0,
          itemCount: 2,
          failed: true,
        });
        expect(result.value.warning).toBe("Shipping rates could not be loaded for sellers: B.");
      }
    });

    it("aborts lookups still pending after the first failure", async () => {
      store.addRules([rule("C", "Pichincha", "", 2)]);
      store.setBehavior("B", { kind: "fail", message: "connection refused" });
      store.setBehavior("C", { kind: "delay", ms: 1_000 });
      const startedAt = Date.now();
      const result = await estimator.estimate([line("B", 1), line("C", 1)], quitoBuyer);
      expect(Date.now() - startedAt).toBeLessThan(500);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.sellerId).toBe("B");
      expect(store.getCancelledLookups()).toEqual(["C"]);
    });

    it("lets pending lookups finish when isolating a failure", async () => {
      store.addRules([rule("C", "Pichincha", "", 2)]);
      store.setBehavior("B", { kind: "fail" });
      store.setBehavior("C", { kind: "delay", ms: 30 });
      const isolating = new ShippingEstimator({ ruleStore: store, failurePolicy: "isolate" });
      const result = await isolating.estimate([line("B", 1), line("C", 1)], quitoBuyer);
      expect(store.getCancelledLookups()).toEqual([]);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.breakdown[1]).toMatchObject({ sellerId: "C", price: 2, matchLevel: "province" });
        expect(result.value.total).toBe(2);
      }
    });
  });

  describe("cancellation", () => {
    it("returns CANCELLED for an already aborted signal", async () => {
      const controller = new AbortController();
      controller.abort();
      const result = await estimator.estimate([line("A", 1)], quitoBuyer, { signal: controller.signal });
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("CANCELLED");
      expect(store.getRecordedLookups()).toEqual([]);
    });

    it("returns no partial breakdown when aborted mid-flight", async () => {
      store.addRules([rule("B", "Pichincha", "", 4)]);
      store.setBehavior("B", { kind: "delay", ms: 1_000 });
      const controller = new AbortController();
      const pending = estimator.estimate([line("A", 1), line("B", 1)], quitoBuyer, {
        signal: controller.signal,
      });
      setTimeout(() => controller.abort(), 10);
      const result = await pending;
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("CANCELLED");
    });

    it("does not cancel a concurrent estimate that shares a cached lookup", async () => {
      store.setBehavior("A", { kind: "delay", ms: 50 });
      const shared = new ShippingEstimator({
        ruleStore: new CachingRuleStore(withLookupTimeout(store, 1_000), { ttlMs: 60_000 }),
      });
      const controller = new AbortController();
      const abandoned = shared.estimate([line("A", 1)], quitoBuyer, { signal: controller.signal });
      const kept = shared.estimate([line("A", 3)], quitoBuyer);
      setTimeout(() => controller.abort(), 10);

      const [first, second] = await Promise.all([abandoned, kept]);
      expect(first.ok).toBe(false);
      if (!first.ok) expect(first.error.code).toBe("CANCELLED");
      expect(second.ok).toBe(true);
      if (second.ok) {
        expect(second.value.total).toBe(5);
        expect(second.value.breakdown[0]).toMatchObject({ sellerId: "A", itemCount: 3, matchLevel: "city" });
      }
      expect(store.getRecordedLookups()).toEqual(["A"]);
      expect(store.getCancelledLookups()).toEqual([]);
    });
  });

  describe("platform fallback", () => {
    it("uses platform rules only when the seller has no match", async () => {
      store.setPlatformRules([rule("", "Guayas", "", 7)]);
      const withFallback = new ShippingEstimator({ ruleStore: store, platformRules: store });
      const result = await withFallback.estimate([line("A", 1)], { province: "Guayas", city: "Daule" });
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.breakdown[0]).toMatchObject({ price: 7, matchLevel: "province", source: "platform" });
        expect(result.value.notices).toEqual([]);
      }
    });
  });

  describe("accent folding", () => {
    it("matches accented rule names when enabled", async () => {
      store.addRules([rule("M", "Manabí", "", 6)]);
      const folding = new ShippingEstimator({ ruleStore: store, foldAccents: true });
      const plain = await estimator.estimate([line("M", 1)], { province: "Manabi" });
      const folded = await folding.estimate([line("M", 1)], { province: "Manabi" });
      expect(plain.ok && plain.value.total).toBe(0);
      expect(folded.ok && folded.value.total).toBe(6);
    });
  });

  describe("explain", () => {
    it("traces the resolution for one seller", async () => {
      const result = await estimator.explain("A", { province: "Pichincha", city: "Cayambe" });
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.resolution).toMatchObject({ price: 3, matchLevel: "province" });
        expect(result.value.steps).toEqual([
          'destination normalized to "pichincha" / "cayambe"',
          "seller rules: 2 total, 2 active",
          "matched seller province rule: 3",
        ]);
      }
    });

    it("rejects a blank seller id", async () => {
      const result = await estimator.explain(" ", quitoBuyer);
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe("VALIDATION_ERROR");
    });
  });
});
