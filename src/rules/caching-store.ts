/**
 * Caching decorators for rule sources: TTL cache with a single in-flight lookup per key.
 * Concurrent callers await the same lookup, which runs without any caller's signal; an
 * aborted caller stops waiting but the lookup carries on for the others.
 * Failures are not cached.
 */

import type { ShippingRule } from "../domain/types.js";
import { cancelledError, type Result } from "../domain/errors.js";
import type { LookupOptions, PlatformRuleSource, RuleStore } from "./types.js";

export interface CachingRuleStoreConfig {
  ttlMs: number;
  /** Clock override for tests */
  now?: () => number;
}

interface CachedRules {
  rules: ShippingRule[];
  expiresAtMs: number;
}

type RulesLookup = Result<ShippingRule[]>;

function copyRules(rules: ShippingRule[]): ShippingRule[] {
  return rules.map((r) => ({ ...r }));
}

/** Resolves with CANCELLED as soon as `signal` aborts, otherwise with the shared result */
function waitUnlessAborted(shared: Promise<RulesLookup>, signal?: AbortSignal): Promise<RulesLookup> {
  if (!signal) return shared;
  return new Promise((resolve, reject) => {
    const onAbort = (): void => resolve({ ok: false, error: cancelledError() });
    signal.addEventListener("abort", onAbort, { once: true });
    shared.then(
      (result) => {
        signal.removeEventListener("abort", onAbort);
        resolve(result);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
  });
}

class SharedLookupCache {
  private readonly cache = new Map<string, CachedRules>();
  private readonly inFlight = new Map<string, Promise<RulesLookup>>();
  private readonly now: () => number;

  constructor(private readonly config: CachingRuleStoreConfig) {
    this.now = config.now ?? Date.now;
  }

  async get(key: string, load: () => Promise<RulesLookup>, signal?: AbortSignal): Promise<RulesLookup> {
    if (signal?.aborted) return { ok: false, error: cancelledError() };
    const cached = this.cache.get(key);
    if (cached && this.now() < cached.expiresAtMs) {
      return { ok: true, value: copyRules(cached.rules) };
    }
    let shared = this.inFlight.get(key);
    if (!shared) {
      shared = this.fill(key, load);
      this.inFlight.set(key, shared);
    }
    const result = await waitUnlessAborted(shared, signal);
    return result.ok ? { ok: true, value: copyRules(result.value) } : result;
  }

  invalidate(key?: string): void {
    if (key === undefined) {
      this.cache.clear();
    } else {
      this.cache.delete(key);
    }
  }

  private async fill(key: string, load: () => Promise<RulesLookup>): Promise<RulesLookup> {
    try {
      const result = await load();
      if (result.ok) {
        this.cache.set(key, {
          rules: copyRules(result.value),
          expiresAtMs: this.now() + this.config.ttlMs,
        });
      }
      return result;
    } finally {
      this.inFlight.delete(key);
    }
  }
}

export class CachingRuleStore implements RuleStore {
  private readonly entries: SharedLookupCache;

  constructor(
    private readonly inner: RuleStore,
    config: CachingRuleStoreConfig
  ) {
    this.entries = new SharedLookupCache(config);
  }

  getRulesForSeller(sellerId: string, options: LookupOptions = {}): Promise<RulesLookup> {
    return this.entries.get(sellerId, () => this.inner.getRulesForSeller(sellerId), options.signal);
  }

  /** Drop the cached rules for one seller (e.g. after the seller edits them), or all */
  invalidate(sellerId?: string): void {
    this.entries.invalidate(sellerId);
  }
}

const PLATFORM_KEY = "platform";

export class CachingPlatformRules implements PlatformRuleSource {
  private readonly entries: SharedLookupCache;

  constructor(
    private readonly inner: PlatformRuleSource,
    config: CachingRuleStoreConfig
  ) {
    this.entries = new SharedLookupCache(config);
  }

  getPlatformRules(options: LookupOptions = {}): Promise<RulesLookup> {
    return this.entries.get(PLATFORM_KEY, () => this.inner.getPlatformRules(), options.signal);
  }

  invalidate(): void {
    this.entries.invalidate();
  }
}
