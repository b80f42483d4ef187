/**
 * Bounds every lookup of a rule source by a timeout; the inner lookup is aborted when it fires.
 */

import type { ShippingRule } from "../domain/types.js";
import {
  platformTimeoutError,
  storeTimeoutError,
  type Result,
  type ShippingEstimateError,
} from "../domain/errors.js";
import type { LookupOptions, PlatformRuleSource, RuleStore } from "./types.js";

async function raceTimeout(
  run: (signal: AbortSignal) => Promise<Result<ShippingRule[]>>,
  timeoutMs: number,
  onTimeout: () => ShippingEstimateError,
  callerSignal?: AbortSignal
): Promise<Result<ShippingRule[]>> {
  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort();
  callerSignal?.addEventListener("abort", forwardAbort, { once: true });
  if (callerSignal?.aborted) controller.abort();

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timedOut = new Promise<Result<ShippingRule[]>>((resolve) => {
    timeoutId = setTimeout(() => {
      resolve({ ok: false, error: onTimeout() });
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), timedOut]);
  } finally {
    clearTimeout(timeoutId);
    callerSignal?.removeEventListener("abort", forwardAbort);
  }
}

export function withLookupTimeout(inner: RuleStore, timeoutMs: number): RuleStore {
  return {
    getRulesForSeller(sellerId: string, options: LookupOptions = {}) {
      return raceTimeout(
        (signal) => inner.getRulesForSeller(sellerId, { signal }),
        timeoutMs,
        () => storeTimeoutError(sellerId, timeoutMs),
        options.signal
      );
    },
  };
}

export function withPlatformTimeout(inner: PlatformRuleSource, timeoutMs: number): PlatformRuleSource {
  return {
    getPlatformRules(options: LookupOptions = {}) {
      return raceTimeout(
        (signal) => inner.getPlatformRules({ signal }),
        timeoutMs,
        () => platformTimeoutError(timeoutMs),
        options.signal
      );
    },
  };
}
