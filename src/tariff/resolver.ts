/**
 * Tariff resolution for one seller and one destination.
 *
 * Specificity order, first match wins (matches are never summed):
 *   1. active rule for the buyer's province and city
 *   2. active province-wide rule (blank city)
 *   3. the same two steps over platform fallback rules, when supplied
 *   4. no match: price 0
 *
 * Nothing here throws; missing data degrades to a zero tariff.
 */

import type { MatchLevel, RuleSource, ShippingRule } from "../domain/types.js";
import { isBlank, normalizeLocation } from "../location/normalize.js";
import { silentLogger, type Logger } from "../logger.js";

export interface ResolveOptions {
  foldAccents?: boolean;
  /** Platform-wide rules tried after the seller's own rules */
  fallbackRules?: readonly ShippingRule[];
  logger?: Logger;
}

export interface TariffResolution {
  price: number;
  matchLevel: MatchLevel;
  source: RuleSource;
  /** Rule that produced the price */
  rule?: ShippingRule;
}

export interface TariffTrace {
  resolution: TariffResolution;
  provinceKey: string;
  cityKey: string;
  steps: string[];
}

const NO_MATCH: TariffResolution = { price: 0, matchLevel: "none", source: "none" };

interface RuleMatch {
  rule: ShippingRule;
  level: Exclude<MatchLevel, "none">;
  /** Other active rules that matched at the same level */
  duplicates: number;
}

function firstAndCount(
  rules: readonly ShippingRule[],
  predicate: (rule: ShippingRule) => boolean
): { rule: ShippingRule; duplicates: number } | undefined {
  let first: ShippingRule | undefined;
  let count = 0;
  for (const rule of rules) {
    if (!predicate(rule)) continue;
    first ??= rule;
    count++;
  }
  return first ? { rule: first, duplicates: count - 1 } : undefined;
}

/** Match one rule set against already-normalized keys */
export function matchRule(
  rules: readonly ShippingRule[],
  provinceKey: string,
  cityKey: string,
  foldAccents = false
): RuleMatch | undefined {
  if (provinceKey === "") return undefined;
  const key = (s: string | null | undefined) => normalizeLocation(s, { foldAccents });
  const candidates = rules.filter((r) => r.active && key(r.province) === provinceKey);

  if (cityKey !== "") {
    const byCity = firstAndCount(
      candidates,
      (r) => !isBlank(r.city) && key(r.city) === cityKey
    );
    if (byCity) return { ...byCity, level: "city" };
  }

  const byProvince = firstAndCount(candidates, (r) => isBlank(r.city));
  if (byProvince) return { ...byProvince, level: "province" };
  return undefined;
}

export function resolveTariffDetailed(
  rules: readonly ShippingRule[],
  province: string | null | undefined,
  city: string | null | undefined,
  options: ResolveOptions = {}
): TariffResolution {
  return traceTariffResolution(rules, province, city, options).resolution;
}

/** Shipping charge for the destination; 0 when no rule applies */
export function resolveTariff(
  rules: readonly ShippingRule[],
  province: string | null | undefined,
  city: string | null | undefined,
  options: ResolveOptions = {}
): number {
  return resolveTariffDetailed(rules, province, city, options).price;
}

/**
 * Resolve and record each step taken, for support tooling.
 */
export function traceTariffResolution(
  rules: readonly ShippingRule[],
  province: string | null | undefined,
  city: string | null | undefined,
  options: ResolveOptions = {}
): TariffTrace {
  const logger = options.logger ?? silentLogger;
  const foldAccents = options.foldAccents ?? false;
  const provinceKey = normalizeLocation(province, { foldAccents });
  const cityKey = normalizeLocation(city, { foldAccents });
  const steps: string[] = [];
  const done = (resolution: TariffResolution): TariffTrace => ({
    resolution,
    provinceKey,
    cityKey,
    steps,
  });

  if (provinceKey === "") {
    steps.push("no province given; no rule can apply");
    return done(NO_MATCH);
  }
  steps.push(`destination normalized to "${provinceKey}" / "${cityKey}"`);

  const sources: Array<[Exclude<RuleSource, "none">, readonly ShippingRule[]]> = [
    ["seller", rules],
  ];
  if (options.fallbackRules) sources.push(["platform", options.fallbackRules]);

  for (const [source, list] of sources) {
    const active = list.filter((r) => r.active).length;
    steps.push(`${source} rules: ${list.length} total, ${active} active`);
    const match = matchRule(list, provinceKey, cityKey, foldAccents);
    if (!match) {
      steps.push(`no ${source} rule for this destination`);
      continue;
    }
    if (match.duplicates > 0) {
      logger.warn("Duplicate shipping rules for destination; using the first", {
        sellerId: match.rule.sellerId,
        source,
        level: match.level,
        province: provinceKey,
        city: cityKey,
        duplicates: match.duplicates,
      });
      steps.push(`${match.duplicates} duplicate ${match.level} rule(s) ignored`);
    }
    steps.push(`matched ${source} ${match.level} rule: ${match.rule.price}`);
    return done({
      price: match.rule.price,
      matchLevel: match.level,
      source,
      rule: match.rule,
    });
  }

  steps.push("no rule matched; tariff is 0");
  return done(NO_MATCH);
}
