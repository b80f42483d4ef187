/**
 * Configuration loaded from environment variables.
 * Every environment-specific value lives here, never in business logic.
 */

import { z } from "zod";
import { LOG_LEVELS } from "./logger.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .default("false")
  .transform((v) => v === "true" || v === "1" || v === "yes");

const configSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  /** Root of the file rule store (`sellers/*.json`, `platform.json`) */
  RULES_DIR: z.string().min(1).default("./data"),
  /** 0 disables the rule cache */
  RULE_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(30_000),
  RULE_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  RULE_FETCH_CONCURRENCY: z.coerce.number().int().positive().default(4),
  SELLER_FAILURE_POLICY: z.enum(["fail", "isolate"]).default("fail"),
  LOCATION_FOLD_ACCENTS: booleanFlag,
  PLATFORM_FALLBACK: booleanFlag,
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Load and validate config from process.env; throws ZodError on invalid values.
 * Empty strings count as unset so defaults apply. Enum values are case-insensitive.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(configSchema.shape)) {
    const value = env[key]?.trim();
    if (value === undefined || value === "") continue;
    raw[key] = key === "RULES_DIR" ? value : value.toLowerCase();
  }
  return configSchema.parse(raw);
}
