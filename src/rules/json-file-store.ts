/**
 * File-backed rule store: one JSON array of rules per seller under `<dir>/sellers/`,
 * platform defaults in `<dir>/platform.json`.
 */

import { readFile } from "node:fs/promises";
import { createHash } from "node:crypto";
import path from "node:path";
import type { ShippingRule } from "../domain/types.js";
import {
  cancelledError,
  malformedRulesError,
  storeUnavailableError,
  type Result,
} from "../domain/errors.js";
import { formatZodError, storedRuleSchema } from "../domain/validation.js";
import { silentLogger, type Logger } from "../logger.js";
import type { LookupOptions, PlatformRuleSource, RuleStore } from "./types.js";

const SELLERS_DIR = "sellers";
const PLATFORM_FILE = "platform.json";
const PLATFORM_OWNER = "";
const MAX_FILENAME_LENGTH = 80;
const HASH_LENGTH = 16;

export interface JsonFileRuleStoreConfig {
  rootDir: string;
  logger?: Logger;
}

/**
 * File-safe name for a seller id: letters, digits, `-` and `_` kept, everything else
 * becomes `-`, outer dashes trimmed. Empty or over-long results fall back to a hash.
 */
export function sellerFileName(sellerId: string): string {
  const input = sellerId.trim();
  const safe = input.replace(/[^\p{L}\p{N}_-]/gu, "-").replace(/^-+|-+$/g, "");
  if (safe === "" || safe.length > MAX_FILENAME_LENGTH) {
    return createHash("sha256").update(input, "utf8").digest("hex").slice(0, HASH_LENGTH);
  }
  return safe;
}

export class JsonFileRuleStore implements RuleStore, PlatformRuleSource {
  private readonly rootDir: string;
  private readonly logger: Logger;

  constructor(config: JsonFileRuleStoreConfig) {
    this.rootDir = config.rootDir;
    this.logger = config.logger ?? silentLogger;
  }

  filePathFor(sellerId: string): string {
    return path.join(this.rootDir, SELLERS_DIR, `${sellerFileName(sellerId)}.json`);
  }

  getRulesForSeller(sellerId: string, options: LookupOptions = {}): Promise<Result<ShippingRule[]>> {
    return this.readRules(this.filePathFor(sellerId), sellerId, options);
  }

  getPlatformRules(options: LookupOptions = {}): Promise<Result<ShippingRule[]>> {
    return this.readRules(path.join(this.rootDir, PLATFORM_FILE), PLATFORM_OWNER, options);
  }

  private async readRules(
    filePath: string,
    owner: string,
    options: LookupOptions
  ): Promise<Result<ShippingRule[]>> {
    let text: string;
    try {
      text = await readFile(filePath, { encoding: "utf8", signal: options.signal });
    } catch (err) {
      if (hasCode(err, "ENOENT")) {
        this.logger.debug("No rule file, treating as empty", { filePath });
        return { ok: true, value: [] };
      }
      if (err instanceof Error && err.name === "AbortError") {
        return { ok: false, error: cancelledError() };
      }
      return {
        ok: false,
        error: storeUnavailableError(owner, `Could not read rules from ${filePath}`, err),
      };
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (err) {
      return { ok: false, error: malformedRulesError(owner, `Malformed JSON in ${filePath}`, err) };
    }
    if (!Array.isArray(data)) {
      return { ok: false, error: malformedRulesError(owner, `Expected an array of rules in ${filePath}`) };
    }

    const rules: ShippingRule[] = [];
    data.forEach((entry: unknown, index) => {
      const parsed = storedRuleSchema.safeParse(entry);
      if (parsed.success) {
        rules.push({ ...parsed.data, sellerId: owner });
      } else {
        this.logger.warn("Dropping invalid shipping rule", {
          filePath,
          index,
          reason: formatZodError(parsed.error),
        });
      }
    });
    this.logger.debug("Rules loaded", { filePath, total: data.length, valid: rules.length });
    return { ok: true, value: rules };
  }
}

function hasCode(err: unknown, code: string): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === code;
}
