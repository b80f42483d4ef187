/**
 * Integration tests: file rule store over a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { JsonFileRuleStore, sellerFileName } from "./json-file-store.js";
import { createLogger } from "../logger.js";

describe("sellerFileName", () => {
  it("keeps safe ids as they are", () => {
    expect(sellerFileName("seller_42-ec")).toBe("seller_42-ec");
  });

  it("replaces unsafe characters and trims outer dashes", () => {
    expect(sellerFileName(" ../tienda de Ana/ ")).toBe("tienda-de-Ana");
    expect(sellerFileName("a@b.com")).toBe("a-b-com");
  });

  it("hashes ids that sanitize to nothing or are too long", () => {
    expect(sellerFileName("///")).toMatch(/^[0-9a-f]{16}$/);
    expect(sellerFileName("x".repeat(81))).toMatch(/^[0-9a-f]{16}$/);
    expect(sellerFileName("///")).not.toBe(sellerFileName("***"));
  });
});

describe("JsonFileRuleStore", () => {
  let rootDir: string;
  let store: JsonFileRuleStore;
  let warnings: Array<Record<string, unknown>>;

  async function writeSellerFile(sellerId: string, content: string): Promise<void> {
    await mkdir(path.join(rootDir, "sellers"), { recursive: true });
    await writeFile(path.join(rootDir, "sellers", `${sellerFileName(sellerId)}.json`), content, "utf8");
  }

  beforeEach(async () => {
    rootDir = await mkdtemp(path.join(tmpdir(), "shipping-rules-"));
    warnings = [];
    const logger = createLogger({
      level: "warn",
      sink: (_level, line) => warnings.push(JSON.parse(line) as Record<string, unknown>),
    });
    store = new JsonFileRuleStore({ rootDir, logger });
  });

  afterEach(async () => {
    await rm(rootDir, { recursive: true, force: true });
  });

  it("returns an empty rule set when the seller has no file", async () => {
    expect(await store.getRulesForSeller("nobody")).toEqual({ ok: true, value: [] });
  });

  it("reads rules in stored order and stamps the owner", async () => {
    await writeSellerFile(
      "A",
      JSON.stringify([
        { province: "Pichincha", city: "Quito", price: 5, active: true },
        { province: "Pichincha", price: 3 },
      ])
    );
    const result = await store.getRulesForSeller("A");
    expect(result).toEqual({
      ok: true,
      value: [
        { sellerId: "A", province: "Pichincha", city: "Quito", price: 5, active: true },
        { sellerId: "A", province: "Pichincha", price: 3, active: true },
      ],
    });
  });

  it("drops invalid entries with a warning", async () => {
    await writeSellerFile(
      "A",
      JSON.stringify([
        { province: "", price: 3 },
        { province: "Loja", price: -1 },
        { province: "Loja", price: 10000 },
        { province: "Loja", price: 2, note: "flat rate" },
      ])
    );
    const result = await store.getRulesForSeller("A");
    expect(result.ok && result.value).toEqual([
      { sellerId: "A", province: "Loja", price: 2, active: true, note: "flat rate" },
    ]);
    expect(warnings.map((w) => w.index)).toEqual([0, 1, 2]);
  });

  it("reports malformed JSON", async () => {
    await writeSellerFile("A", "[{");
    const result = await store.getRulesForSeller("A");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("MALFORMED_RULES");
      expect(result.error.sellerId).toBe("A");
    }
  });

  it("reports a file that is not an array", async () => {
    await writeSellerFile("A", JSON.stringify({ province: "Loja", price: 2 }));
    const result = await store.getRulesForSeller("A");
    expect(!result.ok && result.error.code).toBe("MALFORMED_RULES");
  });

  it("reports an unreadable path as unavailable", async () => {
    await mkdir(path.join(rootDir, "sellers", "A.json"), { recursive: true });
    const result = await store.getRulesForSeller("A");
    expect(!result.ok && result.error.code).toBe("RULE_STORE_UNAVAILABLE");
  });

  it("reads platform rules from platform.json", async () => {
    await writeFile(
      path.join(rootDir, "platform.json"),
      JSON.stringify([{ province: "Azuay", city: null, price: 8, active: false }]),
      "utf8"
    );
    expect(await store.getPlatformRules()).toEqual({
      ok: true,
      value: [{ sellerId: "", province: "Azuay", city: null, price: 8, active: false }],
    });
  });
});
