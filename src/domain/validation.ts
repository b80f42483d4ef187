/**
 * Runtime validation for domain models using Zod.
 * Everything coming from storage, sessions or headers is parsed here before the engine sees it.
 */

import { z } from "zod";
import type { BuyerLocation, CartLineItem } from "./types.js";

const MAX_PRICE = 9999.99;

/** Rule as stored by a seller; the owner id comes from where it was stored */
export const storedRuleSchema = z.object({
  province: z.string().trim().min(1).max(120),
  city: z.string().max(120).nullish(),
  price: z.number().min(0).max(MAX_PRICE),
  active: z.boolean().default(true),
  note: z.string().max(120).optional(),
});

export const cartLineItemSchema: z.ZodType<CartLineItem, z.ZodTypeDef, unknown> = z.object({
  productId: z.coerce.string().min(1),
  quantity: z.number().int().positive(),
  unitPrice: z.number().min(0),
  sellerId: z.string(),
});

export const buyerLocationSchema: z.ZodType<BuyerLocation, z.ZodTypeDef, unknown> = z.object({
  province: z.string().nullish(),
  city: z.string().nullish(),
});

const cartSnapshotSchema = z.array(cartLineItemSchema);

/**
 * Parse a cart snapshot from a session or header.
 * Accepts an array or its JSON text. Malformed data yields an empty cart, never an error.
 */
export function parseCartSnapshot(raw: unknown): CartLineItem[] {
  let data: unknown = raw;
  if (typeof raw === "string") {
    if (raw.trim() === "") return [];
    try {
      data = JSON.parse(raw);
    } catch {
      return [];
    }
  }
  const result = cartSnapshotSchema.safeParse(data);
  return result.success ? result.data : [];
}

/** Flatten a ZodError into "path: message; ..." */
export function formatZodError(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");
}
