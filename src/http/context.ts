/**
 * Request context: who the buyer is and what is in their cart.
 * Authentication and sessions live upstream; the router only sees this interface.
 */

import type { Request } from "express";
import type { BuyerLocation, CartLineItem } from "../domain/types.js";
import { buyerLocationSchema, parseCartSnapshot } from "../domain/validation.js";

export interface RequestContext {
  buyer: BuyerLocation;
  cart: CartLineItem[];
}

export interface RequestContextResolver {
  resolve(req: Request): Promise<RequestContext>;
}

export const BUYER_PROVINCE_HEADER = "x-buyer-province";
export const BUYER_CITY_HEADER = "x-buyer-city";
export const CART_HEADER = "x-cart";

/** Header values may be percent-encoded so non-ASCII names survive transport */
function headerValue(req: Request, name: string): string | undefined {
  const raw = req.get(name);
  if (raw === undefined) return undefined;
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

/**
 * Reads the buyer location from `X-Buyer-Province` / `X-Buyer-City` (set by the auth
 * gateway from the buyer profile) and the cart snapshot from `X-Cart` (JSON).
 * A malformed cart header counts as an empty cart.
 */
export const headerContextResolver: RequestContextResolver = {
  async resolve(req) {
    const parsed = buyerLocationSchema.safeParse({
      province: headerValue(req, BUYER_PROVINCE_HEADER),
      city: headerValue(req, BUYER_CITY_HEADER),
    });
    return {
      buyer: parsed.success ? parsed.data : {},
      cart: parseCartSnapshot(headerValue(req, CART_HEADER)),
    };
  },
};
