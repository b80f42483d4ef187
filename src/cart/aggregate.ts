/**
 * Partitions a cart by seller. Shipping is charged once per seller, not per line.
 */

import type { CartLineItem } from "../domain/types.js";

/**
 * Item count (sum of quantities) per seller id, in the order sellers first appear
 * in the cart. Blank seller ids are kept under their own key.
 */
export function groupBySeller(cart: readonly CartLineItem[]): Map<string, number> {
  const groups = new Map<string, number>();
  for (const line of cart) {
    groups.set(line.sellerId, (groups.get(line.sellerId) ?? 0) + line.quantity);
  }
  return groups;
}

/** Total quantity across all lines */
export function totalQuantity(cart: readonly CartLineItem[]): number {
  return cart.reduce((sum, line) => sum + line.quantity, 0);
}
