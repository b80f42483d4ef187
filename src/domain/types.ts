/**
 * Domain types for the seller shipping estimator.
 * Callers work only with these; storage and wire shapes stay at the edges.
 */

/** A seller-defined geographic pricing rule */
export interface ShippingRule {
  /** Owner of the rule */
  sellerId: string;
  province: string;
  /** Blank or absent means the rule covers the whole province */
  city?: string | null;
  /** Non-negative shipping charge */
  price: number;
  /** Inactive rules are never matched */
  active: boolean;
  note?: string;
}

/** A line of the buyer's cart snapshot */
export interface CartLineItem {
  productId: string;
  /** Positive integer */
  quantity: number;
  unitPrice: number;
  sellerId: string;
}

/** Location stored on the buyer's profile */
export interface BuyerLocation {
  province?: string | null;
  city?: string | null;
}

/** Which specificity level produced a tariff */
export type MatchLevel = "city" | "province" | "none";

/** Which rule set produced a tariff */
export type RuleSource = "seller" | "platform" | "none";

/** Per-seller line of an estimate */
export interface SellerShippingEstimate {
  sellerId: string;
  /** Buyer province as given (not normalized) */
  province: string;
  city: string;
  price: number;
  /** Sum of quantities for this seller's lines */
  itemCount: number;
  matchLevel: MatchLevel;
  source: RuleSource;
  /** Set when the seller's rules could not be loaded and the failure was isolated */
  failed?: boolean;
}

/** Structured estimate returned to the presentation layer */
export interface ShippingEstimateResult {
  total: number;
  /** One entry per distinct seller, in first-encounter order */
  breakdown: SellerShippingEstimate[];
  warning?: string;
  /** Per-seller advisories (e.g. no rate configured for the destination) */
  notices: string[];
}
