/**
 * JSON shapes of the estimate endpoint. Field names are part of the storefront's
 * public contract and stay as the frontend expects them.
 */

import type { ShippingEstimateResult } from "../domain/types.js";
import type { TariffTrace } from "../tariff/resolver.js";
import type { ShippingEstimateError } from "../domain/errors.js";

export interface WireSellerEstimate {
  vendedorId: string;
  provincia: string;
  ciudad: string;
  precio: number;
  items: number;
}

export interface WireEstimate {
  totalEnvio: number;
  detalle: WireSellerEstimate[];
  warning?: string;
}

export interface WireTrace {
  vendedorId: string;
  provinciaNormalizada: string;
  ciudadNormalizada: string;
  precio: number;
  nivel: string;
  fuente: string;
  pasos: string[];
}

export interface WireError {
  error: { code: string; message: string; sellerId?: string };
}

export function toWireEstimate(result: ShippingEstimateResult): WireEstimate {
  const body: WireEstimate = {
    totalEnvio: result.total,
    detalle: result.breakdown.map((e) => ({
      vendedorId: e.sellerId,
      provincia: e.province,
      ciudad: e.city,
      precio: e.price,
      items: e.itemCount,
    })),
  };
  if (result.warning !== undefined) body.warning = result.warning;
  return body;
}

export function toWireTrace(sellerId: string, trace: TariffTrace): WireTrace {
  return {
    vendedorId: sellerId,
    provinciaNormalizada: trace.provinceKey,
    ciudadNormalizada: trace.cityKey,
    precio: trace.resolution.price,
    nivel: trace.resolution.matchLevel,
    fuente: trace.resolution.source,
    pasos: trace.steps,
  };
}

export function toWireError(error: ShippingEstimateError): WireError {
  const { code, message, sellerId } = error.toJSON();
  return { error: sellerId === undefined ? { code, message } : { code, message, sellerId } };
}
