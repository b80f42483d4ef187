/**
 * Province/city key normalization. Every location comparison goes through here.
 */

export interface NormalizeOptions {
  /** Strip combining marks after NFD decomposition ("Bolívar" -> "bolivar") */
  foldAccents?: boolean;
}

const COMBINING_MARKS = /[\u0300-\u036f]/g;

export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim() === "";
}

/**
 * Trimmed, lower-cased key for `value`; empty string for null or blank input.
 * Idempotent: normalizing a normalized key returns it unchanged.
 */
export function normalizeLocation(
  value: string | null | undefined,
  options: NormalizeOptions = {}
): string {
  if (value === null || value === undefined) return "";
  const key = value.trim().toLowerCase();
  if (!options.foldAccents) return key;
  return key.normalize("NFD").replace(COMBINING_MARKS, "").normalize("NFC");
}
