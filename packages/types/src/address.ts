/**
 * Identity Types
 *
 * Account addresses and currency codes as they cross the core's boundary.
 * Both are plain strings; normalization happens once at the edge so the
 * keyed store never sees two spellings of the same account.
 */

/**
 * Hex account address (e.g., "0xa550c18").
 * Always lower-case after normalization.
 */
export type Address = string;

/**
 * Currency type tag (e.g., "XUS", "Coin1").
 * Used as the generic parameter of every currency resource.
 */
export type CurrencyCode = string;

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{1,64}$/;
const CURRENCY_CODE_PATTERN = /^[A-Za-z][A-Za-z0-9_]{0,31}$/;

/**
 * Canonical form of an address: lower-case hex with the 0x prefix.
 *
 * "0xA550C18" → "0xa550c18"
 *
 * Throws on anything that is not a 0x-prefixed hex string.
 */
export function normalizeAddress(raw: string): Address {
  const trimmed = raw.trim();
  if (!ADDRESS_PATTERN.test(trimmed)) {
    throw new Error(`Invalid address: "${raw}"`);
  }
  return `0x${trimmed.slice(2).toLowerCase()}`;
}

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isCurrencyCode(value: unknown): value is CurrencyCode {
  return typeof value === "string" && CURRENCY_CODE_PATTERN.test(value);
}
