/**
 * @mintage/currency — Bounded unsigned arithmetic.
 *
 * Amounts are u64 and total supply is u128. JavaScript bigint has no
 * upper bound, so every add and subtract on a counter goes through a
 * checked helper that throws instead of leaving the range.
 */

import { InvalidAmountError, OverflowError } from "./types.js";

/** 2^64 − 1 */
export const U64_MAX = (1n << 64n) - 1n;

/** 2^128 − 1 */
export const U128_MAX = (1n << 128n) - 1n;

/** Per-call mint ceiling: one billion whole units at six decimals. */
export const DEFAULT_MINT_CEILING = 1_000_000_000n * 1_000_000n;

/**
 * Validate that a value is a u64 amount. Returns it unchanged.
 */
export function assertU64(amount: bigint, label = "amount"): bigint {
  if (typeof amount !== "bigint") {
    throw new InvalidAmountError(`${label} must be a bigint, got ${typeof amount}`);
  }
  if (amount < 0n || amount > U64_MAX) {
    throw new InvalidAmountError(`${label} ${amount.toString()} is outside the u64 range`);
  }
  return amount;
}

/**
 * a + b, or OverflowError when the sum exceeds `max`.
 */
export function checkedAdd(a: bigint, b: bigint, max: bigint, counter: string): bigint {
  const sum = a + b;
  if (sum > max) {
    throw new OverflowError(
      `Adding ${b.toString()} to ${counter} (${a.toString()}) exceeds ${max.toString()}`,
    );
  }
  return sum;
}

/**
 * a − b, or OverflowError when the result would be negative.
 */
export function checkedSub(a: bigint, b: bigint, counter: string): bigint {
  if (b > a) {
    throw new OverflowError(
      `Subtracting ${b.toString()} from ${counter} (${a.toString()}) would underflow`,
    );
  }
  return a - b;
}

/**
 * Number of decimal places a power-of-ten scaling factor implies.
 *
 * 1n → 0, 1_000_000n → 6
 */
export function scalingDecimals(scalingFactor: bigint): number {
  const digits = scalingFactor.toString();
  if (!/^10*$/.test(digits)) {
    throw new InvalidAmountError(
      `Scaling factor must be a power of ten, got ${digits}`,
    );
  }
  return digits.length - 1;
}

/**
 * Render a base-unit amount as a decimal string.
 *
 * 1_500_000n with scalingFactor=1_000_000n → "1.500000"
 * 42n with scalingFactor=1n → "42"
 */
export function formatUnits(amount: bigint, scalingFactor: bigint): string {
  const decimals = scalingDecimals(scalingFactor);
  if (decimals === 0) {
    return amount.toString();
  }

  const str = amount.toString().padStart(decimals + 1, "0");
  return `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;
}
