/**
 * @mintage/currency — Per-currency supply counters.
 *
 * Invariants:
 * - preburnValue ≤ totalValue
 * - totalValue fits in u128, preburnValue in u64
 * - Only mint, preburn, burn and cancel-burn change the counters
 *
 * Changes happen in two steps. An after* method computes the counters a
 * change would produce and throws if either leaves its range; commit()
 * installs them. The core journals the change between the two, so a
 * rejected change leaves the counters untouched.
 */

import type { CurrencyCode } from "@mintage/types";
import { assertInternal } from "./resource.js";
import type { InternalToken } from "./resource.js";
import type { SupplySnapshot } from "./types.js";
import { InvalidAmountError } from "./types.js";
import { U128_MAX, U64_MAX, checkedAdd, checkedSub, scalingDecimals } from "./uint.js";

export const DEFAULT_SCALING_FACTOR = 1_000_000n;
export const DEFAULT_FRACTIONAL_PART = 100n;

/** Counter values after a proposed change. */
export interface SupplyCounters {
  readonly totalValue: bigint;
  readonly preburnValue: bigint;
}

export class SupplyLedger {
  readonly currency: CurrencyCode;
  readonly scalingFactor: bigint;
  readonly fractionalPart: bigint;
  private _totalValue = 0n;
  private _preburnValue = 0n;

  constructor(
    currency: CurrencyCode,
    scalingFactor: bigint = DEFAULT_SCALING_FACTOR,
    fractionalPart: bigint = DEFAULT_FRACTIONAL_PART,
  ) {
    scalingDecimals(scalingFactor);
    if (fractionalPart <= 0n || fractionalPart > scalingFactor) {
      throw new InvalidAmountError(
        `Fractional part must be in 1..${scalingFactor.toString()}, got ${fractionalPart.toString()}`,
      );
    }
    this.currency = currency;
    this.scalingFactor = scalingFactor;
    this.fractionalPart = fractionalPart;
  }

  get totalValue(): bigint {
    return this._totalValue;
  }

  get preburnValue(): bigint {
    return this._preburnValue;
  }

  afterMint(amount: bigint): SupplyCounters {
    return {
      totalValue: checkedAdd(this._totalValue, amount, U128_MAX, "total value"),
      preburnValue: this._preburnValue,
    };
  }

  afterPreburn(amount: bigint): SupplyCounters {
    return {
      totalValue: this._totalValue,
      preburnValue: checkedAdd(this._preburnValue, amount, U64_MAX, "preburn value"),
    };
  }

  /** A burned request leaves both counters. */
  afterBurn(amount: bigint): SupplyCounters {
    const preburnValue = checkedSub(this._preburnValue, amount, "preburn value");
    const totalValue = checkedSub(this._totalValue, amount, "total value");
    return { totalValue, preburnValue };
  }

  /** A cancelled request leaves escrow; supply is unchanged. */
  afterCancel(amount: bigint): SupplyCounters {
    return {
      totalValue: this._totalValue,
      preburnValue: checkedSub(this._preburnValue, amount, "preburn value"),
    };
  }

  /** @internal Install counters computed by an after* method. */
  commit(token: InternalToken, next: SupplyCounters): void {
    assertInternal(token);
    this._totalValue = next.totalValue;
    this._preburnValue = next.preburnValue;
  }

  snapshot(): SupplySnapshot {
    return {
      currency: this.currency,
      totalValue: this._totalValue,
      preburnValue: this._preburnValue,
      scalingFactor: this.scalingFactor,
      fractionalPart: this.fractionalPart,
    };
  }
}
