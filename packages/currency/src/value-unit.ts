/**
 * @mintage/currency — Value units and their arithmetic.
 *
 * A ValueUnit carries a u64 amount of one currency. Units are created only
 * by the core (mint, zero) or by splitting an existing unit, and leave
 * circulation only by being merged into another unit, burned, or destroyed
 * at zero.
 *
 * Rules:
 * - withdraw/split never create value: the source shrinks by exactly the
 *   amount handed out
 * - deposit/join consume the absorbed unit
 * - destroyZero is the only way to discard a unit outside the burn path
 */

import type { CurrencyCode } from "@mintage/types";
import { INTERNAL, LinearResource, assertInternal } from "./resource.js";
import type { InternalToken } from "./resource.js";
import {
  CurrencyMismatchError,
  InsufficientValueError,
  NonZeroDestructionError,
  ResourceConsumedError,
} from "./types.js";
import { U64_MAX, assertU64, checkedAdd } from "./uint.js";

export class ValueUnit<C extends CurrencyCode = CurrencyCode> extends LinearResource {
  readonly kind = "value-unit" as const;
  readonly currency: C;
  private _amount: bigint;

  constructor(token: InternalToken, currency: C, amount: bigint) {
    super(token);
    this.currency = currency;
    this._amount = assertU64(amount);
  }

  /** Amount held. Throws if this handle has been consumed. */
  get amount(): bigint {
    this.assertLive();
    return this._amount;
  }

  /** @internal */
  _credit(token: InternalToken, amount: bigint): void {
    assertInternal(token);
    this._amount = checkedAdd(this._amount, amount, U64_MAX, "unit amount");
  }

  /** @internal */
  _debit(token: InternalToken, amount: bigint): void {
    assertInternal(token);
    if (amount > this._amount) {
      throw new InsufficientValueError(this._amount, amount);
    }
    this._amount -= amount;
  }

  /**
   * @internal Move this unit into a new handle tagged with `currency`.
   * The current handle is consumed.
   */
  _moveAs<D extends CurrencyCode>(token: InternalToken, currency: D): ValueUnit<D> {
    assertInternal(token);
    this.assertLive();
    const own: CurrencyCode = this.currency;
    if (own !== currency) {
      throw new CurrencyMismatchError(currency, this.currency);
    }
    const moved = new ValueUnit(token, currency, this._amount);
    this._consume(token);
    return moved;
  }

  toString(): string {
    return this.isConsumed
      ? `ValueUnit<${this.currency}>(consumed)`
      : `ValueUnit<${this.currency}>(${this._amount.toString()})`;
  }
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

/**
 * Read the amount of a unit.
 */
export function value<C extends CurrencyCode>(unit: ValueUnit<C>): bigint {
  return unit.amount;
}

/**
 * Take `amount` out of `unit` in place and return it as a new unit.
 *
 * @throws InsufficientValueError if the unit holds less than `amount`
 */
export function withdraw<C extends CurrencyCode>(
  unit: ValueUnit<C>,
  amount: bigint,
): ValueUnit<C> {
  unit.assertLive();
  assertU64(amount);
  unit._debit(INTERNAL, amount);
  return new ValueUnit(INTERNAL, unit.currency, amount);
}

/**
 * Split a unit in two: `[remainder, withdrawn]`.
 * The remainder is the same handle that was passed in.
 */
export function split<C extends CurrencyCode>(
  unit: ValueUnit<C>,
  amount: bigint,
): readonly [ValueUnit<C>, ValueUnit<C>] {
  const withdrawn = withdraw(unit, amount);
  return [unit, withdrawn] as const;
}

/**
 * Merge `other` into `unit`. `other` is consumed.
 *
 * @throws OverflowError if the sum exceeds u64
 */
export function deposit<C extends CurrencyCode>(
  unit: ValueUnit<C>,
  other: ValueUnit<C>,
): void {
  unit.assertLive();
  other.assertLive();
  if (unit === other) {
    throw new ResourceConsumedError("value-unit", "cannot be deposited into itself");
  }
  if (unit.currency !== other.currency) {
    throw new CurrencyMismatchError(unit.currency, other.currency);
  }

  unit._credit(INTERNAL, other.amount);
  other._consume(INTERNAL);
}

/**
 * Merge two units into one. Returns `first`; `second` is consumed.
 */
export function join<C extends CurrencyCode>(
  first: ValueUnit<C>,
  second: ValueUnit<C>,
): ValueUnit<C> {
  deposit(first, second);
  return first;
}

/**
 * Discard a unit holding nothing.
 *
 * @throws NonZeroDestructionError if the unit still holds value
 */
export function destroyZero<C extends CurrencyCode>(unit: ValueUnit<C>): void {
  if (unit.amount !== 0n) {
    throw new NonZeroDestructionError(
      `Cannot destroy a ${unit.currency} unit holding ${unit.amount.toString()}`,
    );
  }
  unit._consume(INTERNAL);
}
