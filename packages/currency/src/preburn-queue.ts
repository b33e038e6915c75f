/**
 * @mintage/currency — Preburn queue.
 *
 * An account's FIFO of units waiting for the capability holder to burn or
 * return them. Units enter at the back and leave only from the front.
 *
 * `isApproved` is stored and carried across moves but nothing checks it:
 * the approval gate is switched off until the surrounding system defines
 * who approves and when.
 */

import type { CurrencyCode } from "@mintage/types";
import { LinearResource, assertInternal } from "./resource.js";
import type { InternalToken } from "./resource.js";
import type { ValueUnit } from "./value-unit.js";
import { CurrencyMismatchError } from "./types.js";

export class PreburnQueue<C extends CurrencyCode = CurrencyCode> extends LinearResource {
  readonly kind = "preburn-queue" as const;
  readonly currency: C;
  private readonly _requests: ValueUnit[];
  private _isApproved: boolean;

  constructor(
    token: InternalToken,
    currency: C,
    requests: ValueUnit[] = [],
    isApproved = false,
  ) {
    super(token);
    this.currency = currency;
    this._requests = requests;
    this._isApproved = isApproved;
  }

  get isApproved(): boolean {
    this.assertLive();
    return this._isApproved;
  }

  /** Number of pending requests. */
  get length(): number {
    this.assertLive();
    return this._requests.length;
  }

  /** Pending amounts, oldest first. */
  pendingAmounts(): readonly bigint[] {
    this.assertLive();
    return this._requests.map((unit) => unit.amount);
  }

  /** Amount of the oldest pending request, if any. */
  peek(): bigint | undefined {
    this.assertLive();
    return this._requests[0]?.amount;
  }

  /** @internal */
  _enqueue(token: InternalToken, unit: ValueUnit): void {
    assertInternal(token);
    this.assertLive();
    this._requests.push(unit);
  }

  /** @internal */
  _dequeue(token: InternalToken): ValueUnit | undefined {
    assertInternal(token);
    this.assertLive();
    return this._requests.shift();
  }

  /** @internal */
  _approve(token: InternalToken): void {
    assertInternal(token);
    this.assertLive();
    this._isApproved = true;
  }

  /**
   * @internal Relocate the queue with its pending requests.
   * The current handle is consumed.
   */
  _moveAs<D extends CurrencyCode>(token: InternalToken, currency: D): PreburnQueue<D> {
    assertInternal(token);
    this.assertLive();
    const own: CurrencyCode = this.currency;
    if (own !== currency) {
      throw new CurrencyMismatchError(currency, this.currency);
    }
    const moved = new PreburnQueue(token, currency, [...this._requests], this._isApproved);
    this._consume(token);
    return moved;
  }
}
