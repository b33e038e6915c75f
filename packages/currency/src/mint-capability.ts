/**
 * @mintage/currency — Mint capability.
 *
 * Holding a live, core-issued MintCapability is the authorization to mint
 * and to resolve preburn requests for one currency. It carries no data;
 * its identity is the capability.
 */

import type { CurrencyCode } from "@mintage/types";
import { LinearResource, assertInternal } from "./resource.js";
import type { InternalToken } from "./resource.js";
import { CurrencyMismatchError } from "./types.js";

export class MintCapability<C extends CurrencyCode = CurrencyCode> extends LinearResource {
  readonly kind = "mint-capability" as const;
  readonly currency: C;

  constructor(token: InternalToken, currency: C) {
    super(token);
    this.currency = currency;
  }

  /**
   * @internal Relocate the capability. The current handle is consumed.
   */
  _moveAs<D extends CurrencyCode>(token: InternalToken, currency: D): MintCapability<D> {
    assertInternal(token);
    this.assertLive();
    const own: CurrencyCode = this.currency;
    if (own !== currency) {
      throw new CurrencyMismatchError(currency, this.currency);
    }
    const moved = new MintCapability(token, currency);
    this._consume(token);
    return moved;
  }
}
