/**
 * @mintage/currency — Move-only resource base.
 *
 * Currency objects must never be copied or silently dropped. JavaScript
 * references can always be duplicated, so linearity is enforced at run time:
 *
 * - Constructors and mutators require INTERNAL, which is not re-exported
 *   from the package entry point, so only this package creates resources.
 * - Every move produces a fresh handle and marks the old one consumed.
 * - Any use of a consumed handle throws ResourceConsumedError.
 * - Provenance lives in module-level sets, not on the object, so a copy made
 *   with Object.assign or structuredClone is never a live resource.
 */

import type { LinearKind } from "./types.js";
import { AuthorizationError, ResourceConsumedError } from "./types.js";

/** Capability token for package-internal construction and mutation. */
export const INTERNAL: unique symbol = Symbol("mintage.internal");

export type InternalToken = typeof INTERNAL;

export function assertInternal(token: InternalToken): void {
  if (token !== INTERNAL) {
    throw new AuthorizationError("Internal resource operation invoked from outside the core");
  }
}

/** Every handle this package constructed. */
const issued = new WeakSet<LinearResource>();

/** Handles not yet moved, merged, burned or destroyed. */
const live = new WeakSet<LinearResource>();

export abstract class LinearResource {
  abstract readonly kind: LinearKind;

  constructor(token: InternalToken) {
    assertInternal(token);
    issued.add(this);
    live.add(this);
  }

  /** True once this handle has been moved, merged, burned or destroyed. */
  get isConsumed(): boolean {
    return !live.has(this);
  }

  /**
   * Throws AuthorizationError for an object the core never issued and
   * ResourceConsumedError for a dead handle.
   */
  assertLive(): void {
    if (!issued.has(this)) {
      throw new AuthorizationError(`${this.kind} was not issued by the currency core`);
    }
    if (!live.has(this)) {
      throw new ResourceConsumedError(this.kind);
    }
  }

  /** @internal Mark this handle dead. */
  _consume(token: InternalToken): void {
    assertInternal(token);
    this.assertLive();
    live.delete(this);
  }
}
