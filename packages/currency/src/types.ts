/**
 * @mintage/currency — Shared types and the error taxonomy.
 *
 * Rules:
 * - All snapshot types are readonly
 * - Fail-closed: every failed operation throws and leaves state untouched
 * - Amounts are bigint, never number
 */

import type { Address, CurrencyCode } from "@mintage/types";

// ─── Resource Kinds ──────────────────────────────────────────────────────

/** Kinds of move-only resources. */
export type LinearKind = "value-unit" | "mint-capability" | "preburn-queue";

// ─── Configuration ───────────────────────────────────────────────────────

/**
 * Deployment policy for one currency core.
 */
export interface CurrencyConfig {
  /** The only identity allowed to register currencies. */
  readonly rootAuthority: Address;

  /** Largest amount a single mint may issue. */
  readonly mintCeiling: bigint;
}

/**
 * Optional display metadata recorded at registration.
 */
export interface RegisterOptions {
  /** Base units per whole unit; must be a power of ten. Default 1,000,000. */
  readonly scalingFactor?: bigint | undefined;

  /** Smallest fraction shown to users. Default 100. */
  readonly fractionalPart?: bigint | undefined;
}

// ─── Snapshots ───────────────────────────────────────────────────────────

/**
 * Point-in-time copy of a currency's supply counters.
 */
export interface SupplySnapshot {
  readonly currency: CurrencyCode;
  /** Sum of every outstanding unit, including those awaiting burn. */
  readonly totalValue: bigint;
  /** Sum of every unit sitting in a preburn queue. */
  readonly preburnValue: bigint;
  readonly scalingFactor: bigint;
  readonly fractionalPart: bigint;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for currency operations. */
export type CurrencyErrorCode =
  | "UNAUTHORIZED"
  | "NOT_REGISTERED"
  | "ALREADY_EXISTS"
  | "NOT_FOUND"
  | "EMPTY_QUEUE"
  | "LIMIT_EXCEEDED"
  | "OVERFLOW"
  | "INSUFFICIENT_VALUE"
  | "NON_ZERO_DESTRUCTION"
  | "RESOURCE_CONSUMED"
  | "CURRENCY_MISMATCH"
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "INVALID_CURRENCY"
  | "MALFORMED_EVENT";

/**
 * Structured error from the currency core.
 * Always thrown — never returned as a value.
 */
export class CurrencyError extends Error {
  public readonly code: CurrencyErrorCode;

  constructor(code: CurrencyErrorCode, message: string) {
    super(message);
    this.name = "CurrencyError";
    this.code = code;
  }
}

/** Caller is not the root authority, or holds no issued capability. */
export class AuthorizationError extends CurrencyError {
  constructor(message: string) {
    super("UNAUTHORIZED", message);
    this.name = "AuthorizationError";
  }
}

export class NotRegisteredError extends CurrencyError {
  constructor(currency: CurrencyCode) {
    super("NOT_REGISTERED", `Currency "${currency}" is not registered`);
    this.name = "NotRegisteredError";
  }
}

export class AlreadyExistsError extends CurrencyError {
  constructor(message: string) {
    super("ALREADY_EXISTS", message);
    this.name = "AlreadyExistsError";
  }
}

export class NotFoundError extends CurrencyError {
  constructor(message: string) {
    super("NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

export class EmptyQueueError extends CurrencyError {
  constructor(address: Address, currency: CurrencyCode) {
    super("EMPTY_QUEUE", `Preburn queue for "${currency}" at ${address} has no pending requests`);
    this.name = "EmptyQueueError";
  }
}

export class LimitExceededError extends CurrencyError {
  constructor(amount: bigint, ceiling: bigint) {
    super(
      "LIMIT_EXCEEDED",
      `Mint amount ${amount.toString()} exceeds the ceiling of ${ceiling.toString()}`,
    );
    this.name = "LimitExceededError";
  }
}

/** Arithmetic left the range of a counter (either direction). */
export class OverflowError extends CurrencyError {
  constructor(message: string) {
    super("OVERFLOW", message);
    this.name = "OverflowError";
  }
}

export class InsufficientValueError extends CurrencyError {
  constructor(available: bigint, requested: bigint) {
    super(
      "INSUFFICIENT_VALUE",
      `Cannot withdraw ${requested.toString()} from a unit holding ${available.toString()}`,
    );
    this.name = "InsufficientValueError";
  }
}

export class NonZeroDestructionError extends CurrencyError {
  constructor(message: string) {
    super("NON_ZERO_DESTRUCTION", message);
    this.name = "NonZeroDestructionError";
  }
}

/** A moved or consumed resource was used again. */
export class ResourceConsumedError extends CurrencyError {
  constructor(kind: LinearKind, detail?: string) {
    super(
      "RESOURCE_CONSUMED",
      detail !== undefined ? `${kind} ${detail}` : `${kind} has already been moved or consumed`,
    );
    this.name = "ResourceConsumedError";
  }
}

export class CurrencyMismatchError extends CurrencyError {
  constructor(expected: CurrencyCode, actual: CurrencyCode) {
    super("CURRENCY_MISMATCH", `Expected currency "${expected}", got "${actual}"`);
    this.name = "CurrencyMismatchError";
  }
}

export class InvalidAmountError extends CurrencyError {
  constructor(message: string) {
    super("INVALID_AMOUNT", message);
    this.name = "InvalidAmountError";
  }
}

export class InvalidAddressError extends CurrencyError {
  constructor(raw: unknown) {
    super("INVALID_ADDRESS", `Invalid address: ${quote(raw)}`);
    this.name = "InvalidAddressError";
  }
}

export class InvalidCurrencyError extends CurrencyError {
  constructor(raw: unknown) {
    super("INVALID_CURRENCY", `Invalid currency code: ${quote(raw)}`);
    this.name = "InvalidCurrencyError";
  }
}

/** A journal record that cannot be replayed. */
export class MalformedEventError extends CurrencyError {
  constructor(message: string) {
    super("MALFORMED_EVENT", message);
    this.name = "MalformedEventError";
  }
}

function quote(raw: unknown): string {
  return typeof raw === "string" ? `"${raw}"` : String(raw);
}
