/**
 * @mintage/currency — Accounting core of a single-currency supply.
 *
 * Mints units under a unique capability, escrows units for destruction in
 * per-account FIFO queues, and burns or returns them in arrival order.
 *
 * Design rules:
 * - Units, capabilities and queues are move-only: never copied, never dropped
 * - totalValue = every outstanding unit, escrowed ones included
 * - preburnValue ≤ totalValue at all times
 * - Fail-closed: a failed operation throws and changes nothing
 * - All arithmetic is checked bigint (u64 amounts, u128 supply)
 */

// Core engine
export { CurrencyCore } from "./currency.js";
export type { CurrencyCoreOptions } from "./currency.js";

// Resources
export { ValueUnit, value, withdraw, split, deposit, join, destroyZero } from "./value-unit.js";
export { MintCapability } from "./mint-capability.js";
export { PreburnQueue } from "./preburn-queue.js";
export { LinearResource } from "./resource.js";
export {
  SupplyLedger,
  DEFAULT_SCALING_FACTOR,
  DEFAULT_FRACTIONAL_PART,
} from "./supply-ledger.js";
export type { SupplyCounters } from "./supply-ledger.js";

// Storage
export { InMemoryResourceStore, describeKey } from "./store.js";
export type { ResourceStore, ResourceKey, StoredKind, StoredResources } from "./store.js";

// Journal events
export {
  CURRENCY_EVENTS,
  CURRENCY_EVENT_TYPES,
  currencyStreamId,
  isCurrencyEventType,
  isCurrencyEventPayload,
  replaySupply,
} from "./events.js";
export type { CurrencyEventType, CurrencyEventPayload, ReplayedSupply } from "./events.js";

// Arithmetic bounds
export {
  U64_MAX,
  U128_MAX,
  DEFAULT_MINT_CEILING,
  assertU64,
  checkedAdd,
  checkedSub,
  formatUnits,
  scalingDecimals,
} from "./uint.js";

// Configuration & logging
export {
  ConfigSchema,
  loadConfig,
  toCurrencyConfig,
  DEFAULT_CURRENCY_CONFIG,
  DEFAULT_ROOT_AUTHORITY,
} from "./config.js";
export type { AppConfig, LogLevel } from "./config.js";
export { createLogger, createLoggerFromConfig, silentLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";

// Types & errors
export type {
  LinearKind,
  CurrencyConfig,
  RegisterOptions,
  SupplySnapshot,
  CurrencyErrorCode,
} from "./types.js";
export {
  CurrencyError,
  AuthorizationError,
  NotRegisteredError,
  AlreadyExistsError,
  NotFoundError,
  EmptyQueueError,
  LimitExceededError,
  OverflowError,
  InsufficientValueError,
  NonZeroDestructionError,
  ResourceConsumedError,
  CurrencyMismatchError,
  InvalidAmountError,
  InvalidAddressError,
  InvalidCurrencyError,
  MalformedEventError,
} from "./types.js";
