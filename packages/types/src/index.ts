/**
 * @mintage/types — Shared domain types for the Mintage stack.
 *
 * - Identity (addresses, currency codes)
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Identity
export type { Address, CurrencyCode } from "./address.js";
export { normalizeAddress, isAddress, isCurrencyCode } from "./address.js";

// Event types
export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// Runtime type guards
export { isEventSource, isEventMetadata, isDomainEvent } from "./guards.js";
