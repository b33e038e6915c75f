/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared domain types.
 * Used where values arrive untyped: configuration, journal replay,
 * and anything read back from an external store.
 */

import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["currency", "operator"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    (v.causationId === undefined || typeof v.causationId === "string") &&
    isEventSource(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    v.type.length > 0 &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object" &&
    !Array.isArray(v.payload)
  );
}
