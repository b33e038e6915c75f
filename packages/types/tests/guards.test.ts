/**
 * Runtime type guard tests for @mintage/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAddress,
  isCurrencyCode,
  normalizeAddress,
} from "../src/address.js";
import {
  isDomainEvent,
  isEventMetadata,
  isEventSource,
} from "../src/guards.js";

// =============================================================================
// Identity
// =============================================================================

describe("normalizeAddress", () => {
  it("lower-cases the hex digits", () => {
    expect(normalizeAddress("0xA550C18")).toBe("0xa550c18");
  });

  it("trims surrounding whitespace", () => {
    expect(normalizeAddress("  0xBEEF ")).toBe("0xbeef");
  });

  it("rejects a missing 0x prefix", () => {
    expect(() => normalizeAddress("a550c18")).toThrow('Invalid address: "a550c18"');
  });

  it("rejects non-hex digits", () => {
    expect(() => normalizeAddress("0xZZ")).toThrow();
  });

  it("rejects a bare prefix", () => {
    expect(() => normalizeAddress("0x")).toThrow();
  });
});

describe("isAddress", () => {
  it("accepts mixed-case hex", () => {
    expect(isAddress("0xA550c18")).toBe(true);
  });

  it("rejects non-strings", () => {
    expect(isAddress(0xa550c18)).toBe(false);
    expect(isAddress(null)).toBe(false);
  });
});

describe("isCurrencyCode", () => {
  it("accepts alphanumeric codes", () => {
    expect(isCurrencyCode("XUS")).toBe(true);
    expect(isCurrencyCode("Coin1")).toBe(true);
  });

  it("rejects codes starting with a digit", () => {
    expect(isCurrencyCode("1Coin")).toBe(false);
  });

  it("rejects empty and oversized codes", () => {
    expect(isCurrencyCode("")).toBe(false);
    expect(isCurrencyCode("A".repeat(33))).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

const metadata = {
  eventId: "evt-1",
  timestamp: "2025-01-01T00:00:00Z",
  actor: "0xa550c18",
  correlationId: "corr-1",
  source: "currency",
};

describe("isEventSource", () => {
  it("accepts known sources", () => {
    expect(isEventSource("currency")).toBe(true);
    expect(isEventSource("operator")).toBe(true);
  });

  it("rejects unknown sources", () => {
    expect(isEventSource("vault")).toBe(false);
  });
});

describe("isEventMetadata", () => {
  it("accepts valid metadata", () => {
    expect(isEventMetadata(metadata)).toBe(true);
  });

  it("accepts a string causationId", () => {
    expect(isEventMetadata({ ...metadata, causationId: "evt-0" })).toBe(true);
  });

  it("rejects a numeric causationId", () => {
    expect(isEventMetadata({ ...metadata, causationId: 7 })).toBe(false);
  });

  it("rejects missing actor", () => {
    const { actor: _actor, ...rest } = metadata;
    expect(isEventMetadata(rest)).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a valid event", () => {
    expect(
      isDomainEvent({ type: "currency.minted", metadata, payload: { amount: "1" } }),
    ).toBe(true);
  });

  it("rejects an empty type", () => {
    expect(isDomainEvent({ type: "", metadata, payload: {} })).toBe(false);
  });

  it("rejects an array payload", () => {
    expect(isDomainEvent({ type: "currency.minted", metadata, payload: [] })).toBe(false);
  });

  it("rejects null", () => {
    expect(isDomainEvent(null)).toBe(false);
  });
});
