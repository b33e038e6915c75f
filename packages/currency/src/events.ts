/**
 * @mintage/currency — Currency journal events.
 *
 * One event per committed supply change, appended to the stream
 * `currency:<CODE>`. Amounts are decimal strings so payloads stay
 * JSON-canonicalizable.
 *
 * Replaying a currency's stream reproduces its supply counters exactly.
 */

import type { CurrencyCode } from "@mintage/types";
import { isDomainEvent } from "@mintage/types";
import type { StoredEvent } from "@mintage/event-store";
import { MalformedEventError } from "./types.js";
import { checkedAdd, checkedSub, U128_MAX, U64_MAX } from "./uint.js";

export const CURRENCY_EVENTS = {
  REGISTERED: "currency.registered",
  MINTED: "currency.minted",
  PREBURNED: "currency.preburned",
  BURNED: "currency.burned",
  BURN_CANCELLED: "currency.burn_cancelled",
} as const;

export type CurrencyEventType = (typeof CURRENCY_EVENTS)[keyof typeof CURRENCY_EVENTS];

export const CURRENCY_EVENT_TYPES: readonly CurrencyEventType[] = Object.values(CURRENCY_EVENTS);

export interface CurrencyEventPayload {
  readonly amount: string;
  /** Account whose queue the request entered or left, when known. */
  readonly address?: string | undefined;
}

export function currencyStreamId(currency: CurrencyCode): string {
  return `currency:${currency}`;
}

export function isCurrencyEventType(value: unknown): value is CurrencyEventType {
  return typeof value === "string" && CURRENCY_EVENT_TYPES.some((type) => type === value);
}

export function isCurrencyEventPayload(value: unknown): value is CurrencyEventPayload {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.amount === "string" &&
    /^\d+$/.test(v.amount) &&
    (v.address === undefined || typeof v.address === "string")
  );
}

export interface ReplayedSupply {
  readonly totalValue: bigint;
  readonly preburnValue: bigint;
  readonly eventCount: number;
}

/**
 * Recompute supply counters from a currency's journal stream.
 *
 * @throws MalformedEventError on a record that is not a well-formed currency event
 */
export function replaySupply(events: readonly StoredEvent[]): ReplayedSupply {
  let totalValue = 0n;
  let preburnValue = 0n;
  let eventCount = 0;

  for (const stored of events) {
    if (!isDomainEvent(stored.event)) {
      throw new MalformedEventError(
        `Record at version ${stored.version} of ${stored.streamId} is not a domain event`,
      );
    }
    const { type, payload } = stored.event;
    if (!isCurrencyEventType(type)) continue;
    if (!isCurrencyEventPayload(payload)) {
      throw new MalformedEventError(
        `Malformed payload for ${type} at version ${stored.version} of ${stored.streamId}`,
      );
    }

    const amount = BigInt(payload.amount);
    switch (type) {
      case CURRENCY_EVENTS.REGISTERED:
        break;
      case CURRENCY_EVENTS.MINTED:
        totalValue = checkedAdd(totalValue, amount, U128_MAX, "total value");
        break;
      case CURRENCY_EVENTS.PREBURNED:
        preburnValue = checkedAdd(preburnValue, amount, U64_MAX, "preburn value");
        break;
      case CURRENCY_EVENTS.BURNED:
        preburnValue = checkedSub(preburnValue, amount, "preburn value");
        totalValue = checkedSub(totalValue, amount, "total value");
        break;
      case CURRENCY_EVENTS.BURN_CANCELLED:
        preburnValue = checkedSub(preburnValue, amount, "preburn value");
        break;
    }
    eventCount++;
  }

  return { totalValue, preburnValue, eventCount };
}
