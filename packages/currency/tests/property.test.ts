/**
 * Property-Based Tests for @mintage/currency
 *
 * Uses fast-check to drive random operation sequences against the core and
 * a plain model, checking after every step:
 *
 * 1. Conservation: held units + escrowed units = total value
 * 2. Escrow bound: preburnValue ≤ totalValue
 * 3. FIFO: every queue resolves in arrival order
 * 4. Split/join round trip restores both amounts
 * 5. Replaying the journal reproduces the supply counters
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { InMemoryEventStore } from "@mintage/event-store";
import { CurrencyCore } from "../src/currency.js";
import { currencyStreamId, replaySupply } from "../src/events.js";
import { EmptyQueueError } from "../src/types.js";
import { deposit, join, split, value, withdraw } from "../src/value-unit.js";
import type { ValueUnit } from "../src/value-unit.js";

// =============================================================================
// Arbitraries
// =============================================================================

const ROOT = "0xa550c18";
const ACCOUNTS = ["0xa11ce", "0xb0b"] as const;

type AccountIndex = 0 | 1;

type Op =
  | { readonly kind: "mint"; readonly amount: bigint }
  | { readonly kind: "preburn"; readonly account: AccountIndex; readonly pick: number }
  | { readonly kind: "burn"; readonly account: AccountIndex }
  | { readonly kind: "cancel"; readonly account: AccountIndex }
  | { readonly kind: "split"; readonly pick: number; readonly percent: number }
  | { readonly kind: "join"; readonly pick: number; readonly other: number };

const arbAmount = fc.bigInt({ min: 0n, max: 1_000_000_000_000n });
const arbAccount = fc.constantFrom<AccountIndex>(0, 1);
const arbPick = fc.nat({ max: 63 });

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({ kind: fc.constant("mint" as const), amount: arbAmount }),
  fc.record({ kind: fc.constant("preburn" as const), account: arbAccount, pick: arbPick }),
  fc.record({ kind: fc.constant("burn" as const), account: arbAccount }),
  fc.record({ kind: fc.constant("cancel" as const), account: arbAccount }),
  fc.record({
    kind: fc.constant("split" as const),
    pick: arbPick,
    percent: fc.integer({ min: 0, max: 100 }),
  }),
  fc.record({ kind: fc.constant("join" as const), pick: arbPick, other: arbPick }),
);

// =============================================================================
// Harness
// =============================================================================

function sum(values: readonly bigint[]): bigint {
  return values.reduce((acc, v) => acc + v, 0n);
}

function run(ops: readonly Op[]) {
  const journal = new InMemoryEventStore();
  const core = new CurrencyCore({ journal });
  core.register(ROOT, "XUS");
  const cap = core.removeMintCapability(ROOT, "XUS");
  for (const account of ACCOUNTS) {
    core.createPreburn(account, "XUS");
  }

  const held: ValueUnit<"XUS">[] = [];
  const queues: bigint[][] = [[], []];

  const check = () => {
    const total = core.marketCap("XUS");
    const escrowed = core.preburnValue("XUS");

    expect(sum(held.map(value)) + escrowed).toBe(total);
    expect(escrowed <= total).toBe(true);
    expect(escrowed).toBe(sum(queues.flat()));
    for (const [i, account] of ACCOUNTS.entries()) {
      expect(core.pendingRequests(account, "XUS")).toEqual(queues[i]);
    }
  };

  for (const op of ops) {
    switch (op.kind) {
      case "mint":
        held.push(core.mint(op.amount, cap));
        break;

      case "preburn": {
        if (held.length === 0) break;
        const [unit] = held.splice(op.pick % held.length, 1);
        if (unit === undefined) break;
        const amount = value(unit);
        core.preburnToSender(ACCOUNTS[op.account], unit);
        queues[op.account]?.push(amount);
        break;
      }

      case "burn": {
        const queue = queues[op.account] ?? [];
        if (queue.length === 0) {
          expect(() => core.burn(ACCOUNTS[op.account], cap)).toThrow(EmptyQueueError);
          break;
        }
        core.burn(ACCOUNTS[op.account], cap);
        queue.shift();
        break;
      }

      case "cancel": {
        const queue = queues[op.account] ?? [];
        if (queue.length === 0) {
          expect(() => core.cancelBurn(ACCOUNTS[op.account], cap)).toThrow(EmptyQueueError);
          break;
        }
        const returned = core.cancelBurn(ACCOUNTS[op.account], cap);
        expect(value(returned)).toBe(queue.shift());
        held.push(returned);
        break;
      }

      case "split": {
        const unit = held[op.pick % Math.max(held.length, 1)];
        if (unit === undefined) break;
        held.push(withdraw(unit, (value(unit) * BigInt(op.percent)) / 100n));
        break;
      }

      case "join": {
        if (held.length < 2) break;
        const i = op.pick % held.length;
        const j = op.other % held.length;
        const target = held[i];
        const absorbed = held[j];
        if (i === j || target === undefined || absorbed === undefined) break;
        deposit(target, absorbed);
        held.splice(j, 1);
        break;
      }
    }
    check();
  }

  return { core, journal, held };
}

// =============================================================================
// Properties
// =============================================================================

describe("supply invariants", () => {
  it("hold across random operation sequences", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 40 }), (ops) => {
        run(ops);
      }),
      { numRuns: 100 },
    );
  });

  it("are reproduced by replaying the journal", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 40 }), (ops) => {
        const { core, journal } = run(ops);
        const replayed = replaySupply(journal.read(currencyStreamId("XUS")));

        expect(replayed.totalValue).toBe(core.marketCap("XUS"));
        expect(replayed.preburnValue).toBe(core.preburnValue("XUS"));
      }),
      { numRuns: 50 },
    );
  });
});

describe("split/join round trip", () => {
  it("splitting a join at the first amount restores both amounts", () => {
    const core = new CurrencyCore();
    core.register(ROOT, "XUS");
    const cap = core.removeMintCapability(ROOT, "XUS");

    fc.assert(
      fc.property(arbAmount, arbAmount, (x, y) => {
        const a = core.mint(x, cap);
        const b = core.mint(y, cap);

        const [remainder, withdrawn] = split(join(a, b), x);

        expect(value(withdrawn)).toBe(x);
        expect(value(remainder)).toBe(y);
        expect(b.isConsumed).toBe(true);
      }),
      { numRuns: 100 },
    );
  });
});
