/**
 * Tests for value-unit arithmetic and move-only handles.
 */

import { describe, it, expect } from "vitest";
import { CurrencyCore } from "../src/currency.js";
import {
  deposit,
  destroyZero,
  join,
  split,
  value,
  withdraw,
} from "../src/value-unit.js";
import {
  CurrencyMismatchError,
  InsufficientValueError,
  InvalidAmountError,
  NonZeroDestructionError,
  OverflowError,
  ResourceConsumedError,
} from "../src/types.js";
import { U64_MAX } from "../src/uint.js";

const ROOT = "0xa550c18";

function mintUnits(ceiling?: bigint) {
  const core = new CurrencyCore(
    ceiling !== undefined ? { config: { rootAuthority: ROOT, mintCeiling: ceiling } } : {},
  );
  core.register(ROOT, "XUS");
  const cap = core.removeMintCapability(ROOT, "XUS");
  return { core, mint: (amount: bigint) => core.mint(amount, cap) };
}

describe("withdraw", () => {
  it("moves 30 out of a 100 unit", () => {
    const { mint } = mintUnits();
    const unit = mint(100n);

    const taken = withdraw(unit, 30n);

    expect(value(unit)).toBe(70n);
    expect(value(taken)).toBe(30n);
    expect(taken.currency).toBe("XUS");
  });

  it("fails on insufficient value and leaves the unit untouched", () => {
    const { mint } = mintUnits();
    const unit = mint(100n);

    expect(() => withdraw(unit, 150n)).toThrow(InsufficientValueError);
    expect(() => withdraw(unit, 150n)).toThrow("Cannot withdraw 150 from a unit holding 100");
    expect(value(unit)).toBe(100n);
  });

  it("allows withdrawing everything", () => {
    const { mint } = mintUnits();
    const unit = mint(5n);

    expect(value(withdraw(unit, 5n))).toBe(5n);
    expect(value(unit)).toBe(0n);
  });

  it("rejects negative amounts", () => {
    const { mint } = mintUnits();
    expect(() => withdraw(mint(5n), -1n)).toThrow(InvalidAmountError);
  });
});

describe("split", () => {
  it("returns the shrunken source and the withdrawn part", () => {
    const { mint } = mintUnits();
    const unit = mint(100n);

    const [remainder, withdrawn] = split(unit, 40n);

    expect(remainder).toBe(unit);
    expect(value(remainder)).toBe(60n);
    expect(value(withdrawn)).toBe(40n);
  });

  it("undoes a join", () => {
    const { mint } = mintUnits();
    const a = mint(30n);
    const b = mint(70n);
    const valueA = value(a);

    const [remainder, withdrawn] = split(join(a, b), valueA);

    expect(value(withdrawn)).toBe(30n);
    expect(value(remainder)).toBe(70n);
  });
});

describe("deposit and join", () => {
  it("merges and consumes the absorbed unit", () => {
    const { mint } = mintUnits();
    const a = mint(10n);
    const b = mint(15n);

    const merged = join(a, b);

    expect(merged).toBe(a);
    expect(value(a)).toBe(25n);
    expect(b.isConsumed).toBe(true);
    expect(() => b.amount).toThrow(ResourceConsumedError);
    expect(() => value(b)).toThrow("value-unit has already been moved or consumed");
  });

  it("rejects depositing a unit into itself", () => {
    const { mint } = mintUnits();
    const a = mint(10n);

    expect(() => deposit(a, a)).toThrow("value-unit cannot be deposited into itself");
    expect(value(a)).toBe(10n);
  });

  it("rejects merging a consumed unit", () => {
    const { mint } = mintUnits();
    const a = mint(1n);
    const b = mint(2n);
    const c = mint(3n);
    deposit(a, b);

    expect(() => deposit(c, b)).toThrow(ResourceConsumedError);
    expect(value(c)).toBe(3n);
  });

  it("rejects merging units of different currencies", () => {
    const core = new CurrencyCore();
    core.register(ROOT, "XUS");
    core.register(ROOT, "EUR");
    const xus = core.mintWithSenderCapability(ROOT, "XUS", 1n);
    const eur = core.mintWithSenderCapability(ROOT, "EUR", 2n);

    expect(() => deposit<string>(xus, eur)).toThrow(CurrencyMismatchError);
    expect(() => deposit<string>(xus, eur)).toThrow('Expected currency "XUS", got "EUR"');
    expect(value(xus)).toBe(1n);
    expect(value(eur)).toBe(2n);
  });

  it("rejects a sum beyond u64 and keeps both units", () => {
    const { mint } = mintUnits(U64_MAX);
    const big = mint(U64_MAX);
    const one = mint(1n);

    expect(() => deposit(big, one)).toThrow(OverflowError);
    expect(value(big)).toBe(U64_MAX);
    expect(value(one)).toBe(1n);
  });
});

describe("destroyZero", () => {
  it("consumes an empty unit", () => {
    const { core } = mintUnits();
    const unit = core.zero("XUS");

    destroyZero(unit);

    expect(unit.isConsumed).toBe(true);
  });

  it("refuses a unit holding value", () => {
    const { mint } = mintUnits();
    const unit = mint(5n);

    expect(() => destroyZero(unit)).toThrow(NonZeroDestructionError);
    expect(() => destroyZero(unit)).toThrow("Cannot destroy a XUS unit holding 5");
    expect(value(unit)).toBe(5n);
  });

  it("refuses a unit that was already destroyed", () => {
    const { core } = mintUnits();
    const unit = core.zero("XUS");
    destroyZero(unit);

    expect(() => destroyZero(unit)).toThrow(ResourceConsumedError);
  });
});

describe("toString", () => {
  it("shows the amount while live and a marker once consumed", () => {
    const { core } = mintUnits();
    const unit = core.zero("XUS");

    expect(unit.toString()).toBe("ValueUnit<XUS>(0)");
    destroyZero(unit);
    expect(unit.toString()).toBe("ValueUnit<XUS>(consumed)");
  });
});
