/**
 * @mintage/currency — Core currency engine.
 *
 * Mints, escrows and burns units of registered currencies while keeping
 * every supply counter exact.
 *
 * API surface:
 * - register() — Root authority publishes a capability and a zeroed supply ledger
 * - mint() / mintWithSenderCapability() — Issue new units
 * - preburn() / preburnToSender() — Escrow a unit for destruction
 * - burn() / cancelBurn() (+ sender-capability variants) — Resolve the oldest request
 * - newPreburn() / createPreburn() / publishPreburn() / removePreburn() / destroyPreburn()
 * - publishMintCapability() / removeMintCapability()
 * - zero() — An empty unit of a registered currency
 * - marketCap() / preburnValue() / supplyInfo() / pendingRequests() — Queries
 *
 * Every operation is synchronous and runs in three phases: check every
 * precondition, append the journal event, then mutate. Nothing in the last
 * phase can throw, so an operation either commits completely or throws
 * with no observable effect.
 */

import { randomUUID } from "node:crypto";
import type { Address, CurrencyCode, DomainEvent } from "@mintage/types";
import { isAddress, isCurrencyCode, normalizeAddress } from "@mintage/types";
import type { EventStore } from "@mintage/event-store";
import type { Logger } from "pino";
import { DEFAULT_CURRENCY_CONFIG } from "./config.js";
import { CURRENCY_EVENTS, currencyStreamId } from "./events.js";
import type { CurrencyEventPayload, CurrencyEventType } from "./events.js";
import { silentLogger } from "./logger.js";
import { MintCapability } from "./mint-capability.js";
import { PreburnQueue } from "./preburn-queue.js";
import { INTERNAL } from "./resource.js";
import { InMemoryResourceStore, describeKey } from "./store.js";
import type { ResourceKey, ResourceStore, StoredKind } from "./store.js";
import { SupplyLedger } from "./supply-ledger.js";
import type { CurrencyConfig, RegisterOptions, SupplySnapshot } from "./types.js";
import {
  AlreadyExistsError,
  AuthorizationError,
  CurrencyMismatchError,
  EmptyQueueError,
  InvalidAddressError,
  InvalidCurrencyError,
  LimitExceededError,
  NonZeroDestructionError,
  NotFoundError,
  NotRegisteredError,
} from "./types.js";
import { assertU64 } from "./uint.js";
import { ValueUnit } from "./value-unit.js";

export interface CurrencyCoreOptions {
  readonly config?: CurrencyConfig | undefined;
  /** Keyed storage; several cores may share one. */
  readonly store?: ResourceStore | undefined;
  /** Journal receiving one event per committed supply change. */
  readonly journal?: EventStore | undefined;
  readonly logger?: Logger | undefined;
}

export class CurrencyCore {
  private readonly _config: CurrencyConfig;
  private readonly _store: ResourceStore;
  private readonly _journal: EventStore | undefined;
  private readonly _logger: Logger;

  constructor(options?: CurrencyCoreOptions) {
    const config = options?.config ?? DEFAULT_CURRENCY_CONFIG;
    this._config = {
      rootAuthority: toAddress(config.rootAuthority),
      mintCeiling: config.mintCeiling,
    };
    this._store = options?.store ?? new InMemoryResourceStore();
    this._journal = options?.journal;
    this._logger = options?.logger ?? silentLogger();
  }

  get rootAuthority(): Address {
    return this._config.rootAuthority;
  }

  get mintCeiling(): bigint {
    return this._config.mintCeiling;
  }

  // ─── Registration ────────────────────────────────────────────────────

  /**
   * Register a currency. Only the root authority may call this, once per
   * currency. Publishes the currency's only MintCapability and a zeroed
   * SupplyLedger at the root authority's address.
   */
  register(caller: Address, currency: CurrencyCode, options?: RegisterOptions): void {
    const sender = toAddress(caller);
    assertCurrencyCode(currency);
    if (sender !== this._config.rootAuthority) {
      throw new AuthorizationError(
        `Only the root authority ${this._config.rootAuthority} may register currencies, not ${sender}`,
      );
    }

    const capabilityKey = key(sender, "mint-capability", currency);
    const ledgerKey = key(sender, "supply-ledger", currency);
    for (const k of [capabilityKey, ledgerKey]) {
      if (this._store.has(k)) {
        throw new AlreadyExistsError(`${describeKey(k)} already exists`);
      }
    }
    const ledger = new SupplyLedger(currency, options?.scalingFactor, options?.fractionalPart);

    this._record(currency, CURRENCY_EVENTS.REGISTERED, sender, { amount: "0" });

    this._store.insert(ledgerKey, ledger);
    this._store.insert(capabilityKey, new MintCapability(INTERNAL, currency));
    this._logger.info(
      { currency, scalingFactor: ledger.scalingFactor.toString() },
      "Currency registered",
    );
  }

  isRegistered(currency: CurrencyCode): boolean {
    return this._store.has(key(this._config.rootAuthority, "supply-ledger", currency));
  }

  // ─── Minting ─────────────────────────────────────────────────────────

  /**
   * Mint `amount` new units with a capability the caller holds.
   *
   * @throws LimitExceededError if `amount` is above the per-call ceiling
   * @throws OverflowError if total supply would leave the u128 range
   */
  mint<C extends CurrencyCode>(amount: bigint, capability: MintCapability<C>): ValueUnit<C> {
    capability.assertLive();
    return this._mint(capability.currency, amount, "mint-capability");
  }

  /**
   * Mint using the capability published at the caller's own address.
   */
  mintWithSenderCapability<C extends CurrencyCode>(
    caller: Address,
    currency: C,
    amount: bigint,
  ): ValueUnit<C> {
    const sender = toAddress(caller);
    this._senderCapability(sender, currency);
    return this._mint(currency, amount, sender);
  }

  private _mint<C extends CurrencyCode>(currency: C, amount: bigint, actor: string): ValueUnit<C> {
    const ledger = this._ledger(currency);
    assertU64(amount);
    if (amount > this._config.mintCeiling) {
      throw new LimitExceededError(amount, this._config.mintCeiling);
    }
    const next = ledger.afterMint(amount);

    this._record(currency, CURRENCY_EVENTS.MINTED, actor, { amount: amount.toString() });

    ledger.commit(INTERNAL, next);
    this._logger.debug({ currency, amount: amount.toString(), actor }, "Minted");
    return new ValueUnit(INTERNAL, currency, amount);
  }

  // ─── Preburn ─────────────────────────────────────────────────────────

  /**
   * Move `unit` to the back of `queue`. The caller's handle is consumed.
   *
   * @throws OverflowError if escrowed value would leave the u64 range
   */
  preburn<C extends CurrencyCode>(queue: PreburnQueue<C>, unit: ValueUnit<C>): void {
    this._preburn(queue, unit, undefined);
  }

  /**
   * Preburn into the queue published at the caller's own address.
   */
  preburnToSender<C extends CurrencyCode>(caller: Address, unit: ValueUnit<C>): void {
    const sender = toAddress(caller);
    unit.assertLive();
    const queue = this._store.get(key(sender, "preburn-queue", unit.currency));
    if (queue === undefined) {
      throw new NotFoundError(`No ${unit.currency} preburn queue at ${sender}`);
    }
    this._preburn(queue, unit, sender);
  }

  private _preburn(queue: PreburnQueue, unit: ValueUnit, address: Address | undefined): void {
    queue.assertLive();
    unit.assertLive();
    if (queue.currency !== unit.currency) {
      throw new CurrencyMismatchError(queue.currency, unit.currency);
    }
    const ledger = this._ledger(queue.currency);
    const amount = unit.amount;
    const next = ledger.afterPreburn(amount);

    this._record(queue.currency, CURRENCY_EVENTS.PREBURNED, address ?? "preburn-queue", {
      amount: amount.toString(),
      ...(address !== undefined ? { address } : {}),
    });

    ledger.commit(INTERNAL, next);
    queue._enqueue(INTERNAL, unit._moveAs(INTERNAL, unit.currency));
    this._logger.debug(
      { currency: queue.currency, amount: amount.toString(), address },
      "Preburn requested",
    );
  }

  // ─── Burn Resolution ─────────────────────────────────────────────────

  /**
   * Destroy the oldest request in the queue at `address`.
   * Both total and escrowed value drop by its amount.
   */
  burn<C extends CurrencyCode>(address: Address, capability: MintCapability<C>): void {
    capability.assertLive();
    this._burn(toAddress(address), capability.currency, "mint-capability");
  }

  /**
   * Burn using the capability published at the caller's own address.
   */
  burnWithSenderCapability(caller: Address, address: Address, currency: CurrencyCode): void {
    const sender = toAddress(caller);
    this._senderCapability(sender, currency);
    this._burn(toAddress(address), currency, sender);
  }

  /**
   * Return the oldest request in the queue at `address` intact.
   * Escrowed value drops by its amount; total supply is unchanged.
   */
  cancelBurn<C extends CurrencyCode>(address: Address, capability: MintCapability<C>): ValueUnit<C> {
    capability.assertLive();
    return this._cancelBurn(toAddress(address), capability.currency, "mint-capability");
  }

  /**
   * Cancel a burn using the capability published at the caller's own address.
   */
  cancelBurnWithSenderCapability<C extends CurrencyCode>(
    caller: Address,
    address: Address,
    currency: C,
  ): ValueUnit<C> {
    const sender = toAddress(caller);
    this._senderCapability(sender, currency);
    return this._cancelBurn(toAddress(address), currency, sender);
  }

  private _burn(address: Address, currency: CurrencyCode, actor: string): void {
    const { queue, ledger, amount } = this._front(address, currency);
    const next = ledger.afterBurn(amount);

    this._record(currency, CURRENCY_EVENTS.BURNED, actor, {
      amount: amount.toString(),
      address,
    });

    ledger.commit(INTERNAL, next);
    queue._dequeue(INTERNAL)?._consume(INTERNAL);
    this._logger.debug({ currency, amount: amount.toString(), address, actor }, "Burned");
  }

  private _cancelBurn<C extends CurrencyCode>(
    address: Address,
    currency: C,
    actor: string,
  ): ValueUnit<C> {
    const { queue, ledger, amount } = this._front(address, currency);
    const next = ledger.afterCancel(amount);

    this._record(currency, CURRENCY_EVENTS.BURN_CANCELLED, actor, {
      amount: amount.toString(),
      address,
    });

    ledger.commit(INTERNAL, next);
    const returned = queue._dequeue(INTERNAL)?._moveAs(INTERNAL, currency);
    if (returned === undefined) {
      // _front saw a request, so the queue cannot be empty here.
      throw new EmptyQueueError(address, currency);
    }
    this._logger.debug({ currency, amount: amount.toString(), address, actor }, "Burn cancelled");
    return returned;
  }

  /** Locate the oldest request at `address` and the ledger it counts against. */
  private _front(address: Address, currency: CurrencyCode) {
    const queue = this._store.get(key(address, "preburn-queue", currency));
    if (queue === undefined) {
      throw new NotFoundError(`No ${currency} preburn queue at ${address}`);
    }
    const amount = queue.peek();
    if (amount === undefined) {
      throw new EmptyQueueError(address, currency);
    }
    return { queue, ledger: this._ledger(currency), amount };
  }

  // ─── Preburn Queue Lifecycle ─────────────────────────────────────────

  /**
   * A fresh, empty, unapproved queue for a registered currency.
   */
  newPreburn<C extends CurrencyCode>(currency: C): PreburnQueue<C> {
    assertCurrencyCode(currency);
    this._ledger(currency);
    return new PreburnQueue(INTERNAL, currency);
  }

  /**
   * Create a queue and publish it at the caller's address in one step.
   */
  createPreburn(caller: Address, currency: CurrencyCode): void {
    const sender = toAddress(caller);
    const k = key(sender, "preburn-queue", currency);
    if (this._store.has(k)) {
      throw new AlreadyExistsError(`${describeKey(k)} already exists`);
    }
    this.publishPreburn(sender, this.newPreburn(currency));
  }

  /**
   * Move a queue into the caller's account. The passed handle is consumed.
   */
  publishPreburn<C extends CurrencyCode>(caller: Address, queue: PreburnQueue<C>): void {
    const sender = toAddress(caller);
    queue.assertLive();
    const k = key(sender, "preburn-queue", queue.currency);
    if (this._store.has(k)) {
      throw new AlreadyExistsError(`${describeKey(k)} already exists`);
    }
    this._store.insert(k, queue._moveAs(INTERNAL, queue.currency));
  }

  /**
   * Move the queue out of the caller's account and hand it back.
   */
  removePreburn<C extends CurrencyCode>(caller: Address, currency: C): PreburnQueue<C> {
    const sender = toAddress(caller);
    const k = key(sender, "preburn-queue", currency);
    if (!this._store.has(k)) {
      throw new NotFoundError(`${describeKey(k)} does not exist`);
    }
    return this._store.remove(k)._moveAs(INTERNAL, currency);
  }

  /**
   * Consume an empty queue.
   *
   * @throws NonZeroDestructionError if requests are still pending
   */
  destroyPreburn<C extends CurrencyCode>(queue: PreburnQueue<C>): void {
    if (queue.length > 0) {
      throw new NonZeroDestructionError(
        `Cannot destroy a ${queue.currency} preburn queue with ${String(queue.length)} pending request(s)`,
      );
    }
    queue._consume(INTERNAL);
  }

  /**
   * Mark the queue at `address` approved. Stored only; preburn does not
   * consult it.
   */
  approvePreburn<C extends CurrencyCode>(address: Address, capability: MintCapability<C>): void {
    capability.assertLive();
    const target = toAddress(address);
    const queue = this._store.get(key(target, "preburn-queue", capability.currency));
    if (queue === undefined) {
      throw new NotFoundError(`No ${capability.currency} preburn queue at ${target}`);
    }
    queue._approve(INTERNAL);
  }

  // ─── Capability Lifecycle ────────────────────────────────────────────

  /**
   * Move a capability into the caller's account. The passed handle is consumed.
   */
  publishMintCapability<C extends CurrencyCode>(caller: Address, capability: MintCapability<C>): void {
    const sender = toAddress(caller);
    capability.assertLive();
    const k = key(sender, "mint-capability", capability.currency);
    if (this._store.has(k)) {
      throw new AlreadyExistsError(`${describeKey(k)} already exists`);
    }
    this._store.insert(k, capability._moveAs(INTERNAL, capability.currency));
  }

  /**
   * Move the capability out of the caller's account and hand it back.
   */
  removeMintCapability<C extends CurrencyCode>(caller: Address, currency: C): MintCapability<C> {
    const sender = toAddress(caller);
    const k = key(sender, "mint-capability", currency);
    if (!this._store.has(k)) {
      throw new NotFoundError(`${describeKey(k)} does not exist`);
    }
    return this._store.remove(k)._moveAs(INTERNAL, currency);
  }

  /** True if a capability for `currency` is published at `address`. */
  hasMintCapability(address: Address, currency: CurrencyCode): boolean {
    return this._store.has(key(toAddress(address), "mint-capability", currency));
  }

  private _senderCapability(sender: Address, currency: CurrencyCode): MintCapability {
    const capability = this._store.get(key(sender, "mint-capability", currency));
    if (capability === undefined) {
      throw new NotFoundError(`${sender} holds no ${currency} mint capability`);
    }
    capability.assertLive();
    return capability;
  }

  // ─── Value Units ─────────────────────────────────────────────────────

  /**
   * An empty unit of a registered currency.
   */
  zero<C extends CurrencyCode>(currency: C): ValueUnit<C> {
    this._ledger(currency);
    return new ValueUnit(INTERNAL, currency, 0n);
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /** Total value in existence, including escrowed requests. */
  marketCap(currency: CurrencyCode): bigint {
    return this._ledger(currency).totalValue;
  }

  /** Value currently waiting in preburn queues. */
  preburnValue(currency: CurrencyCode): bigint {
    return this._ledger(currency).preburnValue;
  }

  supplyInfo(currency: CurrencyCode): SupplySnapshot {
    return this._ledger(currency).snapshot();
  }

  hasPreburn(address: Address, currency: CurrencyCode): boolean {
    return this._store.has(key(toAddress(address), "preburn-queue", currency));
  }

  /** Amounts waiting in the queue at `address`, oldest first. */
  pendingRequests(address: Address, currency: CurrencyCode): readonly bigint[] {
    const target = toAddress(address);
    const queue = this._store.get(key(target, "preburn-queue", currency));
    if (queue === undefined) {
      throw new NotFoundError(`No ${currency} preburn queue at ${target}`);
    }
    return queue.pendingAmounts();
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _ledger(currency: CurrencyCode): SupplyLedger {
    const ledger = this._store.get(key(this._config.rootAuthority, "supply-ledger", currency));
    if (ledger === undefined) {
      throw new NotRegisteredError(currency);
    }
    return ledger;
  }

  /**
   * Append the event for a change that has passed every check. Runs before
   * the change is applied; if the journal rejects it, nothing is applied.
   */
  private _record(
    currency: CurrencyCode,
    type: CurrencyEventType,
    actor: string,
    payload: CurrencyEventPayload,
  ): void {
    if (this._journal === undefined) {
      return;
    }

    const eventId = randomUUID();
    const event: DomainEvent = {
      type,
      metadata: {
        eventId,
        timestamp: new Date().toISOString(),
        actor,
        correlationId: eventId,
        source: "currency",
      },
      payload: { ...payload },
    };
    this._journal.append(currencyStreamId(currency), [event]);
  }
}

/** Canonical address, or InvalidAddressError. */
function toAddress(raw: Address): Address {
  if (typeof raw !== "string" || !isAddress(raw.trim())) {
    throw new InvalidAddressError(raw);
  }
  return normalizeAddress(raw);
}

function assertCurrencyCode(currency: CurrencyCode): void {
  if (!isCurrencyCode(currency)) {
    throw new InvalidCurrencyError(currency);
  }
}

function key<K extends StoredKind>(
  address: Address,
  kind: K,
  currency: CurrencyCode,
): ResourceKey<K> {
  return { address, kind, currency };
}
