/**
 * @mintage/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for:
 * - Unit and integration tests
 * - Single-process deployments where the journal is replayed elsewhere
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - No durability guarantees
 */

import type { DomainEvent } from "@mintage/types";
import type {
  AppendResult,
  EventStore,
  EventStoreIntegrityResult,
  ReadOptions,
  StoredEvent,
  UnhashedStoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Source of `appendedAt` timestamps. Default: wall clock. */
  readonly clock?: (() => Date) | undefined;
}

/**
 * In-memory event store.
 *
 * Events live in two structures:
 * - Per-stream arrays (indexed by streamId) for stream reads
 * - A global array in append order for chain verification
 */
export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _clock: () => Date;
  private _lastHash: string = GENESIS_HASH;

  constructor(options?: InMemoryEventStoreOptions) {
    this._clock = options?.clock ?? (() => new Date());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const fromVersion = this.streamVersion(streamId) + 1;
    const appendedAt = this._clock().toISOString();

    // Link the whole batch before touching either log.
    let previousHash = this._lastHash;
    const records = events.map((event, i): StoredEvent => {
      const base: UnhashedStoredEvent = {
        event,
        streamId,
        version: fromVersion + i,
        globalPosition: this._globalLog.length + i + 1,
        appendedAt,
      };
      const record: StoredEvent = {
        ...base,
        hash: computeEventHash(base, previousHash),
        previousHash,
      };
      previousHash = record.hash;
      return record;
    });

    const stream = this._streams.get(streamId) ?? [];
    stream.push(...records);
    this._streams.set(streamId, stream);
    this._globalLog.push(...records);
    this._lastHash = previousHash;

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    return stream.filter((e) => e.version >= fromVersion);
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        "Stream ID must be a non-empty string",
      );
    }
  }
}
