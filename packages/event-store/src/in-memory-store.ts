/**
 * @ledgerline/event-store: In-memory EventStore implementation.
 *
 * Per-stream arrays plus one global log. Subscribers are called
 * synchronously on append, after the events are stored. A subscriber
 * that throws is reported to the error hook and never fails the append.
 * State is lost on process exit.
 */

import { systemClock, type Clock, type DomainEvent } from "@ledgerline/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  HandlerErrorHook,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
  UnchainedEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();
  private readonly _clock: Clock;
  private readonly _onHandlerError: HandlerErrorHook | undefined;
  private _lastHash: string = GENESIS_HASH;

  constructor(clock: Clock = systemClock, onHandlerError?: HandlerErrorHook) {
    this._clock = clock;
    this._onHandlerError = onHandlerError;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const currentVersion = this.streamVersion(streamId);
    const expectedVersion = options?.expectedVersion ?? "any";

    if (expectedVersion === "no_stream" && currentVersion !== 0) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" already exists (version ${String(currentVersion)}), expected no_stream`,
        streamId,
      );
    }
    if (typeof expectedVersion === "number" && currentVersion !== expectedVersion) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${String(currentVersion)}, expected ${String(expectedVersion)}`,
        streamId,
      );
    }

    let stream = this._streams.get(streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(streamId, stream);
    }

    const fromVersion = currentVersion + 1;
    const appendedAt = this._clock.now().toISOString();
    const stored: StoredEvent[] = [];

    events.forEach((event, i) => {
      const base: UnchainedEvent = {
        event: { type: event.type, metadata: event.metadata, payload: event.payload },
        streamId,
        version: fromVersion + i,
        globalPosition: this._globalLog.length + 1,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const chained: StoredEvent = {
        ...base,
        hash: computeEventHash(base, previousHash),
        previousHash,
      };

      this._lastHash = chained.hash;
      stream.push(chained);
      this._globalLog.push(chained);
      stored.push(chained);
    });

    this._dispatch(streamId, stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const stream = this._streams.get(streamId) ?? [];
    const direction = options?.direction ?? "forward";
    const fromVersion = options?.fromVersion ?? (direction === "forward" ? 1 : stream.length);

    if (fromVersion < 1 && stream.length > 0) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${String(fromVersion)}`,
        streamId,
      );
    }

    const result = direction === "forward"
      ? stream.filter((e) => e.version >= fromVersion)
      : stream.filter((e) => e.version <= fromVersion).reverse();

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const direction = options?.direction ?? "forward";
    const fromPosition = options?.fromPosition ?? (direction === "forward" ? 1 : this._globalLog.length);

    const result = direction === "forward"
      ? this._globalLog.filter((e) => e.globalPosition >= fromPosition)
      : this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse();

    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    subscribers.add(handler);
    const set = subscribers;

    return {
      unsubscribe: () => {
        set.delete(handler);
        if (set.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);
    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.trim().length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const streamSubs = this._streamSubscribers.get(streamId);
    for (const event of events) {
      if (streamSubs !== undefined) {
        for (const handler of streamSubs) this._deliver(handler, event);
      }
      for (const handler of this._globalSubscribers) this._deliver(handler, event);
    }
  }

  private _deliver(handler: EventHandler, event: StoredEvent): void {
    try {
      handler(event);
    } catch (err) {
      // Without a hook the failure is dropped; the remaining handlers still run.
      this._onHandlerError?.(err, event);
    }
  }
}

function limit(events: StoredEvent[], maxCount: number | undefined): readonly StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
