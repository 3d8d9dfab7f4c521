/**
 * @ledgerline/event-store: Core types.
 *
 * Append-only event persistence for the notification log.
 *
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a contiguous version within its stream
 * - Concurrency control via expected version
 */

import type { DomainEvent, EventMetadata } from "@ledgerline/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store, before hash chaining.
 */
export interface UnchainedEvent {
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: Readonly<Record<string, unknown>>;
  }>;

  readonly streamId: string;

  /** Position within this stream (1-based) */
  readonly version: number;

  /** Position across all streams (1-based) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;
}

/**
 * A persisted event linked into the store's hash chain.
 */
export interface StoredEvent extends UnchainedEvent {
  /** SHA-256 of this event's canonical content + previousHash */
  readonly hash: string;
  readonly previousHash: string;
}

// =============================================================================
// Append / Read Options
// =============================================================================

/**
 * - A number: the stream must be at exactly this version before append
 * - "no_stream": the stream must not exist
 * - "any": no check
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly count: number;
}

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** Inclusive, 1-based. Default: 1 (forward) or the head (backward) */
  readonly fromVersion?: number;
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

export interface ReadAllOptions {
  /** Inclusive. Default: 1 */
  readonly fromPosition?: number;
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

// =============================================================================
// Subscription
// =============================================================================

export type EventHandler = (event: StoredEvent) => void;

/**
 * Receives an error thrown by a subscriber. The append that triggered
 * the delivery has already succeeded and is not affected.
 */
export type HandlerErrorHook = (error: unknown, event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;

  /** Global position of the last event whose hash checked out */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions increase by one per event
 * - Subscribers see events in append order
 */
export interface EventStore {
  /**
   * Append events to a stream, all or nothing.
   * @throws EventStoreError if the concurrency check fails
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /** Events of one stream; empty if the stream doesn't exist. */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Events across all streams in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribe(streamId: string, handler: EventHandler): Subscription;
  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  /** Version of the last event, or 0 */
  streamVersion(streamId: string): number;

  /** Position of the last event, or 0 */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
