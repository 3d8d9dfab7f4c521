/**
 * Event Types
 *
 * Every committed state change is published as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - Events are replayable: same events → same state
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID for grouping related events across systems */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

export type EventSource = "invoices" | "ledger" | "node";

/**
 * A domain event, discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "invoice.created") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
