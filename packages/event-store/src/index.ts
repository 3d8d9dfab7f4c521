/**
 * @ledgerline/event-store: Append-only event log.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain
 * - EventCatalog with payload validation
 * - Invoice domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  UnchainedEvent,
  StoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  HandlerErrorHook,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Invoice events
export { INVOICE_EVENTS, createInvoiceCatalog, invoiceStreamId } from "./invoice-events.js";
export type {
  InvoiceEventType,
  InvoiceCreatedPayload,
  InvoiceUpdatedPayload,
  PartyFundedPayload,
} from "./invoice-events.js";
