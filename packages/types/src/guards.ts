/**
 * Runtime Type Guards
 *
 * Narrowing functions for domain types, used at system boundaries
 * (API inputs, deserialized snapshots, event payloads).
 */

import type { Money, AccountRef, LedgerEntry, LedgerEntryType } from "./financial.js";
import type { Invoice, IssuerStatus, RecipientStatus } from "./invoice.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Financial guards
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

const ACCOUNT_TYPES = new Set(["asset", "liability", "income", "expense", "equity"]);
const ENTRY_TYPES = new Set<string>(["debit", "credit"]);

export function isMoney(value: unknown): value is Money {
  if (!isRecord(value)) return false;
  return (
    typeof value.amount === "string" &&
    typeof value.currency === "string" &&
    typeof value.decimals === "number" &&
    Number.isInteger(value.decimals) &&
    value.decimals >= 0
  );
}

export function isAccountRef(value: unknown): value is AccountRef {
  if (!isRecord(value)) return false;
  return (
    typeof value.id === "string" &&
    value.id.length > 0 &&
    typeof value.type === "string" &&
    ACCOUNT_TYPES.has(value.type) &&
    typeof value.name === "string"
  );
}

export function isLedgerEntryType(value: unknown): value is LedgerEntryType {
  return typeof value === "string" && ENTRY_TYPES.has(value);
}

export function isLedgerEntry(value: unknown): value is LedgerEntry {
  if (!isRecord(value)) return false;
  return (
    typeof value.id === "string" &&
    typeof value.accountId === "string" &&
    isLedgerEntryType(value.type) &&
    isMoney(value.money) &&
    typeof value.timestamp === "string" &&
    typeof value.correlationId === "string"
  );
}

// =============================================================================
// Invoice guards
// =============================================================================

const ISSUER_STATUSES = new Set<string>([
  "pending", "approved", "payment_received", "rejected",
]);

const RECIPIENT_STATUSES = new Set<string>([
  "pending", "approved", "paid", "overdue", "rejected",
]);

export function isIssuerStatus(value: unknown): value is IssuerStatus {
  return typeof value === "string" && ISSUER_STATUSES.has(value);
}

export function isRecipientStatus(value: unknown): value is RecipientStatus {
  return typeof value === "string" && RECIPIENT_STATUSES.has(value);
}

export function isInvoice(value: unknown): value is Invoice {
  if (!isRecord(value)) return false;
  return (
    typeof value.id === "number" &&
    Number.isInteger(value.id) &&
    value.id > 0 &&
    typeof value.issuerName === "string" &&
    typeof value.clientName === "string" &&
    typeof value.issuer === "string" &&
    typeof value.recipient === "string" &&
    isMoney(value.amount) &&
    typeof value.dueDate === "string" &&
    isIssuerStatus(value.issuerStatus) &&
    isRecipientStatus(value.recipientStatus) &&
    typeof value.creationDate === "string" &&
    typeof value.lastModifiedDate === "string" &&
    typeof value.message === "string"
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["invoices", "ledger", "node"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    typeof value.source === "string" &&
    EVENT_SOURCES.has(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    isEventMetadata(value.metadata) &&
    value.payload !== null &&
    typeof value.payload === "object"
  );
}
