/**
 * @ledgerline/types: Shared domain types for the Ledgerline stack.
 *
 * Used across all packages:
 * - Party identity
 * - Invoice record and per-party statuses
 * - Financial primitives (Money, entries, accounts)
 * - Event architecture
 * - Collaborator contracts (clock, transfer rail)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types: meaning lives in consuming code
 */

// Party
export type { PartyId } from "./party.js";
export { ZERO_PARTY, isNullParty } from "./party.js";

// Invoice
export type {
  Invoice,
  IssuerStatus,
  RecipientStatus,
  InvoiceSide,
} from "./invoice.js";

// Financial types
export type {
  Money,
  Currency,
  LedgerEntry,
  LedgerEntryType,
  AccountRef,
} from "./financial.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Collaborators
export type {
  Clock,
  TransferRail,
  TransferRequest,
  TransferOutcome,
} from "./collaborators.js";
export { systemClock } from "./collaborators.js";

// Runtime type guards
export {
  isMoney,
  isAccountRef,
  isLedgerEntryType,
  isLedgerEntry,
  isIssuerStatus,
  isRecipientStatus,
  isInvoice,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
