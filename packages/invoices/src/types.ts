/**
 * Invoice book types.
 */

import type {
  Clock,
  Invoice,
  Money,
  PartyId,
  TransferRail,
} from "@ledgerline/types";
import type { EventCatalog, EventStore } from "@ledgerline/event-store";

export interface CreateInvoiceInput {
  readonly issuerName: string;
  readonly clientName: string;
  readonly recipient: PartyId;
  readonly amount: Money;

  /** ISO 8601; must be after now */
  readonly dueDate: string;
  readonly message: string;
}

export interface ModifyInvoiceInput {
  readonly clientName: string;
  readonly amount: Money;
  readonly dueDate: string;
  readonly message: string;
}

export interface PaymentResult {
  readonly invoice: Invoice;

  /** Identifier the transfer rail gave the settlement */
  readonly transferId: string;
}

/**
 * Which recipient statuses the overdue sweep overwrites.
 *
 * - "literal": every past-due invoice, whatever its status
 * - "skip-settled": past-due invoices not yet paid, rejected or overdue
 */
export type SweepPolicy = "literal" | "skip-settled";

/**
 * Currency and scale every invoice amount must use.
 */
export interface SettlementCurrency {
  readonly currency: string;
  readonly decimals: number;
}

/**
 * Structured log sink. A pino logger satisfies it.
 */
export interface InvoiceLogger {
  info(obj: Record<string, unknown>, msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
}

export const silentLogger: InvoiceLogger = {
  info: () => undefined,
  warn: () => undefined,
};

export interface InvoiceBookOptions {
  /** The only party allowed to run the overdue sweep. Fixed for the book's lifetime. */
  readonly admin: PartyId;

  readonly rail: TransferRail;

  /** Notification log. Default: a fresh InMemoryEventStore */
  readonly events?: EventStore;

  /** Validates event payloads before they are appended */
  readonly catalog?: EventCatalog;

  readonly clock?: Clock;

  /** Default: "literal" */
  readonly sweepPolicy?: SweepPolicy;

  /** Default: any currency is accepted */
  readonly settlementCurrency?: SettlementCurrency;

  readonly logger?: InvoiceLogger;
}
