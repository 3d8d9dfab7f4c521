/**
 * @ledgerline/event-store: Invoice domain events.
 *
 * Naming convention: `<entity>.<action>`.
 */

import {
  isIssuerStatus,
  isMoney,
  isRecipientStatus,
  type IssuerStatus,
  type Money,
  type PartyId,
  type RecipientStatus,
} from "@ledgerline/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Payloads
// =============================================================================

export type InvoiceCreatedPayload = {
  readonly invoiceId: number;
  readonly issuer: PartyId;
  readonly recipient: PartyId;
  readonly amount: Money;
  readonly dueDate: string;
};

export type InvoiceUpdatedPayload = {
  readonly invoiceId: number;
  readonly issuerStatus: IssuerStatus;
  readonly recipientStatus: RecipientStatus;
};

export type PartyFundedPayload = {
  readonly party: PartyId;
  readonly amount: Money;
  readonly correlationId: string;
};

// =============================================================================
// Event Types
// =============================================================================

export const INVOICE_EVENTS = {
  CREATED: "invoice.created",
  UPDATED: "invoice.updated",
  PARTY_FUNDED: "ledger.party.funded",
} as const;

export type InvoiceEventType = (typeof INVOICE_EVENTS)[keyof typeof INVOICE_EVENTS];

/**
 * Stream holding one invoice's events.
 */
export function invoiceStreamId(invoiceId: number): string {
  return `invoice-${String(invoiceId)}`;
}

// =============================================================================
// Schemas
// =============================================================================

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function isInvoiceId(v: unknown): boolean {
  return typeof v === "number" && Number.isInteger(v) && v > 0;
}

const SCHEMAS: readonly EventSchema[] = [
  {
    type: INVOICE_EVENTS.CREATED,
    version: 1,
    description: "An issuer created an invoice addressed to a recipient",
    source: "invoices",
    validate: (p): p is InvoiceCreatedPayload =>
      isObject(p) &&
      isInvoiceId(p.invoiceId) &&
      typeof p.issuer === "string" &&
      typeof p.recipient === "string" &&
      isMoney(p.amount) &&
      typeof p.dueDate === "string",
  },
  {
    type: INVOICE_EVENTS.UPDATED,
    version: 1,
    description: "An invoice's approval, payment or overdue status changed",
    source: "invoices",
    validate: (p): p is InvoiceUpdatedPayload =>
      isObject(p) &&
      isInvoiceId(p.invoiceId) &&
      isIssuerStatus(p.issuerStatus) &&
      isRecipientStatus(p.recipientStatus),
  },
  {
    type: INVOICE_EVENTS.PARTY_FUNDED,
    version: 1,
    description: "Value was issued to a party's ledger account",
    source: "ledger",
    validate: (p): p is PartyFundedPayload =>
      isObject(p) &&
      typeof p.party === "string" &&
      isMoney(p.amount) &&
      typeof p.correlationId === "string",
  },
];

/**
 * A catalog with every invoice event registered.
 */
export function createInvoiceCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}
