/**
 * Invoice Types
 *
 * An invoice carries two independent status fields, one per party.
 * Each side moves its own field; rejection is the only transition
 * that writes both.
 *
 * Rules:
 * - Records are immutable values; every mutation produces a new record
 * - Timestamps are ISO 8601 strings
 * - Amounts are Money (decimal strings, never floats)
 */

import type { Money } from "./financial.js";
import type { PartyId } from "./party.js";

/**
 * The issuer's view of an invoice.
 */
export type IssuerStatus =
  | "pending"
  | "approved"
  | "payment_received"
  | "rejected";

/**
 * The recipient's view of an invoice.
 */
export type RecipientStatus =
  | "pending"
  | "approved"
  | "paid"
  | "overdue"
  | "rejected";

/**
 * Which side of the invoice a party acts for.
 */
export type InvoiceSide = "issuer" | "recipient";

export interface Invoice {
  /** Positive, assigned in creation order, never reused */
  readonly id: number;

  /** Free-text label of the issuing party */
  readonly issuerName: string;

  /** Free-text label of the paying party */
  readonly clientName: string;

  /** Creator of the invoice, owed the amount */
  readonly issuer: PartyId;

  /** Counterparty, obligated to pay */
  readonly recipient: PartyId;

  readonly amount: Money;

  /** ISO 8601 */
  readonly dueDate: string;

  readonly issuerStatus: IssuerStatus;
  readonly recipientStatus: RecipientStatus;

  /** Set once at creation */
  readonly creationDate: string;

  /** Updated on every successful mutation */
  readonly lastModifiedDate: string;

  readonly message: string;
}
