/**
 * Approval state machine.
 *
 * Each party owns one status field. Approve, reject and modify share a
 * single table per side: the acting side's own status must be one of
 * `from`, and the result overwrites the fields named in `to`. The other
 * side's status is never checked.
 */

import type {
  Invoice,
  InvoiceSide,
  IssuerStatus,
  PartyId,
  RecipientStatus,
} from "@ledgerline/types";
import { InvoiceError } from "./errors.js";
import type { SweepPolicy } from "./types.js";

export type PartyAction = "approve" | "reject" | "modify";

export interface StatusPair {
  readonly issuerStatus: IssuerStatus;
  readonly recipientStatus: RecipientStatus;
}

interface Transition<S> {
  readonly from: readonly S[];
  readonly to: Partial<StatusPair>;
}

const ISSUER_TRANSITIONS: Readonly<Record<PartyAction, Transition<IssuerStatus>>> = {
  approve: { from: ["pending"], to: { issuerStatus: "approved" } },
  reject: { from: ["pending"], to: { issuerStatus: "rejected", recipientStatus: "rejected" } },
  modify: { from: ["pending"], to: { issuerStatus: "approved", recipientStatus: "pending" } },
};

const RECIPIENT_TRANSITIONS: Readonly<Record<PartyAction, Transition<RecipientStatus>>> = {
  approve: { from: ["pending"], to: { recipientStatus: "approved" } },
  reject: { from: ["pending"], to: { issuerStatus: "rejected", recipientStatus: "rejected" } },
  modify: { from: ["pending"], to: { issuerStatus: "pending", recipientStatus: "approved" } },
};

/**
 * The side the caller acts on. The recipient side wins when the caller
 * is both parties.
 */
export function sideOf(invoice: Invoice, caller: PartyId): InvoiceSide | undefined {
  if (invoice.recipient === caller) return "recipient";
  if (invoice.issuer === caller) return "issuer";
  return undefined;
}

/**
 * Apply a party action, or throw INVALID_TRANSITION.
 */
export function applyAction(
  invoice: Invoice,
  side: InvoiceSide,
  action: PartyAction,
): StatusPair {
  const current: StatusPair = {
    issuerStatus: invoice.issuerStatus,
    recipientStatus: invoice.recipientStatus,
  };

  let allowed: boolean;
  let to: Partial<StatusPair>;
  let own: string;
  if (side === "issuer") {
    const t = ISSUER_TRANSITIONS[action];
    allowed = t.from.includes(invoice.issuerStatus);
    to = t.to;
    own = invoice.issuerStatus;
  } else {
    const t = RECIPIENT_TRANSITIONS[action];
    allowed = t.from.includes(invoice.recipientStatus);
    to = t.to;
    own = invoice.recipientStatus;
  }

  if (!allowed) {
    throw new InvoiceError(
      "INVALID_TRANSITION",
      `Cannot ${action} invoice ${String(invoice.id)}: ${side} status is "${own}"`,
    );
  }

  return { ...current, ...to };
}

/**
 * Statuses after settlement, or throw NOT_APPROVED.
 */
export function applySettlement(invoice: Invoice): StatusPair {
  if (invoice.issuerStatus !== "approved" || invoice.recipientStatus !== "approved") {
    throw new InvoiceError(
      "NOT_APPROVED",
      `Invoice ${String(invoice.id)} is not approved by both parties (issuer: "${invoice.issuerStatus}", recipient: "${invoice.recipientStatus}")`,
    );
  }
  return { issuerStatus: "payment_received", recipientStatus: "paid" };
}

/**
 * Whether the overdue sweep may overwrite this recipient status.
 */
export function isSweepable(status: RecipientStatus, policy: SweepPolicy): boolean {
  switch (policy) {
    case "literal":
      // status != paid || status != rejected || status != overdue: holds for every status
      return true;
    case "skip-settled":
      return status !== "paid" && status !== "rejected" && status !== "overdue";
  }
}
