/**
 * @ledgerline/invoices: Two-party invoice book.
 *
 * - InvoiceBook: create, approve, reject, modify, pay, sweepOverdue
 * - Per-side approval state machine
 * - Invoice store with the per-party index
 * - WriteLock serializing mutations
 */

export { InvoiceBook } from "./invoice-book.js";
export { InvoiceStore } from "./invoice-store.js";
export { WriteLock } from "./write-lock.js";
export {
  applyAction,
  applySettlement,
  isSweepable,
  sideOf,
} from "./transitions.js";
export type { PartyAction, StatusPair } from "./transitions.js";
export { InvoiceError } from "./errors.js";
export type { InvoiceErrorCode } from "./errors.js";
export { silentLogger } from "./types.js";
export type {
  CreateInvoiceInput,
  ModifyInvoiceInput,
  PaymentResult,
  SweepPolicy,
  SettlementCurrency,
  InvoiceLogger,
  InvoiceBookOptions,
} from "./types.js";
