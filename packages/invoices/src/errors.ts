/**
 * Invoice errors.
 */

export type InvoiceErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_RECIPIENT"
  | "SELF_ASSIGNMENT"
  | "DUE_DATE_IN_PAST"
  | "INVALID_TRANSITION"
  | "NOT_APPROVED"
  | "AMOUNT_MISMATCH"
  | "TRANSFER_FAILED"
  | "VALIDATION_FAILED";

export class InvoiceError extends Error {
  public readonly code: InvoiceErrorCode;

  constructor(code: InvoiceErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InvoiceError";
    this.code = code;
  }
}
