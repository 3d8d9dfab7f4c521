/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (InvoiceError, LedgerError, EventStoreError)
 * to HTTP status codes.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Invoice errors
  UNAUTHORIZED: 403,
  INVALID_RECIPIENT: 400,
  SELF_ASSIGNMENT: 400,
  DUE_DATE_IN_PAST: 400,
  VALIDATION_FAILED: 400,
  INVALID_TRANSITION: 409,
  NOT_APPROVED: 409,
  AMOUNT_MISMATCH: 422,
  TRANSFER_FAILED: 502,

  // Ledger errors
  INVALID_AMOUNT: 400,
  INVALID_MONEY: 400,
  CURRENCY_MISMATCH: 400,
  INSUFFICIENT_FUNDS: 422,
  SELF_TRANSFER: 400,

  // Event store errors
  CONCURRENCY_CONFLICT: 409,
};

function readCode(err: Error): string | undefined {
  const code: unknown = "code" in err ? err.code : undefined;
  return typeof code === "string" ? code : undefined;
}

export function statusForCode(code: string | undefined): ContentfulStatusCode {
  if (code !== undefined && Object.hasOwn(STATUS_MAP, code)) {
    return STATUS_MAP[code] ?? 500;
  }
  return 500;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = readCode(err);
  const status = statusForCode(code);

  // 500s never leak internals
  const message = status === 500 ? "Internal server error" : err.message;

  return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", message), status);
}
