/**
 * Type barrel: re-exports all public types from @ledgerline/node.
 */

// DTOs
export {
  MoneySchema,
  InvoiceIdSchema,
  PartyParamSchema,
  CreateInvoiceSchema,
  ModifyInvoiceSchema,
  PayInvoiceSchema,
  ListInvoicesQuerySchema,
  FundPartySchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type {
  CreateInvoiceDto,
  ModifyInvoiceDto,
  PayInvoiceDto,
  ListInvoicesQuery,
  FundPartyDto,
  ListEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
