/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body, query and path validation.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const MoneySchema = z.object({
  amount: z.string().regex(/^\d+(\.\d+)?$/, "Expected a non-negative decimal string"),
  currency: z.string().min(1),
  decimals: z.number().int().min(0).max(18),
});

export const InvoiceIdSchema = z.coerce.number().int().min(1);

export const PartyParamSchema = z.string().min(1).max(128);

// =============================================================================
// Invoice DTOs
// =============================================================================

export const CreateInvoiceSchema = z.object({
  issuerName: z.string().max(256),
  clientName: z.string().max(256),
  recipient: z.string().max(128),
  amount: MoneySchema,
  dueDate: z.string().min(1),
  message: z.string().max(4096).default(""),
});

export const ModifyInvoiceSchema = z.object({
  clientName: z.string().max(256),
  amount: MoneySchema,
  dueDate: z.string().min(1),
  message: z.string().max(4096).default(""),
});

export const PayInvoiceSchema = z.object({
  amount: MoneySchema,
});

export const ListInvoicesQuerySchema = z.object({
  party: PartyParamSchema.optional(),
});

// =============================================================================
// Ledger DTOs
// =============================================================================

export const FundPartySchema = z.object({
  amount: MoneySchema,
  description: z.string().max(256).optional(),
});

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = z.object({
  fromPosition: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

// =============================================================================
// Derived Types
// =============================================================================

export type CreateInvoiceDto = z.infer<typeof CreateInvoiceSchema>;
export type ModifyInvoiceDto = z.infer<typeof ModifyInvoiceSchema>;
export type PayInvoiceDto = z.infer<typeof PayInvoiceSchema>;
export type ListInvoicesQuery = z.infer<typeof ListInvoicesQuerySchema>;
export type FundPartyDto = z.infer<typeof FundPartySchema>;
export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
