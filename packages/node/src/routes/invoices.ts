/**
 * Invoice lifecycle routes.
 *
 * POST   /api/v1/invoices             : Create an invoice (caller is the issuer)
 * GET    /api/v1/invoices             : List a party's invoices (default: caller)
 * GET    /api/v1/invoices/:id         : Get a single invoice
 * POST   /api/v1/invoices/:id/approve : Approve on the caller's side
 * POST   /api/v1/invoices/:id/reject  : Reject on the caller's side
 * POST   /api/v1/invoices/:id/modify  : Replace terms (either party)
 * POST   /api/v1/invoices/:id/pay     : Settle through the ledger (recipient only)
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { Invoice } from "@ledgerline/types";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateInvoiceSchema,
  InvoiceIdSchema,
  ListInvoicesQuerySchema,
  ModifyInvoiceSchema,
  PayInvoiceSchema,
} from "../types/dto.js";
import { validateBody, validationFailure } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import type { LedgerlineService } from "../services/ledgerline-service.js";

type IdParse =
  | { readonly ok: true; readonly id: number }
  | { readonly ok: false; readonly response: Response };

function parseId(c: Context): IdParse {
  const result = InvoiceIdSchema.safeParse(c.req.param("id"));
  if (!result.success) {
    return { ok: false, response: validationFailure(c, "Invalid invoice id", result.error) };
  }
  return { ok: true, id: result.data };
}

export function createInvoiceRoutes(service: LedgerlineService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const book = service.book;

  // POST /api/v1/invoices: Create
  routes.post("/", validateBody(CreateInvoiceSchema), async (c) => {
    const invoice = await book.create(c.get("caller"), c.get("validatedBody"));
    return c.json({ data: invoice }, 201);
  });

  // GET /api/v1/invoices: List
  routes.get("/", (c) => {
    const queryResult = ListInvoicesQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return validationFailure(c, "Invalid query parameters", queryResult.error);
    }

    const party = queryResult.data.party ?? c.get("caller");
    const invoiceIds = book.listFor(party);
    const invoices: Invoice[] = [];
    for (const id of invoiceIds) {
      const invoice = book.getById(id);
      if (invoice !== undefined) invoices.push(invoice);
    }

    return c.json({ data: { party, invoiceIds, invoices } });
  });

  // GET /api/v1/invoices/:id: Get one
  routes.get("/:id", (c) => {
    const parsed = parseId(c);
    if (!parsed.ok) return parsed.response;

    const invoice = book.getById(parsed.id);
    if (invoice === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Invoice ${String(parsed.id)} not found`),
        404,
      );
    }

    return c.json({ data: invoice });
  });

  // POST /api/v1/invoices/:id/approve
  routes.post("/:id/approve", async (c) => {
    const parsed = parseId(c);
    if (!parsed.ok) return parsed.response;

    const invoice = await book.approve(c.get("caller"), parsed.id);
    return c.json({ data: invoice });
  });

  // POST /api/v1/invoices/:id/reject
  routes.post("/:id/reject", async (c) => {
    const parsed = parseId(c);
    if (!parsed.ok) return parsed.response;

    const invoice = await book.reject(c.get("caller"), parsed.id);
    return c.json({ data: invoice });
  });

  // POST /api/v1/invoices/:id/modify
  routes.post("/:id/modify", validateBody(ModifyInvoiceSchema), async (c) => {
    const parsed = parseId(c);
    if (!parsed.ok) return parsed.response;

    const invoice = await book.modify(c.get("caller"), parsed.id, c.get("validatedBody"));
    return c.json({ data: invoice });
  });

  // POST /api/v1/invoices/:id/pay
  routes.post("/:id/pay", validateBody(PayInvoiceSchema), async (c) => {
    const parsed = parseId(c);
    if (!parsed.ok) return parsed.response;

    const result = await book.pay(c.get("caller"), parsed.id, c.get("validatedBody").amount);
    return c.json({ data: result });
  });

  return routes;
}
