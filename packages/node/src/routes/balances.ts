/**
 * Ledger balance routes.
 *
 * GET  /api/v1/balances/:party      : A party's settlement balance
 * POST /api/v1/balances/:party/fund : Issue value to a party (admin only)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { FundPartySchema, PartyParamSchema } from "../types/dto.js";
import { validateBody, validationFailure } from "../middleware/validate.js";
import type { LedgerlineService } from "../services/ledgerline-service.js";

export function createBalanceRoutes(service: LedgerlineService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:party", (c) => {
    const party = PartyParamSchema.safeParse(c.req.param("party"));
    if (!party.success) {
      return validationFailure(c, "Invalid party", party.error);
    }
    return c.json({ data: service.getBalance(party.data) });
  });

  routes.post("/:party/fund", validateBody(FundPartySchema), async (c) => {
    const party = PartyParamSchema.safeParse(c.req.param("party"));
    if (!party.success) {
      return validationFailure(c, "Invalid party", party.error);
    }

    const body = c.get("validatedBody");
    const balance = await service.fund(c.get("caller"), party.data, body.amount, body.description);
    return c.json({ data: balance });
  });

  return routes;
}
