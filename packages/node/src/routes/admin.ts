/**
 * Administrative routes.
 *
 * POST /api/v1/admin/sweep: Run the overdue sweep as the caller
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { LedgerlineService } from "../services/ledgerline-service.js";

export function createAdminRoutes(service: LedgerlineService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/sweep", async (c) => {
    const marked = await service.book.sweepOverdue(c.get("caller"));
    return c.json({ data: { marked } });
  });

  return routes;
}
