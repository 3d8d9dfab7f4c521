/**
 * Notification log routes.
 *
 * GET /api/v1/events?fromPosition=N&limit=M: Events in global order
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { validationFailure } from "../middleware/validate.js";
import type { LedgerlineService } from "../services/ledgerline-service.js";

export function createEventRoutes(service: LedgerlineService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return validationFailure(c, "Invalid query parameters", queryResult.error);
    }

    const { fromPosition, limit } = queryResult.data;
    const events = service.readEvents(fromPosition, limit);
    const last = events[events.length - 1];

    return c.json({
      data: events,
      meta: {
        count: events.length,
        nextPosition: last !== undefined ? last.globalPosition + 1 : (fromPosition ?? 1),
        headPosition: service.eventStore.globalPosition(),
      },
    });
  });

  return routes;
}
