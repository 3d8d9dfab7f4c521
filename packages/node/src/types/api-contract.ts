/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { PartyId } from "@ledgerline/types";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Party the request acts as (set by auth middleware) */
    caller: PartyId;
  };
}
