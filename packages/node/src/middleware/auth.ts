/**
 * Caller identity middleware.
 *
 * Resolves the party a request acts as:
 * 1. X-Api-Key header → looked up in the configured key registry
 * 2. With no keys configured, the X-Party-Id header is trusted as-is
 *
 * On success, sets `c.set("caller", party)`. Returns 401 otherwise.
 */

import type { MiddlewareHandler } from "hono";
import type { PartyId } from "@ledgerline/types";
import { isNullParty } from "@ledgerline/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const PARTY_ID_HEADER = "X-Party-Id";

export interface AuthConfig {
  /** Map of API key → party. Empty means header identity. */
  readonly apiKeys: ReadonlyMap<string, PartyId>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  const trustHeader = config.apiKeys.size === 0;

  return async (c, next) => {
    let caller: PartyId | undefined;

    if (trustHeader) {
      caller = c.req.header(PARTY_ID_HEADER);
    } else {
      const apiKey = c.req.header(API_KEY_HEADER);
      if (apiKey !== undefined) {
        caller = config.apiKeys.get(apiKey);
        if (caller === undefined) {
          return c.json(
            createErrorEnvelope("UNAUTHENTICATED", "Invalid API key"),
            401,
          );
        }
      }
    }

    if (caller === undefined || isNullParty(caller)) {
      return c.json(
        createErrorEnvelope(
          "UNAUTHENTICATED",
          trustHeader ? `${PARTY_ID_HEADER} header required` : "Authentication required",
        ),
        401,
      );
    }

    c.set("caller", caller);
    return next();
  };
}
