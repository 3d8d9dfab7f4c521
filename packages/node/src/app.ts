/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can drive the app through
 * `app.request()` without starting an HTTP server.
 */

import { Hono } from "hono";
import type { PartyId } from "@ledgerline/types";
import type { AppEnv } from "./types/api-contract.js";
import { LedgerlineService } from "./services/ledgerline-service.js";
import type { LedgerlineServiceConfig } from "./services/ledgerline-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import { createErrorEnvelope } from "./types/error.js";
import { createHealthRoutes } from "./routes/health.js";
import { createInvoiceRoutes } from "./routes/invoices.js";
import { createAdminRoutes } from "./routes/admin.js";
import { createEventRoutes } from "./routes/events.js";
import { createBalanceRoutes } from "./routes/balances.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: LedgerlineServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;

  /** API key → party. Empty or absent: the X-Party-Id header is trusted. */
  readonly apiKeys?: ReadonlyMap<string, PartyId>;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: LedgerlineService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new LedgerlineService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ──────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes (no identity required) ───────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", authMiddleware({ apiKeys: options.apiKeys ?? new Map() }));

  app.route("/api/v1/invoices", createInvoiceRoutes(service));
  app.route("/api/v1/admin", createAdminRoutes(service));
  app.route("/api/v1/events", createEventRoutes(service));
  app.route("/api/v1/balances", createBalanceRoutes(service));

  return { app, service };
}
