/**
 * @ledgerline/node: Entry point.
 *
 * Loads config, builds the app, starts the HTTP server and the
 * overdue sweep scheduler, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import type { PartyId } from "@ledgerline/types";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import { SweepScheduler } from "./services/sweep-scheduler.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const apiKeys = new Map<string, PartyId>();
  for (const { key, party } of parseApiKeys(config.API_KEYS)) {
    apiKeys.set(key, party);
  }
  if (apiKeys.size > 0) {
    logger.info({ apiKeyCount: apiKeys.size }, "API keys configured");
  } else {
    logger.warn("No API keys configured, trusting the X-Party-Id header");
  }

  const { app, service } = createApp({
    serviceConfig: {
      admin: config.ADMIN_PARTY,
      currency: config.CURRENCY,
      decimals: config.DECIMALS,
      allowOverdraft: config.ALLOW_OVERDRAFT,
      sweepPolicy: config.SWEEP_POLICY,
      logger: logger.child({ component: "invoices" }),
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${String(entry.status)}`);
    },
    apiKeys,
  });

  let scheduler: SweepScheduler | undefined;
  if (config.SWEEP_INTERVAL_MS > 0) {
    scheduler = new SweepScheduler({
      book: service.book,
      intervalMs: config.SWEEP_INTERVAL_MS,
      logger: logger.child({ component: "sweep" }),
    });
    scheduler.start();
  }

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      admin: config.ADMIN_PARTY,
      currency: config.CURRENCY,
      sweepIntervalMs: config.SWEEP_INTERVAL_MS,
    },
    "Ledgerline node started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await scheduler?.stop();
    await service.book.idle();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
