/**
 * @ledgerline/node: HTTP service for the invoice book.
 *
 * @packageDocumentation
 */

export { LedgerlineService, partyStreamId } from "./services/ledgerline-service.js";
export type { LedgerlineServiceConfig } from "./services/ledgerline-service.js";
export { SweepScheduler } from "./services/sweep-scheduler.js";
export type { SweepSchedulerOptions } from "./services/sweep-scheduler.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
