/**
 * @ledgerline/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { PartyId } from "@ledgerline/types";

// =============================================================================
// Schema
// =============================================================================

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Identity
  ADMIN_PARTY: z.string().min(1).default("admin"),
  API_KEYS: z.string().default(""),

  // Settlement
  CURRENCY: z.string().min(1).default("EUR"),
  DECIMALS: z.coerce.number().int().min(0).max(18).default(2),
  ALLOW_OVERDRAFT: booleanFlag,

  // Overdue sweep
  SWEEP_POLICY: z.enum(["literal", "skip-settled"]).default("literal"),
  SWEEP_INTERVAL_MS: z.coerce.number().int().min(0).default(0),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly party: PartyId;
}

/**
 * Parse the API_KEYS env var into key → party records.
 *
 * Format: "key1:party1,key2:party2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, party] = parts;
    if (parts.length !== 2 || key === undefined || party === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:party`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (party === "") {
      throw new Error(`Party cannot be empty for API key "${key}"`);
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key "${key}" in API_KEYS`);
    }

    seen.add(key);
    keys.push({ key, party });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
