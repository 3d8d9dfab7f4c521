/**
 * Request logging middleware.
 *
 * Hands one structured entry per request to the supplied sink,
 * which main.ts points at the pino root logger.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;

  /** Absent when the request never got past identity resolution */
  readonly caller?: string;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    const base: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
      requestId: c.get("requestId"),
    };
    const caller = c.get("caller");

    log(caller !== undefined ? { ...base, caller } : base);
  };
}
