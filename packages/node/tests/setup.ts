/**
 * Test helpers for @ledgerline/node.
 *
 * Provides a test app factory that creates a Hono app with all
 * middleware and routes on a manual clock, but no HTTP server.
 */

import type { Clock, PartyId } from "@ledgerline/types";
import type { SweepPolicy } from "@ledgerline/invoices";
import { createApp } from "../src/app.js";
import type { AppInstance } from "../src/app.js";
import type { RequestLogEntry } from "../src/middleware/logger.js";

export const T0 = "2025-06-01T10:00:00.000Z";
export const DUE = "2025-07-01T00:00:00.000Z";

export const ADMIN = "admin";
export const ALICE = "alice";
export const BOB = "bob";

export class ManualClock implements Clock {
  private _ms: number;

  constructor(iso: string) {
    this._ms = Date.parse(iso);
  }

  now(): Date {
    return new Date(this._ms);
  }

  set(iso: string): void {
    this._ms = Date.parse(iso);
  }
}

export interface TestAppOptions {
  readonly apiKeys?: ReadonlyMap<string, PartyId>;
  readonly sweepPolicy?: SweepPolicy;
  readonly logFn?: (entry: RequestLogEntry) => void;
}

export interface TestApp extends AppInstance {
  readonly clock: ManualClock;
}

/**
 * Create a test app settling in EUR with two decimals, clock at T0.
 */
export function createTestApp(options: TestAppOptions = {}): TestApp {
  const clock = new ManualClock(T0);
  const instance = createApp({
    serviceConfig: {
      admin: ADMIN,
      currency: "EUR",
      decimals: 2,
      clock,
      ...(options.sweepPolicy !== undefined ? { sweepPolicy: options.sweepPolicy } : {}),
    },
    ...(options.apiKeys !== undefined ? { apiKeys: options.apiKeys } : {}),
    ...(options.logFn !== undefined ? { logFn: options.logFn } : {}),
  });
  return { ...instance, clock };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/**
 * Request acting as `party` through the X-Party-Id header.
 */
export function partyRequest(
  party: PartyId,
  path: string,
  method: string = "GET",
  body?: unknown,
): Request {
  return jsonRequest(path, method, body, { "X-Party-Id": party });
}

export function eur(amount: string) {
  return { amount, currency: "EUR", decimals: 2 };
}

export function invoiceBody(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    issuerName: "Alice Design",
    clientName: "Bob Imports",
    recipient: BOB,
    amount: eur("250.00"),
    dueDate: DUE,
    message: "June retainer",
    ...overrides,
  };
}
