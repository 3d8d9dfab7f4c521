/**
 * Test doubles and fixtures for the invoice book.
 */

import type {
  Clock,
  Money,
  TransferOutcome,
  TransferRail,
  TransferRequest,
} from "@ledgerline/types";
import type { CreateInvoiceInput, InvoiceLogger } from "../src/types.js";

export const T0 = "2025-06-01T10:00:00.000Z";
export const DUE = "2025-07-01T00:00:00.000Z";

export class ManualClock implements Clock {
  private _ms: number;

  constructor(iso: string = T0) {
    this._ms = Date.parse(iso);
  }

  now(): Date {
    return new Date(this._ms);
  }

  set(iso: string): void {
    this._ms = Date.parse(iso);
  }

  advance(ms: number): void {
    this._ms += ms;
  }
}

/**
 * Rail that replays scripted outcomes, then succeeds.
 * An Error in the script is thrown instead of returned.
 */
export class ScriptedRail implements TransferRail {
  readonly requests: TransferRequest[] = [];
  private readonly _script: (TransferOutcome | Error)[];

  constructor(...script: (TransferOutcome | Error)[]) {
    this._script = script;
  }

  async transfer(request: TransferRequest): Promise<TransferOutcome> {
    this.requests.push(request);
    const next = this._script.shift() ?? { ok: true, transferId: `t-${String(this.requests.length)}` };
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

/**
 * Rail whose transfers stay in flight until released.
 */
export class GatedRail implements TransferRail {
  readonly requests: TransferRequest[] = [];
  private readonly _releases: (() => void)[] = [];

  transfer(request: TransferRequest): Promise<TransferOutcome> {
    this.requests.push(request);
    return new Promise((resolve) => {
      this._releases.push(() => resolve({ ok: true, transferId: `gated-${String(this.requests.length)}` }));
    });
  }

  releaseAll(): void {
    for (const release of this._releases.splice(0)) release();
  }
}

export interface LogLine {
  readonly level: "info" | "warn";
  readonly obj: Record<string, unknown>;
  readonly msg: string;
}

export class MemoryLogger implements InvoiceLogger {
  readonly lines: LogLine[] = [];

  info(obj: Record<string, unknown>, msg: string): void {
    this.lines.push({ level: "info", obj, msg });
  }

  warn(obj: Record<string, unknown>, msg: string): void {
    this.lines.push({ level: "warn", obj, msg });
  }
}

export function eur(amount: string): Money {
  return { amount, currency: "EUR", decimals: 2 };
}

export function invoiceInput(overrides: Partial<CreateInvoiceInput> = {}): CreateInvoiceInput {
  return {
    issuerName: "Alice Studio",
    clientName: "Bob Ltd",
    recipient: "bob",
    amount: eur("100"),
    dueDate: DUE,
    message: "June retainer",
    ...overrides,
  };
}
