/**
 * Periodic overdue sweep.
 *
 * Runs InvoiceBook.sweepOverdue as the administrative party on a fixed
 * interval. A tick that finds the previous sweep still running is skipped.
 */

import type { InvoiceBook, InvoiceLogger } from "@ledgerline/invoices";

export interface SweepSchedulerOptions {
  readonly book: InvoiceBook;
  readonly intervalMs: number;
  readonly logger: InvoiceLogger;
}

export class SweepScheduler {
  private readonly _book: InvoiceBook;
  private readonly _intervalMs: number;
  private readonly _logger: InvoiceLogger;
  private _timer: ReturnType<typeof setInterval> | undefined;
  private _running: Promise<void> | undefined;

  constructor(options: SweepSchedulerOptions) {
    if (!Number.isInteger(options.intervalMs) || options.intervalMs <= 0) {
      throw new RangeError(`Sweep interval must be a positive integer, got ${String(options.intervalMs)}`);
    }
    this._book = options.book;
    this._intervalMs = options.intervalMs;
    this._logger = options.logger;
  }

  get started(): boolean {
    return this._timer !== undefined;
  }

  start(): void {
    if (this._timer !== undefined) return;
    this._timer = setInterval(() => {
      if (this._running === undefined) {
        this._running = this.runOnce().finally(() => {
          this._running = undefined;
        });
      }
    }, this._intervalMs);
  }

  /**
   * Stop the timer and wait for an in-flight sweep to finish.
   */
  async stop(): Promise<void> {
    if (this._timer !== undefined) {
      clearInterval(this._timer);
      this._timer = undefined;
    }
    await this._running;
  }

  /**
   * Run one sweep. Failures are logged, never thrown.
   */
  async runOnce(): Promise<void> {
    try {
      const marked = await this._book.sweepOverdue(this._book.admin);
      this._logger.info({ marked, count: marked.length }, "overdue sweep completed");
    } catch (err) {
      this._logger.warn(
        { err: err instanceof Error ? err.message : String(err) },
        "overdue sweep failed",
      );
    }
  }
}
