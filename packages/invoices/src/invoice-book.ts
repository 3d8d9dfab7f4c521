/**
 * Invoice Book: two-party invoice lifecycle.
 *
 * create → approve / reject / modify → pay, plus the administrative
 * overdue sweep.
 *
 * Rules:
 * - Mutations run one at a time behind a WriteLock
 * - Each mutation checks every precondition (and, for payment, moves
 *   the value) before it writes anything
 * - A failed mutation leaves no record change, index entry or event
 * - Queries are synchronous and never write
 */

import {
  isMoney,
  isNullParty,
  systemClock,
  type Clock,
  type Invoice,
  type InvoiceSide,
  type Money,
  type PartyId,
  type TransferOutcome,
  type TransferRail,
} from "@ledgerline/types";
import {
  InMemoryEventStore,
  INVOICE_EVENTS,
  invoiceStreamId,
  type EventCatalog,
  type EventStore,
  type InvoiceCreatedPayload,
  type InvoiceUpdatedPayload,
} from "@ledgerline/event-store";
import {
  isNegative,
  LedgerError,
  moneyEquals,
  normalizeMoney,
} from "@ledgerline/ledger";
import { InvoiceError } from "./errors.js";
import { InvoiceStore } from "./invoice-store.js";
import {
  applyAction,
  applySettlement,
  isSweepable,
  sideOf,
  type PartyAction,
  type StatusPair,
} from "./transitions.js";
import {
  silentLogger,
  type CreateInvoiceInput,
  type InvoiceBookOptions,
  type InvoiceLogger,
  type ModifyInvoiceInput,
  type PaymentResult,
  type SettlementCurrency,
  type SweepPolicy,
} from "./types.js";
import { WriteLock } from "./write-lock.js";

type InvoiceEvent =
  | { readonly type: typeof INVOICE_EVENTS.CREATED; readonly payload: InvoiceCreatedPayload }
  | { readonly type: typeof INVOICE_EVENTS.UPDATED; readonly payload: InvoiceUpdatedPayload };

export class InvoiceBook {
  private readonly _store = new InvoiceStore();
  private readonly _lock = new WriteLock();
  private readonly _admin: PartyId;
  private readonly _rail: TransferRail;
  private readonly _events: EventStore;
  private readonly _catalog: EventCatalog | undefined;
  private readonly _clock: Clock;
  private readonly _sweepPolicy: SweepPolicy;
  private readonly _logger: InvoiceLogger;
  private readonly _settlement: SettlementCurrency | undefined;

  constructor(options: InvoiceBookOptions) {
    if (isNullParty(options.admin)) {
      throw new InvoiceError("VALIDATION_FAILED", "Administrative identity must not be the null party");
    }
    this._admin = options.admin;
    this._rail = options.rail;
    this._clock = options.clock ?? systemClock;
    this._logger = options.logger ?? silentLogger;
    this._events =
      options.events ??
      new InMemoryEventStore(this._clock, (err, event) => {
        this._logger.warn(
          {
            event: event.event.type,
            streamId: event.streamId,
            err: err instanceof Error ? err.message : String(err),
          },
          "event subscriber failed",
        );
      });
    this._catalog = options.catalog;
    this._sweepPolicy = options.sweepPolicy ?? "literal";
    this._settlement = options.settlementCurrency;
  }

  get admin(): PartyId {
    return this._admin;
  }

  get sweepPolicy(): SweepPolicy {
    return this._sweepPolicy;
  }

  /** The notification log. */
  get events(): EventStore {
    return this._events;
  }

  /** Number of invoices created so far. */
  get count(): number {
    return this._store.size;
  }

  /** Mutations queued or running. */
  get pendingWrites(): number {
    return this._lock.pending;
  }

  /**
   * Resolves once every mutation submitted so far has settled.
   */
  idle(): Promise<void> {
    return this._lock.idle();
  }

  /**
   * Run a task in the book's write queue, so it never interleaves with
   * an invoice mutation.
   */
  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    return this._lock.run(task);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getById(id: number): Invoice | undefined {
    return this._store.get(id);
  }

  /**
   * Ids of every invoice the party issued or received, in creation order.
   */
  listFor(party: PartyId): readonly number[] {
    return this._store.listFor(party);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create an invoice issued by the caller. The issuer side starts
   * approved, the recipient side pending.
   */
  create(caller: PartyId, input: CreateInvoiceInput): Promise<Invoice> {
    return this._mutate("create", caller, undefined, () => {
      const now = this._clock.now();

      if (isNullParty(input.recipient)) {
        throw new InvoiceError("INVALID_RECIPIENT", "Recipient must not be the null identity");
      }
      if (input.recipient === caller) {
        throw new InvoiceError("SELF_ASSIGNMENT", `Party "${caller}" cannot invoice itself`);
      }
      const dueDate = requireFutureDate(input.dueDate, now);
      const amount = requireAmount(input.amount, this._settlement);

      const timestamp = now.toISOString();
      const invoice: Invoice = {
        id: this._store.nextId,
        issuerName: input.issuerName,
        clientName: input.clientName,
        issuer: caller,
        recipient: input.recipient,
        amount,
        dueDate,
        issuerStatus: "approved",
        recipientStatus: "pending",
        creationDate: timestamp,
        lastModifiedDate: timestamp,
        message: input.message,
      };

      this._commit(invoice, caller, now, {
        type: INVOICE_EVENTS.CREATED,
        payload: {
          invoiceId: invoice.id,
          issuer: invoice.issuer,
          recipient: invoice.recipient,
          amount: invoice.amount,
          dueDate: invoice.dueDate,
        },
      });
      return invoice;
    });
  }

  /**
   * Approve the caller's side of the invoice.
   */
  approve(caller: PartyId, id: number): Promise<Invoice> {
    return this._mutate("approve", caller, id, () => this._partyAction(caller, id, "approve"));
  }

  /**
   * Reject the invoice. Both sides become rejected.
   */
  reject(caller: PartyId, id: number): Promise<Invoice> {
    return this._mutate("reject", caller, id, () => this._partyAction(caller, id, "reject"));
  }

  /**
   * Rewrite the invoice terms. The caller's side becomes approved and
   * the other side must approve again.
   */
  modify(caller: PartyId, id: number, input: ModifyInvoiceInput): Promise<Invoice> {
    return this._mutate("modify", caller, id, () => {
      const now = this._clock.now();
      const { invoice, side } = this._requireParty(caller, id);

      const dueDate = requireFutureDate(input.dueDate, now);
      const statuses = applyAction(invoice, side, "modify");
      const amount = requireAmount(input.amount, this._settlement);

      const next: Invoice = {
        ...invoice,
        ...statuses,
        clientName: input.clientName,
        amount,
        dueDate,
        message: input.message,
        lastModifiedDate: now.toISOString(),
      };
      this._commit(next, caller, now, updatedEvent(next));
      return next;
    });
  }

  /**
   * Settle an approved invoice. The caller must be the recipient and
   * tender exactly the invoice amount, which the transfer rail moves to
   * the issuer. Nothing changes unless the transfer succeeds.
   */
  pay(caller: PartyId, id: number, tendered: Money): Promise<PaymentResult> {
    return this._mutate("pay", caller, id, async () => {
      const invoice = this._store.get(id);
      if (invoice === undefined || invoice.recipient !== caller) {
        throw new InvoiceError(
          "UNAUTHORIZED",
          `Party "${caller}" is not the recipient of invoice ${String(id)}`,
        );
      }

      const statuses = applySettlement(invoice);

      if (!isMoney(tendered) || !sameAmount(tendered, invoice.amount)) {
        throw new InvoiceError(
          "AMOUNT_MISMATCH",
          `Invoice ${String(id)} is for ${invoice.amount.amount} ${invoice.amount.currency}`,
        );
      }

      const transferId = await this._transfer(invoice, tendered);

      const now = this._clock.now();
      const next: Invoice = { ...invoice, ...statuses, lastModifiedDate: now.toISOString() };
      this._commit(next, caller, now, updatedEvent(next));
      return { invoice: next, transferId };
    });
  }

  /**
   * Mark past-due invoices overdue. Only the administrative identity may
   * run it. Returns the ids marked, ascending.
   */
  sweepOverdue(caller: PartyId): Promise<readonly number[]> {
    return this._mutate("sweep", caller, undefined, () => {
      if (caller !== this._admin) {
        throw new InvoiceError("UNAUTHORIZED", `Party "${caller}" may not run the overdue sweep`);
      }

      const now = this._clock.now();
      const marked: number[] = [];

      for (const id of this._store.ids()) {
        const invoice = this._store.get(id);
        if (invoice === undefined) continue;
        if (now.getTime() <= Date.parse(invoice.dueDate)) continue;
        if (!isSweepable(invoice.recipientStatus, this._sweepPolicy)) continue;

        const next: Invoice = {
          ...invoice,
          recipientStatus: "overdue",
          lastModifiedDate: now.toISOString(),
        };
        this._commit(next, caller, now, updatedEvent(next));
        marked.push(id);
      }

      return marked;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private _mutate<T>(
    action: string,
    caller: PartyId,
    invoiceId: number | undefined,
    work: () => T | Promise<T>,
  ): Promise<T> {
    return this._lock.run(async () => {
      try {
        return await work();
      } catch (err) {
        if (err instanceof InvoiceError) {
          this._logger.warn({ action, caller, invoiceId, code: err.code }, err.message);
        }
        throw err;
      }
    });
  }

  private _partyAction(caller: PartyId, id: number, action: PartyAction): Invoice {
    const now = this._clock.now();
    const { invoice, side } = this._requireParty(caller, id);
    const statuses: StatusPair = applyAction(invoice, side, action);

    const next: Invoice = { ...invoice, ...statuses, lastModifiedDate: now.toISOString() };
    this._commit(next, caller, now, updatedEvent(next));
    return next;
  }

  private _requireParty(caller: PartyId, id: number): { invoice: Invoice; side: InvoiceSide } {
    const invoice = this._store.get(id);
    const side = invoice !== undefined ? sideOf(invoice, caller) : undefined;
    if (invoice === undefined || side === undefined) {
      throw new InvoiceError(
        "UNAUTHORIZED",
        `Party "${caller}" is not a party to invoice ${String(id)}`,
      );
    }
    return { invoice, side };
  }

  private async _transfer(invoice: Invoice, money: Money): Promise<string> {
    const request = {
      from: invoice.recipient,
      to: invoice.issuer,
      money,
      reference: invoiceStreamId(invoice.id),
    };

    let outcome: TransferOutcome;
    try {
      outcome = await this._rail.transfer(request);
    } catch (err) {
      throw new InvoiceError(
        "TRANSFER_FAILED",
        `Transfer for invoice ${String(invoice.id)} failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    if (!outcome.ok) {
      throw new InvoiceError(
        "TRANSFER_FAILED",
        `Transfer for invoice ${String(invoice.id)} failed: ${outcome.reason}`,
      );
    }
    return outcome.transferId;
  }

  /**
   * Write the record and publish its event. The payload is checked
   * against the catalog before anything is written.
   */
  private _commit(invoice: Invoice, caller: PartyId, now: Date, event: InvoiceEvent): void {
    this._catalog?.assertValid(event.type, event.payload);

    if (event.type === INVOICE_EVENTS.CREATED) {
      this._store.insert(invoice);
    } else {
      this._store.replace(invoice);
    }

    const streamId = invoiceStreamId(invoice.id);
    const version = this._events.streamVersion(streamId);
    this._events.append(
      streamId,
      [
        {
          type: event.type,
          metadata: {
            eventId: `${streamId}:${String(version + 1)}`,
            timestamp: now.toISOString(),
            actor: caller,
            correlationId: streamId,
            source: "invoices",
          },
          payload: event.payload,
        },
      ],
      { expectedVersion: version },
    );

    this._logger.info(
      {
        event: event.type,
        invoiceId: invoice.id,
        caller,
        issuerStatus: invoice.issuerStatus,
        recipientStatus: invoice.recipientStatus,
      },
      event.type === INVOICE_EVENTS.CREATED ? "invoice created" : "invoice updated",
    );
  }
}

// =============================================================================
// Helpers
// =============================================================================

function updatedEvent(invoice: Invoice): InvoiceEvent {
  return {
    type: INVOICE_EVENTS.UPDATED,
    payload: {
      invoiceId: invoice.id,
      issuerStatus: invoice.issuerStatus,
      recipientStatus: invoice.recipientStatus,
    },
  };
}

/**
 * Parse an ISO 8601 due date that must lie after `now`.
 */
function requireFutureDate(raw: string, now: Date): string {
  const ms = Date.parse(raw);
  if (Number.isNaN(ms)) {
    throw new InvoiceError("VALIDATION_FAILED", `Invalid due date: "${raw}"`);
  }
  if (ms <= now.getTime()) {
    throw new InvoiceError(
      "DUE_DATE_IN_PAST",
      `Due date ${new Date(ms).toISOString()} is not after ${now.toISOString()}`,
    );
  }
  return new Date(ms).toISOString();
}

/**
 * Validate and normalize an invoice amount. Zero is allowed. When the
 * book has a settlement currency the amount must be denominated in it.
 */
function requireAmount(money: Money, settlement: SettlementCurrency | undefined): Money {
  if (!isMoney(money)) {
    throw new InvoiceError("VALIDATION_FAILED", "Amount must be a Money value");
  }
  if (
    settlement !== undefined &&
    (money.currency !== settlement.currency || money.decimals !== settlement.decimals)
  ) {
    throw new InvoiceError(
      "VALIDATION_FAILED",
      `Invoices settle in ${settlement.currency}/${String(settlement.decimals)}, got ${money.currency}/${String(money.decimals)}`,
    );
  }

  let normalized: Money;
  try {
    normalized = normalizeMoney(money);
  } catch (err) {
    if (err instanceof LedgerError) {
      throw new InvoiceError("VALIDATION_FAILED", `Invalid amount: ${err.message}`, { cause: err });
    }
    throw err;
  }

  if (isNegative(normalized)) {
    throw new InvoiceError("VALIDATION_FAILED", `Amount must not be negative, got "${money.amount}"`);
  }
  return normalized;
}

/**
 * Exact match of currency, decimals and value. Malformed amounts never match.
 */
function sameAmount(tendered: Money, owed: Money): boolean {
  try {
    return moneyEquals(tendered, owed);
  } catch (err) {
    if (err instanceof LedgerError) return false;
    throw err;
  }
}
