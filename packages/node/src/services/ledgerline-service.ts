/**
 * LedgerlineService: composition root for one running node.
 *
 * Wires the settlement ledger, the notification log, the event catalog
 * and the invoice book together, and adds the administrative funding
 * and read paths the HTTP routes need.
 */

import {
  systemClock,
  type Clock,
  type Money,
  type PartyId,
} from "@ledgerline/types";
import { Ledger, type PartyBalance } from "@ledgerline/ledger";
import {
  createInvoiceCatalog,
  InMemoryEventStore,
  INVOICE_EVENTS,
  type EventCatalog,
  type EventStoreIntegrityResult,
  type PartyFundedPayload,
  type StoredEvent,
} from "@ledgerline/event-store";
import {
  InvoiceBook,
  InvoiceError,
  silentLogger,
  type InvoiceLogger,
  type SweepPolicy,
} from "@ledgerline/invoices";

export interface LedgerlineServiceConfig {
  /** Party allowed to sweep and fund */
  readonly admin: PartyId;
  readonly currency: string;
  readonly decimals: number;
  readonly allowOverdraft?: boolean;
  readonly sweepPolicy?: SweepPolicy;
  readonly clock?: Clock;
  readonly logger?: InvoiceLogger;
}

/**
 * Stream holding a party's funding events.
 */
export function partyStreamId(party: PartyId): string {
  return `party-${party}`;
}

export class LedgerlineService {
  readonly ledger: Ledger;
  readonly eventStore: InMemoryEventStore;
  readonly catalog: EventCatalog;
  readonly book: InvoiceBook;

  private readonly _clock: Clock;
  private readonly _logger: InvoiceLogger;

  constructor(config: LedgerlineServiceConfig) {
    this._clock = config.clock ?? systemClock;
    this._logger = config.logger ?? silentLogger;

    this.ledger = new Ledger(
      {
        currency: config.currency,
        decimals: config.decimals,
        allowOverdraft: config.allowOverdraft ?? false,
      },
      this._clock,
    );
    this.eventStore = new InMemoryEventStore(this._clock, (err, event) => {
      this._logger.warn(
        {
          event: event.event.type,
          streamId: event.streamId,
          err: err instanceof Error ? err.message : String(err),
        },
        "event subscriber failed",
      );
    });
    this.catalog = createInvoiceCatalog();

    this.book = new InvoiceBook({
      admin: config.admin,
      rail: this.ledger,
      events: this.eventStore,
      catalog: this.catalog,
      clock: this._clock,
      logger: this._logger,
      settlementCurrency: { currency: config.currency, decimals: config.decimals },
      ...(config.sweepPolicy !== undefined ? { sweepPolicy: config.sweepPolicy } : {}),
    });
  }

  get admin(): PartyId {
    return this.book.admin;
  }

  // ─── Ledger ────────────────────────────────────────────────────────

  /**
   * Issue value to a party's account. Admin only.
   *
   * Runs in the book's write queue. The event is validated before the
   * ledger is touched.
   */
  fund(caller: PartyId, party: PartyId, money: Money, description?: string): Promise<PartyBalance> {
    return this.book.runExclusive(() => {
      if (caller !== this.admin) {
        throw new InvoiceError("UNAUTHORIZED", `Party "${caller}" may not fund accounts`);
      }

      const correlationId = this.ledger.nextCorrelationId;
      const event: PartyFundedPayload = { party, amount: money, correlationId };
      this.catalog.assertValid(INVOICE_EVENTS.PARTY_FUNDED, event);

      const result = this.ledger.fund(party, money, description);

      const streamId = partyStreamId(party);
      const version = this.eventStore.streamVersion(streamId);
      this.eventStore.append(
        streamId,
        [
          {
            type: INVOICE_EVENTS.PARTY_FUNDED,
            metadata: {
              eventId: `${streamId}:${String(version + 1)}`,
              timestamp: result.timestamp,
              actor: caller,
              correlationId: result.correlationId,
              source: "ledger",
            },
            payload: event,
          },
        ],
        { expectedVersion: version },
      );

      this._logger.info(
        { event: INVOICE_EVENTS.PARTY_FUNDED, party, amount: money.amount, correlationId },
        "party funded",
      );
      return this.ledger.getPartyBalance(party);
    });
  }

  getBalance(party: PartyId): PartyBalance {
    return this.ledger.getPartyBalance(party);
  }

  // ─── Events ────────────────────────────────────────────────────────

  readEvents(fromPosition?: number, maxCount?: number): readonly StoredEvent[] {
    return this.eventStore.readAll({
      ...(fromPosition !== undefined ? { fromPosition } : {}),
      ...(maxCount !== undefined ? { maxCount } : {}),
    });
  }

  // ─── Health ────────────────────────────────────────────────────────

  checkIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }
}
