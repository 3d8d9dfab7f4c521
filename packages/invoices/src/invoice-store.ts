/**
 * Invoice records and the per-party index.
 *
 * Ids are assigned 1, 2, 3, ... and never reused. The index is
 * append-only: a new id goes under its issuer and under its recipient.
 */

import type { Invoice, PartyId } from "@ledgerline/types";

export class InvoiceStore {
  private readonly _records: Map<number, Invoice> = new Map();
  private readonly _index: Map<PartyId, number[]> = new Map();
  private _lastId = 0;

  /** The id the next insert must carry. */
  get nextId(): number {
    return this._lastId + 1;
  }

  get size(): number {
    return this._records.size;
  }

  insert(invoice: Invoice): void {
    if (invoice.id !== this.nextId) {
      throw new RangeError(
        `Expected invoice id ${String(this.nextId)}, got ${String(invoice.id)}`,
      );
    }
    this._records.set(invoice.id, invoice);
    this._lastId = invoice.id;
    this._appendIndex(invoice.issuer, invoice.id);
    this._appendIndex(invoice.recipient, invoice.id);
  }

  /** Overwrite an existing record. */
  replace(invoice: Invoice): void {
    if (!this._records.has(invoice.id)) {
      throw new RangeError(`Invoice ${String(invoice.id)} does not exist`);
    }
    this._records.set(invoice.id, invoice);
  }

  get(id: number): Invoice | undefined {
    return this._records.get(id);
  }

  /** A copy of the party's index entries, in append order. */
  listFor(party: PartyId): readonly number[] {
    return [...(this._index.get(party) ?? [])];
  }

  /** Every assigned id, ascending. */
  ids(): readonly number[] {
    return Array.from({ length: this._lastId }, (_, i) => i + 1);
  }

  private _appendIndex(party: PartyId, id: number): void {
    const entries = this._index.get(party);
    if (entries === undefined) {
      this._index.set(party, [id]);
    } else {
      entries.push(id);
    }
  }
}
