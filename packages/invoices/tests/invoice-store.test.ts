import { describe, it, expect } from "vitest";
import type { Invoice } from "@ledgerline/types";
import { InvoiceStore } from "../src/invoice-store.js";
import { DUE, T0, eur } from "./fixtures.js";

function record(id: number, issuer = "alice", recipient = "bob"): Invoice {
  return {
    id,
    issuerName: "Issuer",
    clientName: "Client",
    issuer,
    recipient,
    amount: eur("1.00"),
    dueDate: DUE,
    issuerStatus: "approved",
    recipientStatus: "pending",
    creationDate: T0,
    lastModifiedDate: T0,
    message: "",
  };
}

describe("InvoiceStore", () => {
  it("starts at id 1", () => {
    const store = new InvoiceStore();
    expect(store.nextId).toBe(1);
    expect(store.ids()).toEqual([]);
  });

  it("only accepts the next id", () => {
    const store = new InvoiceStore();
    expect(() => store.insert(record(2))).toThrow(RangeError);
    store.insert(record(1));
    expect(() => store.insert(record(1))).toThrow("Expected invoice id 2, got 1");
  });

  it("indexes issuer and recipient", () => {
    const store = new InvoiceStore();
    store.insert(record(1, "alice", "bob"));
    store.insert(record(2, "bob", "carol"));

    expect(store.listFor("alice")).toEqual([1]);
    expect(store.listFor("bob")).toEqual([1, 2]);
    expect(store.listFor("carol")).toEqual([2]);
    expect(store.ids()).toEqual([1, 2]);
    expect(store.size).toBe(2);
  });

  it("replaces existing records without touching the index", () => {
    const store = new InvoiceStore();
    store.insert(record(1));
    store.replace({ ...record(1), recipientStatus: "approved" });

    expect(store.get(1)?.recipientStatus).toBe("approved");
    expect(store.listFor("bob")).toEqual([1]);
    expect(() => store.replace(record(5))).toThrow("Invoice 5 does not exist");
  });
});
