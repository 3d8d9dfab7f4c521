/**
 * Tests for the tamper-evident hash chain.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { DomainEvent } from "@ledgerline/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { computeEventHash, verifyHashChain, GENESIS_HASH } from "../src/hash-chain.js";
import type { StoredEvent, UnchainedEvent } from "../src/types.js";

function makeEvent(type: string, payload: Record<string, unknown> = {}): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `evt-${type}`,
      timestamp: "2025-04-01T12:00:00.000Z",
      actor: "alice",
      correlationId: "invoice-1",
      source: "invoices",
    },
    payload,
  };
}

const base: UnchainedEvent = {
  event: makeEvent("invoice.created", { invoiceId: 1 }),
  streamId: "invoice-1",
  version: 1,
  globalPosition: 1,
  appendedAt: "2025-04-01T12:00:00.000Z",
};

describe("computeEventHash", () => {
  it("is a 64-char hex digest", () => {
    expect(computeEventHash(base, GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is deterministic", () => {
    expect(computeEventHash(base, GENESIS_HASH)).toBe(computeEventHash({ ...base }, GENESIS_HASH));
  });

  it("ignores payload key order", () => {
    const a: UnchainedEvent = { ...base, event: makeEvent("x", { a: 1, b: 2 }) };
    const b: UnchainedEvent = { ...base, event: makeEvent("x", { b: 2, a: 1 }) };
    expect(computeEventHash(a, GENESIS_HASH)).toBe(computeEventHash(b, GENESIS_HASH));
  });

  it("depends on content and predecessor", () => {
    const edited: UnchainedEvent = { ...base, event: makeEvent("invoice.created", { invoiceId: 2 }) };
    expect(computeEventHash(edited, GENESIS_HASH)).not.toBe(computeEventHash(base, GENESIS_HASH));
    expect(computeEventHash(base, "other")).not.toBe(computeEventHash(base, GENESIS_HASH));
  });
});

describe("verifyHashChain", () => {
  function chainOf(count: number): StoredEvent[] {
    const store = new InMemoryEventStore();
    for (let i = 1; i <= count; i++) {
      store.append(`invoice-${String(i)}`, [makeEvent("invoice.created", { invoiceId: i })]);
    }
    return [...store.readAll()];
  }

  it("accepts an empty log", () => {
    expect(verifyHashChain([])).toEqual({ valid: true, lastVerifiedPosition: 0, errors: [] });
  });

  it("links the first event to genesis", () => {
    expect(chainOf(1)[0]?.previousHash).toBe(GENESIS_HASH);
  });

  it("accepts an untouched log", () => {
    expect(verifyHashChain(chainOf(3))).toEqual({ valid: true, lastVerifiedPosition: 3, errors: [] });
  });

  it("detects an edited payload", () => {
    const events = chainOf(3);
    const second = events[1];
    if (second === undefined) throw new Error("missing event");
    events[1] = { ...second, event: makeEvent("invoice.created", { invoiceId: 99 }) };

    const result = verifyHashChain(events);

    expect(result.valid).toBe(false);
    expect(result.lastVerifiedPosition).toBe(1);
    expect(result.errors.map((e) => e.position)).toEqual([2]);
  });

  it("detects a removed event", () => {
    const events = chainOf(3);
    events.splice(1, 1);

    const result = verifyHashChain(events);

    expect(result.valid).toBe(false);
    expect(result.errors[0]?.reason).toMatch(/^previousHash mismatch at position 3/);
  });

  it("holds for any sequence of appends", () => {
    fc.assert(
      fc.property(
        fc.array(fc.tuple(fc.integer({ min: 1, max: 5 }), fc.integer({ min: 0, max: 1000 })), {
          minLength: 1,
          maxLength: 25,
        }),
        (appends) => {
          const store = new InMemoryEventStore();
          for (const [invoiceId, value] of appends) {
            store.append(`invoice-${String(invoiceId)}`, [makeEvent("invoice.updated", { invoiceId, value })]);
          }
          expect(store.verifyIntegrity().valid).toBe(true);
          expect(store.verifyIntegrity().lastVerifiedPosition).toBe(appends.length);
        },
      ),
    );
  });
});
