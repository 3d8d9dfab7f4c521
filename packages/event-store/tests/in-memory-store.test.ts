/**
 * Tests for InMemoryEventStore: append, concurrency, reads,
 * subscriptions and queries.
 */

import { describe, it, expect, vi } from "vitest";
import type { Clock, DomainEvent } from "@ledgerline/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { EventStoreError } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

const fixedClock: Clock = { now: () => new Date("2025-04-01T12:00:00.000Z") };

function makeEvent(type: string, invoiceId = 1): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `evt-${type}-${String(invoiceId)}`,
      timestamp: "2025-04-01T12:00:00.000Z",
      actor: "alice",
      correlationId: `invoice-${String(invoiceId)}`,
      source: "invoices",
    },
    payload: { invoiceId },
  };
}

// =============================================================================
// Append
// =============================================================================

describe("append", () => {
  it("starts a new stream at version 1", () => {
    const store = new InMemoryEventStore(fixedClock);

    expect(store.append("invoice-1", [makeEvent("invoice.created")])).toEqual({
      streamId: "invoice-1",
      fromVersion: 1,
      toVersion: 1,
      count: 1,
    });
  });

  it("continues versions within a stream and positions across streams", () => {
    const store = new InMemoryEventStore(fixedClock);
    store.append("invoice-1", [makeEvent("invoice.created")]);
    store.append("invoice-2", [makeEvent("invoice.created", 2)]);
    const result = store.append("invoice-1", [makeEvent("invoice.updated"), makeEvent("invoice.updated")]);

    expect(result.fromVersion).toBe(2);
    expect(result.toVersion).toBe(3);
    expect(store.readAll().map((e) => e.globalPosition)).toEqual([1, 2, 3, 4]);
    expect(store.read("invoice-1").map((e) => e.version)).toEqual([1, 2, 3]);
  });

  it("stamps appendedAt from the clock", () => {
    const store = new InMemoryEventStore(fixedClock);
    store.append("invoice-1", [makeEvent("invoice.created")]);

    expect(store.readAll()[0]?.appendedAt).toBe("2025-04-01T12:00:00.000Z");
  });

  it("rejects an empty batch", () => {
    const store = new InMemoryEventStore(fixedClock);
    expect(() => store.append("invoice-1", [])).toThrow(
      expect.objectContaining({ code: "EMPTY_APPEND" }),
    );
  });

  it("rejects a blank stream id", () => {
    const store = new InMemoryEventStore(fixedClock);
    expect(() => store.append(" ", [makeEvent("invoice.created")])).toThrow(EventStoreError);
  });
});

// =============================================================================
// Concurrency
// =============================================================================

describe("expectedVersion", () => {
  it("accepts no_stream for a new stream only", () => {
    const store = new InMemoryEventStore(fixedClock);
    store.append("invoice-1", [makeEvent("invoice.created")], { expectedVersion: "no_stream" });

    expect(() =>
      store.append("invoice-1", [makeEvent("invoice.updated")], { expectedVersion: "no_stream" }),
    ).toThrow(expect.objectContaining({ code: "CONCURRENCY_CONFLICT", streamId: "invoice-1" }));
  });

  it("checks an exact version", () => {
    const store = new InMemoryEventStore(fixedClock);
    store.append("invoice-1", [makeEvent("invoice.created")]);

    expect(() =>
      store.append("invoice-1", [makeEvent("invoice.updated")], { expectedVersion: 0 }),
    ).toThrow(/is at version 1, expected 0/);
    expect(store.append("invoice-1", [makeEvent("invoice.updated")], { expectedVersion: 1 }).toVersion).toBe(2);
  });

  it("leaves the store untouched on conflict", () => {
    const store = new InMemoryEventStore(fixedClock);
    store.append("invoice-1", [makeEvent("invoice.created")]);

    expect(() =>
      store.append("invoice-1", [makeEvent("invoice.updated")], { expectedVersion: 5 }),
    ).toThrow(EventStoreError);
    expect(store.globalPosition()).toBe(1);
  });
});

// =============================================================================
// Read
// =============================================================================

describe("read / readAll", () => {
  function seeded(): InMemoryEventStore {
    const store = new InMemoryEventStore(fixedClock);
    store.append("invoice-1", [makeEvent("a"), makeEvent("b"), makeEvent("c")]);
    store.append("invoice-2", [makeEvent("d", 2)]);
    return store;
  }

  it("returns nothing for an unknown stream", () => {
    expect(seeded().read("invoice-9")).toEqual([]);
  });

  it("reads forward from a version with a limit", () => {
    const events = seeded().read("invoice-1", { fromVersion: 2, maxCount: 1 });
    expect(events.map((e) => e.event.type)).toEqual(["b"]);
  });

  it("reads backward from the head by default", () => {
    const events = seeded().read("invoice-1", { direction: "backward" });
    expect(events.map((e) => e.event.type)).toEqual(["c", "b", "a"]);
  });

  it("rejects a version below 1", () => {
    expect(() => seeded().read("invoice-1", { fromVersion: 0 })).toThrow(
      expect.objectContaining({ code: "INVALID_VERSION" }),
    );
  });

  it("reads all streams from a position", () => {
    const events = seeded().readAll({ fromPosition: 3 });
    expect(events.map((e) => e.event.type)).toEqual(["c", "d"]);
  });

  it("reads all streams backward", () => {
    const events = seeded().readAll({ direction: "backward", maxCount: 2 });
    expect(events.map((e) => e.globalPosition)).toEqual([4, 3]);
  });
});

// =============================================================================
// Subscriptions
// =============================================================================

describe("subscriptions", () => {
  it("delivers a stream's events to its subscribers only", () => {
    const store = new InMemoryEventStore(fixedClock);
    const handler = vi.fn();
    store.subscribe("invoice-1", handler);

    store.append("invoice-2", [makeEvent("invoice.created", 2)]);
    store.append("invoice-1", [makeEvent("invoice.created")]);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0]?.[0]).toMatchObject({ streamId: "invoice-1", version: 1 });
  });

  it("delivers every event to global subscribers in order", () => {
    const store = new InMemoryEventStore(fixedClock);
    const seen: number[] = [];
    store.subscribeAll((e) => seen.push(e.globalPosition));

    store.append("invoice-1", [makeEvent("a"), makeEvent("b")]);
    store.append("invoice-2", [makeEvent("c", 2)]);

    expect(seen).toEqual([1, 2, 3]);
  });

  it("stops delivering after unsubscribe", () => {
    const store = new InMemoryEventStore(fixedClock);
    const streamHandler = vi.fn();
    const globalHandler = vi.fn();
    const s1 = store.subscribe("invoice-1", streamHandler);
    const s2 = store.subscribeAll(globalHandler);

    s1.unsubscribe();
    s2.unsubscribe();
    store.append("invoice-1", [makeEvent("a")]);

    expect(streamHandler).not.toHaveBeenCalled();
    expect(globalHandler).not.toHaveBeenCalled();
  });

  it("has stored the event before the handler runs", () => {
    const store = new InMemoryEventStore(fixedClock);
    let positionSeen = -1;
    store.subscribeAll(() => {
      positionSeen = store.globalPosition();
    });

    store.append("invoice-1", [makeEvent("a")]);

    expect(positionSeen).toBe(1);
  });

  it("reports a throwing handler to the hook and keeps delivering", () => {
    const onHandlerError = vi.fn();
    const store = new InMemoryEventStore(fixedClock, onHandlerError);
    const failure = new Error("handler failed");
    const after = vi.fn();
    store.subscribeAll(() => {
      throw failure;
    });
    store.subscribeAll(after);

    const result = store.append("invoice-1", [makeEvent("a")]);

    expect(result.toVersion).toBe(1);
    expect(store.streamVersion("invoice-1")).toBe(1);
    expect(after).toHaveBeenCalledTimes(1);
    expect(onHandlerError).toHaveBeenCalledTimes(1);
    expect(onHandlerError.mock.calls[0]?.[0]).toBe(failure);
    expect(onHandlerError.mock.calls[0]?.[1]).toMatchObject({ streamId: "invoice-1", version: 1 });
  });

  it("does not fail the append when a stream handler throws without a hook", () => {
    const store = new InMemoryEventStore(fixedClock);
    store.subscribe("invoice-1", () => {
      throw new Error("handler failed");
    });

    expect(() => store.append("invoice-1", [makeEvent("a")])).not.toThrow();
    expect(store.globalPosition()).toBe(1);
  });
});

// =============================================================================
// Query
// =============================================================================

describe("queries", () => {
  it("reports stream existence and versions", () => {
    const store = new InMemoryEventStore(fixedClock);
    expect(store.streamExists("invoice-1")).toBe(false);
    expect(store.streamVersion("invoice-1")).toBe(0);
    expect(store.globalPosition()).toBe(0);

    store.append("invoice-1", [makeEvent("a"), makeEvent("b")]);

    expect(store.streamExists("invoice-1")).toBe(true);
    expect(store.streamVersion("invoice-1")).toBe(2);
    expect(store.globalPosition()).toBe(2);
  });
});
