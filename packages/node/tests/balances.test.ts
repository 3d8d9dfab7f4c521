/**
 * Tests for ledger balance routes.
 */

import { describe, it, expect } from "vitest";
import { ADMIN, ALICE, BOB, createTestApp, eur, partyRequest } from "./setup.js";

describe("GET /api/v1/balances/:party", () => {
  it("returns a zero balance for a party the ledger has never seen", async () => {
    const { app } = createTestApp();
    const res = await app.request(partyRequest(ALICE, "/api/v1/balances/carol"));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        party: "carol",
        balance: eur("0.00"),
        totalDebits: "0.00",
        totalCredits: "0.00",
      },
    });
  });
});

describe("POST /api/v1/balances/:party/fund", () => {
  it("issues value to the party", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      partyRequest(ADMIN, `/api/v1/balances/${BOB}/fund`, "POST", { amount: eur("1000.00") }),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        party: BOB,
        balance: eur("1000.00"),
        totalDebits: "1000.00",
        totalCredits: "0.00",
      },
    });
  });

  it("accumulates repeated funding", async () => {
    const { app } = createTestApp();
    await app.request(
      partyRequest(ADMIN, `/api/v1/balances/${BOB}/fund`, "POST", { amount: eur("100.00") }),
    );
    await app.request(
      partyRequest(ADMIN, `/api/v1/balances/${BOB}/fund`, "POST", { amount: eur("25.50") }),
    );

    const res = await app.request(partyRequest(BOB, `/api/v1/balances/${BOB}`));
    expect(await res.json()).toMatchObject({ data: { balance: eur("125.50") } });
  });

  it("returns 403 for anyone but the administrative party", async () => {
    const { app, service } = createTestApp();
    const res = await app.request(
      partyRequest(ALICE, `/api/v1/balances/${ALICE}/fund`, "POST", { amount: eur("1000.00") }),
    );

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({
      error: { code: "UNAUTHORIZED", message: 'Party "alice" may not fund accounts' },
    });
    expect(service.ledger.transactionCount).toBe(0);
  });

  it("returns 400 INVALID_AMOUNT for a zero amount", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      partyRequest(ADMIN, `/api/v1/balances/${BOB}/fund`, "POST", { amount: eur("0.00") }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "INVALID_AMOUNT", message: 'Funding amount must be positive, got "0.00"' },
    });
  });

  it("returns 400 CURRENCY_MISMATCH for a foreign currency", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      partyRequest(ADMIN, `/api/v1/balances/${BOB}/fund`, "POST", {
        amount: { amount: "10.00", currency: "USD", decimals: 2 },
      }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: "CURRENCY_MISMATCH" } });
  });
});
