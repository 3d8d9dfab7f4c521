/**
 * @ledgerline/ledger: Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be valid decimal strings
 */

import type { Money } from "@ledgerline/types";
import { LedgerError } from "./types.js";

// ─── Internal Helpers ────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  // Validate format: optional minus, digits, optional decimal point + digits
  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  // Check that fractional part doesn't exceed allowed decimals
  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but currency allows ${String(decimals)}`,
    );
  }

  // Pad or truncate fractional part to exact decimal places
  const paddedFrac = fracPart.padEnd(decimals, "0");
  const combined = intPart + paddedFrac;
  const value = BigInt(combined);

  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 100000000n with decimals=6 → "100.000000"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

// ─── Public API ──────────────────────────────────────────────────────────

/**
 * Validate that a Money object is well-formed.
 * Throws LedgerError if invalid.
 */
export function validateMoney(money: Money): void {
  if (typeof money.amount !== "string" || money.amount.trim() === "") {
    throw new LedgerError("INVALID_MONEY", `Money amount must be a non-empty string, got: "${String(money.amount)}"`);
  }

  if (typeof money.currency !== "string" || money.currency.trim() === "") {
    throw new LedgerError("INVALID_MONEY", `Money currency must be a non-empty string, got: "${String(money.currency)}"`);
  }

  if (typeof money.decimals !== "number" || !Number.isInteger(money.decimals) || money.decimals < 0) {
    throw new LedgerError("INVALID_MONEY", `Money decimals must be a non-negative integer, got: ${String(money.decimals)}`);
  }

  // Validate the amount can be parsed
  parseAmount(money.amount, money.decimals);
}

/**
 * Check if a Money amount is negative (< 0).
 */
export function isNegative(money: Money): boolean {
  return parseAmount(money.amount, money.decimals) < 0n;
}

/**
 * Rewrite a Money value with its amount padded to the currency's
 * decimals: { amount: "100", decimals: 2 } → { amount: "100.00", ... }.
 */
export function normalizeMoney(money: Money): Money {
  validateMoney(money);
  return {
    amount: formatAmount(parseAmount(money.amount, money.decimals), money.decimals),
    currency: money.currency,
    decimals: money.decimals,
  };
}

/**
 * Same currency, same decimals, same scaled value.
 * Never throws on a currency mismatch.
 */
export function moneyEquals(a: Money, b: Money): boolean {
  if (a.currency !== b.currency || a.decimals !== b.decimals) {
    return false;
  }
  return parseAmount(a.amount, a.decimals) === parseAmount(b.amount, b.decimals);
}
