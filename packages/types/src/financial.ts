/**
 * Financial Types
 *
 * Core financial primitives for deterministic accounting.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Currency is always explicit (no implicit USD)
 * - Ledger entries are append-only by contract
 */

/**
 * Currency identifier (ISO 4217 code or token symbol).
 */
export type Currency = string;

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 */
export interface Money {
  /** String representation of the amount (e.g., "100.50", "1000000") */
  readonly amount: string;

  /** Currency symbol or identifier (e.g., "EUR", "USDC") */
  readonly currency: Currency;

  /** Number of decimal places for this currency. */
  readonly decimals: number;
}

/**
 * Reference to an account in the ledger.
 */
export interface AccountRef {
  /** Unique account identifier */
  readonly id: string;

  /** Account type (asset, liability, income, expense, equity) */
  readonly type: "asset" | "liability" | "income" | "expense" | "equity";

  /** Human-readable name */
  readonly name: string;
}

/**
 * Type of ledger entry (double-entry accounting).
 */
export type LedgerEntryType = "debit" | "credit";

/**
 * A single line in the ledger.
 * Always part of a balanced transaction (debits = credits).
 */
export interface LedgerEntry {
  /** Unique entry identifier */
  readonly id: string;

  /** Which account this entry affects */
  readonly accountId: string;

  /** Debit or credit */
  readonly type: LedgerEntryType;

  /** The amount */
  readonly money: Money;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** External reference that caused this entry (e.g. "invoice-3") */
  readonly reference?: string;

  /** Correlation ID for grouping related entries */
  readonly correlationId: string;
}
