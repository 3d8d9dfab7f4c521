/**
 * @ledgerline/ledger: Internal types for the balance ledger.
 *
 * Rules:
 * - All types are readonly
 * - No mutation of stored entries
 * - Fail-closed: invalid entries throw, never silently succeed
 */

import type {
  AccountRef,
  Currency,
  LedgerEntry,
  Money,
  PartyId,
} from "@ledgerline/types";

// ─── Account Types ───────────────────────────────────────────────────────

/** The five fundamental account types in double-entry accounting. */
export type AccountType = AccountRef["type"];

/** Normal balance direction for an account. */
export type NormalBalance = "debit" | "credit";

/**
 * Map account types to their normal balance direction.
 *
 * - Asset, Expense → debit-normal (increases with debits)
 * - Liability, Income, Equity → credit-normal (increases with credits)
 */
export const NORMAL_BALANCE: Readonly<Record<AccountType, NormalBalance>> = {
  asset: "debit",
  expense: "debit",
  liability: "credit",
  income: "credit",
  equity: "credit",
} as const;

// ─── Ledger Types ────────────────────────────────────────────────────────

export interface LedgerConfig {
  /** The single currency this ledger settles in */
  readonly currency: Currency;
  readonly decimals: number;

  /** Let party balances go below zero. Default: false */
  readonly allowOverdraft?: boolean;
}

/**
 * An immutable account registered in the ledger.
 */
export interface LedgerAccount {
  readonly ref: AccountRef;
  readonly createdAt: string;

  /** The party this account holds value for (absent for system accounts) */
  readonly party?: PartyId;
}

/**
 * A balanced group of ledger entries sharing a correlation ID.
 */
export interface LedgerTransaction {
  readonly correlationId: string;
  readonly entries: readonly LedgerEntry[];
  readonly timestamp: string;
  readonly description?: string | undefined;
}

/**
 * A single line in the trial balance.
 */
export interface TrialBalanceLine {
  readonly accountId: string;
  readonly accountType: AccountType;
  readonly debitBalance: string;
  readonly creditBalance: string;
}

/**
 * The full trial balance report.
 * Total debits MUST equal total credits.
 */
export interface TrialBalance {
  readonly currency: Currency;
  readonly lines: readonly TrialBalanceLine[];
  readonly generatedAt: string;
  readonly balanced: boolean;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "UNBALANCED_TRANSACTION"
  | "UNKNOWN_ACCOUNT"
  | "CURRENCY_MISMATCH"
  | "INVALID_AMOUNT"
  | "INVALID_MONEY"
  | "INSUFFICIENT_FUNDS"
  | "SELF_TRANSFER"
  | "DUPLICATE_ENTRY_ID"
  | "DUPLICATE_ACCOUNT_ID"
  | "EMPTY_TRANSACTION"
  | "MIXED_CORRELATION_ID";

/**
 * Structured error from the ledger engine.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Append Options ──────────────────────────────────────────────────────

export interface AppendOptions {
  readonly description?: string | undefined;
}

export interface AppendResult {
  readonly correlationId: string;
  readonly entryCount: number;
  readonly timestamp: string;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the entire ledger state.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly config: LedgerConfig;
  readonly accounts: readonly LedgerAccount[];
  readonly entries: readonly LedgerEntry[];
  readonly createdAt: string;
}

// ─── Query Types ─────────────────────────────────────────────────────────

export interface EntryFilter {
  readonly accountId?: string | undefined;
  readonly correlationId?: string | undefined;
  readonly reference?: string | undefined;
  readonly fromTimestamp?: string | undefined;
  readonly toTimestamp?: string | undefined;
}

/**
 * Net position of one party.
 */
export interface PartyBalance {
  readonly party: PartyId;
  readonly balance: Money;
  readonly totalDebits: string;
  readonly totalCredits: string;
}
