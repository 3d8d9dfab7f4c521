/**
 * @ledgerline/ledger: Append-only double-entry balance ledger.
 *
 * Holds party balances and moves value between parties for invoice
 * settlement. Enforces double-entry invariants:
 * - Every transaction balances (debits = credits)
 * - Entries are immutable once appended
 * - All monetary arithmetic uses bigint (no floating point)
 */

// Core engine
export { Ledger } from "./ledger.js";
export type { TransferReceipt } from "./ledger.js";

// Account registry
export { AccountRegistry, ISSUANCE_ACCOUNT, partyAccountId } from "./accounts.js";

// Balance computation
export {
  computePartyBalance,
  computeTrialBalance,
  netBalance,
} from "./balance-calculator.js";

// Money arithmetic
export {
  parseAmount,
  formatAmount,
  validateMoney,
  normalizeMoney,
  moneyEquals,
  isNegative,
} from "./money-math.js";

// Types
export type {
  AccountType,
  NormalBalance,
  LedgerAccount,
  LedgerConfig,
  LedgerTransaction,
  PartyBalance,
  TrialBalanceLine,
  TrialBalance,
  LedgerErrorCode,
  AppendOptions,
  AppendResult,
  LedgerSnapshot,
  EntryFilter,
} from "./types.js";

export { LedgerError, NORMAL_BALANCE } from "./types.js";
