/**
 * @ledgerline/ledger: Balance calculation.
 *
 * Computes party balances and the trial balance from the entry log.
 * All calculations are deterministic bigint arithmetic over a single
 * currency.
 *
 * Rules:
 * - Normal balance rules determine sign conventions
 * - Trial balance must always balance (debits = credits)
 */

import type { LedgerEntry, PartyId } from "@ledgerline/types";
import type { AccountRegistry } from "./accounts.js";
import { partyAccountId } from "./accounts.js";
import type {
  LedgerConfig,
  PartyBalance,
  TrialBalance,
  TrialBalanceLine,
} from "./types.js";
import { NORMAL_BALANCE } from "./types.js";
import { formatAmount, parseAmount } from "./money-math.js";

interface Totals {
  debits: bigint;
  credits: bigint;
}

function sumByAccount(entries: readonly LedgerEntry[]): Map<string, Totals> {
  const totals = new Map<string, Totals>();

  for (const entry of entries) {
    let acc = totals.get(entry.accountId);
    if (acc === undefined) {
      acc = { debits: 0n, credits: 0n };
      totals.set(entry.accountId, acc);
    }

    const amount = parseAmount(entry.money.amount, entry.money.decimals);
    if (entry.type === "debit") {
      acc.debits += amount;
    } else {
      acc.credits += amount;
    }
  }

  return totals;
}

/**
 * Net balance of an account in its normal direction, as scaled bigint.
 */
export function netBalance(
  accountId: string,
  entries: readonly LedgerEntry[],
  accounts: AccountRegistry,
): bigint {
  const normal = accounts.getNormalBalance(accountId);
  const totals = sumByAccount(entries.filter((e) => e.accountId === accountId))
    .get(accountId) ?? { debits: 0n, credits: 0n };

  return normal === "debit"
    ? totals.debits - totals.credits
    : totals.credits - totals.debits;
}

/**
 * Compute a party's balance. A party with no account has a zero balance.
 */
export function computePartyBalance(
  party: PartyId,
  entries: readonly LedgerEntry[],
  accounts: AccountRegistry,
  config: LedgerConfig,
): PartyBalance {
  const accountId = partyAccountId(party);
  const zero = formatAmount(0n, config.decimals);

  if (!accounts.has(accountId)) {
    return {
      party,
      balance: { amount: zero, currency: config.currency, decimals: config.decimals },
      totalDebits: zero,
      totalCredits: zero,
    };
  }

  const totals = sumByAccount(entries.filter((e) => e.accountId === accountId))
    .get(accountId) ?? { debits: 0n, credits: 0n };

  return {
    party,
    balance: {
      amount: formatAmount(netBalance(accountId, entries, accounts), config.decimals),
      currency: config.currency,
      decimals: config.decimals,
    },
    totalDebits: formatAmount(totals.debits, config.decimals),
    totalCredits: formatAmount(totals.credits, config.decimals),
  };
}

/**
 * Compute the trial balance from all entries.
 *
 * A positive net in the account's normal direction goes to that column;
 * a contra balance goes to the other one.
 */
export function computeTrialBalance(
  entries: readonly LedgerEntry[],
  accounts: AccountRegistry,
  config: LedgerConfig,
  timestamp: string,
): TrialBalance {
  const lines: TrialBalanceLine[] = [];
  let totalDebits = 0n;
  let totalCredits = 0n;

  for (const [accountId, totals] of sumByAccount(entries)) {
    const accountType = accounts.assertExists(accountId).ref.type;
    const netDebit = totals.debits - totals.credits;

    let debitBalance = 0n;
    let creditBalance = 0n;
    if (NORMAL_BALANCE[accountType] === "debit") {
      if (netDebit >= 0n) debitBalance = netDebit;
      else creditBalance = -netDebit;
    } else {
      if (netDebit <= 0n) creditBalance = -netDebit;
      else debitBalance = netDebit;
    }

    lines.push({
      accountId,
      accountType,
      debitBalance: formatAmount(debitBalance, config.decimals),
      creditBalance: formatAmount(creditBalance, config.decimals),
    });

    totalDebits += debitBalance;
    totalCredits += creditBalance;
  }

  return {
    currency: config.currency,
    lines,
    generatedAt: timestamp,
    balanced: totalDebits === totalCredits,
  };
}
