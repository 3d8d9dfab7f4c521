/**
 * @ledgerline/ledger: Account registry.
 *
 * Manages the chart of accounts. Accounts are immutable once registered.
 * Every party gets one asset account, opened on first use; value enters
 * the ledger through a single equity issuance account.
 */

import type { AccountRef, PartyId } from "@ledgerline/types";
import type { LedgerAccount, NormalBalance } from "./types.js";
import { LedgerError, NORMAL_BALANCE } from "./types.js";

/** Account that funding is drawn from. */
export const ISSUANCE_ACCOUNT: AccountRef = {
  id: "system:issuance",
  type: "equity",
  name: "Issued funds",
};

/**
 * Account ID holding a party's funds.
 */
export function partyAccountId(party: PartyId): string {
  return `party:${party}`;
}

/**
 * Immutable registry of accounts.
 * Append-only: accounts can be added but never modified or removed.
 */
export class AccountRegistry {
  private readonly _accounts: Map<string, LedgerAccount> = new Map();

  /**
   * Register a new account.
   * Throws if account ID already exists.
   */
  register(ref: AccountRef, timestamp: string, party?: PartyId): LedgerAccount {
    if (this._accounts.has(ref.id)) {
      throw new LedgerError(
        "DUPLICATE_ACCOUNT_ID",
        `Account already exists: "${ref.id}"`,
      );
    }

    const base: LedgerAccount = { ref: { ...ref }, createdAt: timestamp };
    const account: LedgerAccount = party !== undefined ? { ...base, party } : base;

    this._accounts.set(ref.id, account);
    return account;
  }

  /**
   * Return the party's account, registering it on first use.
   */
  ensureParty(party: PartyId, timestamp: string): LedgerAccount {
    const id = partyAccountId(party);
    return this._accounts.get(id) ?? this.register(
      { id, type: "asset", name: `Funds of ${party}` },
      timestamp,
      party,
    );
  }

  get(id: string): LedgerAccount | undefined {
    return this._accounts.get(id);
  }

  has(id: string): boolean {
    return this._accounts.has(id);
  }

  /**
   * Assert an account exists. Throws if not found.
   */
  assertExists(id: string): LedgerAccount {
    const account = this._accounts.get(id);
    if (account === undefined) {
      throw new LedgerError("UNKNOWN_ACCOUNT", `Unknown account: "${id}"`);
    }
    return account;
  }

  getNormalBalance(id: string): NormalBalance {
    return NORMAL_BALANCE[this.assertExists(id).ref.type];
  }

  getAll(): readonly LedgerAccount[] {
    return [...this._accounts.values()];
  }

  get count(): number {
    return this._accounts.size;
  }
}
