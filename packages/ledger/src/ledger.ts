/**
 * @ledgerline/ledger: Core Ledger class.
 *
 * Append-only double-entry ledger holding one asset account per party.
 * It is the value transfer rail behind invoice settlement: a transfer
 * is a balanced credit/debit pair written in one append, so it either
 * lands in full or not at all.
 *
 * API surface:
 * - openAccount(): Open a party's account (idempotent)
 * - fund(): Issue value to a party
 * - post() / transfer(): Move value between parties
 * - append(): Append a balanced set of entries
 * - getBalance() / getPartyBalance(): Party position
 * - getTrialBalance(): Compute the full trial balance
 * - getEntries(): Query entries with optional filters
 * - snapshot() / fromSnapshot(): Serialize and restore
 *
 * There is NO update(), delete(), or modify(). Corrections are new entries.
 */

import {
  systemClock,
  type Clock,
  type LedgerEntry,
  type Money,
  type PartyId,
  type TransferOutcome,
  type TransferRail,
  type TransferRequest,
} from "@ledgerline/types";
import { AccountRegistry, ISSUANCE_ACCOUNT, partyAccountId } from "./accounts.js";
import {
  computePartyBalance,
  computeTrialBalance,
  netBalance,
} from "./balance-calculator.js";
import { parseAmount, validateMoney } from "./money-math.js";
import type {
  AppendOptions,
  AppendResult,
  EntryFilter,
  LedgerAccount,
  LedgerConfig,
  LedgerSnapshot,
  LedgerTransaction,
  PartyBalance,
  TrialBalance,
} from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Record of a completed transfer.
 */
export interface TransferReceipt {
  readonly transferId: string;
  readonly from: PartyId;
  readonly to: PartyId;
  readonly money: Money;
  readonly timestamp: string;
}

export class Ledger implements TransferRail {
  private readonly _config: LedgerConfig;
  private readonly _clock: Clock;
  private readonly _accounts: AccountRegistry = new AccountRegistry();
  private readonly _entries: LedgerEntry[] = [];
  private readonly _entryIds: Set<string> = new Set();
  private readonly _transactions: LedgerTransaction[] = [];

  constructor(config: LedgerConfig, clock: Clock = systemClock) {
    if (config.currency.trim() === "") {
      throw new LedgerError("INVALID_MONEY", "Ledger currency must be a non-empty string");
    }
    if (!Number.isInteger(config.decimals) || config.decimals < 0) {
      throw new LedgerError(
        "INVALID_MONEY",
        `Ledger decimals must be a non-negative integer, got: ${String(config.decimals)}`,
      );
    }
    this._config = { ...config };
    this._clock = clock;
  }

  get config(): LedgerConfig {
    return this._config;
  }

  /** Correlation id the next recorded transaction will carry. */
  get nextCorrelationId(): string {
    return this._nextCorrelationId();
  }

  // ─── Accounts ────────────────────────────────────────────────────────

  /**
   * Open the party's account. Returns the existing one if already open.
   */
  openAccount(party: PartyId): LedgerAccount {
    return this._accounts.ensureParty(party, this._now());
  }

  getAccount(party: PartyId): LedgerAccount | undefined {
    return this._accounts.get(partyAccountId(party));
  }

  getAccounts(): readonly LedgerAccount[] {
    return this._accounts.getAll();
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  /**
   * Issue value to a party, drawn from the issuance account.
   */
  fund(party: PartyId, money: Money, description?: string): AppendResult {
    const scaled = this._parseLedgerMoney(money);
    if (scaled <= 0n) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Funding amount must be positive, got "${money.amount}"`,
      );
    }

    const timestamp = this._now();
    if (!this._accounts.has(ISSUANCE_ACCOUNT.id)) {
      this._accounts.register(ISSUANCE_ACCOUNT, timestamp);
    }
    const account = this._accounts.ensureParty(party, timestamp);
    const correlationId = this._nextCorrelationId();

    return this.append(
      [
        this._entry(correlationId, "debit", account.ref.id, money, timestamp),
        this._entry(correlationId, "credit", ISSUANCE_ACCOUNT.id, money, timestamp),
      ],
      { description: description ?? `Fund ${party}` },
    );
  }

  /**
   * Move value between two parties. Throws LedgerError on any violation.
   *
   * A zero amount is accepted and records nothing.
   */
  post(request: TransferRequest): TransferReceipt {
    const { from, to, money, reference } = request;

    if (from === to) {
      throw new LedgerError("SELF_TRANSFER", `Cannot transfer from "${from}" to itself`);
    }

    const scaled = this._parseLedgerMoney(money);
    if (scaled < 0n) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Transfer amount must not be negative, got "${money.amount}"`,
      );
    }

    const timestamp = this._now();
    if (scaled === 0n) {
      return { transferId: `noop:${reference}`, from, to, money, timestamp };
    }

    const source = this._accounts.ensureParty(from, timestamp);
    const target = this._accounts.ensureParty(to, timestamp);

    if (this._config.allowOverdraft !== true) {
      const available = netBalance(source.ref.id, this._entries, this._accounts);
      if (available < scaled) {
        throw new LedgerError(
          "INSUFFICIENT_FUNDS",
          `Party "${from}" cannot cover ${money.amount} ${money.currency}`,
        );
      }
    }

    const correlationId = this._nextCorrelationId();
    this.append(
      [
        this._entry(correlationId, "credit", source.ref.id, money, timestamp, reference),
        this._entry(correlationId, "debit", target.ref.id, money, timestamp, reference),
      ],
      { description: `Transfer ${from} → ${to} (${reference})` },
    );

    return { transferId: correlationId, from, to, money, timestamp };
  }

  /**
   * TransferRail entry point. Ledger violations become a failed outcome;
   * anything else propagates.
   */
  async transfer(request: TransferRequest): Promise<TransferOutcome> {
    try {
      const receipt = this.post(request);
      return { ok: true, transferId: receipt.transferId };
    } catch (err) {
      if (err instanceof LedgerError) {
        return { ok: false, reason: `${err.code}: ${err.message}` };
      }
      throw err;
    }
  }

  /**
   * Append a balanced set of ledger entries.
   *
   * Validation rules (fail-closed: all must pass):
   * 1. Entries array must not be empty
   * 2. All entries must share the same correlationId
   * 3. All entry IDs must be unique (globally)
   * 4. All referenced accounts must exist
   * 5. All Money values must be valid and in the ledger currency
   * 6. All entry amounts must be positive
   * 7. Total debits must equal total credits
   */
  append(entries: readonly LedgerEntry[], options?: AppendOptions): AppendResult {
    const first = entries[0];
    if (first === undefined) {
      throw new LedgerError("EMPTY_TRANSACTION", "Cannot append an empty set of entries");
    }

    const correlationId = first.correlationId;
    const batchIds = new Set<string>();
    let debits = 0n;
    let credits = 0n;

    for (const entry of entries) {
      if (entry.correlationId !== correlationId) {
        throw new LedgerError(
          "MIXED_CORRELATION_ID",
          `All entries must share the same correlationId. Expected "${correlationId}", got "${entry.correlationId}"`,
        );
      }
      if (this._entryIds.has(entry.id) || batchIds.has(entry.id)) {
        throw new LedgerError("DUPLICATE_ENTRY_ID", `Duplicate entry ID: "${entry.id}"`);
      }
      batchIds.add(entry.id);

      this._accounts.assertExists(entry.accountId);

      const amount = this._parseLedgerMoney(entry.money);
      if (amount <= 0n) {
        throw new LedgerError(
          "INVALID_AMOUNT",
          `Entry amounts must be positive. Entry "${entry.id}" has amount "${entry.money.amount}"`,
        );
      }

      if (entry.type === "debit") {
        debits += amount;
      } else {
        credits += amount;
      }
    }

    if (debits !== credits) {
      throw new LedgerError(
        "UNBALANCED_TRANSACTION",
        `Transaction "${correlationId}" is unbalanced: debits=${debits.toString()}, credits=${credits.toString()}`,
      );
    }

    for (const entry of entries) {
      this._entries.push(entry);
      this._entryIds.add(entry.id);
    }

    this._transactions.push({
      correlationId,
      entries: [...entries],
      timestamp: first.timestamp,
      description: options?.description,
    });

    return { correlationId, entryCount: entries.length, timestamp: first.timestamp };
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getBalance(party: PartyId): Money {
    return this.getPartyBalance(party).balance;
  }

  getPartyBalance(party: PartyId): PartyBalance {
    return computePartyBalance(party, this._entries, this._accounts, this._config);
  }

  getTrialBalance(): TrialBalance {
    return computeTrialBalance(this._entries, this._accounts, this._config, this._now());
  }

  getEntries(filter?: EntryFilter): readonly LedgerEntry[] {
    if (filter === undefined) {
      return [...this._entries];
    }

    return this._entries.filter((entry) => {
      if (filter.accountId !== undefined && entry.accountId !== filter.accountId) {
        return false;
      }
      if (filter.correlationId !== undefined && entry.correlationId !== filter.correlationId) {
        return false;
      }
      if (filter.reference !== undefined && entry.reference !== filter.reference) {
        return false;
      }
      if (filter.fromTimestamp !== undefined && entry.timestamp < filter.fromTimestamp) {
        return false;
      }
      if (filter.toTimestamp !== undefined && entry.timestamp > filter.toTimestamp) {
        return false;
      }
      return true;
    });
  }

  getTransactions(): readonly LedgerTransaction[] {
    return [...this._transactions];
  }

  get entryCount(): number {
    return this._entries.length;
  }

  get transactionCount(): number {
    return this._transactions.length;
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      config: this._config,
      accounts: this._accounts.getAll(),
      entries: [...this._entries],
      createdAt: this._now(),
    };
  }

  /**
   * Restore a ledger from a snapshot, replaying every transaction
   * through full validation.
   */
  static fromSnapshot(snapshot: LedgerSnapshot, clock?: Clock): Ledger {
    const ledger = new Ledger(snapshot.config, clock);

    for (const account of snapshot.accounts) {
      ledger._accounts.register(account.ref, account.createdAt, account.party);
    }

    const groups = new Map<string, LedgerEntry[]>();
    for (const entry of snapshot.entries) {
      let group = groups.get(entry.correlationId);
      if (group === undefined) {
        group = [];
        groups.set(entry.correlationId, group);
      }
      group.push(entry);
    }

    for (const entries of groups.values()) {
      ledger.append(entries);
    }

    return ledger;
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private _now(): string {
    return this._clock.now().toISOString();
  }

  private _nextCorrelationId(): string {
    return `txn-${String(this._transactions.length + 1)}`;
  }

  private _parseLedgerMoney(money: Money): bigint {
    validateMoney(money);
    if (money.currency !== this._config.currency || money.decimals !== this._config.decimals) {
      throw new LedgerError(
        "CURRENCY_MISMATCH",
        `Ledger settles in ${this._config.currency}/${String(this._config.decimals)}, got ${money.currency}/${String(money.decimals)}`,
      );
    }
    return parseAmount(money.amount, money.decimals);
  }

  private _entry(
    correlationId: string,
    type: "debit" | "credit",
    accountId: string,
    money: Money,
    timestamp: string,
    reference?: string,
  ): LedgerEntry {
    const base: LedgerEntry = {
      id: `${correlationId}:${type}`,
      accountId,
      type,
      money,
      timestamp,
      correlationId,
    };
    return reference !== undefined ? { ...base, reference } : base;
  }
}
