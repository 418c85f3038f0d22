/**
 * @payledger/ledger — Core Ledger class.
 *
 * Owns every client account and the history of disputable transactions,
 * and applies one record at a time through the dispute state machine.
 *
 * API surface:
 * - apply() — Apply one record; returns whether it was applied or rejected
 * - snapshot() — Render every account, ascending by client
 * - getAccount() / hasAccount() — Account lookup
 * - getHistoryEntry() — Disputable history lookup
 * - stats — Applied/rejected totals
 * - assertInvariants() — Full consistency check
 *
 * Business-rule rejections never throw. A rejected record leaves every
 * balance and history entry untouched. Only a broken balance invariant throws.
 */

import type {
  AccountView,
  Amount,
  Chargeback,
  ClientId,
  Deposit,
  Dispute,
  Resolve,
  TransactionId,
  TransactionRecord,
  Withdrawal,
} from "@payledger/types";
import { isTransactionRecord } from "@payledger/types";
import { formatAmount } from "./amount.js";
import { ClientAccount } from "./client-account.js";
import { TransactionHistory } from "./transaction-history.js";
import type {
  AccountBalances,
  AmountFailure,
  ApplyOutcome,
  KeyedHistoryEntry,
  LedgerStats,
  RejectionCode,
} from "./types.js";
import { LedgerError } from "./types.js";

/**
 * In-memory payments ledger.
 *
 * State machine per history entry (driven here, not by the account):
 *
 *   deposit/withdrawal → none
 *   dispute            none → disputed       (available → held)
 *   resolve            disputed → resolved   (held → available)
 *   chargeback         disputed → charged_back (held removed, account locked)
 *
 * Deposits and withdrawals are refused on locked accounts; the three
 * dispute kinds are still processed there.
 */
export class Ledger {
  protected readonly _accounts: Map<ClientId, ClientAccount> = new Map();
  private readonly _history: TransactionHistory = new TransactionHistory();
  private _applied = 0;
  private _rejected = 0;
  private readonly _rejectionsByCode: Partial<Record<RejectionCode, number>> = {};

  // ─── Apply (The Only Write Operation) ────────────────────────────────

  /**
   * Apply a single record in input order.
   *
   * The client's account is created on first reference, even when the
   * record itself is rejected.
   */
  apply(record: TransactionRecord): ApplyOutcome {
    if (!isTransactionRecord(record)) {
      return this._reject(record, "MALFORMED_RECORD", "Record failed structural validation");
    }

    const account = this._accountFor(record.client);

    switch (record.type) {
      case "deposit":
        return this._deposit(account, record);
      case "withdrawal":
        return this._withdraw(account, record);
      case "dispute":
        return this._dispute(account, record);
      case "resolve":
        return this._resolve(account, record);
      case "chargeback":
        return this._chargeback(account, record);
    }
  }

  // ─── Handlers ────────────────────────────────────────────────────────

  private _deposit(account: ClientAccount, record: Deposit): ApplyOutcome {
    const refusal = this._checkFundsPreconditions(account, record);
    if (refusal !== undefined) return refusal;

    const failure = account.credit(record.amount);
    if (failure !== undefined) {
      return this._rejectArithmetic(record, failure);
    }

    this._history.record(record.tx, record.client, "deposit", record.amount);
    return this._accept(account, record);
  }

  private _withdraw(account: ClientAccount, record: Withdrawal): ApplyOutcome {
    const refusal = this._checkFundsPreconditions(account, record);
    if (refusal !== undefined) return refusal;

    const failure = account.debit(record.amount);
    if (failure !== undefined) {
      return this._rejectArithmetic(record, failure);
    }

    this._history.record(record.tx, record.client, "withdrawal", record.amount);
    return this._accept(account, record);
  }

  private _dispute(account: ClientAccount, record: Dispute): ApplyOutcome {
    const lookup = this._lookupDisputable(record, "none");
    if (lookup.outcome !== undefined) return lookup.outcome;

    const failure = account.hold(lookup.entry.amount);
    if (failure !== undefined) {
      return this._rejectArithmetic(record, failure);
    }

    this._history.transition(record.tx, "disputed");
    return this._accept(account, record);
  }

  private _resolve(account: ClientAccount, record: Resolve): ApplyOutcome {
    const lookup = this._lookupDisputable(record, "disputed");
    if (lookup.outcome !== undefined) return lookup.outcome;

    const failure = account.release(lookup.entry.amount);
    if (failure === "negative") {
      this._violation(account, `held cannot cover resolved tx ${String(record.tx)}`);
    }
    if (failure === "overflow") {
      this._violation(account, `releasing tx ${String(record.tx)} overflows available`);
    }

    this._history.transition(record.tx, "resolved");
    return this._accept(account, record);
  }

  private _chargeback(account: ClientAccount, record: Chargeback): ApplyOutcome {
    const lookup = this._lookupDisputable(record, "disputed");
    if (lookup.outcome !== undefined) return lookup.outcome;

    const failure = account.chargeBack(lookup.entry.amount);
    if (failure !== undefined) {
      this._violation(account, `held cannot cover charged-back tx ${String(record.tx)}`);
    }

    this._history.transition(record.tx, "charged_back");
    return this._accept(account, record);
  }

  // ─── Shared Checks ───────────────────────────────────────────────────

  private _checkFundsPreconditions(
    account: ClientAccount,
    record: Deposit | Withdrawal,
  ): ApplyOutcome | undefined {
    if (account.locked) {
      return this._reject(
        record,
        "ACCOUNT_LOCKED",
        `Client ${String(record.client)} is locked; ${record.type} ${String(record.tx)} refused`,
      );
    }
    if (this._history.has(record.tx)) {
      return this._reject(
        record,
        "DUPLICATE_TRANSACTION",
        `Transaction ${String(record.tx)} already exists`,
      );
    }
    return undefined;
  }

  /**
   * Find the history entry a dispute-kind record refers to and check
   * ownership and current status.
   */
  private _lookupDisputable(
    record: Dispute | Resolve | Chargeback,
    expected: "none" | "disputed",
  ):
    | { readonly entry: KeyedHistoryEntry; readonly outcome?: undefined }
    | { readonly entry?: undefined; readonly outcome: ApplyOutcome } {
    const entry = this._history.get(record.tx);
    if (entry === undefined) {
      return {
        outcome: this._reject(
          record,
          "UNKNOWN_TRANSACTION",
          `No deposit or withdrawal with ID ${String(record.tx)}`,
        ),
      };
    }
    if (entry.client !== record.client) {
      return {
        outcome: this._reject(
          record,
          "CLIENT_MISMATCH",
          `Transaction ${String(record.tx)} belongs to client ${String(entry.client)}, not ${String(record.client)}`,
        ),
      };
    }
    if (entry.status !== expected) {
      return {
        outcome: this._reject(
          record,
          "INVALID_TRANSITION",
          `Cannot ${record.type} transaction ${String(record.tx)} in status "${entry.status}"`,
        ),
      };
    }
    return { entry };
  }

  // ─── Outcomes ────────────────────────────────────────────────────────

  private _accept(account: ClientAccount, record: TransactionRecord): ApplyOutcome {
    if (account.available < 0n || account.held < 0n) {
      this._violation(account, `negative balance after ${record.type} ${String(record.tx)}`);
    }
    this._applied++;
    return { status: "applied", record };
  }

  private _reject(record: TransactionRecord, code: RejectionCode, message: string): ApplyOutcome {
    this._rejected++;
    this._rejectionsByCode[code] = (this._rejectionsByCode[code] ?? 0) + 1;
    return { status: "rejected", record, code, message };
  }

  private _rejectArithmetic(record: TransactionRecord, failure: AmountFailure): ApplyOutcome {
    if (failure === "negative") {
      return this._reject(
        record,
        "INSUFFICIENT_FUNDS",
        `Insufficient available funds for ${record.type} ${String(record.tx)}`,
      );
    }
    return this._reject(
      record,
      "AMOUNT_OVERFLOW",
      `${record.type} ${String(record.tx)} would overflow the account balance`,
    );
  }

  private _violation(account: ClientAccount, detail: string): never {
    throw new LedgerError(
      "INVARIANT_VIOLATION",
      `Invariant violated for client ${String(account.client)}: ${detail}`,
    );
  }

  private _accountFor(client: ClientId): ClientAccount {
    let account = this._accounts.get(client);
    if (account === undefined) {
      account = new ClientAccount(client);
      this._accounts.set(client, account);
    }
    return account;
  }

  // ─── Query Operations ────────────────────────────────────────────────

  /**
   * Render every account ever referenced, ascending by client ID.
   */
  snapshot(): readonly AccountView[] {
    return [...this._accounts.values()]
      .sort((a, b) => a.client - b.client)
      .map((account) => account.toView());
  }

  /** Point-in-time balances; accounts change only through apply(). */
  getAccount(client: ClientId): AccountBalances | undefined {
    return this._accounts.get(client)?.balances();
  }

  hasAccount(client: ClientId): boolean {
    return this._accounts.has(client);
  }

  getHistoryEntry(tx: TransactionId): KeyedHistoryEntry | undefined {
    return this._history.get(tx);
  }

  get accountCount(): number {
    return this._accounts.size;
  }

  get historyCount(): number {
    return this._history.count;
  }

  get stats(): LedgerStats {
    return {
      applied: this._applied,
      rejected: this._rejected,
      rejectionsByCode: { ...this._rejectionsByCode },
    };
  }

  /**
   * Re-check every account: non-negative balances, and held equal to the
   * sum of that client's open disputes.
   *
   * Throws LedgerError("INVARIANT_VIOLATION") on the first failure.
   */
  assertInvariants(): void {
    for (const account of this._accounts.values()) {
      if (account.available < 0n) {
        this._violation(account, `available is ${formatAmount(account.available)}`);
      }
      if (account.held < 0n) {
        this._violation(account, `held is ${formatAmount(account.held)}`);
      }
      const disputed: Amount = this._history.disputedTotal(account.client);
      if (account.held !== disputed) {
        this._violation(
          account,
          `held ${formatAmount(account.held)} does not match open disputes ${formatAmount(disputed)}`,
        );
      }
    }
  }
}
