/**
 * @payledger/ledger — Disputable transaction history.
 *
 * Remembers every accepted deposit and withdrawal by transaction ID,
 * together with where it sits in the dispute lifecycle.
 *
 * Rules:
 * - No duplicate transaction IDs
 * - Entries are never removed
 * - Status only moves none → disputed → resolved | charged_back
 */

import type {
  Amount,
  ClientId,
  DisputeStatus,
  FundsTransactionType,
  TransactionId,
} from "@payledger/types";
import type { KeyedHistoryEntry } from "./types.js";

/** Which status each status may move to. */
const TRANSITIONS: Readonly<Record<DisputeStatus, readonly DisputeStatus[]>> = {
  none: ["disputed"],
  disputed: ["resolved", "charged_back"],
  resolved: [],
  charged_back: [],
} as const;

export function canTransition(from: DisputeStatus, to: DisputeStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Append-only registry of disputable transactions.
 */
export class TransactionHistory {
  private readonly _entries: Map<TransactionId, KeyedHistoryEntry> = new Map();

  /**
   * Record an accepted deposit or withdrawal with status "none".
   * Returns false (and records nothing) when the ID is already taken.
   */
  record(
    tx: TransactionId,
    client: ClientId,
    kind: FundsTransactionType,
    amount: Amount,
  ): boolean {
    if (this._entries.has(tx)) {
      return false;
    }
    this._entries.set(tx, { tx, client, kind, amount, status: "none" });
    return true;
  }

  get(tx: TransactionId): KeyedHistoryEntry | undefined {
    return this._entries.get(tx);
  }

  has(tx: TransactionId): boolean {
    return this._entries.has(tx);
  }

  /**
   * Move an entry to a new status.
   * Returns false when the entry is missing or the move is not allowed.
   */
  transition(tx: TransactionId, to: DisputeStatus): boolean {
    const entry = this._entries.get(tx);
    if (entry === undefined || !canTransition(entry.status, to)) {
      return false;
    }
    this._entries.set(tx, { ...entry, status: to });
    return true;
  }

  /** Sum of amounts currently under dispute for one client. */
  disputedTotal(client: ClientId): Amount {
    let total = 0n;
    for (const entry of this._entries.values()) {
      if (entry.client === client && entry.status === "disputed") {
        total += entry.amount;
      }
    }
    return total;
  }

  getAll(): readonly KeyedHistoryEntry[] {
    return [...this._entries.values()];
  }

  get count(): number {
    return this._entries.size;
  }
}
