/**
 * @payledger/ledger — Per-client account balances.
 *
 * Holds available/held funds and the locked flag for one client.
 * The account never looks up transaction history; the Ledger decides
 * which movement a record causes and calls the matching primitive here.
 *
 * Rules:
 * - available ≥ 0 and held ≥ 0 after every call
 * - total is derived, never stored
 * - a failed movement leaves both balances untouched
 */

import type { AccountView, Amount, ClientId } from "@payledger/types";
import { checkedAdd, checkedSub, formatAmount, ZERO_AMOUNT } from "./amount.js";
import type { AccountBalances, AmountFailure } from "./types.js";

/**
 * Mutable balance state for a single client.
 * Each movement returns undefined on success or the arithmetic failure.
 */
export class ClientAccount {
  readonly client: ClientId;
  private _available: Amount = ZERO_AMOUNT;
  private _held: Amount = ZERO_AMOUNT;
  private _locked = false;

  constructor(client: ClientId) {
    this.client = client;
  }

  get available(): Amount {
    return this._available;
  }

  get held(): Amount {
    return this._held;
  }

  get total(): Amount {
    return this._available + this._held;
  }

  get locked(): boolean {
    return this._locked;
  }

  // ─── Movements ───────────────────────────────────────────────────────

  /** available += amount */
  credit(amount: Amount): AmountFailure | undefined {
    const next = checkedAdd(this._available, amount);
    if (!next.ok) return next.error;
    this._available = next.value;
    return undefined;
  }

  /** available -= amount; fails with `negative` on insufficient funds. */
  debit(amount: Amount): AmountFailure | undefined {
    const next = checkedSub(this._available, amount);
    if (!next.ok) return next.error;
    this._available = next.value;
    return undefined;
  }

  /** Move amount from available to held. */
  hold(amount: Amount): AmountFailure | undefined {
    return this._move("available", "held", amount);
  }

  /** Move amount from held back to available. */
  release(amount: Amount): AmountFailure | undefined {
    return this._move("held", "available", amount);
  }

  /** Remove amount from held for good and lock the account. */
  chargeBack(amount: Amount): AmountFailure | undefined {
    const next = checkedSub(this._held, amount);
    if (!next.ok) return next.error;
    this._held = next.value;
    this.lock();
    return undefined;
  }

  /** Locking is permanent. */
  lock(): void {
    this._locked = true;
  }

  private _move(
    from: "available" | "held",
    to: "available" | "held",
    amount: Amount,
  ): AmountFailure | undefined {
    const source = checkedSub(this[from], amount);
    if (!source.ok) return source.error;
    const target = checkedAdd(this[to], amount);
    if (!target.ok) return target.error;

    if (from === "available") {
      this._available = source.value;
      this._held = target.value;
    } else {
      this._held = source.value;
      this._available = target.value;
    }
    return undefined;
  }

  // ─── Views ───────────────────────────────────────────────────────────

  balances(): AccountBalances {
    return {
      client: this.client,
      available: this._available,
      held: this._held,
      total: this.total,
      locked: this._locked,
    };
  }

  toView(): AccountView {
    return {
      client: this.client,
      available: formatAmount(this._available),
      held: formatAmount(this._held),
      total: formatAmount(this.total),
      locked: this._locked,
    };
  }
}
