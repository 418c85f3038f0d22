/**
 * Account Types
 *
 * Read-side shapes produced by the engine. Amounts in views are rendered
 * strings so they can be handed to a serializer without further formatting.
 */

import type { Amount, ClientId, FundsTransactionType } from "./transaction.js";

/**
 * Where a deposit or withdrawal sits in its dispute lifecycle.
 *
 * none → disputed → resolved | charged_back
 */
export type DisputeStatus = "none" | "disputed" | "resolved" | "charged_back";

/**
 * Retained record of an accepted deposit or withdrawal.
 * The only lookup used by dispute, resolve and chargeback.
 */
export interface HistoryEntry {
  readonly client: ClientId;
  readonly amount: Amount;
  readonly kind: FundsTransactionType;
  readonly status: DisputeStatus;
}

/**
 * Final state of one client account.
 */
export interface AccountView {
  readonly client: ClientId;

  /** Funds the client may withdraw, 4 fractional digits (e.g. "12.0000"). */
  readonly available: string;

  /** Funds frozen by open disputes. */
  readonly held: string;

  /** available + held. */
  readonly total: string;

  /** Set permanently by a chargeback. */
  readonly locked: boolean;
}
