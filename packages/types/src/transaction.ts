/**
 * Transaction Types
 *
 * The input unit of the payments engine: one record per line of input,
 * discriminated by `type`.
 *
 * Rules:
 * - Amounts are fixed-point bigints (ten-thousandths), never floats
 * - Only deposits and withdrawals carry an amount
 * - Dispute, resolve and chargeback reference an earlier deposit/withdrawal
 */

/** Unsigned 16-bit client identifier. */
export type ClientId = number;

/** Unsigned 32-bit transaction identifier. */
export type TransactionId = number;

/**
 * A fixed-point amount with four fractional digits,
 * stored as a count of ten-thousandths (1.5 → 15000n).
 */
export type Amount = bigint;

/** The five kinds of transaction the engine understands. */
export type TransactionType =
  | "deposit"
  | "withdrawal"
  | "dispute"
  | "resolve"
  | "chargeback";

/** Transaction kinds that move money and create disputable history. */
export type FundsTransactionType = "deposit" | "withdrawal";

/** Transaction kinds that act on an earlier deposit or withdrawal. */
export type DisputeTransactionType = "dispute" | "resolve" | "chargeback";

/**
 * A deposit or withdrawal. The transaction ID is unique across both kinds.
 */
export interface FundsTransaction {
  readonly type: FundsTransactionType;
  readonly client: ClientId;
  readonly tx: TransactionId;

  /** Non-negative amount in ten-thousandths. */
  readonly amount: Amount;
}

/**
 * A dispute-lifecycle record. `tx` refers to the disputed deposit/withdrawal
 * and must belong to the same client.
 */
export interface DisputeTransaction {
  readonly type: DisputeTransactionType;
  readonly client: ClientId;
  readonly tx: TransactionId;
}

export interface Deposit extends FundsTransaction {
  readonly type: "deposit";
}

export interface Withdrawal extends FundsTransaction {
  readonly type: "withdrawal";
}

export interface Dispute extends DisputeTransaction {
  readonly type: "dispute";
}

export interface Resolve extends DisputeTransaction {
  readonly type: "resolve";
}

export interface Chargeback extends DisputeTransaction {
  readonly type: "chargeback";
}

/** One input event, discriminated by `type`. */
export type TransactionRecord =
  | Deposit
  | Withdrawal
  | Dispute
  | Resolve
  | Chargeback;

/** Largest valid client ID. */
export const MAX_CLIENT_ID = 0xffff;

/** Largest valid transaction ID. */
export const MAX_TRANSACTION_ID = 0xffff_ffff;
