/**
 * @payledger/ledger — Internal types for the ledger engine.
 *
 * These extend the shared @payledger/types with ledger-specific
 * structures used only within this package.
 *
 * Rules:
 * - All exposed types are readonly
 * - Business-rule rejections are returned, never thrown
 * - Broken balance invariants throw (they indicate a defect)
 */

import type {
  AccountView,
  Amount,
  ClientId,
  HistoryEntry,
  TransactionId,
  TransactionRecord,
} from "@payledger/types";

// ─── Amount Types ────────────────────────────────────────────────────────

/** How to treat input with more than four fractional digits. */
export type PrecisionPolicy = "truncate" | "reject";

export interface ParseAmountOptions {
  /** Defaults to "truncate" (round toward zero). */
  readonly precision?: PrecisionPolicy | undefined;
}

/** Why a checked arithmetic operation failed. */
export type AmountFailure = "overflow" | "negative";

/** Outcome of checked Amount arithmetic. */
export type AmountResult =
  | { readonly ok: true; readonly value: Amount }
  | { readonly ok: false; readonly error: AmountFailure };

// ─── Rejection Types ─────────────────────────────────────────────────────

/**
 * Reasons the ledger declines a record. A rejected record leaves every
 * account and history entry exactly as it was.
 */
export type RejectionCode =
  | "MALFORMED_RECORD"
  | "ACCOUNT_LOCKED"
  | "INSUFFICIENT_FUNDS"
  | "DUPLICATE_TRANSACTION"
  | "UNKNOWN_TRANSACTION"
  | "CLIENT_MISMATCH"
  | "INVALID_TRANSITION"
  | "AMOUNT_OVERFLOW";

/** Result of applying one record. */
export type ApplyOutcome =
  | {
      readonly status: "applied";
      readonly record: TransactionRecord;
    }
  | {
      readonly status: "rejected";
      readonly record: TransactionRecord;
      readonly code: RejectionCode;
      readonly message: string;
    };

/** The rejected half of ApplyOutcome. */
export type Rejection = Extract<ApplyOutcome, { status: "rejected" }>;

/** Running totals kept by the ledger across apply() calls. */
export interface LedgerStats {
  readonly applied: number;
  readonly rejected: number;
  readonly rejectionsByCode: Readonly<Partial<Record<RejectionCode, number>>>;
}

// ─── History Types ───────────────────────────────────────────────────────

/** A history entry together with the transaction ID it is keyed by. */
export interface KeyedHistoryEntry extends HistoryEntry {
  readonly tx: TransactionId;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/** Raw balances of one account, before rendering. */
export interface AccountBalances {
  readonly client: ClientId;
  readonly available: Amount;
  readonly held: Amount;
  readonly total: Amount;
  readonly locked: boolean;
}

/** Output of the engine fold. */
export interface ProcessResult {
  readonly accounts: readonly AccountView[];
  readonly summary: LedgerStats;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for thrown ledger errors. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "EXCESS_PRECISION"
  | "AMOUNT_OUT_OF_RANGE"
  | "MALFORMED_RECORD"
  | "INVARIANT_VIOLATION";

/**
 * Structured error from the ledger engine.
 *
 * Thrown by amount parsing and record construction for malformed input,
 * and by the ledger itself only when a balance invariant breaks.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
