/**
 * @payledger/ledger — Payments transaction engine.
 *
 * A pure TypeScript engine with zero runtime dependencies.
 * Applies deposits, withdrawals and the dispute lifecycle to
 * per-client accounts:
 * - available ≥ 0 and held ≥ 0 for every account, always
 * - total is always available + held
 * - every dispute-kind record must reference the same client's history
 * - chargebacks lock the account against further deposits/withdrawals
 * - all monetary arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - Business-rule rejections are values, never exceptions
 * - Broken invariants throw LedgerError("INVARIANT_VIOLATION")
 * - One explicitly constructed Ledger per run, no global state
 */

// Core engine
export { Ledger } from "./ledger.js";
export { processTransactions, processTransactionStream } from "./engine.js";
export type { ProcessOptions } from "./engine.js";

// Accounts and history
export { ClientAccount } from "./client-account.js";
export { TransactionHistory, canTransition } from "./transaction-history.js";

// Records
export { createTransactionRecord } from "./records.js";
export type { TransactionFields } from "./records.js";

// Amount arithmetic
export {
  AMOUNT_SCALE,
  MAX_AMOUNT,
  ZERO_AMOUNT,
  parseAmount,
  formatAmount,
  checkedAdd,
  checkedSub,
  compareAmount,
  isZero,
  isNegative,
} from "./amount.js";

// Types
export type {
  PrecisionPolicy,
  ParseAmountOptions,
  AmountFailure,
  AmountResult,
  RejectionCode,
  ApplyOutcome,
  Rejection,
  LedgerStats,
  KeyedHistoryEntry,
  AccountBalances,
  ProcessResult,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
