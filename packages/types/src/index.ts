/**
 * @payledger/types — Shared domain types for the payments engine.
 *
 * These types are used across all packages:
 * - Transaction records (the engine's input)
 * - Account views and dispute history (the engine's output and memory)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in the ledger
 */

// Transaction types
export type {
  ClientId,
  TransactionId,
  Amount,
  TransactionType,
  FundsTransactionType,
  DisputeTransactionType,
  FundsTransaction,
  DisputeTransaction,
  Deposit,
  Withdrawal,
  Dispute,
  Resolve,
  Chargeback,
  TransactionRecord,
} from "./transaction.js";

export { MAX_CLIENT_ID, MAX_TRANSACTION_ID } from "./transaction.js";

// Account types
export type {
  DisputeStatus,
  HistoryEntry,
  AccountView,
} from "./account.js";

// Runtime type guards
export {
  isTransactionType,
  isClientId,
  isTransactionId,
  isTransactionRecord,
  isDisputeStatus,
  isAccountView,
} from "./guards.js";
