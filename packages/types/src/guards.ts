/**
 * Runtime Type Guards
 *
 * Narrowing functions for payments domain types.
 * These enable safe runtime validation at system boundaries
 * (parsed input, deserialized snapshots, records built by hand in callers).
 */

import type {
  ClientId,
  TransactionId,
  TransactionRecord,
  TransactionType,
} from "./transaction.js";
import { MAX_CLIENT_ID, MAX_TRANSACTION_ID } from "./transaction.js";
import type { AccountView, DisputeStatus } from "./account.js";

// =============================================================================
// Transaction guards
// =============================================================================

const TRANSACTION_TYPES = new Set<string>([
  "deposit", "withdrawal", "dispute", "resolve", "chargeback",
]);

const FUNDS_TYPES = new Set<string>(["deposit", "withdrawal"]);

export function isTransactionType(value: unknown): value is TransactionType {
  return typeof value === "string" && TRANSACTION_TYPES.has(value);
}

export function isClientId(value: unknown): value is ClientId {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_CLIENT_ID
  );
}

export function isTransactionId(value: unknown): value is TransactionId {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_TRANSACTION_ID
  );
}

/**
 * Structural check only: deposits and withdrawals must carry a
 * non-negative bigint amount; the other kinds may carry anything there.
 */
export function isTransactionRecord(value: unknown): value is TransactionRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (!isTransactionType(v.type) || !isClientId(v.client) || !isTransactionId(v.tx)) {
    return false;
  }
  if (FUNDS_TYPES.has(v.type)) {
    return typeof v.amount === "bigint" && v.amount >= 0n;
  }
  return true;
}

// =============================================================================
// Account guards
// =============================================================================

const DISPUTE_STATUSES = new Set<string>(["none", "disputed", "resolved", "charged_back"]);

const RENDERED_AMOUNT = /^-?\d+\.\d{4}$/;

export function isDisputeStatus(value: unknown): value is DisputeStatus {
  return typeof value === "string" && DISPUTE_STATUSES.has(value);
}

export function isAccountView(value: unknown): value is AccountView {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isClientId(v.client) &&
    typeof v.available === "string" &&
    RENDERED_AMOUNT.test(v.available) &&
    typeof v.held === "string" &&
    RENDERED_AMOUNT.test(v.held) &&
    typeof v.total === "string" &&
    RENDERED_AMOUNT.test(v.total) &&
    typeof v.locked === "boolean"
  );
}
