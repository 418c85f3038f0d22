/**
 * @payledger/ledger — Transaction record construction.
 *
 * Builds a validated TransactionRecord from already-tokenised fields.
 * Anything that cannot become a well-formed record throws LedgerError
 * with code MALFORMED_RECORD (or an amount error from parseAmount).
 */

import type { Amount, TransactionRecord } from "@payledger/types";
import {
  isClientId,
  isTransactionId,
  isTransactionType,
} from "@payledger/types";
import { parseAmount } from "./amount.js";
import type { ParseAmountOptions } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Loose input accepted by createTransactionRecord.
 * `amount` may be a decimal string or an already-scaled Amount.
 */
export interface TransactionFields {
  readonly type: string;
  readonly client: number;
  readonly tx: number;
  readonly amount?: string | Amount | undefined;
}

function resolveAmount(
  raw: string | Amount | undefined,
  options: ParseAmountOptions | undefined,
): Amount | undefined {
  if (raw === undefined) return undefined;
  if (typeof raw === "bigint") return raw;
  if (raw.trim() === "") return undefined;
  return parseAmount(raw, options);
}

/**
 * Validate fields and build a TransactionRecord.
 *
 * - `type` must name one of the five kinds
 * - `client` must be a u16, `tx` a u32
 * - deposits and withdrawals need a non-negative amount
 * - an amount on dispute/resolve/chargeback is ignored
 */
export function createTransactionRecord(
  fields: TransactionFields,
  options?: ParseAmountOptions,
): TransactionRecord {
  const { type, client, tx } = fields;

  if (!isTransactionType(type)) {
    throw new LedgerError("MALFORMED_RECORD", `Unknown transaction type: "${type}"`);
  }
  if (!isClientId(client)) {
    throw new LedgerError("MALFORMED_RECORD", `Invalid client ID: ${String(client)}`);
  }
  if (!isTransactionId(tx)) {
    throw new LedgerError("MALFORMED_RECORD", `Invalid transaction ID: ${String(tx)}`);
  }

  switch (type) {
    case "deposit":
    case "withdrawal": {
      const amount = resolveAmount(fields.amount, options);
      if (amount === undefined) {
        throw new LedgerError("MALFORMED_RECORD", `Missing amount for ${type} ${String(tx)}`);
      }
      if (amount < 0n) {
        throw new LedgerError(
          "MALFORMED_RECORD",
          `Negative amount for ${type} ${String(tx)}`,
        );
      }
      return { type, client, tx, amount };
    }
    case "dispute":
    case "resolve":
    case "chargeback":
      return { type, client, tx };
  }
}
