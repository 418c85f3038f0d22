/**
 * @payledger/ledger — Engine fold.
 *
 * Drives a sequence of records through a Ledger strictly in input order
 * and returns the final account snapshot. Order matters: a dispute seen
 * before its deposit is rejected, so records are never reordered.
 */

import type { TransactionRecord } from "@payledger/types";
import { Ledger } from "./ledger.js";
import type { ApplyOutcome, ProcessResult, Rejection } from "./types.js";

export interface ProcessOptions {
  /** Ledger to apply into. A fresh one is created when omitted. */
  readonly ledger?: Ledger | undefined;

  /** Called once per rejected record, in input order. */
  readonly onRejected?: ((rejection: Rejection) => void) | undefined;
}

function applyOne(ledger: Ledger, record: TransactionRecord, options?: ProcessOptions): ApplyOutcome {
  const outcome = ledger.apply(record);
  if (outcome.status === "rejected") {
    options?.onRejected?.(outcome);
  }
  return outcome;
}

function finish(ledger: Ledger): ProcessResult {
  return {
    accounts: ledger.snapshot(),
    summary: ledger.stats,
  };
}

/**
 * Fold a synchronous sequence of records through the ledger.
 */
export function processTransactions(
  records: Iterable<TransactionRecord>,
  options?: ProcessOptions,
): ProcessResult {
  const ledger = options?.ledger ?? new Ledger();
  for (const record of records) {
    applyOne(ledger, record, options);
  }
  return finish(ledger);
}

/**
 * Fold an async sequence of records (e.g. a file reader) through the ledger.
 *
 * Each record is applied to completion before the next one is pulled.
 * Errors thrown by the source propagate to the caller; whatever was
 * applied before the failure stays in `options.ledger`.
 */
export async function processTransactionStream(
  records: AsyncIterable<TransactionRecord>,
  options?: ProcessOptions,
): Promise<ProcessResult> {
  const ledger = options?.ledger ?? new Ledger();
  for await (const record of records) {
    applyOne(ledger, record, options);
  }
  return finish(ledger);
}
