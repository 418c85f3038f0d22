/**
 * @payledger/cli — CSV transaction reader.
 *
 * Streams a CSV file with the header `type, client, tx, amount` and yields
 * one TransactionRecord per valid row, lazily and in file order.
 *
 * - Fields are trimmed; header names are matched case-insensitively
 * - The amount column may be missing or empty for dispute kinds
 * - Invalid rows are reported through `onSkipped` and dropped
 * - Syntax errors the parser cannot recover from end the stream
 */

import type { Readable } from "node:stream";
import { parse } from "csv-parse";
import { z } from "zod";
import type { TransactionRecord } from "@payledger/types";
import { createTransactionRecord, LedgerError } from "@payledger/ledger";
import type { PrecisionPolicy } from "@payledger/ledger";

// =============================================================================
// Row Schema
// =============================================================================

const UNSIGNED = /^\d+$/;

/** What csv-parse emits with `info: true`. */
const ChunkSchema = z.object({
  info: z.object({ lines: z.number().int() }),
  record: z.record(z.string(), z.unknown()),
});

export const RowSchema = z.object({
  type: z.string().min(1).transform((t) => t.toLowerCase()),
  client: z
    .string()
    .regex(UNSIGNED, "must be an unsigned integer")
    .transform(Number),
  tx: z
    .string()
    .regex(UNSIGNED, "must be an unsigned integer")
    .transform(Number),
  amount: z.string().optional(),
});

export type CsvRow = z.infer<typeof RowSchema>;

// =============================================================================
// Reader
// =============================================================================

/** A row that was dropped before reaching the engine. */
export interface SkippedRow {
  /** 1-based line number of the end of the row. */
  readonly line: number;
  readonly code: "INVALID_ROW" | LedgerError["code"];
  readonly reason: string;
}

export interface ReadOptions {
  readonly precision?: PrecisionPolicy | undefined;
  readonly onSkipped?: ((row: SkippedRow) => void) | undefined;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "row"}: ${issue.message}`)
    .join("; ");
}

/**
 * Turn parsed CSV chunks into records. Split out from readTransactions so
 * any async source of `{ info, record }` chunks can be fed in.
 */
export async function* recordsFromRows(
  chunks: AsyncIterable<unknown>,
  options?: ReadOptions,
): AsyncGenerator<TransactionRecord> {
  for await (const raw of chunks) {
    const chunk = ChunkSchema.parse(raw);
    const line = chunk.info.lines;

    const row = RowSchema.safeParse(chunk.record);
    if (!row.success) {
      options?.onSkipped?.({ line, code: "INVALID_ROW", reason: describeIssues(row.error) });
      continue;
    }

    try {
      yield createTransactionRecord(row.data, { precision: options?.precision });
    } catch (err) {
      if (!(err instanceof LedgerError)) throw err;
      options?.onSkipped?.({ line, code: err.code, reason: err.message });
    }
  }
}

/**
 * Read transaction records from a CSV byte stream.
 *
 * Errors from `input` (e.g. a missing file) and fatal CSV syntax errors
 * reject the iteration.
 */
export function readTransactions(
  input: Readable,
  options?: ReadOptions,
): AsyncGenerator<TransactionRecord> {
  const parser = parse({
    columns: (header: string[]) => header.map((name) => name.toLowerCase()),
    // Files mix line endings; auto-detection would lock onto the first one
    record_delimiter: ["\r\n", "\n"],
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
    info: true,
  });
  input.on("error", (err) => parser.destroy(err));
  input.pipe(parser);
  return recordsFromRows(parser, options);
}
