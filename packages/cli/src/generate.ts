/**
 * @payledger/cli — Load-test input generator.
 *
 * Produces a `type, client, tx, amount` CSV with every tx ID from 0 to
 * count - 1 in shuffled order, clients drawn from a small fixed range and
 * kinds drawn at random (deposits twice as likely as the rest).
 *
 * Rules:
 * - Output is reproducible from the seed
 * - About half the rows omit the amount column, so some deposits and
 *   withdrawals are deliberately malformed
 * - Line endings alternate at random between \n and \r\n
 */

import fc from "fast-check";
import { z } from "zod";
import type { TransactionType } from "@payledger/types";
import { formatAmount } from "@payledger/ledger";

export const GENERATED_HEADER = "type, client, tx, amount";

export const GenerateOptionsSchema = z.object({
  transactions: z.number().int().positive().max(0x1_0000_0000).default(50_000),
  clients: z.number().int().positive().max(0x1_0000).default(10),
  seed: z.number().int().default(() => Date.now()),
});

export type GenerateOptions = z.input<typeof GenerateOptionsSchema>;

interface GeneratedRow {
  readonly type: TransactionType;
  readonly client: number;
  readonly amount: bigint | undefined;
  readonly crlf: boolean;
}

const arbType: fc.Arbitrary<TransactionType> = fc.oneof(
  { arbitrary: fc.constant("deposit" as const), weight: 2 },
  { arbitrary: fc.constant("withdrawal" as const), weight: 1 },
  { arbitrary: fc.constant("dispute" as const), weight: 1 },
  { arbitrary: fc.constant("resolve" as const), weight: 1 },
  { arbitrary: fc.constant("chargeback" as const), weight: 1 },
);

function arbRow(clients: number): fc.Arbitrary<GeneratedRow> {
  return fc.record({
    type: arbType,
    client: fc.integer({ min: 0, max: clients - 1 }),
    // Up to 1.0000
    amount: fc.option(fc.bigInt({ min: 0n, max: 10_000n }), { nil: undefined }),
    crlf: fc.boolean(),
  });
}

function formatRow(row: GeneratedRow, tx: number): string {
  const fields = [row.type, String(row.client), String(tx)];
  if (row.amount !== undefined) fields.push(formatAmount(row.amount));
  return fields.join(", ") + (row.crlf ? "\r\n" : "\n");
}

/**
 * Yield the CSV line by line, header first.
 *
 * @throws {z.ZodError} on out-of-range counts
 */
export function* generateTransactionLines(options: GenerateOptions = {}): Generator<string> {
  const { transactions, clients, seed } = GenerateOptionsSchema.parse(options);

  // Shuffle by sorting IDs on sampled keys
  const keys = fc.sample(fc.integer(), { numRuns: transactions, seed });
  const order = keys
    .map((key, tx) => ({ key, tx }))
    .sort((a, b) => a.key - b.key || a.tx - b.tx)
    .map(({ tx }) => tx);

  const rows = fc.sample(arbRow(clients), { numRuns: transactions, seed: seed + 1 });

  yield `${GENERATED_HEADER}\r\n`;
  for (const [i, row] of rows.entries()) {
    const tx = order[i];
    if (tx === undefined) break;
    yield formatRow(row, tx);
  }
}

export function generateTransactionsCsv(options?: GenerateOptions): string {
  return [...generateTransactionLines(options)].join("");
}
