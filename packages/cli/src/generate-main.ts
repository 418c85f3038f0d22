#!/usr/bin/env node
/**
 * @payledger/cli — Generator entry point.
 *
 * payledger-generate [transactions] [seed] > transactions.csv
 */

import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import chalk from "chalk";
import { z } from "zod";
import { generateTransactionLines } from "./generate.js";

const ArgsSchema = z.object({
  transactions: z.coerce.number().int().positive().optional(),
  seed: z.coerce.number().int().optional(),
});

async function main(): Promise<void> {
  const [transactions, seed] = process.argv.slice(2);
  const options = ArgsSchema.parse({ transactions, seed });
  await pipeline(Readable.from(generateTransactionLines(options)), process.stdout, {
    end: false,
  });
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error(chalk.red("Fatal error:"), err);
  process.exitCode = 1;
});
