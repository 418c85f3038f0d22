/**
 * @payledger/cli — Argument handling.
 *
 * Usage: payledger <transactions.csv>
 */

import { extname } from "node:path";
import { CliError } from "./errors.js";

export const USAGE = "Usage: payledger <transactions.csv>";

export interface CliArgs {
  readonly filePath: string;
}

/**
 * Extract the input path from user arguments (argv without node and script).
 *
 * The path must end in ".csv" and have a name before the extension.
 * Arguments after the first are ignored.
 */
export function parseArgs(args: readonly string[]): CliArgs {
  const filePath = args[0];
  if (filePath === undefined || filePath === "") {
    throw new CliError("MISSING_ARGUMENT", "Missing input file argument");
  }

  // extname(".csv") is "": a bare ".csv" has no extension
  if (extname(filePath) !== ".csv") {
    throw new CliError("NOT_A_CSV_FILE", `Expected a .csv file, got "${filePath}"`);
  }

  return { filePath };
}
