/**
 * @payledger/cli — CSV front end for the payments engine.
 *
 * Reads `type, client, tx, amount` rows, folds them through a Ledger
 * and writes `client,available,held,total,locked` rows.
 */

export { run } from "./run.js";
export type { RunOptions } from "./run.js";

export { parseArgs, USAGE } from "./args.js";
export type { CliArgs } from "./args.js";

export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";

export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";

export { readTransactions, recordsFromRows, RowSchema } from "./csv-reader.js";
export type { CsvRow, ReadOptions, SkippedRow } from "./csv-reader.js";

export { formatAccountsCsv, formatAccountRow, CSV_HEADER } from "./csv-writer.js";

export {
  generateTransactionLines,
  generateTransactionsCsv,
  GenerateOptionsSchema,
  GENERATED_HEADER,
} from "./generate.js";
export type { GenerateOptions } from "./generate.js";

export { CliError } from "./errors.js";
export type { CliErrorCode } from "./errors.js";
