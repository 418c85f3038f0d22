/**
 * @payledger/cli — Run a CSV file through the engine.
 *
 * Rules:
 * - stdout receives only the account CSV
 * - Diagnostics go to the logger (stderr), never stdout
 * - Bad rows and rejected records are logged and skipped
 * - A failing input stream still produces the partial snapshot, exit 1
 * - A broken ledger invariant produces no output, exit 1
 * - Usage and configuration errors exit 2
 */

import { createReadStream } from "node:fs";
import type { Readable, Writable } from "node:stream";
import chalk from "chalk";
import { ZodError } from "zod";
import { Ledger, LedgerError, processTransactionStream } from "@payledger/ledger";
import { USAGE, parseArgs } from "./args.js";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { readTransactions } from "./csv-reader.js";
import { formatAccountsCsv } from "./csv-writer.js";
import { CliError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";

export interface RunOptions {
  readonly args: readonly string[];
  readonly env?: Record<string, string | undefined> | undefined;
  readonly stdout: Writable;
  readonly stderr: Writable;

  /** Defaults to a pino logger on `stderr`, pretty-printed in development. */
  readonly logger?: Logger | undefined;

  /** Ledger to apply into. A fresh one is created when omitted. */
  readonly ledger?: Ledger | undefined;

  /** Defaults to fs.createReadStream. */
  readonly openInput?: ((filePath: string) => Readable) | undefined;
}

function loadCliConfig(env: Record<string, string | undefined>): AppConfig {
  try {
    return loadConfig(env);
  } catch (err) {
    if (!(err instanceof ZodError)) throw err;
    const detail = err.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new CliError("INVALID_CONFIG", `Invalid configuration: ${detail}`, { cause: err });
  }
}

function reportUsageError(stderr: Writable, err: CliError): number {
  stderr.write(`${chalk.red("error:")} ${err.message}\n${USAGE}\n`);
  return err.exitCode;
}

/**
 * Process the file named in `args` and write the account snapshot.
 *
 * @returns the process exit code
 */
export async function run(options: RunOptions): Promise<number> {
  let config: AppConfig;
  let filePath: string;
  try {
    config = loadCliConfig(options.env ?? {});
    ({ filePath } = parseArgs(options.args));
  } catch (err) {
    if (err instanceof CliError) return reportUsageError(options.stderr, err);
    throw err;
  }

  // On the real stderr the logger opens fd 2 itself (and may use a transport)
  const logger =
    options.logger ??
    createLogger(config, options.stderr === process.stderr ? undefined : options.stderr);
  const openInput = options.openInput ?? ((path: string) => createReadStream(path));

  const ledger = options.ledger ?? new Ledger();
  const input = openInput(filePath);
  let skipped = 0;
  const records = readTransactions(input, {
    precision: config.AMOUNT_PRECISION,
    onSkipped: (row) => {
      skipped += 1;
      logger.warn({ line: row.line, code: row.code }, `Skipping row: ${row.reason}`);
    },
  });

  let exitCode = 0;
  try {
    await processTransactionStream(records, {
      ledger,
      onRejected: (rejection) => {
        const { type, client, tx } = rejection.record;
        logger.debug({ code: rejection.code, type, client, tx }, rejection.message);
      },
    });
  } catch (err) {
    if (err instanceof LedgerError && err.code === "INVARIANT_VIOLATION") {
      logger.fatal({ err }, "Ledger invariant violated; no output written");
      return 1;
    }
    const failure = new CliError(
      "INPUT_FAILURE",
      `Failed to read ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
    logger.error({ err: failure }, failure.message);
    exitCode = failure.exitCode;
  } finally {
    input.destroy();
  }

  options.stdout.write(formatAccountsCsv(ledger.snapshot()));
  logger.info(
    { file: filePath, accounts: ledger.accountCount, skipped, ...ledger.stats },
    "Run complete",
  );
  return exitCode;
}
