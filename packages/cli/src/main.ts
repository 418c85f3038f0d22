#!/usr/bin/env node
/**
 * @payledger/cli — Entry point.
 *
 * payledger <transactions.csv> > accounts.csv
 */

import chalk from "chalk";
import { run } from "./run.js";

run({
  args: process.argv.slice(2),
  env: process.env,
  stdout: process.stdout,
  stderr: process.stderr,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    // eslint-disable-next-line no-console
    console.error(chalk.red("Fatal error:"), err);
    process.exitCode = 1;
  });
