/**
 * @payledger/cli — Error types.
 */

/** Known CLI error codes. */
export type CliErrorCode =
  | "MISSING_ARGUMENT"
  | "NOT_A_CSV_FILE"
  | "INVALID_CONFIG"
  | "INPUT_FAILURE";

const EXIT_CODES: Readonly<Record<CliErrorCode, number>> = {
  MISSING_ARGUMENT: 2,
  NOT_A_CSV_FILE: 2,
  INVALID_CONFIG: 2,
  INPUT_FAILURE: 1,
};

/**
 * Structured error raised before or around the engine run.
 * Carries the process exit code it maps to.
 */
export class CliError extends Error {
  public readonly code: CliErrorCode;
  public readonly exitCode: number;

  constructor(code: CliErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CliError";
    this.code = code;
    this.exitCode = EXIT_CODES[code];
  }
}
