/**
 * @payledger/cli — CSV account writer.
 */

import type { AccountView } from "@payledger/types";

export const CSV_HEADER = "client,available,held,total,locked";

export function formatAccountRow(account: AccountView): string {
  return [
    String(account.client),
    account.available,
    account.held,
    account.total,
    String(account.locked),
  ].join(",");
}

/**
 * Render the header and one line per account, newline-terminated.
 */
export function formatAccountsCsv(accounts: readonly AccountView[]): string {
  return [CSV_HEADER, ...accounts.map(formatAccountRow)].join("\n") + "\n";
}
