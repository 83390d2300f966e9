/**
 * @ledger-replay/cli — CSV record sink.
 *
 * Writes account snapshots as `client,available,held,total,locked`
 * rows, one per account, with a header and `\n` line endings.
 */

import type { AccountSnapshot } from "@ledger-replay/types";
import type { TextSink } from "./types.js";

export const OUTPUT_HEADER = "client,available,held,total,locked";

/**
 * Render one snapshot as a CSV row (no line ending).
 */
export function formatAccountRow(account: AccountSnapshot): string {
  return [
    String(account.client),
    account.available,
    account.held,
    account.total,
    String(account.locked),
  ].join(",");
}

/**
 * Render snapshots as a complete CSV document, header included.
 */
export function formatAccountsCsv(accounts: Iterable<AccountSnapshot>): string {
  const lines = [OUTPUT_HEADER];
  for (const account of accounts) {
    lines.push(formatAccountRow(account));
  }
  return `${lines.join("\n")}\n`;
}

/**
 * Write snapshots to a sink as CSV.
 */
export function writeAccountsCsv(accounts: Iterable<AccountSnapshot>, out: TextSink): void {
  out.write(formatAccountsCsv(accounts));
}

/**
 * Sort snapshots by client id.
 */
export function sortByClient(accounts: Iterable<AccountSnapshot>): AccountSnapshot[] {
  return [...accounts].sort((a, b) => a.client - b.client);
}
