/**
 * @ledger-replay/ledger — Run entry point.
 *
 * Folds the processor over a record source and hands back the
 * resulting ledger.
 */

import type { TransactionRecord } from "@ledger-replay/types";
import type { Ledger } from "./ledger.js";
import { TransactionProcessor } from "./processor.js";
import type { ProcessOptions } from "./types.js";

/**
 * Replay every record of a source against a fresh ledger.
 *
 * @throws {ProcessingError} on the first fatal record
 * @throws whatever the source throws while being read, unchanged
 */
export function processTransactions(
  source: Iterable<TransactionRecord>,
  options: ProcessOptions = {},
): Ledger {
  return new TransactionProcessor({ onRejected: options.onRejected }).run(source);
}
