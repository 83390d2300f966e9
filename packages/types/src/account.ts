/**
 * Account Types
 *
 * The output unit of a ledger replay run.
 */

import type { ClientId } from "./transaction.js";

/**
 * Final state of one client account, ready for a record sink.
 *
 * Amounts are rendered with exactly four fractional digits ("1.5000").
 * `total` always equals `available + held`.
 */
export interface AccountSnapshot {
  readonly client: ClientId;
  readonly available: string;
  readonly held: string;
  readonly total: string;
  readonly locked: boolean;
}
