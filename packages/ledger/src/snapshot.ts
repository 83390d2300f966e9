/**
 * @ledger-replay/ledger — Account snapshots and ledger totals.
 *
 * Renders the final ledger state for a record sink. All amounts are
 * formatted from bigint with exactly four fractional digits.
 */

import type { AccountSnapshot } from "@ledger-replay/types";
import { isBalanced } from "./accounts.js";
import type { Ledger } from "./ledger.js";
import { formatAmount, sumAmounts } from "./money-math.js";
import type { Account, LedgerTotals } from "./types.js";

/**
 * Render one account.
 */
export function toAccountSnapshot(account: Readonly<Account>): AccountSnapshot {
  return {
    client: account.client,
    available: formatAmount(account.available),
    held: formatAmount(account.held),
    total: formatAmount(account.total),
    locked: account.locked,
  };
}

/**
 * Lazily render every account in the ledger, in the ledger's own
 * iteration order.
 */
export function* snapshot(ledger: Ledger): Generator<AccountSnapshot, void, undefined> {
  for (const account of ledger.accounts()) {
    yield toAccountSnapshot(account);
  }
}

/**
 * Sum balances across every account.
 */
export function computeLedgerTotals(ledger: Ledger): LedgerTotals {
  const accounts = [...ledger.accounts()];

  return {
    accounts: accounts.length,
    lockedAccounts: accounts.filter((a) => a.locked).length,
    available: formatAmount(sumAmounts(accounts.map((a) => a.available))),
    held: formatAmount(sumAmounts(accounts.map((a) => a.held))),
    total: formatAmount(sumAmounts(accounts.map((a) => a.total))),
    balanced: accounts.every(isBalanced),
  };
}
