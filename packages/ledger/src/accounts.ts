/**
 * @ledger-replay/ledger — Account balance operations.
 *
 * Every function here moves funds between the balance buckets of a
 * single account and keeps `total = available + held`. Guards
 * (locked, sufficient funds) are the processor's job; these
 * operations apply unconditionally.
 */

import type { ClientId } from "@ledger-replay/types";
import type { Account } from "./types.js";

/**
 * Create a zeroed, unlocked account.
 */
export function createAccount(client: ClientId): Account {
  return {
    client,
    available: 0n,
    held: 0n,
    total: 0n,
    locked: false,
  };
}

/**
 * Add funds to available (deposit).
 */
export function creditAvailable(account: Account, amount: bigint): void {
  account.available += amount;
  account.total += amount;
}

/**
 * Remove funds from available (withdrawal).
 */
export function debitAvailable(account: Account, amount: bigint): void {
  account.available -= amount;
  account.total -= amount;
}

/**
 * Move funds from available to held (dispute). Total is unchanged.
 */
export function holdFunds(account: Account, amount: bigint): void {
  account.available -= amount;
  account.held += amount;
}

/**
 * Move funds from held back to available (resolve). Total is unchanged.
 */
export function releaseFunds(account: Account, amount: bigint): void {
  account.held -= amount;
  account.available += amount;
}

/**
 * Remove held funds for good and lock the account (chargeback).
 *
 * Held and total may go negative when the held bucket no longer
 * contains the charged-back amount.
 */
export function chargeBackFunds(account: Account, amount: bigint): void {
  account.locked = true;
  account.held -= amount;
  account.total -= amount;
}

/**
 * Check the `total = available + held` invariant.
 */
export function isBalanced(account: Readonly<Account>): boolean {
  return account.total === account.available + account.held;
}
