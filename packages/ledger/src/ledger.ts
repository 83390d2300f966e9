/**
 * @ledger-replay/ledger — Client account store.
 *
 * Maps client ids to their accounts. Accounts are created lazily on
 * first reference and never removed during a run.
 *
 * API surface:
 * - getOrCreate() — Fetch an account, creating a zeroed one if needed
 * - get() / has() — Read-only lookups
 * - accounts() — Restartable iteration over every account
 *
 * Iteration order is not part of the contract.
 */

import type { ClientId } from "@ledger-replay/types";
import { createAccount } from "./accounts.js";
import type { Account } from "./types.js";

/**
 * Per-client account store, mutated in place by the processor.
 */
export class Ledger implements Iterable<Readonly<Account>> {
  private readonly _accounts: Map<ClientId, Account> = new Map();

  /**
   * Return the account for a client, inserting a zeroed one if absent.
   * Never fails.
   */
  getOrCreate(client: ClientId): Account {
    let account = this._accounts.get(client);
    if (account === undefined) {
      account = createAccount(client);
      this._accounts.set(client, account);
    }
    return account;
  }

  /**
   * Get an account by client id.
   */
  get(client: ClientId): Readonly<Account> | undefined {
    return this._accounts.get(client);
  }

  /**
   * Check if a client has an account.
   */
  has(client: ClientId): boolean {
    return this._accounts.has(client);
  }

  /**
   * Number of accounts in the ledger.
   */
  get size(): number {
    return this._accounts.size;
  }

  /**
   * Lazily iterate over every account. Each call starts a new pass.
   */
  *accounts(): IterableIterator<Readonly<Account>> {
    yield* this._accounts.values();
  }

  [Symbol.iterator](): Iterator<Readonly<Account>> {
    return this.accounts();
  }
}
