/**
 * @ledger-replay/ledger — Transaction history.
 *
 * Retains accepted deposits and withdrawals by transaction id so later
 * disputes, resolves and chargebacks can find the amount they refer to.
 *
 * Rules:
 * - Only deposits and withdrawals are recorded
 * - Recording an existing id overwrites the entry
 * - Entries are removed only by a successful chargeback
 */

import type { TxId } from "@ledger-replay/types";
import type { HistoryEntry } from "./types.js";

export class TransactionHistory {
  private readonly _entries: Map<TxId, HistoryEntry> = new Map();

  /**
   * Store (or overwrite) the entry for `entry.tx`.
   */
  record(entry: HistoryEntry): void {
    this._entries.set(entry.tx, entry);
  }

  /**
   * Fetch an entry without removing it.
   * Returns undefined if the id was never recorded or was charged back.
   */
  lookup(tx: TxId): HistoryEntry | undefined {
    return this._entries.get(tx);
  }

  /**
   * Take an entry out of the history.
   */
  remove(tx: TxId): HistoryEntry | undefined {
    const entry = this._entries.get(tx);
    if (entry !== undefined) {
      this._entries.delete(tx);
    }
    return entry;
  }

  has(tx: TxId): boolean {
    return this._entries.has(tx);
  }

  get size(): number {
    return this._entries.size;
  }
}
