/**
 * @ledger-replay/ledger — Transaction processor.
 *
 * Applies one transaction record at a time to a Ledger and a
 * TransactionHistory.
 *
 * Two-tier error model:
 * - Business-rule violations (locked account, insufficient funds,
 *   unknown or mismatched reference) are returned as a Rejection and
 *   leave the ledger untouched. Processing continues.
 * - Malformed input (missing amount, unparseable amount, unknown kind)
 *   throws ProcessingError and aborts the run.
 */

import type { TransactionKind, TransactionRecord } from "@ledger-replay/types";
import { isTransactionKind } from "@ledger-replay/types";
import {
  chargeBackFunds,
  creditAvailable,
  debitAvailable,
  holdFunds,
  releaseFunds,
} from "./accounts.js";
import { TransactionHistory } from "./history.js";
import { Ledger } from "./ledger.js";
import { normalizeAmount } from "./money-math.js";
import type {
  Account,
  ApplyOutcome,
  ProcessorStats,
  RejectionCode,
  RejectionHandler,
} from "./types.js";
import { ProcessingError } from "./types.js";

// ─── Outcome Helpers ─────────────────────────────────────────────────────

function applied(kind: TransactionKind): ApplyOutcome {
  return { status: "applied", kind };
}

function rejected(
  code: RejectionCode,
  kind: TransactionKind,
  record: TransactionRecord,
  message: string,
): ApplyOutcome {
  return {
    status: "rejected",
    rejection: { code, kind, client: record.client, tx: record.tx, message },
  };
}

function requireAmount(record: TransactionRecord, kind: TransactionKind): bigint {
  if (record.amount === undefined) {
    throw new ProcessingError(
      "MISSING_AMOUNT",
      `${kind} entry without the amount (tx ${String(record.tx)})`,
      record.tx,
    );
  }
  try {
    return normalizeAmount(record.amount);
  } catch (err: unknown) {
    if (err instanceof ProcessingError) {
      throw new ProcessingError(
        err.code,
        `${err.message} (tx ${String(record.tx)})`,
        record.tx,
      );
    }
    throw err;
  }
}

// ─── Per-kind Rules ──────────────────────────────────────────────────────

function applyDeposit(
  account: Account,
  history: TransactionHistory,
  record: TransactionRecord,
): ApplyOutcome {
  const amount = requireAmount(record, "deposit");

  if (account.locked) {
    return rejected(
      "ACCOUNT_LOCKED",
      "deposit",
      record,
      `Cannot deposit - client account ${String(record.client)} is locked`,
    );
  }

  creditAvailable(account, amount);
  history.record({ kind: "deposit", client: record.client, tx: record.tx, amount });
  return applied("deposit");
}

function applyWithdrawal(
  account: Account,
  history: TransactionHistory,
  record: TransactionRecord,
): ApplyOutcome {
  const amount = requireAmount(record, "withdrawal");

  if (account.locked) {
    return rejected(
      "ACCOUNT_LOCKED",
      "withdrawal",
      record,
      `Cannot withdraw - client account ${String(record.client)} is locked`,
    );
  }
  if (account.available < amount) {
    return rejected(
      "INSUFFICIENT_FUNDS",
      "withdrawal",
      record,
      `Insufficient balance for withdrawal from client account ${String(record.client)}`,
    );
  }

  debitAvailable(account, amount);
  history.record({ kind: "withdrawal", client: record.client, tx: record.tx, amount });
  return applied("withdrawal");
}

function applyDispute(
  account: Account,
  history: TransactionHistory,
  record: TransactionRecord,
): ApplyOutcome {
  const entry = history.lookup(record.tx);
  if (entry === undefined) {
    return rejected(
      "UNKNOWN_TRANSACTION",
      "dispute",
      record,
      `Ignoring dispute that references unknown transaction ${String(record.tx)}`,
    );
  }
  // Applies to withdrawals too: never hold more than is available
  if (account.available < entry.amount) {
    return rejected(
      "INSUFFICIENT_AVAILABLE",
      "dispute",
      record,
      `Cannot dispute more than what is available on client account ${String(record.client)}`,
    );
  }

  holdFunds(account, entry.amount);
  return applied("dispute");
}

function applyResolve(
  account: Account,
  history: TransactionHistory,
  record: TransactionRecord,
): ApplyOutcome {
  const entry = history.lookup(record.tx);
  if (entry === undefined) {
    return rejected(
      "UNKNOWN_TRANSACTION",
      "resolve",
      record,
      `Ignoring resolve that references unknown transaction ${String(record.tx)}`,
    );
  }
  if (account.held < entry.amount) {
    return rejected(
      "INSUFFICIENT_HELD",
      "resolve",
      record,
      `Cannot resolve more than what is held on client account ${String(record.client)}`,
    );
  }

  releaseFunds(account, entry.amount);
  return applied("resolve");
}

function applyChargeback(
  account: Account,
  history: TransactionHistory,
  record: TransactionRecord,
): ApplyOutcome {
  // Removing first makes a second chargeback on the same tx a no-op
  const entry = history.remove(record.tx);
  if (entry === undefined) {
    return rejected(
      "UNKNOWN_TRANSACTION",
      "chargeback",
      record,
      `Ignoring chargeback that references unknown transaction ${String(record.tx)}`,
    );
  }
  if (entry.kind !== "deposit") {
    history.record(entry);
    return rejected(
      "NOT_A_DEPOSIT",
      "chargeback",
      record,
      `Ignoring chargeback on transaction ${String(record.tx)}, which is a ${entry.kind} and not a deposit`,
    );
  }

  chargeBackFunds(account, entry.amount);
  return applied("chargeback");
}

// ─── Dispatch ────────────────────────────────────────────────────────────

/**
 * Apply a single record to the ledger and history.
 *
 * The client's account is created on first reference, before dispatch.
 *
 * @returns whether the record was applied or rejected
 * @throws {ProcessingError} for a missing or invalid amount, or an unknown kind
 */
export function applyTransaction(
  ledger: Ledger,
  history: TransactionHistory,
  record: TransactionRecord,
): ApplyOutcome {
  const account = ledger.getOrCreate(record.client);
  const kind = record.kind;

  if (!isTransactionKind(kind)) {
    throw new ProcessingError(
      "UNKNOWN_TRANSACTION_KIND",
      `Unknown transaction type "${kind}" (tx ${String(record.tx)})`,
      record.tx,
    );
  }

  switch (kind) {
    case "deposit":
      return applyDeposit(account, history, record);
    case "withdrawal":
      return applyWithdrawal(account, history, record);
    case "dispute":
      return applyDispute(account, history, record);
    case "resolve":
      return applyResolve(account, history, record);
    case "chargeback":
      return applyChargeback(account, history, record);
  }
}

// ─── Processor ───────────────────────────────────────────────────────────

/**
 * Options for creating a TransactionProcessor.
 */
export interface TransactionProcessorOptions {
  /** Ledger to apply records to. A fresh one is created if omitted. */
  readonly ledger?: Ledger | undefined;
  /** History of accepted transactions. A fresh one is created if omitted. */
  readonly history?: TransactionHistory | undefined;
  /** Called once for every rejected record. */
  readonly onRejected?: RejectionHandler | undefined;
}

/**
 * Owns one run's ledger and history and applies records to them in order.
 *
 * Rejections are reported through `onRejected` and counted; fatal
 * errors propagate to the caller with the state of every earlier
 * record intact.
 */
export class TransactionProcessor {
  private readonly _ledger: Ledger;
  private readonly _history: TransactionHistory;
  private readonly _onRejected: RejectionHandler | undefined;

  private _applied = 0;
  private _rejected = 0;

  constructor(options: TransactionProcessorOptions = {}) {
    this._ledger = options.ledger ?? new Ledger();
    this._history = options.history ?? new TransactionHistory();
    this._onRejected = options.onRejected;
  }

  get ledger(): Ledger {
    return this._ledger;
  }

  get history(): TransactionHistory {
    return this._history;
  }

  get stats(): ProcessorStats {
    return {
      processed: this._applied + this._rejected,
      applied: this._applied,
      rejected: this._rejected,
    };
  }

  /**
   * Apply one record.
   *
   * @throws {ProcessingError} on a fatal record
   */
  apply(record: TransactionRecord): ApplyOutcome {
    const outcome = applyTransaction(this._ledger, this._history, record);

    if (outcome.status === "applied") {
      this._applied++;
    } else {
      this._rejected++;
      this._onRejected?.(outcome.rejection);
    }

    return outcome;
  }

  /**
   * Apply every record of a source in order.
   *
   * Stops at the first error thrown by the processor or by the source
   * itself and rethrows it.
   */
  run(source: Iterable<TransactionRecord>): Ledger {
    for (const record of source) {
      this.apply(record);
    }
    return this._ledger;
  }
}
