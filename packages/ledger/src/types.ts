/**
 * @ledger-replay/ledger — Internal types for the replay engine.
 *
 * These extend the shared @ledger-replay/types with engine-specific
 * structures used only within this package.
 *
 * Rules:
 * - All monetary values are bigint scaled by 10^4 (no floating point)
 * - Fatal conditions throw ProcessingError, business-rule rejections
 *   are returned as values
 * - A record is applied atomically: every balance update or none
 */

import type {
  ClientId,
  FundsKind,
  TransactionKind,
  TxId,
} from "@ledger-replay/types";

// ─── Account Types ───────────────────────────────────────────────────────

/**
 * A client account as held by the Ledger.
 *
 * Mutated in place by the processor. `total` is kept equal to
 * `available + held` by every operation in accounts.ts.
 */
export interface Account {
  readonly client: ClientId;
  /** Funds usable for withdrawal or dispute (scaled by 10^4). */
  available: bigint;
  /** Funds frozen pending dispute resolution (scaled by 10^4). */
  held: bigint;
  /** available + held (scaled by 10^4). */
  total: bigint;
  /** Set by a chargeback. Deposits and withdrawals are rejected once set. */
  locked: boolean;
}

// ─── History Types ───────────────────────────────────────────────────────

/**
 * A retained copy of an accepted deposit or withdrawal.
 * The only kind of transaction a dispute can reference.
 */
export interface HistoryEntry {
  readonly kind: FundsKind;
  readonly client: ClientId;
  readonly tx: TxId;
  /** Normalized amount (scaled by 10^4). */
  readonly amount: bigint;
}

// ─── Rejection Types ─────────────────────────────────────────────────────

/** Codes for non-fatal, per-record rejections. */
export type RejectionCode =
  | "ACCOUNT_LOCKED"
  | "INSUFFICIENT_FUNDS"
  | "INSUFFICIENT_AVAILABLE"
  | "INSUFFICIENT_HELD"
  | "UNKNOWN_TRANSACTION"
  | "NOT_A_DEPOSIT";

/**
 * A record the processor declined to apply.
 * The ledger is left exactly as it was before the record.
 */
export interface Rejection {
  readonly code: RejectionCode;
  readonly kind: TransactionKind;
  readonly client: ClientId;
  readonly tx: TxId;
  readonly message: string;
}

/** Result of applying one record. */
export type ApplyOutcome =
  | { readonly status: "applied"; readonly kind: TransactionKind }
  | { readonly status: "rejected"; readonly rejection: Rejection };

/** Receives every rejection of a run (typically a logger). */
export type RejectionHandler = (rejection: Rejection) => void;

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes that abort a run. */
export type ProcessingErrorCode =
  | "MISSING_AMOUNT"
  | "UNKNOWN_TRANSACTION_KIND"
  | "INVALID_AMOUNT";

/**
 * Structured fatal error from the processor.
 * It is always thrown. The remaining records of the run are not applied.
 */
export class ProcessingError extends Error {
  public readonly code: ProcessingErrorCode;
  public readonly tx: TxId | undefined;

  constructor(code: ProcessingErrorCode, message: string, tx?: TxId) {
    super(message);
    this.name = "ProcessingError";
    this.code = code;
    this.tx = tx;
  }
}

// ─── Processor Types ─────────────────────────────────────────────────────

/**
 * Options for a processing run.
 */
export interface ProcessOptions {
  readonly onRejected?: RejectionHandler | undefined;
}

/**
 * Counters kept by a TransactionProcessor.
 */
export interface ProcessorStats {
  /** Records that were applied or rejected (fatal records are not counted). */
  readonly processed: number;
  readonly applied: number;
  readonly rejected: number;
}

// ─── Totals Types ────────────────────────────────────────────────────────

/**
 * Ledger-wide sums across every account.
 */
export interface LedgerTotals {
  readonly accounts: number;
  readonly lockedAccounts: number;
  readonly available: string;
  readonly held: string;
  readonly total: string;
  /** Whether every account satisfies total = available + held. */
  readonly balanced: boolean;
}
