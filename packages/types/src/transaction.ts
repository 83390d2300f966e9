/**
 * Transaction Types
 *
 * The input unit of a ledger replay run.
 *
 * Rules:
 * - Amounts are decimal strings to avoid floating-point errors
 * - Records are immutable once produced by a source
 * - The kind is carried as read, so an unrecognised kind reaches the
 *   processor and fails the run there
 */

/** Client identifier (unsigned 16-bit). */
export type ClientId = number;

/** Transaction identifier (unsigned 32-bit). */
export type TxId = number;

/** The transaction kinds the processor knows how to apply. */
export type TransactionKind =
  | "deposit"
  | "withdrawal"
  | "dispute"
  | "resolve"
  | "chargeback";

/** Kinds that move funds in or out and are retained in history. */
export type FundsKind = Extract<TransactionKind, "deposit" | "withdrawal">;

export const MAX_CLIENT_ID = 0xffff;
export const MAX_TX_ID = 0xffff_ffff;

/**
 * A single record read from a transaction source.
 */
export interface TransactionRecord {
  /** Transaction kind as read (normally a TransactionKind) */
  readonly kind: string;

  /** Client the record applies to */
  readonly client: ClientId;

  /**
   * Transaction id. Unique for deposits and withdrawals;
   * disputes, resolves and chargebacks reference an earlier one.
   */
  readonly tx: TxId;

  /** Decimal amount (e.g. "1.5"). Present for deposits and withdrawals. */
  readonly amount?: string | undefined;
}
