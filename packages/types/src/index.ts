/**
 * @ledger-replay/types — Shared domain types for the ledger replay stack.
 *
 * These types are used across all packages:
 * - Transaction records (the input of a run)
 * - Account snapshots (the output of a run)
 * - Client and transaction identifiers
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Transaction types
export type {
  ClientId,
  TxId,
  TransactionKind,
  FundsKind,
  TransactionRecord,
} from "./transaction.js";

export { MAX_CLIENT_ID, MAX_TX_ID } from "./transaction.js";

// Account types
export type { AccountSnapshot } from "./account.js";

// Runtime type guards
export {
  isClientId,
  isTxId,
  isTransactionKind,
} from "./guards.js";
