/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledger replay domain types.
 * These enable safe runtime validation at system boundaries
 * (record sources and the processor's dispatch).
 */

import type { ClientId, TransactionKind, TxId } from "./transaction.js";
import { MAX_CLIENT_ID, MAX_TX_ID } from "./transaction.js";

// =============================================================================
// Identifier guards
// =============================================================================

export function isClientId(value: unknown): value is ClientId {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_CLIENT_ID
  );
}

export function isTxId(value: unknown): value is TxId {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_TX_ID
  );
}

// =============================================================================
// Transaction guards
// =============================================================================

const TRANSACTION_KINDS = new Set<string>([
  "deposit", "withdrawal", "dispute", "resolve", "chargeback",
]);

export function isTransactionKind(value: unknown): value is TransactionKind {
  return typeof value === "string" && TRANSACTION_KINDS.has(value);
}
