/**
 * @ledger-replay/ledger — Transaction replay engine.
 *
 * A pure TypeScript client ledger with zero runtime dependencies.
 * Replays deposits, withdrawals, disputes, resolves and chargebacks
 * and keeps these invariants after every record:
 * - total = available + held for every account
 * - A locked account never takes another deposit or withdrawal
 * - A deposit can be charged back at most once
 * - All monetary arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - No global state: every run owns its ledger and history
 * - Fatal input errors throw, business-rule rejections are values
 * - Zero runtime dependencies
 */

// Run entry points
export { processTransactions } from "./pipeline.js";
export { snapshot, toAccountSnapshot, computeLedgerTotals } from "./snapshot.js";

// Core engine
export { applyTransaction, TransactionProcessor } from "./processor.js";
export type { TransactionProcessorOptions } from "./processor.js";

// State
export { Ledger } from "./ledger.js";
export { TransactionHistory } from "./history.js";
export {
  createAccount,
  creditAvailable,
  debitAvailable,
  holdFunds,
  releaseFunds,
  chargeBackFunds,
  isBalanced,
} from "./accounts.js";

// Money arithmetic
export {
  AMOUNT_DECIMALS,
  isValidAmount,
  normalizeAmount,
  formatAmount,
  sumAmounts,
} from "./money-math.js";

// Types
export type {
  Account,
  HistoryEntry,
  RejectionCode,
  Rejection,
  ApplyOutcome,
  RejectionHandler,
  ProcessingErrorCode,
  ProcessOptions,
  ProcessorStats,
  LedgerTotals,
} from "./types.js";

export { ProcessingError } from "./types.js";
