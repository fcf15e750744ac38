/**
 * Ledger module: per-client account state machine and the run engine.
 */

export { Account } from './account.js';
export { Ledger, runLedger, checkMinimumAmount } from './engine.js';
export { LedgerError, isLedgerError } from './errors.js';
export type { AccountOptions, LedgerOptions, StoredTransaction } from './types.js';
