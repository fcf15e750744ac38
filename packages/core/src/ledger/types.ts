import type { Decimal } from 'decimal.js';

/**
 * Options for a single account.
 */
export interface AccountOptions {
    allowRedispute?: boolean;  // Default: false (second dispute fails with ALREADY_DISPUTED)
}

/**
 * Options for a ledger run. Passed to every account the ledger creates.
 */
export type LedgerOptions = AccountOptions;

/**
 * A deposit or withdrawal kept for later dispute/resolve/chargeback lookups.
 */
export interface StoredTransaction {
    readonly tx: number;
    readonly kind: 'deposit' | 'withdrawal';
    readonly amount: Decimal;
    disputed: boolean;
}
