/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
export type {
    TransactionRow,
    KnownTransactionType,
    TransactionType,
    Transaction,
    ParsedRow,
    TransactionParseResult,
    LedgerErrorCode,
    AccountSnapshot,
    FailedRecord,
    LedgerStats,
    LedgerRunResult,
} from '@ledger-engine/shared';

export {
    TransactionRowSchema,
    KnownTransactionTypeSchema,
    MONEY_DECIMALS,
    INPUT_COLUMNS,
    REQUIRED_INPUT_COLUMNS,
    ACCOUNT_OUTPUT_COLUMNS,
    FAILED_OUTPUT_COLUMNS,
} from '@ledger-engine/shared';
