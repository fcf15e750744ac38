// Schemas
export {
    TransactionRowSchema,
    KnownTransactionTypeSchema,
    TransactionTypeSchema,
    TransactionSchema,
    ParsedRowSchema,
    TransactionParseResultSchema,
    LedgerErrorCodeSchema,
    AccountSnapshotSchema,
    FailedRecordSchema,
    LedgerStatsSchema,
    LedgerRunResultSchema,
    LedgerConfigSchema,
} from './schemas.js';

// Types
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
    LedgerConfig,
} from './schemas.js';

// Constants
export {
    MONEY_DECIMALS,
    ID_LIMITS,
    INPUT_COLUMNS,
    REQUIRED_INPUT_COLUMNS,
    ACCOUNT_OUTPUT_COLUMNS,
    FAILED_OUTPUT_COLUMNS,
    CONFIG_DEFAULTS,
} from './constants.js';
