// Types (re-exported from shared)
export type {
    TransactionType,
    Transaction,
    ParsedRow,
    TransactionParseResult,
    LedgerErrorCode,
    AccountSnapshot,
    FailedRecord,
    LedgerStats,
    LedgerRunResult,
} from './types/index.js';

// Utils
export { stripBom, normalizeCsvText, toMoney, normalizeAmount, formatMoney } from './utils/index.js';

// Parser
export { parseTransactions, resolveTransactionType } from './parser/index.js';

// Ledger
export { Account, Ledger, runLedger, checkMinimumAmount, LedgerError, isLedgerError } from './ledger/index.js';
export type { AccountOptions, LedgerOptions, StoredTransaction } from './ledger/index.js';

// Export
export { formatAccountsCsv, formatFailedCsv } from './export/index.js';
