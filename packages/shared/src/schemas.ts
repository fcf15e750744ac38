/**
 * Zod schemas for ledger engine data structures.
 *
 * IMPORTANT: Decimal values are stored as strings in schemas.
 * Convert to Decimal at computation boundaries, back to string at output.
 */

import { z } from 'zod';
import { ID_LIMITS, CONFIG_DEFAULTS } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * Decimal amount as string (never native number for money).
 */
const decimalString = z.string().regex(/^[+-]?(\d+(\.\d*)?|\.\d+)$/, 'Must be valid decimal string');

/**
 * Client id: unsigned 16-bit integer.
 */
const clientId = z
    .number()
    .int('client must be an integer')
    .min(0, 'client must not be negative')
    .max(ID_LIMITS.CLIENT_MAX, `client must be at most ${ID_LIMITS.CLIENT_MAX}`);

/**
 * Transaction id: unsigned 32-bit integer.
 */
const txId = z
    .number()
    .int('tx must be an integer')
    .min(0, 'tx must not be negative')
    .max(ID_LIMITS.TX_MAX, `tx must be at most ${ID_LIMITS.TX_MAX}`);

// ============================================================================
// Input Row Schema
// ============================================================================

/**
 * One input row after trimming, before type resolution.
 * Empty cells arrive as undefined.
 */
export const TransactionRowSchema = z.object({
    type: z.string({ required_error: 'type is required' }).min(1, 'type is required'),
    client: z
        .string({ required_error: 'client is required' })
        .regex(/^\d+$/, 'client must be an unsigned integer')
        .transform(Number)
        .pipe(clientId),
    tx: z
        .string({ required_error: 'tx is required' })
        .regex(/^\d+$/, 'tx must be an unsigned integer')
        .transform(Number)
        .pipe(txId),
    amount: z.string().regex(/^[+-]?(\d+(\.\d*)?|\.\d+)$/, 'amount must be a decimal number').optional(),
});

export type TransactionRow = z.infer<typeof TransactionRowSchema>;

// ============================================================================
// Transaction Schemas
// ============================================================================

/**
 * Recognised transaction type tokens (lowercase).
 */
export const KnownTransactionTypeSchema = z.enum(['deposit', 'withdrawal', 'dispute', 'resolve', 'chargeback']);

export type KnownTransactionType = z.infer<typeof KnownTransactionTypeSchema>;

/**
 * Transaction type. Unrecognised tokens are kept verbatim in `raw`
 * instead of failing the parse.
 */
export const TransactionTypeSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('deposit') }),
    z.object({ kind: z.literal('withdrawal') }),
    z.object({ kind: z.literal('dispute') }),
    z.object({ kind: z.literal('resolve') }),
    z.object({ kind: z.literal('chargeback') }),
    z.object({ kind: z.literal('unknown'), raw: z.string() }),
]);

export type TransactionType = z.infer<typeof TransactionTypeSchema>;

/**
 * A well-formed input transaction.
 * `amount` is only present (and only meaningful) for deposits and withdrawals.
 */
export const TransactionSchema = z.object({
    type: TransactionTypeSchema,
    client: clientId,
    tx: txId,
    amount: decimalString.optional(),
});

export type Transaction = z.infer<typeof TransactionSchema>;

// ============================================================================
// Parser Result Schemas
// ============================================================================

/**
 * One input row in encounter order: either a transaction or a parse failure.
 * `line` is 1-based; `fields` are the trimmed original cells.
 */
export const ParsedRowSchema = z.discriminatedUnion('ok', [
    z.object({
        ok: z.literal(true),
        line: z.number().int().min(1),
        fields: z.array(z.string()),
        transaction: TransactionSchema,
    }),
    z.object({
        ok: z.literal(false),
        line: z.number().int().min(1),
        fields: z.array(z.string()),
        error: z.string(),
    }),
]);

export type ParsedRow = z.infer<typeof ParsedRowSchema>;

/**
 * Result returned by the transaction parser.
 * Parsers return data, not side effects. Warnings are returned as data.
 */
export const TransactionParseResultSchema = z.object({
    rows: z.array(ParsedRowSchema),
    warnings: z.array(z.string()),
    skippedRows: z.number().int().min(0),
});

export type TransactionParseResult = z.infer<typeof TransactionParseResultSchema>;

// ============================================================================
// Ledger Schemas
// ============================================================================

/**
 * Error codes for ledger operations.
 */
export const LedgerErrorCodeSchema = z.enum([
    'PARSE_ERROR',
    'INVALID_AMOUNT',
    'INSUFFICIENT_FUNDS',
    'UNKNOWN_TRANSACTION',
    'NOT_DISPUTED',
    'ALREADY_DISPUTED',
    'ACCOUNT_LOCKED',
    'UNRECOGNIZED_TYPE',
    'INVARIANT_VIOLATION',
]);

export type LedgerErrorCode = z.infer<typeof LedgerErrorCodeSchema>;

/**
 * Final state of one client account, money formatted to four decimals.
 */
export const AccountSnapshotSchema = z.object({
    client: clientId,
    available: decimalString,
    held: decimalString,
    total: decimalString,
    locked: z.boolean(),
});

export type AccountSnapshot = z.infer<typeof AccountSnapshotSchema>;

/**
 * An input row that could not be applied, with the reason.
 */
export const FailedRecordSchema = z.object({
    line: z.number().int().min(1),
    fields: z.array(z.string()),
    code: LedgerErrorCodeSchema,
    reason: z.string(),
});

export type FailedRecord = z.infer<typeof FailedRecordSchema>;

/**
 * Run statistics for reporting.
 */
export const LedgerStatsSchema = z.object({
    total_rows: z.number().int().min(0),
    applied: z.number().int().min(0),
    failed: z.number().int().min(0),
    failures_by_code: z.record(LedgerErrorCodeSchema, z.number().int().min(0)),
});

export type LedgerStats = z.infer<typeof LedgerStatsSchema>;

/**
 * Result of a full ledger run.
 */
export const LedgerRunResultSchema = z.object({
    accounts: z.array(AccountSnapshotSchema),
    failed: z.array(FailedRecordSchema),
    stats: LedgerStatsSchema,
});

export type LedgerRunResult = z.infer<typeof LedgerRunResultSchema>;

// ============================================================================
// Configuration Schema
// ============================================================================

/**
 * ledger.config.yaml
 */
export const LedgerConfigSchema = z
    .object({
        // Relative to the config file when loaded from one
        output_dir: z.string().min(1).optional(),
        accounts_file: z.string().min(1).default(CONFIG_DEFAULTS.ACCOUNTS_FILE),
        failed_file: z.string().min(1).default(CONFIG_DEFAULTS.FAILED_FILE),
        allow_redispute: z.boolean().default(CONFIG_DEFAULTS.ALLOW_REDISPUTE),
    })
    .strict();

export type LedgerConfig = z.infer<typeof LedgerConfigSchema>;
