/**
 * Constants for the ledger engine.
 */

/**
 * Monetary precision. Amounts are rounded to this many decimal places on
 * input and always printed with exactly this many on output.
 */
export const MONEY_DECIMALS = 4;

/**
 * Identifier ranges. Client ids are u16, transaction ids are u32.
 */
export const ID_LIMITS = {
    CLIENT_MAX: 65535,
    TX_MAX: 4294967295,
} as const;

/**
 * Input column names (matched case-insensitively).
 */
export const INPUT_COLUMNS = {
    TYPE: 'type',
    CLIENT: 'client',
    TX: 'tx',
    AMOUNT: 'amount',
} as const;

export const REQUIRED_INPUT_COLUMNS = [INPUT_COLUMNS.TYPE, INPUT_COLUMNS.CLIENT, INPUT_COLUMNS.TX] as const;

/**
 * Output column order.
 */
export const ACCOUNT_OUTPUT_COLUMNS = ['client', 'available', 'held', 'total', 'locked'] as const;
export const FAILED_OUTPUT_COLUMNS = ['type', 'client', 'tx', 'amount', 'reason'] as const;

/**
 * Defaults for ledger.config.yaml.
 */
export const CONFIG_DEFAULTS = {
    FILENAME: 'ledger.config.yaml',
    ACCOUNTS_FILE: 'accounts.csv',
    FAILED_FILE: 'failed.csv',
    ALLOW_REDISPUTE: false,
} as const;
