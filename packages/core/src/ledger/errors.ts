import type { LedgerErrorCode } from '../types/index.js';

/**
 * Structured error from the ledger.
 * Thrown by account operations, caught per record by the engine.
 */
export class LedgerError extends Error {
    public readonly code: LedgerErrorCode;

    constructor(code: LedgerErrorCode, message: string) {
        super(message);
        this.name = 'LedgerError';
        this.code = code;
    }
}

export function isLedgerError(err: unknown): err is LedgerError {
    return err instanceof LedgerError;
}
