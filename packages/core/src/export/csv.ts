/**
 * CSV serialisation of run results.
 * Returns text; writing it anywhere is the caller's job.
 */

import * as XLSX from 'xlsx';
import type { AccountSnapshot, FailedRecord } from '../types/index.js';
import { ACCOUNT_OUTPUT_COLUMNS, FAILED_OUTPUT_COLUMNS } from '../types/index.js';

/**
 * Number of original cells printed before the reason column.
 */
const FAILED_FIELD_COUNT = FAILED_OUTPUT_COLUMNS.length - 1;

/**
 * Render an array of string rows as CSV. Every cell is written as text so
 * "6.0000" keeps its trailing zeros.
 */
function toCsv(rows: string[][]): string {
    const sheet = XLSX.utils.aoa_to_sheet(rows);
    return `${XLSX.utils.sheet_to_csv(sheet, { FS: ',', RS: '\n' })}\n`;
}

/**
 * Accounts CSV: client, available, held, total, locked.
 */
export function formatAccountsCsv(accounts: AccountSnapshot[]): string {
    const rows = accounts.map((account) => [
        String(account.client),
        account.available,
        account.held,
        account.total,
        account.locked ? 'true' : 'false',
    ]);
    return toCsv([[...ACCOUNT_OUTPUT_COLUMNS], ...rows]);
}

/**
 * Failed records CSV: the original type, client, tx, amount cells followed
 * by the failure reason.
 */
export function formatFailedCsv(failed: FailedRecord[]): string {
    const rows = failed.map((record) => {
        const fields = Array.from({ length: FAILED_FIELD_COUNT }, (_, i) => record.fields[i] ?? '');
        return [...fields, record.reason];
    });
    return toCsv([[...FAILED_OUTPUT_COLUMNS], ...rows]);
}
