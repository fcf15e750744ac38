/**
 * Transaction CSV parser.
 *
 * Format:
 * - Delimited text, first non-blank row is the header
 * - Columns: type, client, tx, amount (any order, case-insensitive)
 * - Rows may be ragged; dispute/resolve/chargeback rows usually omit amount
 *
 * Bad rows do not abort parsing. Each becomes a failed ParsedRow carrying
 * the reason, so the ledger can report it in encounter order.
 */

import * as XLSX from 'xlsx';
import type { ParsedRow, TransactionParseResult, TransactionType } from '../types/index.js';
import {
    INPUT_COLUMNS,
    REQUIRED_INPUT_COLUMNS,
    KnownTransactionTypeSchema,
    TransactionRowSchema,
} from '../types/index.js';
import { normalizeCsvText } from '../utils/csv.js';
import { normalizeAmount } from '../utils/money.js';

/**
 * Canonical column order of ParsedRow.fields.
 */
const FIELD_ORDER = [INPUT_COLUMNS.TYPE, INPUT_COLUMNS.CLIENT, INPUT_COLUMNS.TX, INPUT_COLUMNS.AMOUNT] as const;

type ColumnName = (typeof FIELD_ORDER)[number];

/**
 * Resolve a type token. Unrecognised tokens are kept verbatim.
 */
export function resolveTransactionType(token: string): TransactionType {
    const known = KnownTransactionTypeSchema.safeParse(token.trim().toLowerCase());
    if (known.success) {
        return { kind: known.data };
    }
    return { kind: 'unknown', raw: token.trim() };
}

/**
 * Parse transaction records from CSV text.
 *
 * @param data - File contents as text
 * @returns ParseResult with one row per non-blank input line, warnings and skip count
 * @throws Error when the header lacks a required column
 */
export function parseTransactions(data: string): TransactionParseResult {
    const rows: ParsedRow[] = [];
    const warnings: string[] = [];

    const text = normalizeCsvText(data);
    if (text.trim() === '') {
        return { rows, warnings, skippedRows: 0 };
    }

    const workbook = XLSX.read(text, { type: 'string', raw: true });
    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];

    if (!sheet) {
        return { rows, warnings, skippedRows: 0 };
    }

    const table = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
        header: 1,
        raw: true,
        defval: '',
        blankrows: true,
    });
    const cells = table.map((row) => row.map((cell) => String(cell ?? '').trim()));

    const headerIndex = cells.findIndex((row) => !isBlank(row));
    if (headerIndex === -1) {
        return { rows, warnings, skippedRows: 0 };
    }

    const columns = mapColumns(cells[headerIndex]);
    const missingColumns = REQUIRED_INPUT_COLUMNS.filter((col) => columns[col] === undefined);
    if (missingColumns.length > 0) {
        throw new Error(
            `Transaction parser: Missing required columns: ${missingColumns.join(', ')}. ` +
            `Found: ${cells[headerIndex].filter((c) => c !== '').join(', ')}`
        );
    }

    let skippedBlank = 0;
    let failedRows = 0;

    for (let i = headerIndex + 1; i < cells.length; i++) {
        const row = cells[i];
        if (isBlank(row)) {
            skippedBlank++;
            continue;
        }

        const parsed = parseRow(row, columns, i + 1);
        if (!parsed.ok) {
            failedRows++;
        }
        rows.push(parsed);
    }

    if (skippedBlank) {
        warnings.push(`Skipped ${skippedBlank} blank rows`);
    }
    if (failedRows) {
        warnings.push(`${failedRows} rows could not be parsed`);
    }

    return { rows, warnings, skippedRows: skippedBlank };
}

function isBlank(row: string[]): boolean {
    return row.every((cell) => cell === '');
}

/**
 * Map canonical column names to their position in the header.
 */
function mapColumns(header: string[]): Partial<Record<ColumnName, number>> {
    const columns: Partial<Record<ColumnName, number>> = {};
    header.forEach((name, index) => {
        const key = FIELD_ORDER.find((col) => col === name.toLowerCase());
        if (key !== undefined && columns[key] === undefined) {
            columns[key] = index;
        }
    });
    return columns;
}

function parseRow(row: string[], columns: Partial<Record<ColumnName, number>>, line: number): ParsedRow {
    const cell = (col: ColumnName): string => {
        const index = columns[col];
        return index === undefined ? '' : row[index] ?? '';
    };
    const fields = FIELD_ORDER.map(cell);
    const orUndefined = (value: string): string | undefined => (value === '' ? undefined : value);

    const result = TransactionRowSchema.safeParse({
        type: orUndefined(cell(INPUT_COLUMNS.TYPE)),
        client: orUndefined(cell(INPUT_COLUMNS.CLIENT)),
        tx: orUndefined(cell(INPUT_COLUMNS.TX)),
        amount: orUndefined(cell(INPUT_COLUMNS.AMOUNT)),
    });

    if (!result.success) {
        const error = result.error.issues.map((issue) => issue.message).join('; ');
        return { ok: false, line, fields, error };
    }

    const record = result.data;
    const type = resolveTransactionType(record.type);

    if (type.kind === 'deposit' || type.kind === 'withdrawal') {
        if (record.amount === undefined) {
            return { ok: false, line, fields, error: `amount is required for ${type.kind}` };
        }
        return {
            ok: true,
            line,
            fields,
            transaction: { type, client: record.client, tx: record.tx, amount: normalizeAmount(record.amount) },
        };
    }

    return { ok: true, line, fields, transaction: { type, client: record.client, tx: record.tx } };
}
