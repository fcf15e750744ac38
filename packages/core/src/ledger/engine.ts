import type {
    AccountSnapshot,
    FailedRecord,
    LedgerErrorCode,
    LedgerRunResult,
    LedgerStats,
    ParsedRow,
    Transaction,
} from '../types/index.js';
import { toMoney } from '../utils/money.js';
import { Account } from './account.js';
import { LedgerError, isLedgerError } from './errors.js';
import type { LedgerOptions } from './types.js';

/**
 * Reject deposits and withdrawals that carry no positive amount.
 * Runs before the row is routed to an account.
 */
export function checkMinimumAmount(transaction: Transaction): void {
    const { kind } = transaction.type;
    if (kind !== 'deposit' && kind !== 'withdrawal') {
        return;
    }
    if (transaction.amount === undefined) {
        throw new LedgerError('INVALID_AMOUNT', `minimum amount rule: ${kind} ${transaction.tx} has no amount`);
    }
    const amount = toMoney(transaction.amount);
    if (amount.lessThanOrEqualTo(0)) {
        throw new LedgerError(
            'INVALID_AMOUNT',
            `minimum amount rule: ${kind} amount must be greater than 0 but was ${amount.toFixed()}`
        );
    }
}

/**
 * Run-scoped ledger state: one Account per client plus the failed rows.
 *
 * Rows are applied strictly in the order given. A failing row is recorded
 * and the run continues. Non-LedgerError exceptions and invariant
 * violations propagate.
 */
export class Ledger {
    private readonly accountsByClient = new Map<number, Account>();
    private readonly failed: FailedRecord[] = [];
    private readonly failuresByCode: Partial<Record<LedgerErrorCode, number>> = {};
    private totalRows = 0;
    private appliedRows = 0;

    constructor(private readonly options: LedgerOptions = {}) {}

    /**
     * Apply one parsed row.
     *
     * Unknown types and rows breaking the minimum-amount rule fail before an
     * account is looked up; any other row creates its client's account even
     * when it then fails.
     *
     * @returns true if the row was applied, false if it was recorded as failed
     */
    apply(row: ParsedRow): boolean {
        this.totalRows++;

        if (!row.ok) {
            this.recordFailure(row, 'PARSE_ERROR', row.error);
            return false;
        }

        const { transaction } = row;
        try {
            checkMinimumAmount(transaction);
            if (transaction.type.kind === 'unknown') {
                throw new LedgerError('UNRECOGNIZED_TYPE', `unrecognized transaction type: ${transaction.type.raw}`);
            }

            const account = this.getOrCreateAccount(transaction.client);
            account.processTransaction(transaction);
            account.assertBalanced();

            this.appliedRows++;
            return true;
        } catch (err) {
            if (!isLedgerError(err) || err.code === 'INVARIANT_VIOLATION') {
                throw err;
            }
            this.recordFailure(row, err.code, err.message);
            return false;
        }
    }

    /**
     * Look up the live account for a client.
     */
    account(client: number): Account | undefined {
        return this.accountsByClient.get(client);
    }

    /**
     * Account snapshots in ascending client id order.
     */
    accounts(): AccountSnapshot[] {
        return [...this.accountsByClient.values()]
            .sort((a, b) => a.client - b.client)
            .map((account) => account.snapshot());
    }

    /**
     * Failed rows in encounter order.
     */
    failedRecords(): FailedRecord[] {
        return this.failed.map((record) => ({ ...record, fields: [...record.fields] }));
    }

    stats(): LedgerStats {
        return {
            total_rows: this.totalRows,
            applied: this.appliedRows,
            failed: this.failed.length,
            failures_by_code: { ...this.failuresByCode },
        };
    }

    result(): LedgerRunResult {
        return {
            accounts: this.accounts(),
            failed: this.failedRecords(),
            stats: this.stats(),
        };
    }

    private getOrCreateAccount(client: number): Account {
        let account = this.accountsByClient.get(client);
        if (!account) {
            account = new Account(client, this.options);
            this.accountsByClient.set(client, account);
        }
        return account;
    }

    private recordFailure(row: ParsedRow, code: LedgerErrorCode, reason: string): void {
        this.failed.push({ line: row.line, fields: [...row.fields], code, reason });
        this.failuresByCode[code] = (this.failuresByCode[code] ?? 0) + 1;
    }
}

/**
 * Apply every row in encounter order and return the final ledger.
 *
 * @param rows - Parsed rows, typically TransactionParseResult.rows
 * @param options - Ledger options
 * @returns Accounts by ascending client id, failed rows in input order, stats
 */
export function runLedger(rows: Iterable<ParsedRow>, options: LedgerOptions = {}): LedgerRunResult {
    const ledger = new Ledger(options);
    for (const row of rows) {
        ledger.apply(row);
    }
    return ledger.result();
}
