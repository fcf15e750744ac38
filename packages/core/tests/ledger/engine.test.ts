import { describe, it, expect, vi } from 'vitest';
import { Ledger, runLedger, checkMinimumAmount } from '../../src/ledger/engine.js';
import { LedgerError } from '../../src/ledger/errors.js';
import { Account } from '../../src/ledger/account.js';
import type { ParsedRow, Transaction } from '@ledger-engine/shared';

let nextLine = 2;

function row(transaction: Transaction): ParsedRow {
    const fields = [
        transaction.type.kind === 'unknown' ? transaction.type.raw : transaction.type.kind,
        String(transaction.client),
        String(transaction.tx),
        transaction.amount ?? '',
    ];
    return { ok: true, line: nextLine++, fields, transaction };
}

const deposit = (client: number, tx: number, amount: string) =>
    row({ type: { kind: 'deposit' }, client, tx, amount });
const withdrawal = (client: number, tx: number, amount: string) =>
    row({ type: { kind: 'withdrawal' }, client, tx, amount });
const dispute = (client: number, tx: number) => row({ type: { kind: 'dispute' }, client, tx });
const resolve = (client: number, tx: number) => row({ type: { kind: 'resolve' }, client, tx });
const chargeback = (client: number, tx: number) => row({ type: { kind: 'chargeback' }, client, tx });

describe('runLedger', () => {
    it('applies deposits and a withdrawal', () => {
        const result = runLedger([deposit(1, 1, '5.0'), deposit(1, 2, '3.0'), withdrawal(1, 3, '2.0')]);

        expect(result.accounts).toEqual([
            { client: 1, available: '6.0000', held: '0.0000', total: '6.0000', locked: false },
        ]);
        expect(result.failed).toEqual([]);
        expect(result.stats).toEqual({ total_rows: 3, applied: 3, failed: 0, failures_by_code: {} });
    });

    it('locks the account on chargeback and fails later rows for that client', () => {
        const later = deposit(1, 2, '10.0');
        const result = runLedger([deposit(1, 1, '5.0'), dispute(1, 1), chargeback(1, 1), later]);

        expect(result.accounts).toEqual([
            { client: 1, available: '0.0000', held: '0.0000', total: '0.0000', locked: true },
        ]);
        expect(result.failed).toEqual([
            { line: later.line, fields: ['deposit', '1', '2', '10.0'], code: 'ACCOUNT_LOCKED', reason: 'account 1 is locked' },
        ]);
    });

    it('records an unrecognized type without creating an account', () => {
        const transfer = row({ type: { kind: 'unknown', raw: 'transfer' }, client: 9, tx: 1, amount: '1' });
        const result = runLedger([transfer]);

        expect(result.accounts).toEqual([]);
        expect(result.failed).toHaveLength(1);
        expect(result.failed[0].code).toBe('UNRECOGNIZED_TYPE');
        expect(result.failed[0].reason).toBe('unrecognized transaction type: transfer');
        expect(result.failed[0].fields).toEqual(['transfer', '9', '1', '1']);
    });

    it('records parse failures without touching any account', () => {
        const bad: ParsedRow = { ok: false, line: 4, fields: ['deposit', 'abc', '1', '1'], error: 'client must be an unsigned integer' };
        const result = runLedger([deposit(1, 1, '1'), bad]);

        expect(result.accounts.map(a => a.client)).toEqual([1]);
        expect(result.failed).toEqual([
            { line: 4, fields: ['deposit', 'abc', '1', '1'], code: 'PARSE_ERROR', reason: 'client must be an unsigned integer' },
        ]);
    });

    it('rejects non-positive deposit and withdrawal amounts before dispatch', () => {
        const result = runLedger([deposit(1, 1, '0'), withdrawal(2, 2, '-3')]);

        expect(result.accounts).toEqual([]);
        expect(result.failed.map(f => f.code)).toEqual(['INVALID_AMOUNT', 'INVALID_AMOUNT']);
        expect(result.failed[0].reason).toBe('minimum amount rule: deposit amount must be greater than 0 but was 0');
        expect(result.failed[1].reason).toBe('minimum amount rule: withdrawal amount must be greater than 0 but was -3');
    });

    it('creates the account for a new client even when its first row fails', () => {
        const result = runLedger([withdrawal(5, 1, '1'), dispute(6, 9)]);

        expect(result.accounts).toEqual([
            { client: 5, available: '0.0000', held: '0.0000', total: '0.0000', locked: false },
            { client: 6, available: '0.0000', held: '0.0000', total: '0.0000', locked: false },
        ]);
        expect(result.failed.map(f => f.code)).toEqual(['INSUFFICIENT_FUNDS', 'UNKNOWN_TRANSACTION']);
    });

    it('leaves balances unchanged when a dispute references an unknown id', () => {
        const result = runLedger([deposit(1, 1, '2'), dispute(1, 42)]);

        expect(result.accounts[0]).toEqual({ client: 1, available: '2.0000', held: '0.0000', total: '2.0000', locked: false });
        expect(result.failed[0].reason).toBe('cannot dispute: transaction 42 not found');
    });

    it('records resolve and chargeback of an undisputed transaction as NOT_DISPUTED', () => {
        const result = runLedger([deposit(1, 1, '2'), resolve(1, 1), chargeback(1, 1)]);

        expect(result.failed.map(f => f.code)).toEqual(['NOT_DISPUTED', 'NOT_DISPUTED']);
        expect(result.accounts[0].locked).toBe(false);
    });

    it('does not apply a dispute that names another client\'s transaction', () => {
        const result = runLedger([deposit(1, 1, '5'), deposit(2, 2, '5'), dispute(2, 1)]);

        expect(result.failed.map(f => f.code)).toEqual(['UNKNOWN_TRANSACTION']);
        expect(result.accounts.map(a => a.held)).toEqual(['0.0000', '0.0000']);
    });

    it('orders accounts by ascending client id and failures by encounter order', () => {
        const result = runLedger([
            deposit(30, 1, '1'),
            withdrawal(30, 2, '5'),
            deposit(2, 3, '1'),
            dispute(2, 99),
            deposit(10, 4, '1'),
        ]);

        expect(result.accounts.map(a => a.client)).toEqual([2, 10, 30]);
        expect(result.failed.map(f => f.code)).toEqual(['INSUFFICIENT_FUNDS', 'UNKNOWN_TRANSACTION']);
        expect(result.stats).toEqual({
            total_rows: 5,
            applied: 3,
            failed: 2,
            failures_by_code: { INSUFFICIENT_FUNDS: 1, UNKNOWN_TRANSACTION: 1 },
        });
    });

    it('passes allowRedispute through to accounts', () => {
        const strict = runLedger([deposit(1, 1, '5'), dispute(1, 1), dispute(1, 1)]);
        expect(strict.failed.map(f => f.code)).toEqual(['ALREADY_DISPUTED']);
        expect(strict.accounts[0]).toMatchObject({ available: '0.0000', held: '5.0000' });

        const lenient = runLedger([deposit(1, 1, '5'), dispute(1, 1), dispute(1, 1)], { allowRedispute: true });
        expect(lenient.failed).toEqual([]);
        expect(lenient.accounts[0]).toMatchObject({ available: '-5.0000', held: '10.0000', total: '5.0000' });
    });

    it('keeps total equal to available plus held for every account', () => {
        const result = runLedger([
            deposit(1, 1, '1.5'),
            deposit(2, 2, '2.25'),
            dispute(1, 1),
            withdrawal(2, 3, '0.75'),
            dispute(2, 2),
            resolve(2, 2),
        ]);

        for (const account of result.accounts) {
            const sum = Number(account.available) + Number(account.held);
            expect(sum.toFixed(4)).toBe(account.total);
        }
    });
});

describe('Ledger', () => {
    it('applies rows incrementally and exposes live accounts', () => {
        const ledger = new Ledger();

        expect(ledger.apply(deposit(7, 1, '4'))).toBe(true);
        expect(ledger.apply(withdrawal(7, 2, '9'))).toBe(false);

        expect(ledger.account(7)?.snapshot().total).toBe('4.0000');
        expect(ledger.account(8)).toBeUndefined();
        expect(ledger.failedRecords()).toHaveLength(1);
    });

    it('propagates an invariant violation instead of recording the row', () => {
        const ledger = new Ledger();
        const check = vi.spyOn(Account.prototype, 'assertBalanced').mockImplementation(() => {
            throw new LedgerError('INVARIANT_VIOLATION', 'account 1 unbalanced');
        });

        try {
            expect(() => ledger.apply(deposit(1, 1, '1'))).toThrow('account 1 unbalanced');
            expect(ledger.failedRecords()).toEqual([]);
            expect(ledger.stats().applied).toBe(0);
        } finally {
            check.mockRestore();
        }
    });

    it('returns copies of failed records', () => {
        const ledger = new Ledger();
        ledger.apply(dispute(1, 1));

        const failed = ledger.failedRecords();
        failed[0].fields.push('mutated');

        expect(ledger.failedRecords()[0].fields).toEqual(['dispute', '1', '1', '']);
    });
});

describe('checkMinimumAmount', () => {
    it('ignores dispute-style transactions', () => {
        expect(() => checkMinimumAmount({ type: { kind: 'dispute' }, client: 1, tx: 1 })).not.toThrow();
    });

    it('rejects a deposit with no amount', () => {
        expect(() => checkMinimumAmount({ type: { kind: 'deposit' }, client: 1, tx: 3 })).toThrow(LedgerError);
        expect(() => checkMinimumAmount({ type: { kind: 'deposit' }, client: 1, tx: 3 })).toThrow(
            'minimum amount rule: deposit 3 has no amount'
        );
    });

    it('rejects an amount that rounds to zero', () => {
        expect(() => checkMinimumAmount({ type: { kind: 'withdrawal' }, client: 1, tx: 1, amount: '0.00001' })).toThrow(
            'minimum amount rule: withdrawal amount must be greater than 0 but was 0'
        );
    });
});
