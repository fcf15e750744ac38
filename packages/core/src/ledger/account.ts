import { Decimal } from 'decimal.js';
import type { AccountSnapshot, Transaction } from '../types/index.js';
import { formatMoney, toMoney } from '../utils/money.js';
import { LedgerError } from './errors.js';
import type { AccountOptions, StoredTransaction } from './types.js';

/**
 * One client's balances and the deposits/withdrawals it has accepted.
 *
 * Every operation either completes or throws a LedgerError before touching
 * any state, so a failed call leaves the account as it was.
 */
export class Account {
    readonly client: number;

    private available = new Decimal(0);
    private held = new Decimal(0);
    private total = new Decimal(0);
    private locked = false;
    private readonly transactions = new Map<number, StoredTransaction>();
    private readonly allowRedispute: boolean;

    constructor(client: number, options: AccountOptions = {}) {
        this.client = client;
        this.allowRedispute = options.allowRedispute ?? false;
    }

    get isLocked(): boolean {
        return this.locked;
    }

    balances(): { available: Decimal; held: Decimal; total: Decimal } {
        return { available: this.available, held: this.held, total: this.total };
    }

    deposit(amount: Decimal): void {
        if (amount.isNegative()) {
            throw new LedgerError('INVALID_AMOUNT', `deposit amount must not be negative: ${amount.toFixed()}`);
        }
        this.available = this.available.plus(amount);
        this.total = this.total.plus(amount);
    }

    /**
     * Sufficiency is checked against total, not available: held funds
     * can still be withdrawn.
     */
    withdraw(amount: Decimal): void {
        if (amount.greaterThan(this.total)) {
            throw new LedgerError(
                'INSUFFICIENT_FUNDS',
                `insufficient funds: requested ${formatMoney(amount)} exceeds total ${formatMoney(this.total)}`
            );
        }
        this.available = this.available.minus(amount);
        this.total = this.total.minus(amount);
    }

    dispute(txId: number): void {
        const original = this.findTransaction(txId, 'dispute');
        if (original.disputed && !this.allowRedispute) {
            throw new LedgerError('ALREADY_DISPUTED', `cannot dispute: transaction ${txId} is already disputed`);
        }
        this.available = this.available.minus(original.amount);
        this.held = this.held.plus(original.amount);
        original.disputed = true;
    }

    resolve(txId: number): void {
        const original = this.findDisputed(txId, 'resolve');
        this.available = this.available.plus(original.amount);
        this.held = this.held.minus(original.amount);
        original.disputed = false;
    }

    chargeBack(txId: number): void {
        const original = this.findDisputed(txId, 'charge back');
        this.total = this.total.minus(original.amount);
        this.held = this.held.minus(original.amount);
        this.locked = true;
        original.disputed = false;
    }

    /**
     * Apply one input transaction. Locked accounts reject everything.
     */
    processTransaction(transaction: Transaction): void {
        if (this.locked) {
            throw new LedgerError('ACCOUNT_LOCKED', `account ${this.client} is locked`);
        }

        const { type } = transaction;
        switch (type.kind) {
            case 'deposit': {
                const amount = this.requireAmount(transaction);
                this.deposit(amount);
                // Last write wins on a repeated tx id
                this.transactions.set(transaction.tx, { tx: transaction.tx, kind: 'deposit', amount, disputed: false });
                break;
            }
            case 'withdrawal': {
                const amount = this.requireAmount(transaction);
                this.withdraw(amount);
                this.transactions.set(transaction.tx, { tx: transaction.tx, kind: 'withdrawal', amount, disputed: false });
                break;
            }
            case 'dispute':
                this.dispute(transaction.tx);
                break;
            case 'resolve':
                this.resolve(transaction.tx);
                break;
            case 'chargeback':
                this.chargeBack(transaction.tx);
                break;
            case 'unknown':
                throw new LedgerError('UNRECOGNIZED_TYPE', `unrecognized transaction type: ${type.raw}`);
        }
    }

    /**
     * Throws INVARIANT_VIOLATION unless total == available + held.
     */
    assertBalanced(): void {
        if (!this.total.equals(this.available.plus(this.held))) {
            throw new LedgerError(
                'INVARIANT_VIOLATION',
                `account ${this.client} unbalanced: available=${this.available}, held=${this.held}, total=${this.total}`
            );
        }
    }

    /**
     * Stored deposits/withdrawals in ascending tx id order.
     */
    storedTransactions(): StoredTransaction[] {
        return [...this.transactions.values()]
            .sort((a, b) => a.tx - b.tx)
            .map((t) => ({ ...t }));
    }

    snapshot(): AccountSnapshot {
        return {
            client: this.client,
            available: formatMoney(this.available),
            held: formatMoney(this.held),
            total: formatMoney(this.total),
            locked: this.locked,
        };
    }

    private requireAmount(transaction: Transaction): Decimal {
        if (transaction.amount === undefined) {
            throw new LedgerError('INVALID_AMOUNT', `${transaction.type.kind} ${transaction.tx} has no amount`);
        }
        return toMoney(transaction.amount);
    }

    private findTransaction(txId: number, action: string): StoredTransaction {
        const original = this.transactions.get(txId);
        if (!original) {
            throw new LedgerError('UNKNOWN_TRANSACTION', `cannot ${action}: transaction ${txId} not found`);
        }
        return original;
    }

    private findDisputed(txId: number, action: string): StoredTransaction {
        const original = this.findTransaction(txId, action);
        if (!original.disputed) {
            throw new LedgerError('NOT_DISPUTED', `cannot ${action}: transaction ${txId} is not disputed`);
        }
        return original;
    }
}
