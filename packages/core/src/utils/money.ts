/**
 * Money helpers.
 *
 * Amounts travel as decimal strings and become Decimal only inside the
 * account arithmetic.
 */

import { Decimal } from 'decimal.js';
import { MONEY_DECIMALS } from '../types/index.js';

/**
 * Parse a decimal string and round it to MONEY_DECIMALS places (half-up).
 */
export function toMoney(value: string): Decimal {
    return new Decimal(value).toDecimalPlaces(MONEY_DECIMALS, Decimal.ROUND_HALF_UP);
}

/**
 * Normalise a decimal string to its rounded plain form ("5.00000" -> "5").
 */
export function normalizeAmount(value: string): string {
    return toMoney(value).toFixed();
}

/**
 * Format with exactly MONEY_DECIMALS digits ("6" -> "6.0000").
 */
export function formatMoney(value: Decimal): string {
    // Negative zero prints as "-0.0000"
    const normalized = value.isZero() ? new Decimal(0) : value;
    return normalized.toFixed(MONEY_DECIMALS, Decimal.ROUND_HALF_UP);
}
