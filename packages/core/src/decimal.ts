import { Decimal } from 'decimal.js';

/**
 * Decimal constructor for ledger arithmetic.
 * A private clone so the ledger never depends on (or changes) the global Decimal configuration.
 */
export const LedgerDecimal = Decimal.clone({
    precision: 40,
    rounding: Decimal.ROUND_HALF_UP,
    toExpPos: 9e15,
    toExpNeg: -9e15,
});

export type DecimalValue = string | number | Decimal;

export function toDecimal(value: DecimalValue): Decimal {
    return new LedgerDecimal(value);
}

/**
 * Plain decimal string, never in exponential notation
 */
export function toDecimalString(value: Decimal): string {
    return value.toFixed();
}

/**
 * Clamp into [min, max]
 */
export function clampDecimal(value: Decimal, min: DecimalValue, max: DecimalValue): Decimal {
    const lo = toDecimal(min);
    const hi = toDecimal(max);
    if (value.lessThan(lo)) return lo;
    if (value.greaterThan(hi)) return hi;
    return value;
}

export function divide(a: Decimal, b: Decimal): Decimal {
    if (b.isZero()) {
        throw new Error('Division by zero');
    }
    return a.dividedBy(b);
}
