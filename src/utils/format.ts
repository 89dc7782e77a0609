import { Decimal } from 'decimal.js';

/**
 * Renders an amount with ',' thousands grouping and a fixed number of decimals.
 * Rounds half away from zero.
 */
export function formatAmount(value: Decimal, fractionDigits: number = 2): string {
    const fixed = value.toFixed(fractionDigits, Decimal.ROUND_HALF_UP);
    const negative = fixed.startsWith('-');
    const [integer, fraction] = (negative ? fixed.slice(1) : fixed).split('.');

    const grouped = integer.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
    return `${negative ? '-' : ''}${grouped}${fraction ? `.${fraction}` : ''}`;
}
