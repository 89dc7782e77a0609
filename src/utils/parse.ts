import { Decimal } from 'decimal.js';

export interface NumberFormat {
    /** Separator between the integer part and the fraction */
    decimalSeparator: string;
    /** Thousands separator, grouping is rejected when omitted */
    groupSeparator?: string;
    /** Currency symbol accepted once before or after the digits */
    symbol?: string;
}

export const DOT_DECIMAL: NumberFormat = { decimalSeparator: '.' };

const escapeRegExp = (str: string): string => str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

function numberPattern(format: NumberFormat): RegExp {
    const decimal = escapeRegExp(format.decimalSeparator);
    const integer = format.groupSeparator
        ? `\\d{1,3}(?:${escapeRegExp(format.groupSeparator)}\\d{3})+|\\d+`
        : '\\d+';
    return new RegExp(`^(?:(${integer})(?:${decimal}(\\d+))?|${decimal}(\\d+))$`);
}

function stripSign(str: string): { sign: '+' | '-' | undefined; rest: string } {
    const match = /^([+-])\s*/.exec(str);
    if (!match) return { sign: undefined, rest: str };
    return { sign: match[1] === '-' ? '-' : '+', rest: str.slice(match[0].length) };
}

function stripSymbol(str: string, symbol?: string): string {
    if (!symbol) return str;
    if (str.startsWith(symbol)) return str.slice(symbol.length).trimStart();
    if (str.endsWith(symbol)) return str.slice(0, -symbol.length).trimEnd();
    return str;
}

/**
 * Reads a number written with the given separators.
 * Groups must hold exactly three digits, a leading sign or accounting parentheses mark negatives.
 * @returns the exact decimal value, or undefined when the string is not a valid number in this format
 */
export function parseAmount(str: unknown, format: NumberFormat): Decimal | undefined {
    if (typeof str !== 'string') return undefined;

    let s = str.trim();
    if (s === '') return undefined;

    let negative = false;
    let signed = false;
    if (s.startsWith('(') && s.endsWith(')')) {
        negative = true;
        signed = true;
        s = s.slice(1, -1).trim();
    }

    // sign may come before or after the symbol: "-€5" and "€-5"
    let { sign, rest } = signed ? { sign: undefined, rest: s } : stripSign(s);
    rest = stripSymbol(rest, format.symbol);
    if (!signed && !sign) {
        ({ sign, rest } = stripSign(rest));
    }
    if (sign === '-') negative = true;

    const match = numberPattern(format).exec(rest);
    if (!match) return undefined;

    const digits = match[1] ?? '0';
    const integer = format.groupSeparator ? digits.split(format.groupSeparator).join('') : digits;
    const fraction = match[2] ?? match[3];
    const value = new Decimal(fraction ? `${integer}.${fraction}` : integer);

    return negative && !value.isZero() ? value.negated() : value;
}
