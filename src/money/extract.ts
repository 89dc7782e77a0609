import type { LocaleTable } from '../locales/index';
import type { CurrencyCode } from '../utils/validate';

export interface ExtractedCurrency {
    /** Currency named by a code or symbol in the input, if any */
    currencyCode?: CurrencyCode;
    /** What is left once the currency marker is removed */
    numberStr: string;
}

const LEADING_CODE = /^([A-Z]{2,3})\s*/;
const TRAILING_CODE = /\s*([A-Z]{3})$/;

// checked in this order
const SYMBOLS: ReadonlyArray<[string, CurrencyCode]> = [
    ['$', 'USD'],
    ['€', 'EUR'],
    ['£', 'GBP'],
];

/**
 * Splits a trimmed price string into an optional currency and its numeric part.
 * Checked in order: leading code, symbol ("$" is read as USD), trailing code.
 */
export function extractCurrency(input: string, table: LocaleTable): ExtractedCurrency {
    const leading = LEADING_CODE.exec(input);
    if (leading) {
        const convention = table.get(leading[1]);
        if (convention) {
            return { currencyCode: convention.currencyCode, numberStr: input.slice(leading[0].length) };
        }
    }

    for (const [symbol, currencyCode] of SYMBOLS) {
        if (input.includes(symbol) && table.has(currencyCode)) {
            return { currencyCode, numberStr: input.split(symbol).join('').trim() };
        }
    }

    const trailing = TRAILING_CODE.exec(input);
    if (trailing) {
        const convention = table.get(trailing[1]);
        if (convention) {
            return { currencyCode: convention.currencyCode, numberStr: input.slice(0, trailing.index) };
        }
    }

    return { numberStr: input };
}
