import { normalizeCurrency, type CurrencyCode } from '../utils/validate';
import { type NumberFormat } from '../utils/parse';
import { UnsupportedCurrencyError } from '../money/errors';

export interface LocaleConvention extends NumberFormat {
    /** ISO 4217 currency code (e.g., 'EUR', 'USD') */
    currencyCode: CurrencyCode;
    /** Locale identifier the convention is named after (e.g., 'de-DE') */
    locale: string;
    decimalSeparator: string;
    groupSeparator: string;
    /** Currency symbol as written in that locale */
    symbol: string;
}

/**
 * Read-only set of locale conventions keyed by currency code.
 * Enumeration keeps the declaration order, which also decides which currency
 * is picked when several conventions agree on an amount.
 */
export class LocaleTable {
    private readonly conventions: ReadonlyMap<CurrencyCode, Readonly<LocaleConvention>>;

    constructor(conventions: readonly LocaleConvention[]) {
        const entries = new Map<CurrencyCode, Readonly<LocaleConvention>>();
        for (const convention of conventions) {
            if (entries.has(convention.currencyCode)) {
                throw new Error(`Duplicate locale convention for ${convention.currencyCode}`);
            }
            entries.set(convention.currencyCode, Object.freeze({ ...convention }));
        }
        this.conventions = entries;
    }

    get size(): number {
        return this.conventions.size;
    }

    get(code: string): Readonly<LocaleConvention> | undefined {
        const currency = normalizeCurrency(code);
        return currency ? this.conventions.get(currency) : undefined;
    }

    has(code: string): boolean {
        return this.get(code) !== undefined;
    }

    list(): Readonly<LocaleConvention>[] {
        return [...this.conventions.values()];
    }

    codes(): CurrencyCode[] {
        return [...this.conventions.keys()];
    }

    /**
     * Restricts the table to the given currency codes, keeping declaration order.
     * @throws UnsupportedCurrencyError for a code the table does not hold
     */
    select(codes: readonly string[]): LocaleTable {
        const wanted = new Set<CurrencyCode>();
        for (const code of codes) {
            const convention = this.get(code);
            if (!convention) throw new UnsupportedCurrencyError(code);
            wanted.add(convention.currencyCode);
        }
        return new LocaleTable(this.list().filter((convention) => wanted.has(convention.currencyCode)));
    }
}

/** One line per convention, as listed by the CLI */
export function describeConvention(convention: LocaleConvention): string {
    return `${convention.currencyCode}  ${convention.locale}  decimal '${convention.decimalSeparator}'  group '${convention.groupSeparator}'  symbol ${convention.symbol}`;
}
