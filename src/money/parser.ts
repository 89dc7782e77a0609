import { err, type Result } from 'neverthrow';
import { LocaleTable } from '../locales/index';
import { createDefaultLocaleTable } from '../locales/defaults';
import type { CurrencyCode } from '../utils/validate';
import { MonetaryAmount } from './amount';
import { collectCandidates } from './candidates';
import { EmptyInputError, UnsupportedCurrencyError, type ParseError } from './errors';
import { extractCurrency } from './extract';
import { resolveCandidates } from './resolve';

export interface ParserOptions {
    /** Locale conventions to read amounts with (default: all supported currencies) */
    table?: LocaleTable;
    /** Currency used when neither the input nor any locale convention names one */
    defaultCurrency?: string;
}

export class MoneyParser {
    public readonly table: LocaleTable;
    public readonly defaultCurrency: CurrencyCode;

    /**
     * @throws UnsupportedCurrencyError when the default currency is not in the table
     */
    constructor(options: ParserOptions = {}) {
        this.table = options.table ?? createDefaultLocaleTable();

        const fallback = options.defaultCurrency ?? this.table.codes()[0] ?? 'USD';
        const convention = this.table.get(fallback);
        if (!convention) {
            throw new UnsupportedCurrencyError(fallback);
        }
        this.defaultCurrency = convention.currencyCode;
    }

    /**
     * Parses a single price string such as "$1,234.56" or "EUR 1.234,56".
     * Fails when no convention reads it, or when conventions disagree on its value.
     */
    parseMoney(input: string): Result<MonetaryAmount, ParseError> {
        const trimmed = input.trim();
        if (trimmed === '') {
            return err(new EmptyInputError());
        }

        const { currencyCode, numberStr } = extractCurrency(trimmed, this.table);

        return resolveCandidates(trimmed, collectCandidates(numberStr, this.table)).andThen((candidate) =>
            MonetaryAmount.create(candidate.value, currencyCode ?? candidate.currencies[0] ?? this.defaultCurrency)
        );
    }
}

let defaultParser: MoneyParser | undefined;

/** Parses with the default locale table */
export function parseMoney(input: string): Result<MonetaryAmount, ParseError> {
    defaultParser ??= new MoneyParser();
    return defaultParser.parseMoney(input);
}
