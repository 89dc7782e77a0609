import { MoneyParser, parseMoney } from './parser';
import { MonetaryAmount } from './amount';
import { AmbiguousFormatError, UnsupportedCurrencyError } from './errors';
import { createDefaultLocaleTable } from '../locales/defaults';
import { SUPPORTED_CURRENCIES } from '../utils/validate';

describe('MoneyParser', () => {
    const parser = new MoneyParser();

    const display = (input: string): string => parser.parseMoney(input)._unsafeUnwrap().toString();
    const errorKind = (input: string): string => parser.parseMoney(input)._unsafeUnwrapErr().kind;

    describe('parseMoney', () => {
        test('parses a dollar amount all conventions agree on', () => {
            const money = parser.parseMoney('$100')._unsafeUnwrap();

            expect(money.currencyCode).toBe('USD');
            expect(money.amount.toFixed(2)).toBe('100.00');
            expect(money.toString()).toBe('USD 100.00');
        });

        test('parses european amounts with a currency code', () => {
            expect(display('EUR 1.234,56')).toBe('EUR 1,234.56');
            expect(display('1.234,56 EUR')).toBe('EUR 1,234.56');
            expect(display('€1.234,56')).toBe('EUR 1,234.56');
        });

        test('parses US amounts', () => {
            expect(display('$1,234.56')).toBe('USD 1,234.56');
            expect(display('USD 1,234,567.89')).toBe('USD 1,234,567.89');
            expect(display('£ 0.99')).toBe('GBP 0.99');
        });

        test('takes the currency from the first convention that reads the amount', () => {
            expect(display('1234.56')).toBe('USD 1,234.56');
            expect(display('12,50')).toBe('EUR 12.50');
            expect(display('¥1,500')).toBe('JPY 1,500.00');
            expect(display('₱ 250')).toBe('PHP 250.00');
        });

        test('parses negative amounts', () => {
            expect(display('(£1,234.50)')).toBe('GBP -1,234.50');
            expect(display('-$5')).toBe('USD -5.00');
        });

        test('rejects amounts conventions disagree on', () => {
            const error = parser.parseMoney('1.234')._unsafeUnwrapErr();

            expect(error).toBeInstanceOf(AmbiguousFormatError);
            expect(error.message).toBe(
                'Ambiguous format - multiple valid interpretations: Format: en-US ($), Format: de-DE (€)'
            );
            if (error instanceof AmbiguousFormatError) {
                expect(error.interpretations.map((i) => i.value.toFixed())).toEqual(['1.234', '1234']);
            }
        });

        test('still rejects ambiguous amounts when a currency is given', () => {
            expect(errorKind('$1.234')).toBe('ambiguous-format');
            expect(errorKind('EUR 1,234')).toBe('ambiguous-format');
        });

        test('rejects empty input', () => {
            expect(errorKind('')).toBe('empty-input');
            expect(errorKind('   ')).toBe('empty-input');
            expect(parser.parseMoney('')._unsafeUnwrapErr().message).toBe('Input cannot be empty');
        });

        test('rejects text that is not a number', () => {
            const error = parser.parseMoney('not a number')._unsafeUnwrapErr();

            expect(error.kind).toBe('unparsable-amount');
            expect(error.message).toBe('Could not parse amount from: not a number');
            expect(errorKind('EUR')).toBe('unparsable-amount');
            expect(errorKind('1.2.3')).toBe('unparsable-amount');
            expect(parser.parseMoney('$5 EUR')._unsafeUnwrapErr().message).toBe('Could not parse amount from: $5 EUR');
        });

        test('classifies the same input the same way every time', () => {
            for (const input of ['1.234', 'abc', '', '1,2,3']) {
                expect(errorKind(input)).toBe(errorKind(input));
            }
        });
    });

    describe('round trip', () => {
        const amounts = ['0', '0.5', '7', '1234.56', '1000000', '999999.99'];

        test.each(SUPPORTED_CURRENCIES)('parses formatted %s amounts back', (currency) => {
            for (const amount of amounts) {
                const money = MonetaryAmount.create(amount, currency)._unsafeUnwrap();
                const parsed = parser.parseMoney(money.toString())._unsafeUnwrap();

                expect(parsed.equals(money)).toBe(true);
            }
        });
    });

    describe('options', () => {
        test('uses an injected locale table', () => {
            const euroOnly = new MoneyParser({ table: createDefaultLocaleTable().select(['EUR']) });

            expect(euroOnly.defaultCurrency).toBe('EUR');
            expect(euroOnly.parseMoney('1.234,5')._unsafeUnwrap().toString()).toBe('EUR 1,234.50');
            expect(euroOnly.parseMoney('1.234')._unsafeUnwrapErr().message).toBe(
                'Ambiguous format - multiple valid interpretations: Format: de-DE (€), Format: invariant'
            );
        });

        test('uses the default currency when only the invariant format applies', () => {
            const euroOnly = new MoneyParser({ table: createDefaultLocaleTable().select(['EUR']), defaultCurrency: 'eur' });

            expect(euroOnly.parseMoney('1234.56')._unsafeUnwrap().toString()).toBe('EUR 1,234.56');
        });

        test('rejects a default currency outside the table', () => {
            expect(() => new MoneyParser({ defaultCurrency: 'XYZ' })).toThrow(UnsupportedCurrencyError);
            expect(() => new MoneyParser({ table: createDefaultLocaleTable().select(['EUR']), defaultCurrency: 'USD' })).toThrow(
                'Unsupported currency: USD'
            );
        });
    });

    test('module-level parseMoney uses the default table', () => {
        expect(parseMoney('€20')._unsafeUnwrap().toString()).toBe('EUR 20.00');
    });
});
