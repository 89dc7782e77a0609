import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import { normalizeCurrency, type CurrencyCode } from '../utils/validate';
import { formatAmount } from '../utils/format';
import { UnparsableAmountError, UnsupportedCurrencyError } from './errors';

/**
 * Immutable amount of money in one of the supported currencies.
 * Amounts are exact decimals, never binary floats.
 */
export class MonetaryAmount {
    private constructor(
        readonly amount: Decimal,
        readonly currencyCode: CurrencyCode
    ) {
        Object.freeze(this);
    }

    /**
     * @param amount - finite number or numeric string
     * @param currencyCode - case-insensitive, stored uppercase
     */
    static create(
        amount: Decimal.Value,
        currencyCode: string
    ): Result<MonetaryAmount, UnsupportedCurrencyError | UnparsableAmountError> {
        const currency = normalizeCurrency(currencyCode);
        if (!currency) {
            return err(new UnsupportedCurrencyError(currencyCode));
        }

        const value = MonetaryAmount.toDecimal(amount);
        if (!value) {
            return err(new UnparsableAmountError(String(amount)));
        }
        return ok(new MonetaryAmount(value, currency));
    }

    private static toDecimal(amount: Decimal.Value): Decimal | undefined {
        let value: Decimal;
        try {
            value = new Decimal(amount);
        } catch (error) {
            // decimal.js throws a DecimalError on non-numeric strings
            if (error instanceof Error && error.message.includes('DecimalError')) return undefined;
            throw error;
        }
        return value.isFinite() ? value : undefined;
    }

    static compare(a: MonetaryAmount, b: MonetaryAmount): number {
        return a.amount.comparedTo(b.amount);
    }

    equals(other: MonetaryAmount): boolean {
        return this.currencyCode === other.currencyCode && this.amount.equals(other.amount);
    }

    toJSON(): { currency: CurrencyCode; amount: string } {
        return { currency: this.currencyCode, amount: this.amount.toFixed() };
    }

    /** e.g. "USD 1,234.56" */
    toString(): string {
        return `${this.currencyCode} ${formatAmount(this.amount)}`;
    }
}
