import type { Decimal } from 'decimal.js';

/** Input is empty or only whitespace */
export class EmptyInputError extends Error {
    readonly kind = 'empty-input' as const;

    constructor() {
        super('Input cannot be empty');
        Object.setPrototypeOf(this, EmptyInputError.prototype);
        this.name = 'EmptyInputError';
    }
}

/** An amount names a currency outside the supported set */
export class UnsupportedCurrencyError extends Error {
    readonly kind = 'unsupported-currency' as const;

    constructor(readonly currencyCode: string) {
        super(`Unsupported currency: ${currencyCode.toUpperCase()}`);
        Object.setPrototypeOf(this, UnsupportedCurrencyError.prototype);
        this.name = 'UnsupportedCurrencyError';
    }
}

/** No locale convention could read the numeric part */
export class UnparsableAmountError extends Error {
    readonly kind = 'unparsable-amount' as const;

    constructor(readonly input: string) {
        super(`Could not parse amount from: ${input}`);
        Object.setPrototypeOf(this, UnparsableAmountError.prototype);
        this.name = 'UnparsableAmountError';
    }
}

export interface Interpretation {
    /** Convention that produced the reading, e.g. "Format: de-DE (€)" */
    label: string;
    value: Decimal;
}

/** Two or more locale conventions read the input as different amounts */
export class AmbiguousFormatError extends Error {
    readonly kind = 'ambiguous-format' as const;

    constructor(
        readonly input: string,
        readonly interpretations: readonly Interpretation[]
    ) {
        super(`Ambiguous format - multiple valid interpretations: ${interpretations.map((i) => i.label).join(', ')}`);
        Object.setPrototypeOf(this, AmbiguousFormatError.prototype);
        this.name = 'AmbiguousFormatError';
    }
}

export type ParseError = EmptyInputError | UnsupportedCurrencyError | UnparsableAmountError | AmbiguousFormatError;

export type ParseErrorKind = ParseError['kind'];
