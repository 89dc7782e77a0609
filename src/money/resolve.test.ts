import { Decimal } from 'decimal.js';
import { resolveCandidates } from './resolve';
import { AmbiguousFormatError, UnparsableAmountError } from './errors';

describe('resolveCandidates', () => {
    test('should fail without candidates', () => {
        const result = resolveCandidates('abc', []);

        expect(result.isErr()).toBe(true);
        const error = result._unsafeUnwrapErr();
        expect(error).toBeInstanceOf(UnparsableAmountError);
        expect(error.message).toBe('Could not parse amount from: abc');
    });

    test('should accept a single candidate', () => {
        const candidate = { label: 'Format: en-US ($)', value: new Decimal(100), currencies: ['USD' as const] };
        const result = resolveCandidates('100', [candidate]);

        expect(result._unsafeUnwrap()).toBe(candidate);
    });

    test('should fail with every interpretation when candidates disagree', () => {
        const result = resolveCandidates('1.234', [
            { label: 'Format: en-US ($)', value: new Decimal('1.234'), currencies: ['USD'] },
            { label: 'Format: de-DE (€)', value: new Decimal('1234'), currencies: ['EUR'] },
        ]);

        const error = result._unsafeUnwrapErr();
        expect(error).toBeInstanceOf(AmbiguousFormatError);
        expect(error.kind).toBe('ambiguous-format');
        expect(error.message).toBe(
            'Ambiguous format - multiple valid interpretations: Format: en-US ($), Format: de-DE (€)'
        );
        if (error instanceof AmbiguousFormatError) {
            expect(error.input).toBe('1.234');
            expect(error.interpretations.map((i) => i.value.toFixed())).toEqual(['1.234', '1234']);
        }
    });
});
