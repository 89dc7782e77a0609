import { logger } from '../utils/logger';
import { MonetaryAmount } from '../money/amount';
import type { ParseError, ParseErrorKind } from '../money/errors';
import { MoneyParser, type ParserOptions } from '../money/parser';

export interface ParseFailure {
    /** Price string as it was given */
    input: string;
    kind: ParseErrorKind;
    /** Human-readable reason */
    reason: string;
}

export interface BatchResult {
    /** Parsed amounts, ascending; equal amounts keep their input order */
    amounts: MonetaryAmount[];
    failures: ParseFailure[];
}

export interface PriceNormalizerOptions extends ParserOptions {
    /** Parser instance, takes precedence over the table options */
    parser?: MoneyParser;
}

function describeFailure(error: ParseError): string {
    switch (error.kind) {
        case 'empty-input':
        case 'unsupported-currency':
        case 'unparsable-amount':
            return error.message;
        case 'ambiguous-format': {
            const readings = error.interpretations.map(({ value }) => value.toFixed()).join(' | ');
            return `${error.message} (readings: ${readings})`;
        }
        default: {
            const unknownKind: never = error;
            return `Unknown parse error: ${String(unknownKind)}`;
        }
    }
}

export class PriceNormalizer {
    public readonly parser: MoneyParser;

    constructor(options: PriceNormalizerOptions = {}) {
        this.parser = options.parser ?? new MoneyParser(options);
    }

    /**
     * Parses every input, collecting failures instead of stopping at the first one.
     * Never throws.
     */
    normalizeAndSort(inputs: readonly string[]): BatchResult {
        const amounts: MonetaryAmount[] = [];
        const failures: ParseFailure[] = [];

        for (const input of inputs) {
            this.parser.parseMoney(input).match(
                (amount) => {
                    amounts.push(amount);
                },
                (error) => {
                    const reason = describeFailure(error);
                    logger.warn({ input, kind: error.kind }, `Failed to parse '${input}': ${reason}`);
                    failures.push({ input, kind: error.kind, reason });
                }
            );
        }

        // Array#sort is stable
        amounts.sort(MonetaryAmount.compare);

        logger.debug(`Parsed ${amounts.length} of ${inputs.length} prices`);
        return { amounts, failures };
    }
}

let defaultNormalizer: PriceNormalizer | undefined;

/** Normalizes with the default locale table */
export function normalizeAndSort(inputs: readonly string[]): BatchResult {
    defaultNormalizer ??= new PriceNormalizer();
    return defaultNormalizer.normalizeAndSort(inputs);
}
