import type { Decimal } from 'decimal.js';
import type { LocaleConvention, LocaleTable } from '../locales/index';
import { DOT_DECIMAL, parseAmount } from '../utils/parse';
import type { CurrencyCode } from '../utils/validate';

export const INVARIANT_LABEL = 'Format: invariant';

export interface ParseCandidate {
    /** Label of the first convention that produced the value */
    label: string;
    value: Decimal;
    /** Every convention currency that produced the same value, in table order */
    currencies: CurrencyCode[];
}

export function conventionLabel(convention: LocaleConvention): string {
    return `Format: ${convention.locale} (${convention.symbol})`;
}

/**
 * Reads the numeric substring under every convention of the table, then under
 * the plain dot-decimal format. Readings are merged by value, so conventions
 * agreeing on "100" yield a single candidate.
 */
export function collectCandidates(numberStr: string, table: LocaleTable): ParseCandidate[] {
    const candidates: ParseCandidate[] = [];

    const add = (label: string, value: Decimal | undefined, currency?: CurrencyCode): void => {
        if (!value) return;

        const existing = candidates.find((candidate) => candidate.value.equals(value));
        if (!existing) {
            candidates.push({ label, value, currencies: currency ? [currency] : [] });
        } else if (currency) {
            existing.currencies.push(currency);
        }
    };

    for (const convention of table.list()) {
        add(conventionLabel(convention), parseAmount(numberStr, convention), convention.currencyCode);
    }
    add(INVARIANT_LABEL, parseAmount(numberStr, DOT_DECIMAL));

    return candidates;
}
