import { Decimal } from 'decimal.js';
import { writeToString, type Row } from '@fast-csv/format';
import { BaseFormatter } from './index';
import type { BatchResult } from '../services/normalizer';

/**
 * Sorted amounts as CSV: Currency, Amount (plain decimal), Display.
 * Failures are not part of the output.
 */
export class CsvFormatter extends BaseFormatter {
    constructor() {
        super('csv');
    }

    async formatResult(result: BatchResult): Promise<string> {
        const rows: Row[] = result.amounts.map((amount) => [
            amount.currencyCode,
            amount.amount.toFixed(2, Decimal.ROUND_HALF_UP),
            amount.toString(),
        ]);

        return await writeToString(rows, {
            headers: ['Currency', 'Amount', 'Display'],
            alwaysWriteHeaders: true,
        });
    }
}
