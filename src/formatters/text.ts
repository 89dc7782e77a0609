import { BaseFormatter } from './index';
import type { BatchResult } from '../services/normalizer';

/**
 * Plain listing, failures first:
 *
 *     Encountered errors:
 *     - Failed to parse 'abc': Could not parse amount from: abc
 *
 *     Normalized and Sorted Prices:
 *     ------------------------------
 *     USD 10.00
 */
export class TextFormatter extends BaseFormatter {
    constructor() {
        super('text');
    }

    async formatResult(result: BatchResult): Promise<string> {
        const lines: string[] = [];

        if (result.failures.length > 0) {
            lines.push('Encountered errors:');
            for (const failure of result.failures) {
                lines.push(`- Failed to parse '${failure.input}': ${failure.reason}`);
            }
            lines.push('');
        }

        lines.push('Normalized and Sorted Prices:', '-'.repeat(30));
        for (const amount of result.amounts) {
            lines.push(amount.toString());
        }

        return lines.join('\n') + '\n';
    }
}
