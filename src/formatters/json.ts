import { BaseFormatter } from './index';
import type { BatchResult } from '../services/normalizer';

export class JsonFormatter extends BaseFormatter {
    constructor() {
        super('json');
    }

    async formatResult(result: BatchResult): Promise<string> {
        const output = {
            amounts: result.amounts.map((amount) => ({ ...amount.toJSON(), display: amount.toString() })),
            failures: result.failures,
        };
        return JSON.stringify(output, null, 2);
    }
}
