import type { BatchResult } from '../services/normalizer';

export abstract class BaseFormatter {
    public readonly name: string;

    protected constructor(name: string) {
        this.name = name;
    }

    /**
     * Render a normalized batch
     * @returns Formatted string (text, CSV or JSON)
     */
    abstract formatResult(result: BatchResult): Promise<string>;
}
