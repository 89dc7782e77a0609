import { logger } from '../utils/logger';

export interface ReaderOptions {
    /** Path of the file to read */
    file?: string;
    /** Inline content, takes precedence over the file */
    content?: string;
    [key: string]: unknown;
}

/**
 * Source of raw price strings for the normalizer
 */
export abstract class BaseReader<O extends ReaderOptions = ReaderOptions> {
    public readonly name: string;

    protected constructor(name: string) {
        this.name = name;
    }

    protected abstract fetchPriceRecords(options: O): Promise<string[]>;

    async readInputs(options: O): Promise<string[]> {
        logger.debug(`🔎 Reading prices with the ${this.name} reader...`);
        const inputs = await this.fetchPriceRecords(options);
        logger.info(`📋 Found ${inputs.length} prices`);
        return inputs;
    }
}
