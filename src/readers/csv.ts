import { parseString } from '@fast-csv/parse';
import { readFile } from 'fs/promises';
import { logger } from '../utils/logger';
import { BaseReader, type ReaderOptions } from './index';

export interface CsvReaderOptions extends ReaderOptions {
    /** Header of the column holding the prices (default: price) */
    column?: string;
    /** Field delimiter (default: ,) */
    delimiter?: string;
}

type CsvRow = Record<string, string | undefined>;

/**
 * CsvReader - takes the prices from one column of a CSV file with a header row.
 * Rows with an empty cell are skipped.
 */
export class CsvReader extends BaseReader<CsvReaderOptions> {
    constructor() {
        super('csv');
    }

    protected async fetchPriceRecords(options: CsvReaderOptions): Promise<string[]> {
        const column = options.column ?? 'price';
        const csvContent = options.content ?? (await this.readCsvFile(options.file));

        const rows: CsvRow[] = [];
        await new Promise<void>((resolve, reject) => {
            parseString<CsvRow, CsvRow>(csvContent, {
                headers: true,
                delimiter: options.delimiter ?? ',',
                ignoreEmpty: true,
                trim: true,
            })
                .on('error', (error) => reject(error))
                .on('data', (row: CsvRow) => rows.push(row))
                .on('end', () => resolve());
        });

        if (rows.length > 0 && !(column in rows[0])) {
            throw new Error(`Column '${column}' not found in CSV header`);
        }

        const prices = rows.map((row) => row[column] ?? '').filter((price) => price !== '');
        logger.debug(`🛄 Skipped ${rows.length - prices.length} rows without a price`);
        return prices;
    }

    private async readCsvFile(file?: string): Promise<string> {
        if (!file) {
            throw new Error('CsvReader needs either content or a file');
        }
        return readFile(file, 'utf-8');
    }
}
