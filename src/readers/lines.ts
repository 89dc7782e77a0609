import { readFile } from 'fs/promises';
import { createInterface } from 'readline';
import type { Readable } from 'stream';
import { BaseReader, type ReaderOptions } from './index';

export interface LinesReaderOptions extends ReaderOptions {
    /** Stream read when neither content nor file is given (default: stdin) */
    stream?: Readable;
}

const isBlank = (line: string): boolean => line.trim() === '';

/**
 * LinesReader - one price per line, the first blank line ends the list
 */
export class LinesReader extends BaseReader<LinesReaderOptions> {
    constructor() {
        super('lines');
    }

    protected async fetchPriceRecords(options: LinesReaderOptions): Promise<string[]> {
        const content = options.content ?? (options.file ? await readFile(options.file, 'utf-8') : undefined);
        if (content !== undefined) {
            const lines = content.split(/\r?\n/);
            const end = lines.findIndex(isBlank);
            return end === -1 ? lines : lines.slice(0, end);
        }

        const rl = createInterface({ input: options.stream ?? process.stdin, crlfDelay: Infinity });
        const lines: string[] = [];
        try {
            for await (const line of rl) {
                if (isBlank(line)) break;
                lines.push(line);
            }
        } finally {
            rl.close();
        }
        return lines;
    }
}
