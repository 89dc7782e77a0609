#!/usr/bin/env node
import { Command } from 'commander';
import { writeFile } from 'fs/promises';

import { logger } from './utils/logger';
import { describeConvention } from './locales/index';
import { createDefaultLocaleTable } from './locales/defaults';
import { MoneyParser } from './money/parser';
import { PriceNormalizer } from './services/normalizer';

import { BaseFormatter } from './formatters/index';
import { TextFormatter } from './formatters/text';
import { CsvFormatter } from './formatters/csv';
import { JsonFormatter } from './formatters/json';

import { CsvReader } from './readers/csv';
import { LinesReader } from './readers/lines';

interface ParserCliOptions {
    currencies?: string;
    defaultCurrency?: string;
}

interface NormalizeOptions extends ParserCliOptions {
    reader: string;
    formatter: string;
    input?: string;
    output?: string;
    column?: string;
    delimiter?: string;
}

const program = new Command();

program
    .name('price-normalizer')
    .description('CLI to parse free-form prices, reject ambiguous number formats and sort them by amount');

program
    .command('normalize')
    .description('Normalize a list of prices and sort them by amount')
    .argument('[prices...]', 'Prices to normalize (default: read with the reader)')
    .option('-r, --reader <name>', 'Reader: lines, csv', 'lines')
    .option('-i, --input <path>', 'Input file path (default: stdin)')
    .option('-f, --formatter <name>', 'Formatter: text, csv, json', 'text')
    .option('-o, --output <path>', 'Output file path (default: stdout)')
    .option('--currencies <codes>', 'Comma-separated currency codes to read amounts with (default: all)')
    .option('--default-currency <code>', 'Currency for amounts that name none')
    // CSV specific
    .option('--column <name>', 'CSV column holding the prices', 'price')
    .option('--delimiter <char>', 'CSV field delimiter', ',')
    .action(async (prices: string[], options: NormalizeOptions) => {
        const normalizer = new PriceNormalizer({ parser: createParser(options) });

        const inputs = prices.length > 0 ? prices : await readPrices(options);
        const result = normalizer.normalizeAndSort(inputs);

        const formatter = createFormatter(options.formatter);
        const output = await formatter.formatResult(result);

        if (options.output) {
            await writeFile(options.output, output, 'utf-8');
            logger.info(`✓ Successfully wrote to: ${options.output}`);
        } else {
            process.stdout.write(output.endsWith('\n') ? output : `${output}\n`);
        }

        logger.info(`✓ Normalized ${result.amounts.length} prices`);
        if (result.failures.length > 0) {
            logger.warn(`✗ ${result.failures.length} prices could not be parsed`);
            process.exitCode = 1;
        }
    });

program
    .command('parse')
    .description('Parse a single price')
    .argument('<price>', 'Price to parse, e.g. "EUR 1.234,56"')
    .option('--currencies <codes>', 'Comma-separated currency codes to read amounts with (default: all)')
    .option('--default-currency <code>', 'Currency for amounts that name none')
    .action((price: string, options: ParserCliOptions) => {
        createParser(options)
            .parseMoney(price)
            .match(
                (amount) => {
                    process.stdout.write(`${amount.toString()}\n`);
                },
                (error) => {
                    logger.error({ kind: error.kind }, `✗ ${error.message}`);
                    process.exitCode = 1;
                }
            );
    });

program
    .command('locales')
    .description('List the supported locale conventions')
    .action(() => {
        const lines = createDefaultLocaleTable().list().map(describeConvention);
        process.stdout.write(`${lines.join('\n')}\n`);
    });

program.parseAsync().catch((error: unknown) => {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
});

function createParser(options: ParserCliOptions): MoneyParser {
    let table = createDefaultLocaleTable();
    if (options.currencies) {
        table = table.select(options.currencies.split(',').map((code) => code.trim()).filter(Boolean));
    }
    return new MoneyParser({ table, defaultCurrency: options.defaultCurrency });
}

async function readPrices(options: NormalizeOptions): Promise<string[]> {
    switch (options.reader) {
        case 'csv':
            return new CsvReader().readInputs({
                file: options.input,
                column: options.column,
                delimiter: options.delimiter,
            });
        case 'lines':
            if (!options.input && process.stdin.isTTY) {
                logger.info('Enter prices (one per line, empty line to finish):');
            }
            return new LinesReader().readInputs({ file: options.input });
        default:
            throw new Error(`Unsupported reader: ${options.reader}`);
    }
}

function createFormatter(name: string): BaseFormatter {
    switch (name) {
        case 'text':
            return new TextFormatter();
        case 'csv':
            return new CsvFormatter();
        case 'json':
            return new JsonFormatter();
        default:
            throw new Error(`Unsupported format: ${name}`);
    }
}
