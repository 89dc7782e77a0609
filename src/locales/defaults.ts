import { LocaleTable, type LocaleConvention } from './index';

export const DEFAULT_CONVENTIONS: readonly LocaleConvention[] = [
    { currencyCode: 'USD', locale: 'en-US', decimalSeparator: '.', groupSeparator: ',', symbol: '$' },
    { currencyCode: 'EUR', locale: 'de-DE', decimalSeparator: ',', groupSeparator: '.', symbol: '€' },
    { currencyCode: 'GBP', locale: 'en-GB', decimalSeparator: '.', groupSeparator: ',', symbol: '£' },
    { currencyCode: 'JPY', locale: 'ja-JP', decimalSeparator: '.', groupSeparator: ',', symbol: '¥' },
    { currencyCode: 'PHP', locale: 'en-PH', decimalSeparator: '.', groupSeparator: ',', symbol: '₱' },
    { currencyCode: 'CAD', locale: 'en-CA', decimalSeparator: '.', groupSeparator: ',', symbol: '$' },
    { currencyCode: 'AUD', locale: 'en-AU', decimalSeparator: '.', groupSeparator: ',', symbol: '$' },
];

export function createDefaultLocaleTable(): LocaleTable {
    return new LocaleTable(DEFAULT_CONVENTIONS);
}
