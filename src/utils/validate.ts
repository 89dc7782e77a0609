export const SUPPORTED_CURRENCIES = ['USD', 'EUR', 'GBP', 'JPY', 'PHP', 'CAD', 'AUD'] as const;

export type CurrencyCode = (typeof SUPPORTED_CURRENCIES)[number];

export function isValidCurrency(currency: unknown): currency is CurrencyCode {
    return typeof currency === 'string' && SUPPORTED_CURRENCIES.some((code) => code === currency);
}

/** Case-insensitive lookup of a supported currency code */
export function normalizeCurrency(currency: unknown): CurrencyCode | undefined {
    if (typeof currency !== 'string') return undefined;
    const code = currency.trim().toUpperCase();
    return isValidCurrency(code) ? code : undefined;
}
