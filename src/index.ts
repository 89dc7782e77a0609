export * from './money/index';
export { LocaleTable, type LocaleConvention } from './locales/index';
export { createDefaultLocaleTable, DEFAULT_CONVENTIONS } from './locales/defaults';
export {
    normalizeAndSort,
    PriceNormalizer,
    type BatchResult,
    type ParseFailure,
    type PriceNormalizerOptions,
} from './services/normalizer';
export { SUPPORTED_CURRENCIES, type CurrencyCode } from './utils/validate';
export { formatAmount } from './utils/format';
export { parseAmount, type NumberFormat } from './utils/parse';
