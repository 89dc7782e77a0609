export { MonetaryAmount } from './amount';
export { collectCandidates, conventionLabel, INVARIANT_LABEL, type ParseCandidate } from './candidates';
export {
    AmbiguousFormatError,
    EmptyInputError,
    UnparsableAmountError,
    UnsupportedCurrencyError,
    type Interpretation,
    type ParseError,
    type ParseErrorKind,
} from './errors';
export { extractCurrency, type ExtractedCurrency } from './extract';
export { MoneyParser, parseMoney, type ParserOptions } from './parser';
export { resolveCandidates } from './resolve';
