import { err, ok, type Result } from 'neverthrow';
import { AmbiguousFormatError, UnparsableAmountError } from './errors';
import type { ParseCandidate } from './candidates';

/**
 * Accepts the candidates only when exactly one distinct value was read.
 * @param input - original price string, kept for error messages
 */
export function resolveCandidates(
    input: string,
    candidates: readonly ParseCandidate[]
): Result<ParseCandidate, UnparsableAmountError | AmbiguousFormatError> {
    if (candidates.length === 0) {
        return err(new UnparsableAmountError(input));
    }

    if (candidates.length > 1) {
        return err(
            new AmbiguousFormatError(
                input,
                candidates.map(({ label, value }) => ({ label, value }))
            )
        );
    }

    return ok(candidates[0]);
}
