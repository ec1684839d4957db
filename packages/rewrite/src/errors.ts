/**
 * `@trialpack/rewrite` - Error definitions
 */

/**
 * Error codes of {@link RewriteError}.
 */
export const RewriteErrorCode = {
    /** One PHP block of the template matches more than one expected block */
    AMBIGUOUS_BLOCK: 'AMBIGUOUS_BLOCK',
    /** A PHP block the player cannot work without is absent */
    MISSING_BLOCK: 'MISSING_BLOCK',
} as const;

export type RewriteErrorCode = (typeof RewriteErrorCode)[keyof typeof RewriteErrorCode];

/**
 * The template changed in a way the rewriter cannot handle. Fatal for the
 * case being rewritten.
 */
export class RewriteError extends Error {
    readonly name = 'RewriteError';

    constructor(
        public readonly code: RewriteErrorCode,
        message: string,
        /** Id of the expected block involved */
        public readonly block?: string,
    ) {
        super(message);
        Error.captureStackTrace?.(this, RewriteError);
    }
}

/**
 * Error codes of {@link SequenceError}.
 */
export const SequenceErrorCode = {
    /** A case points at itself */
    SELF_LINK: 'SELF_LINK',
    /** A sequence pointer leads to a case whose sequence does not list the source */
    INCONSISTENT_SEQUENCE: 'INCONSISTENT_SEQUENCE',
} as const;

export type SequenceErrorCode = (typeof SequenceErrorCode)[keyof typeof SequenceErrorCode];

/**
 * A sequence edge that was dropped. Reported, never thrown past the linker.
 */
export class SequenceError extends Error {
    readonly name = 'SequenceError';

    constructor(
        public readonly code: SequenceErrorCode,
        public readonly from: number,
        public readonly to: number,
        message: string,
    ) {
        super(message);
        Error.captureStackTrace?.(this, SequenceError);
    }
}
