/**
 * `@trialpack/resolver` - Error definitions
 */

/**
 * Error codes of {@link ResolutionError}.
 */
export const ResolutionErrorCode = {
    /** The input is neither a case id nor a known case URL */
    INVALID_INPUT: 'INVALID_INPUT',
    /** The case does not exist or is not public */
    NOT_FOUND: 'NOT_FOUND',
    /** The origin answered with something that could not be parsed */
    PARSE_ERROR: 'PARSE_ERROR',
    /** The player template is incomplete or changed format */
    TEMPLATE_ERROR: 'TEMPLATE_ERROR',
} as const;

export type ResolutionErrorCode =
    (typeof ResolutionErrorCode)[keyof typeof ResolutionErrorCode];

/**
 * Error thrown when a case or the player template cannot be resolved.
 */
export class ResolutionError extends Error {
    readonly name = 'ResolutionError';

    /**
     * @param code - Failure category
     * @param message - Human-readable description
     * @param subject - Case id, input or template version the error is about
     * @param cause - Underlying error, if any
     */
    constructor(
        public readonly code: ResolutionErrorCode,
        message: string,
        public readonly subject?: string | number,
        cause?: unknown,
    ) {
        super(message, cause !== undefined ? { cause } : undefined);
        Error.captureStackTrace?.(this, ResolutionError);
    }
}
