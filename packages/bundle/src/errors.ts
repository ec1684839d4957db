/**
 * `@trialpack/bundle` - Error definitions
 */

/**
 * Error codes of {@link BundleError}.
 */
export const BundleErrorCode = {
    /** Fail-fast policy and the case still references remote assets */
    MISSING_ASSETS: 'MISSING_ASSETS',
    /** The output path is taken and replacing was not requested */
    OUTPUT_EXISTS: 'OUTPUT_EXISTS',
    /** Staging or moving the output into place failed */
    WRITE_FAILED: 'WRITE_FAILED',
    /** The run was aborted while the output was being written */
    CANCELLED: 'CANCELLED',
} as const;

export type BundleErrorCode = (typeof BundleErrorCode)[keyof typeof BundleErrorCode];

/**
 * A case could not be written. Fatal for that case only.
 */
export class BundleError extends Error {
    readonly name = 'BundleError';

    /**
     * @param code - What went wrong
     * @param message - Human readable description
     * @param caseId - Case whose output was being written
     * @param missing - URLs still remote, for `MISSING_ASSETS`
     * @param cause - Underlying filesystem error
     */
    constructor(
        public readonly code: BundleErrorCode,
        message: string,
        public readonly caseId?: number,
        public readonly missing: readonly string[] = [],
        cause?: unknown,
    ) {
        super(message, cause !== undefined ? { cause } : undefined);
        Error.captureStackTrace?.(this, BundleError);
    }
}
