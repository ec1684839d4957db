/**
 * `trialpack` - Error definitions
 */

/**
 * Invalid run configuration.
 */
export class ConfigError extends Error {
    readonly name = 'ConfigError';

    /**
     * @param field - Name of the offending configuration field
     * @param message - What is wrong with it
     */
    constructor(
        public readonly field: string,
        message: string,
    ) {
        super(`Invalid ${field}: ${message}`);
        Error.captureStackTrace?.(this, ConfigError);
    }
}
