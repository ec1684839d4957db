/**
 * `@trialpack/http`
 *
 * Per-run HTTP client with retry policy, per-request timeout, shared
 * in-flight limiting and readable network errors.
 *
 * @packageDocumentation
 */

export {
    HttpClient,
    DEFAULT_RETRY_POLICY,
    DEFAULT_TIMEOUT_MS,
    createSignalWithTimeout,
    parseRetryAfter,
    backoffDelay,
    type RetryPolicy,
    type RetryEvent,
    type HttpHandling,
    type HeaderRule,
    type HttpClientOptions,
    type HttpResponse,
} from './client.js';

export {
    NetworkError,
    NetworkErrorCode,
    TRANSIENT_ERROR_CODES,
    getFetchErrorDetails,
    isTransientError,
    type NetworkErrorOptions,
} from './errors.js';
