/**
 * `@trialpack/http` - Error definitions
 *
 * Network failures, with the cause chain of undici errors flattened into a
 * readable message and a hint.
 */

/** Error codes that are considered transient and worth retrying */
export const TRANSIENT_ERROR_CODES = new Set([
    'ECONNRESET',
    'ETIMEDOUT',
    'ECONNREFUSED',
    'EPIPE',
    'ENOTFOUND', // DNS can be flaky
    'EAI_AGAIN', // DNS temporary failure
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_SOCKET',
]);

/**
 * Error codes of {@link NetworkError}.
 */
export const NetworkErrorCode = {
    /** The server answered with a non-success status */
    HTTP_STATUS: 'HTTP_STATUS',
    /** The request or body read exceeded the per-request timeout */
    TIMEOUT: 'TIMEOUT',
    /** The body was shorter than its declared length */
    TRUNCATED: 'TRUNCATED',
    /** The URL is not allowed by the run's HTTP handling */
    INSECURE_URL: 'INSECURE_URL',
    /** Connection-level failure */
    CONNECTION: 'CONNECTION',
} as const;

export type NetworkErrorCode =
    (typeof NetworkErrorCode)[keyof typeof NetworkErrorCode];

function errorCodeOf(error: Error): string | undefined {
    if ('code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

function causeOf(error: Error): Error | undefined {
    return error.cause instanceof Error ? error.cause : undefined;
}

/**
 * Extracts detailed error information from a fetch error.
 * Node.js fetch errors (via undici) wrap the actual cause in error.cause,
 * which can be nested multiple levels deep.
 */
export function getFetchErrorDetails(error: unknown): {
    message: string;
    code?: string;
    cause?: string;
    hint?: string;
} {
    if (!(error instanceof Error)) {
        return { message: String(error) };
    }

    // Build a chain of causes by walking error.cause
    const causes: string[] = [];
    let current: Error | undefined = error;
    let code: string | undefined;

    while (current) {
        code ??= errorCodeOf(current);
        if (current.message && !causes.includes(current.message)) {
            causes.push(current.message);
        }
        current = causeOf(current);
    }

    let causeStr = causes.length > 1 ? causes.slice(1).join(' -> ') : undefined;
    if (code && causeStr) {
        causeStr = `[${code}] ${causeStr}`;
    } else if (code) {
        causeStr = `[${code}]`;
    }

    const fullText = causes.join(' ').toLowerCase();
    let hint: string | undefined;

    if (code === 'ENOTFOUND' || fullText.includes('getaddrinfo')) {
        hint =
            'DNS resolution failed. Check the URL spelling or your network connection.';
    } else if (code === 'ECONNREFUSED') {
        hint =
            'Connection refused. The server may be down or blocking connections.';
    } else if (code === 'ECONNRESET') {
        hint =
            'Connection reset by server. This may be a transient network issue.';
    } else if (
        code === 'ETIMEDOUT' ||
        error.name === 'TimeoutError' ||
        fullText.includes('timeout')
    ) {
        hint = 'Request timed out. The server may be slow or unresponsive.';
    } else if (
        code === 'CERT_HAS_EXPIRED' ||
        fullText.includes('certificate')
    ) {
        hint =
            'SSL certificate error. The site may have an expired or invalid certificate.';
    } else if (fullText.includes('ssl') || fullText.includes('tls')) {
        hint =
            'SSL/TLS handshake failed. There may be a certificate or protocol issue.';
    } else if (fullText.includes('socket hang up')) {
        hint =
            'Connection closed unexpectedly. The server may have dropped the connection.';
    }

    return {
        message: causes[0] || 'Unknown error',
        code,
        cause: causeStr,
        hint,
    };
}

/**
 * Checks if a thrown fetch error is transient and worth retrying.
 */
export function isTransientError(error: unknown): boolean {
    if (!(error instanceof Error)) {
        return false;
    }
    if (error.name === 'TimeoutError') {
        return true;
    }

    // Walk the cause chain looking for transient error codes
    let current: Error | undefined = error;
    while (current) {
        const code = errorCodeOf(current);
        if (code && TRANSIENT_ERROR_CODES.has(code)) {
            return true;
        }
        current = causeOf(current);
    }

    const message = error.message.toLowerCase();
    return (
        message.includes('socket hang up') ||
        message.includes('other side closed') ||
        message.includes('connection reset')
    );
}

/**
 * Options for {@link NetworkError}.
 */
export interface NetworkErrorOptions {
    /** HTTP status, for `HTTP_STATUS` errors */
    status?: number;
    /** Whether retrying could have helped */
    transient: boolean;
    /** Number of attempts made before giving up */
    attempts: number;
    cause?: unknown;
}

/**
 * A network operation that failed for good: either a permanent failure or
 * a transient one whose retries ran out.
 */
export class NetworkError extends Error {
    readonly name = 'NetworkError';
    readonly status?: number;
    readonly transient: boolean;
    readonly attempts: number;
    readonly hint?: string;

    /**
     * @param url - The URL that was being fetched
     * @param code - Failure category
     * @param message - Short description
     * @param options - Status, retry information and underlying cause
     */
    constructor(
        public readonly url: string,
        public readonly code: NetworkErrorCode,
        message: string,
        options: NetworkErrorOptions,
    ) {
        super(
            message,
            options.cause !== undefined ? { cause: options.cause } : undefined,
        );
        this.status = options.status;
        this.transient = options.transient;
        this.attempts = options.attempts;
        this.hint =
            options.cause !== undefined
                ? getFetchErrorDetails(options.cause).hint
                : undefined;
        Error.captureStackTrace?.(this, NetworkError);
    }

    /**
     * Creates an error from something `fetch` threw.
     */
    static fromCause(
        url: string,
        cause: unknown,
        attempts: number,
    ): NetworkError {
        const details = getFetchErrorDetails(cause);
        const timedOut = cause instanceof Error && cause.name === 'TimeoutError';
        let message = timedOut ? 'Request timed out' : details.message;
        if (details.cause) {
            message += ` (${details.cause})`;
        }
        return new NetworkError(
            url,
            timedOut ? NetworkErrorCode.TIMEOUT : NetworkErrorCode.CONNECTION,
            message,
            { transient: isTransientError(cause), attempts, cause },
        );
    }

    /** True when the server said the resource does not exist or is private */
    get isNotFound(): boolean {
        return this.status === 404 || this.status === 410 || this.status === 403;
    }

    /**
     * Returns a formatted error message suitable for display
     */
    format(verbose = false): string {
        let msg = `Failed to fetch ${this.url}: ${this.message}`;
        if (this.attempts > 1) {
            msg += ` after ${this.attempts} attempts`;
        }
        if (verbose && this.hint) {
            msg += `\n  Hint: ${this.hint}`;
        }
        return msg;
    }
}
