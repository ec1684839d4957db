/**
 * Per-run HTTP client.
 *
 * Every network operation of a run goes through one `HttpClient`: it owns
 * the retry policy, the per-request timeout, the shared in-flight limiter
 * and the request rules (headers per host, proxy prefix, plain HTTP
 * handling). Nothing is ambient, so tests build a client with a fake
 * `fetch` and a tiny retry delay.
 */

import { ConcurrencyLimiter, isAbortError, sleep } from '@trialpack/utils';
import { NetworkError, NetworkErrorCode, isTransientError } from './errors.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

/**
 * Exponential backoff applied to transient failures.
 */
export interface RetryPolicy {
    /** Total attempts, including the first one */
    maxAttempts: number;
    /** Delay before the second attempt; doubled for each further attempt */
    baseDelayMs: number;
    /** Upper bound of a single backoff delay */
    maxDelayMs: number;
    /** Maximum random extra delay as a fraction of the delay */
    jitter: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 4,
    baseDelayMs: 500,
    maxDelayMs: 5000,
    jitter: 0.25,
};

/** Default per-request timeout in milliseconds */
export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * How plain `http:` URLs are treated.
 *
 * - `redirect-to-https`: request the `https:` equivalent
 * - `allow-insecure`: request as is
 * - `disallow`: fail without a request
 */
export type HttpHandling = 'redirect-to-https' | 'allow-insecure' | 'disallow';

/**
 * Adds headers to requests whose host matches.
 */
export interface HeaderRule {
    /** Returns true for hosts the headers apply to */
    matches: (hostname: string) => boolean;
    headers: Record<string, string>;
}

export interface HttpClientOptions {
    retry?: Partial<RetryPolicy>;
    /** Per-request timeout, covering the request and the body read */
    timeoutMs?: number;
    /** Maximum number of requests in flight across the run */
    concurrency?: number;
    /** Share a limiter with other clients instead of creating one */
    limiter?: ConcurrencyLimiter;
    httpHandling?: HttpHandling;
    /** Prefix put in front of every requested URL */
    proxy?: string;
    headerRules?: HeaderRule[];
    /** Cancels every request of the run */
    signal?: AbortSignal;
    /** Replaces the global `fetch` */
    fetch?: typeof fetch;
    /** Source of randomness for jitter */
    random?: () => number;
    /** Called before each retry */
    onRetry?: (event: RetryEvent) => void;
}

/**
 * Emitted before a transient failure is retried.
 */
export interface RetryEvent {
    url: string;
    attempt: number;
    delayMs: number;
    reason: string;
}

/**
 * A fully read response.
 */
export interface HttpResponse {
    /** URL that was requested */
    url: string;
    /** URL the body came from, after redirects */
    finalUrl: string;
    status: number;
    headers: Headers;
    body: Uint8Array;
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Creates an AbortSignal that combines a timeout with an optional user signal.
 * If both are provided, the signal aborts when either triggers.
 *
 * @param timeout - Timeout in milliseconds
 * @param signal - Optional user-provided AbortSignal
 * @returns Combined AbortSignal, or undefined if neither provided
 */
export function createSignalWithTimeout(
    timeout?: number,
    signal?: AbortSignal,
): AbortSignal | undefined {
    if (!timeout && !signal) return undefined;
    if (!timeout) return signal;

    const timeoutSignal = AbortSignal.timeout(timeout);
    if (!signal) return timeoutSignal;

    return AbortSignal.any([signal, timeoutSignal]);
}

/**
 * Parses the Retry-After header value.
 * Can be either a number of seconds or an HTTP date.
 *
 * @param retryAfter - The Retry-After header value
 * @returns Delay in milliseconds, or null if parsing fails
 */
export function parseRetryAfter(retryAfter: string | null): number | null {
    if (!retryAfter) return null;

    const seconds = parseInt(retryAfter, 10);
    if (!isNaN(seconds)) {
        return seconds * 1000;
    }

    const date = Date.parse(retryAfter);
    if (!isNaN(date)) {
        const delay = date - Date.now();
        return delay > 0 ? delay : null;
    }

    return null;
}

/**
 * Computes the backoff delay before attempt `attempt + 1`.
 *
 * @param policy - Retry policy
 * @param attempt - Number of attempts already made (1-based)
 * @param random - Random number in [0, 1)
 */
export function backoffDelay(
    policy: RetryPolicy,
    attempt: number,
    random: number,
): number {
    const delay = Math.min(
        policy.baseDelayMs * Math.pow(2, attempt - 1),
        policy.maxDelayMs,
    );
    return Math.floor(delay + delay * policy.jitter * random);
}

function isRetryableStatus(status: number): boolean {
    return status === 429 || status >= 500;
}

/**
 * Thrown inside an attempt to request a retry.
 */
class RetryableFailure extends Error {
    readonly name = 'RetryableFailure';

    constructor(
        readonly failure: NetworkError,
        readonly retryAfterMs: number | null = null,
    ) {
        super(failure.message);
    }
}

// ============================================================================
// CLIENT
// ============================================================================

/**
 * HTTP client shared by every stage of one run.
 *
 * @example
 * ```ts
 * const client = new HttpClient({ concurrency: 5, timeoutMs: 10_000 });
 * const text = await client.getText('https://aaonline.fr/bridge.js.php');
 * ```
 */
export class HttpClient {
    readonly retry: RetryPolicy;
    readonly timeoutMs: number;
    readonly limiter: ConcurrencyLimiter;
    private readonly options: HttpClientOptions;

    constructor(options: HttpClientOptions = {}) {
        this.options = options;
        this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
        if (!Number.isInteger(this.retry.maxAttempts) || this.retry.maxAttempts < 1) {
            throw new RangeError(
                `maxAttempts must be a positive integer, got ${this.retry.maxAttempts}`,
            );
        }
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.limiter =
            options.limiter ?? new ConcurrencyLimiter(options.concurrency ?? 5);
    }

    /** The run's cancellation signal */
    get signal(): AbortSignal | undefined {
        return this.options.signal;
    }

    /**
     * Fetches a URL and reads its whole body.
     *
     * Retries timeouts, connection resets, truncated bodies, 429 and 5xx
     * answers according to the retry policy. Other 4xx answers fail at once.
     *
     * @param url - Absolute URL
     * @returns The response with its body
     * @throws NetworkError when the request fails for good
     * @throws the abort reason when the run is cancelled
     */
    async get(url: string): Promise<HttpResponse> {
        const target = this.applyHttpHandling(url);
        const { maxAttempts } = this.retry;

        for (let attempt = 1; ; attempt++) {
            try {
                return await this.limiter.run(() =>
                    this.attempt(url, target, attempt),
                );
            } catch (error) {
                if (!(error instanceof RetryableFailure)) {
                    throw error;
                }
                if (attempt >= maxAttempts) {
                    throw error.failure;
                }
                // Retry-After is capped like the backoff
                const delayMs =
                    error.retryAfterMs !== null
                        ? Math.min(error.retryAfterMs, this.retry.maxDelayMs)
                        : backoffDelay(
                              this.retry,
                              attempt,
                              (this.options.random ?? Math.random)(),
                          );
                this.options.onRetry?.({
                    url,
                    attempt,
                    delayMs,
                    reason: error.failure.message,
                });
                await sleep(delayMs, this.options.signal);
            }
        }
    }

    /**
     * Fetches a URL and decodes its body as UTF-8.
     */
    async getText(url: string): Promise<string> {
        const response = await this.get(url);
        return new TextDecoder().decode(response.body);
    }

    private async attempt(
        url: string,
        target: string,
        attempt: number,
    ): Promise<HttpResponse> {
        const userSignal = this.options.signal;
        userSignal?.throwIfAborted();
        const signal = createSignalWithTimeout(this.timeoutMs, userSignal);
        const doFetch = this.options.fetch ?? fetch;

        let response: Response;
        let body: Uint8Array;
        try {
            response = await doFetch(this.withProxy(target), {
                headers: this.headersFor(target),
                redirect: 'follow',
                signal,
            });
            body = new Uint8Array(await response.arrayBuffer());
        } catch (error) {
            if (userSignal?.aborted || isAbortError(error)) {
                throw userSignal?.reason ?? error;
            }
            const failure = NetworkError.fromCause(url, error, attempt);
            if (failure.transient) {
                throw new RetryableFailure(failure);
            }
            throw failure;
        }

        if (!response.ok) {
            const failure = new NetworkError(
                url,
                NetworkErrorCode.HTTP_STATUS,
                `HTTP ${response.status}`,
                {
                    status: response.status,
                    transient: isRetryableStatus(response.status),
                    attempts: attempt,
                },
            );
            if (failure.transient) {
                throw new RetryableFailure(
                    failure,
                    response.status === 429
                        ? parseRetryAfter(response.headers.get('Retry-After'))
                        : null,
                );
            }
            throw failure;
        }

        const declaredLength = response.headers.get('Content-Length');
        const contentEncoding = response.headers.get('Content-Encoding');
        if (declaredLength !== null && !contentEncoding) {
            const expected = parseInt(declaredLength, 10);
            if (!isNaN(expected) && body.byteLength < expected) {
                throw new RetryableFailure(
                    new NetworkError(
                        url,
                        NetworkErrorCode.TRUNCATED,
                        `Body truncated: got ${body.byteLength} of ${expected} bytes`,
                        { transient: true, attempts: attempt },
                    ),
                );
            }
        }

        return {
            url,
            finalUrl: response.url || target,
            status: response.status,
            headers: response.headers,
            body,
        };
    }

    private applyHttpHandling(url: string): string {
        if (!url.startsWith('http:')) {
            return url;
        }
        switch (this.options.httpHandling ?? 'redirect-to-https') {
            case 'allow-insecure':
                return url;
            case 'redirect-to-https':
                return `https:${url.slice('http:'.length)}`;
            case 'disallow':
                throw new NetworkError(
                    url,
                    NetworkErrorCode.INSECURE_URL,
                    'Plain HTTP URLs are disallowed',
                    { transient: false, attempts: 0 },
                );
        }
    }

    private withProxy(url: string): string {
        return this.options.proxy ? `${this.options.proxy}${url}` : url;
    }

    private headersFor(url: string): Record<string, string> {
        const headers: Record<string, string> = {};
        let hostname: string;
        try {
            hostname = new URL(url).hostname;
        } catch {
            return headers;
        }
        for (const rule of this.options.headerRules ?? []) {
            if (rule.matches(hostname)) {
                Object.assign(headers, rule.headers);
            }
        }
        return headers;
    }
}
