/**
 * @trialpack/utils
 *
 * Shared utility functions for trialpack packages
 */

import { createHash } from 'crypto';

/**
 * The current version of trialpack
 *
 * Used for displaying version information in CLI and error messages.
 */
export const VERSION = '0.1.0';

/**
 * Converts a file path to use POSIX-style forward slashes.
 * Bundle paths and in-document references always use forward slashes.
 *
 * @param filePath - The file path to normalize
 * @returns The path with all backslashes replaced with forward slashes
 */
export function toPosixPath(filePath: string): string {
    return filePath.replaceAll('\\', '/');
}

// ============================================================================
// IN-FLIGHT LIMITER
// ============================================================================

/**
 * Counting semaphore that bounds how many operations run at once.
 *
 * One limiter is shared by every network operation of a run, so the bound
 * holds across cases and templates, not just within one worker pool.
 *
 * @example
 * ```ts
 * const limiter = new ConcurrencyLimiter(5);
 * const body = await limiter.run(() => fetch(url).then((r) => r.text()));
 * ```
 */
export class ConcurrencyLimiter {
    private active = 0;
    private peakActive = 0;
    private readonly waiting: Array<() => void> = [];

    /**
     * @param limit - Maximum number of operations in flight (positive integer)
     */
    constructor(public readonly limit: number) {
        if (!Number.isInteger(limit) || limit < 1) {
            throw new RangeError(
                `Concurrency limit must be a positive integer, got ${limit}`,
            );
        }
    }

    /** Operations currently holding a slot */
    get inFlight(): number {
        return this.active;
    }

    /** Highest number of simultaneously held slots seen so far */
    get peak(): number {
        return this.peakActive;
    }

    /**
     * Runs `fn` once a slot is free and releases the slot when it settles.
     */
    async run<T>(fn: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await fn();
        } finally {
            this.release();
        }
    }

    private acquire(): Promise<void> {
        if (this.active < this.limit) {
            this.take();
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            this.waiting.push(() => {
                this.take();
                resolve();
            });
        });
    }

    private take(): void {
        this.active++;
        this.peakActive = Math.max(this.peakActive, this.active);
    }

    private release(): void {
        this.active--;
        this.waiting.shift()?.();
    }
}

// ============================================================================
// TIMING
// ============================================================================

/**
 * Sleeps for a given number of milliseconds. Rejects with the signal's
 * reason as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
        return Promise.reject(signal.reason);
    }
    return new Promise((resolve, reject) => {
        const onAbort = () => {
            clearTimeout(timer);
            reject(signal?.reason);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Checks whether an error is the rejection of an aborted operation.
 */
export function isAbortError(error: unknown): boolean {
    return error instanceof Error && error.name === 'AbortError';
}

// ============================================================================
// NAMES
// ============================================================================

/**
 * Characters that are unsafe in file names on at least one common platform.
 */
const UNSAFE_FILENAME_CHARS = /[/\\?%*:|"<>\u0000-\u001f]/g;

/**
 * Turns an arbitrary title into a file or directory name.
 *
 * Unicode letters are kept; path separators, reserved characters and
 * control characters become `_`. Leading and trailing dots and spaces are
 * removed so the result is never hidden or empty.
 *
 * @param title - Human-readable title
 * @param fallback - Name used when nothing usable is left
 * @returns A name safe to use as a single path segment
 *
 * @example
 * ```ts
 * sanitizeFilename('Turnabout: Part 1/2'); // 'Turnabout_ Part 1_2'
 * ```
 */
export function sanitizeFilename(title: string, fallback = 'untitled'): string {
    const cleaned = title
        .replace(UNSAFE_FILENAME_CHARS, '_')
        .replace(/^[.\s]+|[.\s]+$/g, '')
        .slice(0, 200);
    return cleaned.length > 0 ? cleaned : fallback;
}

/**
 * Makes a URL path segment usable as an ASCII file name stem.
 *
 * @param segment - Last path segment without extension
 * @returns Lower-case stem containing only `[a-z0-9._-]`
 */
export function sanitizeStem(segment: string): string {
    let decoded = segment;
    try {
        decoded = decodeURIComponent(segment);
    } catch {
        // Malformed escapes are kept literally
    }
    const stem = decoded
        .replace(/[^a-zA-Z0-9._-]/g, '_')
        .replace(/^[._]+/, '')
        .slice(0, 64)
        .toLowerCase();
    return stem.length > 0 ? stem : 'asset';
}

/**
 * Short, stable hex digest of a string.
 *
 * @param value - String to hash
 * @param length - Number of hex characters to keep
 */
export function shortHash(value: string, length = 12): string {
    return createHash('md5').update(value).digest('hex').slice(0, length);
}
