/**
 * Concurrent fetching of asset references into records.
 */

import { NetworkError, type HttpClient, type HttpResponse } from '@trialpack/http';
import {
    AssetErrorCode,
    type AssetRecord,
    type AssetReference,
    type AssetRole,
    type AssetStatus,
    type FailedAssetRecord,
    type FetchedAssetRecord,
} from '@trialpack/types';
import { AssetError } from './errors.js';
import {
    detectContentType,
    dispositionFilename,
    extensionForContentType,
    isExtensionConsistent,
    type DetectedType,
} from './mime.js';
import { LocalNameRegistry } from './naming.js';
import { urlExtension, urlStem } from './url.js';
import type { WatermarkStripper } from './watermark.js';

export const DEFAULT_FETCH_CONCURRENCY = 5;

/**
 * Emitted when an asset starts and when it settles.
 */
export interface FetchProgressEvent {
    url: string;
    role: AssetRole;
    status: AssetStatus;
    /** Assets settled so far in this call */
    completed: number;
    total: number;
}

export interface FetcherOptions {
    /** The run's client; its limiter bounds requests across the whole run */
    client: HttpClient;
    /** Number of workers */
    concurrency?: number;
    /** Applied to fetched images of watermark hosts */
    watermark?: WatermarkStripper | null;
    onProgress?: (event: FetchProgressEvent) => void;
    onWarning?: (message: string) => void;
}

interface FetchState {
    names: LocalNameRegistry;
    completed: number;
    total: number;
}

/**
 * Fetches asset references with a bounded worker pool.
 *
 * @example
 * ```ts
 * const fetcher = new Fetcher({ client, concurrency: 5 });
 * for await (const record of fetcher.fetchAll(references)) {
 *     if (record.status === 'failed') console.warn(record.error.message);
 * }
 * ```
 */
export class Fetcher {
    readonly concurrency: number;

    constructor(private readonly options: FetcherOptions) {
        this.concurrency = options.concurrency ?? DEFAULT_FETCH_CONCURRENCY;
        if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
            throw new RangeError(
                `Fetch concurrency must be a positive integer, got ${this.concurrency}`,
            );
        }
    }

    /**
     * Fetches every reference once and yields its record as soon as it
     * settles. Failed assets are yielded as failed records; only
     * cancellation ends the stream with an error.
     *
     * Each call starts from scratch: nothing is cached between calls.
     *
     * @param references - References to fetch, keyed by distinct canonical URL
     * @throws the abort reason when the client's signal aborts
     */
    async *fetchAll(
        references: Iterable<AssetReference>,
    ): AsyncGenerator<AssetRecord, void, undefined> {
        const queue = [...references];
        const fetchState: FetchState = {
            names: new LocalNameRegistry(),
            completed: 0,
            total: queue.length,
        };
        const ready: AssetRecord[] = [];
        const pool: { active: number; stopped: boolean; failure?: { reason: unknown } } = {
            active: 0,
            stopped: false,
        };
        let wake: (() => void) | undefined;
        const notify = (): void => {
            const resolve = wake;
            wake = undefined;
            resolve?.();
        };

        const worker = async (): Promise<void> => {
            pool.active++;
            try {
                while (!pool.stopped && pool.failure === undefined) {
                    const reference = queue.shift();
                    if (reference === undefined) {
                        return;
                    }
                    ready.push(await this.fetchOne(reference, fetchState));
                    notify();
                }
            } catch (error) {
                pool.failure ??= { reason: error };
            } finally {
                pool.active--;
                notify();
            }
        };

        const workers = Array.from(
            { length: Math.min(this.concurrency, queue.length) },
            () => worker(),
        );

        try {
            for (;;) {
                const next = ready.shift();
                if (next !== undefined) {
                    yield next;
                    continue;
                }
                if (pool.failure !== undefined) {
                    throw pool.failure.reason;
                }
                if (pool.active === 0) {
                    return;
                }
                await new Promise<void>((resolve) => {
                    wake = resolve;
                });
            }
        } finally {
            pool.stopped = true;
            await Promise.all(workers);
        }
    }

    private async fetchOne(
        reference: AssetReference,
        state: FetchState,
    ): Promise<AssetRecord> {
        this.options.client.signal?.throwIfAborted();
        this.progress(reference, 'pending', state);

        let response: HttpResponse;
        try {
            response = await this.options.client.get(reference.url);
        } catch (error) {
            if (error instanceof NetworkError) {
                return this.settle(
                    this.failed(reference, AssetError.fromNetworkError(reference, error)),
                    state,
                );
            }
            throw error;
        }

        if (response.body.byteLength === 0) {
            return this.settle(
                this.failed(
                    reference,
                    new AssetError(
                        AssetErrorCode.EMPTY_PAYLOAD,
                        reference.url,
                        reference.role,
                        `Empty payload from ${reference.url}`,
                        response.status,
                    ),
                ),
                state,
            );
        }

        const disposition = dispositionFilename(response.headers.get('content-disposition'));
        const sourceExtensions = [
            disposition !== undefined ? urlExtension(disposition) : '',
            urlExtension(reference.url),
            urlExtension(response.finalUrl),
        ].filter((extension) => extension !== '');

        const detected = await detectContentType(
            response.body,
            response.headers.get('content-type'),
            sourceExtensions[0] ?? '',
        );
        const extension = this.chooseExtension(reference, sourceExtensions, detected);
        const stem =
            urlStem(reference.url) || (disposition !== undefined ? urlStem(disposition) : '');

        let record: FetchedAssetRecord = {
            status: 'fetched',
            url: reference.url,
            role: reference.role,
            finalUrl: response.finalUrl,
            contentType: detected.contentType,
            localName: state.names.assign(reference.url, stem, extension),
            bytes: response.body,
            watermarkStripped: false,
        };

        const watermark = this.options.watermark;
        if (watermark && watermark.applies(record)) {
            record = await watermark.strip(record);
        }
        return this.settle(record, state);
    }

    /**
     * The source extension when it agrees with the content type, else the
     * type's own extension, else the role default, else `bin`.
     */
    private chooseExtension(
        reference: AssetReference,
        sourceExtensions: string[],
        detected: DetectedType,
    ): string {
        const typeExtension =
            detected.sniffedExtension ?? extensionForContentType(detected.contentType);

        const consistent = sourceExtensions.find(
            (extension) =>
                isExtensionConsistent(extension, detected.contentType) ||
                (typeExtension === undefined && /^[a-z0-9]{1,5}$/.test(extension)),
        );
        if (consistent !== undefined) {
            return consistent;
        }
        if (typeExtension !== undefined) {
            return typeExtension;
        }
        if (reference.defaultExtension) {
            return reference.defaultExtension;
        }
        this.warn(`Unknown extension for ${reference.url}; saved as .bin`);
        return 'bin';
    }

    private failed(reference: AssetReference, error: AssetError): FailedAssetRecord {
        return {
            status: 'failed',
            url: reference.url,
            role: reference.role,
            error: error.toFailure(),
        };
    }

    private settle(record: AssetRecord, state: FetchState): AssetRecord {
        state.completed++;
        this.progress(record, record.status, state);
        return record;
    }

    private progress(
        asset: { url: string; role: AssetRole },
        status: AssetStatus,
        state: FetchState,
    ): void {
        this.options.onProgress?.({
            url: asset.url,
            role: asset.role,
            status,
            completed: state.completed,
            total: state.total,
        });
    }

    private warn(message: string): void {
        if (this.options.onWarning) {
            this.options.onWarning(message);
        } else {
            console.warn(message);
        }
    }
}

/**
 * Gathers a record stream into a map keyed by canonical URL.
 */
export async function collectRecords(
    stream: AsyncIterable<AssetRecord>,
): Promise<Map<string, AssetRecord>> {
    const records = new Map<string, AssetRecord>();
    for await (const record of stream) {
        records.set(record.url, record);
    }
    return records;
}
