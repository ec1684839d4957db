/**
 * Removal of the overlay band some image hosts stamp onto hotlinked files.
 */

import sharp from 'sharp';
import type { HeaderRule } from '@trialpack/http';
import type { FetchedAssetRecord } from '@trialpack/types';
import { matchesHost } from './allow-list.js';

/** Hosts that stamp a watermark band, as minimatch patterns */
export const WATERMARK_HOSTS: readonly string[] = ['photobucket.com', '*.photobucket.com'];

/** Height of the band at the bottom of the image */
export const WATERMARK_BAND_HEIGHT = 24;

/**
 * Header rule that makes watermark hosts serve the image at all.
 */
export function watermarkHeaderRule(hosts: readonly string[] = WATERMARK_HOSTS): HeaderRule {
    return {
        matches: (hostname) => matchesHost(hostname, hosts),
        headers: { Referer: 'https://photobucket.com/' },
    };
}

export interface WatermarkStripperOptions {
    hosts?: readonly string[];
    bandHeight?: number;
    onWarning?: (message: string) => void;
}

/**
 * Crops the watermark band off images served by watermark hosts. Never
 * fails: a record that cannot be processed is returned unchanged.
 *
 * @example
 * ```ts
 * const stripper = new WatermarkStripper();
 * if (stripper.applies(record)) {
 *     record = await stripper.strip(record);
 * }
 * ```
 */
export class WatermarkStripper {
    private readonly hosts: readonly string[];
    private readonly bandHeight: number;

    constructor(private readonly options: WatermarkStripperOptions = {}) {
        this.hosts = options.hosts ?? WATERMARK_HOSTS;
        this.bandHeight = options.bandHeight ?? WATERMARK_BAND_HEIGHT;
    }

    /**
     * Whether `record` is an image from a watermark host.
     */
    applies(record: Pick<FetchedAssetRecord, 'url' | 'finalUrl' | 'contentType'>): boolean {
        if (!record.contentType.startsWith('image/') || record.contentType === 'image/svg+xml') {
            return false;
        }
        return [record.url, record.finalUrl].some((url) => {
            try {
                return matchesHost(new URL(url).hostname, this.hosts);
            } catch {
                return false;
            }
        });
    }

    /**
     * Returns `record` with the band cropped off and the image re-encoded
     * in its original format.
     */
    async strip(record: FetchedAssetRecord): Promise<FetchedAssetRecord> {
        try {
            const metadata = await sharp(record.bytes).metadata();
            const { width, height, format } = metadata;
            if (width === undefined || height === undefined || format === undefined) {
                this.warn(`Watermark kept on ${record.url}: image size unknown`);
                return record;
            }
            if (height <= this.bandHeight) {
                this.warn(`Watermark kept on ${record.url}: image is only ${height}px high`);
                return record;
            }

            const cropped = await sharp(record.bytes)
                .extract({ left: 0, top: 0, width, height: height - this.bandHeight })
                .toFormat(format)
                .toBuffer();
            return { ...record, bytes: new Uint8Array(cropped), watermarkStripped: true };
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.warn(`Watermark kept on ${record.url}: ${message}`);
            return record;
        }
    }

    private warn(message: string): void {
        if (this.options.onWarning) {
            this.options.onWarning(message);
        } else {
            console.warn(message);
        }
    }
}
