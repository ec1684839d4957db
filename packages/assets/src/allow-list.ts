/**
 * Which URL-shaped strings in template text count as assets.
 */

import { minimatch } from 'minimatch';
import { ORIGIN_HOSTS } from '@trialpack/resolver';
import { urlExtension } from './url.js';

/** Hosts whose files are assets, as minimatch patterns */
export const DEFAULT_ALLOWED_HOSTS: readonly string[] = [
    ...ORIGIN_HOSTS,
    'photobucket.com',
    '*.photobucket.com',
    'i.imgur.com',
];

/** Extensions of the media the player loads */
export const DEFAULT_ASSET_EXTENSIONS: readonly string[] = [
    'png',
    'gif',
    'jpg',
    'jpeg',
    'webp',
    'bmp',
    'svg',
    'mp3',
    'ogg',
    'opus',
    'wav',
    'm4a',
];

/**
 * Whether `hostname` matches one of the minimatch `patterns`.
 */
export function matchesHost(hostname: string, patterns: readonly string[]): boolean {
    const host = hostname.toLowerCase();
    return patterns.some((pattern) => minimatch(host, pattern, { nocase: true }));
}

export interface AllowListOptions {
    hosts?: readonly string[];
    extensions?: readonly string[];
}

/**
 * Host and extension allow-list applied to URLs found in template text.
 *
 * @example
 * ```ts
 * const allowList = new AllowList();
 * allowList.allows('https://aaonline.fr/images/ui/logo.png'); // true
 * allowList.allows('https://tracker.example.test/pixel.gif'); // false
 * ```
 */
export class AllowList {
    readonly hosts: readonly string[];
    private readonly extensions: ReadonlySet<string>;

    constructor(options: AllowListOptions = {}) {
        this.hosts = options.hosts ?? DEFAULT_ALLOWED_HOSTS;
        this.extensions = new Set(
            (options.extensions ?? DEFAULT_ASSET_EXTENSIONS).map((ext) => ext.toLowerCase()),
        );
    }

    allows(url: string): boolean {
        let hostname: string;
        try {
            hostname = new URL(url).hostname;
        } catch {
            return false;
        }
        return this.extensions.has(urlExtension(url)) && matchesHost(hostname, this.hosts);
    }
}
