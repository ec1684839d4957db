/**
 * URL canonicalisation. The canonical form is the deduplication key of an
 * asset across a whole run.
 */

import { ORIGIN_BASE_URL } from '@trialpack/resolver';

const NON_FETCHABLE_SCHEME = /^(?:data|blob|javascript|about|mailto):/i;

/**
 * Canonicalises an asset URL: resolved against `base`, protocol-relative
 * URLs forced to https, fragment dropped, repeated slashes in the path
 * collapsed.
 *
 * @param raw - URL as found in case data or template text
 * @param base - Base for relative URLs (the origin host by default)
 * @returns The canonical URL, or null for empty, inline or non-HTTP values
 *
 * @example
 * ```ts
 * canonicalizeUrl('//i.imgur.com/a.png#x'); // 'https://i.imgur.com/a.png'
 * canonicalizeUrl('images//chars/1.gif'); // 'https://aaonline.fr/images/chars/1.gif'
 * ```
 */
export function canonicalizeUrl(
    raw: string,
    base: string = `${ORIGIN_BASE_URL}/`,
): string | null {
    const trimmed = raw.trim();
    if (trimmed === '' || trimmed.startsWith('#') || NON_FETCHABLE_SCHEME.test(trimmed)) {
        return null;
    }

    let url: URL;
    try {
        url = new URL(trimmed.startsWith('//') ? `https:${trimmed}` : trimmed, base);
    } catch {
        return null;
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        return null;
    }

    url.hash = '';
    url.pathname = url.pathname.replace(/\/{2,}/g, '/');
    return url.href;
}

function lastSegment(url: string): string {
    let pathname: string;
    try {
        pathname = new URL(url).pathname;
    } catch {
        pathname = url.split(/[?#]/)[0];
    }
    return pathname.slice(pathname.lastIndexOf('/') + 1);
}

/**
 * Lower-case extension of the last path segment, without the dot, or ''.
 */
export function urlExtension(url: string): string {
    const segment = lastSegment(url);
    const dot = segment.lastIndexOf('.');
    return dot > 0 ? segment.slice(dot + 1).toLowerCase() : '';
}

/**
 * Last path segment without its extension.
 */
export function urlStem(url: string): string {
    const segment = lastSegment(url);
    const dot = segment.lastIndexOf('.');
    return dot > 0 ? segment.slice(0, dot) : segment;
}

/**
 * Whether a relative file value already names an extension.
 */
export function hasExtension(file: string): boolean {
    const segment = file.slice(file.lastIndexOf('/') + 1);
    return segment.lastIndexOf('.') > 0;
}
