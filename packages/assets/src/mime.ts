/**
 * Content types and extensions of fetched assets.
 */

import { fileTypeFromBuffer } from 'file-type';

/** Types each extension may legitimately be served as; the first is canonical */
const TYPES_BY_EXTENSION: Record<string, readonly string[]> = {
    png: ['image/png'],
    gif: ['image/gif'],
    jpg: ['image/jpeg', 'image/jpg', 'image/pjpeg'],
    jpeg: ['image/jpeg', 'image/jpg', 'image/pjpeg'],
    webp: ['image/webp'],
    bmp: ['image/bmp', 'image/x-ms-bmp'],
    svg: ['image/svg+xml'],
    ico: ['image/x-icon', 'image/vnd.microsoft.icon'],
    mp3: ['audio/mpeg', 'audio/mp3'],
    ogg: ['audio/ogg', 'application/ogg'],
    opus: ['audio/ogg', 'audio/opus'],
    wav: ['audio/wav', 'audio/x-wav', 'audio/wave', 'audio/vnd.wave'],
    m4a: ['audio/mp4', 'audio/x-m4a'],
    mp4: ['video/mp4'],
    webm: ['video/webm', 'audio/webm'],
    css: ['text/css'],
    js: ['text/javascript', 'application/javascript'],
};

const EXTENSION_BY_TYPE: Record<string, string> = {
    'image/png': 'png',
    'image/gif': 'gif',
    'image/jpeg': 'jpg',
    'image/jpg': 'jpg',
    'image/pjpeg': 'jpg',
    'image/webp': 'webp',
    'image/bmp': 'bmp',
    'image/svg+xml': 'svg',
    'image/x-icon': 'ico',
    'audio/mpeg': 'mp3',
    'audio/mp3': 'mp3',
    'audio/ogg': 'ogg',
    'audio/opus': 'opus',
    'audio/wav': 'wav',
    'audio/x-wav': 'wav',
    'audio/mp4': 'm4a',
    'video/mp4': 'mp4',
    'video/webm': 'webm',
    'text/css': 'css',
    'text/javascript': 'js',
    'application/javascript': 'js',
};

/** Declared types that say nothing about the payload */
const GENERIC_TYPES: ReadonlySet<string> = new Set([
    '',
    'application/octet-stream',
    'binary/octet-stream',
    'application/unknown',
    'application/download',
    'application/force-download',
    'text/plain',
]);

export const FALLBACK_CONTENT_TYPE = 'application/octet-stream';

/**
 * `Content-Type` without parameters, lower-case.
 */
export function normalizeContentType(header: string | null | undefined): string {
    return (header ?? '').split(';')[0].trim().toLowerCase();
}

export function isGenericContentType(type: string): boolean {
    return GENERIC_TYPES.has(normalizeContentType(type));
}

/**
 * Canonical content type of an extension, or undefined.
 */
export function contentTypeForExtension(extension: string): string | undefined {
    return TYPES_BY_EXTENSION[extension.toLowerCase()]?.[0];
}

/**
 * Preferred extension of a content type, or undefined.
 */
export function extensionForContentType(type: string): string | undefined {
    return EXTENSION_BY_TYPE[normalizeContentType(type)];
}

/**
 * Whether `extension` may carry a payload of `type`.
 */
export function isExtensionConsistent(extension: string, type: string): boolean {
    const types = TYPES_BY_EXTENSION[extension.toLowerCase()];
    return types !== undefined && types.includes(normalizeContentType(type));
}

/**
 * Result of {@link detectContentType}.
 */
export interface DetectedType {
    contentType: string;
    /** Extension implied by the payload's magic number, if recognised */
    sniffedExtension?: string;
}

/**
 * Determines the content type of a payload: the declared type unless it
 * is missing or generic, then the magic number, then the extension.
 *
 * @param bytes - Payload
 * @param declared - `Content-Type` header value
 * @param extension - Extension of the URL or of the Content-Disposition name
 */
export async function detectContentType(
    bytes: Uint8Array,
    declared: string | null,
    extension: string,
): Promise<DetectedType> {
    const normalized = normalizeContentType(declared);
    if (!isGenericContentType(normalized)) {
        return { contentType: normalized };
    }

    const sniffed = await fileTypeFromBuffer(bytes);
    if (sniffed) {
        return { contentType: sniffed.mime, sniffedExtension: sniffed.ext };
    }
    return {
        contentType: contentTypeForExtension(extension) ?? (normalized || FALLBACK_CONTENT_TYPE),
    };
}

/**
 * File name carried by a `Content-Disposition` header, if any.
 */
export function dispositionFilename(header: string | null): string | undefined {
    if (!header) {
        return undefined;
    }
    const encoded = /filename\*\s*=\s*[^']*'[^']*'([^;]+)/i.exec(header);
    if (encoded) {
        try {
            return decodeURIComponent(encoded[1].trim());
        } catch {
            // Fall through to the plain parameter
        }
    }
    const plain = /filename\s*=\s*"?([^";]+)"?/i.exec(header);
    return plain?.[1].trim();
}
