/**
 * Pattern-based discovery and replacement of asset URLs in template text.
 *
 * Extraction and rewriting share {@link replaceAssetUrls}, so a reference
 * found in a document is always one the rewriter can replace.
 */

import { CSS_URL_PATTERN, ORIGIN_BASE_URL } from '@trialpack/resolver';
import type { AllowList } from './allow-list.js';
import { canonicalizeUrl } from './url.js';

/** How a URL appeared in the text */
export type TextReferenceKind = 'src' | 'css' | 'absolute';

/**
 * Receives each allowed canonical URL; returns its replacement, or
 * undefined to leave the text as it is.
 */
export type UrlReplacer = (url: string, kind: TextReferenceKind) => string | undefined;

/** `src="…"` attributes and `.src = '…'` assignments */
const SRC_PATTERN = /(\bsrc\s*=\s*)(["'])([^"'\n]+)\2/g;

const ABSOLUTE_URL_PATTERN = /https?:\/\/[^\s"'`()<>\\]+/g;

/**
 * Replaces every allowed asset URL in `text`.
 *
 * @param text - Document, script or stylesheet text
 * @param allowList - URLs failing it are left untouched
 * @param replace - Computes replacements
 * @param base - Base for relative URLs
 */
export function replaceAssetUrls(
    text: string,
    allowList: AllowList,
    replace: UrlReplacer,
    base = `${ORIGIN_BASE_URL}/`,
): string {
    const visit = (raw: string, kind: TextReferenceKind): string | undefined => {
        const url = canonicalizeUrl(raw, base);
        if (url === null || !allowList.allows(url)) {
            return undefined;
        }
        return replace(url, kind);
    };

    return text
        .replace(SRC_PATTERN, (match: string, prefix: string, quote: string, target: string) => {
            const replacement = visit(target, 'src');
            return replacement === undefined ? match : `${prefix}${quote}${replacement}${quote}`;
        })
        .replace(
            CSS_URL_PATTERN,
            (match: string, prefix: string, quote: string, target: string) => {
                const replacement = visit(target, 'css');
                return replacement === undefined
                    ? match
                    : `${prefix}url(${quote}${replacement}${quote})`;
            },
        )
        .replace(ABSOLUTE_URL_PATTERN, (match: string) => visit(match, 'absolute') ?? match);
}

/**
 * Collects the allowed asset URLs of `text`, each with the way it first
 * appeared.
 */
export function extractAssetUrls(
    text: string,
    allowList: AllowList,
    base?: string,
): Map<string, TextReferenceKind> {
    const found = new Map<string, TextReferenceKind>();
    replaceAssetUrls(
        text,
        allowList,
        (url, kind) => {
            if (!found.has(url)) {
                found.set(url, kind);
            }
            return undefined;
        },
        base,
    );
    return found;
}
