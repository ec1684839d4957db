/**
 * `@trialpack/assets`
 *
 * Finds every asset a case needs, fetches them concurrently and cleans up
 * watermarked images.
 *
 * @packageDocumentation
 */

export { AssetError } from './errors.js';
export { canonicalizeUrl, urlExtension, urlStem, hasExtension } from './url.js';
export {
    AllowList,
    DEFAULT_ALLOWED_HOSTS,
    DEFAULT_ASSET_EXTENSIONS,
    matchesHost,
    type AllowListOptions,
} from './allow-list.js';
export {
    replaceAssetUrls,
    extractAssetUrls,
    type TextReferenceKind,
    type UrlReplacer,
} from './text-scan.js';
export {
    AssetGraph,
    mergeReferences,
    resolveAssetUrl,
    findUsedDefaultSprites,
    findUsedDefaultPlaces,
    countPsycheLocks,
    escapePointerSegment,
    SPRITE_STATUSES,
    VOICE_IDS,
    VOICE_EXTENSIONS,
    PSYCHE_LOCK_NAMES,
    type AssetGraphOptions,
    type AssetLocation,
} from './graph.js';
export {
    detectContentType,
    normalizeContentType,
    isGenericContentType,
    contentTypeForExtension,
    extensionForContentType,
    isExtensionConsistent,
    dispositionFilename,
    FALLBACK_CONTENT_TYPE,
    type DetectedType,
} from './mime.js';
export { LocalNameRegistry } from './naming.js';
export {
    WatermarkStripper,
    WATERMARK_HOSTS,
    WATERMARK_BAND_HEIGHT,
    watermarkHeaderRule,
    type WatermarkStripperOptions,
} from './watermark.js';
export {
    Fetcher,
    collectRecords,
    DEFAULT_FETCH_CONCURRENCY,
    type FetcherOptions,
    type FetchProgressEvent,
} from './fetcher.js';
