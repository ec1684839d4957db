/**
 * `@trialpack/rewrite`
 *
 * Rewrites cases and their player to local asset forms, and links the
 * cases of one batch to each other.
 *
 * @packageDocumentation
 */

export {
    RewriteError,
    RewriteErrorCode,
    SequenceError,
    SequenceErrorCode,
} from './errors.js';
export { cloneJson, cloneObject, setPointer, mapStrings, scriptJson } from './json.js';
export { ASSET_DIRECTORY, LocalForms, localForm } from './local-form.js';
export {
    escapeHtml,
    playerBlocks,
    replacePhpBlocks,
    trialBlocks,
    type ExpectedBlock,
} from './php-blocks.js';
export {
    REDIRECT_PATTERN,
    detectLinks,
    emitRedirect,
    linkBatch,
    linkTargets,
    relativeHref,
    replaceLiteralLinks,
    type DetectedLinks,
} from './sequence.js';
export {
    DEFAULT_SPRITES_PATTERN,
    GRAPHIC_ELEMENT_PATTERN,
    IMAGE_SIZE_PATCH,
    LIVE_ENDPOINT_PATTERN,
    PSYCHE_LOCK_PATTERN,
    VOICE_PATTERN,
    appendUserscripts,
    configureHowler,
    patchImageSize,
    removeLiveEndpoints,
    rewriteCase,
    rewriteCaseData,
    rewriteDefaultPlaces,
    rewritePsycheLocks,
    rewriteText,
    spriteLookup,
    voiceLookup,
    type RewriteInput,
    type RewriteOptions,
    type RewrittenCase,
} from './rewriter.js';
