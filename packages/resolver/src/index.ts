/**
 * `@trialpack/resolver`
 *
 * Resolves cases into manifests and loads the player template they are
 * rendered with.
 *
 * @packageDocumentation
 */

export * from './constants.js';
export { ResolutionError, ResolutionErrorCode } from './errors.js';
export {
    decodeStringLiteral,
    parseEmbeddedJson,
    parseJson,
    isJsonObject,
} from './js-literal.js';
export {
    CaseResolver,
    parseCaseId,
    parseTrialScript,
    buildManifest,
    findNextIds,
    type TrialScript,
} from './case-resolver.js';
export {
    REQUIRED_SITE_PATHS,
    parseSitePaths,
    parseDefaultData,
    fetchSitePaths,
    fetchDefaultData,
    joinUrlPath,
    readString,
} from './site.js';
export {
    parseModule,
    combineModules,
    missingDependencies,
    type PlayerModule,
} from './modules.js';
export {
    TemplateLoader,
    absolutizeCssUrls,
    type TemplateLoaderOptions,
} from './template-loader.js';
