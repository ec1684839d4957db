/**
 * Endpoints and text patterns of the origin host and the player template
 * repository.
 */

/** Base URL of the origin host; relative paths resolve against it */
export const ORIGIN_BASE_URL = 'https://aaonline.fr';

/** Hosts that serve the player, its API and its default assets */
export const ORIGIN_HOSTS = [
    'aaonline.fr',
    'www.aaonline.fr',
    'aceattorney.sparklin.org',
    'www.aceattorney.sparklin.org',
] as const;

/** Site configuration script (`var cfg = {...};`) */
export const BRIDGE_URL = `${ORIGIN_BASE_URL}/bridge.js.php`;

/** Rendered default data module (default sprites and places) */
export const DEFAULT_DATA_URL = `${ORIGIN_BASE_URL}/default_data.js.php`;

/** Raw file access to the versioned player template */
export const TEMPLATE_REPOSITORY_URL =
    'https://bitbucket.org/AceAttorneyOnline/aao-game-creation-engine/raw';

/** Template version used when a case does not ask for one */
export const DEFAULT_PLAYER_VERSION = 'master';

export const DEFAULT_LANGUAGE = 'en';

/**
 * URL of the script that publishes a case's information and data.
 */
export function trialScriptUrl(caseId: number): string {
    return `${ORIGIN_BASE_URL}/trial.js.php?trial_id=${caseId}`;
}

/**
 * URL of a file of the player template at a given version.
 */
export function templateFileUrl(version: string, path: string): string {
    return `${TEMPLATE_REPOSITORY_URL}/${encodeURIComponent(version)}/${path}`;
}

// ============================================================================
// PATTERNS
// ============================================================================

/** Body of a double-quoted JavaScript string literal */
const JS_STRING_BODY = String.raw`((?:[^"\\]|\\.)*)`;

export const CASE_URL_PATTERN =
    /^https?:\/\/(?:www\.)?aaonline\.fr\/player\.php\?(?:[^#]*&)?trial_id=(\d+)/;

export const LEGACY_CASE_URL_PATTERN =
    /^https?:\/\/(?:www\.)?aceattorney\.sparklin\.org\/jeu\.php\?(?:[^#]*&)?id_proces=(\d+)/;

/** A player URL (absolute or relative) that opens another case */
export const PLAYER_URL_PATTERN =
    /(?:https?:\/\/(?:www\.)?aaonline\.fr\/)?player\.php\?trial_id=(\d+)/g;

export const TRIAL_INFORMATION_PATTERN = new RegExp(
    String.raw`var trial_information(?: = JSON\.parse\("${JS_STRING_BODY}"\))?;`,
);

export const TRIAL_DATA_PATTERN = new RegExp(
    String.raw`var initial_trial_data = JSON\.parse\("${JS_STRING_BODY}"\);`,
);

export const DEFAULT_PROFILES_STARTUP_PATTERN = new RegExp(
    String.raw`var default_profiles_startup = JSON\.parse\("${JS_STRING_BODY}"\);`,
);

export const DEFAULT_PLACES_PATTERN = /var default_places = (\{.*?\});/s;

export const CONFIG_PATTERN = /var cfg = (\{.*?\});/s;

export const MODULE_PATTERN =
    /Modules\.load\(new Object\(\{\s*name\s*:\s*['"](.*?)['"]\s*,\s*dependencies\s*:\s*(\[.*?\]),\s*init\s*:\s*function\(\)\s*\{(.*?)\}\s*^\}\)\);/ms;

export const PHP_BLOCK_PATTERN = /<\?php(.*?)\?>/gs;

export const STYLESHEET_LINK_PATTERN =
    /<link rel="stylesheet" type="text\/css" href="([^"]+\.css)"\s*\/>/g;

export const STYLE_INCLUDE_PATTERN = /includeStyle\(['"](.*?)['"]\);/g;

export const CSS_IMPORT_PATTERN =
    /@import\s+(?:url\(\s*["']?([^"')]+)["']?\s*\)|["']([^"']+)["'])\s*;/g;

export const CSS_URL_PATTERN = /([:\s,(])url\(\s*(["']?)([^"')]*)\2\s*\)/g;

export const LANGUAGE_INCLUDE_PATTERN =
    /Languages\.requestFiles\(\[([^\]]*)\], function\(\)\{\s*(.*?)\s*\}\);/s;

export const LANGUAGE_OBJECT_PATTERN = /var lang = new Object\(\);/;

export const HOWLER_INCLUDE_PATTERN =
    /includeScript\('howler\.js\/howler\.min', false, '', function\(\)\{([^}]*?)\}\);/;

export const PRELOAD_PLACES_PATTERN =
    /preloadPlaceImages\(default_places\[i\], img_container\)/g;

export const ANALYTICS_PATTERN = /<script>.*?UA-.*?<\/script>/s;

/** Modules the player provides itself */
export const BUILT_IN_MODULES: ReadonlySet<string> = new Set([
    'dom_loaded',
    'page_loaded',
]);
