/**
 * Site configuration and default data published by the origin host.
 */

import type { HttpClient } from '@trialpack/http';
import type { DefaultData, JsonObject, JsonValue, SitePaths } from '@trialpack/types';
import {
    BRIDGE_URL,
    CONFIG_PATTERN,
    DEFAULT_DATA_URL,
    DEFAULT_PLACES_PATTERN,
    DEFAULT_PROFILES_STARTUP_PATTERN,
} from './constants.js';
import { ResolutionError, ResolutionErrorCode } from './errors.js';
import { isJsonObject, parseEmbeddedJson, parseJson } from './js-literal.js';

/** Keys of the bridge configuration the downloader relies on */
export const REQUIRED_SITE_PATHS = [
    'picture_dir',
    'icon_subdir',
    'talking_subdir',
    'still_subdir',
    'startup_subdir',
    'evidence_subdir',
    'bg_subdir',
    'defaultplaces_subdir',
    'popups_subdir',
    'locks_subdir',
    'music_dir',
    'sounds_dir',
    'voices_dir',
    'lang_dir',
    'css_dir',
    'js_dir',
] as const;

function templateError(message: string, cause?: unknown): ResolutionError {
    return new ResolutionError(
        ResolutionErrorCode.TEMPLATE_ERROR,
        message,
        undefined,
        cause,
    );
}

function parseOrFail(text: string, what: string): JsonValue {
    try {
        return parseJson(text);
    } catch (error) {
        throw templateError(`${what} is not valid JSON`, error);
    }
}

/**
 * Parses the site configuration out of the bridge script.
 *
 * @param script - Text of the bridge script
 * @throws ResolutionError `TEMPLATE_ERROR` when the configuration is
 *   missing or lacks a required directory
 */
export function parseSitePaths(script: string): SitePaths {
    const match = CONFIG_PATTERN.exec(script);
    if (!match) {
        throw templateError('Site configuration not found in bridge script');
    }
    const config = parseOrFail(match[1], 'Site configuration');
    if (!isJsonObject(config)) {
        throw templateError('Site configuration is not an object');
    }

    const missing = REQUIRED_SITE_PATHS.filter(
        (key) => typeof config[key] !== 'string',
    );
    if (missing.length > 0) {
        throw templateError(
            `Site configuration lacks ${missing.join(', ')}`,
        );
    }

    const paths: SitePaths = {
        picture_dir: '',
        icon_subdir: '',
        talking_subdir: '',
        still_subdir: '',
        startup_subdir: '',
        evidence_subdir: '',
        bg_subdir: '',
        defaultplaces_subdir: '',
        popups_subdir: '',
        locks_subdir: '',
        music_dir: '',
        sounds_dir: '',
        voices_dir: '',
        lang_dir: '',
        css_dir: '',
        js_dir: '',
    };
    for (const [key, value] of Object.entries(config)) {
        paths[key] = value;
    }
    return paths;
}

/**
 * Parses default sprite and place data out of the rendered default data
 * module.
 */
export function parseDefaultData(script: string): DefaultData {
    const startupMatch = DEFAULT_PROFILES_STARTUP_PATTERN.exec(script);
    const placesMatch = DEFAULT_PLACES_PATTERN.exec(script);
    if (!startupMatch || !placesMatch) {
        throw templateError('Default data module changed format');
    }

    let startup: JsonValue;
    try {
        startup = parseEmbeddedJson(startupMatch[1]);
    } catch (error) {
        throw templateError('Default startup sprites are not valid JSON', error);
    }
    const places = parseOrFail(placesMatch[1], 'Default places');
    if (!isJsonObject(places)) {
        throw templateError('Default places are not an object');
    }

    // Either {"Base/3": 1, ...} or ["Base/3", ...]
    const profilesStartup = new Set<string>(
        Array.isArray(startup)
            ? startup.filter((entry): entry is string => typeof entry === 'string')
            : isJsonObject(startup)
              ? Object.keys(startup)
              : [],
    );

    return { profilesStartup, places };
}

/**
 * Fetches the site configuration from the bridge script.
 */
export async function fetchSitePaths(client: HttpClient): Promise<SitePaths> {
    return parseSitePaths(await client.getText(BRIDGE_URL));
}

/**
 * Fetches the rendered default data module.
 *
 * @returns The module text, which is also a player module, and its parsed data
 */
export async function fetchDefaultData(
    client: HttpClient,
): Promise<{ script: string; data: DefaultData }> {
    const script = await client.getText(DEFAULT_DATA_URL);
    return { script, data: parseDefaultData(script) };
}

/**
 * Joins URL path components, dropping empty ones and collapsing slashes.
 */
export function joinUrlPath(...components: string[]): string {
    return components
        .filter((component) => component.length > 0)
        .join('/')
        .replace(/([^:/])\/{2,}/g, '$1/');
}

/**
 * Reads a string property of a JSON object.
 */
export function readString(object: JsonObject, key: string): string | undefined {
    const value = object[key];
    return typeof value === 'string' ? value : undefined;
}
