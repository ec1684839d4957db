/**
 * Builders for pipeline values used across package tests.
 */

import { HttpClient } from '@trialpack/http';
import { CaseResolver, TemplateLoader } from '@trialpack/resolver';
import type {
    CaseManifest,
    FetchedAssetRecord,
    JsonObject,
    PlayerTemplate,
    SitePaths,
} from '@trialpack/types';

export const SITE_PATHS: SitePaths = {
    picture_dir: 'images',
    icon_subdir: 'icons',
    talking_subdir: 'chars',
    still_subdir: 'charsStill',
    startup_subdir: 'charsStartup',
    evidence_subdir: 'evidence',
    bg_subdir: 'backgrounds',
    defaultplaces_subdir: 'defaultplaces',
    popups_subdir: 'popups',
    locks_subdir: 'psyche_locks',
    music_dir: 'music',
    sounds_dir: 'sounds',
    voices_dir: 'voices',
    lang_dir: 'Languages',
    css_dir: 'CSS',
    js_dir: 'Javascript',
};

export const DEFAULT_PLACES: JsonObject = {
    '-1': {
        id: -1,
        name: 'Courtroom',
        background: { image: 'courtroom', external: false },
        background_objects: [],
        foreground_objects: [],
    },
    '-2': { id: -2, name: 'Black screen', background: { color: '#000000' } },
};

/**
 * A template with the given text and the sample site layout.
 */
export function makeTemplate(overrides: Partial<PlayerTemplate> = {}): PlayerTemplate {
    return {
        version: 'test',
        sitePaths: SITE_PATHS,
        defaultData: { profilesStartup: new Set(['Phoenix/3']), places: DEFAULT_PLACES },
        document: '',
        scripts: '',
        ...overrides,
    };
}

/**
 * An unfrozen manifest around `data`.
 */
export function makeManifest(
    data: JsonObject,
    overrides: Partial<CaseManifest> = {},
): CaseManifest {
    return {
        id: 1,
        title: 'Sample',
        author: 'Tester',
        language: 'en',
        sequence: null,
        nextIds: [],
        information: {},
        data,
        ...overrides,
    };
}

/**
 * A fetched record with text bytes.
 */
export function makeRecord(
    url: string,
    localName: string,
    overrides: Partial<FetchedAssetRecord> = {},
): FetchedAssetRecord {
    return {
        status: 'fetched',
        url,
        role: 'background',
        finalUrl: url,
        contentType: 'image/png',
        localName,
        bytes: new TextEncoder().encode(`bytes of ${url}`),
        watermarkStripped: false,
        ...overrides,
    };
}

/** Client without real retry delays */
export function createTestClient(): HttpClient {
    return new HttpClient({ retry: { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 2, jitter: 0 } });
}

/**
 * Resolves fixture cases and the master template through the mocked hosts.
 */
export async function loadSample(ids: number[]): Promise<{
    client: HttpClient;
    template: PlayerTemplate;
    manifests: CaseManifest[];
}> {
    const client = createTestClient();
    const resolver = new CaseResolver(client);
    const template = await new TemplateLoader(client).load();
    const manifests = await Promise.all(ids.map((id) => resolver.resolve(id)));
    return { client, template, manifests };
}
