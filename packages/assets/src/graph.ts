/**
 * Enumeration of every asset a case needs.
 *
 * The walk follows the trial data's own layout: profiles and their sprites,
 * evidence, places (the case's and the default ones its frames use),
 * popups, music, sounds, the default voice blips, the psyche locks, and
 * finally the player template's text.
 */

import {
    ORIGIN_BASE_URL,
    isJsonObject,
    joinUrlPath,
    readString,
} from '@trialpack/resolver';
import type {
    AssetReference,
    AssetRole,
    CaseManifest,
    JsonObject,
    JsonValue,
    OccurrenceSite,
    PlayerTemplate,
    SitePaths,
    SpriteStatus,
    TemplateDocument,
} from '@trialpack/types';
import { AllowList } from './allow-list.js';
import { extractAssetUrls } from './text-scan.js';
import { canonicalizeUrl, hasExtension } from './url.js';

export const SPRITE_STATUSES: readonly SpriteStatus[] = ['talking', 'still', 'startup'];

export const VOICE_IDS: readonly number[] = [1, 2, 3];

export const VOICE_EXTENSIONS: readonly string[] = ['opus', 'wav', 'mp3'];

/** Animations drawn for every psyche lock */
export const PSYCHE_LOCK_NAMES: readonly string[] = [
    'fg_chains_appear',
    'jfa_lock_appears',
    'jfa_lock_explodes',
    'fg_chains_disappear',
];

/** Base of profile 0, the built-in judge */
const DEFAULT_PROFILE_BASE = 'Juge';

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Escapes one JSON pointer segment (RFC 6901).
 */
export function escapePointerSegment(segment: string | number): string {
    return String(segment).replaceAll('~', '~0').replaceAll('/', '~1');
}

function pointer(...segments: Array<string | number>): string {
    return segments.map((segment) => `/${escapePointerSegment(segment)}`).join('');
}

/**
 * Where a file value of the trial data lives.
 */
export interface AssetLocation {
    /** Site directories, for values hosted by the origin */
    components?: string[];
    /** Whether the value is a URL of its own rather than a file on the origin */
    external: boolean;
    defaultExtension?: string;
}

/**
 * Turns a file value of the trial data into an absolute URL.
 *
 * Values on the origin get `defaultExtension` when they have none.
 * External values starting with `http` are used as they are; other
 * external values are paths on the origin.
 *
 * @returns The canonical URL, or null for empty values
 */
export function resolveAssetUrl(file: string, location: AssetLocation): string | null {
    const trimmed = file.trim();
    if (trimmed === '') {
        return null;
    }
    const remote = location.external && trimmed.startsWith('http');
    const withExtension =
        !remote && location.defaultExtension && !hasExtension(trimmed)
            ? `${trimmed}.${location.defaultExtension}`
            : trimmed;

    let url: string;
    if (!location.external) {
        url = joinUrlPath(ORIGIN_BASE_URL, ...(location.components ?? []), withExtension);
    } else if (remote) {
        url = withExtension;
    } else {
        url = joinUrlPath(ORIGIN_BASE_URL, withExtension);
    }
    return canonicalizeUrl(url);
}

/** Reads an `external` flag stored as a boolean or as 0/1 */
function readFlag(value: JsonValue | undefined): boolean | undefined {
    if (typeof value === 'boolean') return value;
    if (typeof value === 'number') return value === 1;
    return undefined;
}

/** Object entries of a data array, skipping the numeric placeholders */
function objectEntries(value: JsonValue | undefined): Array<[number, JsonObject]> {
    if (!Array.isArray(value)) {
        return [];
    }
    const entries: Array<[number, JsonObject]> = [];
    value.forEach((item, index) => {
        if (isJsonObject(item)) {
            entries.push([index, item]);
        }
    });
    return entries;
}

function siteKey(site: OccurrenceSite): string {
    return JSON.stringify(site);
}

/**
 * Accumulates references by canonical URL.
 */
class ReferenceSet {
    private readonly references = new Map<string, AssetReference>();
    private readonly siteKeys = new Map<string, Set<string>>();

    add(
        url: string,
        role: AssetRole,
        sites: Iterable<OccurrenceSite>,
        defaultExtension?: string,
    ): void {
        let reference = this.references.get(url);
        let keys = this.siteKeys.get(url);
        if (!reference || !keys) {
            reference = { url, role, sites: [] };
            if (defaultExtension) {
                reference.defaultExtension = defaultExtension;
            }
            keys = new Set();
            this.references.set(url, reference);
            this.siteKeys.set(url, keys);
        }
        for (const site of sites) {
            const key = siteKey(site);
            if (!keys.has(key)) {
                keys.add(key);
                reference.sites.push(site);
            }
        }
    }

    toArray(): AssetReference[] {
        return [...this.references.values()];
    }
}

/**
 * Merges reference lists of several cases. Sites are concatenated without
 * duplicates; the first role and default extension seen for a URL win.
 */
export function mergeReferences(lists: Iterable<readonly AssetReference[]>): AssetReference[] {
    const merged = new ReferenceSet();
    for (const list of lists) {
        for (const reference of list) {
            merged.add(reference.url, reference.role, reference.sites, reference.defaultExtension);
        }
    }
    return merged.toArray();
}

// ============================================================================
// USAGE
// ============================================================================

/**
 * Default sprites drawn by the case's frames, as `[base, spriteId]` pairs.
 * Negative sprite ids in the data denote default sprites.
 */
export function findUsedDefaultSprites(
    data: Readonly<JsonObject>,
    onWarning?: (message: string) => void,
): Array<[string, number]> {
    const bases = new Map<number, string>([[0, DEFAULT_PROFILE_BASE]]);
    for (const [, profile] of objectEntries(data.profiles)) {
        const base = readString(profile, 'base');
        if (typeof profile.id === 'number' && base !== undefined) {
            bases.set(profile.id, base);
        }
    }

    const used = new Map<string, [string, number]>();
    for (const [, frame] of objectEntries(data.frames)) {
        for (const [, character] of objectEntries(frame.characters)) {
            const { profile_id: profileId, sprite_id: spriteId } = character;
            if (typeof profileId !== 'number' || typeof spriteId !== 'number' || spriteId >= 0) {
                continue;
            }
            const base = bases.get(profileId);
            if (base === undefined) {
                onWarning?.(`Frame character uses unknown profile ${profileId}`);
                continue;
            }
            used.set(`${base}/${-spriteId}`, [base, -spriteId]);
        }
    }
    return [...used.values()];
}

/**
 * Ids of the default places the case's frames show.
 */
export function findUsedDefaultPlaces(
    data: Readonly<JsonObject>,
    defaultPlaces: Readonly<JsonObject>,
): string[] {
    const used = new Set<string>();
    for (const [, frame] of objectEntries(data.frames)) {
        const place = frame.place;
        if ((typeof place === 'number' || typeof place === 'string') && String(place) in defaultPlaces) {
            used.add(String(place));
        }
    }
    return [...used];
}

/**
 * Most psyche locks any dialogue of the case displays at once.
 */
export function countPsycheLocks(data: Readonly<JsonObject>): number {
    let most = 0;
    for (const [, scene] of objectEntries(data.scenes)) {
        for (const [, dialogue] of objectEntries(scene.dialogues)) {
            const locks = dialogue.locks;
            if (isJsonObject(locks) && Array.isArray(locks.locks_to_display)) {
                most = Math.max(most, locks.locks_to_display.length);
            }
        }
    }
    return most;
}

// ============================================================================
// GRAPH
// ============================================================================

export interface AssetGraphOptions {
    /** Applied to URLs found in template text */
    allowList?: AllowList;
    /** Receives data that is skipped because it is malformed */
    onWarning?: (message: string) => void;
}

type PlaceSite = (path: string, flag?: string) => OccurrenceSite;

/**
 * Builds the deduplicated reference set of a case.
 *
 * @example
 * ```ts
 * const graph = new AssetGraph();
 * const references = graph.enumerate(manifest, template);
 * const all = mergeReferences([references, graph.enumerate(other, template)]);
 * ```
 */
export class AssetGraph {
    readonly allowList: AllowList;

    constructor(private readonly options: AssetGraphOptions = {}) {
        this.allowList = options.allowList ?? new AllowList();
    }

    /**
     * Enumerates every asset of `manifest` rendered with `template`.
     */
    enumerate(manifest: CaseManifest, template: PlayerTemplate): AssetReference[] {
        const set = new ReferenceSet();
        const { data, id: caseId } = manifest;
        const paths = template.sitePaths;

        this.collectProfiles(set, caseId, data, template);
        this.collectEvidence(set, caseId, data, paths);
        this.collectPlaces(set, caseId, data, template);
        this.collectMedia(set, caseId, data, paths);
        this.collectVoices(set, caseId, paths);
        this.collectPsycheLocks(set, caseId, data, paths);
        this.collectTemplateText(set, template, 'player', template.document, 'markup');
        this.collectTemplateText(set, template, 'scripts', template.scripts, 'script');

        return set.toArray();
    }

    private warn(message: string): void {
        if (this.options.onWarning) {
            this.options.onWarning(message);
        } else {
            console.warn(message);
        }
    }

    private addCaseValue(
        set: ReferenceSet,
        caseId: number,
        value: JsonValue | undefined,
        location: AssetLocation,
        role: AssetRole,
        path: string,
        flag?: string,
    ): void {
        if (typeof value !== 'string') {
            return;
        }
        const url = resolveAssetUrl(value, location);
        if (url === null) {
            return;
        }
        const site: OccurrenceSite = { kind: 'case-data', caseId, pointer: path };
        if (flag !== undefined) {
            site.externalFlag = flag;
        }
        set.add(url, role, [site], location.defaultExtension);
    }

    private collectProfiles(
        set: ReferenceSet,
        caseId: number,
        data: Readonly<JsonObject>,
        template: PlayerTemplate,
    ): void {
        const paths = template.sitePaths;

        for (const [i, profile] of objectEntries(data.profiles)) {
            let icon = readString(profile, 'icon') ?? '';
            const base = readString(profile, 'base');
            if (icon.trim() === '' && base !== undefined) {
                // Default icon of the base, addressed like an external path
                icon = `${paths.picture_dir}/${paths.icon_subdir}/${base}.png`;
            }
            this.addCaseValue(
                set,
                caseId,
                icon,
                { external: true, defaultExtension: 'png' },
                'icon',
                pointer('profiles', i, 'icon'),
            );

            for (const [j, custom] of objectEntries(profile.custom_sprites)) {
                for (const status of SPRITE_STATUSES) {
                    this.addCaseValue(
                        set,
                        caseId,
                        custom[status],
                        { external: true, defaultExtension: 'gif' },
                        'sprite',
                        pointer('profiles', i, 'custom_sprites', j, status),
                    );
                }
            }
        }

        for (const [base, spriteId] of findUsedDefaultSprites(data, (m) => this.warn(m))) {
            for (const status of SPRITE_STATUSES) {
                if (
                    status === 'startup' &&
                    !template.defaultData.profilesStartup.has(`${base}/${spriteId}`)
                ) {
                    continue;
                }
                const url = resolveAssetUrl(`${spriteId}.gif`, {
                    components: [paths.picture_dir, spriteSubdir(paths, status), base],
                    external: false,
                    defaultExtension: 'gif',
                });
                if (url !== null) {
                    set.add(
                        url,
                        'sprite',
                        [{ kind: 'default-sprite', caseId, base, spriteId, status }],
                        'gif',
                    );
                }
            }
        }
    }

    private collectEvidence(
        set: ReferenceSet,
        caseId: number,
        data: Readonly<JsonObject>,
        paths: Readonly<SitePaths>,
    ): void {
        for (const [i, evidence] of objectEntries(data.evidence)) {
            const external = evidence.icon_external;
            this.addCaseValue(
                set,
                caseId,
                evidence.icon,
                {
                    components: [paths.picture_dir, paths.evidence_subdir],
                    external: typeof external === 'boolean' ? external : true,
                    defaultExtension: 'png',
                },
                'evidence',
                pointer('evidence', i, 'icon'),
                pointer('evidence', i, 'icon_external'),
            );

            for (const [j, check] of objectEntries(evidence.check_button_data)) {
                if ((readString(check, 'type') ?? 'text') === 'text') {
                    continue;
                }
                this.addCaseValue(
                    set,
                    caseId,
                    check.content,
                    { external: true },
                    'evidence',
                    pointer('evidence', i, 'check_button_data', j, 'content'),
                );
            }
        }
    }

    private collectPlaces(
        set: ReferenceSet,
        caseId: number,
        data: Readonly<JsonObject>,
        template: PlayerTemplate,
    ): void {
        const paths = template.sitePaths;

        for (const [i, place] of objectEntries(data.places)) {
            this.collectPlace(set, place, paths, (path, flag) => {
                const site: OccurrenceSite = {
                    kind: 'case-data',
                    caseId,
                    pointer: pointer('places', i) + path,
                };
                if (flag !== undefined) {
                    site.externalFlag = pointer('places', i) + flag;
                }
                return site;
            });
        }

        const defaultPlaces = template.defaultData.places;
        for (const placeId of findUsedDefaultPlaces(data, defaultPlaces)) {
            const place = defaultPlaces[placeId];
            if (!isJsonObject(place)) {
                continue;
            }
            this.collectPlace(set, place, paths, (path, flag) => {
                const site: OccurrenceSite = {
                    kind: 'default-place',
                    caseId,
                    placeId,
                    pointer: pointer(placeId) + path,
                };
                if (flag !== undefined) {
                    site.externalFlag = pointer(placeId) + flag;
                }
                return site;
            });
        }
    }

    private collectPlace(
        set: ReferenceSet,
        place: JsonObject,
        paths: Readonly<SitePaths>,
        siteFor: PlaceSite,
    ): void {
        const background = place.background;
        // Some default places are a plain colour
        if (isJsonObject(background) && 'image' in background) {
            const external = readFlag(background.external);
            const image = background.image;
            if (external === undefined) {
                this.warn('Place background has no external flag; skipped');
            } else if (typeof image === 'string') {
                const location: AssetLocation = {
                    components: [paths.picture_dir, paths.bg_subdir],
                    external,
                    defaultExtension: 'jpg',
                };
                const url = resolveAssetUrl(image, location);
                if (url !== null) {
                    set.add(
                        url,
                        'background',
                        [siteFor('/background/image', '/background/external')],
                        'jpg',
                    );
                }
            }
        }

        for (const layer of ['background_objects', 'foreground_objects']) {
            for (const [k, object] of objectEntries(place[layer])) {
                if (readFlag(object.external) !== true) {
                    this.warn(`Place object without an external image skipped (${layer})`);
                    continue;
                }
                const image = object.image;
                const url = typeof image === 'string' ? resolveAssetUrl(image, { external: true }) : null;
                if (url !== null) {
                    set.add(url, 'background', [siteFor(pointer(layer, k, 'image'))]);
                }
            }
        }
    }

    private collectMedia(
        set: ReferenceSet,
        caseId: number,
        data: Readonly<JsonObject>,
        paths: Readonly<SitePaths>,
    ): void {
        const kinds: Array<{
            key: string;
            role: AssetRole;
            components: string[];
            defaultExtension: string;
        }> = [
            {
                key: 'popups',
                role: 'popup',
                components: [paths.picture_dir, paths.popups_subdir],
                defaultExtension: 'gif',
            },
            { key: 'music', role: 'music', components: [paths.music_dir], defaultExtension: 'mp3' },
            { key: 'sounds', role: 'sound', components: [paths.sounds_dir], defaultExtension: 'mp3' },
        ];

        for (const { key, role, components, defaultExtension } of kinds) {
            for (const [i, item] of objectEntries(data[key])) {
                const external = readFlag(item.external);
                if (external === undefined) {
                    this.warn(`${key} entry ${i} has no external flag; skipped`);
                    continue;
                }
                this.addCaseValue(
                    set,
                    caseId,
                    item.path,
                    { components, external, defaultExtension },
                    role,
                    pointer(key, i, 'path'),
                    pointer(key, i, 'external'),
                );
            }
        }
    }

    private collectVoices(set: ReferenceSet, caseId: number, paths: Readonly<SitePaths>): void {
        for (const voiceId of VOICE_IDS) {
            for (const extension of VOICE_EXTENSIONS) {
                const url = resolveAssetUrl(`voice_singleblip_${voiceId}.${extension}`, {
                    components: [paths.voices_dir],
                    external: false,
                });
                if (url !== null) {
                    set.add(url, 'voice', [{ kind: 'default-voice', caseId, voiceId, extension }]);
                }
            }
        }
    }

    private collectPsycheLocks(
        set: ReferenceSet,
        caseId: number,
        data: Readonly<JsonObject>,
        paths: Readonly<SitePaths>,
    ): void {
        const count = countPsycheLocks(data);
        if (count === 0) {
            return;
        }
        for (const name of PSYCHE_LOCK_NAMES) {
            const url = resolveAssetUrl(`${name}.gif`, {
                components: [paths.picture_dir, paths.locks_subdir],
                external: false,
            });
            if (url !== null) {
                set.add(url, 'psyche-lock', [{ kind: 'psyche-lock', caseId, name, count }], 'gif');
            }
        }
    }

    private collectTemplateText(
        set: ReferenceSet,
        template: PlayerTemplate,
        document: TemplateDocument,
        text: string,
        role: AssetRole,
    ): void {
        const site: OccurrenceSite = { kind: 'template-text', version: template.version, document };
        for (const [url, kind] of extractAssetUrls(text, this.allowList)) {
            set.add(url, kind === 'css' ? 'stylesheet' : role, [site]);
        }
    }
}

function spriteSubdir(paths: Readonly<SitePaths>, status: SpriteStatus): string {
    switch (status) {
        case 'talking':
            return paths.talking_subdir;
        case 'still':
            return paths.still_subdir;
        case 'startup':
            return paths.startup_subdir;
    }
}
