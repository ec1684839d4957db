/**
 * Rewriting of one case and its player into offline form.
 *
 * Works on clones: the manifest and the template stay untouched, so the
 * same template can render every case of a run.
 */

import { AllowList, replaceAssetUrls } from '@trialpack/assets';
import { DEFAULT_LANGUAGE, DEFAULT_PLACES_PATTERN } from '@trialpack/resolver';
import type {
    AssetCopy,
    AssetRecordIndex,
    AssetReference,
    CaseManifest,
    JsonObject,
    OutputMode,
    PlayerTemplate,
    SequenceLink,
    SpriteStatus,
} from '@trialpack/types';
import { cloneObject, mapStrings, scriptJson, setPointer } from './json.js';
import { ASSET_DIRECTORY, LocalForms } from './local-form.js';
import { playerBlocks, replacePhpBlocks, trialBlocks } from './php-blocks.js';
import { emitRedirect, linkTargets, replaceLiteralLinks } from './sequence.js';

// ============================================================================
// PATTERNS
// ============================================================================

export const VOICE_PATTERN = /function getVoiceUrl\(voice_id,\s*ext\)\s*\{(.*?)\}/s;

export const DEFAULT_SPRITES_PATTERN = /getDefaultSpriteUrl\(base, sprite_id, status\)\s*\{(.*?)\}/s;

/** Endpoints only the live server can answer */
export const LIVE_ENDPOINT_PATTERN =
    /(?:https?:)?\/\/(?:www\.)?(?:aaonline\.fr|aceattorney\.sparklin\.org)\/(?:trial|bridge|default_data)\.js\.php(?:\?[^\s"'`<>\\]*)?/g;

/**
 * Psyche lock image expressions. The `id` query tells lock instances apart
 * online; offline each instance needs a URL of its own.
 */
export const PSYCHE_LOCK_PATTERN =
    /cfg\.picture_dir\s*\+\s*(?:'\/'\s*\+\s*)?cfg\.locks_subdir\s*\+\s*'\/?(\w+)\.gif\?id='\s*\+\s*([A-Za-z_$][\w$.]*)/g;

/** First use of a loaded image's size in the graphic element loader */
export const GRAPHIC_ELEMENT_PATTERN = /graphic_element\.style\.width\s*=\s*img\.width/g;

/** Images that report no size yet get the player's screen size */
export const IMAGE_SIZE_PATCH =
    'if (img.height == 0) img.height = 192; if (img.width == 0) img.width = 256;\n';

const HOWLER_PRELOAD = 'preload: true';

const HTML_END = '</html>';

// ============================================================================
// TYPES
// ============================================================================

export interface RewriteOptions {
    /** Language the player interface is shown in */
    language?: string;
    /** Whether Howler plays through HTML5 audio; directory mode only */
    html5Audio?: boolean;
    /** Script snippets appended to the document */
    userscripts?: readonly string[];
    /** Allow-list used when the references were enumerated */
    allowList?: AllowList;
}

export interface RewriteInput {
    manifest: CaseManifest;
    template: PlayerTemplate;
    /** References of this case, as enumerated for it */
    references: readonly AssetReference[];
    /** Records of the run */
    records: AssetRecordIndex;
    mode: OutputMode;
    /** Sequence edges of the batch */
    links?: readonly SequenceLink[];
    /** Document path of every case of the batch, POSIX style */
    outputs?: ReadonlyMap<number, string>;
    options?: RewriteOptions;
    onWarning?: (message: string) => void;
}

/**
 * A case ready to be bundled.
 */
export interface RewrittenCase {
    caseId: number;
    /** Complete player document */
    document: string;
    /** Rewritten trial data, as embedded in the document */
    data: JsonObject;
    /** Rewritten default places, as embedded in the document */
    defaultPlaces: JsonObject;
    /** Referenced URLs that still point at their remote location */
    missing: readonly string[];
    /** Asset files the document also refers to under other names */
    copies: readonly AssetCopy[];
}

// ============================================================================
// TEXT
// ============================================================================

/**
 * Removes absolute URLs of live endpoints.
 */
export function removeLiveEndpoints(text: string): string {
    return text.replace(LIVE_ENDPOINT_PATTERN, '');
}

/**
 * Rewrites the asset URLs of template text to their local forms and drops
 * live endpoints. Idempotent.
 */
export function rewriteText(text: string, forms: LocalForms, allowList: AllowList): string {
    return removeLiveEndpoints(replaceAssetUrls(text, allowList, (url) => forms.get(url)));
}

/**
 * Rewrites a case's trial data: asset values become local forms with their
 * external flags set, literal player URLs of linked targets become
 * relative links, live endpoints are dropped. Idempotent.
 *
 * @param targets - Hrefs of linked target cases, keyed by case id
 * @returns A rewritten copy of `data`
 */
export function rewriteCaseData(
    data: Readonly<JsonObject>,
    caseId: number,
    references: readonly AssetReference[],
    forms: LocalForms,
    targets: ReadonlyMap<number, string> = new Map(),
    onWarning: (message: string) => void = console.warn,
): JsonObject {
    const copy = cloneObject(data);
    for (const reference of references) {
        const form = forms.get(reference.url);
        if (form === undefined) continue;
        for (const site of reference.sites) {
            if (site.kind !== 'case-data' || site.caseId !== caseId) continue;
            if (!setPointer(copy, site.pointer, form)) {
                onWarning(`Case ${caseId}: no value at ${site.pointer}`);
                continue;
            }
            if (site.externalFlag !== undefined) {
                setPointer(copy, site.externalFlag, true);
            }
        }
    }
    mapStrings(copy, (text) => removeLiveEndpoints(replaceLiteralLinks(text, targets)));
    return copy;
}

/**
 * Rewrites the default places a case shows.
 */
export function rewriteDefaultPlaces(
    places: Readonly<JsonObject>,
    caseId: number,
    references: readonly AssetReference[],
    forms: LocalForms,
): JsonObject {
    const copy = cloneObject(places);
    for (const reference of references) {
        const form = forms.get(reference.url);
        if (form === undefined) continue;
        for (const site of reference.sites) {
            if (site.kind !== 'default-place' || site.caseId !== caseId) continue;
            if (setPointer(copy, site.pointer, form) && site.externalFlag !== undefined) {
                setPointer(copy, site.externalFlag, true);
            }
        }
    }
    return copy;
}

/**
 * Replaces the body of the function `pattern` finds.
 *
 * @returns null when the function is absent
 */
function replaceFunctionBody(text: string, pattern: RegExp, body: string): string | null {
    const match = pattern.exec(text);
    if (!match) {
        return null;
    }
    const [whole, oldBody] = match;
    const head = whole.slice(0, whole.length - oldBody.length - 1);
    return (
        text.slice(0, match.index) + head + body + '}' + text.slice(match.index + whole.length)
    );
}

/**
 * Body of `getVoiceUrl` returning the case's default voice blips.
 */
export function voiceLookup(
    caseId: number,
    references: readonly AssetReference[],
    forms: LocalForms,
): string {
    let body = '\n';
    for (const reference of references) {
        const form = forms.get(reference.url);
        if (form === undefined) continue;
        for (const site of reference.sites) {
            if (site.kind !== 'default-voice' || site.caseId !== caseId) continue;
            body += `\tif (-voice_id === ${site.voiceId} && ext === '${site.extension}') return ${JSON.stringify(form)};\n`;
        }
    }
    return `${body}\treturn '';\n`;
}

/**
 * Body of `getDefaultSpriteUrl` returning the case's default sprites.
 */
export function spriteLookup(
    caseId: number,
    references: readonly AssetReference[],
    forms: LocalForms,
): string {
    const lines: Array<{ base: string; spriteId: number; status: SpriteStatus; form: string }> = [];
    for (const reference of references) {
        const form = forms.get(reference.url);
        if (form === undefined) continue;
        for (const site of reference.sites) {
            if (site.kind !== 'default-sprite' || site.caseId !== caseId) continue;
            lines.push({ base: site.base, spriteId: site.spriteId, status: site.status, form });
        }
    }
    let body = '\n';
    for (const { base, spriteId, status, form } of lines) {
        body += `\tif (base === ${JSON.stringify(base)} && sprite_id === ${spriteId} && status === '${status}') return ${JSON.stringify(form)};\n`;
    }
    return `${body}\treturn '';\n`;
}

/**
 * Splits a file name before its last extension.
 */
function splitExtension(fileName: string): [string, string] {
    const dot = fileName.lastIndexOf('.');
    return dot > 0 ? [fileName.slice(0, dot), fileName.slice(dot)] : [fileName, ''];
}

interface PsycheLockForm {
    url: string;
    form: string;
    count: number;
}

/**
 * Rewrites psyche lock expressions to per-instance local forms.
 *
 * Directory mode points instance `n` at its own copy `<stem>_<n>.<ext>`;
 * single-file mode adds a `lock` parameter to the `data:` URI. Without
 * locks in the case the expressions become `''`; failed locks keep their
 * remote URL.
 *
 * @returns The text and the copies directory mode needs
 */
export function rewritePsycheLocks(
    text: string,
    caseId: number,
    references: readonly AssetReference[],
    forms: LocalForms,
    warn: (message: string) => void,
): { text: string; copies: AssetCopy[] } {
    const locks = new Map<string, PsycheLockForm>();
    for (const reference of references) {
        const form = forms.get(reference.url);
        if (form === undefined) continue;
        for (const site of reference.sites) {
            if (site.kind === 'psyche-lock' && site.caseId === caseId) {
                locks.set(site.name, { url: reference.url, form, count: site.count });
            }
        }
    }

    const copies = new Map<string, AssetCopy>();
    const rewritten = text.replace(PSYCHE_LOCK_PATTERN, (match: string, name: string, id: string) => {
        if (locks.size === 0) {
            return "''";
        }
        const lock = locks.get(name);
        if (lock === undefined) {
            warn(`Unknown psyche lock ${name} stays remote`);
            return match;
        }
        if (!forms.isLocal(lock.url)) {
            return `${JSON.stringify(`${lock.url}?id=`)} + ${id}`;
        }
        if (forms.mode === 'single-file') {
            const separator = lock.form.indexOf(';');
            return (
                `${JSON.stringify(`${lock.form.slice(0, separator)};lock=`)} + ${id} + ` +
                JSON.stringify(lock.form.slice(separator))
            );
        }
        const [stem, extension] = splitExtension(lock.form);
        for (let index = 1; index <= lock.count; index++) {
            const localName = `${stem.slice(ASSET_DIRECTORY.length + 1)}_${index}${extension}`;
            copies.set(localName, { url: lock.url, localName });
        }
        return `${JSON.stringify(`${stem}_`)} + ${id} + ${JSON.stringify(extension)}`;
    });
    return { text: rewritten, copies: [...copies.values()] };
}

/**
 * Makes the graphic element loader treat images without a size as full
 * screen ones. Idempotent.
 */
export function patchImageSize(scripts: string, warn: (message: string) => void): string {
    let found = false;
    const patched = scripts.replace(
        GRAPHIC_ELEMENT_PATTERN,
        (match: string, offset: number, whole: string) => {
            found = true;
            return whole.endsWith(IMAGE_SIZE_PATCH, offset) ? match : IMAGE_SIZE_PATCH + match;
        },
    );
    if (!found) {
        warn('Image handling code not found in player scripts; sprites may show late');
    }
    return patched;
}

// ============================================================================
// CASE
// ============================================================================

/**
 * Produces the complete offline document of one case.
 *
 * @throws RewriteError when the template's PHP blocks cannot be filled
 *
 * @example
 * ```ts
 * const rewritten = rewriteCase({ manifest, template, references, records, mode: 'directory' });
 * await writeFile('index.html', rewritten.document);
 * ```
 */
export function rewriteCase(input: RewriteInput): RewrittenCase {
    const { manifest, template, references, records, mode } = input;
    const options = input.options ?? {};
    const allowList = options.allowList ?? new AllowList();
    const links = input.links ?? [];
    const outputs = input.outputs ?? new Map<number, string>();
    const warn = (message: string): void => {
        if (input.onWarning) {
            input.onWarning(message);
        } else {
            console.warn(message);
        }
    };
    const caseId = manifest.id;
    const forms = new LocalForms(references, records, mode);

    const data = rewriteCaseData(
        manifest.data,
        caseId,
        references,
        forms,
        linkTargets(caseId, links, outputs),
        warn,
    );
    const defaultPlaces = rewriteDefaultPlaces(
        template.defaultData.places,
        caseId,
        references,
        forms,
    );

    let scripts = rewriteText(template.scripts, forms, allowList);

    if (DEFAULT_PLACES_PATTERN.test(scripts)) {
        scripts = scripts.replace(
            DEFAULT_PLACES_PATTERN,
            () => `var default_places = ${scriptJson(defaultPlaces)};`,
        );
    } else {
        warn('Default places not found in player scripts');
    }

    scripts =
        replaceFunctionBody(scripts, VOICE_PATTERN, voiceLookup(caseId, references, forms)) ??
        warnAndKeep(scripts, 'getVoiceUrl not found in player scripts; voices stay remote', warn);
    scripts =
        replaceFunctionBody(
            scripts,
            DEFAULT_SPRITES_PATTERN,
            spriteLookup(caseId, references, forms),
        ) ??
        warnAndKeep(
            scripts,
            'getDefaultSpriteUrl not found in player scripts; default sprites stay remote',
            warn,
        );

    const locks = rewritePsycheLocks(scripts, caseId, references, forms, warn);
    scripts = patchImageSize(locks.text, warn);
    scripts = configureHowler(scripts, mode, options.html5Audio, warn);
    scripts = emitRedirect(scripts, caseId, links, outputs);

    const payload =
        `var trial_information = ${scriptJson(cloneObject(manifest.information))};\n` +
        `var initial_trial_data = ${scriptJson(data)};\n`;
    scripts = replacePhpBlocks(scripts, trialBlocks(payload), warn);

    let document = rewriteText(template.document, forms, allowList);
    document = replacePhpBlocks(
        document,
        playerBlocks({
            language: options.language ?? DEFAULT_LANGUAGE,
            scripts,
            title: manifest.title,
        }),
        warn,
    );
    document = appendUserscripts(document, options.userscripts ?? []);

    return {
        caseId,
        document,
        data,
        defaultPlaces,
        missing: forms.missing,
        copies: locks.copies,
    };
}

function warnAndKeep(text: string, message: string, warn: (message: string) => void): string {
    warn(message);
    return text;
}

/**
 * Turns Howler's HTML5 audio on or off in directory mode.
 */
export function configureHowler(
    scripts: string,
    mode: OutputMode,
    html5Audio: boolean | undefined,
    warn: (message: string) => void,
): string {
    if (mode === 'single-file') {
        if (html5Audio === false) {
            warn('The HTML5 audio setting has no effect on single-file output');
        }
        return scripts;
    }
    const position = scripts.indexOf(HOWLER_PRELOAD);
    if (position < 0) {
        warn('Howler preload option not found; HTML5 audio setting ignored');
        return scripts;
    }
    const end = position + HOWLER_PRELOAD.length;
    if (scripts.startsWith(', html5:', end)) {
        return scripts;
    }
    return `${scripts.slice(0, end)}, html5: ${html5Audio ?? true}${scripts.slice(end)}`;
}

/**
 * Appends userscripts verbatim before the closing `</html>`.
 */
export function appendUserscripts(document: string, userscripts: readonly string[]): string {
    if (userscripts.length === 0) {
        return document;
    }
    const block = `<script type="text/javascript">${userscripts.join('\n\n')}</script>\n`;
    const end = document.lastIndexOf(HTML_END);
    if (end < 0) {
        return document + block;
    }
    return document.slice(0, end) + block + document.slice(end);
}
