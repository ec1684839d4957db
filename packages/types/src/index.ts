/**
 * `@trialpack/types`
 *
 * Shared TypeScript types for trialpack packages.
 * This module describes the data that flows through the pipeline: resolved
 * cases, asset references and records, sequence links, bundle outputs and
 * the final run report.
 *
 * @packageDocumentation
 */

// ============================================================================
// JSON
// ============================================================================

/** Any value that survives a `JSON.parse` / `JSON.stringify` round trip. */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

/** A JSON object. */
export type JsonObject = { [key: string]: JsonValue };

// ============================================================================
// CASES
// ============================================================================

/**
 * One entry of a sequence (a multi-part case).
 */
export interface SequenceEntry {
    id: number;
    title: string;
}

/**
 * A named, ordered list of cases published as one story.
 */
export interface CaseSequence {
    title: string;
    list: SequenceEntry[];
}

/**
 * A resolved case. Built once by the resolver, deeply frozen afterwards.
 */
export interface CaseManifest {
    /** Numeric case id on the origin host */
    readonly id: number;
    readonly title: string;
    readonly author: string;
    /** Player language the case was written for */
    readonly language: string;
    readonly sequence: CaseSequence | null;
    /** Ids of cases this case can continue into */
    readonly nextIds: readonly number[];
    /** Raw `trial_information` object as published */
    readonly information: Readonly<JsonObject>;
    /** Raw trial data: profiles, frames, evidence, places, media */
    readonly data: Readonly<JsonObject>;
}

// ============================================================================
// PLAYER TEMPLATE
// ============================================================================

/**
 * Directory layout of the origin host, as published by its bridge script.
 */
export interface SitePaths {
    picture_dir: string;
    icon_subdir: string;
    talking_subdir: string;
    still_subdir: string;
    startup_subdir: string;
    evidence_subdir: string;
    bg_subdir: string;
    defaultplaces_subdir: string;
    popups_subdir: string;
    locks_subdir: string;
    music_dir: string;
    sounds_dir: string;
    voices_dir: string;
    lang_dir: string;
    css_dir: string;
    js_dir: string;
    /** Every other key of the bridge configuration, kept for the player */
    [key: string]: JsonValue;
}

/**
 * Default data shared by every case of a template.
 */
export interface DefaultData {
    /** `"<base>/<sprite id>"` keys of default sprites that have a startup animation */
    profilesStartup: ReadonlySet<string>;
    /** Default places keyed by (negative) place id */
    places: Readonly<JsonObject>;
}

/**
 * The versioned player code every case of a run is rendered with.
 */
export interface PlayerTemplate {
    /** Commit-ish of the template repository */
    readonly version: string;
    readonly sitePaths: Readonly<SitePaths>;
    readonly defaultData: DefaultData;
    /** Player document with stylesheets inlined, PHP blocks still in place */
    readonly document: string;
    /** Combined player scripts, PHP blocks of the trial module still in place */
    readonly scripts: string;
}

// ============================================================================
// ASSETS
// ============================================================================

/**
 * What an asset is used for. Drives default extensions and rewriting.
 */
export type AssetRole =
    | 'sprite'
    | 'icon'
    | 'evidence'
    | 'background'
    | 'popup'
    | 'music'
    | 'sound'
    | 'voice'
    | 'psyche-lock'
    | 'script'
    | 'stylesheet'
    | 'markup';

/** Sprite animation states a character can be drawn in */
export type SpriteStatus = 'talking' | 'still' | 'startup';

/** Template documents scanned for embedded references */
export type TemplateDocument = 'player' | 'scripts';

/**
 * A place where an asset URL occurs and must be rewritten.
 */
export type OccurrenceSite =
    | {
          kind: 'case-data';
          caseId: number;
          /** JSON pointer (RFC 6901) into the case's trial data */
          pointer: string;
          /** Pointer of a flag that must become `true` once the value is local */
          externalFlag?: string;
      }
    | {
          kind: 'default-place';
          caseId: number;
          placeId: string;
          /** JSON pointer into the default places object */
          pointer: string;
          externalFlag?: string;
      }
    | {
          kind: 'default-sprite';
          caseId: number;
          base: string;
          spriteId: number;
          status: SpriteStatus;
      }
    | {
          kind: 'default-voice';
          caseId: number;
          voiceId: number;
          extension: string;
      }
    | {
          kind: 'psyche-lock';
          caseId: number;
          /** Lock animation, e.g. `fg_chains_appear` */
          name: string;
          /** Most locks the case shows at once */
          count: number;
      }
    | {
          kind: 'template-text';
          version: string;
          document: TemplateDocument;
      };

/**
 * A unique asset of a case (or a run), keyed by canonical URL.
 */
export interface AssetReference {
    /** Canonical absolute URL; the deduplication key */
    url: string;
    role: AssetRole;
    /** Extension used when neither the URL nor the payload gives one */
    defaultExtension?: string;
    sites: OccurrenceSite[];
}

/**
 * Error codes for asset failures.
 */
export const AssetErrorCode = {
    NOT_FOUND: 'NOT_FOUND',
    HTTP_ERROR: 'HTTP_ERROR',
    EMPTY_PAYLOAD: 'EMPTY_PAYLOAD',
    NETWORK: 'NETWORK',
    BLOCKED: 'BLOCKED',
} as const;

export type AssetErrorCode =
    (typeof AssetErrorCode)[keyof typeof AssetErrorCode];

/**
 * Plain description of why an asset could not be fetched.
 */
export interface AssetFailure {
    url: string;
    role: AssetRole;
    code: AssetErrorCode;
    message: string;
    status?: number;
}

export type AssetStatus = 'pending' | 'fetched' | 'failed';

/**
 * An asset that was downloaded.
 */
export interface FetchedAssetRecord {
    status: 'fetched';
    url: string;
    role: AssetRole;
    /** URL the payload was actually served from, after redirects */
    finalUrl: string;
    contentType: string;
    /** File name inside the bundle's asset directory */
    localName: string;
    bytes: Uint8Array;
    /** True when a watermark band was cropped off */
    watermarkStripped: boolean;
}

/**
 * An asset that could not be downloaded.
 */
export interface FailedAssetRecord {
    status: 'failed';
    url: string;
    role: AssetRole;
    error: AssetFailure;
}

export type AssetRecord = FetchedAssetRecord | FailedAssetRecord;

/** Records of a run, keyed by canonical URL */
export type AssetRecordIndex = ReadonlyMap<string, AssetRecord>;

// ============================================================================
// SEQUENCES
// ============================================================================

export type SequenceLinkState = 'unlinked' | 'linked';

/**
 * A "continue into case X" edge between two cases.
 */
export interface SequenceLink {
    from: number;
    to: number;
    /** Literal the live player would follow, e.g. `player.php?trial_id=2` */
    trigger: string;
    /** Whether the edge came from the sequence list or a literal URL in case data */
    origin: 'sequence' | 'literal';
    state: SequenceLinkState;
}

// ============================================================================
// OUTPUT
// ============================================================================

export type OutputMode = 'directory' | 'single-file';

/** What to do when a case is missing some of its assets */
export type AssetPolicy = 'fail-fast' | 'best-effort';

/**
 * Extra file holding the bytes of an asset under another name.
 */
export interface AssetCopy {
    url: string;
    localName: string;
}

/**
 * The final shape of one case on disk (or in memory).
 */
export type BundleOutput =
    | {
          mode: 'directory';
          caseId: number;
          /** Directory holding the case */
          directory: string;
          /** Path of the index document */
          indexPath: string;
          document: string;
          /** Asset path relative to `directory` mapped to its record */
          files: ReadonlyMap<string, FetchedAssetRecord>;
          /** URLs the document still points at remotely */
          missing: readonly string[];
      }
    | {
          mode: 'single-file';
          caseId: number;
          path: string;
          document: string;
          missing: readonly string[];
      };

// ============================================================================
// REPORT
// ============================================================================

export type CaseStatus = 'succeeded' | 'partial' | 'failed';

export type RunStatus =
    | 'succeeded'
    | 'succeeded-with-warnings'
    | 'failed'
    | 'cancelled';

/**
 * Outcome of one case of a run.
 */
export interface CaseReport {
    /** Case id, or the raw input when it could not be parsed */
    caseId: number | string;
    title?: string;
    status: CaseStatus;
    /** Where the case was written */
    outputPath?: string;
    /** Number of unique assets the case references */
    assetCount: number;
    /** Assets the case is missing */
    missingAssets: string[];
    /** Set for failed cases */
    error?: string;
}

/**
 * Summary of a whole run.
 */
export interface RunReport {
    status: RunStatus;
    cases: CaseReport[];
    /** One entry per failed asset URL of the run */
    assetFailures: AssetFailure[];
    links: SequenceLink[];
    warnings: string[];
}
