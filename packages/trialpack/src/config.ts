/**
 * Run configuration and its defaults.
 */

import {
    DEFAULT_RETRY_POLICY,
    DEFAULT_TIMEOUT_MS,
    type HttpHandling,
    type RetryPolicy,
} from '@trialpack/http';
import { DEFAULT_FETCH_CONCURRENCY } from '@trialpack/assets';
import { DEFAULT_LANGUAGE, DEFAULT_PLAYER_VERSION } from '@trialpack/resolver';
import type { AssetPolicy } from '@trialpack/types';
import { ConfigError } from './errors.js';

/**
 * - `none`: download the requested cases only
 * - `every`: also download every other case of their sequences
 */
export type SequenceMode = 'none' | 'every';

export const SEQUENCE_MODES: readonly SequenceMode[] = ['none', 'every'];
export const ASSET_POLICIES: readonly AssetPolicy[] = ['fail-fast', 'best-effort'];
export const HTTP_HANDLING_MODES: readonly HttpHandling[] = [
    'redirect-to-https',
    'allow-insecure',
    'disallow',
];

/**
 * Everything a run needs to know besides the cases to download.
 */
export interface RunConfig {
    /** Maximum number of requests in flight across the run */
    concurrency: number;
    /** Player template version used by every case without an override */
    playerVersion: string;
    /** Player template version per case id */
    playerVersions: ReadonlyMap<number, string>;
    /** Language of the player interface */
    language: string;
    /** Write one HTML file per case with every asset inlined */
    singleFile: boolean;
    /** Crop the watermark band off images of watermark hosts */
    removeWatermarks: boolean;
    /** Script snippets appended to every player document */
    userscripts: readonly string[];
    sequence: SequenceMode;
    /** Let Howler stream audio through HTML5 audio elements */
    html5Audio: boolean;
    /** What to do with a case whose assets could not all be fetched */
    assetPolicy: AssetPolicy;
    retry: RetryPolicy;
    /** Per network operation */
    timeoutMs: number;
    httpHandling: HttpHandling;
    /** URL prefix put in front of every request */
    proxy?: string;
    outputRoot: string;
    replaceExisting: boolean;
}

/** What callers pass in; anything left out takes its default */
export type RunConfigInput = Partial<Omit<RunConfig, 'retry'>> & {
    retry?: Partial<RetryPolicy>;
};

export const DEFAULT_RUN_CONFIG: RunConfig = {
    concurrency: DEFAULT_FETCH_CONCURRENCY,
    playerVersion: DEFAULT_PLAYER_VERSION,
    playerVersions: new Map(),
    language: DEFAULT_LANGUAGE,
    singleFile: false,
    removeWatermarks: true,
    userscripts: [],
    sequence: 'none',
    html5Audio: true,
    assetPolicy: 'best-effort',
    retry: DEFAULT_RETRY_POLICY,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    httpHandling: 'redirect-to-https',
    outputRoot: '.',
    replaceExisting: false,
};

/**
 * Merges `input` over the defaults and validates the result.
 *
 * @throws {ConfigError} naming the first invalid field
 *
 * @example
 * ```typescript
 * const config = createRunConfig({ concurrency: 8, singleFile: true });
 * ```
 */
export function createRunConfig(input: RunConfigInput = {}): RunConfig {
    const defaults = DEFAULT_RUN_CONFIG;
    const config: RunConfig = {
        concurrency: input.concurrency ?? defaults.concurrency,
        playerVersion: input.playerVersion ?? defaults.playerVersion,
        playerVersions: input.playerVersions ?? defaults.playerVersions,
        language: input.language ?? defaults.language,
        singleFile: input.singleFile ?? defaults.singleFile,
        removeWatermarks: input.removeWatermarks ?? defaults.removeWatermarks,
        userscripts: input.userscripts ?? defaults.userscripts,
        sequence: input.sequence ?? defaults.sequence,
        html5Audio: input.html5Audio ?? defaults.html5Audio,
        assetPolicy: input.assetPolicy ?? defaults.assetPolicy,
        retry: { ...defaults.retry, ...input.retry },
        timeoutMs: input.timeoutMs ?? defaults.timeoutMs,
        httpHandling: input.httpHandling ?? defaults.httpHandling,
        proxy: input.proxy,
        outputRoot: input.outputRoot ?? defaults.outputRoot,
        replaceExisting: input.replaceExisting ?? defaults.replaceExisting,
    };

    requirePositiveInteger('concurrency', config.concurrency);
    requirePositiveInteger('timeoutMs', config.timeoutMs);
    requirePositiveInteger('retry.maxAttempts', config.retry.maxAttempts);
    if (!(config.retry.baseDelayMs >= 0)) {
        throw new ConfigError('retry.baseDelayMs', 'must not be negative');
    }
    if (!(config.retry.maxDelayMs >= config.retry.baseDelayMs)) {
        throw new ConfigError('retry.maxDelayMs', 'must not be below retry.baseDelayMs');
    }
    if (!(config.retry.jitter >= 0 && config.retry.jitter <= 1)) {
        throw new ConfigError('retry.jitter', 'must be between 0 and 1');
    }

    requireNonEmpty('playerVersion', config.playerVersion);
    for (const [caseId, version] of config.playerVersions) {
        requireNonEmpty(`playerVersions[${caseId}]`, version);
    }
    requireNonEmpty('language', config.language);
    requireNonEmpty('outputRoot', config.outputRoot);

    requireOneOf('sequence', config.sequence, SEQUENCE_MODES);
    requireOneOf('assetPolicy', config.assetPolicy, ASSET_POLICIES);
    requireOneOf('httpHandling', config.httpHandling, HTTP_HANDLING_MODES);

    if (config.proxy !== undefined && !URL.canParse(config.proxy)) {
        throw new ConfigError('proxy', `${config.proxy} is not a URL`);
    }
    return config;
}

function requirePositiveInteger(field: string, value: number): void {
    if (!Number.isInteger(value) || value < 1) {
        throw new ConfigError(field, `expected a positive integer, got ${value}`);
    }
}

function requireNonEmpty(field: string, value: string): void {
    if (value.trim() === '') {
        throw new ConfigError(field, 'must not be empty');
    }
}

function requireOneOf<T extends string>(field: string, value: T, allowed: readonly T[]): void {
    if (!allowed.includes(value)) {
        throw new ConfigError(field, `expected one of ${allowed.join(', ')}, got ${value}`);
    }
}
