/**
 * Resolution of case ids and URLs into immutable case manifests.
 */

import { NetworkError, type HttpClient } from '@trialpack/http';
import type {
    CaseManifest,
    CaseSequence,
    JsonObject,
    JsonValue,
    SequenceEntry,
} from '@trialpack/types';
import {
    CASE_URL_PATTERN,
    LEGACY_CASE_URL_PATTERN,
    PLAYER_URL_PATTERN,
    TRIAL_DATA_PATTERN,
    TRIAL_INFORMATION_PATTERN,
    trialScriptUrl,
} from './constants.js';
import { ResolutionError, ResolutionErrorCode } from './errors.js';
import { isJsonObject, parseEmbeddedJson } from './js-literal.js';

// ============================================================================
// CASE IDS
// ============================================================================

/**
 * Parses a case id from a bare number, a player URL or a legacy URL.
 *
 * @param input - User input
 * @returns The numeric case id
 * @throws ResolutionError with code `INVALID_INPUT` for anything else
 *
 * @example
 * ```ts
 * parseCaseId('69063'); // 69063
 * parseCaseId(69063); // 69063
 * parseCaseId('https://aaonline.fr/player.php?trial_id=69063'); // 69063
 * parseCaseId('http://aceattorney.sparklin.org/jeu.php?id_proces=1234'); // 1234
 * ```
 */
export function parseCaseId(input: string | number): number {
    let id = NaN;
    if (typeof input === 'number') {
        id = input;
    } else {
        const trimmed = input.trim();
        const digits =
            /^\d+$/.exec(trimmed)?.[0] ??
            CASE_URL_PATTERN.exec(trimmed)?.[1] ??
            LEGACY_CASE_URL_PATTERN.exec(trimmed)?.[1];
        if (digits !== undefined) {
            id = Number(digits);
        }
    }

    if (!Number.isSafeInteger(id) || id <= 0) {
        throw new ResolutionError(
            ResolutionErrorCode.INVALID_INPUT,
            `Not a case id or case URL: ${input}`,
            input,
        );
    }
    return id;
}

// ============================================================================
// TRIAL SCRIPT
// ============================================================================

/**
 * Information and data extracted from a case's trial script.
 */
export interface TrialScript {
    information: JsonObject;
    data: JsonObject;
}

function parseObjectPayload(
    body: string,
    what: string,
    caseId: number,
): JsonObject {
    let value: JsonValue;
    try {
        value = parseEmbeddedJson(body);
    } catch (error) {
        throw new ResolutionError(
            ResolutionErrorCode.PARSE_ERROR,
            `Case ${caseId}: ${what} is not valid JSON`,
            caseId,
            error,
        );
    }
    if (!isJsonObject(value)) {
        throw new ResolutionError(
            ResolutionErrorCode.PARSE_ERROR,
            `Case ${caseId}: ${what} is not an object`,
            caseId,
        );
    }
    return value;
}

/**
 * Extracts the case information and data from the text of a trial script.
 *
 * @param script - Text served by the trial endpoint
 * @param caseId - Case the script belongs to, for error messages
 * @throws ResolutionError `NOT_FOUND` when the script carries no case,
 *   `PARSE_ERROR` when it is malformed
 */
export function parseTrialScript(script: string, caseId: number): TrialScript {
    const informationMatch = TRIAL_INFORMATION_PATTERN.exec(script);
    if (!informationMatch) {
        throw new ResolutionError(
            ResolutionErrorCode.PARSE_ERROR,
            `Case ${caseId}: trial information is missing from the trial script`,
            caseId,
        );
    }
    const informationBody = informationMatch[1];
    if (informationBody === undefined) {
        // `var trial_information;` is what the origin serves for missing or private cases
        throw new ResolutionError(
            ResolutionErrorCode.NOT_FOUND,
            `Case ${caseId} does not exist or is not public`,
            caseId,
        );
    }

    const dataMatch = TRIAL_DATA_PATTERN.exec(script);
    if (!dataMatch) {
        throw new ResolutionError(
            ResolutionErrorCode.PARSE_ERROR,
            `Case ${caseId}: trial data is missing from the trial script`,
            caseId,
        );
    }

    return {
        information: parseObjectPayload(informationBody, 'trial information', caseId),
        data: parseObjectPayload(dataMatch[1], 'trial data', caseId),
    };
}

// ============================================================================
// MANIFEST
// ============================================================================

function stringField(object: JsonObject, key: string, fallback = ''): string {
    const value = object[key];
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    return fallback;
}

function parseSequence(value: JsonValue | undefined): CaseSequence | null {
    if (!isJsonObject(value)) {
        return null;
    }
    const list: SequenceEntry[] = [];
    const rawList = value.list;
    if (Array.isArray(rawList)) {
        for (const entry of rawList) {
            if (!isJsonObject(entry)) continue;
            const id = Number(entry.id);
            if (Number.isSafeInteger(id) && id > 0) {
                list.push({ id, title: stringField(entry, 'title') });
            }
        }
    }
    return { title: stringField(value, 'title'), list };
}

/**
 * Ids of the cases a case can continue into: the entry after it in its
 * sequence, then every case named by a player URL inside its data.
 */
export function findNextIds(
    caseId: number,
    sequence: CaseSequence | null,
    data: JsonObject,
): number[] {
    const next = new Set<number>();
    if (sequence) {
        const index = sequence.list.findIndex((entry) => entry.id === caseId);
        const following = index >= 0 ? sequence.list[index + 1] : undefined;
        if (following) {
            next.add(following.id);
        }
    }
    for (const match of JSON.stringify(data).matchAll(PLAYER_URL_PATTERN)) {
        next.add(Number(match[1]));
    }
    next.delete(caseId);
    return [...next];
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

/**
 * Builds the frozen manifest of a case from its parsed trial script.
 */
export function buildManifest(caseId: number, script: TrialScript): CaseManifest {
    const { information, data } = script;
    const sequence = parseSequence(information.sequence);
    return deepFreeze({
        id: caseId,
        title: stringField(information, 'title', `Case ${caseId}`),
        author: stringField(information, 'author'),
        language: stringField(information, 'language', 'en'),
        sequence,
        nextIds: findNextIds(caseId, sequence, data),
        information,
        data,
    });
}

// ============================================================================
// RESOLVER
// ============================================================================

/**
 * Turns case ids or URLs into case manifests.
 *
 * @example
 * ```ts
 * const resolver = new CaseResolver(client);
 * const manifest = await resolver.resolve('https://aaonline.fr/player.php?trial_id=69063');
 * console.log(manifest.title, manifest.sequence?.list.length);
 * ```
 */
export class CaseResolver {
    constructor(private readonly client: HttpClient) {}

    /**
     * Resolves one case.
     *
     * @param idOrUrl - Case id, or a URL containing one
     * @throws ResolutionError `INVALID_INPUT`, `NOT_FOUND` or `PARSE_ERROR`
     * @throws NetworkError when the origin cannot be reached
     */
    async resolve(idOrUrl: string | number): Promise<CaseManifest> {
        const caseId = parseCaseId(idOrUrl);

        let script: string;
        try {
            script = await this.client.getText(trialScriptUrl(caseId));
        } catch (error) {
            if (error instanceof NetworkError && error.status !== undefined && !error.transient) {
                throw new ResolutionError(
                    ResolutionErrorCode.NOT_FOUND,
                    `Case ${caseId} could not be found (HTTP ${error.status})`,
                    caseId,
                    error,
                );
            }
            throw error;
        }

        return buildManifest(caseId, parseTrialScript(script, caseId));
    }
}
