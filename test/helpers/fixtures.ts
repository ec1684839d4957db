/**
 * Test Fixtures
 *
 * Files served by the in-process stand-ins for the origin host and the
 * template repository, and helpers to render them the way those hosts do.
 */

import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { join, normalize } from 'node:path';

const FIXTURES_DIR = fileURLToPath(new URL('../fixtures/', import.meta.url));

// ============================================================================
// FIXTURE FILES
// ============================================================================

/**
 * Reads a fixture file, or returns null when there is none at `path`.
 *
 * @param path - Path relative to the fixtures directory
 */
export function readFixture(path: string): string | null {
    const file = normalize(join(FIXTURES_DIR, path));
    if (!file.startsWith(FIXTURES_DIR) || !existsSync(file)) {
        return null;
    }
    return readFileSync(file, 'utf-8');
}

/**
 * A case fixture as the origin stores it.
 */
export interface CaseFixture {
    information: Record<string, unknown>;
    data: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Loads `cases/<id>.json`, or returns null for unknown cases.
 */
export function loadCaseFixture(caseId: number | string): CaseFixture | null {
    const text = readFixture(`cases/${caseId}.json`);
    if (text === null) {
        return null;
    }
    const parsed: unknown = JSON.parse(text);
    if (!isRecord(parsed) || !isRecord(parsed.information) || !isRecord(parsed.data)) {
        throw new Error(`Malformed case fixture ${caseId}`);
    }
    return { information: parsed.information, data: parsed.data };
}

// ============================================================================
// RENDERING
// ============================================================================

/** Encodes a value as the body of a `JSON.parse("...")` call */
function embed(value: unknown): string {
    const json = JSON.stringify(value).replaceAll('/', '\\/');
    return JSON.stringify(json).slice(1, -1);
}

/**
 * Renders the trial script the origin serves for a case. Unknown cases get
 * the bare declaration.
 */
export function renderTrialScript(fixture: CaseFixture | null): string {
    if (fixture === null) {
        return 'var trial_information;\n';
    }
    return [
        `var trial_information = JSON.parse("${embed(fixture.information)}");`,
        `var initial_trial_data = JSON.parse("${embed(fixture.data)}");`,
        '',
    ].join('\n');
}

// ============================================================================
// SYNTHETIC ASSETS
// ============================================================================

const CONTENT_TYPES: Record<string, string> = {
    png: 'image/png',
    gif: 'image/gif',
    jpg: 'image/jpeg',
    jpeg: 'image/jpeg',
    mp3: 'audio/mpeg',
    opus: 'audio/ogg',
    wav: 'audio/wav',
};

/**
 * Content type served for a synthetic asset path, or null when the path
 * does not look like media.
 */
export function syntheticContentType(pathname: string): string | null {
    const extension = pathname.split('.').pop()?.toLowerCase() ?? '';
    return CONTENT_TYPES[extension] ?? null;
}

/**
 * Body of a synthetic asset. Unique per path.
 */
export function syntheticAssetBody(pathname: string): string {
    return `asset:${pathname}`;
}
