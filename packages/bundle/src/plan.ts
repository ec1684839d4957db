/**
 * Output layout of a batch.
 */

import { dirname, join } from 'path';
import { ASSET_DIRECTORY } from '@trialpack/rewrite';
import type {
    AssetCopy,
    BundleOutput,
    CaseManifest,
    FetchedAssetRecord,
    OutputMode,
} from '@trialpack/types';
import { sanitizeFilename } from '@trialpack/utils';

/** Name of the document inside a directory-mode output */
export const INDEX_FILE = 'index.html';

/**
 * Document path of every case of a batch.
 *
 * Directory mode puts a case at `<root>/<title>/index.html`, single-file
 * mode at `<root>/<title>.html`. Titles that sanitise to the same name
 * (ignoring case) get ` (<id>)` appended on every case that shares them.
 *
 * @example
 * ```typescript
 * outputPaths([{ id: 7, title: 'Turnabout' }], 'single-file', 'out');
 * // Map { 7 => 'out/Turnabout.html' }
 * ```
 */
export function outputPaths(
    manifests: readonly Pick<CaseManifest, 'id' | 'title'>[],
    mode: OutputMode,
    root: string,
): Map<number, string> {
    const names = manifests.map((manifest) => ({
        id: manifest.id,
        name: sanitizeFilename(manifest.title, `case-${manifest.id}`),
    }));

    const counts = new Map<string, number>();
    for (const { name } of names) {
        const key = name.toLowerCase();
        counts.set(key, (counts.get(key) ?? 0) + 1);
    }

    const paths = new Map<number, string>();
    for (const { id, name } of names) {
        const unique = (counts.get(name.toLowerCase()) ?? 0) > 1 ? `${name} (${id})` : name;
        paths.set(
            id,
            mode === 'directory' ? join(root, unique, INDEX_FILE) : join(root, `${unique}.html`),
        );
    }
    return paths;
}

export interface PlanInput {
    caseId: number;
    /** Document path from {@link outputPaths} */
    path: string;
    document: string;
    /** Fetched records the document refers to */
    records: readonly FetchedAssetRecord[];
    mode: OutputMode;
    /** URLs the document still points at remotely */
    missing: readonly string[];
    /** Extra names of fetched assets, directory mode only */
    copies?: readonly AssetCopy[];
}

/**
 * Lays out one rewritten case. Single-file outputs carry their assets
 * inline, so only directory outputs list files.
 */
export function planBundle(input: PlanInput): BundleOutput {
    if (input.mode === 'single-file') {
        return {
            mode: 'single-file',
            caseId: input.caseId,
            path: input.path,
            document: input.document,
            missing: input.missing,
        };
    }

    const files = new Map<string, FetchedAssetRecord>();
    const byUrl = new Map<string, FetchedAssetRecord>();
    for (const record of input.records) {
        files.set(`${ASSET_DIRECTORY}/${record.localName}`, record);
        byUrl.set(record.url, record);
    }
    for (const copy of input.copies ?? []) {
        const record = byUrl.get(copy.url);
        if (record !== undefined) {
            files.set(`${ASSET_DIRECTORY}/${copy.localName}`, record);
        }
    }
    return {
        mode: 'directory',
        caseId: input.caseId,
        directory: dirname(input.path),
        indexPath: input.path,
        document: input.document,
        files,
        missing: input.missing,
    };
}
