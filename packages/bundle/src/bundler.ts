/**
 * Writes planned outputs through a staging path.
 */

import { dirname, join, relative } from 'path';
import type { AssetPolicy, BundleOutput } from '@trialpack/types';
import { isAbortError } from '@trialpack/utils';
import { BundleError, BundleErrorCode } from './errors.js';
import type { BundleWriter } from './writer.js';

/** Suffix of the path an output is written to before it is moved into place */
export const STAGING_SUFFIX = '.partial';

export interface WriteBundleOptions {
    /** Default: `fail-fast` */
    policy?: AssetPolicy;
    /** Replace an output already at the target path */
    replaceExisting?: boolean;
    signal?: AbortSignal;
    onWarning?: (message: string) => void;
}

/**
 * Writes `output` and returns the path of its document.
 *
 * Everything goes to `<target>.partial` first and is renamed into place
 * once complete. A failed or cancelled write leaves neither the staging
 * path nor a half-written target behind.
 *
 * @throws {BundleError} `MISSING_ASSETS` under fail-fast, `OUTPUT_EXISTS`,
 * `CANCELLED` or `WRITE_FAILED`
 */
export async function writeBundle(
    output: BundleOutput,
    writer: BundleWriter,
    options: WriteBundleOptions = {},
): Promise<string> {
    const { policy = 'fail-fast', replaceExisting = false, signal } = options;
    const warn = options.onWarning ?? console.warn;

    if (output.missing.length > 0) {
        if (policy === 'fail-fast') {
            throw new BundleError(
                BundleErrorCode.MISSING_ASSETS,
                `Case ${output.caseId} is missing ${output.missing.length} asset(s): ${output.missing.join(', ')}`,
                output.caseId,
                output.missing,
            );
        }
        for (const url of output.missing) {
            warn(`Case ${output.caseId}: ${url} kept as a remote URL`);
        }
    }

    const target = output.mode === 'directory' ? output.directory : output.path;
    const documentPath = output.mode === 'directory' ? output.indexPath : output.path;
    if (!replaceExisting && (await writer.exists(target))) {
        throw new BundleError(
            BundleErrorCode.OUTPUT_EXISTS,
            `${target} already exists`,
            output.caseId,
        );
    }

    const staging = `${target}${STAGING_SUFFIX}`;
    try {
        await writer.remove(staging);
        checkCancelled(output.caseId, signal);

        if (output.mode === 'directory') {
            await writer.mkdir(staging);
            const directories = new Set<string>();
            for (const file of output.files.keys()) {
                directories.add(dirname(join(staging, file)));
            }
            for (const directory of directories) {
                await writer.mkdir(directory);
            }
            await writer.writeFile(
                join(staging, relative(output.directory, output.indexPath)),
                output.document,
            );
            for (const [file, record] of output.files) {
                checkCancelled(output.caseId, signal);
                await writer.writeFile(join(staging, file), record.bytes);
            }
        } else {
            await writer.mkdir(dirname(staging));
            await writer.writeFile(staging, output.document);
        }

        checkCancelled(output.caseId, signal);
        if (replaceExisting) {
            await writer.remove(target);
        }
        await writer.rename(staging, target);
    } catch (error) {
        await writer.remove(staging);
        if (error instanceof BundleError) {
            throw error;
        }
        if (isAbortError(error)) {
            throw new BundleError(
                BundleErrorCode.CANCELLED,
                `Writing case ${output.caseId} was cancelled`,
                output.caseId,
                [],
                error,
            );
        }
        throw new BundleError(
            BundleErrorCode.WRITE_FAILED,
            `Failed to write ${target}: ${error instanceof Error ? error.message : String(error)}`,
            output.caseId,
            [],
            error,
        );
    }
    return documentPath;
}

function checkCancelled(caseId: number, signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
        throw new BundleError(
            BundleErrorCode.CANCELLED,
            `Writing case ${caseId} was cancelled`,
            caseId,
        );
    }
}
