/**
 * Pipeline of a download run: resolve, load templates, enumerate, fetch,
 * link, rewrite and bundle.
 */

import {
    AssetGraph,
    Fetcher,
    WatermarkStripper,
    collectRecords,
    mergeReferences,
    watermarkHeaderRule,
    type FetchProgressEvent,
} from '@trialpack/assets';
import {
    BundleError,
    BundleErrorCode,
    FsBundleWriter,
    outputPaths,
    planBundle,
    writeBundle,
    type BundleWriter,
} from '@trialpack/bundle';
import { HttpClient } from '@trialpack/http';
import { CaseResolver, TemplateLoader, parseCaseId } from '@trialpack/resolver';
import { detectLinks, linkBatch, rewriteCase } from '@trialpack/rewrite';
import type {
    AssetFailure,
    AssetRecordIndex,
    AssetReference,
    CaseManifest,
    CaseReport,
    FetchedAssetRecord,
    PlayerTemplate,
    RunReport,
    SequenceLink,
} from '@trialpack/types';
import { isAbortError, toPosixPath } from '@trialpack/utils';
import { createRunConfig, type RunConfig, type RunConfigInput } from './config.js';
import { failedCase, runStatus } from './report.js';

// ============================================================================
// TYPES
// ============================================================================

export type RunProgressEvent =
    | { stage: 'resolving'; completed: number; total: number }
    | { stage: 'templates'; completed: number; total: number }
    | ({ stage: 'fetching' } & FetchProgressEvent)
    | { stage: 'writing'; caseId: number; completed: number; total: number };

export interface RunOptions {
    config?: RunConfigInput;
    /** Default: the filesystem */
    writer?: BundleWriter;
    /** Aborts every request of the run and stops writing */
    signal?: AbortSignal;
    /** Replaces the global `fetch` */
    fetch?: typeof fetch;
    onProgress?: (event: RunProgressEvent) => void;
    onWarning?: (message: string) => void;
    onVerbose?: (message: string) => void;
}

interface ReadyCase {
    manifest: CaseManifest;
    template: PlayerTemplate;
    references: AssetReference[];
}

interface RunContext {
    config: RunConfig;
    signal?: AbortSignal;
    warn: (message: string) => void;
    verbose: (message: string) => void;
    progress: (event: RunProgressEvent) => void;
}

/** Raw input or case id, in request order */
type CaseKey = number | string;

// ============================================================================
// RUN
// ============================================================================

/**
 * Downloads cases and writes their offline copies.
 *
 * Per-case failures never abort the run; they end up in the report. Only
 * an invalid configuration throws.
 *
 * @param inputs - Case ids or player URLs
 *
 * @throws {ConfigError} when `options.config` is invalid
 *
 * @example
 * ```typescript
 * const report = await runDownload(['https://aaonline.fr/player.php?trial_id=1001'], {
 *     config: { sequence: 'every', outputRoot: 'cases' },
 *     onWarning: (message) => console.warn(message),
 * });
 * console.log(report.status);
 * ```
 */
export async function runDownload(
    inputs: readonly (string | number)[],
    options: RunOptions = {},
): Promise<RunReport> {
    const config = createRunConfig(options.config);
    const warnings: string[] = [];
    const context: RunContext = {
        config,
        signal: options.signal,
        warn: (message) => {
            warnings.push(message);
            options.onWarning?.(message);
        },
        verbose: (message) => options.onVerbose?.(message),
        progress: (event) => options.onProgress?.(event),
    };
    const writer = options.writer ?? new FsBundleWriter();

    const client = new HttpClient({
        retry: config.retry,
        timeoutMs: config.timeoutMs,
        concurrency: config.concurrency,
        httpHandling: config.httpHandling,
        proxy: config.proxy,
        headerRules: [watermarkHeaderRule()],
        signal: options.signal,
        fetch: options.fetch,
        onRetry: (event) =>
            context.verbose(
                `Retrying ${event.url} in ${event.delayMs} ms (attempt ${event.attempt}): ${event.reason}`,
            ),
    });

    const order: CaseKey[] = [];
    const reports = new Map<CaseKey, CaseReport>();
    let assetFailures: AssetFailure[] = [];
    let links: SequenceLink[] = [];

    const finish = (): RunReport => {
        const cancelled = options.signal?.aborted ?? false;
        const cases = order.map(
            (key) => reports.get(key) ?? failedCase(key, new Error('Run cancelled')),
        );
        return {
            status: runStatus(cases, assetFailures, cancelled),
            cases,
            assetFailures,
            links,
            warnings,
        };
    };

    // Resolution
    const manifests = await resolveBatch(new CaseResolver(client), inputs, context, order, reports);
    if (options.signal?.aborted) {
        return finish();
    }

    // Templates
    const loader = new TemplateLoader(client, {
        language: config.language,
        onWarning: context.warn,
        onVerbose: context.verbose,
    });
    const graph = new AssetGraph({ onWarning: context.warn });
    const ready: ReadyCase[] = [];
    let loaded = 0;
    const templates = await Promise.allSettled(
        manifests.map((manifest) =>
            loader
                .load(config.playerVersions.get(manifest.id) ?? config.playerVersion)
                .finally(() => {
                    loaded += 1;
                    context.progress({ stage: 'templates', completed: loaded, total: manifests.length });
                }),
        ),
    );
    if (options.signal?.aborted) {
        return finish();
    }
    templates.forEach((result, index) => {
        const manifest = manifests[index];
        if (manifest === undefined) {
            return;
        }
        if (result.status === 'rejected') {
            reports.set(manifest.id, failedCase(manifest.id, result.reason, manifest.title));
            return;
        }
        ready.push({
            manifest,
            template: result.value,
            references: graph.enumerate(manifest, result.value),
        });
    });

    // Fetching
    const merged = mergeReferences(ready.map((item) => item.references));
    context.verbose(`Fetching ${merged.length} unique asset(s) for ${ready.length} case(s)`);
    const fetcher = new Fetcher({
        client,
        concurrency: config.concurrency,
        watermark: config.removeWatermarks ? new WatermarkStripper({ onWarning: context.warn }) : null,
        onProgress: (event) => context.progress({ stage: 'fetching', ...event }),
        onWarning: context.warn,
    });
    let records: AssetRecordIndex;
    try {
        records = await collectRecords(fetcher.fetchAll(merged));
    } catch (error) {
        if (isAbortError(error) || options.signal?.aborted) {
            return finish();
        }
        throw error;
    }
    assetFailures = [...records.values()].flatMap((record) =>
        record.status === 'failed' ? [record.error] : [],
    );

    // Linking
    const detected = detectLinks(manifests);
    for (const error of detected.errors) {
        context.warn(error.message);
    }
    links = linkBatch(
        detected.links,
        ready.map((item) => item.manifest.id),
    );

    // Rewriting and bundling
    const mode = config.singleFile ? 'single-file' : 'directory';
    const paths = outputPaths(
        ready.map((item) => item.manifest),
        mode,
        config.outputRoot,
    );
    const posixPaths = new Map<number, string>();
    for (const [caseId, path] of paths) {
        posixPaths.set(caseId, toPosixPath(path));
    }

    let written = 0;
    for (const item of ready) {
        if (options.signal?.aborted) {
            break;
        }
        const { manifest } = item;
        const path = paths.get(manifest.id);
        if (path === undefined) {
            continue;
        }
        try {
            const rewritten = rewriteCase({
                manifest,
                template: item.template,
                references: item.references,
                records,
                mode,
                links,
                outputs: posixPaths,
                options: {
                    language: config.language,
                    html5Audio: config.html5Audio,
                    userscripts: config.userscripts,
                },
                onWarning: context.warn,
            });
            const output = planBundle({
                caseId: manifest.id,
                path,
                document: rewritten.document,
                records: fetchedRecords(item.references, records),
                mode,
                missing: rewritten.missing,
                copies: rewritten.copies,
            });
            const outputPath = await writeBundle(output, writer, {
                policy: config.assetPolicy,
                replaceExisting: config.replaceExisting,
                signal: options.signal,
                onWarning: context.warn,
            });
            reports.set(manifest.id, {
                caseId: manifest.id,
                title: manifest.title,
                status: rewritten.missing.length > 0 ? 'partial' : 'succeeded',
                outputPath,
                assetCount: item.references.length,
                missingAssets: [...rewritten.missing],
            });
            context.verbose(`Wrote case ${manifest.id} to ${outputPath}`);
        } catch (error) {
            const report = failedCase(manifest.id, error, manifest.title);
            report.assetCount = item.references.length;
            if (error instanceof BundleError) {
                report.missingAssets = [...error.missing];
            }
            reports.set(manifest.id, report);
            if (error instanceof BundleError && error.code === BundleErrorCode.CANCELLED) {
                break;
            }
        }
        written += 1;
        context.progress({
            stage: 'writing',
            caseId: manifest.id,
            completed: written,
            total: ready.length,
        });
    }

    return finish();
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Resolves the requested cases concurrently. Under `every`, the other
 * cases of each resolved sequence are resolved too, until no new id turns
 * up. Unresolvable inputs are reported, never thrown.
 */
async function resolveBatch(
    resolver: CaseResolver,
    inputs: readonly (string | number)[],
    context: RunContext,
    order: CaseKey[],
    reports: Map<CaseKey, CaseReport>,
): Promise<CaseManifest[]> {
    const manifests: CaseManifest[] = [];
    const seen = new Set<number>();
    let pending: number[] = [];

    for (const input of inputs) {
        let caseId: number;
        try {
            caseId = parseCaseId(input);
        } catch (error) {
            order.push(input);
            reports.set(input, failedCase(input, error));
            continue;
        }
        if (!seen.has(caseId)) {
            seen.add(caseId);
            order.push(caseId);
            pending.push(caseId);
        }
    }

    let completed = 0;
    let total = pending.length;
    while (pending.length > 0) {
        const results = await Promise.allSettled(
            pending.map((caseId) =>
                resolver.resolve(caseId).finally(() => {
                    completed += 1;
                    context.progress({ stage: 'resolving', completed, total });
                }),
            ),
        );
        if (context.signal?.aborted) {
            return manifests;
        }

        const next: number[] = [];
        results.forEach((result, index) => {
            const caseId = pending[index];
            if (caseId === undefined) {
                return;
            }
            if (result.status === 'rejected') {
                reports.set(caseId, failedCase(caseId, result.reason));
                return;
            }
            const manifest = result.value;
            manifests.push(manifest);
            context.verbose(`Resolved case ${manifest.id}: ${manifest.title}`);
            if (context.config.sequence !== 'every' || manifest.sequence === null) {
                return;
            }
            for (const entry of manifest.sequence.list) {
                if (!seen.has(entry.id)) {
                    seen.add(entry.id);
                    order.push(entry.id);
                    next.push(entry.id);
                }
            }
        });
        if (next.length > 0) {
            context.verbose(`Adding ${next.length} case(s) of the same sequence`);
        }
        total += next.length;
        pending = next;
    }
    return manifests;
}

function fetchedRecords(
    references: readonly AssetReference[],
    records: AssetRecordIndex,
): FetchedAssetRecord[] {
    return references
        .map((reference) => records.get(reference.url))
        .filter((record): record is FetchedAssetRecord => record?.status === 'fetched');
}
