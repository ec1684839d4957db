/**
 * Run report helpers.
 */

import { NetworkError } from '@trialpack/http';
import type { AssetFailure, CaseReport, RunStatus } from '@trialpack/types';

/**
 * Overall status of a run.
 *
 * `failed` when no case was written, `succeeded-with-warnings` when some
 * case failed, lacks assets, or any asset failed, `succeeded` otherwise.
 * Cancellation wins over everything else.
 */
export function runStatus(
    cases: readonly CaseReport[],
    assetFailures: readonly AssetFailure[],
    cancelled: boolean,
): RunStatus {
    if (cancelled) {
        return 'cancelled';
    }
    if (!cases.some((report) => report.status !== 'failed')) {
        return 'failed';
    }
    if (cases.some((report) => report.status !== 'succeeded') || assetFailures.length > 0) {
        return 'succeeded-with-warnings';
    }
    return 'succeeded';
}

/**
 * One-line description of an error for reports.
 */
export function describeError(error: unknown): string {
    if (error instanceof NetworkError) {
        return error.format();
    }
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

/**
 * Report of a case that produced no output.
 */
export function failedCase(
    caseId: number | string,
    error: unknown,
    title?: string,
): CaseReport {
    const report: CaseReport = {
        caseId,
        status: 'failed',
        assetCount: 0,
        missingAssets: [],
        error: describeError(error),
    };
    if (title !== undefined) {
        report.title = title;
    }
    return report;
}
