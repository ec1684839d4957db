/**
 * Rendering of the run report.
 */

import chalk from 'chalk';
import type { CaseReport, RunReport, RunStatus } from '@trialpack/types';

function caseLabel(report: CaseReport): string {
    return report.title !== undefined ? `${report.title} (${report.caseId})` : String(report.caseId);
}

function caseLine(report: CaseReport): string {
    const label = caseLabel(report);
    switch (report.status) {
        case 'succeeded':
            return `  ${chalk.green('✔')} ${label} -> ${report.outputPath ?? ''}`;
        case 'partial':
            return (
                `  ${chalk.yellow('⚠')} ${label} -> ${report.outputPath ?? ''} ` +
                chalk.yellow(`(${report.missingAssets.length} of ${report.assetCount} assets missing)`)
            );
        case 'failed':
            return `  ${chalk.red('✖')} ${label}: ${report.error ?? 'failed'}`;
    }
}

/**
 * Lines printed after a run.
 *
 * @example
 * ```typescript
 * formatReport(report).forEach((line) => console.log(line));
 * ```
 */
export function formatReport(report: RunReport): string[] {
    const written = report.cases.filter((entry) => entry.status !== 'failed').length;
    const lines = [
        chalk.bold(`Downloaded ${written} of ${report.cases.length} case(s)`),
        ...report.cases.map(caseLine),
    ];

    if (report.assetFailures.length > 0) {
        lines.push('', chalk.yellow(`${report.assetFailures.length} asset(s) could not be downloaded:`));
        for (const failure of report.assetFailures) {
            lines.push(chalk.gray(`  - ${failure.url}: ${failure.message}`));
        }
    }

    const unlinked = report.links.filter((link) => link.state === 'unlinked');
    if (unlinked.length > 0) {
        lines.push(
            '',
            chalk.gray(
                `${unlinked.length} sequence link(s) lead to cases outside this download; ` +
                    'use --sequence every to download whole sequences.',
            ),
        );
    }

    switch (report.status) {
        case 'succeeded':
            lines.push(chalk.green('Done.'));
            break;
        case 'succeeded-with-warnings':
            lines.push(chalk.yellow('Done, with warnings.'));
            break;
        case 'failed':
            lines.push(chalk.red('Failed.'));
            break;
        case 'cancelled':
            lines.push(chalk.yellow('Cancelled.'));
            break;
    }
    return lines;
}

/**
 * Process exit code of a run.
 */
export function exitCode(status: RunStatus): number {
    switch (status) {
        case 'succeeded':
        case 'succeeded-with-warnings':
            return 0;
        case 'failed':
            return 1;
        case 'cancelled':
            return 130;
    }
}
