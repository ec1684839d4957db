/**
 * Main CLI module for trialpack.
 *
 * Turns the parsed command line into a run, shows its progress with a
 * spinner and prints the final report.
 *
 * @packageDocumentation
 */

import chalk from 'chalk';
import ora from 'ora';
import { ConfigError, runDownload, type RunProgressEvent } from 'trialpack';
import { parseArgs, toRunConfig, type CliOptions } from './cli.js';
import { checkOutputDirectory } from './output-dir.js';
import { exitCode, formatReport } from './report.js';
import { SpinnerRegistry } from './spinner-registry.js';

export { createProgram, parseArgs, toRunConfig, type CliOptions } from './cli.js';
export { checkOutputDirectory, type OutputDirectoryAction } from './output-dir.js';
export { exitCode, formatReport } from './report.js';
export { SpinnerRegistry, type LogLevel } from './spinner-registry.js';

/**
 * Spinner text for a progress event.
 */
export function progressText(event: RunProgressEvent): string {
    switch (event.stage) {
        case 'resolving':
            return `Resolving cases (${event.completed}/${event.total})...`;
        case 'templates':
            return `Loading player templates (${event.completed}/${event.total})...`;
        case 'fetching':
            return `Downloading assets (${event.completed}/${event.total})...`;
        case 'writing':
            return `Writing cases (${event.completed}/${event.total})...`;
    }
}

/**
 * Runs a download for the given CLI options.
 *
 * @param options - CLI options parsed from command line arguments
 * @returns The process exit code
 */
export async function runMain(options: CliOptions): Promise<number> {
    const action = await checkOutputDirectory(options.output, {
        replaceExisting: options.replaceExisting,
    });
    if (action === 'cancel') {
        return 1;
    }

    const controller = new AbortController();
    const registry = new SpinnerRegistry();
    registry.setupSignalHandlers(() => {
        registry.safeLog('Cancelling, press Ctrl+C again to exit immediately', 'warning');
        controller.abort();
    });

    console.log(chalk.bold.cyan('\n  trialpack'));
    console.log(chalk.gray('  ' + '─'.repeat(9)));
    console.log();

    const spinner = ora({ text: 'Resolving cases...', color: 'cyan' }).start();
    registry.register(spinner);

    try {
        const report = await runDownload(options.cases, {
            config: await toRunConfig(options, action === 'replace'),
            signal: controller.signal,
            onProgress: (event) => {
                spinner.text = progressText(event);
            },
            onWarning: (message) => registry.safeLog(message, 'warning'),
            onVerbose: options.verbose
                ? (message) => registry.safeLog(message, 'verbose')
                : undefined,
        });

        if (report.status === 'failed' || report.status === 'cancelled') {
            spinner.fail();
        } else {
            spinner.succeed();
        }
        console.log();
        formatReport(report).forEach((line) => console.log(line));
        return exitCode(report.status);
    } catch (error) {
        spinner.fail();
        if (error instanceof ConfigError) {
            console.error(chalk.red(error.message));
            return 2;
        }
        throw error;
    } finally {
        registry.unregister(spinner);
        registry.cleanup();
    }
}

/**
 * Entry point of the `trialpack` executable.
 */
export async function main(argv: readonly string[] = process.argv): Promise<void> {
    process.exitCode = await runMain(parseArgs(argv));
}
