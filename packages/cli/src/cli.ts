/**
 * Command line argument parsing and CLI setup for trialpack.
 *
 * This module defines the command and its options using commander.js and
 * maps the parsed options onto a run configuration.
 */

import { readFile } from 'fs/promises';
import { Command, InvalidArgumentError, Option } from 'commander';
import {
    ASSET_POLICIES,
    HTTP_HANDLING_MODES,
    SEQUENCE_MODES,
    type RunConfigInput,
    type SequenceMode,
} from 'trialpack';
import type { HttpHandling } from '@trialpack/http';
import type { AssetPolicy } from '@trialpack/types';
import { VERSION } from '@trialpack/utils';

/**
 * Options of the `trialpack` command.
 */
export interface CliOptions {
    /** Case URLs or ids, as given */
    cases: string[];
    /** Directory the cases are written to */
    output: string;
    /** Player template version */
    playerVersion: string;
    /** Player interface language */
    language: string;
    /** Number of concurrent downloads */
    concurrency: number;
    /** Retries after the first attempt of a request */
    retries: number;
    /** Per-request timeout in milliseconds */
    timeout: number;
    sequence: SequenceMode;
    /** Write one HTML file per case */
    singleFile: boolean;
    assetPolicy: AssetPolicy;
    replaceExisting: boolean;
    httpHandling: HttpHandling;
    proxy?: string;
    html5Audio: boolean;
    removeWatermarks: boolean;
    /** Files whose contents are appended to every player */
    userscripts: string[];
    /** Enable verbose logging */
    verbose: boolean;
}

/** What commander hands back before normalisation */
type ParsedOptions = {
    output: string;
    playerVersion: string;
    language: string;
    concurrency: number;
    retries: number;
    timeout: number;
    sequence: SequenceMode;
    singleFile: boolean;
    assetPolicy: AssetPolicy;
    replaceExisting: boolean;
    httpHandling: HttpHandling;
    proxy?: string;
    html5Audio: boolean;
    removeWatermarks: boolean;
    userscript?: string[];
    verbose: boolean;
};

/**
 * Parses a non-negative integer option value.
 */
function parseCount(value: string): number {
    const parsed = Number(value);
    if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed)) {
        throw new InvalidArgumentError('Expected a whole number.');
    }
    return parsed;
}

/**
 * Parses a positive integer option value.
 */
function parsePositive(value: string): number {
    const parsed = parseCount(value);
    if (parsed < 1) {
        throw new InvalidArgumentError('Expected a number above zero.');
    }
    return parsed;
}

/**
 * Builds the commander program. Exposed so tests can parse without
 * touching `process.argv`.
 */
export function createProgram(): Command {
    return new Command()
        .name('trialpack')
        .description(
            'Download Ace Attorney Online cases so they can be played offline. ' +
                'Pass the player URL of a case (https://aaonline.fr/player.php?trial_id=ID) or just its id.',
        )
        .version(VERSION)
        .argument('<cases...>', 'Case URLs or ids')
        .option('-o, --output <dir>', 'Directory the cases are written to', '.')
        .option('-p, --player-version <version>', 'Branch or commit of the player to use', 'master')
        .option('-l, --language <code>', 'Language of the player interface', 'en')
        .option('-j, --concurrency <number>', 'Number of concurrent downloads', parsePositive, 5)
        .option('--retries <number>', 'Retries after a failed request', parseCount, 3)
        .option('--timeout <ms>', 'Timeout of a single request in ms', parsePositive, 30_000)
        .addOption(
            new Option('-s, --sequence <mode>', 'Also download the other cases of a sequence')
                .choices(SEQUENCE_MODES)
                .default('none'),
        )
        .option('-1, --single-file', 'Write one HTML file per case with every asset inlined', false)
        .addOption(
            new Option('--asset-policy <policy>', 'What to do when assets cannot be downloaded')
                .choices(ASSET_POLICIES)
                .default('best-effort'),
        )
        .option('-r, --replace-existing', 'Replace cases that were downloaded before', false)
        .addOption(
            new Option('--http-handling <mode>', 'How to treat insecure http: asset URLs')
                .choices(HTTP_HANDLING_MODES)
                .default('redirect-to-https'),
        )
        .option('--proxy <url>', 'URL prefix put in front of every request')
        .option('--no-html5-audio', 'Do not let Howler play audio through HTML5 audio elements')
        .option('--no-remove-watermarks', 'Keep watermarks on images of watermark hosts')
        .option('-u, --userscript <files...>', 'Script files appended to every player')
        .option('-v, --verbose', 'Enable verbose logging', false);
}

/**
 * Parses command line arguments.
 *
 * @param argv - Full argument vector, including the node executable and script
 *
 * @example
 * ```typescript
 * const options = parseArgs(['node', 'trialpack', '69063', '-1']);
 * options.singleFile; // true
 * ```
 */
export function parseArgs(argv: readonly string[] = process.argv): CliOptions {
    const program = createProgram();
    program.parse([...argv]);

    const options = program.opts<ParsedOptions>();
    return {
        cases: program.args,
        output: options.output,
        playerVersion: options.playerVersion,
        language: options.language,
        concurrency: options.concurrency,
        retries: options.retries,
        timeout: options.timeout,
        sequence: options.sequence,
        singleFile: options.singleFile,
        assetPolicy: options.assetPolicy,
        replaceExisting: options.replaceExisting,
        httpHandling: options.httpHandling,
        proxy: options.proxy,
        html5Audio: options.html5Audio,
        removeWatermarks: options.removeWatermarks,
        userscripts: options.userscript ?? [],
        verbose: options.verbose,
    };
}

/**
 * Maps CLI options onto a run configuration, reading userscript files.
 *
 * @param replaceExisting - Overrides `options.replaceExisting`, e.g. after a prompt
 */
export async function toRunConfig(
    options: CliOptions,
    replaceExisting = options.replaceExisting,
): Promise<RunConfigInput> {
    const userscripts = await Promise.all(
        options.userscripts.map((file) => readFile(file, 'utf-8')),
    );
    return {
        concurrency: options.concurrency,
        playerVersion: options.playerVersion,
        language: options.language,
        singleFile: options.singleFile,
        removeWatermarks: options.removeWatermarks,
        userscripts,
        sequence: options.sequence,
        html5Audio: options.html5Audio,
        assetPolicy: options.assetPolicy,
        retry: { maxAttempts: options.retries + 1 },
        timeoutMs: options.timeout,
        httpHandling: options.httpHandling,
        proxy: options.proxy,
        outputRoot: options.output,
        replaceExisting,
    };
}
