/**
 * Output directory validation.
 */

import { existsSync } from 'fs';
import { readdir } from 'fs/promises';
import prompts from 'prompts';
import chalk from 'chalk';

/**
 * What to do with cases already present in the output directory.
 */
export type OutputDirectoryAction = 'keep' | 'replace' | 'cancel';

/**
 * Options for checking the output directory.
 */
export interface CheckOutputDirectoryOptions {
    /** Replace earlier downloads without prompting */
    replaceExisting?: boolean;
    /** Whether the user can be asked; defaults to whether stdin is a terminal */
    interactive?: boolean;
}

/**
 * Checks an explicitly chosen output directory before a run.
 *
 * - `--replace-existing` or a missing or empty directory: no question
 * - the current directory: never asked about, cases that exist fail on their own
 * - otherwise, on a terminal, the user decides whether earlier downloads
 *   in it get replaced
 *
 * @param outputDir - The `--output` value
 * @returns The action to take
 */
export async function checkOutputDirectory(
    outputDir: string,
    options: CheckOutputDirectoryOptions = {},
): Promise<OutputDirectoryAction> {
    const { replaceExisting = false, interactive = process.stdin.isTTY === true } = options;

    if (replaceExisting) {
        return 'replace';
    }
    if (outputDir === '.' || !existsSync(outputDir)) {
        return 'keep';
    }
    if ((await readdir(outputDir)).length === 0 || !interactive) {
        return 'keep';
    }

    const response: { replace?: boolean } = await prompts({
        type: 'confirm',
        name: 'replace',
        message: `Output directory '${outputDir}' is not empty. Replace cases downloaded into it before?`,
        initial: false,
    });

    // Ctrl+C leaves the answer undefined
    if (response.replace === undefined) {
        console.log(chalk.yellow('\nOperation cancelled.'));
        return 'cancel';
    }
    return response.replace ? 'replace' : 'keep';
}
