#!/usr/bin/env node
/**
 * CLI entry point script.
 *
 * This is the executable entry point for the `trialpack` command.
 * It simply invokes the main function from the index module.
 *
 * @packageDocumentation
 */
import chalk from 'chalk';
import { main } from './index.js';

main().catch((error: unknown) => {
    console.error(chalk.red(error instanceof Error ? (error.stack ?? error.message) : String(error)));
    process.exitCode = 1;
});
