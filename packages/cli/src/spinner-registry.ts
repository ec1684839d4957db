/**
 * Spinner registry for managing ora spinners.
 *
 * Provides synchronized logging that doesn't interfere with active spinners,
 * and handles cleanup on process signals.
 */

import type { Ora } from 'ora';
import chalk from 'chalk';

export type LogLevel = 'info' | 'verbose' | 'warning';

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
    info: chalk.cyan,
    verbose: chalk.gray,
    warning: chalk.yellow,
};

/**
 * Registry for ora spinners with synchronized logging.
 *
 * Logging directly to the console while a spinner renders tears its line.
 * The registry clears active spinners before logging and re-renders them
 * afterwards.
 *
 * @example
 * ```typescript
 * const registry = new SpinnerRegistry();
 * registry.setupSignalHandlers(() => controller.abort());
 *
 * const spinner = ora('Resolving cases...').start();
 * registry.register(spinner);
 * registry.safeLog('Template loaded', 'verbose');
 *
 * spinner.succeed('Done');
 * registry.cleanup();
 * ```
 */
export class SpinnerRegistry {
    /** Set of currently registered spinners. */
    private spinners: Set<Ora> = new Set();
    /** Cleanup functions for registered signal handlers. */
    private signalHandlers: Array<() => void> = [];

    /**
     * @param write - Where log lines go
     */
    constructor(private readonly write: (line: string) => void = console.log) {}

    register(spinner: Ora) {
        this.spinners.add(spinner);
    }

    unregister(spinner: Ora) {
        this.spinners.delete(spinner);
    }

    /**
     * Logs a timestamped message without interfering with active spinners.
     *
     * @param message - The message to log
     * @param level - Selects the colour
     */
    safeLog(message: string, level: LogLevel = 'info') {
        const now = new Date();
        const timestamp =
            now.toLocaleTimeString('en-US', {
                hour12: false,
                hour: '2-digit',
                minute: '2-digit',
                second: '2-digit',
            }) +
            '.' +
            now.getMilliseconds().toString().padStart(3, '0');

        // Clear spinner lines without stopping them (avoids flicker)
        for (const spinner of this.spinners) {
            if (spinner.isSpinning) {
                spinner.clear();
            }
        }

        this.write(LEVEL_COLORS[level](`[${timestamp}] ${message}`));

        for (const spinner of this.spinners) {
            if (spinner.isSpinning) {
                spinner.render();
            }
        }
    }

    /**
     * Clears spinners on SIGINT/SIGTERM and hands the signal to `onSignal`.
     * A second signal exits immediately.
     *
     * Call `cleanup()` when done to remove the handlers.
     */
    setupSignalHandlers(onSignal: () => void) {
        let received = false;
        const handler = () => {
            this.clearAll();
            if (received) {
                process.exit(130);
            }
            received = true;
            onSignal();
        };

        process.on('SIGINT', handler);
        process.on('SIGTERM', handler);

        this.signalHandlers.push(() => {
            process.off('SIGINT', handler);
            process.off('SIGTERM', handler);
        });
    }

    /**
     * Clears all registered spinners from the terminal.
     */
    clearAll() {
        for (const spinner of this.spinners) {
            spinner.clear();
        }
    }

    /**
     * Clears spinners and removes signal handlers.
     */
    cleanup() {
        this.clearAll();
        this.signalHandlers.forEach((remove) => remove());
        this.signalHandlers = [];
    }
}
