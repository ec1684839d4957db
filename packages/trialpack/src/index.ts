/**
 * `trialpack`
 *
 * Downloads Ace Attorney Online cases and writes offline copies of them.
 *
 * @packageDocumentation
 */

export { ConfigError } from './errors.js';
export {
    ASSET_POLICIES,
    DEFAULT_RUN_CONFIG,
    HTTP_HANDLING_MODES,
    SEQUENCE_MODES,
    createRunConfig,
    type RunConfig,
    type RunConfigInput,
    type SequenceMode,
} from './config.js';
export { describeError, failedCase, runStatus } from './report.js';
export { runDownload, type RunOptions, type RunProgressEvent } from './run.js';
