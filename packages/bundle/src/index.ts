/**
 * `@trialpack/bundle`
 *
 * Lays out rewritten cases as a directory or a single HTML file and
 * writes them atomically.
 *
 * @packageDocumentation
 */

export { BundleError, BundleErrorCode } from './errors.js';
export { INDEX_FILE, outputPaths, planBundle, type PlanInput } from './plan.js';
export { STAGING_SUFFIX, writeBundle, type WriteBundleOptions } from './bundler.js';
export { FsBundleWriter, MemoryBundleWriter, type BundleWriter } from './writer.js';
