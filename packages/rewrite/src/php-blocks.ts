/**
 * Replacement of the PHP blocks the player template carries.
 *
 * The live server renders these blocks; an offline copy fills each one it
 * recognises and drops the rest.
 */

import { PHP_BLOCK_PATTERN } from '@trialpack/resolver';
import { RewriteError, RewriteErrorCode } from './errors.js';

/**
 * A PHP block the rewriter knows how to fill.
 */
export interface ExpectedBlock {
    /** Human-readable id, used in messages */
    id: string;
    /** Tested against the block's content */
    detector: RegExp;
    /** Text the whole block becomes */
    replacement: string;
    /** Whether the template is unusable without this block */
    required?: boolean;
}

/**
 * Replaces every PHP block of `source`. Each expected block is used at
 * most once; blocks nothing expects are removed with a warning.
 *
 * @throws RewriteError `AMBIGUOUS_BLOCK` when a block matches several
 *   expected blocks, `MISSING_BLOCK` when a required block never shows up
 */
export function replacePhpBlocks(
    source: string,
    expected: readonly ExpectedBlock[],
    onWarning: (message: string) => void,
): string {
    const used = new Set<ExpectedBlock>();

    const result = source.replace(PHP_BLOCK_PATTERN, (_match: string, content: string) => {
        const candidates = expected.filter(
            (block) => !used.has(block) && block.detector.test(content),
        );
        if (candidates.length > 1) {
            throw new RewriteError(
                RewriteErrorCode.AMBIGUOUS_BLOCK,
                `PHP block matches ${candidates.map((block) => block.id).join(' and ')}`,
                candidates[0].id,
            );
        }
        const [block] = candidates;
        if (block === undefined) {
            onWarning(`Unexpected PHP block removed: ${content.trim().slice(0, 60)}`);
            return '';
        }
        used.add(block);
        return block.replacement;
    });

    for (const block of expected) {
        if (used.has(block)) continue;
        if (block.required) {
            throw new RewriteError(
                RewriteErrorCode.MISSING_BLOCK,
                `PHP block '${block.id}' not found in the template`,
                block.id,
            );
        }
        onWarning(`PHP block '${block.id}' not found in the template`);
    }
    return result;
}

/**
 * Blocks of the trial module.
 *
 * @param payload - Script declaring the case information and data
 */
export function trialBlocks(payload: string): ExpectedBlock[] {
    return [
        { id: 'common_render', detector: /include\('common_render\.php'\);/, replacement: '' },
        {
            id: 'trial_data',
            detector: /var trial_information;/,
            replacement: payload,
            required: true,
        },
    ];
}

/**
 * Blocks of the player document.
 */
export function playerBlocks(values: {
    language: string;
    scripts: string;
    title: string;
}): ExpectedBlock[] {
    const title = escapeHtml(values.title);
    return [
        { id: 'common_render', detector: /include\('common_render\.php'\);/, replacement: '' },
        {
            id: 'language',
            detector: /echo language_backend\(.*\)/,
            replacement: escapeHtml(values.language),
        },
        {
            id: 'script',
            detector: /include\('bridge\.js\.php'\);/,
            replacement: values.scripts,
            required: true,
        },
        {
            id: 'title',
            detector: /echo 'Ace Attorney Online - Trial Player \(Loading\)';/,
            replacement: title,
        },
        { id: 'heading', detector: /echo 'Loading trial \.\.\.';/, replacement: title },
    ];
}

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
};

export function escapeHtml(text: string): string {
    return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}
