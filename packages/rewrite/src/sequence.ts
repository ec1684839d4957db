/**
 * Cross-case "continue" links.
 *
 * A case can hand over to another one in two ways: the player's end-of-case
 * redirect follows the case's sequence, and case data can carry literal
 * player URLs. Both only stay offline when the target was downloaded in
 * the same batch.
 */

import { posix } from 'path';
import { PLAYER_URL_PATTERN } from '@trialpack/resolver';
import type { CaseManifest, SequenceLink } from '@trialpack/types';
import { SequenceError, SequenceErrorCode } from './errors.js';

/** End-of-case redirect of the player */
export const REDIRECT_PATTERN =
    /window\.location\.href\s*=\s*'player\.php\?trial_id='\s*\+\s*([\w.]+)\s*\+\s*'&(save_data=[^;]*);/;

const REDIRECT_FALLBACK = 'default: ';

/** A literal player URL with the rest of its query */
const LITERAL_LINK_PATTERN = new RegExp(
    `${PLAYER_URL_PATTERN.source}(?:&[^\\s"'&#<>]*)*`,
    'g',
);

export interface DetectedLinks {
    links: SequenceLink[];
    errors: SequenceError[];
}

function edgeKey(from: number, to: number): string {
    return `${from}->${to}`;
}

// ============================================================================
// DETECTION
// ============================================================================

/**
 * Builds one edge per `(from, to)` pair of the given cases: the sequence
 * successor first, then every literal player URL in the case data.
 * Self-links and sequence pointers the target's own sequence disagrees
 * with are dropped and reported.
 *
 * @example
 * ```ts
 * const { links, errors } = detectLinks(manifests);
 * errors.forEach((error) => console.warn(error.message));
 * ```
 */
export function detectLinks(manifests: readonly CaseManifest[]): DetectedLinks {
    const byId = new Map<number, CaseManifest>();
    for (const manifest of manifests) {
        byId.set(manifest.id, manifest);
    }
    const links: SequenceLink[] = [];
    const errors: SequenceError[] = [];
    const seen = new Set<string>();

    const add = (link: SequenceLink): void => {
        const key = edgeKey(link.from, link.to);
        if (seen.has(key)) {
            return;
        }
        seen.add(key);
        if (link.from === link.to) {
            errors.push(
                new SequenceError(
                    SequenceErrorCode.SELF_LINK,
                    link.from,
                    link.to,
                    `Case ${link.from} links to itself`,
                ),
            );
            return;
        }
        if (link.origin === 'sequence') {
            const target = byId.get(link.to);
            if (target && !target.sequence?.list.some((entry) => entry.id === link.from)) {
                errors.push(
                    new SequenceError(
                        SequenceErrorCode.INCONSISTENT_SEQUENCE,
                        link.from,
                        link.to,
                        `Case ${link.from} continues into case ${link.to}, whose sequence does not list it`,
                    ),
                );
                return;
            }
        }
        links.push(link);
    };

    for (const manifest of manifests) {
        const list = manifest.sequence?.list ?? [];
        const index = list.findIndex((entry) => entry.id === manifest.id);
        const next = index >= 0 ? list[index + 1] : undefined;
        if (next) {
            add({
                from: manifest.id,
                to: next.id,
                trigger: `player.php?trial_id=${next.id}`,
                origin: 'sequence',
                state: 'unlinked',
            });
        }

        for (const match of JSON.stringify(manifest.data).matchAll(PLAYER_URL_PATTERN)) {
            add({
                from: manifest.id,
                to: Number(match[1]),
                trigger: match[0],
                origin: 'literal',
                state: 'unlinked',
            });
        }
    }

    return { links, errors };
}

// ============================================================================
// LINKING
// ============================================================================

/**
 * Links every edge whose endpoints are both in the batch. Each edge
 * transitions at most once: repeated edges and cycles are not revisited.
 *
 * @param links - Edges from {@link detectLinks}
 * @param batchIds - Ids of the cases downloaded together
 * @returns New edge objects; the input is not modified
 */
export function linkBatch(
    links: readonly SequenceLink[],
    batchIds: Iterable<number>,
): SequenceLink[] {
    const batch = new Set(batchIds);
    const visited = new Set<string>();
    const result: SequenceLink[] = [];

    for (const link of links) {
        const key = edgeKey(link.from, link.to);
        if (visited.has(key)) {
            continue;
        }
        visited.add(key);
        const linked = link.state === 'linked' || (batch.has(link.from) && batch.has(link.to));
        result.push({ ...link, state: linked ? 'linked' : 'unlinked' });
    }
    return result;
}

/**
 * Href of one output document as seen from another.
 *
 * @param fromPath - Path of the linking document
 * @param toPath - Path of the target document, relative to the same root
 *
 * @example
 * ```ts
 * relativeHref('out/A/index.html', 'out/B C/index.html'); // '../B%20C/index.html'
 * ```
 */
export function relativeHref(fromPath: string, toPath: string): string {
    return posix
        .relative(posix.dirname(fromPath), toPath)
        .split('/')
        .map((segment) => encodeURIComponent(segment).replaceAll("'", '%27'))
        .join('/');
}

/**
 * Hrefs of the linked targets of `caseId`, keyed by target id.
 *
 * @param outputs - Document path of every case of the batch, POSIX style
 */
export function linkTargets(
    caseId: number,
    links: readonly SequenceLink[],
    outputs: ReadonlyMap<number, string>,
): Map<number, string> {
    const targets = new Map<number, string>();
    const from = outputs.get(caseId);
    if (from === undefined) {
        return targets;
    }
    for (const link of links) {
        if (link.from !== caseId || link.state !== 'linked') continue;
        const to = outputs.get(link.to);
        if (to !== undefined) {
            targets.set(link.to, relativeHref(from, to));
        }
    }
    return targets;
}

// ============================================================================
// EMISSION
// ============================================================================

/**
 * Rewrites the player's end-of-case redirect into a `switch` over the
 * linked targets of `caseId`. The `default` branch keeps the original
 * statement. Scripts of a case without linked targets, or whose redirect
 * was already rewritten, are returned unchanged.
 *
 * @param scripts - Combined player scripts of the case
 * @param outputs - Document path of every case of the batch, POSIX style
 */
export function emitRedirect(
    scripts: string,
    caseId: number,
    links: readonly SequenceLink[],
    outputs: ReadonlyMap<number, string>,
): string {
    const targets = linkTargets(caseId, links, outputs);
    const match = REDIRECT_PATTERN.exec(scripts);
    if (targets.size === 0 || !match) {
        return scripts;
    }
    const start = match.index;
    if (scripts.slice(start - REDIRECT_FALLBACK.length, start) === REDIRECT_FALLBACK) {
        return scripts;
    }

    const [statement, target, saveData] = match;
    let redirect = `switch (Number.parseInt(${target})) {\n`;
    for (const [id, href] of targets) {
        redirect += `case ${id}: window.location.href = '${href}' + '?${saveData};\nbreak;\n`;
    }
    redirect += `${REDIRECT_FALLBACK}${statement}\n}`;

    return scripts.slice(0, start) + redirect + scripts.slice(start + statement.length);
}

/**
 * Replaces literal player URLs of linked targets, query included, in a
 * string of case data.
 */
export function replaceLiteralLinks(text: string, targets: ReadonlyMap<number, string>): string {
    if (targets.size === 0) {
        return text;
    }
    return text.replace(LITERAL_LINK_PATTERN, (match: string, id: string) => targets.get(Number(id)) ?? match);
}
