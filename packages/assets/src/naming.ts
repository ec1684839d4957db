/**
 * Local file names of assets inside a bundle.
 */

import { sanitizeStem, shortHash } from '@trialpack/utils';

const INITIAL_HASH_LENGTH = 12;
const MAX_HASH_LENGTH = 32;

/**
 * Hands out local names of the form `<stem>-<hash>.<ext>`, lower-case.
 * The hash is a prefix of the MD5 of the canonical URL, lengthened when
 * two URLs would otherwise share a name.
 */
export class LocalNameRegistry {
    private readonly owners = new Map<string, string>();
    private readonly assigned = new Map<string, string>();

    /**
     * Returns the local name of `url`, assigning one on first call.
     *
     * @param url - Canonical URL
     * @param stem - Name part taken from the URL
     * @param extension - Extension without the dot
     */
    assign(url: string, stem: string, extension: string): string {
        const existing = this.assigned.get(url);
        if (existing !== undefined) {
            return existing;
        }

        const base = sanitizeStem(stem);
        const ext = extension.toLowerCase();
        for (let length = INITIAL_HASH_LENGTH; length <= MAX_HASH_LENGTH; length++) {
            const name = `${base}-${shortHash(url, length)}.${ext}`.toLowerCase();
            const owner = this.owners.get(name);
            if (owner === undefined || owner === url) {
                this.owners.set(name, url);
                this.assigned.set(url, name);
                return name;
            }
        }
        throw new Error(`No unique local name for ${url}`);
    }

    get size(): number {
        return this.assigned.size;
    }
}
