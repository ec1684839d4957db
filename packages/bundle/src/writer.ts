/**
 * Filesystem access of the bundler.
 */

import { existsSync } from 'fs';
import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { toPosixPath } from '@trialpack/utils';

/**
 * The handful of filesystem operations a bundle needs. Directories are
 * created recursively and removal never fails on an absent path.
 */
export interface BundleWriter {
    exists(path: string): Promise<boolean>;
    mkdir(path: string): Promise<void>;
    writeFile(path: string, data: string | Uint8Array): Promise<void>;
    rename(from: string, to: string): Promise<void>;
    remove(path: string): Promise<void>;
}

/**
 * Writes bundles to disk.
 */
export class FsBundleWriter implements BundleWriter {
    async exists(path: string): Promise<boolean> {
        return existsSync(path);
    }

    async mkdir(path: string): Promise<void> {
        await mkdir(path, { recursive: true });
    }

    async writeFile(path: string, data: string | Uint8Array): Promise<void> {
        if (typeof data === 'string') {
            await writeFile(path, data, 'utf-8');
        } else {
            await writeFile(path, data);
        }
    }

    async rename(from: string, to: string): Promise<void> {
        await rename(from, to);
    }

    async remove(path: string): Promise<void> {
        await rm(path, { recursive: true, force: true });
    }
}

/**
 * Keeps bundles in memory, keyed by POSIX path.
 *
 * @example
 * ```typescript
 * const writer = new MemoryBundleWriter();
 * await writeBundle(output, writer);
 * writer.readText('out/Sample/index.html');
 * ```
 */
export class MemoryBundleWriter implements BundleWriter {
    /** File contents by path */
    readonly files = new Map<string, Uint8Array>();
    /** Directories created so far */
    readonly directories = new Set<string>();

    async exists(path: string): Promise<boolean> {
        const key = toPosixPath(path);
        if (this.files.has(key) || this.directories.has(key)) {
            return true;
        }
        return this.keys().some((entry) => entry.startsWith(`${key}/`));
    }

    async mkdir(path: string): Promise<void> {
        const parts = toPosixPath(path).split('/');
        for (let i = 1; i <= parts.length; i++) {
            const directory = parts.slice(0, i).join('/');
            if (directory !== '') {
                this.directories.add(directory);
            }
        }
    }

    async writeFile(path: string, data: string | Uint8Array): Promise<void> {
        this.files.set(
            toPosixPath(path),
            typeof data === 'string' ? new TextEncoder().encode(data) : Uint8Array.from(data),
        );
    }

    async rename(from: string, to: string): Promise<void> {
        const source = toPosixPath(from);
        const target = toPosixPath(to);
        if (!(await this.exists(source))) {
            throw new Error(`ENOENT: no such file or directory, rename '${source}'`);
        }
        await this.remove(target);
        for (const [path, data] of [...this.files]) {
            const moved = movePath(path, source, target);
            if (moved !== undefined) {
                this.files.delete(path);
                this.files.set(moved, data);
            }
        }
        for (const directory of [...this.directories]) {
            const moved = movePath(directory, source, target);
            if (moved !== undefined) {
                this.directories.delete(directory);
                this.directories.add(moved);
            }
        }
    }

    async remove(path: string): Promise<void> {
        const key = toPosixPath(path);
        for (const file of [...this.files.keys()]) {
            if (file === key || file.startsWith(`${key}/`)) {
                this.files.delete(file);
            }
        }
        for (const directory of [...this.directories]) {
            if (directory === key || directory.startsWith(`${key}/`)) {
                this.directories.delete(directory);
            }
        }
    }

    /** Text content of a written file */
    readText(path: string): string | undefined {
        const data = this.files.get(toPosixPath(path));
        return data === undefined ? undefined : new TextDecoder().decode(data);
    }

    private keys(): string[] {
        return [...this.files.keys(), ...this.directories];
    }
}

function movePath(path: string, from: string, to: string): string | undefined {
    if (path === from) {
        return to;
    }
    if (path.startsWith(`${from}/`)) {
        return to + path.slice(from.length);
    }
    return undefined;
}
