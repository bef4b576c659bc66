/**
 * Filesystem seam for the walker and classifier.
 * The real implementation is synchronous node:fs; tests pass an in-memory fake.
 */

import { closeSync, openSync, readdirSync, readFileSync, readSync, realpathSync, statSync } from 'fs';
import { join } from 'path';

export type DirEntryKind = 'file' | 'directory' | 'other';

export interface DirEntry {
    name: string;
    kind: DirEntryKind;
    /** Entry is a symbolic link (kind describes its target) */
    symlink: boolean;
}

export interface FileStat {
    size: number;
    kind: DirEntryKind;
}

export interface FileSystem {
    /** List a directory. Throws if it cannot be read. */
    readDir(absolutePath: string): DirEntry[];
    stat(absolutePath: string): FileStat;
    /** Read at most `length` bytes from the start of a file */
    readPrefix(absolutePath: string, length: number): Uint8Array;
    readFile(absolutePath: string): Uint8Array;
    /** Absolute path with every symlink resolved. Throws if the path does not exist. */
    realPath(absolutePath: string): string;
}

function kindOf(stats: { isFile(): boolean; isDirectory(): boolean }): DirEntryKind {
    if (stats.isFile()) return 'file';
    if (stats.isDirectory()) return 'directory';
    return 'other';
}

export const nodeFileSystem: FileSystem = {
    readDir(absolutePath) {
        const dirents = readdirSync(absolutePath, { withFileTypes: true });
        const result: DirEntry[] = [];

        for (const dirent of dirents) {
            if (!dirent.isSymbolicLink()) {
                result.push({ name: dirent.name, kind: kindOf(dirent), symlink: false });
                continue;
            }

            // Resolve the link target; broken links become 'other'
            let kind: DirEntryKind = 'other';
            try {
                kind = kindOf(statSync(join(absolutePath, dirent.name)));
            } catch {
                kind = 'other';
            }
            result.push({ name: dirent.name, kind, symlink: true });
        }

        return result;
    },

    stat(absolutePath) {
        const stats = statSync(absolutePath);
        return { size: stats.size, kind: kindOf(stats) };
    },

    readPrefix(absolutePath, length) {
        const fd = openSync(absolutePath, 'r');
        try {
            const buffer = Buffer.alloc(length);
            const bytesRead = readSync(fd, buffer, 0, length, 0);
            return buffer.subarray(0, bytesRead);
        } finally {
            closeSync(fd);
        }
    },

    readFile(absolutePath) {
        return readFileSync(absolutePath);
    },

    realPath(absolutePath) {
        return realpathSync(absolutePath);
    },
};

