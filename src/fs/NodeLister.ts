/**
 * @file Node Filesystem Lister
 *
 * `DirectoryLister` backed by `node:fs/promises`. Entries are classified
 * from the directory listing itself, so a symlink to a directory counts as
 * a non-directory and is measured with `lstat`.
 *
 * @module fs/NodeLister
 */

import { lstat, readdir } from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import type { DirectoryLister, ListedEntry } from './types.js';

export class NodeLister implements DirectoryLister {
    public async dir_list(dirPath: string): Promise<ListedEntry[]> {
        const dirents: Dirent[] = await readdir(dirPath, { withFileTypes: true });
        return dirents.map((dirent: Dirent): ListedEntry => ({
            name: dirent.name,
            isDirectory: dirent.isDirectory(),
        }));
    }

    public async entry_size(entryPath: string): Promise<number> {
        const stats: Stats = await lstat(entryPath);
        return stats.size;
    }
}
