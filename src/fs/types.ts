/**
 * @file Directory Listing Types
 *
 * Backend-agnostic listing interface consumed by the usage tree builder.
 * The builder never touches I/O directly; all listings and size lookups go
 * through a `DirectoryLister`.
 *
 * @module fs/types
 */

/**
 * One entry of a directory listing.
 */
export interface ListedEntry {
    name: string;
    isDirectory: boolean;
}

export interface DirectoryLister {
    /**
     * List the immediate entries of a directory in listing order.
     * Rejects with a filesystem error when the path cannot be read.
     */
    dir_list(dirPath: string): Promise<ListedEntry[]>;

    /**
     * Byte length of a non-directory entry. Links are measured, not followed.
     */
    entry_size(entryPath: string): Promise<number>;
}

/**
 * Build an errno-style error the way `node:fs` reports one.
 */
export function fsError_create(code: string, syscall: string, entryPath: string): NodeJS.ErrnoException {
    const error: NodeJS.ErrnoException = new Error(`${code}: ${syscall} '${entryPath}'`);
    error.code = code;
    error.syscall = syscall;
    error.path = entryPath;
    return error;
}
