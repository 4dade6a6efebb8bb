/**
 * @file Memory Volume
 *
 * In-memory POSIX-like volume implementing `DirectoryLister`. Files carry a
 * byte size and no content. Failures can be injected per path, and an
 * artificial latency makes listings overlap so concurrency limits can be
 * observed through `peakListings`.
 *
 * @module fs/MemoryVolume
 */

import { setTimeout as sleep } from 'timers/promises';
import { fsError_create, type DirectoryLister, type ListedEntry } from './types.js';

interface VolumeDir {
    type: 'dir';
    children: Map<string, VolumeNode>;
}

interface VolumeFile {
    type: 'file';
    size: number;
}

type VolumeNode = VolumeDir | VolumeFile;

export type FailureOperation = 'list' | 'stat';

export interface MemoryVolumeOptions {
    /** Delay applied to every listing, in milliseconds. */
    latencyMs?: number;
}

/**
 * @example
 * ```typescript
 * const volume = new MemoryVolume();
 * volume.file_write('/scan/a.bin', 100);
 * volume.dir_create('/scan/empty');
 * volume.failure_inject('/scan/empty', 'list');
 * ```
 */
export class MemoryVolume implements DirectoryLister {
    private readonly root: VolumeDir = dir_make();
    private readonly failures: Map<string, { operation: FailureOperation; code: string }> = new Map();
    private readonly latencyMs: number;
    private listingsActive: number = 0;
    private listingsPeak: number = 0;
    private listingsTotal: number = 0;

    constructor(options: MemoryVolumeOptions = {}) {
        this.latencyMs = options.latencyMs ?? 0;
    }

    /** Highest number of listings that were running at the same time. */
    public get peakListings(): number {
        return this.listingsPeak;
    }

    /** Number of `dir_list` calls made so far. */
    public get listingCount(): number {
        return this.listingsTotal;
    }

    /**
     * Create a directory and any missing parents.
     */
    public dir_create(dirPath: string): void {
        const segments: string[] = path_segments(dirPath);
        let current: VolumeDir = this.root;
        for (let i: number = 0; i < segments.length; i++) {
            const seg: string = segments[i];
            let child: VolumeNode | undefined = current.children.get(seg);
            if (!child) {
                child = dir_make();
                current.children.set(seg, child);
            } else if (child.type !== 'dir') {
                throw new Error(`mkdir: /${segments.slice(0, i + 1).join('/')}: Not a directory`);
            }
            current = child;
        }
    }

    /**
     * Create or replace a file of `size` bytes. Parent directories are created.
     */
    public file_write(filePath: string, size: number): void {
        const segments: string[] = path_segments(filePath);
        const name: string | undefined = segments.pop();
        if (!name) {
            throw new Error(`write: ${filePath}: Is a directory`);
        }
        this.dir_create('/' + segments.join('/'));
        const parent: VolumeNode | null = this.node_at(segments);
        if (!parent || parent.type !== 'dir') {
            throw new Error(`write: ${filePath}: Parent is not a directory`);
        }
        const existing: VolumeNode | undefined = parent.children.get(name);
        if (existing && existing.type === 'dir') {
            throw new Error(`write: ${filePath}: Is a directory`);
        }
        parent.children.set(name, { type: 'file', size });
    }

    /**
     * Make a listing (`list`) or size lookup (`stat`) of `entryPath` fail.
     */
    public failure_inject(entryPath: string, operation: FailureOperation, code: string = 'EACCES'): void {
        this.failures.set(path_normalize(entryPath), { operation, code });
    }

    public async dir_list(dirPath: string): Promise<ListedEntry[]> {
        this.listingsTotal++;
        this.listingsActive++;
        if (this.listingsActive > this.listingsPeak) this.listingsPeak = this.listingsActive;
        try {
            if (this.latencyMs > 0) {
                await sleep(this.latencyMs);
            }
            this.failure_check(dirPath, 'list', 'scandir');
            const node: VolumeNode | null = this.node_at(path_segments(dirPath));
            if (!node) throw fsError_create('ENOENT', 'scandir', dirPath);
            if (node.type !== 'dir') throw fsError_create('ENOTDIR', 'scandir', dirPath);
            return [...node.children.entries()].map(([name, child]: [string, VolumeNode]): ListedEntry => ({
                name,
                isDirectory: child.type === 'dir',
            }));
        } finally {
            this.listingsActive--;
        }
    }

    public async entry_size(entryPath: string): Promise<number> {
        this.failure_check(entryPath, 'stat', 'lstat');
        const node: VolumeNode | null = this.node_at(path_segments(entryPath));
        if (!node) throw fsError_create('ENOENT', 'lstat', entryPath);
        return node.type === 'file' ? node.size : 0;
    }

    private failure_check(entryPath: string, operation: FailureOperation, syscall: string): void {
        const failure = this.failures.get(path_normalize(entryPath));
        if (failure && failure.operation === operation) {
            throw fsError_create(failure.code, syscall, entryPath);
        }
    }

    private node_at(segments: string[]): VolumeNode | null {
        let current: VolumeNode = this.root;
        for (const seg of segments) {
            if (current.type !== 'dir') return null;
            const child: VolumeNode | undefined = current.children.get(seg);
            if (!child) return null;
            current = child;
        }
        return current;
    }
}

// ─── Pure Helper Functions ──────────────────────────────────────

function dir_make(): VolumeDir {
    return { type: 'dir', children: new Map<string, VolumeNode>() };
}

/**
 * Split an absolute path into segments, resolving `.` and `..`.
 */
function path_segments(input: string): string[] {
    const segments: string[] = [];
    for (const seg of input.split('/')) {
        if (!seg || seg === '.') continue;
        if (seg === '..') {
            segments.pop();
            continue;
        }
        segments.push(seg);
    }
    return segments;
}

function path_normalize(input: string): string {
    return '/' + path_segments(input).join('/');
}
