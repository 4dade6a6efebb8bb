/**
 * @file Usage Tree Builder Tests
 *
 * Builds trees from in-memory volumes: aggregation, traversal failures,
 * statistics and the token budget.
 *
 * @module usage/builder
 */

import { describe, it, expect } from 'vitest';
import { MemoryVolume } from '../fs/MemoryVolume.js';
import { usageNode_populate, usageTree_build, type BuildStats } from './builder.js';
import { ROOT_NAME, UsageNode } from './UsageNode.js';

interface SinkCall {
    error: NodeJS.ErrnoException;
    path: string;
}

function sink_create(): { calls: SinkCall[]; onError: (error: Error, path: string) => void } {
    const calls: SinkCall[] = [];
    return {
        calls,
        onError: (error: Error, path: string): void => {
            calls.push({ error, path });
        },
    };
}

function child_find(node: UsageNode, name: string): UsageNode {
    const child: UsageNode | undefined = node.children.find((c: UsageNode): boolean => c.name === name);
    if (!child) throw new Error(`No child '${name}' under '${node.name}'`);
    return child;
}

describe('usage/builder', (): void => {
    it('aggregates file sizes into directories and the root', async (): Promise<void> => {
        const volume = new MemoryVolume();
        volume.file_write('/scan/a', 100);
        volume.file_write('/scan/b', 50);
        volume.file_write('/scan/d/c', 30);

        const { root } = await usageTree_build('/scan', { lister: volume, concurrency: 4 });

        expect(root.name).toBe(ROOT_NAME);
        expect(root.size).toBe(180);
        expect(root.children.map((c: UsageNode): string => c.name)).toEqual(['a', 'b', 'd']);

        const d = child_find(root, 'd');
        expect(d.kind).toBe('directory');
        expect(d.size).toBe(30);
        expect(d.children).toHaveLength(1);
        expect(d.children[0].name).toBe('c');
        expect(d.children[0].kind).toBe('file');
        expect(d.children[0].size).toBe(30);
    });

    it('keeps empty directories as zero-size nodes', async (): Promise<void> => {
        const volume = new MemoryVolume();
        volume.dir_create('/scan/empty');
        volume.file_write('/scan/x', 7);

        const { root } = await usageTree_build('/scan', { lister: volume, concurrency: 2 });

        const empty = child_find(root, 'empty');
        expect(empty.size).toBe(0);
        expect(empty.children).toEqual([]);
        expect(root.size).toBe(7);
    });

    it('reports an unreadable directory once and leaves its siblings intact', async (): Promise<void> => {
        const volume = new MemoryVolume();
        volume.file_write('/scan/x/f1', 10);
        volume.file_write('/scan/y/f2', 20);
        volume.file_write('/scan/z/f3', 40);
        volume.failure_inject('/scan/y', 'list');
        const sink = sink_create();

        const { root, stats } = await usageTree_build('/scan', {
            lister: volume,
            concurrency: 3,
            onError: sink.onError,
        });

        expect(sink.calls).toHaveLength(1);
        expect(sink.calls[0].path).toBe('/scan/y');
        expect(sink.calls[0].error.code).toBe('EACCES');

        expect(child_find(root, 'x').size).toBe(10);
        expect(child_find(root, 'z').size).toBe(40);
        const y = child_find(root, 'y');
        expect(y.size).toBe(0);
        expect(y.children).toEqual([]);
        expect(root.size).toBe(50);
        expect(stats.failures).toBe(1);
    });

    it('stops measuring a directory at the first failed size lookup', async (): Promise<void> => {
        const volume = new MemoryVolume();
        volume.file_write('/scan/a', 1);
        volume.file_write('/scan/sub/d', 4);
        volume.file_write('/scan/b', 2);
        volume.file_write('/scan/c', 3);
        volume.failure_inject('/scan/b', 'stat');
        const sink = sink_create();

        const { root, stats } = await usageTree_build('/scan', {
            lister: volume,
            concurrency: 2,
            onError: sink.onError,
        });

        expect(sink.calls.map((call: SinkCall): string => call.path)).toEqual(['/scan/b']);
        expect(root.children.map((c: UsageNode): string => c.name)).toEqual(['a', 'sub']);
        expect(root.size).toBe(5);
        expect(stats.directories).toBe(2);
        expect(stats.files).toBe(2);
        expect(stats.failures).toBe(1);
    });

    it('reports a missing root and returns an empty tree', async (): Promise<void> => {
        const volume = new MemoryVolume();
        const sink = sink_create();

        const { root, stats } = await usageTree_build('/missing', { lister: volume, onError: sink.onError });

        expect(root.size).toBe(0);
        expect(root.children).toEqual([]);
        expect(sink.calls).toHaveLength(1);
        expect(sink.calls[0].path).toBe('/missing');
        expect(sink.calls[0].error.code).toBe('ENOENT');
        expect(stats.directories).toBe(1);
    });

    it('never holds more listings in flight than the budget allows', async (): Promise<void> => {
        const volume = new MemoryVolume({ latencyMs: 2 });
        for (let i = 0; i < 12; i++) {
            for (let j = 0; j < 3; j++) {
                volume.file_write(`/scan/d${i}/e${j}/file`, 1);
            }
        }

        const { root, stats } = await usageTree_build('/scan', { lister: volume, concurrency: 3 });

        expect(root.size).toBe(36);
        expect(volume.peakListings).toBe(3);
        expect(stats.peakInFlight).toBe(3);
        expect(stats.directories).toBe(1 + 12 + 36);
        expect(volume.listingCount).toBe(49);
    });

    it('lists one directory at a time with a budget of one', async (): Promise<void> => {
        const volume = new MemoryVolume({ latencyMs: 1 });
        volume.file_write('/scan/a/x', 3);
        volume.file_write('/scan/b/y', 4);
        volume.file_write('/scan/c/z', 5);

        const { root } = await usageTree_build('/scan', { lister: volume, concurrency: 1 });

        expect(root.size).toBe(12);
        expect(volume.peakListings).toBe(1);
    });

    it('reports progress after every directory', async (): Promise<void> => {
        const volume = new MemoryVolume();
        volume.file_write('/scan/a/b/c', 1);
        const seen: number[] = [];

        await usageTree_build('/scan', {
            lister: volume,
            concurrency: 2,
            onProgress: (stats: Readonly<BuildStats>): void => {
                seen.push(stats.directories);
            },
        });

        expect(seen).toEqual([1, 2, 3]);
    });

    it('rejects when the error sink itself throws', async (): Promise<void> => {
        const volume = new MemoryVolume();
        volume.dir_create('/scan/locked');
        volume.failure_inject('/scan/locked', 'list');

        await expect(usageTree_build('/scan', {
            lister: volume,
            onError: (): void => {
                throw new Error('sink broke');
            },
        })).rejects.toThrow('sink broke');
    });

    it('populates an existing node so sizes reach its ancestors', async (): Promise<void> => {
        const volume = new MemoryVolume();
        volume.file_write('/data/logs/app.log', 64);
        const root = new UsageNode(ROOT_NAME);
        const data = root.child_attach('data', 'directory');

        const stats = await usageNode_populate(data, '/data', { lister: volume, concurrency: 1 });

        expect(stats.files).toBe(1);
        expect(data.size).toBe(64);
        expect(root.size).toBe(64);
    });
});
