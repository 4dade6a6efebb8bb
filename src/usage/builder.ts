/**
 * @file Usage Tree Builder
 *
 * Walks a directory tree and builds the usage tree. Every directory is
 * expanded by its own detached unit of work; units are throttled by a
 * shared token budget and tracked by a work group that the caller awaits.
 *
 * Sizes are pushed from each measured file up through every ancestor as
 * the walk proceeds, so there is no second aggregation pass.
 *
 * Traversal failures never abort the run: they go to the error sink and
 * the affected node keeps whatever it had accumulated.
 *
 * @module usage/builder
 */

import { availableParallelism } from 'os';
import { join } from 'path';
import type { DirectoryLister, ListedEntry } from '../fs/types.js';
import { TokenBudget } from './TokenBudget.js';
import { ROOT_NAME, UsageNode } from './UsageNode.js';
import { WorkGroup } from './WorkGroup.js';

/**
 * Receives each non-fatal traversal failure with the path it concerns.
 */
export type TraversalErrorSink = (error: Error, path: string) => void;

export interface BuildStats {
    /** Directory units that have finished, successfully or not. */
    directories: number;
    /** Non-directory entries measured. */
    files: number;
    /** Error sink invocations. */
    failures: number;
    /** Highest number of directory units holding a token at once. */
    peakInFlight: number;
}

export interface BuildOptions {
    lister: DirectoryLister;
    /** Token budget. Defaults to the number of available cores. */
    concurrency?: number;
    onError?: TraversalErrorSink;
    /** Called after each directory unit finishes. */
    onProgress?: (stats: Readonly<BuildStats>) => void;
}

export interface BuildResult {
    root: UsageNode;
    stats: BuildStats;
}

/**
 * Build the usage tree rooted at `rootPath`.
 *
 * @example
 * ```typescript
 * const { root } = await usageTree_build('/var/log', { lister: new NodeLister() });
 * console.log(root.size);
 * ```
 */
export async function usageTree_build(rootPath: string, options: BuildOptions): Promise<BuildResult> {
    const root: UsageNode = new UsageNode(ROOT_NAME, 'directory');
    const stats: BuildStats = await usageNode_populate(root, rootPath, options);
    return { root, stats };
}

/**
 * Populate `node` from the directory at `dirPath`, expanding every
 * subdirectory concurrently. Resolves once every spawned unit has finished.
 */
export async function usageNode_populate(
    node: UsageNode,
    dirPath: string,
    options: BuildOptions,
): Promise<BuildStats> {
    const walk: TreeWalk = new TreeWalk(options);
    return walk.run(node, dirPath);
}

/**
 * State shared by all units of one build.
 */
class TreeWalk {
    private readonly lister: DirectoryLister;
    private readonly budget: TokenBudget;
    private readonly group: WorkGroup = new WorkGroup();
    private readonly onError: TraversalErrorSink | undefined;
    private readonly onProgress: ((stats: Readonly<BuildStats>) => void) | undefined;
    private readonly stats: BuildStats = { directories: 0, files: 0, failures: 0, peakInFlight: 0 };

    constructor(options: BuildOptions) {
        this.lister = options.lister;
        this.budget = new TokenBudget(options.concurrency ?? availableParallelism());
        this.onError = options.onError;
        this.onProgress = options.onProgress;
    }

    public async run(node: UsageNode, dirPath: string): Promise<BuildStats> {
        this.unit_schedule(node, dirPath);
        await this.group.wait();
        this.stats.peakInFlight = this.budget.peakInFlight;
        return { ...this.stats };
    }

    private unit_schedule(node: UsageNode, dirPath: string): void {
        this.group.unit_spawn((): Promise<void> => this.dir_expand(node, dirPath));
    }

    /**
     * One unit of work: list `dirPath`, measure its files into `node`, and
     * schedule a unit per subdirectory. Only this unit appends to
     * `node.children`.
     */
    private async dir_expand(node: UsageNode, dirPath: string): Promise<void> {
        try {
            await this.budget.token_with(async (): Promise<void> => {
                let entries: ListedEntry[];
                try {
                    entries = await this.lister.dir_list(dirPath);
                } catch (error: unknown) {
                    this.failure_report(error, dirPath);
                    return;
                }

                for (const entry of entries) {
                    const entryPath: string = join(dirPath, entry.name);
                    if (entry.isDirectory) {
                        const child: UsageNode = node.child_attach(entry.name, 'directory');
                        this.unit_schedule(child, entryPath);
                        continue;
                    }

                    let size: number;
                    try {
                        size = await this.lister.entry_size(entryPath);
                    } catch (error: unknown) {
                        this.failure_report(error, entryPath);
                        return;
                    }
                    node.child_attach(entry.name, 'file').size_add(size);
                    this.stats.files++;
                }
            });
        } finally {
            this.stats.directories++;
            this.onProgress?.(this.stats);
        }
    }

    private failure_report(error: unknown, failedPath: string): void {
        this.stats.failures++;
        this.onError?.(error_normalize(error), failedPath);
    }
}

function error_normalize(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
