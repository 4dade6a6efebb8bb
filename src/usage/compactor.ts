/**
 * @file Usage Tree Compactor
 *
 * Bounds a built usage tree for presentation. Children are ordered by
 * descending size, the tail beyond `maxEntries` is folded into one
 * `[OTHERS]` aggregate, and nodes at `maxDepth` lose their children.
 * Every surviving node keeps its size.
 *
 * Runs synchronously and mutates the tree in place. Only call it after the
 * builder has resolved.
 *
 * @module usage/compactor
 */

import { aggregate_create, type UsageNode } from './UsageNode.js';

export interface CompactOptions {
    /** Children kept per node before the rest are folded. At least 1. */
    maxEntries: number;
    /** Deepest level that may hold nodes; the root is level 0. At least 1. */
    maxDepth: number;
}

/**
 * Compact `node` and its subtree in place.
 */
export function usageTree_compact(node: UsageNode, options: CompactOptions): void {
    const { maxEntries, maxDepth } = options;

    if (node.depth_compute() >= maxDepth) {
        node.children = [];
        return;
    }

    // An aggregate from an earlier pass stays last and is never counted
    // against maxEntries, which keeps a second pass a no-op.
    const literal: UsageNode[] = node.children.filter((child: UsageNode): boolean => child.kind !== 'aggregate');
    let foldedBytes: number = node.children
        .filter((child: UsageNode): boolean => child.kind === 'aggregate')
        .reduce(size_sum, 0);
    const hadAggregate: boolean = literal.length < node.children.length;

    // Array.prototype.sort is stable, so equal sizes keep their prior order.
    literal.sort((left: UsageNode, right: UsageNode): number => right.size - left.size);

    if (literal.length > maxEntries) {
        foldedBytes += literal.splice(maxEntries).reduce(size_sum, 0);
        literal.push(aggregate_create(node, foldedBytes));
    } else if (hadAggregate) {
        literal.push(aggregate_create(node, foldedBytes));
    }
    node.children = literal;

    for (const child of node.children) {
        usageTree_compact(child, options);
    }
}

function size_sum(sum: number, node: UsageNode): number {
    return sum + node.size;
}
