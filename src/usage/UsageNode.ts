/**
 * @file Usage Node
 *
 * The single entity of the usage tree. A node carries a name, a byte size
 * and its owned children; the parent link is a back-reference used only for
 * upward size propagation, depth computation and path reconstruction.
 *
 * Methods follow the project's RPN naming convention (subject_verb).
 *
 * @module usage/UsageNode
 */

/** Name given to the scan root. */
export const ROOT_NAME = '[ROOT]' as const;

/** Reserved name of the synthetic node holding a collapsed tail of children. */
export const OTHERS_NAME = '[OTHERS]' as const;

export type UsageNodeKind = 'directory' | 'file' | 'aggregate';

/**
 * Serialized form of a node. The parent link is never serialized.
 */
export interface UsageJSON {
    name: string;
    size: number;
    entries: UsageJSON[];
}

/**
 * One entry of the usage tree.
 *
 * @example
 * ```typescript
 * const root = new UsageNode(ROOT_NAME);
 * const docs = root.child_attach('docs', 'directory');
 * docs.child_attach('notes.txt', 'file').size_add(120);
 * root.size; // 120
 * ```
 */
export class UsageNode {
    public readonly name: string;
    public readonly kind: UsageNodeKind;
    public readonly parent: UsageNode | null;
    public children: UsageNode[] = [];
    private bytes: number = 0;

    /**
     * @param initialSize - Bytes already accounted for in the ancestors. Only
     *   this node is seeded; nothing propagates upward.
     */
    constructor(
        name: string,
        kind: UsageNodeKind = 'directory',
        parent: UsageNode | null = null,
        initialSize: number = 0,
    ) {
        this.name = name;
        this.kind = kind;
        this.parent = parent;
        this.bytes = initialSize;
    }

    /** Current byte total of this node. */
    public get size(): number {
        return this.bytes;
    }

    /**
     * Add bytes to this node and every ancestor.
     *
     * The whole walk runs synchronously, so no other unit of work can
     * interleave between reading and writing any node on the chain.
     */
    public size_add(bytes: number): void {
        if (!Number.isSafeInteger(bytes) || bytes < 0) {
            throw new RangeError(`Size increment must be a non-negative integer, got ${bytes}`);
        }
        let node: UsageNode | null = this;
        while (node) {
            node.bytes += bytes;
            node = node.parent;
        }
    }

    /**
     * Create a child linked to this node and append it to `children`.
     */
    public child_attach(name: string, kind: UsageNodeKind): UsageNode {
        const child: UsageNode = new UsageNode(name, kind, this);
        this.children.push(child);
        return child;
    }

    /**
     * Distance from the root, found by walking parent links.
     */
    public depth_compute(): number {
        let depth: number = 0;
        let node: UsageNode | null = this.parent;
        while (node) {
            depth++;
            node = node.parent;
        }
        return depth;
    }

    /**
     * Slash-joined names from just below the root down to this node.
     * The root itself resolves to an empty string.
     */
    public path_resolve(): string {
        const names: string[] = [];
        let node: UsageNode | null = this;
        while (node && node.parent) {
            names.unshift(node.name);
            node = node.parent;
        }
        return names.join('/');
    }

    /** Whether this node is the root of its tree. */
    public isRoot(): boolean {
        return this.parent === null;
    }
}

/**
 * Project a node and its subtree onto the serializable `{ name, size, entries }` shape.
 */
export function usageNode_toJSON(node: UsageNode): UsageJSON {
    return {
        name: node.name,
        size: node.size,
        entries: node.children.map((child: UsageNode): UsageJSON => usageNode_toJSON(child)),
    };
}

/**
 * Create a synthetic aggregate node under `parent` holding `bytes`.
 * The node is not appended; the caller decides where it goes in `children`.
 */
export function aggregate_create(parent: UsageNode, bytes: number): UsageNode {
    return new UsageNode(OTHERS_NAME, 'aggregate', parent, bytes);
}
