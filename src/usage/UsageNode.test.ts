import { describe, it, expect } from 'vitest';
import { OTHERS_NAME, ROOT_NAME, UsageNode, aggregate_create, usageNode_toJSON } from './UsageNode.js';

describe('usage/UsageNode', (): void => {
    it('propagates size additions to every ancestor', (): void => {
        const root = new UsageNode(ROOT_NAME);
        const docs = root.child_attach('docs', 'directory');
        const drafts = docs.child_attach('drafts', 'directory');

        drafts.child_attach('a.txt', 'file').size_add(40);
        docs.child_attach('b.txt', 'file').size_add(2);

        expect(drafts.size).toBe(40);
        expect(docs.size).toBe(42);
        expect(root.size).toBe(42);
    });

    it('rejects negative and fractional increments', (): void => {
        const root = new UsageNode(ROOT_NAME);
        expect(() => root.size_add(-1)).toThrow(RangeError);
        expect(() => root.size_add(1.5)).toThrow(RangeError);
        expect(root.size).toBe(0);
    });

    it('links children to their parent', (): void => {
        const root = new UsageNode(ROOT_NAME);
        const child = root.child_attach('bin', 'directory');
        expect(child.parent).toBe(root);
        expect(root.children).toEqual([child]);
        expect(root.isRoot()).toBe(true);
        expect(child.isRoot()).toBe(false);
    });

    it('computes depth by walking parent links', (): void => {
        const root = new UsageNode(ROOT_NAME);
        const leaf = root.child_attach('a', 'directory').child_attach('b', 'directory').child_attach('c.log', 'file');
        expect(root.depth_compute()).toBe(0);
        expect(leaf.depth_compute()).toBe(3);
    });

    it('resolves paths relative to the root', (): void => {
        const root = new UsageNode(ROOT_NAME);
        const leaf = root.child_attach('a', 'directory').child_attach('b', 'directory').child_attach('c.log', 'file');
        expect(root.path_resolve()).toBe('');
        expect(leaf.path_resolve()).toBe('a/b/c.log');
    });

    it('seeds aggregates without touching the parent', (): void => {
        const root = new UsageNode(ROOT_NAME);
        root.child_attach('x', 'file').size_add(9);
        const aggregate = aggregate_create(root, 9);
        expect(aggregate.name).toBe(OTHERS_NAME);
        expect(aggregate.kind).toBe('aggregate');
        expect(aggregate.size).toBe(9);
        expect(aggregate.parent).toBe(root);
        expect(root.size).toBe(9);
        expect(root.children).toHaveLength(1);
    });

    it('serializes to name, size and entries without the parent link', (): void => {
        const root = new UsageNode(ROOT_NAME);
        root.child_attach('d', 'directory').child_attach('c', 'file').size_add(30);
        expect(usageNode_toJSON(root)).toEqual({
            name: '[ROOT]',
            size: 30,
            entries: [{ name: 'd', size: 30, entries: [{ name: 'c', size: 30, entries: [] }] }],
        });
    });
});
