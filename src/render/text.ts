/**
 * @file Text Tree Renderer
 *
 * Terminal rendering of the usage tree: one line per node with its size
 * and share of the parent, drawn with box glyphs.
 *
 * @module render/text
 */

import type { UsageNode } from '../usage/UsageNode.js';
import { size_format } from './format.js';
import type { ReportMeta } from './types.js';

export function report_renderText(root: UsageNode, meta: ReportMeta): string {
    const lines: string[] = [
        `${meta.path}  (${meta.hostname}, ${meta.time})`,
        '',
    ];

    const renderTree = (node: UsageNode, prefix: string, isLast: boolean, isRoot: boolean): void => {
        if (isRoot) {
            lines.push(nodeLine_format(node));
        } else {
            const branch: string = isLast ? '└─ ' : '├─ ';
            lines.push(`${prefix}${branch}${nodeLine_format(node)}`);
        }

        const nextPrefix: string = isRoot
            ? ''
            : `${prefix}${isLast ? '   ' : '│  '}`;
        node.children.forEach((child: UsageNode, index: number): void => {
            renderTree(child, nextPrefix, index === node.children.length - 1, false);
        });
    };

    renderTree(root, '', true, true);
    return lines.join('\n') + '\n';
}

/**
 * `name/  size  share%` for one node. Directories get a trailing slash.
 */
export function nodeLine_format(node: UsageNode): string {
    const name: string = node.kind === 'directory' && !node.isRoot() ? `${node.name}/` : node.name;
    const parentSize: number = node.parent?.size ?? 0;
    const share: string = parentSize > 0 ? `  ${((node.size / parentSize) * 100).toFixed(1)}%` : '';
    return `${name}  ${size_format(node.size)}${share}`;
}
