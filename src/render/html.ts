/**
 * @file Flamegraph HTML Renderer
 *
 * Renders the usage tree as one self-contained HTML page. Each node is a
 * block whose width is its share of the parent's size; the block's title
 * bar gets lighter as that share shrinks. Hovering a block shows its path
 * and size in the header.
 *
 * @module render/html
 */

import type { UsageNode } from '../usage/UsageNode.js';
import { html_escape, size_format } from './format.js';
import type { ReportMeta } from './types.js';

const STYLE: string = `
body { margin: 0; font: 12px/1.4 -apple-system, "Segoe UI", Helvetica, Arial, sans-serif; color: #123; }
header { position: sticky; top: 0; padding: 8px 12px; background: #fff; border-bottom: 1px solid #cde; z-index: 1; }
header h1 { margin: 0 0 4px; font-size: 16px; word-break: break-all; }
header p { margin: 0; color: #567; }
#hover { min-height: 1.4em; font-family: ui-monospace, Menlo, Consolas, monospace; color: #123; }
main { padding: 8px 12px; }
.usage { display: inline-block; box-sizing: border-box; vertical-align: top; overflow: hidden; }
.usage > .title { padding: 2px 4px; border: 1px solid #fff; white-space: nowrap; overflow: hidden; text-overflow: ellipsis; cursor: default; }
.usage > .entries { display: flex; }
.usage.aggregate > .title { font-style: italic; }
`;

const SCRIPT: string = `
(function () {
    var hover = document.getElementById('hover');
    document.addEventListener('mouseover', function (event) {
        var block = event.target.closest && event.target.closest('.usage');
        if (!block) return;
        hover.textContent = (block.getAttribute('data-path') || '/') + '  ' + block.getAttribute('data-human');
    });
})();
`;

/**
 * Render a complete flamegraph page for `root`.
 */
export function report_renderHtml(root: UsageNode, meta: ReportMeta): string {
    const lines: string[] = [
        '<!DOCTYPE html>',
        '<html lang="en">',
        '<head>',
        '<meta charset="utf-8">',
        `<title>duflame - ${html_escape(meta.path)}</title>`,
        `<style>${STYLE}</style>`,
        '</head>',
        '<body>',
        '<header>',
        `<h1>${html_escape(meta.path)}</h1>`,
        `<p>${html_escape(meta.hostname)} &middot; ${html_escape(meta.time)} &middot; ${size_format(root.size)}</p>`,
        '<p id="hover"></p>',
        '</header>',
        '<main>',
    ];
    block_render(root, lines);
    lines.push('</main>', `<script>${SCRIPT}</script>`, '</body>', '</html>');
    return lines.join('\n') + '\n';
}

/**
 * Width of a block as a CSS declaration: the node's share of its parent.
 */
export function width_style(node: UsageNode): string {
    const ratio: number | null = share_compute(node);
    if (ratio === null) return 'width: 100%;';
    return `width: ${(ratio * 100).toFixed(2)}%;`;
}

/**
 * Title bar colour as a CSS declaration: smaller shares are paler.
 */
export function title_style(node: UsageNode): string {
    const ratio: number | null = share_compute(node);
    if (ratio === null) return 'background-color: azure;';
    return `background-color: rgb(${Math.trunc(100 + (1 - ratio) * 156)}, 255, 255);`;
}

/**
 * `data-*` attributes identifying a block.
 */
export function data_attributes(node: UsageNode): string {
    return `data-path="${html_escape(node.path_resolve())}" data-size="${node.size}" data-human="${size_format(node.size)}"`;
}

function block_render(node: UsageNode, lines: string[]): void {
    const classes: string = node.kind === 'aggregate' ? 'usage aggregate' : 'usage';
    lines.push(`<div class="${classes}" ${data_attributes(node)} style="${width_style(node)}">`);
    lines.push(
        `<div class="title" style="${title_style(node)}" title="${html_escape(node.name)}">`
        + `${html_escape(node.name)} ${size_format(node.size)}</div>`,
    );
    if (node.children.length > 0) {
        lines.push('<div class="entries">');
        for (const child of node.children) {
            block_render(child, lines);
        }
        lines.push('</div>');
    }
    lines.push('</div>');
}

/**
 * Fraction of the parent's size held by `node`, or null for the root and
 * for children of an empty parent.
 */
function share_compute(node: UsageNode): number | null {
    if (!node.parent || node.parent.size === 0) return null;
    return node.size / node.parent.size;
}
