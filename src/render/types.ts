/**
 * @file Report Types
 *
 * @module render/types
 */

import type { UsageNode } from '../usage/UsageNode.js';

/**
 * Run metadata shown alongside the usage tree.
 */
export interface ReportMeta {
    /** Absolute path of the scan root. */
    path: string;
    hostname: string;
    /** Scan time, formatted `YYYY-MM-DD HH:mm:ss` in local time. */
    time: string;
}

/**
 * Renders a compacted usage tree. Renderers never mutate the tree.
 */
export type ReportRenderer = (root: UsageNode, meta: ReportMeta) => string;
