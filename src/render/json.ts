/**
 * @file JSON Report Renderer
 *
 * @module render/json
 */

import { usageNode_toJSON, type UsageJSON, type UsageNode } from '../usage/UsageNode.js';
import type { ReportMeta } from './types.js';

export interface JsonReport {
    meta: ReportMeta;
    usage: UsageJSON;
}

export function report_renderJson(root: UsageNode, meta: ReportMeta): string {
    const report: JsonReport = { meta, usage: usageNode_toJSON(root) };
    return JSON.stringify(report, null, 2) + '\n';
}
