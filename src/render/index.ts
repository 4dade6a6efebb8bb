/**
 * @file Report Rendering
 *
 * @module render
 */

import type { ReportFormat } from '../config/settings.js';
import { report_renderHtml } from './html.js';
import { report_renderJson } from './json.js';
import { report_renderText } from './text.js';
import type { ReportRenderer } from './types.js';

export type { ReportMeta, ReportRenderer } from './types.js';
export { size_format, time_format } from './format.js';

const RENDERERS: Record<ReportFormat, ReportRenderer> = {
    html: report_renderHtml,
    text: report_renderText,
    json: report_renderJson,
};

/**
 * Select the renderer for an output format.
 */
export function renderer_select(format: ReportFormat): ReportRenderer {
    return RENDERERS[format];
}
