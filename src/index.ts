/**
 * @file duflame
 *
 * Public API: build a usage tree, compact it, render it.
 *
 * @module
 */

export { UsageNode, ROOT_NAME, OTHERS_NAME, usageNode_toJSON } from './usage/UsageNode.js';
export type { UsageJSON, UsageNodeKind } from './usage/UsageNode.js';
export { usageTree_build, usageNode_populate } from './usage/builder.js';
export type { BuildOptions, BuildResult, BuildStats, TraversalErrorSink } from './usage/builder.js';
export { usageTree_compact } from './usage/compactor.js';
export type { CompactOptions } from './usage/compactor.js';
export { TokenBudget } from './usage/TokenBudget.js';
export { WorkGroup } from './usage/WorkGroup.js';
export { NodeLister } from './fs/NodeLister.js';
export { MemoryVolume } from './fs/MemoryVolume.js';
export type { DirectoryLister, ListedEntry } from './fs/types.js';
export { settings_resolve, UsageError } from './config/settings.js';
export type { ScanSettings, RawSettings, ReportFormat } from './config/settings.js';
export { renderer_select } from './render/index.js';
export type { ReportMeta, ReportRenderer } from './render/index.js';
export { duflame_run, nodeEnvironment_create } from './cli/run.js';
