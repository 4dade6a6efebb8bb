/**
 * @file Scan Command
 *
 * One complete run: parse arguments, resolve settings, build the usage tree,
 * compact it, render it and write the report. Host access goes through a
 * `RunEnvironment` so runs can be driven in-process.
 *
 * Exit codes: 0 success, 1 fatal I/O failure, 2 usage error.
 *
 * @module cli/run
 */

import type { Stats } from 'fs';
import { stat, writeFile } from 'fs/promises';
import { hostname } from 'os';
import { resolve } from 'path';
import { settings_resolve, STDOUT_PATH, UsageError, type ScanSettings } from '../config/settings.js';
import { NodeLister } from '../fs/NodeLister.js';
import type { DirectoryLister } from '../fs/types.js';
import { Logger, type LogSink } from '../log/logger.js';
import { renderer_select, size_format, time_format, type ReportMeta } from '../render/index.js';
import { usageTree_build, type BuildResult } from '../usage/builder.js';
import { usageTree_compact } from '../usage/compactor.js';
import { args_parse, USAGE_TEXT, type ParsedArgs } from './args.js';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

export interface RunEnvironment {
    lister: DirectoryLister;
    env: NodeJS.ProcessEnv;
    cwd: string;
    /** Default token budget. */
    cores?: number;
    /** Rejects unless `dirPath` is an existing directory. */
    root_check(dirPath: string): Promise<void>;
    report_write(outputPath: string, content: string): Promise<void>;
    stdout_write(content: string): void;
    stderr_write(content: string): void;
    hostname_get(): string;
    now(): Date;
    logSink?: LogSink;
}

/**
 * Environment backed by the real filesystem and process.
 */
export function nodeEnvironment_create(): RunEnvironment {
    return {
        lister: new NodeLister(),
        env: process.env,
        cwd: process.cwd(),
        root_check: async (dirPath: string): Promise<void> => {
            const stats: Stats = await stat(dirPath);
            if (!stats.isDirectory()) {
                throw new Error(`Not a directory: ${dirPath}`);
            }
        },
        report_write: (outputPath: string, content: string): Promise<void> => writeFile(outputPath, content, 'utf-8'),
        stdout_write: (content: string): void => {
            process.stdout.write(content);
        },
        stderr_write: (content: string): void => {
            process.stderr.write(content);
        },
        hostname_get: (): string => hostname(),
        now: (): Date => new Date(),
    };
}

/**
 * Execute one run and return its exit code.
 */
export async function duflame_run(argv: readonly string[], runEnv: RunEnvironment): Promise<number> {
    const bootLogger: Logger = new Logger({ sink: runEnv.logSink });

    let parsed: ParsedArgs;
    let settings: ScanSettings;
    try {
        parsed = args_parse(argv);
        if (parsed.help) {
            runEnv.stdout_write(USAGE_TEXT + '\n');
            return EXIT_OK;
        }
        settings = settings_resolve(parsed.raw, runEnv.env, runEnv.cores).settings;
    } catch (error: unknown) {
        if (error instanceof UsageError) {
            bootLogger.error(error.message);
            runEnv.stderr_write(USAGE_TEXT + '\n');
            return EXIT_USAGE;
        }
        throw error;
    }

    // Reports on stdout must not be interleaved with progress lines.
    const toStdout: boolean = settings.outputPath === STDOUT_PATH;
    const logger: Logger = new Logger({ quiet: settings.quiet, progress: !toStdout, sink: runEnv.logSink });
    const rootPath: string = resolve(runEnv.cwd, settings.rootPath);

    try {
        await runEnv.root_check(rootPath);
    } catch (error: unknown) {
        logger.error(`Cannot scan ${rootPath}: ${error_message(error)}`);
        return EXIT_FATAL;
    }

    logger.info(`Scanning ${rootPath} (concurrency ${settings.concurrency})`);
    const startedAt: Date = runEnv.now();
    const result: BuildResult = await usageTree_build(rootPath, {
        lister: runEnv.lister,
        concurrency: settings.concurrency,
        onError: (error: Error, failedPath: string): void => {
            logger.warn(`skip ${failedPath}: ${error.message}`);
        },
    });
    const elapsedMs: number = runEnv.now().getTime() - startedAt.getTime();

    usageTree_compact(result.root, { maxEntries: settings.maxEntries, maxDepth: settings.maxDepth });

    let host: string;
    try {
        host = runEnv.hostname_get();
    } catch (error: unknown) {
        logger.error(`Cannot resolve host name: ${error_message(error)}`);
        return EXIT_FATAL;
    }

    try {
        const meta: ReportMeta = {
            path: rootPath,
            hostname: host,
            time: time_format(startedAt),
        };
        const content: string = renderer_select(settings.format)(result.root, meta);
        if (toStdout) {
            runEnv.stdout_write(content);
        } else {
            await runEnv.report_write(settings.outputPath, content);
        }
    } catch (error: unknown) {
        logger.error(`Cannot write report: ${error_message(error)}`);
        return EXIT_FATAL;
    }

    const { directories, files, failures } = result.stats;
    logger.success(
        `${directories} directories, ${files} files, ${failures} skipped, `
        + `${size_format(result.root.size)} in ${elapsedMs} ms`,
    );
    if (!toStdout) {
        logger.success(`Report written to ${settings.outputPath}`);
    }
    return EXIT_OK;
}

function error_message(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
