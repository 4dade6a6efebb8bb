/**
 * @file Scan Settings
 *
 * Resolves the settings of one run with deterministic precedence
 * (flag > env > default). Numeric limits are clamped to their bounds
 * instead of rejected; values that are not numbers at all are usage errors.
 *
 * @module config/settings
 */

import { availableParallelism } from 'os';
import { z } from 'zod';

export const REPORT_FORMATS = ['html', 'text', 'json'] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

/** Output path that means "write to stdout". */
export const STDOUT_PATH = '-' as const;

export type NumericSettingKey = 'maxEntries' | 'maxDepth' | 'concurrency';

export type SettingSource = 'flag' | 'env' | 'default';

/**
 * Raw values as they arrive from the command line. Everything is optional;
 * absent values fall through to the environment and then to defaults.
 */
export interface RawSettings {
    rootPath?: string;
    outputPath?: string;
    format?: string;
    maxEntries?: string;
    maxDepth?: string;
    concurrency?: string;
    quiet?: boolean;
}

export interface ScanSettings {
    rootPath: string;
    outputPath: string;
    format: ReportFormat;
    maxEntries: number;
    maxDepth: number;
    concurrency: number;
    quiet: boolean;
}

export interface ResolvedSettings {
    settings: ScanSettings;
    sources: Record<NumericSettingKey, SettingSource>;
}

/**
 * Invalid invocation: unknown flag, missing flag value, or a value that
 * cannot be interpreted at all.
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

interface NumericBounds {
    min: number;
    max: number;
}

const BOUNDS: Record<NumericSettingKey, NumericBounds> = {
    maxEntries:  { min: 1, max: Number.MAX_SAFE_INTEGER },
    maxDepth:    { min: 1, max: Number.MAX_SAFE_INTEGER },
    concurrency: { min: 1, max: Number.MAX_SAFE_INTEGER },
};

const ENV_KEYS: Record<NumericSettingKey, string> = {
    maxEntries:  'DUFLAME_MAX_ENTRIES',
    maxDepth:    'DUFLAME_MAX_DEPTH',
    concurrency: 'DUFLAME_CONCURRENCY',
};

export const DEFAULT_ROOT_PATH = '.';
export const DEFAULT_OUTPUT_PATH = 'duflame.html';
export const DEFAULT_MAX_ENTRIES = 20;
export const DEFAULT_MAX_DEPTH = 8;

// ─── Schemas ──────────────────────────────────────────────────────────────────

const NumericSchema = z
    .string()
    .trim()
    .min(1, 'value is empty')
    .pipe(z.coerce.number().finite('value must be a number'));

const FormatSchema = z.enum(REPORT_FORMATS, {
    errorMap: () => ({ message: `format must be one of: ${REPORT_FORMATS.join(', ')}` }),
});

const PathSchema = z.string().min(1, 'path is empty');

// ─── Resolution ───────────────────────────────────────────────────────────────

/**
 * Resolve effective settings from raw flags and an environment.
 *
 * @param raw - Values parsed from the command line.
 * @param env - Environment to read overrides from.
 * @param cores - Default token budget.
 */
export function settings_resolve(
    raw: RawSettings,
    env: NodeJS.ProcessEnv = process.env,
    cores: number = availableParallelism(),
): ResolvedSettings {
    const defaults: Record<NumericSettingKey, number> = {
        maxEntries: DEFAULT_MAX_ENTRIES,
        maxDepth: DEFAULT_MAX_DEPTH,
        concurrency: cores,
    };

    const maxEntries = numeric_resolve('maxEntries', raw.maxEntries, env, defaults.maxEntries);
    const maxDepth = numeric_resolve('maxDepth', raw.maxDepth, env, defaults.maxDepth);
    const concurrency = numeric_resolve('concurrency', raw.concurrency, env, defaults.concurrency);

    return {
        settings: {
            rootPath: value_parse(PathSchema, raw.rootPath ?? DEFAULT_ROOT_PATH, '-C'),
            outputPath: value_parse(PathSchema, raw.outputPath ?? DEFAULT_OUTPUT_PATH, '-o'),
            format: value_parse(FormatSchema, raw.format ?? 'html', '--format'),
            maxEntries: maxEntries.value,
            maxDepth: maxDepth.value,
            concurrency: concurrency.value,
            quiet: raw.quiet === true,
        },
        sources: {
            maxEntries: maxEntries.source,
            maxDepth: maxDepth.source,
            concurrency: concurrency.source,
        },
    };
}

/**
 * Clamp a numeric setting into its bounds after rounding to an integer.
 */
export function value_clamp(key: NumericSettingKey, value: number): number {
    const bounds: NumericBounds = BOUNDS[key];
    return Math.max(bounds.min, Math.min(bounds.max, Math.round(value)));
}

function numeric_resolve(
    key: NumericSettingKey,
    flag: string | undefined,
    env: NodeJS.ProcessEnv,
    fallback: number,
): { value: number; source: SettingSource } {
    if (flag !== undefined) {
        return { value: value_clamp(key, value_parse(NumericSchema, flag, flag_name(key))), source: 'flag' };
    }

    const envRaw: string | undefined = env[ENV_KEYS[key]];
    if (envRaw) {
        return { value: value_clamp(key, value_parse(NumericSchema, envRaw, ENV_KEYS[key])), source: 'env' };
    }

    return { value: value_clamp(key, fallback), source: 'default' };
}

function value_parse<S extends z.ZodTypeAny>(schema: S, value: unknown, label: string): z.output<S> {
    const result = schema.safeParse(value);
    if (!result.success) {
        const issues: string = result.error.issues.map((issue: z.ZodIssue): string => issue.message).join('; ');
        throw new UsageError(`Invalid ${label} '${String(value)}': ${issues}`);
    }
    return result.data;
}

function flag_name(key: NumericSettingKey): string {
    switch (key) {
        case 'maxEntries':  return '--max-entries';
        case 'maxDepth':    return '--max-depth';
        case 'concurrency': return '--concurrency';
    }
}
