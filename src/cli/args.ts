/**
 * @file CLI Argument Parsing
 *
 * Turns argv into raw settings. Values stay strings here; validation and
 * clamping happen in config/settings.
 *
 * @module cli/args
 */

import { UsageError, type RawSettings } from '../config/settings.js';

export interface ParsedArgs {
    raw: RawSettings;
    help: boolean;
}

type ValueFlag = 'rootPath' | 'outputPath' | 'format' | 'maxEntries' | 'maxDepth' | 'concurrency';

const VALUE_FLAGS: ReadonlyMap<string, ValueFlag> = new Map<string, ValueFlag>([
    ['-C', 'rootPath'],
    ['--dir', 'rootPath'],
    ['-o', 'outputPath'],
    ['--output', 'outputPath'],
    ['--format', 'format'],
    ['--max-entries', 'maxEntries'],
    ['--max-depth', 'maxDepth'],
    ['--concurrency', 'concurrency'],
]);

export const USAGE_TEXT: string = `Usage: duflame [options]

Scan a directory tree and write a disk usage flamegraph.

Options:
  -C, --dir <path>         directory to scan (default: .)
  -o, --output <path>      output file, '-' for stdout (default: duflame.html)
      --format <format>    html | text | json (default: html)
      --max-entries <n>    children kept per node before folding (default: 20)
      --max-depth <n>      deepest level rendered (default: 8)
      --concurrency <n>    directory listings in flight (default: CPU cores)
  -q, --quiet              only print errors
  -h, --help               show this help

Environment:
  DUFLAME_MAX_ENTRIES, DUFLAME_MAX_DEPTH, DUFLAME_CONCURRENCY`;

/**
 * Parse argv (without the node and script entries).
 *
 * Accepts both `--flag value` and `--flag=value`. The last occurrence of a
 * flag wins.
 */
export function args_parse(argv: readonly string[]): ParsedArgs {
    const raw: RawSettings = {};
    let help: boolean = false;

    for (let i: number = 0; i < argv.length; i++) {
        const arg: string = argv[i];

        if (arg === '-h' || arg === '--help') {
            help = true;
            continue;
        }
        if (arg === '-q' || arg === '--quiet') {
            raw.quiet = true;
            continue;
        }

        const eq: number = arg.startsWith('--') ? arg.indexOf('=') : -1;
        const flag: string = eq > 0 ? arg.slice(0, eq) : arg;
        const key: ValueFlag | undefined = VALUE_FLAGS.get(flag);
        if (!key) {
            throw new UsageError(arg.startsWith('-') ? `Unknown option: ${arg}` : `Unexpected argument: ${arg}`);
        }

        if (eq > 0) {
            raw[key] = arg.slice(eq + 1);
            continue;
        }
        const value: string | undefined = argv[i + 1];
        if (value === undefined) {
            throw new UsageError(`Option ${flag} needs a value`);
        }
        raw[key] = value;
        i++;
    }

    return { raw, help };
}
