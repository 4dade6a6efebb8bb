#!/usr/bin/env node
/**
 * @file duflame CLI Entry Point
 *
 * Thin entry point that runs one scan with the real filesystem and exits
 * with the run's exit code.
 *
 * Usage:
 *   npx tsx src/cli/duflame-cli.ts -C ~/projects -o usage.html
 *   npx tsx src/cli/duflame-cli.ts --format text --max-depth 2 -o -
 *
 * @module
 */

import { duflame_run, nodeEnvironment_create } from './run.js';

duflame_run(process.argv.slice(2), nodeEnvironment_create())
    .then((code: number): void => {
        process.exitCode = code;
    })
    .catch((e: Error) => {
        console.error(`Fatal error: ${e.message}`);
        process.exit(1);
    });
