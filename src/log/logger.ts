/**
 * @file Console Logger
 *
 * Levelled terminal output with chalk colouring and a marker per level.
 * Info and success go to the out sink, warnings and errors to the err sink.
 * A quiet logger prints errors only; with `progress: false` it drops info
 * and success but keeps warnings.
 *
 * @module log/logger
 */

import chalk from 'chalk';

export type LogLevel = 'info' | 'success' | 'warn' | 'error';

/**
 * Markers prefixed to each line, one per level.
 */
export const MARKERS: Record<LogLevel, string> = {
    info: '○',
    success: '●',
    warn: '>> WARNING:',
    error: '>> ERROR:',
};

/**
 * Where formatted lines are written. Defaults to the console streams.
 */
export interface LogSink {
    out: (line: string) => void;
    err: (line: string) => void;
}

const CONSOLE_SINK: LogSink = {
    out: (line: string): void => console.log(line),
    err: (line: string): void => console.error(line),
};

export interface LoggerOptions {
    /** Print errors only. */
    quiet?: boolean;
    /** Print info and success lines. Defaults to true. */
    progress?: boolean;
    sink?: LogSink;
}

export class Logger {
    private readonly quiet: boolean;
    private readonly progress: boolean;
    private readonly sink: LogSink;

    constructor(options: LoggerOptions = {}) {
        this.quiet = options.quiet === true;
        this.progress = options.progress !== false;
        this.sink = options.sink ?? CONSOLE_SINK;
    }

    public info(message: string): void {
        if (this.quiet || !this.progress) return;
        this.sink.out(line_format('info', message));
    }

    public success(message: string): void {
        if (this.quiet || !this.progress) return;
        this.sink.out(line_format('success', message));
    }

    public warn(message: string): void {
        if (this.quiet) return;
        this.sink.err(line_format('warn', message));
    }

    public error(message: string): void {
        this.sink.err(line_format('error', message));
    }
}

/**
 * Prefix a message with its level marker and colour it.
 */
export function line_format(level: LogLevel, message: string): string {
    const text: string = `${MARKERS[level]} ${message}`;
    switch (level) {
        case 'success': return chalk.cyan(text);
        case 'error':   return chalk.red(text);
        case 'warn':    return chalk.yellow(text);
        case 'info':    return chalk.white(text);
    }
}
