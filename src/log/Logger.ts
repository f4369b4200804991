/**
 * @file Diagnostic Logger
 *
 * Leveled diagnostic output for the command runner and the device library.
 * Everything goes to the diagnostic stream (stderr by default); command
 * output proper never passes through here.
 *
 * Levels are ordered `error < info < debug < raw`. `raw` carries device
 * traffic and is only enabled by `--verbose=raw`.
 *
 * @module log
 */

import { Chalk, type ChalkInstance } from 'chalk';

export type LogLevel = 'error' | 'info' | 'debug' | 'raw';

/** Line sink for rendered log lines. */
export type LogSink = (line: string) => void;

export interface LoggerOptions {
    level?: LogLevel;
    color?: boolean;
    sink?: LogSink;
}

const LEVEL_RANK: Record<LogLevel, number> = {
    error: 0,
    info: 1,
    debug: 2,
    raw: 3,
};

export class Logger {
    private level: LogLevel;
    private readonly paint: ChalkInstance;
    private readonly sink: LogSink;

    constructor(options: LoggerOptions = {}) {
        this.level = options.level ?? 'info';
        this.paint = new Chalk({ level: options.color ? 1 : 0 });
        this.sink = options.sink ?? ((line: string): void => console.error(line));
    }

    public level_set(level: LogLevel): void {
        this.level = level;
    }

    /**
     * Whether a message at `level` would be emitted.
     */
    public isEnabled(level: LogLevel): boolean {
        return LEVEL_RANK[level] <= LEVEL_RANK[this.level];
    }

    public error(message: string): void {
        this.emit('error', this.paint.red(`error: ${message}`));
    }

    public debug(message: string): void {
        this.emit('debug', this.paint.dim(`debug: ${message}`));
    }

    public raw(message: string): void {
        this.emit('raw', this.paint.magenta(`raw: ${message}`));
    }

    private emit(level: LogLevel, line: string): void {
        if (!this.isEnabled(level)) return;
        this.sink(line);
    }
}
