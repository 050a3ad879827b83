/**
 * Monitor logger
 * - Prefixes every line with [HH:MM:SS] and a [Scope] tag
 * - Drops a message identical to the previous one from the same logger,
 *   unless created with `dedupe: false`
 */

import { formatClock } from './clock';

export type LogLevel = 'log' | 'warn' | 'error';

export type LogSink = (level: LogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
    console[level](line);
};

let sink: LogSink = consoleSink;
// Bumped on every sink swap so each logger starts fresh on the new sink
let sinkGeneration = 0;

/**
 * Redirects all log output, e.g. into the terminal UI log pane.
 * Passing nothing restores the console.
 */
export function setLogSink(next?: LogSink): void {
    sink = next ?? consoleSink;
    sinkGeneration++;
}

function stringify(arg: unknown): string {
    if (arg instanceof Error) {
        return arg.message;
    }
    if (typeof arg === 'object' && arg !== null) {
        try {
            return JSON.stringify(arg);
        } catch {
            return String(arg);
        }
    }
    return String(arg);
}

export interface LoggerOptions {
    /** Drop a message identical to this logger's previous one (default true) */
    dedupe?: boolean;
}

export class MonitorLogger {
    private lastLogMessage: string | null = null;
    private generation = sinkGeneration;
    private readonly dedupe: boolean;

    constructor(private readonly scope: string, options: LoggerOptions = {}) {
        this.dedupe = options.dedupe ?? true;
    }

    private isDuplicate(message: string): boolean {
        if (this.generation !== sinkGeneration) {
            this.generation = sinkGeneration;
            this.lastLogMessage = null;
        }
        return this.dedupe && this.lastLogMessage === message;
    }

    private logMessage(level: LogLevel, args: unknown[]): void {
        const messageStr = `[${this.scope}] ${args.map(stringify).join(' ')}`;

        if (this.isDuplicate(messageStr)) {
            return;
        }
        this.lastLogMessage = messageStr;

        sink(level, `[${formatClock(new Date())}] ${messageStr}`);
    }

    log(...args: unknown[]): void {
        this.logMessage('log', args);
    }

    warn(...args: unknown[]): void {
        this.logMessage('warn', args);
    }

    error(...args: unknown[]): void {
        this.logMessage('error', args);
    }
}

export function createLogger(scope: string, options?: LoggerOptions): MonitorLogger {
    return new MonitorLogger(scope, options);
}
