import type { LogLevel, Logger } from '@synapse/core';

export interface CapturedLog {
    level: LogLevel;
    msg?: string;
    obj?: Record<string, unknown>;
    bindings: Record<string, unknown>;
}

type LogArgs = [obj: Record<string, unknown>, msg?: string] | [msg: string];

/**
 * Records every entry in memory. Children share the parent's log list and
 * carry their merged bindings, so tests can assert on both.
 */
export class FakeLogger implements Logger {
    public readonly logs: CapturedLog[];
    private readonly bindings: Record<string, unknown>;

    constructor(bindings: Record<string, unknown> = {}, logs: CapturedLog[] = []) {
        this.bindings = bindings;
        this.logs = logs;
    }

    public trace(obj: Record<string, unknown>, msg?: string): void;
    public trace(msg: string): void;
    public trace(...args: LogArgs): void {
        this.record('trace', args);
    }

    public debug(obj: Record<string, unknown>, msg?: string): void;
    public debug(msg: string): void;
    public debug(...args: LogArgs): void {
        this.record('debug', args);
    }

    public info(obj: Record<string, unknown>, msg?: string): void;
    public info(msg: string): void;
    public info(...args: LogArgs): void {
        this.record('info', args);
    }

    public warn(obj: Record<string, unknown>, msg?: string): void;
    public warn(msg: string): void;
    public warn(...args: LogArgs): void {
        this.record('warn', args);
    }

    public error(obj: Record<string, unknown>, msg?: string): void;
    public error(msg: string): void;
    public error(...args: LogArgs): void {
        this.record('error', args);
    }

    public fatal(obj: Record<string, unknown>, msg?: string): void;
    public fatal(msg: string): void;
    public fatal(...args: LogArgs): void {
        this.record('fatal', args);
    }

    public child(bindings: Record<string, unknown>): Logger {
        return new FakeLogger({ ...this.bindings, ...bindings }, this.logs);
    }

    /** Entries at `level`, optionally narrowed to one message. */
    public entries(level: LogLevel, msg?: string): CapturedLog[] {
        return this.logs.filter((log) => log.level === level && (msg === undefined || log.msg === msg));
    }

    private record(level: LogLevel, args: LogArgs): void {
        const [first, second] = args;
        if (typeof first === 'string') {
            this.logs.push({ level, msg: first, bindings: this.bindings });
            return;
        }
        const entry: CapturedLog = { level, obj: first, bindings: this.bindings };
        if (second !== undefined) {
            entry.msg = second;
        }
        this.logs.push(entry);
    }
}
