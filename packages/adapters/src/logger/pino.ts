import type { LogLevel, Logger } from '@synapse/core';
import pino, { type Logger as PinoInstance, type LoggerOptions } from 'pino';

export interface PinoLoggerOptions {
    level?: LogLevel;
    prettyPrint?: boolean;
    /** Service name stamped on every line. */
    name?: string;
}

type LogArgs = [obj: Record<string, unknown>, msg?: string] | [msg: string];

/**
 * Logger port backed by pino. Pretty output goes through the pino-pretty
 * transport and is meant for local runs only.
 */
export class PinoLogger implements Logger {
    private readonly pino: PinoInstance;

    constructor(options: PinoLoggerOptions | PinoInstance = {}) {
        this.pino = 'child' in options ? options : pino(buildOptions(options));
    }

    public trace(obj: Record<string, unknown>, msg?: string): void;
    public trace(msg: string): void;
    public trace(...args: LogArgs): void {
        this.write('trace', args);
    }

    public debug(obj: Record<string, unknown>, msg?: string): void;
    public debug(msg: string): void;
    public debug(...args: LogArgs): void {
        this.write('debug', args);
    }

    public info(obj: Record<string, unknown>, msg?: string): void;
    public info(msg: string): void;
    public info(...args: LogArgs): void {
        this.write('info', args);
    }

    public warn(obj: Record<string, unknown>, msg?: string): void;
    public warn(msg: string): void;
    public warn(...args: LogArgs): void {
        this.write('warn', args);
    }

    public error(obj: Record<string, unknown>, msg?: string): void;
    public error(msg: string): void;
    public error(...args: LogArgs): void {
        this.write('error', args);
    }

    public fatal(obj: Record<string, unknown>, msg?: string): void;
    public fatal(msg: string): void;
    public fatal(...args: LogArgs): void {
        this.write('fatal', args);
    }

    public child(bindings: Record<string, unknown>): Logger {
        return new PinoLogger(this.pino.child(bindings));
    }

    private write(level: LogLevel, args: LogArgs): void {
        const [first, second] = args;
        if (typeof first === 'string') {
            this.pino[level](first);
        } else {
            this.pino[level](first, second);
        }
    }
}

function buildOptions(options: PinoLoggerOptions): LoggerOptions {
    const { level = 'info', prettyPrint = false, name } = options;

    const pinoOptions: LoggerOptions = { level };

    if (name) {
        pinoOptions.name = name;
    }

    if (prettyPrint) {
        pinoOptions.transport = {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        };
    }

    return pinoOptions;
}

