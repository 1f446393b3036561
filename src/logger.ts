/**
 * Leveled logger used by the client and frame pump.
 * @module logger
 */
export enum LogLevel {
    Debug = 'DEBUG',
    Info = 'INFO',
    Warn = 'WARN',
    Error = 'ERROR',
}

/**
 * Minimal logging surface. Any object with these four methods can be injected
 * through client options.
 */
export interface Logger {
    debug(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    error(message: string, meta?: Record<string, unknown>): void;
}

export type ConsoleLoggerOptions = {
    /** Emit debug-level lines. Default: `false`. */
    debug?: boolean;
    /** Prefix placed before every message, e.g. the port path. */
    scope?: string;
};

/**
 * Console logger writing `[timestamp] [LEVEL] message {meta}` lines.
 */
export class ConsoleLogger implements Logger {
    private readonly debugEnabled: boolean;
    private readonly scope?: string;

    constructor(options: ConsoleLoggerOptions = {}) {
        this.debugEnabled = options.debug ?? false;
        this.scope = options.scope;
    }

    public debug(message: string, meta?: Record<string, unknown>): void {
        if (this.debugEnabled) console.log(this.format(LogLevel.Debug, message, meta));
    }

    public info(message: string, meta?: Record<string, unknown>): void {
        console.log(this.format(LogLevel.Info, message, meta));
    }

    public warn(message: string, meta?: Record<string, unknown>): void {
        console.warn(this.format(LogLevel.Warn, message, meta));
    }

    public error(message: string, meta?: Record<string, unknown>): void {
        console.error(this.format(LogLevel.Error, message, meta));
    }

    private format(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
        const scope = this.scope ? `[${this.scope}] ` : '';
        const metaStr = meta ? ` ${JSON.stringify(meta, jsonReplacer)}` : '';
        return `[${new Date().toISOString()}] [${level}] ${scope}${message}${metaStr}`;
    }
}

const jsonReplacer = (_key: string, value: unknown): unknown => {
    if (value instanceof Error) return {name: value.name, message: value.message};
    if (typeof value === 'object' && value !== null && 'type' in value && value.type === 'Buffer' && 'data' in value && Array.isArray(value.data)) {
        return Buffer.from(value.data).toString('hex');
    }
    return value;
};

/** Logger that discards everything. */
export const silentLogger: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
};

export const createConsoleLogger = (options?: ConsoleLoggerOptions): Logger => new ConsoleLogger(options);
