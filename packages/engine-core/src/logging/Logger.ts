/**
 * Logger — leveled console output with a context tag.
 *
 * Example output:
 * [12:34:56] [WARN] [ResourceCache] — release() on 'hero.png' with no references
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    /** Info line, throttled per distinct message. */
    event(message: string): void;
    child(context: string): Logger;
}

/** Where formatted lines go. Defaults to the global console. */
export interface LogSink {
    log(line: string): void;
    warn(line: string): void;
    error(line: string): void;
}

export interface ConsoleLoggerOptions {
    level?: LogLevel;
    context?: string;
    /** Minimum gap between two `event()` lines with the same text. */
    eventThrottleMs?: number;
    sink?: LogSink;
    now?: () => number;
}

/** Level, sink and throttle table shared between a logger and its children. */
export interface SharedLogState {
    level: LogLevel;
    eventThrottleMs: number;
    sink: LogSink;
    now: () => number;
    lastEventAt: Map<string, number>;
}

export class ConsoleLogger implements Logger {
    private readonly context: string;
    private readonly shared: SharedLogState;

    constructor(options: ConsoleLoggerOptions = {}, shared?: SharedLogState) {
        this.context = options.context ?? 'Engine';
        this.shared = shared ?? {
            level: options.level ?? 'info',
            eventThrottleMs: options.eventThrottleMs ?? 1000,
            sink: options.sink ?? console,
            now: options.now ?? Date.now,
            lastEventAt: new Map(),
        };
    }

    get level(): LogLevel {
        return this.shared.level;
    }

    setLevel(level: LogLevel): void {
        this.shared.level = level;
    }

    debug(message: string): void {
        if (this.enabled('debug')) this.shared.sink.log(this.format('DEBUG', message));
    }

    info(message: string): void {
        if (this.enabled('info')) this.shared.sink.log(this.format('INFO', message));
    }

    warn(message: string): void {
        if (this.enabled('warn')) this.shared.sink.warn(this.format('WARN', message));
    }

    error(message: string): void {
        if (this.enabled('error')) this.shared.sink.error(this.format('ERROR', message));
    }

    event(message: string): void {
        const key = `${this.context}\u0000${message}`;
        const now = this.shared.now();
        const last = this.shared.lastEventAt.get(key);
        if (last !== undefined && now - last <= this.shared.eventThrottleMs) return;
        this.shared.lastEventAt.set(key, now);
        this.info(message);
    }

    /** Same level, sink and throttle table; new context tag. */
    child(context: string): ConsoleLogger {
        return new ConsoleLogger({ context }, this.shared);
    }

    private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
        return LEVEL_RANK[level] >= LEVEL_RANK[this.shared.level];
    }

    private format(tag: string, message: string): string {
        return `[${timestamp(this.shared.now())}] [${tag}] [${this.context}] — ${message}`;
    }
}

function timestamp(ms: number): string {
    const d = new Date(ms);
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

/** A logger that drops everything; for tests and embedding. */
export function createSilentLogger(): ConsoleLogger {
    return new ConsoleLogger({ level: 'silent' });
}
