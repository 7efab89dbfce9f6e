/**
 * Minimal scoped logger.
 *
 * Components take a Logger through their options and never log through a
 * module-level instance. Output goes to the console with a `[scope]` prefix.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
    /** Derive a logger with `scope` appended to this one's scope. */
    child(scope: string): Logger;
}

/** The subset of Console a logger writes to. */
export type LogSink = Pick<Console, "debug" | "info" | "warn" | "error">;

const RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export function createLogger(scope: string, level: LogLevel = "info", sink: LogSink = console): Logger {
    const threshold = RANK[level];
    const prefix = `[${scope}]`;

    const write = (at: Exclude<LogLevel, "silent">, message: string): void => {
        if (RANK[at] < threshold) return;
        sink[at](`${prefix} ${message}`);
    };

    return {
        debug: (message) => write("debug", message),
        info: (message) => write("info", message),
        warn: (message) => write("warn", message),
        error: (message) => write("error", message),
        child: (child) => createLogger(`${scope}:${child}`, level, sink),
    };
}

export const silentLogger: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    child: () => silentLogger,
};
