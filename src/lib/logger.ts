export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

let activeLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
    activeLevel = level;
}

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

function enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[activeLevel];
}

/**
 * Console logger whose lines carry a `[namespace]` prefix.
 */
export function createLogger(namespace: string): Logger {
    const prefix = `[${namespace}]`;
    return {
        debug: (message, ...details) => {
            if (enabled("debug")) console.debug(prefix, message, ...details);
        },
        info: (message, ...details) => {
            if (enabled("info")) console.log(prefix, message, ...details);
        },
        warn: (message, ...details) => {
            if (enabled("warn")) console.warn(prefix, message, ...details);
        },
        error: (message, ...details) => {
            if (enabled("error")) console.error(prefix, message, ...details);
        },
    };
}
