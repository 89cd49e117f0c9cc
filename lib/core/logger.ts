/**
 * Scoped Logger
 *
 * Every module creates its own logger with a scope name, so a line in the
 * output can always be traced back to where it came from:
 *
 * ```
 * 2025-01-01T10:00:00.000Z INFO  [extraction-gateway] Extraction complete {"fields":3}
 * ```
 *
 * The level threshold is process-wide and is set once from configuration.
 *
 * @module logger
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogMeta = Record<string, unknown>;

export interface Logger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

function serializeMeta(meta?: LogMeta): string {
    if (!meta || Object.keys(meta).length === 0) {
        return "";
    }
    try {
        return " " + JSON.stringify(meta);
    } catch {
        return " [unserializable meta]";
    }
}

function write(level: Exclude<LogLevel, "silent">, scope: string, message: string, meta?: LogMeta): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
        return;
    }

    const line = `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} [${scope}] ${message}${serializeMeta(meta)}`;

    if (level === "error") {
        console.error(line);
    } else if (level === "warn") {
        console.warn(line);
    } else {
        console.log(line);
    }
}

/**
 * Create a logger bound to a scope (usually the module name).
 */
export function createLogger(scope: string): Logger {
    return {
        debug: (message, meta) => write("debug", scope, message, meta),
        info: (message, meta) => write("info", scope, message, meta),
        warn: (message, meta) => write("warn", scope, message, meta),
        error: (message, meta) => write("error", scope, message, meta),
    };
}
