/**
 * @fileoverview Console Logger
 *
 * Default Logger implementation. Writes `[LEVEL] [prefix] message` lines
 * and drops anything below the configured level.
 *
 * @module @maritime-triage/engine/impl/ConsoleLogger
 */

import { LOG_LEVELS, type Logger, type LogLevel } from "../contracts/Logger.js";

/**
 * Console logger options.
 */
export interface ConsoleLoggerOptions {
    /** Tag printed after the level, e.g. "TriageEngine" */
    readonly prefix?: string;

    /** Minimum level to print (default: "info") */
    readonly level?: LogLevel;
}

/**
 * Create a console-backed logger.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ prefix: "inbox", level: "debug" });
 * logger.info("Picked up file", { file: "alert-17.txt" });
 * // [INFO] [inbox] Picked up file { file: 'alert-17.txt' }
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
    const threshold = LOG_LEVELS.indexOf(options.level ?? "info");
    const tag       = options.prefix ? ` [${options.prefix}]` : "";

    const enabled = (level: LogLevel): boolean => LOG_LEVELS.indexOf(level) >= threshold;

    return {
        debug: (msg, data) => {
            if (enabled("debug")) {
                console.debug(`[DEBUG]${tag} ${msg}`, data ?? "");
            }
        },
        info : (msg, data) => {
            if (enabled("info")) {
                console.info(`[INFO]${tag} ${msg}`, data ?? "");
            }
        },
        warn : (msg, data) => {
            if (enabled("warn")) {
                console.warn(`[WARN]${tag} ${msg}`, data ?? "");
            }
        },
        error: (msg, data) => {
            if (enabled("error")) {
                console.error(`[ERROR]${tag} ${msg}`, data ?? "");
            }
        },
    };
}

/**
 * Logger that discards everything. Handy for library callers that do
 * not want output.
 */
export const silentLogger: Logger = {
    debug: () => undefined,
    info : () => undefined,
    warn : () => undefined,
    error: () => undefined,
};
