/**
 * @fileoverview Logger Contract
 *
 * The one logging shape shared by the engine, its plugins and the
 * domains built on top of it. Structured data rides along as a plain
 * record so any sink (console, file, collector) can serialize it.
 *
 * @module @maritime-triage/engine/contracts/Logger
 */

/**
 * Severity levels, lowest first.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Ordered list of levels. Index is the severity rank.
 */
export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Logger interface.
 */
export interface Logger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Type guard for a log level string (e.g. read from the environment).
 */
export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === "string" && LOG_LEVELS.some(level => level === value);
}

/**
 * Render an unknown thrown value as a log-friendly message.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
