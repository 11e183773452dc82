/**
 * @fileoverview Runtime settings
 *
 * Reads TRIAGE_* variables (loaded from .env by dotenv at startup),
 * applies defaults and validates them.
 *
 * @module config/settings
 */

import { resolve } from "path";
import { isLogLevel, LOG_LEVELS, type LogLevel } from "@maritime-triage/engine";
import { DEFAULT_CATALOG_PATH } from "./loadCatalog.js";

export interface Settings {
    readonly catalogPath: string;
    readonly dbPath: string;
    readonly inboxDir: string;
    readonly pollIntervalMs: number;
    readonly batchSize: number;
    readonly summaryMaxLength: number;
    readonly logLevel: LogLevel;
    readonly vesselId?: string;
}

/**
 * Raised for an environment variable that does not parse.
 */
export class SettingsError extends Error {
    readonly variable: string;

    constructor(variable: string, message: string) {
        super(`${variable} ${message}`);
        this.name     = "SettingsError";
        this.variable = variable;
    }
}

type Env = Readonly<Record<string, string | undefined>>;

function read(env: Env, name: string): string | undefined {
    const value = env[name]?.trim();
    return value ? value : undefined;
}

function positiveInteger(env: Env, name: string, fallback: number): number {
    const raw = read(env, name);
    if (raw === undefined) {
        return fallback;
    }

    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        throw new SettingsError(name, `must be a positive integer (got "${raw}")`);
    }
    return value;
}

/**
 * Build settings from environment variables.
 *
 * Relative paths resolve against `cwd`.
 *
 * @throws SettingsError naming the offending variable
 */
export function loadSettings(env: Env = process.env, cwd: string = process.cwd()): Settings {
    const logLevel = read(env, "TRIAGE_LOG_LEVEL") ?? "info";
    if (!isLogLevel(logLevel)) {
        throw new SettingsError("TRIAGE_LOG_LEVEL", `must be one of ${LOG_LEVELS.join(", ")} (got "${logLevel}")`);
    }

    const catalogPath = read(env, "TRIAGE_CATALOG_PATH");
    const vesselId    = read(env, "TRIAGE_VESSEL_ID");

    return {
        catalogPath       : catalogPath ? resolve(cwd, catalogPath) : DEFAULT_CATALOG_PATH,
        dbPath            : resolve(cwd, read(env, "TRIAGE_DB_PATH") ?? "data/triage.db"),
        inboxDir          : resolve(cwd, read(env, "TRIAGE_INBOX_DIR") ?? "inbox"),
        pollIntervalMs    : positiveInteger(env, "TRIAGE_POLL_INTERVAL_MS", 30000),
        batchSize         : positiveInteger(env, "TRIAGE_BATCH_SIZE", 10),
        summaryMaxLength  : positiveInteger(env, "TRIAGE_SUMMARY_MAX_LENGTH", 150),
        logLevel,
        ...(vesselId !== undefined && { vesselId }),
    };
}
