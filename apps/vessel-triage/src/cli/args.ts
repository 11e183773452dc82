/**
 * @fileoverview Command-line argument parsing
 *
 * Usage:
 *   vessel-triage process <file|-> [--vessel ID] [--type TYPE] [--no-save] [--json]
 *   vessel-triage watch [dir] [--vessel ID] [--type TYPE]
 *   vessel-triage history [--limit N] [--days N] [--vessel ID] [--classification C] [--priority P]
 *   vessel-triage stats [--days N]
 *   vessel-triage cleanup [--days N]
 *   vessel-triage help
 *
 * @module cli/args
 */

import {
    CLASSIFICATION_CATEGORIES,
    PRIORITY_LEVELS,
    parseClassificationCategory,
    parsePriorityLevel,
    type ClassificationCategory,
    type PriorityLevel,
} from "../domain/types.js";

export type Command =
    | {
        readonly command: "process";
        readonly file: string;
        readonly vesselId?: string;
        readonly documentType?: string;
        readonly save: boolean;
        readonly json: boolean;
    }
    | {
        readonly command: "watch";
        readonly inboxDir?: string;
        readonly vesselId?: string;
        readonly documentType?: string;
    }
    | {
        readonly command: "history";
        readonly limit: number;
        readonly days: number;
        readonly vesselId?: string;
        readonly classification?: ClassificationCategory;
        readonly priority?: PriorityLevel;
    }
    | { readonly command: "stats"; readonly days: number }
    | { readonly command: "cleanup"; readonly days: number }
    | { readonly command: "help" };

export const USAGE = `Usage:
  vessel-triage process <file|-> [--vessel ID] [--type TYPE] [--no-save] [--json]
  vessel-triage watch [dir] [--vessel ID] [--type TYPE]
  vessel-triage history [--limit N] [--days N] [--vessel ID] [--classification C] [--priority P]
  vessel-triage stats [--days N]
  vessel-triage cleanup [--days N]`;

/**
 * Raised for arguments that do not form a valid command.
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UsageError";
    }
}

interface ParsedFlags {
    readonly positional: string[];
    readonly values: Map<string, string>;
    readonly switches: Set<string>;
}

const kValueFlags = new Set(["--vessel", "--type", "--limit", "--days", "--classification", "--priority"]);
const kSwitchFlags = new Set(["--no-save", "--json"]);

function splitFlags(argv: readonly string[]): ParsedFlags {
    const positional: string[] = [];
    const values = new Map<string, string>();
    const switches = new Set<string>();

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];

        if (kValueFlags.has(arg)) {
            const next = argv[i + 1];
            if (next === undefined || (next.startsWith("--") && next.length > 2)) {
                throw new UsageError(`${arg} needs a value`);
            }
            values.set(arg, next);
            i += 1;
        }
        else if (kSwitchFlags.has(arg)) {
            switches.add(arg);
        }
        else if (arg.startsWith("--")) {
            throw new UsageError(`Unknown option: ${arg}`);
        }
        else {
            positional.push(arg);
        }
    }

    return { positional, values, switches };
}

interface IntegerRange {
    readonly min?: number;
    readonly max?: number;
}

function positiveInteger(flags: ParsedFlags, flag: string, fallback: number, range: IntegerRange = {}): number {
    const raw = flags.values.get(flag);
    if (raw === undefined) {
        return fallback;
    }

    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        throw new UsageError(`${flag} must be a positive integer (got "${raw}")`);
    }
    if (range.min !== undefined && value < range.min) {
        throw new UsageError(`${flag} must be at least ${range.min} (got "${raw}")`);
    }
    if (range.max !== undefined && value > range.max) {
        throw new UsageError(`${flag} must be at most ${range.max} (got "${raw}")`);
    }
    return value;
}

function labelOption<T extends string>(
    flags: ParsedFlags,
    flag: string,
    parse: (hint: string) => T | undefined,
    choices: readonly T[]
): T | undefined {
    const raw = flags.values.get(flag);
    if (raw === undefined) {
        return undefined;
    }

    const value = parse(raw);
    if (value === undefined) {
        throw new UsageError(`${flag} must be one of: ${choices.join(", ")} (got "${raw}")`);
    }
    return value;
}

const kHistoryLimit = { max: 1000 };
const kWindowDays   = { max: 365 };
const kCleanupDays  = { min: 7 };

function allowOnly(flags: ParsedFlags, command: string, allowed: readonly string[]): void {
    for (const flag of [...flags.values.keys(), ...flags.switches]) {
        if (!allowed.includes(flag)) {
            throw new UsageError(`${flag} is not valid for '${command}'`);
        }
    }
}

/**
 * Parse arguments (without the node and script paths).
 *
 * @throws UsageError
 */
export function parseArgs(argv: readonly string[]): Command {
    const [command, ...rest] = argv;

    if (command === undefined || command === "help" || command === "--help" || command === "-h") {
        return { command: "help" };
    }

    const flags = splitFlags(rest);
    const vesselId = flags.values.get("--vessel");
    const documentType = flags.values.get("--type");

    switch (command) {
        case "process": {
            allowOnly(flags, command, ["--vessel", "--type", "--no-save", "--json"]);
            const [file, ...extra] = flags.positional;
            if (file === undefined) {
                throw new UsageError("process needs a file path, or - for stdin");
            }
            if (extra.length > 0) {
                throw new UsageError(`Unexpected argument: ${extra[0]}`);
            }
            return {
                command,
                file,
                ...(vesselId !== undefined && { vesselId }),
                ...(documentType !== undefined && { documentType }),
                save: !flags.switches.has("--no-save"),
                json: flags.switches.has("--json"),
            };
        }

        case "watch": {
            allowOnly(flags, command, ["--vessel", "--type"]);
            const [inboxDir, ...extra] = flags.positional;
            if (extra.length > 0) {
                throw new UsageError(`Unexpected argument: ${extra[0]}`);
            }
            return {
                command,
                ...(inboxDir !== undefined && { inboxDir }),
                ...(vesselId !== undefined && { vesselId }),
                ...(documentType !== undefined && { documentType }),
            };
        }

        case "history": {
            allowOnly(flags, command, ["--limit", "--days", "--vessel", "--classification", "--priority"]);
            const classification = labelOption(
                flags, "--classification", parseClassificationCategory, CLASSIFICATION_CATEGORIES
            );
            const priority = labelOption(flags, "--priority", parsePriorityLevel, PRIORITY_LEVELS);
            return {
                command,
                limit: positiveInteger(flags, "--limit", 20, kHistoryLimit),
                days : positiveInteger(flags, "--days", 30, kWindowDays),
                ...(vesselId !== undefined && { vesselId }),
                ...(classification !== undefined && { classification }),
                ...(priority !== undefined && { priority }),
            };
        }

        case "stats":
            allowOnly(flags, command, ["--days"]);
            return { command, days: positiveInteger(flags, "--days", 30, kWindowDays) };

        case "cleanup":
            allowOnly(flags, command, ["--days"]);
            return { command, days: positiveInteger(flags, "--days", 30, kCleanupDays) };

        default:
            throw new UsageError(`Unknown command: ${command}`);
    }
}
