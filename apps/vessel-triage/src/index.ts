/**
 * @fileoverview Vessel Triage - Main Entry Point
 *
 * Classifies maritime maintenance records, sensor alerts and incident
 * reports from the command line, or watches an inbox directory through
 * the TriageEngine.
 *
 * @module vessel-triage
 */

// Load .env before reading settings
import "dotenv/config";

import { readFile } from "fs/promises";
import { text as readStream } from "stream/consumers";
import { createConsoleLogger, describeError } from "@maritime-triage/engine";
import { ResultStore } from "./adapters/storage/ResultStore.js";
import { loadCatalog, loadSettings } from "./config/index.js";
import { DocumentValidationError } from "./domain/processing/validation.js";
import { parseArgs, USAGE, UsageError } from "./cli/args.js";
import { runCommand } from "./cli/commands.js";

function waitForSignal(): Promise<void> {
    return new Promise(resolve => {
        const stop = (): void => {
            process.off("SIGINT", stop);
            process.off("SIGTERM", stop);
            resolve();
        };
        process.on("SIGINT", stop);
        process.on("SIGTERM", stop);
    });
}

/**
 * Main entry point
 */
async function main(): Promise<number> {
    const command = parseArgs(process.argv.slice(2));
    if (command.command === "help") {
        console.log(USAGE);
        return 0;
    }

    const settings = loadSettings();
    const logger   = createConsoleLogger({ prefix: "vessel-triage", level: settings.logLevel });
    const catalog  = loadCatalog(settings.catalogPath, logger);

    // Opened on first use
    const store = new ResultStore(settings.dbPath);

    try {
        return await runCommand(command, {
            settings,
            catalog,
            logger,
            openStore: () => {
                store.open();
                return store;
            },
            readInput      : (file) => (file === "-" ? readStream(process.stdin) : readFile(file, "utf-8")),
            waitForShutdown: waitForSignal,
            write          : (line) => console.log(line),
        });
    }
    finally {
        store.close();
    }
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        if (error instanceof UsageError) {
            console.error(`${error.message}\n\n${USAGE}`);
            process.exitCode = 2;
            return;
        }
        if (error instanceof DocumentValidationError) {
            console.error(error.message);
            process.exitCode = 1;
            return;
        }
        console.error("Fatal error:", describeError(error));
        process.exitCode = 1;
    });
