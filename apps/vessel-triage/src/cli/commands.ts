/**
 * @fileoverview CLI command handlers
 *
 * Each handler returns the process exit code. I/O goes through the
 * CliContext so handlers run unchanged under test.
 *
 * @module cli/commands
 */

import { TriageEngine, type Logger } from "@maritime-triage/engine";
import { daysAgo, type ResultStore } from "../adapters/storage/ResultStore.js";
import type { Settings } from "../config/settings.js";
import type { PatternCatalog } from "../domain/catalog.js";
import { DocumentProcessor } from "../domain/processing/DocumentProcessor.js";
import { validateDocumentText } from "../domain/processing/validation.js";
import { createVesselDomain } from "../domain/registration.js";
import { USAGE, type Command } from "./args.js";
import { formatBreakdown, formatHistoryLine, formatResult } from "./format.js";

export interface CliContext {
    readonly settings: Settings;
    readonly catalog: PatternCatalog;
    readonly logger: Logger;

    /** Opens the result store on first use */
    openStore(): ResultStore;

    /** Reads a file, or stdin for "-" */
    readInput(file: string): Promise<string>;

    /** Resolves when the user asks `watch` to stop */
    waitForShutdown(): Promise<void>;

    write(line: string): void;
}

function createProcessor(context: CliContext): DocumentProcessor {
    return new DocumentProcessor({
        catalog         : context.catalog,
        logger          : context.logger,
        summaryMaxLength: context.settings.summaryMaxLength,
    });
}

async function processCommand(command: Extract<Command, { command: "process" }>, context: CliContext): Promise<number> {
    const text = await context.readInput(command.file);
    validateDocumentText(text);

    const result = createProcessor(context).process(text, command.documentType, command.vesselId);

    if (command.save) {
        context.openStore().save(result);
    }

    if (command.json) {
        context.write(JSON.stringify(result, null, 2));
        return 0;
    }

    for (const line of formatResult(result)) {
        context.write(line);
    }
    if (command.save) {
        context.write(`Saved as ${result.id}`);
    }
    return 0;
}

async function watchCommand(command: Extract<Command, { command: "watch" }>, context: CliContext): Promise<number> {
    const { settings, logger } = context;
    const inboxDir = command.inboxDir ?? settings.inboxDir;
    const vesselId = command.vesselId ?? settings.vesselId;

    const engine = new TriageEngine({
        pollingInterval: settings.pollIntervalMs,
        batchSize      : settings.batchSize,
        logger,
    });

    engine.registerDomain(createVesselDomain({
        processor         : createProcessor(context),
        store             : context.openStore(),
        inboxDir,
        logger,
        writeAlert        : (line) => context.write(line),
        ...(vesselId !== undefined && { vesselId }),
        ...(command.documentType !== undefined && { documentType: command.documentType }),
    }));

    engine.eventBus.subscribe("entity:processed", (event) => {
        logger.debug("Document done", event.data);
    });

    await engine.start();
    context.write(`Watching ${inboxDir} every ${settings.pollIntervalMs}ms. Press Ctrl+C to stop.`);

    await context.waitForShutdown();
    await engine.stop();
    return 0;
}

function historyCommand(command: Extract<Command, { command: "history" }>, context: CliContext): number {
    const results = context.openStore().listRecent(command.limit, {
        since: daysAgo(command.days),
        ...(command.vesselId !== undefined && { vesselId: command.vesselId }),
        ...(command.classification !== undefined && { classification: command.classification }),
        ...(command.priority !== undefined && { priority: command.priority }),
    });

    if (results.length === 0) {
        context.write(`No results in the last ${command.days} day(s).`);
        return 0;
    }

    for (const result of results) {
        context.write(formatHistoryLine(result));
    }
    return 0;
}

function statsCommand(command: Extract<Command, { command: "stats" }>, context: CliContext): number {
    context.write(`Results from the last ${command.days} day(s):`);
    for (const line of formatBreakdown(context.openStore().breakdown(daysAgo(command.days)))) {
        context.write(line);
    }
    return 0;
}

function cleanupCommand(command: Extract<Command, { command: "cleanup" }>, context: CliContext): number {
    const deleted = context.openStore().deleteOlderThan(command.days);

    context.logger.info("Old results deleted", { deleted, days: command.days });
    context.write(`Deleted ${deleted} result(s) older than ${command.days} day(s).`);
    return 0;
}

/**
 * Run one parsed command.
 */
export async function runCommand(command: Command, context: CliContext): Promise<number> {
    switch (command.command) {
        case "process":
            return processCommand(command, context);
        case "watch":
            return watchCommand(command, context);
        case "history":
            return historyCommand(command, context);
        case "stats":
            return statsCommand(command, context);
        case "cleanup":
            return cleanupCommand(command, context);
        case "help":
            context.write(USAGE);
            return 0;
    }
}
