/**
 * @fileoverview Unit tests for InboxDirectoryProvider
 *
 * Tests cover:
 * - Initialization and the not-initialized guard
 * - Extension filtering and skipping unusable files
 * - Limits, hasMore and delivering each file once
 *
 * @module __tests__/InboxDirectoryProvider
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { existsSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { Logger } from "@maritime-triage/engine";
import { InboxDirectoryProvider } from "../domain/providers/InboxDirectoryProvider.js";
import { isMaintenanceDocument } from "../domain/entities/MaintenanceDocument.js";

const kAlertText  = "Bilge alarm triggered in engine room, pump 2 cycling";
const kReportText = "Steering gear inspection completed, no defects found";

function createMockLogger(): Logger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

describe("InboxDirectoryProvider", () => {
    let inboxDir: string;
    let logger: Logger;

    beforeEach(async () => {
        inboxDir = await mkdtemp(join(tmpdir(), "vessel-inbox-"));
        logger   = createMockLogger();

        await writeFile(join(inboxDir, "a-alert.txt"), kAlertText);
        await writeFile(join(inboxDir, "b-empty.txt"), "");
        await writeFile(join(inboxDir, "c-short.txt"), "short");
        await writeFile(join(inboxDir, "d-report.md"), kReportText);
        await writeFile(join(inboxDir, "notes.pdf"), "binary-ish content that is ignored");
    });

    afterEach(async () => {
        await rm(inboxDir, { recursive: true, force: true });
    });

    it("should refuse to fetch before initialize", async () => {
        const provider = new InboxDirectoryProvider({ inboxDir, logger });

        await expect(provider.getEntities()).rejects.toThrow("Provider not initialized. Call initialize() first.");
    });

    it("should create a missing inbox directory", async () => {
        const nested   = join(inboxDir, "fleet", "mv-1");
        const provider = new InboxDirectoryProvider({ inboxDir: nested, logger });

        await provider.initialize();

        expect(existsSync(nested)).toBe(true);
        expect(logger.info).toHaveBeenCalledWith("Watching inbox", { inboxDir: nested });
    });

    // Scenario: Pick up new files
    it("should deliver valid files and skip unusable ones", async () => {
        const provider = new InboxDirectoryProvider({ inboxDir, logger, vesselId: "MV-1" });
        await provider.initialize();

        const { entities, hasMore } = await provider.getEntities({ limit: 10 });

        expect(entities.map(entity => entity.id)).toEqual(["a-alert.txt", "d-report.md"]);
        expect(hasMore).toBe(false);
        expect(entities[0].content).toBe(kAlertText);
        expect(entities[0].metadata).toEqual({
            fileName  : "a-alert.txt",
            filePath  : join(inboxDir, "a-alert.txt"),
            receivedAt: expect.any(Date),
            vesselId  : "MV-1",
        });
        expect(isMaintenanceDocument(entities[0])).toBe(true);

        expect(logger.warn).toHaveBeenCalledWith("Skipping inbox file", {
            fileName: "b-empty.txt",
            reason  : "Document text must be at least 10 characters (got 0)",
        });
        expect(logger.warn).toHaveBeenCalledWith("Skipping inbox file", {
            fileName: "c-short.txt",
            reason  : "Document text must be at least 10 characters (got 5)",
        });
    });

    it("should deliver each file only once", async () => {
        const provider = new InboxDirectoryProvider({ inboxDir, logger });
        await provider.initialize();

        await provider.getEntities({ limit: 10 });
        const second = await provider.getEntities({ limit: 10 });

        expect(second.entities).toEqual([]);
        expect(second.hasMore).toBe(false);
    });

    it("should pick up files added between polls", async () => {
        const provider = new InboxDirectoryProvider({ inboxDir, logger });
        await provider.initialize();
        await provider.getEntities({ limit: 10 });

        await writeFile(join(inboxDir, "e-late.log"), "Radar display flickering on bridge console");
        const { entities } = await provider.getEntities({ limit: 10 });

        expect(entities.map(entity => entity.id)).toEqual(["e-late.log"]);
    });

    it("should respect the limit and report hasMore", async () => {
        const provider = new InboxDirectoryProvider({ inboxDir, logger });
        await provider.initialize();

        const first = await provider.getEntities({ limit: 1 });
        expect(first.entities.map(entity => entity.id)).toEqual(["a-alert.txt"]);
        expect(first.hasMore).toBe(true);

        const second = await provider.getEntities({ limit: 1 });
        expect(second.entities.map(entity => entity.id)).toEqual(["d-report.md"]);
        expect(second.hasMore).toBe(false);
    });

    it("should honor custom extensions", async () => {
        const provider = new InboxDirectoryProvider({ inboxDir, logger, extensions: [".MD"] });
        await provider.initialize();

        const { entities } = await provider.getEntities();

        expect(entities.map(entity => entity.id)).toEqual(["d-report.md"]);
    });

    it("should stamp a document type hint when configured", async () => {
        const provider = new InboxDirectoryProvider({ inboxDir, logger, documentType: "Sensor Alert" });
        await provider.initialize();

        const { entities } = await provider.getEntities({ limit: 1 });

        expect(entities[0].metadata.documentTypeHint).toBe("Sensor Alert");
    });

    it("should deliver files again after shutdown and re-initialize", async () => {
        const provider = new InboxDirectoryProvider({ inboxDir, logger });
        await provider.initialize();
        await provider.getEntities({ limit: 10 });

        await provider.shutdown();
        await provider.initialize();
        const { entities } = await provider.getEntities({ limit: 10 });

        expect(entities).toHaveLength(2);
    });
});
