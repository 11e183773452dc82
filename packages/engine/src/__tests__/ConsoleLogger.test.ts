/**
 * @fileoverview Unit tests for createConsoleLogger
 *
 * @module @maritime-triage/engine/__tests__/ConsoleLogger
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { createConsoleLogger } from "../impl/ConsoleLogger.js";
import { describeError, isLogLevel } from "../contracts/Logger.js";

describe("createConsoleLogger", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    // Scenario: Prefix and level tag
    it("should print the level and prefix before the message", () => {
        const info   = vi.spyOn(console, "info").mockImplementation(() => undefined);
        const logger = createConsoleLogger({ prefix: "inbox" });

        logger.info("Picked up file", { file: "a.txt" });

        expect(info).toHaveBeenCalledWith("[INFO] [inbox] Picked up file", { file: "a.txt" });
    });

    // Scenario: Levels below the threshold are dropped
    it("should drop messages below the configured level", () => {
        const debug  = vi.spyOn(console, "debug").mockImplementation(() => undefined);
        const warn   = vi.spyOn(console, "warn").mockImplementation(() => undefined);
        const logger = createConsoleLogger({ level: "warn" });

        logger.debug("hidden");
        logger.warn("shown");

        expect(debug).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledWith("[WARN] shown", "");
    });
});

describe("Logger helpers", () => {
    it("should recognise log levels", () => {
        expect(isLogLevel("debug")).toBe(true);
        expect(isLogLevel("verbose")).toBe(false);
        expect(isLogLevel(3)).toBe(false);
    });

    it("should describe thrown values", () => {
        expect(describeError(new Error("disk full"))).toBe("disk full");
        expect(describeError("plain")).toBe("plain");
    });
});
