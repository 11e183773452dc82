/**
 * @fileoverview Unit tests for CLI output formatting
 *
 * @module __tests__/format
 */

import { describe, it, expect } from "vitest";
import { formatBreakdown, formatHistoryLine, formatResult } from "../cli/format.js";
import { loadCatalog } from "../config/loadCatalog.js";
import { DocumentProcessor, summarizeResults } from "../domain/processing/DocumentProcessor.js";

const processor = new DocumentProcessor({
    catalog   : loadCatalog(),
    generateId: () => "res-001",
    now       : () => new Date("2026-03-14T08:30:00.000Z"),
});

const kEngineFailure = "Main engine critical failure, emergency shutdown required immediately";

describe("formatResult", () => {
    it("should print the report with numbered actions", () => {
        const lines = formatResult(processor.process(kEngineFailure, undefined, "MV-1"));

        expect(lines.slice(0, 4)).toEqual([
            "Classification: Critical Equipment Failure Risk (confidence 100%)",
            "Priority:       Critical",
            "Document type:  Maintenance Record",
            "Vessel:         MV-1",
        ]);
        expect(lines).toContain(`Summary:        ${kEngineFailure}`);
        expect(lines).toContain("Equipment:      engine");
        expect(lines.slice(-7)).toEqual([
            "Recommended actions:",
            "  1. IMMEDIATE ACTION REQUIRED",
            "  2. Stop operations immediately if safe to do so",
            "  3. Contact technical support team",
            "  4. Initiate emergency response procedures",
            "  5. Document all findings thoroughly",
            "  6. Isolate affected equipment",
        ]);
    });

    it("should leave out empty keyword and entity lines", () => {
        const lines = formatResult(processor.process("#### *** @@@ $$$"));

        expect(lines.some(line => line.startsWith("Keywords:"))).toBe(false);
        expect(lines.some(line => line.startsWith("Equipment:"))).toBe(false);
        expect(lines.some(line => line.startsWith("Vessel:"))).toBe(false);
    });
});

describe("formatHistoryLine", () => {
    it("should print one line per result", () => {
        expect(formatHistoryLine(processor.process(kEngineFailure, undefined, "MV-1"))).toBe(
            `2026-03-14T08:30:00.000Z  Critical Critical Equipment Failure Risk [MV-1]  ${kEngineFailure}`
        );
    });

    it("should pad the priority", () => {
        expect(formatHistoryLine(processor.process("GPS malfunction poor visibility fog"))).toBe(
            "2026-03-14T08:30:00.000Z  High     Navigational Hazard Alert  GPS malfunction poor visibility fog"
        );
    });
});

describe("formatBreakdown", () => {
    it("should list only non-zero counts", () => {
        const breakdown = summarizeResults(processor.processBatch([
            { text: kEngineFailure },
            { text: "Routine filter replacement scheduled for next port call" },
            { text: "GPS malfunction poor visibility fog" },
        ]));

        expect(formatBreakdown(breakdown)).toEqual([
            "Total results:  3",
            "Critical:       1",
            "By priority:",
            `  ${"Critical".padEnd(32)} 1`,
            `  ${"High".padEnd(32)} 1`,
            `  ${"Medium".padEnd(32)} 1`,
            "By classification:",
            `  ${"Critical Equipment Failure Risk".padEnd(32)} 1`,
            `  ${"Navigational Hazard Alert".padEnd(32)} 1`,
            `  ${"Routine Maintenance Required".padEnd(32)} 1`,
        ]);
    });

    it("should print only totals when there are no results", () => {
        expect(formatBreakdown(summarizeResults([]))).toEqual([
            "Total results:  0",
            "Critical:       0",
        ]);
    });
});
