/**
 * @fileoverview Unit tests for the pattern catalog loader
 *
 * @module __tests__/loadCatalog
 */

import { describe, it, expect, vi } from "vitest";
import { readFileSync } from "fs";
import {
    CatalogError,
    DEFAULT_CATALOG_PATH,
    loadCatalog,
    parseCatalog,
    parseCatalogYaml,
} from "../config/loadCatalog.js";
import { CLASSIFICATION_CATEGORIES, ClassificationCategory, DocumentType, PriorityLevel } from "../domain/types.js";

const shippedYaml = readFileSync(DEFAULT_CATALOG_PATH, "utf-8");

/**
 * Shipped catalog with one substring replaced.
 */
function variant(search: string, replacement: string): string {
    expect(shippedYaml).toContain(search);
    return shippedYaml.replace(search, replacement);
}

describe("loadCatalog", () => {
    // Scenario: Load the shipped catalog
    it("should load every category in declaration order", () => {
        const catalog = loadCatalog();

        expect(catalog.version).toBe("1.0.0");
        expect(catalog.rules.map(rule => rule.category)).toEqual(CLASSIFICATION_CATEGORIES);
        expect(catalog.fallback).toEqual({
            category    : ClassificationCategory.RoutineMaintenance,
            confidence  : 0.1,
            minimumScore: 0.5,
        });
        expect(catalog.rules[3].weight).toBe(0.3);
        expect(catalog.documentTypes.default).toBe(DocumentType.MaintenanceRecord);
        expect(catalog.keywords.maxKeywords).toBe(15);
        expect(catalog.recommendations.maxActions).toBe(6);
    });

    it("should read priority overrides with optional escalation", () => {
        const { overrides } = loadCatalog().priority;

        expect(overrides).toEqual([
            {
                category    : ClassificationCategory.CriticalEquipmentFailure,
                priority    : PriorityLevel.Critical,
                escalateWhen: [],
            },
            {
                category    : ClassificationCategory.EnvironmentalCompliance,
                priority    : PriorityLevel.High,
                escalateTo  : PriorityLevel.Critical,
                escalateWhen: ["spill", "discharge", "violation"],
            },
            {
                category    : ClassificationCategory.NavigationalHazard,
                priority    : PriorityLevel.High,
                escalateWhen: [],
            },
            {
                category    : ClassificationCategory.SafetyViolation,
                priority    : PriorityLevel.Medium,
                escalateTo  : PriorityLevel.High,
                escalateWhen: ["accident", "injury"],
            },
        ]);
    });

    it("should deep-freeze the catalog", () => {
        const catalog = loadCatalog();

        expect(Object.isFrozen(catalog)).toBe(true);
        expect(Object.isFrozen(catalog.rules[0].keywords)).toBe(true);
        expect(Object.isFrozen(catalog.priority.urgent)).toBe(true);
        expect(Object.isFrozen(catalog.recommendations.byCategory)).toBe(true);
    });

    it("should log a load summary", () => {
        const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

        loadCatalog(DEFAULT_CATALOG_PATH, logger);

        expect(logger.info).toHaveBeenCalledWith("Pattern catalog loaded", {
            filePath  : DEFAULT_CATALOG_PATH,
            version   : "1.0.0",
            categories: 6,
        });
    });

    // Scenario: Missing file
    it("should throw CatalogError for a missing file", () => {
        expect(() => loadCatalog("/nonexistent/catalog.yml")).toThrow(CatalogError);
        expect(() => loadCatalog("/nonexistent/catalog.yml")).toThrow("/nonexistent/catalog.yml: catalog file not found");
    });
});

describe("parseCatalogYaml", () => {
    it("should lower-case match lists", () => {
        const catalog = parseCatalogYaml(variant("urgent: [critical,", "urgent: [CRITICAL,"), "test.yml");

        expect(catalog.priority.urgent[0]).toBe("critical");
    });

    it("should reject invalid YAML", () => {
        expect(() => parseCatalogYaml("categories: [", "bad.yml")).toThrow(/^bad\.yml: invalid YAML: /);
    });

    it("should reject an unknown category", () => {
        expect(() => parseCatalogYaml(variant("- id: Fuel Efficiency Alert", "- id: Fuel Economy Alert"), "test.yml"))
            .toThrow("test.yml: categories[5].id 'Fuel Economy Alert' is not a known category");
    });

    it("should reject a category declared twice", () => {
        expect(() => parseCatalogYaml(variant("- id: Fuel Efficiency Alert", "- id: Safety Violation Detected"), "test.yml"))
            .toThrow("test.yml: categories[5].id 'Safety Violation Detected' is declared twice");
    });

    it("should reject an out-of-range fallback confidence", () => {
        expect(() => parseCatalogYaml(variant("fallbackConfidence: 0.1", "fallbackConfidence: 2"), "test.yml"))
            .toThrow("test.yml: 'classification.fallbackConfidence' must be a number between 0 and 1");
    });

    it("should reject an unknown priority level", () => {
        expect(() => parseCatalogYaml(variant("escalateTo: Critical", "escalateTo: Urgent"), "test.yml"))
            .toThrow("test.yml: 'priority.overrides[1].escalateTo' must be one of Critical, High, Medium, Low");
    });

    it("should reject unknown document type keys", () => {
        expect(() => parseCatalogYaml(variant("Compliance Document: [", "Compliance Memo: ["), "test.yml"))
            .toThrow("test.yml: 'documentTypes.indicators' has unknown key 'Compliance Memo'");
    });
});

describe("parseCatalog", () => {
    it("should require a rule for every category", () => {
        const document = {
            version   : "1.0.0",
            categories: [{ id: ClassificationCategory.CriticalEquipmentFailure, keywords: ["failure"] }],
        };

        expect(() => parseCatalog(document, "inline.yml"))
            .toThrow("inline.yml: category 'Navigational Hazard Alert' has no rule");
    });

    it("should reject a document that is not a mapping", () => {
        expect(() => parseCatalog(["not", "a", "mapping"])).toThrow("<inline>: catalog must be a mapping");
    });
});
