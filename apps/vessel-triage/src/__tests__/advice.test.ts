/**
 * @fileoverview Unit tests for recommendations, risk and details
 *
 * @module __tests__/advice
 */

import { describe, it, expect } from "vitest";
import { loadCatalog } from "../config/loadCatalog.js";
import { assessRisk, generateDetails, generateRecommendations } from "../domain/advice.js";
import {
    CLASSIFICATION_CATEGORIES,
    ClassificationCategory,
    PRIORITY_LEVELS,
    PriorityLevel,
    perCategory,
    perPriority,
} from "../domain/types.js";

const catalog = loadCatalog();

describe("generateRecommendations", () => {
    it("should list priority actions before category actions, capped at six", () => {
        expect(generateRecommendations(
            ClassificationCategory.CriticalEquipmentFailure,
            PriorityLevel.Critical,
            catalog.recommendations
        )).toEqual([
            "IMMEDIATE ACTION REQUIRED",
            "Stop operations immediately if safe to do so",
            "Contact technical support team",
            "Initiate emergency response procedures",
            "Document all findings thoroughly",
            "Isolate affected equipment",
        ]);
    });

    it("should use monitoring phrasing for low priority", () => {
        expect(generateRecommendations(
            ClassificationCategory.RoutineMaintenance,
            PriorityLevel.Low,
            catalog.recommendations
        )).toEqual([
            "Address during next scheduled maintenance window",
            "Record observation in maintenance log",
            "Schedule maintenance during next port call",
            "Order required spare parts",
            "Assign qualified personnel",
            "Update maintenance logs",
        ]);
    });

    it("should drop repeated actions keeping the first", () => {
        const rules = {
            maxActions: 6,
            byPriority: perPriority(() => ["Notify master", "Log event"]),
            byCategory: perCategory(() => ["Log event", "Inspect"]),
        };

        expect(generateRecommendations(ClassificationCategory.FuelEfficiency, PriorityLevel.High, rules))
            .toEqual(["Notify master", "Log event", "Inspect"]);
    });

    // Scenario: Recommendation cap and uniqueness for every combination
    it("should return at most six unique actions for every category and priority", () => {
        for (const category of CLASSIFICATION_CATEGORIES) {
            for (const priority of PRIORITY_LEVELS) {
                const actions = generateRecommendations(category, priority, catalog.recommendations);

                expect(actions.length).toBeGreaterThan(0);
                expect(actions.length).toBeLessThanOrEqual(6);
                expect(new Set(actions).size).toBe(actions.length);
            }
        }
    });
});

describe("assessRisk", () => {
    it("should return the base sentence when nothing triggers", () => {
        expect(assessRisk(PriorityLevel.Medium, "Filter replaced", catalog.risk))
            .toBe("MEDIUM RISK: Moderate impact on operations, requires attention within reasonable timeframe.");
    });

    it("should append triggered factors in catalog order", () => {
        expect(assessRisk(PriorityLevel.Low, "Engine temperature high near fire pump and GPS mast", catalog.risk)).toBe(
            "LOW RISK: Minor operational impact, routine maintenance required. " +
            "Additional factors: Navigation safety impact, Fire/explosion hazard, Overheating risk."
        );
    });

    it("should need high or hot alongside temperature for overheating", () => {
        expect(assessRisk(PriorityLevel.High, "Temperature normal, pressure steady", catalog.risk)).toBe(
            "HIGH RISK: Significant impact on operations or safety if not addressed promptly. " +
            "Additional factors: Pressure system risk."
        );
    });
});

describe("generateDetails", () => {
    it("should add the priority sentence for High", () => {
        expect(generateDetails(ClassificationCategory.NavigationalHazard, PriorityLevel.High, "fog", catalog.details)).toBe(
            "Navigation-related issue identified. Take appropriate measures to ensure safe navigation. " +
            "HIGH priority should be addressed within 24 hours to prevent escalation."
        );
    });

    it("should add pressure and temperature sentences only when mentioned", () => {
        expect(generateDetails(
            ClassificationCategory.RoutineMaintenance,
            PriorityLevel.Low,
            "Pressure and temperature logged",
            catalog.details
        )).toBe(
            "Routine maintenance requirement identified. Schedule appropriate maintenance activities. " +
            "Pressure-related issue identified - monitor system pressure closely. " +
            "Temperature anomaly detected - check cooling systems and ventilation."
        );

        expect(generateDetails(ClassificationCategory.RoutineMaintenance, PriorityLevel.Low, "Filter replaced", catalog.details))
            .toBe("Routine maintenance requirement identified. Schedule appropriate maintenance activities.");
    });
});
