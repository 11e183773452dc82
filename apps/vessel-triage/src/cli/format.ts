/**
 * @fileoverview Console formatting for CLI output
 *
 * @module cli/format
 */

import {
    CLASSIFICATION_CATEGORIES,
    PRIORITY_LEVELS,
    type ProcessingResult,
    type ResultBreakdown,
} from "../domain/types.js";

function percent(value: number): string {
    return `${Math.round(value * 100)}%`;
}

/**
 * Multi-line report for one result.
 */
export function formatResult(result: ProcessingResult): string[] {
    const lines = [
        `Classification: ${result.classification} (confidence ${percent(result.confidence)})`,
        `Priority:       ${result.priority}`,
    ];

    if (result.documentType) {
        lines.push(`Document type:  ${result.documentType}`);
    }
    if (result.vesselId) {
        lines.push(`Vessel:         ${result.vesselId}`);
    }

    lines.push(
        `Summary:        ${result.summary}`,
        `Risk:           ${result.riskAssessment}`,
        `Details:        ${result.details}`,
    );

    if (result.keywords.length > 0) {
        lines.push(`Keywords:       ${result.keywords.join(", ")}`);
    }
    if (result.entities.equipment.length > 0) {
        lines.push(`Equipment:      ${result.entities.equipment.join(", ")}`);
    }
    if (result.entities.measurements.length > 0) {
        lines.push(`Measurements:   ${result.entities.measurements.join(", ")}`);
    }

    lines.push("Recommended actions:");
    result.recommendedActions.forEach((action, index) => {
        lines.push(`  ${index + 1}. ${action}`);
    });

    return lines;
}

/**
 * One line per result for history listings.
 */
export function formatHistoryLine(result: ProcessingResult): string {
    const vessel = result.vesselId ? ` [${result.vesselId}]` : "";
    return `${result.timestamp}  ${result.priority.padEnd(8)} ${result.classification}${vessel}  ${result.summary}`;
}

/**
 * Breakdown table; categories and priorities with no results are left out.
 */
export function formatBreakdown(breakdown: ResultBreakdown): string[] {
    const lines = [
        `Total results:  ${breakdown.total}`,
        `Critical:       ${breakdown.critical}`,
    ];

    const byPriority = PRIORITY_LEVELS.filter(level => breakdown.byPriority[level] > 0);
    if (byPriority.length > 0) {
        lines.push("By priority:");
        for (const level of byPriority) {
            lines.push(`  ${level.padEnd(32)} ${breakdown.byPriority[level]}`);
        }
    }

    const byClassification = CLASSIFICATION_CATEGORIES.filter(category => breakdown.byClassification[category] > 0);
    if (byClassification.length > 0) {
        lines.push("By classification:");
        for (const category of byClassification) {
            lines.push(`  ${category.padEnd(32)} ${breakdown.byClassification[category]}`);
        }
    }

    return lines;
}
