/**
 * @fileoverview Recommendations, risk assessment and details
 *
 * All wording comes from the catalog; this module only picks and joins.
 *
 * @module domain/advice
 */

import { conditionHolds, type DetailRules, type RecommendationRules, type RiskRules } from "./catalog.js";
import type { ClassificationCategory, PriorityLevel } from "./types.js";

/**
 * Priority actions followed by category actions, de-duplicated in
 * first-seen order and capped at `maxActions`.
 */
export function generateRecommendations(
    category: ClassificationCategory,
    priority: PriorityLevel,
    rules: RecommendationRules
): string[] {
    const actions = new Set([
        ...rules.byPriority[priority],
        ...rules.byCategory[category],
    ]);

    return [...actions].slice(0, rules.maxActions);
}

/**
 * Base sentence for the priority, plus any risk factors the text triggers.
 *
 * @example
 * ```typescript
 * assessRisk("High", "GPS signal lost near fire station", catalog.risk);
 * // "HIGH RISK: ... Additional factors: Navigation safety impact, Fire/explosion hazard."
 * ```
 */
export function assessRisk(priority: PriorityLevel, text: string, rules: RiskRules): string {
    const lowerText = text.toLowerCase();
    const base      = rules.base[priority];

    const factors = rules.factors
        .filter(factor => conditionHolds(lowerText, factor))
        .map(factor => factor.label);

    if (factors.length === 0) {
        return base;
    }
    return `${base} Additional factors: ${factors.join(", ")}.`;
}

/**
 * Category sentence, the priority sentence when there is one, then any
 * sentences the text triggers.
 */
export function generateDetails(
    category: ClassificationCategory,
    priority: PriorityLevel,
    text: string,
    rules: DetailRules
): string {
    const lowerText = text.toLowerCase();
    const parts     = [rules.byCategory[category]];

    const prioritySentence = rules.byPriority[priority];
    if (prioritySentence) {
        parts.push(prioritySentence);
    }

    for (const condition of rules.conditions) {
        if (conditionHolds(lowerText, condition)) {
            parts.push(condition.text);
        }
    }

    return parts.join(" ");
}
