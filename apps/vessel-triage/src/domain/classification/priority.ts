/**
 * @fileoverview Priority resolution
 *
 * @module domain/classification/priority
 */

import type { PriorityRules } from "../catalog.js";
import { PriorityLevel, type ClassificationCategory } from "../types.js";

function mentionsAny(lowerText: string, words: readonly string[]): boolean {
    return words.some(word => lowerText.includes(word));
}

/**
 * Resolve the priority of a classified document. First match wins:
 *
 * 1. any urgent word gives Critical
 * 2. a category override applies, escalated when one of its words appears
 * 3. any high word gives High
 * 4. any medium word gives Medium
 * 5. otherwise Low
 *
 * Matching is substring containment on the lower-cased text.
 */
export function resolvePriority(
    cleaned: string,
    category: ClassificationCategory,
    rules: PriorityRules
): PriorityLevel {
    const lowerText = cleaned.toLowerCase();

    if (mentionsAny(lowerText, rules.urgent)) {
        return PriorityLevel.Critical;
    }

    const override = rules.overrides.find(entry => entry.category === category);
    if (override) {
        if (override.escalateTo && mentionsAny(lowerText, override.escalateWhen)) {
            return override.escalateTo;
        }
        return override.priority;
    }

    if (mentionsAny(lowerText, rules.high)) {
        return PriorityLevel.High;
    }
    if (mentionsAny(lowerText, rules.medium)) {
        return PriorityLevel.Medium;
    }
    return PriorityLevel.Low;
}
