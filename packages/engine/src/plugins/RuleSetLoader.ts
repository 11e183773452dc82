/**
 * @fileoverview Rule Set Loader
 *
 * Validates keyword rule sets parsed from YAML. A rule set is a
 * `categories` list in declaration order (the order breaks score ties):
 *
 * ```yaml
 * categories:
 *   - id: Navigational Hazard Alert
 *     weight: 0.9
 *     keywords: [navigation, radar, fog]
 *     terms: [gps, ais]
 *     indicators: [hazard, danger]
 * ```
 *
 * Missing lists default to empty. Anything else malformed raises a
 * RuleSetError naming the source and the offending entry.
 *
 * @module @maritime-triage/engine/plugins/RuleSetLoader
 */

import { parse as parseYaml } from "yaml";
import type { CategoryId } from "../contracts/ClassificationOutput.js";
import { describeError } from "../contracts/Logger.js";
import type { KeywordRule } from "../scoring/KeywordRuleScorer.js";
import { RuleSetError } from "../scoring/RuleSetError.js";

/**
 * Narrows a raw category id read from YAML to the caller's category type.
 */
export type CategoryGuard<TCategory extends CategoryId> = (value: string) => value is TCategory;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readStringList(entry: Record<string, unknown>, field: string, where: string, source: string): string[] {
    const raw = entry[field];
    if (raw === undefined || raw === null) {
        return [];
    }
    if (!Array.isArray(raw)) {
        throw new RuleSetError(`${where}.${field} must be a list`, source);
    }

    return raw.map((item, index) => {
        if (typeof item !== "string" || item.trim().length === 0) {
            throw new RuleSetError(`${where}.${field}[${index}] must be a non-empty string`, source);
        }
        return item.trim();
    });
}

/**
 * Validate an already-parsed rule set document.
 *
 * @param document - Parsed YAML (or any plain object with a `categories` list)
 * @param isCategory - Guard for category ids
 * @param source - Label used in error messages
 */
export function parseRuleSet<TCategory extends CategoryId>(
    document: unknown,
    isCategory: CategoryGuard<TCategory>,
    source = "<inline>"
): KeywordRule<TCategory>[] {
    if (!isRecord(document)) {
        throw new RuleSetError("rule set must be a mapping", source);
    }

    const categories = document.categories;
    if (!Array.isArray(categories) || categories.length === 0) {
        throw new RuleSetError("'categories' must be a non-empty list", source);
    }

    const seen  = new Set<string>();
    const rules: KeywordRule<TCategory>[] = [];

    categories.forEach((entry: unknown, index: number) => {
        const where = `categories[${index}]`;

        if (!isRecord(entry)) {
            throw new RuleSetError(`${where} must be a mapping`, source);
        }

        const id = entry.id;
        if (typeof id !== "string" || !isCategory(id)) {
            throw new RuleSetError(`${where}.id '${String(id)}' is not a known category`, source);
        }
        if (seen.has(id)) {
            throw new RuleSetError(`${where}.id '${id}' is declared twice`, source);
        }
        seen.add(id);

        const weight = entry.weight ?? 1.0;
        if (typeof weight !== "number" || !Number.isFinite(weight) || weight < 0) {
            throw new RuleSetError(`${where}.weight must be a non-negative number`, source);
        }

        rules.push({
            category  : id,
            weight,
            keywords  : readStringList(entry, "keywords", where, source),
            terms     : readStringList(entry, "terms", where, source),
            indicators: readStringList(entry, "indicators", where, source),
        });
    });

    return rules;
}

/**
 * Parse YAML text into a plain document for `parseRuleSet` or a caller's
 * own validation.
 *
 * @throws RuleSetError with detail "invalid YAML: ..."
 */
export function parseYamlDocument(text: string, source = "<inline>"): unknown {
    try {
        return parseYaml(text);
    }
    catch (error) {
        throw new RuleSetError(`invalid YAML: ${describeError(error)}`, source);
    }
}
