/**
 * @fileoverview Pattern Catalog Loader
 *
 * Loads the maritime pattern catalog from YAML, validates every table,
 * lower-cases all match lists and deep-freezes the result.
 *
 * @module config/loadCatalog
 */

import { readFileSync, existsSync } from "fs";
import { fileURLToPath } from "url";
import {
    RuleSetError,
    parseRuleSet,
    parseYamlDocument,
    type KeywordRule,
    type Logger,
} from "@maritime-triage/engine";
import type {
    ConditionalText,
    DocumentTypeIndicator,
    PatternCatalog,
    PriorityOverride,
    RiskFactor,
} from "../domain/catalog.js";
import {
    CLASSIFICATION_CATEGORIES,
    DOCUMENT_TYPES,
    PRIORITY_LEVELS,
    isClassificationCategory,
    isDocumentType,
    isPriorityLevel,
    perCategory,
    perPriority,
    type ClassificationCategory,
    type PriorityLevel,
} from "../domain/types.js";

/**
 * Catalog shipped with the app.
 */
export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL("../../config/catalog.yml", import.meta.url));

/**
 * Raised for a missing, unparsable or invalid catalog.
 */
export class CatalogError extends Error {
    readonly source: string;

    constructor(message: string, source: string) {
        super(`${source}: ${message}`);
        this.name   = "CatalogError";
        this.source = source;
    }
}

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Typed field access with errors that name the path.
 */
class SectionReader {
    constructor(private readonly source: string) {}

    fail(message: string): never {
        throw new CatalogError(message, this.source);
    }

    section(parent: RawSection, key: string, path: string): RawSection {
        const value = parent[key];
        if (!isRecord(value)) {
            return this.fail(`'${path}' must be a mapping`);
        }
        return value;
    }

    optionalSection(parent: RawSection, key: string, path: string): RawSection {
        return parent[key] === undefined ? {} : this.section(parent, key, path);
    }

    text(parent: RawSection, key: string, path: string): string {
        const value = parent[key];
        if (typeof value !== "string" || value.trim().length === 0) {
            return this.fail(`'${path}' must be a non-empty string`);
        }
        return value.trim();
    }

    number(parent: RawSection, key: string, path: string, min: number, max = Number.POSITIVE_INFINITY): number {
        const value = parent[key];
        if (typeof value !== "number" || !Number.isFinite(value) || value < min || value > max) {
            return this.fail(`'${path}' must be a number between ${min} and ${max}`);
        }
        return value;
    }

    integer(parent: RawSection, key: string, path: string, min: number): number {
        const value = this.number(parent, key, path, min);
        if (!Number.isInteger(value)) {
            return this.fail(`'${path}' must be an integer`);
        }
        return value;
    }

    /** List of non-empty strings. Missing means empty. */
    strings(parent: RawSection, key: string, path: string): string[] {
        const value = parent[key];
        if (value === undefined || value === null) {
            return [];
        }
        if (!Array.isArray(value)) {
            return this.fail(`'${path}' must be a list`);
        }
        return value.map((item, index) => {
            if (typeof item !== "string" || item.trim().length === 0) {
                return this.fail(`'${path}[${index}]' must be a non-empty string`);
            }
            return item.trim();
        });
    }

    /** Same, lower-cased for substring matching. */
    matchList(parent: RawSection, key: string, path: string): string[] {
        return this.strings(parent, key, path).map(entry => entry.toLowerCase());
    }

    priority(parent: RawSection, key: string, path: string): PriorityLevel {
        const value = this.text(parent, key, path);
        if (!isPriorityLevel(value)) {
            return this.fail(`'${path}' must be one of ${PRIORITY_LEVELS.join(", ")}`);
        }
        return value;
    }

    /** Reject keys outside the known labels. */
    onlyKeys(section: RawSection, allowed: readonly string[], path: string): void {
        for (const key of Object.keys(section)) {
            if (!allowed.includes(key)) {
                this.fail(`'${path}' has unknown key '${key}'`);
            }
        }
    }
}

/**
 * Freeze an object graph in place.
 */
export function deepFreeze<T>(value: T): T {
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
}

/**
 * Validate a parsed catalog document.
 *
 * @param document - Parsed YAML
 * @param source - Label used in error messages (usually the file path)
 * @throws CatalogError naming the offending field
 */
export function parseCatalog(document: unknown, source = "<inline>"): PatternCatalog {
    const read = new SectionReader(source);

    if (!isRecord(document)) {
        return read.fail("catalog must be a mapping");
    }

    const version = read.text(document, "version", "version");

    // Categories
    let rules: KeywordRule<ClassificationCategory>[];
    try {
        rules = parseRuleSet(document, isClassificationCategory, source);
    }
    catch (error) {
        if (error instanceof RuleSetError) {
            return read.fail(error.detail);
        }
        throw error;
    }

    const declared = rules.map(rule => rule.category);
    for (const category of CLASSIFICATION_CATEGORIES) {
        if (!declared.includes(category)) {
            read.fail(`category '${category}' has no rule`);
        }
    }

    const classification = read.section(document, "classification", "classification");
    const fallbackName   = read.text(classification, "fallbackCategory", "classification.fallbackCategory");
    if (!isClassificationCategory(fallbackName)) {
        return read.fail(`'classification.fallbackCategory' '${fallbackName}' is not a category`);
    }
    const fallback = {
        category    : fallbackName,
        confidence  : read.number(classification, "fallbackConfidence", "classification.fallbackConfidence", 0, 1),
        minimumScore: read.number(classification, "minimumScore", "classification.minimumScore", 0),
    };

    // Priority
    const priority     = read.section(document, "priority", "priority");
    const rawOverrides = priority.overrides ?? [];
    if (!Array.isArray(rawOverrides)) {
        return read.fail("'priority.overrides' must be a list");
    }
    const overrides: PriorityOverride[] = rawOverrides.map((entry: unknown, index: number) => {
        const path = `priority.overrides[${index}]`;
        if (!isRecord(entry)) {
            return read.fail(`'${path}' must be a mapping`);
        }
        const category = read.text(entry, "category", `${path}.category`);
        if (!isClassificationCategory(category)) {
            return read.fail(`'${path}.category' '${category}' is not a category`);
        }
        return {
            category,
            priority    : read.priority(entry, "priority", `${path}.priority`),
            escalateWhen: read.matchList(entry, "escalateWhen", `${path}.escalateWhen`),
            ...(entry.escalateTo !== undefined && {
                escalateTo: read.priority(entry, "escalateTo", `${path}.escalateTo`),
            }),
        };
    });

    // Recommendations
    const recommendations = read.section(document, "recommendations", "recommendations");
    const byPriority      = read.section(recommendations, "byPriority", "recommendations.byPriority");
    const byCategory      = read.section(recommendations, "byCategory", "recommendations.byCategory");
    read.onlyKeys(byPriority, PRIORITY_LEVELS, "recommendations.byPriority");
    read.onlyKeys(byCategory, CLASSIFICATION_CATEGORIES, "recommendations.byCategory");

    // Risk
    const risk     = read.section(document, "risk", "risk");
    const riskBase = read.section(risk, "base", "risk.base");
    const rawFactors = risk.factors ?? [];
    if (!Array.isArray(rawFactors)) {
        return read.fail("'risk.factors' must be a list");
    }
    const factors: RiskFactor[] = rawFactors.map((entry: unknown, index: number) => {
        const path = `risk.factors[${index}]`;
        if (!isRecord(entry)) {
            return read.fail(`'${path}' must be a mapping`);
        }
        return {
            label   : read.text(entry, "label", `${path}.label`),
            anyOf   : nonEmpty(read, read.matchList(entry, "anyOf", `${path}.anyOf`), `${path}.anyOf`),
            andAnyOf: read.matchList(entry, "andAnyOf", `${path}.andAnyOf`),
        };
    });

    // Details
    const details           = read.section(document, "details", "details");
    const detailsByCategory = read.section(details, "byCategory", "details.byCategory");
    const detailsByPriority = read.optionalSection(details, "byPriority", "details.byPriority");
    read.onlyKeys(detailsByPriority, PRIORITY_LEVELS, "details.byPriority");
    const rawConditions = details.conditions ?? [];
    if (!Array.isArray(rawConditions)) {
        return read.fail("'details.conditions' must be a list");
    }
    const conditions: ConditionalText[] = rawConditions.map((entry: unknown, index: number) => {
        const path = `details.conditions[${index}]`;
        if (!isRecord(entry)) {
            return read.fail(`'${path}' must be a mapping`);
        }
        return {
            text    : read.text(entry, "text", `${path}.text`),
            anyOf   : nonEmpty(read, read.matchList(entry, "anyOf", `${path}.anyOf`), `${path}.anyOf`),
            andAnyOf: read.matchList(entry, "andAnyOf", `${path}.andAnyOf`),
        };
    });

    const detailPriorityText: Partial<Record<PriorityLevel, string>> = {};
    for (const level of PRIORITY_LEVELS) {
        if (detailsByPriority[level] !== undefined) {
            detailPriorityText[level] = read.text(detailsByPriority, level, `details.byPriority.${level}`);
        }
    }

    // Document types
    const documentTypes = read.section(document, "documentTypes", "documentTypes");
    const defaultType   = read.text(documentTypes, "default", "documentTypes.default");
    if (!isDocumentType(defaultType)) {
        return read.fail(`'documentTypes.default' '${defaultType}' is not a document type`);
    }
    const typeIndicators = read.section(documentTypes, "indicators", "documentTypes.indicators");
    read.onlyKeys(typeIndicators, DOCUMENT_TYPES, "documentTypes.indicators");
    const indicators: DocumentTypeIndicator[] = DOCUMENT_TYPES.map(type => ({
        type,
        keywords: read.matchList(typeIndicators, type, `documentTypes.indicators.${type}`),
    }));

    // Keyword extraction
    const keywords = read.section(document, "keywords", "keywords");

    const catalog: PatternCatalog = {
        version,
        rules,
        fallback,
        priority: {
            urgent: read.matchList(priority, "urgent", "priority.urgent"),
            high  : read.matchList(priority, "high", "priority.high"),
            medium: read.matchList(priority, "medium", "priority.medium"),
            overrides,
        },
        recommendations: {
            maxActions: read.integer(recommendations, "maxActions", "recommendations.maxActions", 1),
            byPriority: perPriority(level =>
                read.strings(byPriority, level, `recommendations.byPriority.${level}`)),
            byCategory: perCategory(category =>
                read.strings(byCategory, category, `recommendations.byCategory.${category}`)),
        },
        risk: {
            base: perPriority(level => read.text(riskBase, level, `risk.base.${level}`)),
            factors,
        },
        details: {
            byCategory: perCategory(category =>
                read.text(detailsByCategory, category, `details.byCategory.${category}`)),
            byPriority: detailPriorityText,
            conditions,
        },
        documentTypes: {
            default: defaultType,
            indicators,
        },
        keywords: {
            maxKeywords          : read.integer(keywords, "maxKeywords", "keywords.maxKeywords", 1),
            topWords             : read.integer(keywords, "topWords", "keywords.topWords", 0),
            minWordLength        : read.integer(keywords, "minWordLength", "keywords.minWordLength", 1),
            fallbackMinWordLength: read.integer(keywords, "fallbackMinWordLength", "keywords.fallbackMinWordLength", 1),
            stopWords            : read.matchList(keywords, "stopWords", "keywords.stopWords"),
        },
    };

    return deepFreeze(catalog);
}

function nonEmpty(read: SectionReader, list: string[], path: string): string[] {
    if (list.length === 0) {
        return read.fail(`'${path}' must list at least one word`);
    }
    return list;
}

/**
 * Parse and validate catalog YAML text.
 */
export function parseCatalogYaml(text: string, source = "<inline>"): PatternCatalog {
    let document: unknown;
    try {
        document = parseYamlDocument(text, source);
    }
    catch (error) {
        if (error instanceof RuleSetError) {
            throw new CatalogError(error.detail, source);
        }
        throw error;
    }
    return parseCatalog(document, source);
}

/**
 * Load the pattern catalog from disk.
 *
 * @param filePath - Path to catalog.yml (default: the one shipped with the app)
 * @param logger - Optional logger for a load summary
 * @throws CatalogError if the file is missing or invalid
 *
 * @example
 * ```typescript
 * const catalog = loadCatalog();
 * catalog.rules.length; // 6
 * ```
 */
export function loadCatalog(filePath: string = DEFAULT_CATALOG_PATH, logger?: Logger): PatternCatalog {
    if (!existsSync(filePath)) {
        throw new CatalogError("catalog file not found", filePath);
    }

    const catalog = parseCatalogYaml(readFileSync(filePath, "utf-8"), filePath);

    logger?.info("Pattern catalog loaded", {
        filePath,
        version   : catalog.version,
        categories: catalog.rules.length,
    });

    return catalog;
}
