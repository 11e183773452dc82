/**
 * @fileoverview Pattern catalog shape
 *
 * Every rule table the text pipeline reads. Built once by
 * config/loadCatalog and deep-frozen; nothing mutates it afterwards.
 *
 * @module domain/catalog
 */

import type { FallbackPolicy, KeywordRule } from "@maritime-triage/engine";
import type { ClassificationCategory, DocumentType, PriorityLevel } from "./types.js";

/**
 * Fixed priority for a category, optionally raised when certain words appear.
 */
export interface PriorityOverride {
    readonly category: ClassificationCategory;
    readonly priority: PriorityLevel;
    readonly escalateTo?: PriorityLevel;
    readonly escalateWhen: readonly string[];
}

export interface PriorityRules {
    readonly urgent: readonly string[];
    readonly high: readonly string[];
    readonly medium: readonly string[];
    readonly overrides: readonly PriorityOverride[];
}

/**
 * Text that applies when any of `anyOf` occurs and, if `andAnyOf` is
 * non-empty, any of `andAnyOf` occurs too.
 */
export interface TextCondition {
    readonly anyOf: readonly string[];
    readonly andAnyOf: readonly string[];
}

export interface RiskFactor extends TextCondition {
    readonly label: string;
}

export interface ConditionalText extends TextCondition {
    readonly text: string;
}

export interface RecommendationRules {
    readonly maxActions: number;
    readonly byPriority: Readonly<Record<PriorityLevel, readonly string[]>>;
    readonly byCategory: Readonly<Record<ClassificationCategory, readonly string[]>>;
}

export interface RiskRules {
    readonly base: Readonly<Record<PriorityLevel, string>>;
    readonly factors: readonly RiskFactor[];
}

export interface DetailRules {
    readonly byCategory: Readonly<Record<ClassificationCategory, string>>;
    readonly byPriority: Readonly<Partial<Record<PriorityLevel, string>>>;
    readonly conditions: readonly ConditionalText[];
}

export interface DocumentTypeIndicator {
    readonly type: DocumentType;
    readonly keywords: readonly string[];
}

export interface DocumentTypeRules {
    readonly default: DocumentType;

    /** In DocumentType declaration order */
    readonly indicators: readonly DocumentTypeIndicator[];
}

export interface KeywordExtractionRules {
    readonly maxKeywords: number;
    readonly topWords: number;

    /** Frequency words must have at least this many characters */
    readonly minWordLength: number;

    /** Same, for the fallback extractor */
    readonly fallbackMinWordLength: number;
    readonly stopWords: readonly string[];
}

/**
 * The complete catalog.
 */
export interface PatternCatalog {
    /** Reported as metadata.processingVersion */
    readonly version: string;

    /** One rule per category, in tie-break order */
    readonly rules: readonly KeywordRule<ClassificationCategory>[];
    readonly fallback: FallbackPolicy<ClassificationCategory>;
    readonly priority: PriorityRules;
    readonly recommendations: RecommendationRules;
    readonly risk: RiskRules;
    readonly details: DetailRules;
    readonly documentTypes: DocumentTypeRules;
    readonly keywords: KeywordExtractionRules;
}

/**
 * True when the condition holds for already lower-cased text.
 */
export function conditionHolds(lowerText: string, condition: TextCondition): boolean {
    const includes = (word: string): boolean => lowerText.includes(word);

    if (!condition.anyOf.some(includes)) {
        return false;
    }
    return condition.andAnyOf.length === 0 || condition.andAnyOf.some(includes);
}
