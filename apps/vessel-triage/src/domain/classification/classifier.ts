/**
 * @fileoverview Maritime document classifier
 *
 * Binds the engine's KeywordRuleScorer to the catalog's category rules.
 *
 * @module domain/classification/classifier
 */

import { KeywordRuleScorer, type ScoreOutcome } from "@maritime-triage/engine";
import type { PatternCatalog } from "../catalog.js";
import type { ClassificationCategory } from "../types.js";

export interface DocumentClassification {
    readonly category: ClassificationCategory;

    /** In [0, 1] */
    readonly confidence: number;
}

export interface DocumentClassifier {
    /** Classify cleaned document text */
    classify(cleaned: string): DocumentClassification;

    /** Full outcome with per-category scores */
    score(cleaned: string): ScoreOutcome<ClassificationCategory>;
}

/**
 * Create a classifier over the catalog's rules.
 *
 * @example
 * ```typescript
 * const classifier = createDocumentClassifier(loadCatalog());
 * classifier.classify("Main engine failure, immediate shutdown");
 * // { category: "Critical Equipment Failure Risk", confidence: 1 }
 * ```
 */
export function createDocumentClassifier(catalog: PatternCatalog): DocumentClassifier {
    const scorer = new KeywordRuleScorer<ClassificationCategory>({
        rules   : catalog.rules,
        fallback: catalog.fallback,
    });

    return {
        classify(cleaned) {
            const { category, confidence } = scorer.score(cleaned);
            return { category, confidence };
        },
        score(cleaned) {
            return scorer.score(cleaned);
        },
    };
}
