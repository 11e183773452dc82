/**
 * @fileoverview Keyword Rule Scorer
 *
 * Table-driven text classifier. Every category owns one rule made of
 * three keyword lists (keywords, terms, indicators) and a weight. A
 * category's score is
 *
 *     (0.4 * keyword hits + 0.3 * term hits + 0.3 * indicator hits) * weight
 *
 * where a hit is substring containment in the lower-cased text, so
 * "engine" also hits inside "engineering". The highest score wins; on a
 * tie the category declared first wins. A winner below the fallback
 * threshold is replaced by the fallback category at a fixed confidence.
 *
 * @module @maritime-triage/engine/scoring/KeywordRuleScorer
 */

import type { CategoryId, CategoryScore } from "../contracts/ClassificationOutput.js";
import { RuleSetError } from "./RuleSetError.js";

/**
 * One category's matching rule.
 */
export interface KeywordRule<TCategory extends CategoryId = CategoryId> {
    readonly category: TCategory;

    /** Topic words */
    readonly keywords: readonly string[];

    /** Domain nouns (equipment, systems) */
    readonly terms: readonly string[];

    /** Words that signal urgency or severity for this category */
    readonly indicators: readonly string[];

    /** Non-negative multiplier applied to the raw score */
    readonly weight: number;
}

/**
 * Per-hit contribution of each list.
 */
export interface MatchWeights {
    readonly keyword: number;
    readonly term: number;
    readonly indicator: number;
}

export const DEFAULT_MATCH_WEIGHTS: MatchWeights = Object.freeze({
    keyword  : 0.4,
    term     : 0.3,
    indicator: 0.3,
});

/**
 * What to report when no category scores high enough.
 */
export interface FallbackPolicy<TCategory extends CategoryId> {
    readonly category: TCategory;

    /** Confidence reported with the fallback category */
    readonly confidence: number;

    /** Winning scores strictly below this trigger the fallback */
    readonly minimumScore: number;
}

/**
 * Scorer configuration.
 */
export interface KeywordScorerConfig<TCategory extends CategoryId> {
    /** Rules in declaration order (the tie-break order) */
    readonly rules: readonly KeywordRule<TCategory>[];
    readonly fallback: FallbackPolicy<TCategory>;
    readonly matchWeights?: MatchWeights;
}

/**
 * Full scoring outcome for one text.
 */
export interface ScoreOutcome<TCategory extends CategoryId> {
    /** Reported category (the fallback category when fellBack is true) */
    readonly category: TCategory;

    /** Confidence in [0, 1] */
    readonly confidence: number;

    /** Category that actually scored highest */
    readonly topCategory: TCategory;
    readonly topScore: number;

    readonly scores: readonly CategoryScore<TCategory>[];
    readonly fellBack: boolean;
}

function clamp01(value: number): number {
    return Math.min(1, Math.max(0, value));
}

function normalizeList(list: readonly string[]): readonly string[] {
    return Object.freeze(list.map(entry => entry.toLowerCase()));
}

/**
 * Keyword rule scorer.
 *
 * Immutable once constructed; safe to share between callers.
 *
 * @example
 * ```typescript
 * const scorer = new KeywordRuleScorer({
 *     rules: [
 *         { category: "failure", keywords: ["failure"], terms: ["engine"], indicators: [], weight: 1 },
 *         { category: "routine", keywords: ["service"], terms: ["filter"], indicators: [], weight: 0.3 },
 *     ],
 *     fallback: { category: "routine", confidence: 0.1, minimumScore: 0.5 },
 * });
 *
 * scorer.score("Engine failure reported").category; // "failure"
 * ```
 */
export class KeywordRuleScorer<TCategory extends CategoryId> {
    readonly rules: readonly KeywordRule<TCategory>[];
    readonly fallback: FallbackPolicy<TCategory>;
    readonly matchWeights: MatchWeights;

    constructor(config: KeywordScorerConfig<TCategory>) {
        if (config.rules.length === 0) {
            throw new RuleSetError("rule set must define at least one category");
        }

        const seen = new Set<string>();
        for (const rule of config.rules) {
            if (seen.has(rule.category)) {
                throw new RuleSetError(`duplicate category '${rule.category}'`);
            }
            seen.add(rule.category);

            if (!Number.isFinite(rule.weight) || rule.weight < 0) {
                throw new RuleSetError(`category '${rule.category}' has invalid weight ${rule.weight}`);
            }
        }

        if (!seen.has(config.fallback.category)) {
            throw new RuleSetError(`fallback category '${config.fallback.category}' has no rule`);
        }

        this.rules = Object.freeze(config.rules.map(rule => Object.freeze({
            category  : rule.category,
            keywords  : normalizeList(rule.keywords),
            terms     : normalizeList(rule.terms),
            indicators: normalizeList(rule.indicators),
            weight    : rule.weight,
        })));
        this.fallback     = Object.freeze({ ...config.fallback });
        this.matchWeights = Object.freeze({ ...(config.matchWeights ?? DEFAULT_MATCH_WEIGHTS) });
    }

    /**
     * Weighted score of one rule against already lower-cased text.
     */
    scoreRule(lowerText: string, rule: KeywordRule<TCategory>): number {
        const raw =
            countHits(lowerText, rule.keywords) * this.matchWeights.keyword +
            countHits(lowerText, rule.terms) * this.matchWeights.term +
            countHits(lowerText, rule.indicators) * this.matchWeights.indicator;

        return raw * rule.weight;
    }

    /**
     * Score text against every rule and pick the winner.
     */
    score(text: string): ScoreOutcome<TCategory> {
        const lowerText = text.toLowerCase();

        const scores: CategoryScore<TCategory>[] = this.rules.map(rule => ({
            category: rule.category,
            score   : this.scoreRule(lowerText, rule),
        }));

        // Strict ">" keeps the first-declared category on ties.
        let top = scores[0];
        for (const entry of scores.slice(1)) {
            if (entry.score > top.score) {
                top = entry;
            }
        }

        const total = scores.reduce((sum, entry) => sum + entry.score, 0);

        if (top.score < this.fallback.minimumScore) {
            return {
                category   : this.fallback.category,
                confidence : clamp01(this.fallback.confidence),
                topCategory: top.category,
                topScore   : top.score,
                scores,
                fellBack   : true,
            };
        }

        return {
            category   : top.category,
            confidence : clamp01(total > 0 ? top.score / total : 0),
            topCategory: top.category,
            topScore   : top.score,
            scores,
            fellBack   : false,
        };
    }
}

/**
 * Number of list entries contained in the text. Each entry counts once.
 */
export function countHits(lowerText: string, entries: readonly string[]): number {
    let hits = 0;
    for (const entry of entries) {
        if (entry.length > 0 && lowerText.includes(entry)) {
            hits += 1;
        }
    }
    return hits;
}
