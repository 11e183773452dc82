/**
 * @fileoverview Scoring barrel exports
 *
 * @module @maritime-triage/engine/scoring
 */

export {
    KeywordRuleScorer,
    DEFAULT_MATCH_WEIGHTS,
    countHits,
    type FallbackPolicy,
    type KeywordRule,
    type KeywordScorerConfig,
    type MatchWeights,
    type ScoreOutcome,
} from "./KeywordRuleScorer.js";
export { RuleSetError } from "./RuleSetError.js";
