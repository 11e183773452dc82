/**
 * @fileoverview Domain barrel exports
 *
 * Maritime document domain: vocabulary, catalog shape, text pipeline,
 * processor and the engine plugins built on it.
 *
 * @module domain
 */

export * from "./types.js";
export { conditionHolds, type PatternCatalog } from "./catalog.js";
export type {
    ConditionalText,
    DetailRules,
    DocumentTypeIndicator,
    DocumentTypeRules,
    KeywordExtractionRules,
    PriorityOverride,
    PriorityRules,
    RecommendationRules,
    RiskFactor,
    RiskRules,
    TextCondition,
} from "./catalog.js";

export * from "./classification/index.js";
export * from "./processing/index.js";
export * from "./entities/index.js";
export * from "./analyzers/index.js";
export * from "./providers/index.js";
export * from "./actions/index.js";
export * from "./utils/index.js";

export { normalizeText } from "./text/preprocess.js";
export { DEFAULT_SUMMARY_LENGTH, splitSentences, summarize, truncate } from "./text/summarizer.js";
export {
    extractEntities,
    extractKeywords,
    extractPhrases,
    fallbackKeywords,
    topWords,
    unique,
} from "./text/extraction.js";
export { assessRisk, generateDetails, generateRecommendations } from "./advice.js";
export { createVesselDomain, type VesselDomainOptions } from "./registration.js";
