/**
 * @fileoverview Maritime Triage Engine
 *
 * Scores free text against weighted keyword rule sets, pulls entities
 * from providers on a timer and fans classified results out to bound
 * actions. Nothing here knows about vessels; domains plug in through
 * `TriageEngine.registerDomain`.
 *
 * @module @maritime-triage/engine
 * @example
 * ```typescript
 * import { KeywordRuleScorer, parseRuleSet, parseYamlDocument } from "@maritime-triage/engine";
 *
 * const isCategory = (id: string): id is "hazard" | "routine" => id === "hazard" || id === "routine";
 * const scorer = new KeywordRuleScorer({
 *     rules   : parseRuleSet(parseYamlDocument(readFileSync("./rules.yml", "utf-8")), isCategory),
 *     fallback: { category: "routine", confidence: 0.1, minimumScore: 0.5 },
 * });
 * ```
 */

export * from "./contracts/index.js";
export * from "./impl/index.js";
export * from "./scoring/index.js";
export * from "./plugins/index.js";
export * from "./engine/index.js";
