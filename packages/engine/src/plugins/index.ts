/**
 * @fileoverview Rule set loader barrel exports
 *
 * @module @maritime-triage/engine/plugins
 */

export {
    parseRuleSet,
    parseYamlDocument,
    type CategoryGuard,
} from "./RuleSetLoader.js";
