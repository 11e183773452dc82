/**
 * @fileoverview Engine barrel exports
 *
 * @module @maritime-triage/engine/engine
 */

export {
    TriageEngine,
    type DomainRegistration,
    type EngineConfig,
    type ProcessingOutcome,
} from "./TriageEngine.js";
