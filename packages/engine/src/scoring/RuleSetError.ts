/**
 * @fileoverview Rule set validation error
 *
 * @module @maritime-triage/engine/scoring/RuleSetError
 */

/**
 * Raised when a rule set is malformed: missing categories, negative
 * weights, unreadable YAML. The message names the source and the field.
 */
export class RuleSetError extends Error {
    readonly source: string;

    /** Message without the source prefix */
    readonly detail: string;

    constructor(detail: string, source = "<inline>") {
        super(`${source}: ${detail}`);
        this.name   = "RuleSetError";
        this.source = source;
        this.detail = detail;
    }
}
