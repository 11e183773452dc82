/**
 * @fileoverview Action Plugin Contract
 *
 * Actions run after analysis: store a result, raise an alert. Each
 * action lists the categories it cares about in `bindings`; the engine
 * runs it only when the analysis type is bound and confident enough.
 * Actions never re-classify.
 *
 * @module @maritime-triage/engine/contracts/ActionPlugin
 */

import type { Entity } from "./Entity.js";
import type { CategoryId, ClassificationOutput } from "./ClassificationOutput.js";
import type { AnalysisOutput } from "./EntityAnalyzer.js";
import type { Logger } from "./Logger.js";

export interface ActionBinding {
    /** Run only at or above this confidence (default: 0) */
    readonly minConfidence?: number;
}

/**
 * What an action is handed for one entity.
 */
export interface ActionContext<TEntity extends Entity<object>, TReport> {
    readonly entity: TEntity;
    readonly analysis: AnalysisOutput<TReport>;

    /** The domain's registration config */
    readonly config: Readonly<Record<string, unknown>>;

    /** Scoped to the domain and action, with the trace ID attached */
    readonly logger: Logger;
    readonly traceId: string;
}

export interface ActionResult {
    readonly actionId: string;
    readonly success: boolean;
    readonly error?: string;

    /** Action-specific output, echoed on entity:actionExecuted */
    readonly data?: Record<string, unknown>;
}

/**
 * Action plugin interface.
 *
 * A failed action reports `success: false` rather than throwing; the
 * engine still catches a throw and records it as a failed result.
 *
 * @example
 * ```typescript
 * const logAction: ActionPlugin<ReportEntity, Report> = {
 *     id      : "log-hazards",
 *     bindings: { "Navigational Hazard Alert": { minConfidence: 0.6 } },
 *     async handle({ entity, logger }) {
 *         logger.warn("Hazard reported", { entityId: entity.id });
 *         return { actionId: "log-hazards", success: true };
 *     },
 * };
 * ```
 */
export interface ActionPlugin<TEntity extends Entity<object> = Entity<object>, TReport = unknown> {
    readonly id: string;
    readonly name?: string;
    readonly description?: string;

    /** Category -> binding. Unbound categories never trigger the action. */
    readonly bindings: Readonly<Record<CategoryId, ActionBinding>>;

    handle(context: ActionContext<TEntity, TReport>): Promise<ActionResult>;
}

/**
 * Structural check for objects loaded at run time.
 */
export function isActionPlugin(obj: unknown): obj is ActionPlugin {
    if (typeof obj !== "object" || obj === null) {
        return false;
    }
    return (
        "id" in obj && typeof obj.id === "string" &&
        "bindings" in obj && typeof obj.bindings === "object" && obj.bindings !== null &&
        "handle" in obj && typeof obj.handle === "function"
    );
}

/**
 * True when the action is bound to the output's category and the
 * output's confidence (1 when absent) reaches the binding's minimum.
 */
export function shouldActionExecute<TEntity extends Entity<object>, TReport>(
    action: ActionPlugin<TEntity, TReport>,
    classification: ClassificationOutput
): boolean {
    if (!Object.prototype.hasOwnProperty.call(action.bindings, classification.type)) {
        return false;
    }

    const { minConfidence = 0 } = action.bindings[classification.type];
    return (classification.confidence ?? 1) >= minConfidence;
}
