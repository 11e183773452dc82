/**
 * @fileoverview Critical Alert Action Plugin
 *
 * Prints an alert block to the console for Critical and High priority
 * results. Delivery to people (email, pager) is out of scope; this is
 * the console equivalent.
 *
 * Priority alone decides. A document with urgent wording but no clear
 * category falls back at confidence 0.1 and still alerts.
 *
 * @module domain/actions/CriticalAlertAction
 */

import type {
    ActionBinding,
    ActionContext,
    ActionPlugin,
    ActionResult,
} from "@maritime-triage/engine";
import type { MaintenanceDocument } from "../entities/MaintenanceDocument.js";
import {
    PriorityLevel,
    perCategory,
    type ClassificationCategory,
    type ProcessingResult,
} from "../types.js";

export interface CriticalAlertActionConfig {
    /** Priorities that raise an alert (default: Critical, High) */
    readonly priorities?: readonly PriorityLevel[];

    /** Where alert lines go (default: console.log) */
    readonly write?: (line: string) => void;
}

export class CriticalAlertAction implements ActionPlugin<MaintenanceDocument, ProcessingResult> {
    readonly id          = "critical-alert";
    readonly name        = "Critical Alert";
    readonly description = "Prints an alert for Critical and High priority documents";
    readonly bindings: Readonly<Record<ClassificationCategory, ActionBinding>>;

    private readonly priorities: readonly PriorityLevel[];
    private readonly write: (line: string) => void;

    constructor(config: CriticalAlertActionConfig = {}) {
        this.bindings   = perCategory(() => ({}));
        this.priorities = config.priorities ?? [PriorityLevel.Critical, PriorityLevel.High];
        this.write      = config.write ?? ((line) => console.log(line));
    }

    async handle(context: ActionContext<MaintenanceDocument, ProcessingResult>): Promise<ActionResult> {
        const { entity, analysis, logger } = context;
        const result = analysis.report;

        if (!this.priorities.includes(result.priority)) {
            return {
                actionId: this.id,
                success : true,
                data    : { alerted: false },
            };
        }

        const vessel = result.vesselId ?? entity.metadata.vesselId ?? "unknown vessel";
        const title  = `${result.priority.toUpperCase()}: ${result.classification}`;

        this.write(`\n🚨 ${title}`);
        this.write(`   Vessel: ${vessel} | Source: ${entity.metadata.fileName}`);
        this.write(`   Confidence: ${Math.round(result.confidence * 100)}%`);
        this.write(`   ${result.summary}`);
        for (const action of result.recommendedActions.slice(0, 3)) {
            this.write(`   - ${action}`);
        }

        logger.info("Alert raised", {
            entityId: entity.id,
            resultId: result.id,
            priority: result.priority,
            vessel,
        });

        return {
            actionId: this.id,
            success : true,
            data    : { alerted: true, title },
        };
    }
}
