/**
 * @fileoverview Persist Result Action Plugin
 *
 * Stores every analysis report in the result store.
 *
 * @module domain/actions/PersistResultAction
 */

import {
    describeError,
    type ActionBinding,
    type ActionContext,
    type ActionPlugin,
    type ActionResult,
    type CategoryId,
} from "@maritime-triage/engine";
import type { ResultStore } from "../../adapters/storage/ResultStore.js";
import type { MaintenanceDocument } from "../entities/MaintenanceDocument.js";
import { perCategory, type ProcessingResult } from "../types.js";

export interface PersistResultActionConfig {
    readonly store: ResultStore;

    /** Defaults to every category at any confidence */
    readonly bindings?: Readonly<Record<CategoryId, ActionBinding>>;
}

export class PersistResultAction implements ActionPlugin<MaintenanceDocument, ProcessingResult> {
    readonly id          = "persist-result";
    readonly name        = "Persist Result";
    readonly description = "Saves processing results to the result store";
    readonly bindings: Readonly<Record<CategoryId, ActionBinding>>;

    private readonly store: ResultStore;

    constructor(config: PersistResultActionConfig) {
        this.store    = config.store;
        this.bindings = config.bindings ?? perCategory(() => ({}));
    }

    async handle(context: ActionContext<MaintenanceDocument, ProcessingResult>): Promise<ActionResult> {
        const { entity, analysis, logger } = context;
        const result = analysis.report;

        try {
            this.store.save(result);
        }
        catch (error) {
            logger.error("Failed to save result", {
                entityId: entity.id,
                resultId: result.id,
                error   : describeError(error),
            });

            return {
                actionId: this.id,
                success : false,
                error   : describeError(error),
            };
        }

        logger.debug("Result saved", { entityId: entity.id, resultId: result.id });

        return {
            actionId: this.id,
            success : true,
            data    : { resultId: result.id },
        };
    }
}
