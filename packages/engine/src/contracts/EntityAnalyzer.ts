/**
 * @fileoverview Entity Analyzer Contract
 *
 * An analyzer turns one entity into a classification plus a domain
 * report (summary, extracted fields, recommendations). The engine routes
 * on the classification and hands the report to actions untouched.
 *
 * @module @maritime-triage/engine/contracts/EntityAnalyzer
 */

import type { Entity } from "./Entity.js";
import type { ClassificationOutput } from "./ClassificationOutput.js";
import type { Logger } from "./Logger.js";

/**
 * Handed to the analyzer for each entity.
 */
export interface PluginContext {
    /** The domain's registration config */
    readonly config: Readonly<Record<string, unknown>>;

    /** Scoped to the domain and plugin */
    readonly logger: Logger;
    readonly traceId: string;
}

/**
 * Classification output carrying the full domain report.
 */
export interface AnalysisOutput<TReport> extends ClassificationOutput {
    readonly report: TReport;
}

/**
 * @typeParam TEntity - Entity type the analyzer accepts
 * @typeParam TReport - Report type it produces
 */
export interface EntityAnalyzer<TEntity extends Entity<object>, TReport> {
    readonly id: string;
    readonly name?: string;

    /** Must not mutate the entity */
    analyze(
        entity: TEntity,
        context: PluginContext
    ): AnalysisOutput<TReport> | Promise<AnalysisOutput<TReport>>;
}
