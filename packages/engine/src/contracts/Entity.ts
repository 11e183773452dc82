/**
 * @fileoverview Entity Contract
 *
 * @module @maritime-triage/engine/contracts/Entity
 */

/**
 * One document in the pipeline: free text plus whatever the domain
 * records about where it came from. Analyzers and actions read entities
 * and never change them.
 *
 * @typeParam TMetadata - Domain-specific metadata
 *
 * @example
 * ```typescript
 * interface SensorAlert extends Entity<{ sensorId: string; raisedAt: Date }> {}
 * ```
 */
export interface Entity<TMetadata extends object = Record<string, unknown>> {
    readonly id: string;

    /** Text the analyzer classifies */
    readonly content: string;
    readonly metadata: TMetadata;

    /** Stamped on the copy the engine hands to plugins */
    readonly traceId?: string;
}
