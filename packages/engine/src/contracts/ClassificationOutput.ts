/**
 * @fileoverview Classification Output
 *
 * What scoring produces and actions route on. The category is a plain
 * string so the engine stays ignorant of any domain's taxonomy.
 *
 * @module @maritime-triage/engine/contracts/ClassificationOutput
 */

/**
 * e.g. "Routine Maintenance Required", "Navigational Hazard Alert"
 */
export type CategoryId = string;

/**
 * Score a single category earned for one input.
 */
export interface CategoryScore<TCategory extends CategoryId = CategoryId> {
    readonly category: TCategory;
    readonly score: number;
}

/**
 * @example
 * ```typescript
 * // Strong rule-set match
 * { type: "Critical Equipment Failure Risk", confidence: 0.92 }
 *
 * // Weak signal, forced onto the fallback category
 * { type: "Routine Maintenance Required", confidence: 0.1, tags: ["Critical"] }
 * ```
 */
export interface ClassificationOutput<TCategory extends CategoryId = CategoryId> {
    /** Routing key for action bindings */
    readonly type: TCategory;

    /** Informational only, never used for routing */
    readonly tags?: readonly string[];

    /** In [0, 1]; treated as 1 when omitted */
    readonly confidence?: number;
}

export function getEffectiveConfidence(output: ClassificationOutput): number {
    return output.confidence ?? 1.0;
}
