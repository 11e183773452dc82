/**
 * @fileoverview Maritime Document Analyzer
 *
 * Adapts the DocumentProcessor to the engine's EntityAnalyzer contract.
 * The analysis type is the classification label, so action bindings are
 * keyed by category.
 *
 * @module domain/analyzers/MaritimeDocumentAnalyzer
 */

import type { AnalysisOutput, EntityAnalyzer, PluginContext } from "@maritime-triage/engine";
import type { MaintenanceDocument } from "../entities/MaintenanceDocument.js";
import type { DocumentProcessor } from "../processing/DocumentProcessor.js";
import type { ProcessingResult } from "../types.js";

export class MaritimeDocumentAnalyzer implements EntityAnalyzer<MaintenanceDocument, ProcessingResult> {
    readonly id   = "maritime-document-analyzer";
    readonly name = "Maritime Document Analyzer";

    constructor(private readonly processor: DocumentProcessor) {}

    analyze(entity: MaintenanceDocument, context: PluginContext): AnalysisOutput<ProcessingResult> {
        const result = this.processor.process(
            entity.content,
            entity.metadata.documentTypeHint,
            entity.metadata.vesselId
        );

        context.logger.debug("Document analyzed", {
            entityId      : entity.id,
            resultId      : result.id,
            classification: result.classification,
            priority      : result.priority,
        });

        return {
            type      : result.classification,
            confidence: result.confidence,
            tags      : [result.priority],
            report    : result,
        };
    }
}
