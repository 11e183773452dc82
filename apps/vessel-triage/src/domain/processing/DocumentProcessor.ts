/**
 * @fileoverview Document Processor
 *
 * Runs one document through the whole pipeline and assembles the frozen
 * ProcessingResult:
 *
 * 1. Normalize the text
 * 2. Classify it and resolve the priority
 * 3. Summarize, extract keywords and entities
 * 4. Resolve the document type
 * 5. Pick recommendations, assess risk, write details
 *
 * Summary and keyword extraction degrade to simpler fallbacks when they
 * fail; a failure anywhere else yields the error result. Nothing here
 * performs I/O.
 *
 * @module domain/processing/DocumentProcessor
 */

import { v4 as uuidv4 } from "uuid";
import { describeError, silentLogger, type Logger } from "@maritime-triage/engine";
import type { PatternCatalog } from "../catalog.js";
import {
    ClassificationCategory,
    PriorityLevel,
    perCategory,
    perPriority,
    type ExtractedEntities,
    type ProcessingResult,
    type ResultBreakdown,
} from "../types.js";
import { createDocumentClassifier, type DocumentClassifier } from "../classification/classifier.js";
import { resolvePriority } from "../classification/priority.js";
import { resolveDocumentType } from "../classification/documentType.js";
import { normalizeText } from "../text/preprocess.js";
import { DEFAULT_SUMMARY_LENGTH, summarize, truncate } from "../text/summarizer.js";
import { extractEntities, extractKeywords, fallbackKeywords } from "../text/extraction.js";
import { assessRisk, generateDetails, generateRecommendations } from "../advice.js";
import { attempt } from "../utils/result.js";

/**
 * Steps that may fail and fall back. Replaceable for testing.
 */
export interface DegradableSteps {
    summarize(cleaned: string, maxLength: number): string;
    extractKeywords(cleaned: string, catalog: PatternCatalog): readonly string[];
}

const kDefaultSteps: DegradableSteps = {
    summarize      : (cleaned, maxLength) => summarize(cleaned, maxLength),
    extractKeywords: (cleaned, catalog) => extractKeywords(cleaned, catalog.keywords),
};

/**
 * Processor options.
 */
export interface DocumentProcessorOptions {
    readonly catalog: PatternCatalog;
    readonly logger?: Logger;

    /** Result ID generator (default: UUID v4) */
    readonly generateId?: () => string;

    /** Clock for result timestamps */
    readonly now?: () => Date;

    /** Summary bound in characters (default: 150) */
    readonly summaryMaxLength?: number;

    /** Classifier to use instead of one built from the catalog */
    readonly classifier?: DocumentClassifier;
    readonly steps?: Partial<DegradableSteps>;
}

/**
 * One document for batch processing.
 */
export interface DocumentInput {
    readonly text: string;
    readonly documentType?: string;
    readonly vesselId?: string;
}

const kNoEntities: ExtractedEntities = Object.freeze({
    equipment   : Object.freeze([]),
    locations   : Object.freeze([]),
    dates       : Object.freeze([]),
    measurements: Object.freeze([]),
    personnel   : Object.freeze([]),
});

function freezeResult(result: ProcessingResult): ProcessingResult {
    Object.freeze(result.keywords);
    Object.freeze(result.recommendedActions);
    Object.freeze(result.metadata);
    if (result.metadata.degraded) {
        Object.freeze(result.metadata.degraded);
    }
    for (const values of Object.values(result.entities)) {
        Object.freeze(values);
    }
    Object.freeze(result.entities);
    return Object.freeze(result);
}

/**
 * Document Processor
 *
 * Stateless apart from its injected collaborators; one instance can
 * serve any number of callers.
 *
 * @example
 * ```typescript
 * const processor = new DocumentProcessor({ catalog: loadCatalog() });
 * const result = processor.process("Main engine failure, immediate shutdown required.");
 * result.classification; // "Critical Equipment Failure Risk"
 * result.priority;       // "Critical"
 * ```
 */
export class DocumentProcessor {
    readonly catalog: PatternCatalog;

    private readonly logger: Logger;
    private readonly generateId: () => string;
    private readonly now: () => Date;
    private readonly summaryMaxLength: number;
    private readonly classifier: DocumentClassifier;
    private readonly steps: DegradableSteps;

    constructor(options: DocumentProcessorOptions) {
        this.catalog          = options.catalog;
        this.logger           = options.logger ?? silentLogger;
        this.generateId       = options.generateId ?? uuidv4;
        this.now              = options.now ?? (() => new Date());
        this.summaryMaxLength = options.summaryMaxLength ?? DEFAULT_SUMMARY_LENGTH;
        this.classifier       = options.classifier ?? createDocumentClassifier(options.catalog);
        this.steps            = { ...kDefaultSteps, ...options.steps };
    }

    /**
     * Process one document.
     *
     * @param text - Raw document text
     * @param documentTypeHint - Caller's document type (label or key)
     * @param vesselId - Vessel the document belongs to
     * @throws TypeError if `text` is not a string
     */
    process(text: string, documentTypeHint?: string, vesselId?: string): ProcessingResult {
        if (typeof text !== "string") {
            throw new TypeError(`Document text must be a string, got ${typeof text}`);
        }

        this.logger.debug("Processing document", { length: text.length, vesselId });

        try {
            return this.analyze(text, documentTypeHint, vesselId);
        }
        catch (error) {
            const message = describeError(error);
            this.logger.error("Document processing failed", { error: message, vesselId });
            return this.errorResult(text, message, vesselId);
        }
    }

    /**
     * Process several documents in order. A failing document yields its
     * error result; the rest are unaffected.
     */
    processBatch(inputs: readonly DocumentInput[]): ProcessingResult[] {
        const results = inputs.map(input => this.process(input.text, input.documentType, input.vesselId));

        this.logger.info("Batch processed", {
            documents: results.length,
            critical : results.filter(result => result.priority === PriorityLevel.Critical).length,
        });

        return results;
    }

    private analyze(text: string, documentTypeHint: string | undefined, vesselId: string | undefined): ProcessingResult {
        const cleaned = normalizeText(text);

        const { category, confidence } = this.classifier.classify(cleaned);
        const priority = resolvePriority(cleaned, category, this.catalog.priority);

        const degraded: string[] = [];

        const summaryAttempt = attempt(() => this.steps.summarize(cleaned, this.summaryMaxLength));
        let summary: string;
        if (summaryAttempt.ok) {
            summary = summaryAttempt.value;
        }
        else {
            this.logger.warn("Summary failed, truncating instead", { error: summaryAttempt.error });
            degraded.push("summary");
            summary = truncate(cleaned, this.summaryMaxLength);
        }

        const keywordAttempt = attempt(() => this.steps.extractKeywords(cleaned, this.catalog));
        let keywords: readonly string[];
        if (keywordAttempt.ok) {
            keywords = keywordAttempt.value;
        }
        else {
            this.logger.warn("Keyword extraction failed, using fallback", { error: keywordAttempt.error });
            degraded.push("keywords");
            keywords = fallbackKeywords(cleaned, this.catalog.keywords);
        }

        const { documentType, unrecognizedHint } = resolveDocumentType(
            cleaned,
            documentTypeHint,
            this.catalog.documentTypes
        );

        const result: ProcessingResult = {
            id                : this.generateId(),
            summary,
            details           : generateDetails(category, priority, cleaned, this.catalog.details),
            classification    : category,
            priority,
            confidence,
            keywords          : [...keywords],
            entities          : extractEntities(cleaned),
            recommendedActions: generateRecommendations(category, priority, this.catalog.recommendations),
            riskAssessment    : assessRisk(priority, cleaned, this.catalog.risk),
            documentType,
            ...(vesselId !== undefined && { vesselId }),
            timestamp         : this.now().toISOString(),
            metadata          : {
                originalLength   : text.length,
                processedLength  : cleaned.length,
                processingVersion: this.catalog.version,
                ...(unrecognizedHint !== undefined && { documentTypeHint: unrecognizedHint }),
                ...(degraded.length > 0 && { degraded }),
            },
        };

        this.logger.info("Document processed", {
            id            : result.id,
            classification: result.classification,
            priority      : result.priority,
            confidence    : result.confidence,
        });

        return freezeResult(result);
    }

    private errorResult(text: string, message: string, vesselId: string | undefined): ProcessingResult {
        return freezeResult({
            id                : this.generateId(),
            summary           : "Error processing document",
            details           : `An error occurred during processing: ${message}`,
            classification    : ClassificationCategory.RoutineMaintenance,
            priority          : PriorityLevel.Low,
            confidence        : 0,
            keywords          : [],
            entities          : kNoEntities,
            recommendedActions: ["Review document manually", "Check system logs"],
            riskAssessment    : "Unable to assess risk due to processing error",
            ...(vesselId !== undefined && { vesselId }),
            timestamp         : this.now().toISOString(),
            metadata          : {
                originalLength   : text.length,
                processedLength  : 0,
                processingVersion: this.catalog.version,
                error            : message,
            },
        });
    }
}

/**
 * Count results by classification and priority.
 */
export function summarizeResults(results: readonly ProcessingResult[]): ResultBreakdown {
    const byClassification = perCategory(() => 0);
    const byPriority       = perPriority(() => 0);

    for (const result of results) {
        byClassification[result.classification] += 1;
        byPriority[result.priority] += 1;
    }

    return {
        total   : results.length,
        critical: byPriority[PriorityLevel.Critical],
        byClassification,
        byPriority,
    };
}
