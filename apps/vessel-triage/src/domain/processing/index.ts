/**
 * @fileoverview Processing barrel exports
 *
 * @module domain/processing
 */

export {
    DocumentProcessor,
    summarizeResults,
    type DegradableSteps,
    type DocumentInput,
    type DocumentProcessorOptions,
} from "./DocumentProcessor.js";
export {
    DocumentValidationError,
    MIN_DOCUMENT_LENGTH,
    validateDocumentText,
} from "./validation.js";
