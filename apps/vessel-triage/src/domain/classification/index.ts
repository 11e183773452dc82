/**
 * @fileoverview Classification barrel exports
 *
 * @module domain/classification
 */

export {
    createDocumentClassifier,
    type DocumentClassification,
    type DocumentClassifier,
} from "./classifier.js";
export { resolvePriority } from "./priority.js";
export {
    inferDocumentType,
    resolveDocumentType,
    type DocumentTypeResolution,
} from "./documentType.js";
