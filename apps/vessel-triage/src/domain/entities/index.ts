/**
 * @fileoverview Entities barrel exports
 *
 * @module domain/entities
 */

export {
    createMaintenanceDocument,
    isMaintenanceDocument,
    type MaintenanceDocument,
    type MaintenanceDocumentInput,
    type MaintenanceDocumentMetadata,
} from "./MaintenanceDocument.js";
