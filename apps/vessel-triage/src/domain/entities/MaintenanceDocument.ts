/**
 * @fileoverview Maintenance Document Entity
 *
 * A maritime operational document (maintenance record, sensor alert,
 * incident report) flowing through the triage engine.
 *
 * @module domain/entities/MaintenanceDocument
 */

import type { Entity } from "@maritime-triage/engine";

/**
 * Where the document came from.
 */
export interface MaintenanceDocumentMetadata {
    /** File name inside the inbox */
    readonly fileName: string;

    /** Absolute path at pickup time */
    readonly filePath: string;

    /** File modification time */
    readonly receivedAt: Date;

    readonly vesselId?: string;

    /** Document type hint passed on to the processor */
    readonly documentTypeHint?: string;
}

export interface MaintenanceDocument extends Entity<MaintenanceDocumentMetadata> {
    /** Entity type discriminator */
    readonly type: "maintenance-document";
}

/**
 * Input data for creating a MaintenanceDocument (without type discriminator)
 */
export interface MaintenanceDocumentInput {
    readonly id: string;
    readonly content: string;
    readonly metadata: MaintenanceDocumentMetadata;
    readonly traceId?: string;
}

/**
 * Factory function to create a MaintenanceDocument entity.
 *
 * @example
 * ```typescript
 * const document = createMaintenanceDocument({
 *     id      : "alert-17.txt",
 *     content : "Bilge alarm triggered in engine room",
 *     metadata: {
 *         fileName  : "alert-17.txt",
 *         filePath  : "/var/inbox/alert-17.txt",
 *         receivedAt: new Date(),
 *         vesselId  : "IMO-9000001",
 *     },
 * });
 * ```
 */
export function createMaintenanceDocument(data: MaintenanceDocumentInput): MaintenanceDocument {
    return {
        ...data,
        type: "maintenance-document",
    };
}

/**
 * Type guard to check if an entity is a MaintenanceDocument
 */
export function isMaintenanceDocument(entity: Entity<object>): entity is MaintenanceDocument {
    return "type" in entity && entity.type === "maintenance-document";
}
