/**
 * @fileoverview Vessel domain registration
 *
 * Wires the inbox provider, the document analyzer and the action plugins
 * into one DomainRegistration for the TriageEngine.
 *
 * @module domain/registration
 */

import type { DomainRegistration, Logger } from "@maritime-triage/engine";
import type { ResultStore } from "../adapters/storage/ResultStore.js";
import { CriticalAlertAction } from "./actions/CriticalAlertAction.js";
import { PersistResultAction } from "./actions/PersistResultAction.js";
import { MaritimeDocumentAnalyzer } from "./analyzers/MaritimeDocumentAnalyzer.js";
import type { MaintenanceDocument } from "./entities/MaintenanceDocument.js";
import type { DocumentProcessor } from "./processing/DocumentProcessor.js";
import { InboxDirectoryProvider } from "./providers/InboxDirectoryProvider.js";
import type { ProcessingResult } from "./types.js";

export interface VesselDomainOptions {
    readonly processor: DocumentProcessor;
    readonly store: ResultStore;
    readonly inboxDir: string;
    readonly vesselId?: string;

    /** Document type hint for every inbox document */
    readonly documentType?: string;
    readonly logger: Logger;

    /** Alert output (default: console.log) */
    readonly writeAlert?: (line: string) => void;
}

/**
 * Create the vessel domain registration.
 *
 * Actions run in order: the result is persisted before any alert is raised.
 */
export function createVesselDomain(
    options: VesselDomainOptions
): DomainRegistration<MaintenanceDocument, ProcessingResult> {
    const provider = new InboxDirectoryProvider({
        inboxDir: options.inboxDir,
        logger  : options.logger,
        ...(options.vesselId !== undefined && { vesselId: options.vesselId }),
        ...(options.documentType !== undefined && { documentType: options.documentType }),
    });

    return {
        id      : "vessel",
        name    : "Vessel Document Triage",
        provider,
        analyzer: new MaritimeDocumentAnalyzer(options.processor),
        actions : [
            new PersistResultAction({ store: options.store }),
            new CriticalAlertAction(options.writeAlert ? { write: options.writeAlert } : {}),
        ],
        config  : {
            inboxDir: options.inboxDir,
        },
    };
}
