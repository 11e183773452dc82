/**
 * @fileoverview Inbox Directory Entity Provider
 *
 * Implements the EntityProvider contract over a directory of text files.
 * Each file dropped into the inbox becomes one MaintenanceDocument and is
 * delivered once per provider lifetime.
 *
 * @module domain/providers/InboxDirectoryProvider
 */

import { mkdir, readdir, readFile, stat } from "fs/promises";
import { extname, join, resolve } from "path";
import {
    describeError,
    silentLogger,
    type EntityProvider,
    type FetchOptions,
    type FetchResult,
    type Logger,
} from "@maritime-triage/engine";
import { createMaintenanceDocument, type MaintenanceDocument } from "../entities/MaintenanceDocument.js";
import { DocumentValidationError, MIN_DOCUMENT_LENGTH, validateDocumentText } from "../processing/validation.js";

/**
 * Configuration for the inbox provider
 */
export interface InboxProviderConfig {
    /** Directory to watch; created on initialize if missing */
    readonly inboxDir: string;

    /** File extensions picked up (default: .txt, .log, .md) */
    readonly extensions?: readonly string[];

    /** Default limit for fetching documents */
    readonly defaultLimit?: number;

    /** Minimum document length in characters */
    readonly minLength?: number;

    /** Vessel stamped on every document from this inbox */
    readonly vesselId?: string;

    /** Document type hint stamped on every document */
    readonly documentType?: string;

    readonly logger?: Logger;
}

export const DEFAULT_INBOX_EXTENSIONS: readonly string[] = [".txt", ".log", ".md"];

/**
 * Inbox Directory Provider
 *
 * @example
 * ```typescript
 * const provider = new InboxDirectoryProvider({ inboxDir: "./inbox", vesselId: "IMO-9000001" });
 * await provider.initialize();
 *
 * const { entities } = await provider.getEntities({ limit: 10 });
 * ```
 */
export class InboxDirectoryProvider implements EntityProvider<MaintenanceDocument> {
    readonly id          = "inbox-directory";
    readonly name        = "Inbox Directory";
    readonly description = "Provides maritime documents dropped into an inbox directory";

    private readonly inboxDir: string;
    private readonly extensions: ReadonlySet<string>;
    private readonly defaultLimit: number;
    private readonly minLength: number;
    private readonly vesselId?: string;
    private readonly documentType?: string;
    private readonly logger: Logger;

    /** File names already delivered or skipped */
    private readonly seen = new Set<string>();
    private initialized = false;

    constructor(config: InboxProviderConfig) {
        this.inboxDir     = resolve(config.inboxDir);
        this.extensions   = new Set((config.extensions ?? DEFAULT_INBOX_EXTENSIONS).map(ext => ext.toLowerCase()));
        this.defaultLimit = config.defaultLimit ?? 10;
        this.minLength    = config.minLength ?? MIN_DOCUMENT_LENGTH;
        this.vesselId     = config.vesselId;
        this.documentType = config.documentType;
        this.logger       = config.logger ?? silentLogger;
    }

    /**
     * Create the inbox directory if needed.
     */
    async initialize(): Promise<void> {
        if (this.initialized) {
            return;
        }

        await mkdir(this.inboxDir, { recursive: true });
        this.initialized = true;

        this.logger.info("Watching inbox", { inboxDir: this.inboxDir });
    }

    /**
     * Fetch documents not delivered yet, oldest file name first.
     */
    async getEntities(options: FetchOptions = {}): Promise<FetchResult<MaintenanceDocument>> {
        if (!this.initialized) {
            throw new Error("Provider not initialized. Call initialize() first.");
        }

        const limit = options.limit ?? this.defaultLimit;

        const pending = (await readdir(this.inboxDir))
            .filter(name => this.extensions.has(extname(name).toLowerCase()) && !this.seen.has(name))
            .sort();

        const entities: MaintenanceDocument[] = [];
        let consumed = 0;

        for (const fileName of pending) {
            if (entities.length >= limit) {
                break;
            }
            consumed += 1;
            this.seen.add(fileName);

            const document = await this.readDocument(fileName);
            if (document) {
                entities.push(document);
            }
        }

        return {
            entities,
            hasMore: consumed < pending.length,
        };
    }

    /**
     * Forget delivered files.
     */
    async shutdown(): Promise<void> {
        this.seen.clear();
        this.initialized = false;
    }

    private async readDocument(fileName: string): Promise<MaintenanceDocument | null> {
        const filePath = join(this.inboxDir, fileName);

        try {
            const [content, info] = await Promise.all([readFile(filePath, "utf-8"), stat(filePath)]);
            validateDocumentText(content, this.minLength);

            return createMaintenanceDocument({
                id      : fileName,
                content,
                metadata: {
                    fileName,
                    filePath,
                    receivedAt: info.mtime,
                    ...(this.vesselId !== undefined && { vesselId: this.vesselId }),
                    ...(this.documentType !== undefined && { documentTypeHint: this.documentType }),
                },
            });
        }
        catch (error) {
            if (error instanceof DocumentValidationError) {
                this.logger.warn("Skipping inbox file", { fileName, reason: error.message });
                return null;
            }
            this.logger.error("Failed to read inbox file", { fileName, error: describeError(error) });
            return null;
        }
    }
}
