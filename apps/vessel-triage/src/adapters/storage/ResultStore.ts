/**
 * @fileoverview SQLite Result Store
 *
 * Keeps processing results in a local SQLite database. List-valued
 * fields are stored as JSON text and validated on the way back out.
 *
 * Use ":memory:" as the path for a throwaway store.
 *
 * @module adapters/storage/ResultStore
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { describeError } from "@maritime-triage/engine";
import {
    ENTITY_KINDS,
    isClassificationCategory,
    isDocumentType,
    isPriorityLevel,
    perCategory,
    perPriority,
    type ClassificationCategory,
    type ExtractedEntities,
    type PriorityLevel,
    type ProcessingMetadata,
    type ProcessingResult,
    type ResultBreakdown,
} from "../../domain/types.js";

/**
 * Raw row from the results table
 */
interface ResultRow {
    id: string;
    summary: string;
    details: string;
    classification: string;
    priority: string;
    confidence: number;
    keywords: string;
    entities: string;
    recommended_actions: string;
    risk_assessment: string;
    document_type: string | null;
    vessel_id: string | null;
    timestamp: string;
    metadata: string;
}

interface CountRow {
    classification: string;
    priority: string;
    count: number;
}

/**
 * Filters for listing results
 */
export interface ResultFilter {
    readonly classification?: ClassificationCategory;
    readonly priority?: PriorityLevel;
    readonly vesselId?: string;
    /** Only results stamped at or after this instant */
    readonly since?: Date;
}

const kSchema = `
    CREATE TABLE IF NOT EXISTS processing_results (
        id                  TEXT PRIMARY KEY,
        summary             TEXT NOT NULL,
        details             TEXT NOT NULL,
        classification      TEXT NOT NULL,
        priority            TEXT NOT NULL,
        confidence          REAL NOT NULL,
        keywords            TEXT NOT NULL,
        entities            TEXT NOT NULL,
        recommended_actions TEXT NOT NULL,
        risk_assessment     TEXT NOT NULL,
        document_type       TEXT,
        vessel_id           TEXT,
        timestamp           TEXT NOT NULL,
        metadata            TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_processing_results_timestamp ON processing_results (timestamp);
`;

const kDayMs = 24 * 60 * 60 * 1000;

/**
 * The instant `days` days before `now`.
 */
export function daysAgo(days: number, now: Date = new Date()): Date {
    return new Date(now.getTime() - days * kDayMs);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(item => typeof item === "string");
}

/**
 * Processing result store
 */
export class ResultStore {
    private db: Database.Database | null = null;
    private readonly dbPath: string;

    constructor(dbPath: string) {
        this.dbPath = dbPath;
    }

    /**
     * Open the database and create the schema if needed
     */
    open(): void {
        if (this.db) {
            return;
        }

        if (this.dbPath !== ":memory:") {
            mkdirSync(dirname(this.dbPath), { recursive: true });
        }

        this.db = new Database(this.dbPath);
        this.db.pragma("journal_mode = WAL");
        this.db.exec(kSchema);
    }

    /**
     * Close the database connection
     */
    close(): void {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }

    private get connection(): Database.Database {
        if (!this.db) {
            throw new Error("Result store not open. Call open() first.");
        }
        return this.db;
    }

    /**
     * Insert or replace a result
     */
    save(result: ProcessingResult): void {
        this.connection.prepare(`
            INSERT OR REPLACE INTO processing_results (
                id, summary, details, classification, priority, confidence, keywords, entities,
                recommended_actions, risk_assessment, document_type, vessel_id, timestamp, metadata
            ) VALUES (
                @id, @summary, @details, @classification, @priority, @confidence, @keywords, @entities,
                @recommendedActions, @riskAssessment, @documentType, @vesselId, @timestamp, @metadata
            )
        `).run({
            id                : result.id,
            summary           : result.summary,
            details           : result.details,
            classification    : result.classification,
            priority          : result.priority,
            confidence        : result.confidence,
            keywords          : JSON.stringify(result.keywords),
            entities          : JSON.stringify(result.entities),
            recommendedActions: JSON.stringify(result.recommendedActions),
            riskAssessment    : result.riskAssessment,
            documentType      : result.documentType ?? null,
            vesselId          : result.vesselId ?? null,
            timestamp         : result.timestamp,
            metadata          : JSON.stringify(result.metadata),
        });
    }

    findById(id: string): ProcessingResult | undefined {
        const row = this.connection
            .prepare<[string], ResultRow>("SELECT * FROM processing_results WHERE id = ?")
            .get(id);

        return row ? rowToResult(row) : undefined;
    }

    /**
     * Most recent results first
     */
    listRecent(limit: number = 20, filter: ResultFilter = {}): ProcessingResult[] {
        const clauses: string[] = [];
        const params: (string | number)[] = [];

        if (filter.classification) {
            clauses.push("classification = ?");
            params.push(filter.classification);
        }
        if (filter.priority) {
            clauses.push("priority = ?");
            params.push(filter.priority);
        }
        if (filter.vesselId) {
            clauses.push("vessel_id = ?");
            params.push(filter.vesselId);
        }
        if (filter.since) {
            clauses.push("timestamp >= ?");
            params.push(filter.since.toISOString());
        }

        const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
        params.push(limit);

        return this.connection
            .prepare<(string | number)[], ResultRow>(
                `SELECT * FROM processing_results ${where} ORDER BY timestamp DESC, rowid DESC LIMIT ?`
            )
            .all(...params)
            .map(rowToResult);
    }

    count(): number {
        const row = this.connection
            .prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM processing_results")
            .get();

        return row?.total ?? 0;
    }

    /**
     * Counts by classification and priority, over every stored result or
     * only those stamped at or after `since`
     */
    breakdown(since?: Date): ResultBreakdown {
        const rows = this.connection
            .prepare<[string], CountRow>(`
                SELECT classification, priority, COUNT(*) AS count
                FROM processing_results
                WHERE timestamp >= ?
                GROUP BY classification, priority
            `)
            .all(since ? since.toISOString() : "");

        const byClassification = perCategory(() => 0);
        const byPriority       = perPriority(() => 0);
        let total = 0;

        for (const row of rows) {
            total += row.count;
            if (isClassificationCategory(row.classification)) {
                byClassification[row.classification] += row.count;
            }
            if (isPriorityLevel(row.priority)) {
                byPriority[row.priority] += row.count;
            }
        }

        return {
            total,
            critical: byPriority.Critical,
            byClassification,
            byPriority,
        };
    }

    /**
     * Delete results older than `days` days. Returns the number deleted.
     */
    deleteOlderThan(days: number, now: Date = new Date()): number {
        const cutoff = daysAgo(days, now).toISOString();

        const info = this.connection
            .prepare<[string]>("DELETE FROM processing_results WHERE timestamp < ?")
            .run(cutoff);

        return info.changes;
    }
}

function parseJson(text: string, field: string, id: string): unknown {
    try {
        return JSON.parse(text);
    }
    catch (error) {
        throw new Error(`Stored result ${id} has unreadable ${field}: ${describeError(error)}`);
    }
}

function parseStringList(text: string, field: string, id: string): string[] {
    const value = parseJson(text, field, id);
    if (!isStringList(value)) {
        throw new Error(`Stored result ${id} has invalid ${field}`);
    }
    return value;
}

function parseEntities(text: string, id: string): ExtractedEntities {
    const value = parseJson(text, "entities", id);
    if (!isRecord(value)) {
        throw new Error(`Stored result ${id} has invalid entities`);
    }

    const list = (kind: typeof ENTITY_KINDS[number]): string[] => {
        const entries = value[kind] ?? [];
        if (!isStringList(entries)) {
            throw new Error(`Stored result ${id} has invalid entities.${kind}`);
        }
        return entries;
    };

    return {
        equipment   : list("equipment"),
        locations   : list("locations"),
        dates       : list("dates"),
        measurements: list("measurements"),
        personnel   : list("personnel"),
    };
}

function parseMetadata(text: string, id: string): ProcessingMetadata {
    const value = parseJson(text, "metadata", id);
    if (
        !isRecord(value) ||
        typeof value.originalLength !== "number" ||
        typeof value.processedLength !== "number" ||
        typeof value.processingVersion !== "string"
    ) {
        throw new Error(`Stored result ${id} has invalid metadata`);
    }

    return {
        originalLength   : value.originalLength,
        processedLength  : value.processedLength,
        processingVersion: value.processingVersion,
        ...(typeof value.documentTypeHint === "string" && { documentTypeHint: value.documentTypeHint }),
        ...(isStringList(value.degraded) && { degraded: value.degraded }),
        ...(typeof value.error === "string" && { error: value.error }),
    };
}

function rowToResult(row: ResultRow): ProcessingResult {
    if (!isClassificationCategory(row.classification) || !isPriorityLevel(row.priority)) {
        throw new Error(`Stored result ${row.id} has an unknown classification or priority`);
    }

    return {
        id                : row.id,
        summary           : row.summary,
        details           : row.details,
        classification    : row.classification,
        priority          : row.priority,
        confidence        : row.confidence,
        keywords          : parseStringList(row.keywords, "keywords", row.id),
        entities          : parseEntities(row.entities, row.id),
        recommendedActions: parseStringList(row.recommended_actions, "recommended_actions", row.id),
        riskAssessment    : row.risk_assessment,
        ...(row.document_type !== null && isDocumentType(row.document_type) && { documentType: row.document_type }),
        ...(row.vessel_id !== null && { vesselId: row.vessel_id }),
        timestamp         : row.timestamp,
        metadata          : parseMetadata(row.metadata, row.id),
    };
}
