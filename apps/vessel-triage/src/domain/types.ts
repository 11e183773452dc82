/**
 * @fileoverview Maritime domain vocabulary
 *
 * Categories, priority levels and document types are `as const` objects
 * keyed by a short name; their values are the labels that go on the wire
 * and into the pattern catalog.
 *
 * @module domain/types
 */

/**
 * Issue categories. Declaration order is the classification tie-break order.
 */
export const ClassificationCategory = {
    CriticalEquipmentFailure: "Critical Equipment Failure Risk",
    NavigationalHazard      : "Navigational Hazard Alert",
    EnvironmentalCompliance : "Environmental Compliance Breach",
    RoutineMaintenance      : "Routine Maintenance Required",
    SafetyViolation         : "Safety Violation Detected",
    FuelEfficiency          : "Fuel Efficiency Alert",
} as const;

export type ClassificationCategory = typeof ClassificationCategory[keyof typeof ClassificationCategory];

export const CLASSIFICATION_CATEGORIES: readonly ClassificationCategory[] = Object.values(ClassificationCategory);

export function isClassificationCategory(value: string): value is ClassificationCategory {
    return CLASSIFICATION_CATEGORIES.some(category => category === value);
}

/**
 * Urgency, most urgent first.
 */
export const PriorityLevel = {
    Critical: "Critical",
    High    : "High",
    Medium  : "Medium",
    Low     : "Low",
} as const;

export type PriorityLevel = typeof PriorityLevel[keyof typeof PriorityLevel];

export const PRIORITY_LEVELS: readonly PriorityLevel[] = Object.values(PriorityLevel);

export function isPriorityLevel(value: string): value is PriorityLevel {
    return PRIORITY_LEVELS.some(level => level === value);
}

/**
 * Rank for sorting; Critical is 0.
 */
export function priorityRank(level: PriorityLevel): number {
    return PRIORITY_LEVELS.indexOf(level);
}

/**
 * Kinds of source document. Declaration order breaks inference ties.
 */
export const DocumentType = {
    MaintenanceRecord : "Maintenance Record",
    SensorAlert       : "Sensor Alert",
    IncidentReport    : "Incident Report",
    InspectionReport  : "Inspection Report",
    ComplianceDocument: "Compliance Document",
} as const;

export type DocumentType = typeof DocumentType[keyof typeof DocumentType];

export const DOCUMENT_TYPES: readonly DocumentType[] = Object.values(DocumentType);

export function isDocumentType(value: string): value is DocumentType {
    return DOCUMENT_TYPES.some(type => type === value);
}

/**
 * Resolve a caller-supplied type hint. Matches a label ("Sensor Alert")
 * or a key ("SensorAlert"), ignoring case and surrounding whitespace.
 */
export function parseDocumentType(hint: string): DocumentType | undefined {
    return matchLabel(DocumentType, hint);
}

export function parseClassificationCategory(hint: string): ClassificationCategory | undefined {
    return matchLabel(ClassificationCategory, hint);
}

export function parsePriorityLevel(hint: string): PriorityLevel | undefined {
    return matchLabel(PriorityLevel, hint);
}

/**
 * Case-insensitive lookup by short name or label.
 */
function matchLabel<T extends string>(labels: Readonly<Record<string, T>>, hint: string): T | undefined {
    const wanted = hint.trim().toLowerCase();
    if (wanted.length === 0) {
        return undefined;
    }

    for (const [key, label] of Object.entries(labels)) {
        if (key.toLowerCase() === wanted || label.toLowerCase() === wanted) {
            return label;
        }
    }
    return undefined;
}

/**
 * Entity kinds reported on every result.
 */
export const ENTITY_KINDS = ["equipment", "locations", "dates", "measurements", "personnel"] as const;

export type EntityKind = typeof ENTITY_KINDS[number];

export type ExtractedEntities = Readonly<Record<EntityKind, readonly string[]>>;

/**
 * Free-form processing metadata.
 */
export interface ProcessingMetadata {
    readonly originalLength: number;
    readonly processedLength: number;
    readonly processingVersion: string;

    /** Hint the caller passed that did not name a known document type */
    readonly documentTypeHint?: string;

    /** Steps that failed and fell back ("summary", "keywords") */
    readonly degraded?: readonly string[];

    /** Set on error results only */
    readonly error?: string;
}

/**
 * The one output of document processing.
 */
export interface ProcessingResult {
    readonly id: string;
    readonly summary: string;
    readonly details: string;
    readonly classification: ClassificationCategory;
    readonly priority: PriorityLevel;

    /** In [0, 1] */
    readonly confidence: number;

    /** Unique, at most 15 */
    readonly keywords: readonly string[];
    readonly entities: ExtractedEntities;

    /** Unique, ordered, at most 6 */
    readonly recommendedActions: readonly string[];
    readonly riskAssessment: string;
    readonly documentType?: DocumentType;
    readonly vesselId?: string;

    /** ISO-8601 creation time */
    readonly timestamp: string;
    readonly metadata: ProcessingMetadata;
}

/**
 * Counts over a set of results.
 */
export interface ResultBreakdown {
    readonly total: number;
    readonly critical: number;
    readonly byClassification: Readonly<Record<ClassificationCategory, number>>;
    readonly byPriority: Readonly<Record<PriorityLevel, number>>;
}

/**
 * Build a record with one entry per category.
 */
export function perCategory<V>(valueFor: (category: ClassificationCategory) => V): Record<ClassificationCategory, V> {
    return {
        [ClassificationCategory.CriticalEquipmentFailure]: valueFor(ClassificationCategory.CriticalEquipmentFailure),
        [ClassificationCategory.NavigationalHazard]      : valueFor(ClassificationCategory.NavigationalHazard),
        [ClassificationCategory.EnvironmentalCompliance] : valueFor(ClassificationCategory.EnvironmentalCompliance),
        [ClassificationCategory.RoutineMaintenance]      : valueFor(ClassificationCategory.RoutineMaintenance),
        [ClassificationCategory.SafetyViolation]         : valueFor(ClassificationCategory.SafetyViolation),
        [ClassificationCategory.FuelEfficiency]          : valueFor(ClassificationCategory.FuelEfficiency),
    };
}

/**
 * Build a record with one entry per priority level.
 */
export function perPriority<V>(valueFor: (level: PriorityLevel) => V): Record<PriorityLevel, V> {
    return {
        Critical: valueFor(PriorityLevel.Critical),
        High    : valueFor(PriorityLevel.High),
        Medium  : valueFor(PriorityLevel.Medium),
        Low     : valueFor(PriorityLevel.Low),
    };
}
