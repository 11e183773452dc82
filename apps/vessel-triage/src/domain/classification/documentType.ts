/**
 * @fileoverview Document type inference
 *
 * @module domain/classification/documentType
 */

import { countHits } from "@maritime-triage/engine";
import type { DocumentTypeRules } from "../catalog.js";
import { parseDocumentType, type DocumentType } from "../types.js";

/**
 * Type with the most indicator hits. Ties go to the type declared first;
 * no hits at all gives the default type.
 */
export function inferDocumentType(text: string, rules: DocumentTypeRules): DocumentType {
    const lowerText = text.toLowerCase();

    let best: DocumentType = rules.default;
    let bestHits = 0;

    for (const indicator of rules.indicators) {
        const hits = countHits(lowerText, indicator.keywords);
        if (hits > bestHits) {
            best     = indicator.type;
            bestHits = hits;
        }
    }

    return best;
}

export interface DocumentTypeResolution {
    readonly documentType: DocumentType;

    /** The caller's hint when it named no known type */
    readonly unrecognizedHint?: string;
}

/**
 * Use the caller's hint when it names a type, infer otherwise.
 */
export function resolveDocumentType(
    text: string,
    hint: string | undefined,
    rules: DocumentTypeRules
): DocumentTypeResolution {
    if (hint === undefined || hint.trim().length === 0) {
        return { documentType: inferDocumentType(text, rules) };
    }

    const named = parseDocumentType(hint);
    if (named) {
        return { documentType: named };
    }

    return {
        documentType    : inferDocumentType(text, rules),
        unrecognizedHint: hint,
    };
}
