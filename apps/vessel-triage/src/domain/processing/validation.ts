/**
 * @fileoverview Input validation for callers of the processor
 *
 * @module domain/processing/validation
 */

export const MIN_DOCUMENT_LENGTH = 10;

/**
 * Raised when document text is unusable before processing starts.
 */
export class DocumentValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "DocumentValidationError";
    }
}

/**
 * Check that document text is a string with at least
 * MIN_DOCUMENT_LENGTH non-blank characters. Returns the text trimmed.
 *
 * @throws DocumentValidationError
 */
export function validateDocumentText(text: unknown, minLength: number = MIN_DOCUMENT_LENGTH): string {
    if (typeof text !== "string") {
        throw new DocumentValidationError(`Document text must be a string, got ${typeof text}`);
    }

    const trimmed = text.trim();
    if (trimmed.length < minLength) {
        throw new DocumentValidationError(
            `Document text must be at least ${minLength} characters (got ${trimmed.length})`
        );
    }

    return trimmed;
}
