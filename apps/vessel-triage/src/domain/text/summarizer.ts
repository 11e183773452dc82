/**
 * @fileoverview Extractive summarizer
 *
 * Leading sentences of the document, as many as fit.
 *
 * @module domain/text/summarizer
 */

export const DEFAULT_SUMMARY_LENGTH = 150;

const kEllipsis = "...";

// A sentence ends at ".", "!" or "?" followed by whitespace.
const kSentenceBoundary = /(?<=[.!?])\s+/;

/**
 * Split text into trimmed, non-empty sentences.
 */
export function splitSentences(text: string): string[] {
    return text
        .split(kSentenceBoundary)
        .map(sentence => sentence.trim())
        .filter(sentence => sentence.length > 0);
}

/**
 * Cut text to at most `maxLength` characters, ending in "..." when cut.
 */
export function truncate(text: string, maxLength: number): string {
    if (text.length <= maxLength) {
        return text;
    }
    if (maxLength <= kEllipsis.length) {
        return text.slice(0, maxLength);
    }
    return text.slice(0, maxLength - kEllipsis.length) + kEllipsis;
}

/**
 * Summarize text within `maxLength` characters.
 *
 * Starts from the first sentence and appends following sentences while
 * the joined text still fits. A first sentence that is already too long
 * is truncated.
 *
 * @example
 * ```typescript
 * summarize("Pump 3 leaking. Crew notified. Spare seal on order.", 30);
 * // "Pump 3 leaking. Crew notified."
 * ```
 */
export function summarize(text: string, maxLength: number = DEFAULT_SUMMARY_LENGTH): string {
    const limit     = Math.max(0, Math.floor(maxLength));
    const sentences = splitSentences(text);

    if (sentences.length === 0) {
        return truncate(text.trim(), limit);
    }

    let summary = sentences[0];
    if (summary.length > limit) {
        return truncate(summary, limit);
    }

    for (const sentence of sentences.slice(1)) {
        const candidate = `${summary} ${sentence}`;
        if (candidate.length > limit) {
            break;
        }
        summary = candidate;
    }

    return summary;
}
